import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

/**
 * ISO 문자열 → UTC DateTime (파싱 실패 시 null)
 *
 * 타임존 표기가 없으면 UTC로 간주한다.
 */
export function parseUtcIso(value: string): DateTime | null {
  const dt = DateTime.fromISO(value, { zone: 'utc', setZone: true });
  return dt.isValid ? dt.toUTC() : null;
}

/**
 * 두 ISO 시각 사이의 시간 (hours)
 */
export function hoursBetween(startIso: string, endIso: string): number {
  const start = parseUtcIso(startIso);
  const end = parseUtcIso(endIso);
  if (!start || !end) return 0;
  return end.diff(start, 'hours').hours;
}
