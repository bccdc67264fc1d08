import 'dotenv/config';

export function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function envNumber(key: string, defaultValue: number): number {
  const value = env(key);
  if (value === undefined) return defaultValue;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new Error(`Environment variable ${key} must be a finite number, got: ${value}`);
  }
  return num;
}

/**
 * 허용된 값 중 하나만 받는 환경변수 (대소문자 무시)
 */
export function envChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = env(key)?.trim().toLowerCase();
  if (value === undefined) return defaultValue;
  const matched = choices.find((choice) => choice.toLowerCase() === value);
  if (!matched) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join('|')}, got: ${value}`);
  }
  return matched;
}
