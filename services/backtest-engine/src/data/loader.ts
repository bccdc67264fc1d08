import { readFile } from 'node:fs/promises';
import { createLogger } from '@backtester/shared-utils';
import Big from 'big.js';
import { z } from 'zod';
import { BacktestInputError } from '../errors.js';
import type { Bar, BarRaw } from '../types.js';

const logger = createLogger('data-loader');

const numeric = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .min(1)
    .refine((s) => Number.isFinite(Number(s)), { message: 'not a number' }),
]);

const BarRawSchema = z.object({
  timestamp: z.string().min(1),
  open: numeric,
  high: numeric,
  low: numeric,
  close: numeric,
  volume: numeric.default(0),
});

const BarFileSchema = z.array(BarRawSchema);

/**
 * 원본 봉 → Bar 변환
 */
export function toBars(rows: readonly BarRaw[]): Bar[] {
  return rows.map((row) => ({
    timestamp: row.timestamp,
    open: new Big(row.open),
    high: new Big(row.high),
    low: new Big(row.low),
    close: new Big(row.close),
    volume: new Big(row.volume),
  }));
}

/**
 * JSON 텍스트(봉 객체 배열) 파싱
 *
 * @throws BacktestInputError - JSON 문법 오류 또는 필드 누락/타입 오류
 */
export function parseBarsJson(text: string): Bar[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new BacktestInputError(`JSON 파싱 실패: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = BarFileSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const index = typeof first?.path[0] === 'number' ? first.path[0] : null;
    const field = first?.path.slice(1).join('.') ?? '';
    throw new BacktestInputError(`봉 형식 오류 ${field ? `${field}: ` : ''}${first?.message ?? ''}`.trim(), index);
  }

  return toBars(parsed.data);
}

/**
 * 파일에서 봉 데이터 로드
 *
 * @param filePath - JSON 파일 경로
 * @returns 봉 배열 (구조 검증은 엔진이 수행)
 */
export async function loadBarsFromFile(filePath: string): Promise<Bar[]> {
  logger.info('봉 데이터 로드 시작', { filePath });

  const text = await readFile(filePath, 'utf8');
  const bars = parseBarsJson(text);

  logger.info('봉 데이터 로드 완료', { count: bars.length });
  return bars;
}
