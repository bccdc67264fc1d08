import { parseUtcIso } from '@backtester/shared-utils';
import { BacktestInputError } from '../errors.js';
import type { Bar } from '../types.js';

/**
 * 봉 시퀀스 구조 검증 (시뮬레이션 전 1회)
 *
 * - 비어 있지 않을 것
 * - 타임스탬프 파싱 가능, 엄격한 오름차순 (중복 불가)
 * - 종가 > 0, 거래량 >= 0
 *
 * @throws BacktestInputError
 */
export function validateBars(bars: readonly Bar[]): void {
  if (bars.length === 0) {
    throw new BacktestInputError('봉 데이터가 없습니다');
  }

  let prevMillis: number | null = null;

  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i]!;
    const time = parseUtcIso(bar.timestamp);

    if (!time) {
      throw new BacktestInputError(`타임스탬프 파싱 실패: ${bar.timestamp}`, i);
    }

    const millis = time.toMillis();
    if (prevMillis !== null) {
      if (millis === prevMillis) {
        throw new BacktestInputError(`중복 타임스탬프: ${bar.timestamp}`, i);
      }
      if (millis < prevMillis) {
        throw new BacktestInputError(`시간 역순 봉: ${bar.timestamp}`, i);
      }
    }
    prevMillis = millis;

    if (bar.close.lte(0)) {
      throw new BacktestInputError(`종가는 0보다 커야 합니다: ${bar.close.toString()}`, i);
    }

    if (bar.volume.lt(0)) {
      throw new BacktestInputError(`거래량은 음수일 수 없습니다: ${bar.volume.toString()}`, i);
    }
  }
}
