import Big from 'big.js';
import type { BollingerBandsResult } from '../types.js';
import { calculateSMA } from './ma.js';
import { calculateStdDev } from './statistics.js';

/**
 * 볼린저 밴드 계산 (최근 period개 값)
 *
 * 중심선 = SMA(period), 상/하단 = 중심선 ± numStdDev × 표본 표준편차
 */
export function calculateBollingerBands(
  values: readonly Big[],
  period = 20,
  numStdDev = 2
): BollingerBandsResult {
  if (values.length < period) {
    throw new Error(`볼린저 밴드 계산에 최소 ${period}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  const window = values.slice(-period);
  const middle = calculateSMA(window, period);
  const stdDev = calculateStdDev(window);
  const width = stdDev.times(new Big(numStdDev));

  return {
    middle,
    upper: middle.plus(width),
    lower: middle.minus(width),
    stdDev,
  };
}
