import Big from 'big.js';
import type { MAPair, CrossoverDirection } from '../types.js';

/** EMA 소수 자릿수. 매 단계 반올림해 자릿수가 누적되지 않게 한다. */
export const EMA_DECIMALS = 12;

/**
 * 단순 이동평균 (SMA) 계산 - 마지막 period개 값 기준
 *
 * @param values - 값 배열 (시간 오름차순)
 * @param period - 이동평균 기간
 * @returns SMA 값
 */
export function calculateSMA(values: readonly Big[], period: number): Big {
  if (values.length < period) {
    throw new Error(`SMA 계산에 최소 ${period}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  const slice = values.slice(-period);
  const sum = slice.reduce((acc, val) => acc.plus(val), new Big(0));
  return sum.div(period);
}

/**
 * 지수 이동평균 (EMA) 시계열 계산
 *
 * 첫 EMA는 처음 period개 값의 SMA로 시작한다.
 * 반환 배열의 k번째 값은 values[k + period - 1] 시점의 EMA.
 *
 * @param values - 값 배열 (시간 오름차순)
 * @param period - 이동평균 기간
 * @returns EMA 배열 (길이: values.length - period + 1)
 */
export function calculateEMASeries(values: readonly Big[], period: number): Big[] {
  if (values.length < period) {
    throw new Error(`EMA 계산에 최소 ${period}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  const firstSum = values.slice(0, period).reduce((acc, val) => acc.plus(val), new Big(0));
  const emaValues: Big[] = [firstSum.div(period).round(EMA_DECIMALS)];

  // 평활 계수: 2 / (period + 1)
  const multiplier = new Big(2).div(period + 1);

  // EMA = (현재값 - 이전EMA) * 평활계수 + 이전EMA
  for (let i = period; i < values.length; i++) {
    const prevEMA = emaValues[emaValues.length - 1]!;
    emaValues.push(values[i]!.minus(prevEMA).times(multiplier).plus(prevEMA).round(EMA_DECIMALS));
  }

  return emaValues;
}

/**
 * 이동평균 골든크로스/데드크로스 확인
 *
 * - golden: 이전 봉 단기 <= 장기, 현재 봉 단기 > 장기
 * - death: 이전 봉 단기 >= 장기, 현재 봉 단기 < 장기
 *
 * @param previous - 이전 봉 이동평균
 * @param current - 현재 봉 이동평균
 * @returns 'golden' | 'death' | null (크로스 없음)
 *
 * @example
 * ```typescript
 * const crossover = checkMACrossover(
 *   { short: prevMa3, long: prevMa5 },
 *   { short: ma3, long: ma5 }
 * );
 * if (crossover === 'golden') {
 *   console.log('골든크로스: 매수 신호');
 * }
 * ```
 */
export function checkMACrossover(previous: MAPair, current: MAPair): CrossoverDirection | null {
  if (previous.short.lte(previous.long) && current.short.gt(current.long)) {
    return 'golden';
  }

  if (previous.short.gte(previous.long) && current.short.lt(current.long)) {
    return 'death';
  }

  return null;
}
