import type { MACDResult, CrossoverDirection } from '../types.js';
import type Big from 'big.js';
import { calculateEMASeries } from './ma.js';

/**
 * MACD 계산에 필요한 최소 값 개수
 */
export function macdMinimumLength(slowPeriod: number, signalPeriod: number): number {
  return slowPeriod + signalPeriod - 1;
}

/**
 * MACD 시계열 계산
 *
 * MACD = 빠른 EMA - 느린 EMA
 * Signal = MACD의 signalPeriod EMA
 * Histogram = MACD - Signal
 *
 * 반환 배열의 k번째 값은 values[k + minLength - 1] 시점의 결과이며,
 * 그 시점까지의 값으로 calculateMACD 를 호출한 값과 같다.
 *
 * @param values - 종가 배열 (최소 slowPeriod + signalPeriod - 1개)
 * @returns MACD 결과 배열 (길이: values.length - minLength + 1)
 */
export function calculateMACDSeries(
  values: readonly Big[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9
): MACDResult[] {
  const minLength = macdMinimumLength(slowPeriod, signalPeriod);
  if (values.length < minLength) {
    throw new Error(`MACD 계산에 최소 ${minLength}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  const fastEMAs = calculateEMASeries(values, fastPeriod);
  const slowEMAs = calculateEMASeries(values, slowPeriod);

  // slowEMA가 늦게 시작하므로 같은 봉을 가리키도록 offset 적용
  const offset = slowPeriod - fastPeriod;
  const macdValues: Big[] = [];

  for (let i = 0; i < slowEMAs.length; i++) {
    macdValues.push(fastEMAs[i + offset]!.minus(slowEMAs[i]!));
  }

  const signalEMAs = calculateEMASeries(macdValues, signalPeriod);

  // signalEMA의 k번째 값은 macdValues[k + signalPeriod - 1] 시점
  return signalEMAs.map((signal, k) => {
    const macd = macdValues[k + signalPeriod - 1]!;
    return { macd, signal, histogram: macd.minus(signal) };
  });
}

/**
 * 최신 봉의 MACD 결과
 *
 * @param fastPeriod - 빠른 EMA 기간 (기본값: 12)
 * @param slowPeriod - 느린 EMA 기간 (기본값: 26)
 * @param signalPeriod - 시그널선 기간 (기본값: 9)
 */
export function calculateMACD(
  values: readonly Big[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9
): MACDResult {
  const series = calculateMACDSeries(values, fastPeriod, slowPeriod, signalPeriod);
  return series[series.length - 1]!;
}

/**
 * MACD 크로스오버 확인
 *
 * @param current - 현재 MACD
 * @param previous - 이전 MACD (1봉 전)
 * @returns 'golden' (MACD가 시그널선 상향 돌파), 'death' (하향 돌파), null
 */
export function checkMACDCrossover(
  current: MACDResult,
  previous: MACDResult
): CrossoverDirection | null {
  if (previous.histogram.lte(0) && current.histogram.gt(0)) {
    return 'golden';
  }

  if (previous.histogram.gte(0) && current.histogram.lt(0)) {
    return 'death';
  }

  return null;
}
