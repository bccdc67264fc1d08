import Big from 'big.js';

/**
 * 표준편차 계산
 *
 * @param values - 값 배열
 * @param sample - true면 표본 표준편차 (n - 1), false면 모표준편차 (n)
 */
export function calculateStdDev(values: readonly Big[], sample = true): Big {
  const denominator = sample ? values.length - 1 : values.length;
  if (denominator <= 0) {
    throw new Error(`표준편차 계산에 값이 부족합니다. 현재: ${values.length}개`);
  }

  const mean = values.reduce((acc, v) => acc.plus(v), new Big(0)).div(values.length);
  const squared = values.reduce((acc, v) => acc.plus(v.minus(mean).pow(2)), new Big(0));

  return squared.div(denominator).sqrt();
}

/**
 * 최근 period개 값 기준 z-score: (마지막 값 - 평균) / 표본 표준편차
 *
 * 표준편차가 0이면 null.
 */
export function calculateZScore(values: readonly Big[], period: number): Big | null {
  if (values.length < period) {
    throw new Error(`z-score 계산에 최소 ${period}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  const window = values.slice(-period);
  const mean = window.reduce((acc, v) => acc.plus(v), new Big(0)).div(period);
  const stdDev = calculateStdDev(window);

  if (stdDev.eq(0)) {
    return null;
  }

  return window[window.length - 1]!.minus(mean).div(stdDev);
}
