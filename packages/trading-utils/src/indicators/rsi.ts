import Big from 'big.js';

function toRSI(avgGain: Big, avgLoss: Big): Big {
  if (avgLoss.eq(0)) {
    return avgGain.eq(0) ? new Big(50) : new Big(100);
  }

  const rs = avgGain.div(avgLoss);
  return new Big(100).minus(new Big(100).div(new Big(1).plus(rs)));
}

/**
 * RSI 시계열 계산
 *
 * 첫 period개 변화량의 단순 평균으로 시작해 Wilder 방식으로 평활합니다.
 * 반환 배열의 k번째 값은 values[k + period] 시점의 RSI이며,
 * values.slice(0, k + period + 1) 로 calculateRSI 를 호출한 값과 같습니다.
 *
 * @param values - 종가 배열 (최소 period + 1개 필요)
 * @param period - RSI 기간 (기본값: 14)
 * @returns RSI 배열 (길이: values.length - period)
 */
export function calculateRSISeries(values: readonly Big[], period = 14): Big[] {
  if (values.length < period + 1) {
    throw new Error(`RSI 계산에 최소 ${period + 1}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  // 가격 변화 계산
  const changes: Big[] = [];
  for (let i = 1; i < values.length; i++) {
    changes.push(values[i]!.minus(values[i - 1]!));
  }

  let gains = new Big(0);
  let losses = new Big(0);

  for (let i = 0; i < period; i++) {
    const change = changes[i]!;
    if (change.gt(0)) {
      gains = gains.plus(change);
    } else {
      losses = losses.plus(change.abs());
    }
  }

  let avgGain = gains.div(period);
  let avgLoss = losses.div(period);
  const rsiValues: Big[] = [toRSI(avgGain, avgLoss)];

  // Wilder's smoothing
  for (let i = period; i < changes.length; i++) {
    const change = changes[i]!;
    const gain = change.gt(0) ? change : new Big(0);
    const loss = change.lt(0) ? change.abs() : new Big(0);

    avgGain = avgGain.times(period - 1).plus(gain).div(period);
    avgLoss = avgLoss.times(period - 1).plus(loss).div(period);
    rsiValues.push(toRSI(avgGain, avgLoss));
  }

  return rsiValues;
}

/**
 * RSI (Relative Strength Index) 계산
 *
 * RSI는 0-100 범위의 모멘텀 지표입니다.
 *
 * - 하락이 한 번도 없으면 100
 * - 변화가 전혀 없으면 50
 *
 * @param values - 종가 배열 (최소 period + 1개 필요)
 * @param period - RSI 기간 (기본값: 14)
 * @returns 최신 봉의 RSI 값
 *
 * @example
 * ```typescript
 * const rsi = calculateRSI(closes, 14);
 * if (rsi.lt(30)) {
 *   console.log('과매도 구간 - 매수 고려');
 * }
 * ```
 */
export function calculateRSI(values: readonly Big[], period = 14): Big {
  const series = calculateRSISeries(values, period);
  return series[series.length - 1]!;
}
