import type Big from 'big.js';
import {
  calculateMACDSeries,
  checkMACDCrossover,
  macdMinimumLength,
  type MACDResult,
} from '@backtester/trading-utils';
import type { MACDParams, StrategyDefinition, StrategySignal } from '../types.js';
import { HOLD, closePrices } from './prices.js';

function signalFromCrossover(current: MACDResult, previous: MACDResult): StrategySignal {
  switch (checkMACDCrossover(current, previous)) {
    case 'golden':
      return {
        action: 'ENTER_LONG',
        reason: `MACD 상향 돌파 (MACD: ${current.macd.toFixed(4)}, Signal: ${current.signal.toFixed(4)})`,
      };
    case 'death':
      return {
        action: 'EXIT_LONG',
        reason: `MACD 하향 돌파 (MACD: ${current.macd.toFixed(4)}, Signal: ${current.signal.toFixed(4)})`,
      };
    default:
      return HOLD;
  }
}

function macdSeries(closes: readonly Big[], params: MACDParams): MACDResult[] {
  return calculateMACDSeries(closes, params.fastPeriod, params.slowPeriod, params.signalPeriod);
}

/**
 * MACD 시그널선 크로스 전략
 *
 * MACD선이 시그널선을 상향 돌파 → 진입, 하향 돌파 → 청산
 */
export const macdStrategy: StrategyDefinition<'macd'> = {
  kind: 'macd',

  // 이전 봉 MACD까지 필요하므로 +1
  minimumBarsRequired: (params) => macdMinimumLength(params.slowPeriod, params.signalPeriod) + 1,

  describe: (params) =>
    `MACD(fast=${params.fastPeriod}, slow=${params.slowPeriod}, signal=${params.signalPeriod})`,

  computeSignal(history, params) {
    if (history.length < macdMinimumLength(params.slowPeriod, params.signalPeriod) + 1) {
      return HOLD;
    }

    const series = macdSeries(closePrices(history), params);
    return signalFromCrossover(series[series.length - 1]!, series[series.length - 2]!);
  },

  // EMA 세 개를 봉마다 다시 계산하지 않도록 한 번에 계산
  computeSignals(bars, params) {
    const signals: StrategySignal[] = bars.map(() => HOLD);
    const minLength = macdMinimumLength(params.slowPeriod, params.signalPeriod);
    if (bars.length < minLength + 1) {
      return signals;
    }

    const series = macdSeries(closePrices(bars), params);
    for (let k = 1; k < series.length; k++) {
      signals[k + minLength - 1] = signalFromCrossover(series[k]!, series[k - 1]!);
    }
    return signals;
  },
};
