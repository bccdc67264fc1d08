import type Big from 'big.js';
import { calculateRSISeries } from '@backtester/trading-utils';
import type { RSIParams, StrategyDefinition, StrategySignal } from '../types.js';
import { HOLD, closePrices } from './prices.js';

function signalFromRSI(rsi: Big, params: RSIParams): StrategySignal {
  if (rsi.lt(params.oversold)) {
    return { action: 'ENTER_LONG', reason: `RSI 과매도 (${rsi.toFixed(2)} < ${params.oversold})` };
  }

  if (rsi.gt(params.overbought)) {
    return { action: 'EXIT_LONG', reason: `RSI 과매수 (${rsi.toFixed(2)} > ${params.overbought})` };
  }

  return HOLD;
}

/**
 * RSI 과매수/과매도 전략
 *
 * RSI < oversold → 진입, RSI > overbought → 청산
 */
export const rsiStrategy: StrategyDefinition<'rsi'> = {
  kind: 'rsi',

  minimumBarsRequired: (params) => params.period + 1,

  describe: (params) =>
    `RSI(period=${params.period}, oversold=${params.oversold}, overbought=${params.overbought})`,

  computeSignal(history, params) {
    if (history.length < params.period + 1) {
      return HOLD;
    }

    const rsiSeries = calculateRSISeries(closePrices(history), params.period);
    return signalFromRSI(rsiSeries[rsiSeries.length - 1]!, params);
  },

  // Wilder 평활을 봉마다 처음부터 다시 돌리지 않도록 한 번에 계산
  computeSignals(bars, params) {
    const signals: StrategySignal[] = bars.map(() => HOLD);
    if (bars.length < params.period + 1) {
      return signals;
    }

    calculateRSISeries(closePrices(bars), params.period).forEach((rsi, k) => {
      signals[k + params.period] = signalFromRSI(rsi, params);
    });
    return signals;
  },
};
