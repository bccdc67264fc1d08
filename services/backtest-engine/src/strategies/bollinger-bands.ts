import { calculateBollingerBands } from '@backtester/trading-utils';
import type { StrategyDefinition } from '../types.js';
import { HOLD, closePrices } from './prices.js';

/**
 * 볼린저 밴드 평균회귀 전략
 *
 * 종가 <= 하단 밴드 → 진입, 종가 >= 상단 밴드 → 청산
 * 밴드 폭이 0(가격 변동 없음)이면 상/하단이 종가와 같아지므로 HOLD.
 */
export const bollingerBandsStrategy: StrategyDefinition<'bollinger-bands'> = {
  kind: 'bollinger-bands',

  minimumBarsRequired: (params) => params.window,

  describe: (params) => `Bollinger Bands(window=${params.window}, k=${params.numStdDev})`,

  computeSignal(history, params) {
    if (history.length < params.window) {
      return HOLD;
    }

    const closes = closePrices(history.slice(-params.window));
    const bands = calculateBollingerBands(closes, params.window, params.numStdDev);
    if (bands.stdDev.eq(0)) {
      return HOLD;
    }

    const close = closes[closes.length - 1]!;

    if (close.lte(bands.lower)) {
      return {
        action: 'ENTER_LONG',
        reason: `하단 밴드 터치 (종가: ${close.toFixed(2)}, 하단: ${bands.lower.toFixed(2)})`,
      };
    }

    if (close.gte(bands.upper)) {
      return {
        action: 'EXIT_LONG',
        reason: `상단 밴드 터치 (종가: ${close.toFixed(2)}, 상단: ${bands.upper.toFixed(2)})`,
      };
    }

    return HOLD;
  },
};
