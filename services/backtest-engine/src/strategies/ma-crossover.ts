import { calculateSMA, checkMACrossover } from '@backtester/trading-utils';
import type { StrategyDefinition } from '../types.js';
import { HOLD, closePrices } from './prices.js';

/**
 * Moving Average Crossover 전략
 *
 * 골든 크로스 (단기 이평선이 장기 이평선 상향 돌파) → 진입
 * 데드 크로스 (단기 이평선이 장기 이평선 하향 돌파) → 청산
 *
 * 크로스 판정에 이전 봉의 장기 이평선이 필요하므로 slowWindow + 1개 봉이 있어야 한다.
 */
export const maCrossoverStrategy: StrategyDefinition<'ma-crossover'> = {
  kind: 'ma-crossover',

  minimumBarsRequired: (params) => params.slowWindow + 1,

  describe: (params) => `MA Crossover(fast=${params.fastWindow}, slow=${params.slowWindow})`,

  computeSignal(history, params) {
    const { fastWindow, slowWindow } = params;
    if (history.length < slowWindow + 1) {
      return HOLD;
    }

    const closes = closePrices(history.slice(-(slowWindow + 1)));
    const prevCloses = closes.slice(0, -1);

    const current = {
      short: calculateSMA(closes, fastWindow),
      long: calculateSMA(closes, slowWindow),
    };
    const previous = {
      short: calculateSMA(prevCloses, fastWindow),
      long: calculateSMA(prevCloses, slowWindow),
    };

    switch (checkMACrossover(previous, current)) {
      case 'golden':
        return {
          action: 'ENTER_LONG',
          reason: `골든 크로스 (단기 MA: ${current.short.toFixed(2)}, 장기 MA: ${current.long.toFixed(2)})`,
        };
      case 'death':
        return {
          action: 'EXIT_LONG',
          reason: `데드 크로스 (단기 MA: ${current.short.toFixed(2)}, 장기 MA: ${current.long.toFixed(2)})`,
        };
      default:
        return HOLD;
    }
  },
};
