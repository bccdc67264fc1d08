import { calculateZScore } from '@backtester/trading-utils';
import type { StrategyDefinition } from '../types.js';
import { HOLD, closePrices } from './prices.js';

/**
 * z-score 평균회귀 전략
 *
 * z = (종가 - 이동평균) / 이동 표본 표준편차
 * - z < -entryZ → 진입
 * - threshold: z > exitZ → 청산
 * - zero-cross: 이전 봉 z < 0, 현재 봉 z >= 0 → 청산 (이전 봉 z가 필요해 window + 1개 봉)
 */
export const meanReversionStrategy: StrategyDefinition<'mean-reversion'> = {
  kind: 'mean-reversion',

  minimumBarsRequired: (params) =>
    params.exitPolicy === 'zero-cross' ? params.window + 1 : params.window,

  describe: (params) =>
    `Mean Reversion(window=${params.window}, entryZ=${params.entryZ}, exit=${
      params.exitPolicy === 'zero-cross' ? 'zero-cross' : `z>${params.exitZ}`
    })`,

  computeSignal(history, params) {
    const { window, entryZ, exitZ, exitPolicy } = params;
    const required = exitPolicy === 'zero-cross' ? window + 1 : window;
    if (history.length < required) {
      return HOLD;
    }

    const closes = closePrices(history.slice(-required));
    const z = calculateZScore(closes, window);
    if (z === null) {
      return HOLD;
    }

    if (z.lt(-entryZ)) {
      return { action: 'ENTER_LONG', reason: `z-score 과매도 (z: ${z.toFixed(2)} < -${entryZ})` };
    }

    if (exitPolicy === 'threshold') {
      if (z.gt(exitZ)) {
        return { action: 'EXIT_LONG', reason: `z-score 청산 (z: ${z.toFixed(2)} > ${exitZ})` };
      }
      return HOLD;
    }

    const prevZ = calculateZScore(closes.slice(0, -1), window);
    if (prevZ !== null && prevZ.lt(0) && z.gte(0)) {
      return { action: 'EXIT_LONG', reason: `평균 회귀 완료 (z: ${prevZ.toFixed(2)} → ${z.toFixed(2)})` };
    }

    return HOLD;
  },
};
