import type { StrategyDefinition } from '../types.js';

/**
 * 매수 후 보유 (벤치마크)
 *
 * 매 봉 진입 시그널을 내지만 엔진은 FLAT 상태에서만 매수하므로 첫 봉에서 한 번만 체결된다.
 */
export const buyAndHoldStrategy: StrategyDefinition<'buy-and-hold'> = {
  kind: 'buy-and-hold',
  minimumBarsRequired: () => 1,
  describe: () => 'Buy and Hold',
  computeSignal: () => ({ action: 'ENTER_LONG', reason: '매수 후 보유' }),
};
