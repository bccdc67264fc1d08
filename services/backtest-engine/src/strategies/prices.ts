import type Big from 'big.js';
import type { Bar, StrategySignal } from '../types.js';

export const HOLD: StrategySignal = Object.freeze({ action: 'HOLD' });

export function closePrices(history: readonly Bar[]): Big[] {
  return history.map((bar) => bar.close);
}
