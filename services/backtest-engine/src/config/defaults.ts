import { envChoice, envNumber } from '@backtester/shared-utils';
import type { SizingPolicy } from '../types.js';

// ============================================================
// 실행 설정 기본값
// ============================================================

export const DEFAULT_SYMBOL = 'UNKNOWN';
export const DEFAULT_INITIAL_CAPITAL = 10000;
export const DEFAULT_COMMISSION_RATE = 0.001; // 0.1%
export const DEFAULT_SLIPPAGE_RATE = 0.0005; // 0.05%
export const DEFAULT_RISK_FREE_RATE = 0.02; // 연 2%

export const SIZING_TYPES = [
  'all-in',
  'fractional',
  'fixed-fraction',
] as const satisfies readonly SizingPolicy['type'][];

// ============================================================
// 전략별 기본 파라미터
// ============================================================

export const DEFAULT_STRATEGY_PARAMS = {
  'ma-crossover': { fastWindow: 50, slowWindow: 200 },
  rsi: { period: 14, oversold: 30, overbought: 70 },
  macd: { fastPeriod: 12, slowPeriod: 26, signalPeriod: 9 },
  'bollinger-bands': { window: 20, numStdDev: 2 },
  'mean-reversion': { window: 20, entryZ: 2, exitZ: 0.5, exitPolicy: 'threshold' },
  'buy-and-hold': {},
} as const;

export interface BacktestDefaults {
  initialCapital: number;
  commissionRate: number;
  slippageRate: number;
  riskFreeRate: number;
  sizing: SizingPolicy['type'];
}

/**
 * 환경변수로 덮어쓴 실행 기본값 (CLI 전용)
 *
 * 엔진은 환경변수를 읽지 않는다. 호출자가 명시적인 설정 값을 넘긴다.
 */
export function loadBacktestDefaults(): BacktestDefaults {
  return Object.freeze({
    initialCapital: envNumber('BACKTEST_INITIAL_CAPITAL', DEFAULT_INITIAL_CAPITAL),
    commissionRate: envNumber('BACKTEST_COMMISSION_RATE', DEFAULT_COMMISSION_RATE),
    slippageRate: envNumber('BACKTEST_SLIPPAGE_RATE', DEFAULT_SLIPPAGE_RATE),
    riskFreeRate: envNumber('BACKTEST_RISK_FREE_RATE', DEFAULT_RISK_FREE_RATE),
    sizing: envChoice('BACKTEST_SIZING', SIZING_TYPES, 'all-in'),
  });
}
