import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { serializeBacktestResult } from './serializer.js';
import { runBacktest } from '../engine/backtest.js';
import type { Bar, BacktestConfig } from '../types.js';

function createBars(closes: number[]): Bar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(Date.UTC(2025, 0, 1 + i)).toISOString(),
    open: new Big(close),
    high: new Big(close),
    low: new Big(close),
    close: new Big(close),
    volume: new Big(1000),
  }));
}

describe('serializeBacktestResult', () => {
  const config: BacktestConfig = {
    symbol: 'TEST',
    strategy: { kind: 'buy-and-hold', params: {} },
    initialCapital: new Big(1000),
    commissionRate: 0.001,
    slippageRate: 0,
    riskFreeRate: 0.02,
    sizing: { type: 'all-in' },
  };
  const result = runBacktest(createBars([100, 90, 120]), config);
  const serialized = serializeBacktestResult(result);

  it('Big 값을 number로 변환', () => {
    // 수량 floor(1000 / 100.1) = 9, 매수 900 + 0.9, 매도 1080 - 1.08
    expect(serialized.initialCapital).toBe(1000);
    expect(serialized.finalCapital).toBe(1178.02);
    expect(serialized.config.initialCapital).toBe(1000);
    expect(serialized.trades[0]).toMatchObject({
      entryPrice: 100,
      exitPrice: 120,
      qty: 9,
      entryCommission: 0.9,
      exitCommission: 1.08,
      realizedPnL: 178.02,
      exitReason: 'END_OF_DATA',
    });
    expect(serialized.equity.map((p) => p.equity)).toEqual([999.1, 909.1, 1178.02]);
    expect(serialized.drawdowns.map((p) => p.peak)).toEqual([999.1, 999.1, 1178.02]);
    expect(serialized.metrics.totalCommission).toBe(1.98);
  });

  it('JSON 왕복 후에도 동일', () => {
    expect(JSON.parse(JSON.stringify(serialized))).toEqual(serialized);
  });

  it('원본과 참조를 공유하지 않는다', () => {
    expect(serialized.config.strategy).toEqual(config.strategy);
    expect(serialized.config.strategy).not.toBe(config.strategy);
    expect(serialized.config.sizing).not.toBe(config.sizing);
  });
});
