import { describe, it, expect, afterEach } from 'vitest';
import { loadBacktestDefaults } from './defaults.js';

const KEYS = [
  'BACKTEST_INITIAL_CAPITAL',
  'BACKTEST_COMMISSION_RATE',
  'BACKTEST_SLIPPAGE_RATE',
  'BACKTEST_RISK_FREE_RATE',
  'BACKTEST_SIZING',
];

afterEach(() => {
  for (const key of KEYS) {
    delete process.env[key];
  }
});

describe('loadBacktestDefaults', () => {
  it('환경변수가 없으면 내장 기본값', () => {
    expect(loadBacktestDefaults()).toEqual({
      initialCapital: 10000,
      commissionRate: 0.001,
      slippageRate: 0.0005,
      riskFreeRate: 0.02,
      sizing: 'all-in',
    });
  });

  it('환경변수로 덮어쓰기', () => {
    process.env['BACKTEST_INITIAL_CAPITAL'] = '25000';
    process.env['BACKTEST_COMMISSION_RATE'] = '0';
    process.env['BACKTEST_SIZING'] = 'Fractional';

    const defaults = loadBacktestDefaults();

    expect(defaults.initialCapital).toBe(25000);
    expect(defaults.commissionRate).toBe(0);
    expect(defaults.sizing).toBe('fractional');
    expect(Object.isFrozen(defaults)).toBe(true);
  });

  it('잘못된 숫자는 에러', () => {
    process.env['BACKTEST_SLIPPAGE_RATE'] = 'abc';

    expect(() => loadBacktestDefaults()).toThrow('BACKTEST_SLIPPAGE_RATE must be a finite number');
  });
});
