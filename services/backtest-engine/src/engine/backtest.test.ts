import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { runBacktest, runBenchmark } from './backtest.js';
import { BacktestConfigError, BacktestInputError } from '../errors.js';
import { parseStrategyConfig } from '../config/schema.js';
import { STRATEGY_DEFINITIONS } from '../strategies/index.js';
import type { Bar, BacktestConfig, BacktestResult, StrategyConfig } from '../types.js';

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

function createConfig(overrides: Partial<BacktestConfig> = {}): BacktestConfig {
  return {
    symbol: 'TEST',
    strategy: { kind: 'ma-crossover', params: { fastWindow: 3, slowWindow: 5 } },
    initialCapital: new Big(10000),
    commissionRate: 0,
    slippageRate: 0,
    riskFreeRate: 0.02,
    sizing: { type: 'all-in' },
    ...overrides,
  };
}

const buyAndHold: StrategyConfig = { kind: 'buy-and-hold', params: {} };

// 0~9: 100 고정, 10~19: 110부터 10씩 상승, 20: 100으로 급락
// fast 3 / slow 5 기준 봉 10 골든 크로스, 봉 20 데드 크로스
const CROSSOVER_CLOSES = [
  ...Array.from({ length: 10 }, () => 100),
  ...Array.from({ length: 10 }, (_, i) => 110 + i * 10),
  100,
];

// 완만한 상승 추세 + 사인파 + 결정적 잡음, 소수 2자리
function createRealisticCloses(length: number): number[] {
  return Array.from({ length }, (_, i) => {
    const noise = (((i * 37) % 11) - 5) * 0.3;
    return Math.round((100 + 0.02 * i + 8 * Math.sin(i / 7) + noise) * 100) / 100;
  });
}

/**
 * 거래 로그로 봉별 현금/수량을 재구성해 자본 곡선과 비교
 */
function expectEquityMatchesTradeLog(result: BacktestResult, bars: Bar[], initialCapital: Big): void {
  let cash = initialCapital;
  let qty = new Big(0);

  bars.forEach((bar, i) => {
    for (const trade of result.trades.filter((t) => t.entryIndex === i)) {
      cash = cash.minus(trade.qty.times(trade.entryPrice)).minus(trade.entryCommission);
      qty = trade.qty;
    }
    for (const trade of result.trades.filter((t) => t.exitIndex === i)) {
      cash = cash.plus(trade.qty.times(trade.exitPrice)).minus(trade.exitCommission);
      qty = new Big(0);
    }

    expect(cash.gte(0)).toBe(true);
    expect(result.equity[i]!.equity.eq(cash.plus(qty.times(bar.close)))).toBe(true);
  });
}

describe('백테스트 엔진', () => {
  describe('MA Crossover 시나리오', () => {
    const bars = createBars(CROSSOVER_CLOSES);

    it('봉 10 진입, 봉 20 청산 (거래 1회)', () => {
      const result = runBacktest(bars, createConfig());

      expect(result.trades).toHaveLength(1);
      const trade = result.trades[0]!;
      expect(trade.entryIndex).toBe(10);
      expect(trade.exitIndex).toBe(20);
      expect(trade.exitReason).toBe('SIGNAL');
      expect(trade.entryTime).toBe(bars[10]!.timestamp);
      expect(trade.exitTime).toBe(bars[20]!.timestamp);
    });

    it('비용 0: 실현 손익 = (청산 종가 - 진입 종가) × 수량', () => {
      const result = runBacktest(bars, createConfig());
      const trade = result.trades[0]!;

      // floor(10000 / 110) = 90
      expect(trade.qty.toString()).toBe('90');
      expect(trade.entryPrice.toString()).toBe('110');
      expect(trade.exitPrice.toString()).toBe('100');
      expect(trade.realizedPnL.toString()).toBe('-900');
      expect(result.finalCapital.toString()).toBe('9100');
      expect(result.totalSlippageCost.eq(0)).toBe(true);
      expect(result.metrics.totalCommission.eq(0)).toBe(true);
    });

    it('비용이 있으면 손익이 비용만큼 낮아진다', () => {
      const result = runBacktest(bars, createConfig({ commissionRate: 0.001, slippageRate: 0.0005 }));
      const trade = result.trades[0]!;

      // 진입가 110 × 1.0005 = 110.055, 수량 floor(10000 / (110.055 × 1.001)) = 90
      // 청산가 100 × 0.9995 = 99.95
      // 수수료 9.90495 + 8.9955, 손익 (99.95 - 110.055) × 90 - 18.90045
      expect(trade.entryPrice.toString()).toBe('110.055');
      expect(trade.exitPrice.toString()).toBe('99.95');
      expect(trade.entryCommission.toString()).toBe('9.90495');
      expect(trade.exitCommission.toString()).toBe('8.9955');
      expect(trade.realizedPnL.toString()).toBe('-928.35045');
      expect(trade.realizedPnL.lt(-900)).toBe(true);
      expect(result.totalSlippageCost.toString()).toBe('9.45');
      expect(result.metrics.totalCommission.toString()).toBe('18.90045');
      expect(result.finalCapital.toString()).toBe('9071.64955');
    });

    it('자본 곡선 = 현금 + 수량 × 종가', () => {
      const result = runBacktest(bars, createConfig());
      const equity = result.equity.map((p) => p.equity.toNumber());

      // 진입 후 현금 100, 수량 90
      expect(equity.slice(0, 10)).toEqual(Array.from({ length: 10 }, () => 10000));
      expect(equity[10]).toBe(10000);
      expect(equity[15]).toBe(100 + 90 * 160);
      expect(equity[19]).toBe(18100);
      expect(equity[20]).toBe(9100);
    });
  });

  it('자본 곡선 길이 = 봉 개수', () => {
    const bars = createBars([100, 101, 99, 102, 98, 103, 97]);

    for (const strategy of [
      buyAndHold,
      { kind: 'rsi', params: { period: 3, oversold: 30, overbought: 70 } },
      { kind: 'bollinger-bands', params: { window: 3, numStdDev: 1 } },
    ] satisfies StrategyConfig[]) {
      const result = runBacktest(bars, createConfig({ strategy }));

      expect(result.equity).toHaveLength(bars.length);
      expect(result.drawdowns).toHaveLength(bars.length);
      expect(result.equity.map((p) => p.timestamp)).toEqual(bars.map((b) => b.timestamp));
    }
  });

  it('같은 입력이면 같은 결과', () => {
    const bars = createBars(CROSSOVER_CLOSES);
    const config = createConfig({ commissionRate: 0.001, slippageRate: 0.0005 });

    expect(runBacktest(bars, config)).toEqual(runBacktest(bars, config));
  });

  it('미래 봉은 과거 자본에 영향을 주지 않는다', () => {
    const bars = createBars(CROSSOVER_CLOSES);
    const config = createConfig();

    const full = runBacktest(bars, config).equity.map((p) => p.equity.toString());
    const prefix = runBacktest(bars.slice(0, 15), config).equity.map((p) => p.equity.toString());

    // 마지막 봉은 강제 청산이 들어가므로 제외
    expect(prefix.slice(0, 14)).toEqual(full.slice(0, 14));
  });

  describe('종료 처리', () => {
    it('마지막 봉에서 포지션 강제 청산 (END_OF_DATA)', () => {
      const result = runBacktest(
        createBars([100, 110, 120]),
        createConfig({ strategy: buyAndHold, initialCapital: new Big(1000) })
      );

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]!.exitReason).toBe('END_OF_DATA');
      expect(result.trades[0]!.exitIndex).toBe(2);
      expect(result.trades[0]!.realizedPnL.toString()).toBe('200');
      expect(result.trades[0]!.returnPct).toBe(20);
      expect(result.equity.map((p) => p.equity.toNumber())).toEqual([1000, 1100, 1200]);
      expect(result.finalCapital.toString()).toBe('1200');
    });

    it('강제 청산 비용이 마지막 자본에 반영된다', () => {
      const result = runBacktest(
        createBars([100, 100]),
        createConfig({ strategy: buyAndHold, initialCapital: new Big(1000), commissionRate: 0.01 })
      );

      // 수량 floor(1000 / 101) = 9, 매수 900 + 9, 매도 900 - 9
      expect(result.trades[0]!.qty.toString()).toBe('9');
      expect(result.finalCapital.toString()).toBe('982');
      expect(result.equity[1]!.equity.toString()).toBe('982');
    });
  });

  describe('주문 수량 정책', () => {
    it('fractional: 소수 수량', () => {
      const result = runBacktest(
        createBars([300, 330]),
        createConfig({ strategy: buyAndHold, initialCapital: new Big(1000), sizing: { type: 'fractional' } })
      );

      expect(result.trades[0]!.qty.toString()).toBe('3.33333333');
      // 현금 0.000001 + 3.33333333 × 330
      expect(result.finalCapital.toString()).toBe('1099.9999999');
    });

    it('fixed-fraction: 현금 일부만 투입', () => {
      const result = runBacktest(
        createBars([100, 100, 100]),
        createConfig({
          strategy: buyAndHold,
          initialCapital: new Big(1000),
          sizing: { type: 'fixed-fraction', fraction: 0.5 },
        })
      );

      expect(result.trades[0]!.qty.toString()).toBe('5');
      expect(result.equity.every((p) => p.equity.eq(1000))).toBe(true);
    });

    it('수량 0이면 진입하지 않는다', () => {
      const result = runBacktest(
        createBars([100, 120, 140]),
        createConfig({ strategy: buyAndHold, initialCapital: new Big(50) })
      );

      expect(result.trades).toHaveLength(0);
      expect(result.equity.map((p) => p.equity.toNumber())).toEqual([50, 50, 50]);
      expect(result.metrics.totalReturn).toBe(0);
    });
  });

  it('현금이 음수가 되지 않는다', () => {
    const closes = Array.from({ length: 60 }, (_, i) => 100 + ((i * 37) % 23) - 11);
    const bars = createBars(closes);

    for (const strategy of [
      { kind: 'mean-reversion', params: { window: 5, entryZ: 1, exitZ: 0.5, exitPolicy: 'threshold' } },
      { kind: 'rsi', params: { period: 5, oversold: 40, overbought: 60 } },
      { kind: 'macd', params: { fastPeriod: 3, slowPeriod: 6, signalPeriod: 3 } },
    ] satisfies StrategyConfig[]) {
      for (const sizing of [
        { type: 'all-in' },
        { type: 'fractional' },
        { type: 'fixed-fraction', fraction: 0.3 },
      ] satisfies BacktestConfig['sizing'][]) {
        const result = runBacktest(bars, createConfig({ strategy, sizing, commissionRate: 0.001, slippageRate: 0.0005 }));

        expect(result.equity.every((p) => p.equity.gt(0))).toBe(true);
        expect(result.finalCapital.eq(result.equity[result.equity.length - 1]!.equity)).toBe(true);
      }
    }
  });

  describe('벤치마크', () => {
    it('runBenchmark는 매수 후 보유', () => {
      const result = runBenchmark(createBars([100, 110, 120]), createConfig({ initialCapital: new Big(1000) }));

      expect(result.strategy).toBe('Buy and Hold');
      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]!.entryIndex).toBe(0);
    });

    it('벤치마크 곡선을 주면 alpha/beta 계산', () => {
      const bars = createBars([100, 110, 99, 108.9]);
      const config = createConfig({ strategy: buyAndHold, initialCapital: new Big(1000) });
      const benchmark = runBenchmark(bars, config);

      const result = runBacktest(bars, config, { benchmark: benchmark.equity });

      expect(result.metrics.beta).toBeCloseTo(1, 10);
      expect(result.metrics.alpha).toBeCloseTo(0, 10);
    });

    it('벤치마크가 없으면 alpha/beta null', () => {
      const result = runBacktest(createBars([100, 110, 120]), createConfig({ strategy: buyAndHold }));

      expect(result.metrics.alpha).toBeNull();
      expect(result.metrics.beta).toBeNull();
    });
  });

  describe('입력/설정 오류', () => {
    it('빈 봉 데이터', () => {
      expect(() => runBacktest([], createConfig())).toThrow(BacktestInputError);
    });

    it('중복 타임스탬프', () => {
      const bars = createBars([100, 101, 102]);
      bars[2] = { ...bars[2]!, timestamp: bars[1]!.timestamp };

      expect(() => runBacktest(bars, createConfig())).toThrow('[input] 중복 타임스탬프');
    });

    it('초기 자본 0', () => {
      expect(() => runBacktest(createBars([100]), createConfig({ initialCapital: new Big(0) }))).toThrow(
        BacktestConfigError
      );
    });

    it('잘못된 전략 파라미터', () => {
      const config = createConfig({ strategy: { kind: 'ma-crossover', params: { fastWindow: 5, slowWindow: 3 } } });

      expect(() => runBacktest(createBars([100]), config)).toThrow(
        'strategy.params.fastWindow: fastWindow must be less than slowWindow'
      );
    });

    it('워밍업보다 짧은 데이터는 에러 없이 HOLD', () => {
      const result = runBacktest(createBars([100, 101, 102]), createConfig());

      expect(result.trades).toHaveLength(0);
      expect(result.finalCapital.toString()).toBe('10000');
    });
  });

  describe('기본 파라미터 + 긴 시계열', () => {
    const bars = createBars(createRealisticCloses(1000));
    const initialCapital = new Big(10000);

    it.each(STRATEGY_DEFINITIONS.map((def) => def.kind))(
      '%s: 자본 곡선 불변식, 현금 >= 0, 곡선 길이',
      (kind) => {
        const config = createConfig({
          strategy: parseStrategyConfig({ kind }),
          initialCapital,
          commissionRate: 0.001,
          slippageRate: 0.0005,
        });

        const result = runBacktest(bars, config);

        expect(result.equity).toHaveLength(bars.length);
        expect(result.drawdowns).toHaveLength(bars.length);
        expectEquityMatchesTradeLog(result, bars, initialCapital);
        expect(result.finalCapital.eq(result.equity[result.equity.length - 1]!.equity)).toBe(true);
      },
      10000
    );

    it('MACD 기본 파라미터 1000봉이 제한 시간 안에 끝나고 거래가 발생한다', () => {
      const config = createConfig({ strategy: parseStrategyConfig({ kind: 'macd' }) });

      const started = Date.now();
      const result = runBacktest(bars, config);

      expect(Date.now() - started).toBeLessThan(5000);
      expect(result.trades.length).toBeGreaterThan(0);
    }, 10000);

    it('RSI 기본 파라미터 2000봉이 제한 시간 안에 끝난다', () => {
      const longBars = createBars(createRealisticCloses(2000));
      const config = createConfig({ strategy: parseStrategyConfig({ kind: 'rsi' }) });

      const started = Date.now();
      const result = runBacktest(longBars, config);

      expect(Date.now() - started).toBeLessThan(5000);
      expect(result.equity).toHaveLength(2000);
    }, 10000);
  });
});
