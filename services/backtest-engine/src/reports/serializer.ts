import type Big from 'big.js';
import type {
  BacktestConfig,
  BacktestResult,
  DrawdownPoint,
  EquityPoint,
  PerformanceMetrics,
  Trade,
} from '../types.js';

/** Big 필드를 number로 바꾼 타입 */
type Plain<T> = { [K in keyof T]: T[K] extends Big ? number : T[K] };

export interface SerializedBacktestResult
  extends Omit<Plain<BacktestResult>, 'config' | 'metrics' | 'trades' | 'equity' | 'drawdowns'> {
  config: Plain<BacktestConfig>;
  metrics: Plain<PerformanceMetrics>;
  trades: Plain<Trade>[];
  equity: Plain<EquityPoint>[];
  drawdowns: Plain<DrawdownPoint>[];
}

/**
 * 백테스트 결과 → JSON 직렬화 가능한 순수 데이터
 *
 * 결과 객체와 참조를 공유하지 않는다.
 */
export function serializeBacktestResult(result: BacktestResult): SerializedBacktestResult {
  const { config, metrics } = result;

  return {
    strategy: result.strategy,
    symbol: result.symbol,
    startDate: result.startDate,
    endDate: result.endDate,
    initialCapital: result.initialCapital.toNumber(),
    finalCapital: result.finalCapital.toNumber(),
    totalSlippageCost: result.totalSlippageCost.toNumber(),
    config: {
      symbol: config.symbol,
      strategy: structuredClone(config.strategy),
      initialCapital: config.initialCapital.toNumber(),
      commissionRate: config.commissionRate,
      slippageRate: config.slippageRate,
      riskFreeRate: config.riskFreeRate,
      sizing: structuredClone(config.sizing),
    },
    metrics: {
      ...metrics,
      avgWin: metrics.avgWin.toNumber(),
      avgLoss: metrics.avgLoss.toNumber(),
      totalCommission: metrics.totalCommission.toNumber(),
    },
    trades: result.trades.map((trade) => ({
      ...trade,
      entryPrice: trade.entryPrice.toNumber(),
      exitPrice: trade.exitPrice.toNumber(),
      qty: trade.qty.toNumber(),
      entryCommission: trade.entryCommission.toNumber(),
      exitCommission: trade.exitCommission.toNumber(),
      realizedPnL: trade.realizedPnL.toNumber(),
    })),
    equity: result.equity.map((point) => ({
      timestamp: point.timestamp,
      equity: point.equity.toNumber(),
    })),
    drawdowns: result.drawdowns.map((point) => ({
      timestamp: point.timestamp,
      drawdown: point.drawdown,
      peak: point.peak.toNumber(),
    })),
  };
}
