import Big from 'big.js';
import { hoursBetween } from '@backtester/shared-utils';
import type {
  Trade,
  PerformanceMetrics,
  EquityPoint,
  DrawdownPoint,
  MetricsOptions,
} from '../types.js';

const TRADING_DAYS_PER_YEAR = 252;

/** 이 값보다 작은 표준편차는 0으로 본다 */
const STDDEV_EPSILON = 1e-12;

/**
 * 손실 거래가 없고 수익 거래만 있을 때의 Profit Factor
 *
 * Infinity는 JSON 직렬화 시 null이 되므로 유한한 큰 값을 쓴다.
 */
export const PROFIT_FACTOR_SENTINEL = 999;

/**
 * 연율화 수익률 상한 (1e6 = 100,000,000%)
 *
 * 짧은 구간의 큰 수익률은 거듭제곱에서 Infinity로 넘친다. Calmar도 이 값으로 계산된다.
 */
export const ANNUALIZED_RETURN_CAP = 1e6;

/**
 * 성과 지표 계산
 *
 * 순수 함수. 분산 0, 거래 없음 같은 퇴화 케이스는 0(또는 sentinel/null)으로 처리하고 던지지 않는다.
 *
 * @param equity - 자본 곡선 (봉 개수와 같은 길이)
 * @param trades - 청산 완료된 거래 목록
 */
export function calculateMetrics(
  equity: readonly EquityPoint[],
  trades: readonly Trade[],
  options: MetricsOptions
): PerformanceMetrics {
  const returns = calculateDailyReturns(equity);

  const totalReturn = calculateTotalReturn(equity);
  const annualizedReturn = calculateAnnualizedReturn(totalReturn, returns.length);
  const maxDrawdown = calculateMaxDrawdown(equity);
  const { winRate, winningTrades, losingTrades } = calculateWinRate(trades);
  const { avgWin, avgLoss } = calculateAvgWinLoss(trades);
  const { alpha, beta } = options.benchmark
    ? calculateAlphaBeta(equity, options.benchmark)
    : { alpha: null, beta: null };

  return {
    totalReturn,
    annualizedReturn,
    volatility: calculateVolatility(returns),
    sharpeRatio: calculateSharpeRatio(returns, options.riskFreeRate),
    sortinoRatio: calculateSortinoRatio(returns, options.riskFreeRate),
    maxDrawdown,
    maxDrawdownDuration: calculateMaxDrawdownDuration(equity),
    calmarRatio: calculateCalmarRatio(annualizedReturn, maxDrawdown),
    winRate,
    profitFactor: calculateProfitFactor(trades),
    totalTrades: trades.length,
    winningTrades,
    losingTrades,
    avgWin,
    avgLoss,
    avgTradeReturnPct: calculateAvgTradeReturnPct(trades),
    avgTradeDuration: calculateAvgTradeDuration(trades),
    totalCommission: calculateTotalCommission(trades),
    alpha,
    beta,
  };
}

// ============================================================
// 통계 헬퍼
// ============================================================

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * 표본 표준편차 (n - 1). 값이 2개 미만이면 0
 */
function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

function dailyRiskFreeRate(annualRate: number): number {
  return Math.pow(1 + annualRate, 1 / TRADING_DAYS_PER_YEAR) - 1;
}

// ============================================================
// 수익률
// ============================================================

/**
 * 일일 수익률 (봉 0 제외, 길이 = equity.length - 1)
 *
 * 이전 자본이 0 이하이면 0.
 */
export function calculateDailyReturns(equity: readonly EquityPoint[]): number[] {
  const returns: number[] = [];

  for (let i = 1; i < equity.length; i++) {
    const prevEquity = equity[i - 1]!.equity;
    const currEquity = equity[i]!.equity;

    returns.push(prevEquity.gt(0) ? currEquity.div(prevEquity).minus(1).toNumber() : 0);
  }

  return returns;
}

/**
 * 총 수익률 = 최종 자본 / 시작 자본 - 1
 */
export function calculateTotalReturn(equity: readonly EquityPoint[]): number {
  if (equity.length === 0) {
    return 0;
  }

  const initial = equity[0]!.equity;
  const final = equity[equity.length - 1]!.equity;
  if (initial.lte(0)) {
    return 0;
  }

  return final.div(initial).minus(1).toNumber();
}

/**
 * 연율화 수익률 = (1 + 총 수익률)^(252 / n) - 1, 최대 ANNUALIZED_RETURN_CAP
 *
 * @param periods - 일일 수익률 개수
 */
export function calculateAnnualizedReturn(totalReturn: number, periods: number): number {
  if (periods < 1) {
    return 0;
  }

  const annualized = Math.pow(1 + totalReturn, TRADING_DAYS_PER_YEAR / periods) - 1;
  return Math.min(annualized, ANNUALIZED_RETURN_CAP);
}

/**
 * 연율화 변동성 = 일일 수익률 표본 표준편차 × √252
 */
export function calculateVolatility(returns: readonly number[]): number {
  const stdDev = sampleStdDev(returns);
  if (stdDev < STDDEV_EPSILON) {
    return 0;
  }
  return stdDev * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

// ============================================================
// 위험 조정 수익률
// ============================================================

/**
 * Sharpe Ratio = mean(초과 수익률) / stdev(초과 수익률) × √252
 *
 * 초과 수익률 = 일일 수익률 - 일일 무위험 수익률
 */
export function calculateSharpeRatio(returns: readonly number[], riskFreeRate: number): number {
  if (returns.length < 2) {
    return 0;
  }

  const dailyRf = dailyRiskFreeRate(riskFreeRate);
  const excess = returns.map((r) => r - dailyRf);
  const stdDev = sampleStdDev(excess);

  if (stdDev < STDDEV_EPSILON) {
    return 0;
  }

  return (mean(excess) / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Sortino Ratio = mean(초과 수익률) / stdev(음의 초과 수익률) × √252
 */
export function calculateSortinoRatio(returns: readonly number[], riskFreeRate: number): number {
  const dailyRf = dailyRiskFreeRate(riskFreeRate);
  const excess = returns.map((r) => r - dailyRf);
  const downside = excess.filter((r) => r < 0);

  if (downside.length < 2) {
    return 0;
  }

  const downsideStdDev = sampleStdDev(downside);
  if (downsideStdDev < STDDEV_EPSILON) {
    return 0;
  }

  return (mean(excess) / downsideStdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Calmar Ratio = 연율화 수익률 / |최대 낙폭|
 */
export function calculateCalmarRatio(annualizedReturn: number, maxDrawdown: number): number {
  if (maxDrawdown === 0) {
    return 0;
  }
  return annualizedReturn / Math.abs(maxDrawdown);
}

// ============================================================
// 낙폭
// ============================================================

function drawdownAt(value: Big, peak: Big): number {
  return peak.gt(0) ? value.div(peak).minus(1).toNumber() : 0;
}

/**
 * 최대 낙폭 = min(자본 / 누적 최고점 - 1)
 *
 * @returns 0 이하 비율 (-0.25 = -25%)
 */
export function calculateMaxDrawdown(equity: readonly EquityPoint[]): number {
  if (equity.length === 0) {
    return 0;
  }

  let maxDrawdown = 0;
  let peak = equity[0]!.equity;

  for (const point of equity) {
    if (point.equity.gt(peak)) {
      peak = point.equity;
    }

    const drawdown = drawdownAt(point.equity, peak);
    if (drawdown < maxDrawdown) {
      maxDrawdown = drawdown;
    }
  }

  return maxDrawdown;
}

/**
 * 최대 낙폭 지속 기간 (누적 최고점 아래에 머문 최장 연속 봉 수)
 */
export function calculateMaxDrawdownDuration(equity: readonly EquityPoint[]): number {
  if (equity.length === 0) {
    return 0;
  }

  let peak = equity[0]!.equity;
  let current = 0;
  let longest = 0;

  for (const point of equity) {
    if (point.equity.gte(peak)) {
      peak = point.equity;
      current = 0;
    } else {
      current++;
      longest = Math.max(longest, current);
    }
  }

  return longest;
}

/**
 * Drawdown 포인트 계산
 *
 * @param equity - 자본 곡선
 * @returns 봉별 낙폭 (0 이하 비율)과 그 시점의 누적 최고점
 */
export function calculateDrawdowns(equity: readonly EquityPoint[]): DrawdownPoint[] {
  if (equity.length === 0) {
    return [];
  }

  const drawdowns: DrawdownPoint[] = [];
  let peak = equity[0]!.equity;

  for (const point of equity) {
    if (point.equity.gt(peak)) {
      peak = point.equity;
    }

    drawdowns.push({
      timestamp: point.timestamp,
      drawdown: drawdownAt(point.equity, peak),
      peak,
    });
  }

  return drawdowns;
}

// ============================================================
// 거래 통계
// ============================================================

/**
 * 승률 계산
 *
 * @returns 승률 (0~1), 승리 거래 수, 손실 거래 수
 */
export function calculateWinRate(trades: readonly Trade[]): {
  winRate: number;
  winningTrades: number;
  losingTrades: number;
} {
  if (trades.length === 0) {
    return { winRate: 0, winningTrades: 0, losingTrades: 0 };
  }

  let winningTrades = 0;
  let losingTrades = 0;

  for (const trade of trades) {
    if (trade.realizedPnL.gt(0)) {
      winningTrades++;
    } else if (trade.realizedPnL.lt(0)) {
      losingTrades++;
    }
  }

  return { winRate: winningTrades / trades.length, winningTrades, losingTrades };
}

/**
 * Profit Factor = 총 수익 / 총 손실
 *
 * 손실 거래가 없으면 수익 거래가 있을 때 PROFIT_FACTOR_SENTINEL, 없으면 0
 */
export function calculateProfitFactor(trades: readonly Trade[]): number {
  let totalProfit = new Big(0);
  let totalLoss = new Big(0);

  for (const trade of trades) {
    if (trade.realizedPnL.gt(0)) {
      totalProfit = totalProfit.plus(trade.realizedPnL);
    } else if (trade.realizedPnL.lt(0)) {
      totalLoss = totalLoss.plus(trade.realizedPnL.abs());
    }
  }

  if (totalLoss.lte(0)) {
    return totalProfit.gt(0) ? PROFIT_FACTOR_SENTINEL : 0;
  }

  return totalProfit.div(totalLoss).toNumber();
}

/**
 * 평균 승리/손실 금액 (손실은 절대값)
 */
export function calculateAvgWinLoss(trades: readonly Trade[]): {
  avgWin: Big;
  avgLoss: Big;
} {
  let totalWin = new Big(0);
  let totalLoss = new Big(0);
  let winCount = 0;
  let lossCount = 0;

  for (const trade of trades) {
    if (trade.realizedPnL.gt(0)) {
      totalWin = totalWin.plus(trade.realizedPnL);
      winCount++;
    } else if (trade.realizedPnL.lt(0)) {
      totalLoss = totalLoss.plus(trade.realizedPnL.abs());
      lossCount++;
    }
  }

  const avgWin = winCount > 0 ? totalWin.div(winCount) : new Big(0);
  const avgLoss = lossCount > 0 ? totalLoss.div(lossCount) : new Big(0);

  return { avgWin, avgLoss };
}

/**
 * 거래당 평균 수익률 (%)
 */
export function calculateAvgTradeReturnPct(trades: readonly Trade[]): number {
  return mean(trades.map((trade) => trade.returnPct));
}

/**
 * 평균 거래 지속 시간 (시간 단위)
 */
export function calculateAvgTradeDuration(trades: readonly Trade[]): number {
  return mean(trades.map((trade) => hoursBetween(trade.entryTime, trade.exitTime)));
}

export function calculateTotalCommission(trades: readonly Trade[]): Big {
  return trades.reduce(
    (sum, trade) => sum.plus(trade.entryCommission).plus(trade.exitCommission),
    new Big(0)
  );
}

// ============================================================
// 벤치마크 대비
// ============================================================

/**
 * 알파/베타 (전략 일일 수익률을 벤치마크 일일 수익률에 OLS 회귀)
 *
 * 두 곡선에 공통으로 있는 타임스탬프만 사용한다.
 * - beta = cov(전략, 벤치마크) / var(벤치마크), 벤치마크 분산 0이면 0
 * - alpha = (mean(전략) - beta × mean(벤치마크)) × 252
 * 정렬된 수익률이 2개 미만이면 둘 다 null.
 */
export function calculateAlphaBeta(
  equity: readonly EquityPoint[],
  benchmark: readonly EquityPoint[]
): { alpha: number | null; beta: number | null } {
  const benchmarkByTime = new Map(benchmark.map((point) => [point.timestamp, point]));

  const aligned: EquityPoint[] = [];
  const alignedBenchmark: EquityPoint[] = [];
  for (const point of equity) {
    const match = benchmarkByTime.get(point.timestamp);
    if (match) {
      aligned.push(point);
      alignedBenchmark.push(match);
    }
  }

  const strategyReturns = calculateDailyReturns(aligned);
  const benchmarkReturns = calculateDailyReturns(alignedBenchmark);
  if (strategyReturns.length < 2) {
    return { alpha: null, beta: null };
  }

  const strategyMean = mean(strategyReturns);
  const benchmarkMean = mean(benchmarkReturns);

  let covariance = 0;
  let variance = 0;
  for (let i = 0; i < strategyReturns.length; i++) {
    const db = benchmarkReturns[i]! - benchmarkMean;
    covariance += (strategyReturns[i]! - strategyMean) * db;
    variance += db * db;
  }

  const benchmarkStdDev = Math.sqrt(variance / (benchmarkReturns.length - 1));
  const beta = benchmarkStdDev < STDDEV_EPSILON ? 0 : covariance / variance;
  const alpha = (strategyMean - beta * benchmarkMean) * TRADING_DAYS_PER_YEAR;

  return { alpha, beta };
}
