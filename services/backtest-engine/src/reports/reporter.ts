import type Big from 'big.js';
import type { BacktestResult, PerformanceMetrics, Trade } from '../types.js';
import { PROFIT_FACTOR_SENTINEL } from '../metrics/calculator.js';

const RULE = '='.repeat(60);

function pct(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

function ratio(value: number | null): string {
  return value === null ? 'N/A' : value.toFixed(2);
}

function profitFactor(value: number): string {
  return value === PROFIT_FACTOR_SENTINEL ? '∞ (손실 거래 없음)' : value.toFixed(2);
}

function money(value: Big): string {
  return value.toFixed(2);
}

/**
 * 백테스트 결과 리포트 생성
 */
export function generateBacktestReport(result: BacktestResult): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(RULE);
  lines.push('백테스트 결과 리포트');
  lines.push(RULE);
  lines.push('');

  // 기본 정보
  lines.push('## 기본 정보');
  lines.push(`전략명: ${result.strategy}`);
  lines.push(`심볼: ${result.symbol}`);
  lines.push(`기간: ${result.startDate} ~ ${result.endDate}`);
  lines.push(`봉 개수: ${result.equity.length}`);
  lines.push(`초기 자본: ${money(result.initialCapital)}`);
  lines.push(`최종 자본: ${money(result.finalCapital)}`);
  lines.push(`수수료율: ${pct(result.config.commissionRate)} | 슬리피지: ${pct(result.config.slippageRate)}`);
  lines.push('');

  // 성과 지표
  lines.push('## 성과 지표');
  lines.push(...formatMetrics(result.metrics));
  lines.push('');

  // 비용
  lines.push('## 거래 비용');
  lines.push(`총 수수료: ${money(result.metrics.totalCommission)}`);
  lines.push(`총 슬리피지 비용: ${money(result.totalSlippageCost)}`);
  lines.push('');

  // 최근 10개 거래
  if (result.trades.length > 0) {
    lines.push('## 최근 거래 내역 (최대 10개)');
    for (const trade of result.trades.slice(-10)) {
      lines.push(formatTrade(trade));
    }
    lines.push('');
  }

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/**
 * 전략 vs 매수 후 보유 비교표
 */
export function generateBenchmarkComparison(strategy: BacktestResult, benchmark: BacktestResult): string {
  const rows: Array<[string, string, string]> = [
    ['총 수익률', pct(strategy.metrics.totalReturn), pct(benchmark.metrics.totalReturn)],
    ['연율화 수익률', pct(strategy.metrics.annualizedReturn), pct(benchmark.metrics.annualizedReturn)],
    ['Sharpe Ratio', ratio(strategy.metrics.sharpeRatio), ratio(benchmark.metrics.sharpeRatio)],
    ['Max Drawdown', pct(strategy.metrics.maxDrawdown), pct(benchmark.metrics.maxDrawdown)],
    ['Win Rate', pct(strategy.metrics.winRate), pct(benchmark.metrics.winRate)],
    ['거래 횟수', String(strategy.metrics.totalTrades), String(benchmark.metrics.totalTrades)],
  ];

  const header: [string, string, string] = ['항목', '전략', 'Buy & Hold'];
  const widths = [0, 1, 2].map((col) => Math.max(...[header, ...rows].map((row) => row[col]!.length)));
  const formatRow = (row: [string, string, string]) =>
    row.map((cell, col) => cell.padEnd(widths[col]!)).join(' | ').trimEnd();

  const lines: string[] = [];
  lines.push('');
  lines.push(RULE);
  lines.push(`벤치마크 비교: ${strategy.strategy} vs ${benchmark.strategy}`);
  lines.push(RULE);
  lines.push(formatRow(header));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));
  for (const row of rows) {
    lines.push(formatRow(row));
  }
  lines.push('');

  const excess = strategy.metrics.totalReturn - benchmark.metrics.totalReturn;
  lines.push(`초과 수익률: ${pct(excess)}`);
  if (strategy.metrics.alpha !== null || strategy.metrics.beta !== null) {
    lines.push(`Alpha (연율화): ${ratio(strategy.metrics.alpha)} | Beta: ${ratio(strategy.metrics.beta)}`);
  }
  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/**
 * 성과 지표 포맷팅
 */
function formatMetrics(metrics: PerformanceMetrics): string[] {
  const lines: string[] = [];

  lines.push(`총 수익률: ${pct(metrics.totalReturn)}`);
  lines.push(`연율화 수익률: ${pct(metrics.annualizedReturn)}`);
  lines.push(`변동성 (연율화): ${pct(metrics.volatility)}`);
  lines.push(`Sharpe Ratio: ${ratio(metrics.sharpeRatio)}`);
  lines.push(`Sortino Ratio: ${ratio(metrics.sortinoRatio)}`);
  lines.push(`Max Drawdown: ${pct(metrics.maxDrawdown)}`);
  lines.push(`Max Drawdown 기간: ${metrics.maxDrawdownDuration}봉`);
  lines.push(`Calmar Ratio: ${ratio(metrics.calmarRatio)}`);
  lines.push(`Win Rate: ${pct(metrics.winRate)}`);
  lines.push(`Profit Factor: ${profitFactor(metrics.profitFactor)}`);
  lines.push(`평균 승리: ${money(metrics.avgWin)}`);
  lines.push(`평균 손실: ${money(metrics.avgLoss)}`);
  lines.push(`평균 거래 수익률: ${metrics.avgTradeReturnPct.toFixed(2)}%`);
  lines.push(`총 거래 횟수: ${metrics.totalTrades}`);
  lines.push(`승리 거래: ${metrics.winningTrades}`);
  lines.push(`손실 거래: ${metrics.losingTrades}`);
  lines.push(`평균 거래 지속 시간: ${metrics.avgTradeDuration.toFixed(1)}시간`);
  if (metrics.alpha !== null || metrics.beta !== null) {
    lines.push(`Alpha (연율화): ${ratio(metrics.alpha)}`);
    lines.push(`Beta: ${ratio(metrics.beta)}`);
  }

  return lines;
}

function formatTrade(trade: Trade): string {
  const reason = trade.exitReason === 'END_OF_DATA' ? ' [종료 청산]' : '';
  return (
    `${trade.entryTime} → ${trade.exitTime} | ${trade.qty.toFixed(4)} @ ` +
    `${trade.entryPrice.toFixed(2)} → ${trade.exitPrice.toFixed(2)} ` +
    `(손익: ${trade.realizedPnL.toFixed(2)}, ${trade.returnPct.toFixed(2)}%)${reason}`
  );
}
