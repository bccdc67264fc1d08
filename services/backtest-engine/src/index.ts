/**
 * Backtest Engine
 *
 * 단일 종목 롱 온리 시그널 백테스터
 * - 전략 (MA Crossover, RSI, MACD, Bollinger Bands, Mean Reversion, Buy and Hold)
 * - 종가 체결 + 수수료/슬리피지 모델링
 * - 성과 지표 (Sharpe, Sortino, Max DD, Win Rate, Profit Factor, Alpha/Beta)
 */

// 타입
export type * from './types.js';

// 에러
export { BacktestError, BacktestInputError, BacktestConfigError } from './errors.js';

// 설정
export {
  DEFAULT_SYMBOL,
  DEFAULT_INITIAL_CAPITAL,
  DEFAULT_COMMISSION_RATE,
  DEFAULT_SLIPPAGE_RATE,
  DEFAULT_RISK_FREE_RATE,
  DEFAULT_STRATEGY_PARAMS,
  loadBacktestDefaults,
  type BacktestDefaults,
} from './config/defaults.js';
export {
  StrategyConfigSchema,
  SizingPolicySchema,
  BacktestConfigSchema,
  parseStrategyConfig,
  resolveBacktestConfig,
  assertValidConfig,
  type StrategyConfigInput,
  type BacktestConfigInput,
} from './config/schema.js';

// 데이터
export { validateBars } from './data/validator.js';
export { toBars, parseBarsJson, loadBarsFromFile } from './data/loader.js';

// 전략
export {
  STRATEGY_DEFINITIONS,
  resolveStrategy,
  computeSignal,
  minimumBarsRequired,
  describeStrategy,
} from './strategies/index.js';

// 체결 모델
export { applySlippage, calculateSlippageCost, calculateCommission, type OrderSide } from './models/slippage.js';
export { computeOrderQty } from './models/position-sizing.js';

// 백테스트 엔진
export { Portfolio } from './engine/portfolio.js';
export { runBacktest, runBenchmark } from './engine/backtest.js';

// 성과 지표
export {
  PROFIT_FACTOR_SENTINEL,
  ANNUALIZED_RETURN_CAP,
  calculateMetrics,
  calculateDailyReturns,
  calculateTotalReturn,
  calculateAnnualizedReturn,
  calculateVolatility,
  calculateSharpeRatio,
  calculateSortinoRatio,
  calculateCalmarRatio,
  calculateMaxDrawdown,
  calculateMaxDrawdownDuration,
  calculateDrawdowns,
  calculateWinRate,
  calculateProfitFactor,
  calculateAvgWinLoss,
  calculateAvgTradeReturnPct,
  calculateAvgTradeDuration,
  calculateTotalCommission,
  calculateAlphaBeta,
} from './metrics/calculator.js';

// 리포트
export { generateBacktestReport, generateBenchmarkComparison } from './reports/reporter.js';
export { serializeBacktestResult, type SerializedBacktestResult } from './reports/serializer.js';
