import type Big from 'big.js';

// ============================================================
// 봉 데이터
// ============================================================

export interface Bar {
  timestamp: string; // ISO timestamp (UTC)
  open: Big;
  high: Big;
  low: Big;
  close: Big;
  volume: Big;
}

/** 파일/외부 수집기에서 넘어오는 원본 봉 (검증 전) */
export interface BarRaw {
  timestamp: string;
  open: number | string;
  high: number | string;
  low: number | string;
  close: number | string;
  volume: number | string;
}

// ============================================================
// 시그널
// ============================================================

export type SignalAction = 'ENTER_LONG' | 'EXIT_LONG' | 'HOLD';

export interface StrategySignal {
  action: SignalAction;
  reason?: string;
}

// ============================================================
// 전략 (태그드 유니온)
// ============================================================

export interface MACrossoverParams {
  fastWindow: number;
  slowWindow: number;
}

export interface RSIParams {
  period: number;
  oversold: number;
  overbought: number;
}

export interface MACDParams {
  fastPeriod: number;
  slowPeriod: number;
  signalPeriod: number;
}

export interface BollingerBandsParams {
  window: number;
  numStdDev: number;
}

/**
 * threshold: z > exitZ 에서 청산
 * zero-cross: z가 음수에서 0 이상으로 올라오는 봉에서 청산
 */
export type MeanReversionExitPolicy = 'threshold' | 'zero-cross';

export interface MeanReversionParams {
  window: number;
  entryZ: number;
  exitZ: number;
  exitPolicy: MeanReversionExitPolicy;
}

export type StrategyConfig =
  | { kind: 'ma-crossover'; params: MACrossoverParams }
  | { kind: 'rsi'; params: RSIParams }
  | { kind: 'macd'; params: MACDParams }
  | { kind: 'bollinger-bands'; params: BollingerBandsParams }
  | { kind: 'mean-reversion'; params: MeanReversionParams }
  | { kind: 'buy-and-hold'; params: Record<string, never> };

export type StrategyKind = StrategyConfig['kind'];

export type StrategyOf<K extends StrategyKind> = Extract<StrategyConfig, { kind: K }>;

/**
 * 전략 정의 - 새 전략은 파라미터 타입 + 정의 하나만 추가하면 된다.
 */
export interface StrategyDefinition<K extends StrategyKind> {
  kind: K;
  minimumBarsRequired(params: StrategyOf<K>['params']): number;
  computeSignal(history: readonly Bar[], params: StrategyOf<K>['params']): StrategySignal;

  /**
   * 전체 봉에 대한 시그널을 한 번에 계산 (재귀 평활 지표용)
   *
   * i번째 시그널은 computeSignal(bars.slice(0, i + 1)) 과 같아야 한다.
   * 없으면 봉마다 computeSignal 을 호출한다.
   */
  computeSignals?(bars: readonly Bar[], params: StrategyOf<K>['params']): StrategySignal[];

  describe(params: StrategyOf<K>['params']): string;
}

/**
 * 파라미터가 바인딩된 실행용 전략
 */
export interface Strategy {
  kind: StrategyKind;
  name: string;
  minimumBars: number;

  /**
   * 전략 시그널 생성
   * @param history - 현재 봉까지의 봉 데이터 (미래 봉 없음)
   */
  computeSignal(history: readonly Bar[]): StrategySignal;

  /**
   * 봉별 시그널 (i번째 = bars[0..i] 만 본 시그널, 워밍업 구간은 HOLD)
   */
  computeSignals(bars: readonly Bar[]): StrategySignal[];
}

// ============================================================
// 포지션 / 거래
// ============================================================

export type PositionState = 'FLAT' | 'LONG';

export interface PortfolioSnapshot {
  cash: Big;
  qty: Big;
  avgEntryPrice: Big;
  totalCommission: Big;
}

export type ExitReason = 'SIGNAL' | 'END_OF_DATA';

export interface Trade {
  entryIndex: number;
  exitIndex: number;
  entryTime: string;
  exitTime: string;
  entryPrice: Big; // 슬리피지 반영 체결가
  exitPrice: Big; // 슬리피지 반영 체결가
  qty: Big;
  entryCommission: Big;
  exitCommission: Big;
  realizedPnL: Big; // 양쪽 수수료 차감 후
  returnPct: number; // realizedPnL / (entryPrice × qty) × 100
  exitReason: ExitReason;
}

// ============================================================
// 주문 수량 정책
// ============================================================

/**
 * all-in: 수수료 포함 감당 가능한 최대 정수 수량
 * fractional: 현금 전액, 소수 수량
 * fixed-fraction: 현금의 fraction 비율로 감당 가능한 최대 정수 수량
 */
export type SizingPolicy =
  | { type: 'all-in' }
  | { type: 'fractional' }
  | { type: 'fixed-fraction'; fraction: number };

// ============================================================
// 백테스트 설정
// ============================================================

export interface BacktestConfig {
  symbol: string;
  strategy: StrategyConfig;
  initialCapital: Big;
  commissionRate: number; // 0.001 = 0.1%
  slippageRate: number; // 0.0005 = 0.05%
  riskFreeRate: number; // 연율, 0.02 = 2%
  sizing: SizingPolicy;
}

export interface BacktestOptions {
  /** 알파/베타 계산용 벤치마크 자본 곡선 */
  benchmark?: readonly EquityPoint[];
}

// ============================================================
// 자본 곡선 / 성과 지표
// ============================================================

export interface EquityPoint {
  timestamp: string;
  equity: Big;
}

export interface DrawdownPoint {
  timestamp: string;
  drawdown: number; // 0 이하 비율 (-0.25 = -25%)
  peak: Big;
}

export interface MetricsOptions {
  riskFreeRate: number;
  benchmark?: readonly EquityPoint[];
}

/**
 * 성과 지표 (비율 값은 모두 소수: 0.1 = 10%)
 */
export interface PerformanceMetrics {
  totalReturn: number;
  annualizedReturn: number;
  volatility: number; // 연율화 표준편차
  sharpeRatio: number;
  sortinoRatio: number;
  maxDrawdown: number; // 0 이하
  maxDrawdownDuration: number; // 봉 개수
  calmarRatio: number;
  winRate: number;
  profitFactor: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  avgWin: Big;
  avgLoss: Big;
  avgTradeReturnPct: number;
  avgTradeDuration: number; // 시간
  totalCommission: Big;
  alpha: number | null; // 연율화
  beta: number | null;
}

// ============================================================
// 백테스트 결과
// ============================================================

export interface BacktestResult {
  strategy: string;
  config: BacktestConfig;
  symbol: string;
  startDate: string;
  endDate: string;
  initialCapital: Big;
  finalCapital: Big;
  metrics: PerformanceMetrics;
  trades: Trade[];
  equity: EquityPoint[];
  drawdowns: DrawdownPoint[];
  totalSlippageCost: Big;
}
