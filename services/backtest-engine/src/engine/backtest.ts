import Big from 'big.js';
import { createLogger } from '@backtester/shared-utils';
import type {
  Bar,
  BacktestConfig,
  BacktestOptions,
  BacktestResult,
  EquityPoint,
  ExitReason,
  Trade,
} from '../types.js';
import { validateBars } from '../data/validator.js';
import { assertValidConfig } from '../config/schema.js';
import { resolveStrategy } from '../strategies/index.js';
import { Portfolio } from './portfolio.js';
import { applySlippage, calculateCommission, calculateSlippageCost } from '../models/slippage.js';
import { computeOrderQty } from '../models/position-sizing.js';
import { calculateMetrics, calculateDrawdowns } from '../metrics/calculator.js';

const logger = createLogger('backtest-engine');

/** 진입 후 아직 청산되지 않은 포지션 */
interface OpenPosition {
  entryIndex: number;
  entryTime: string;
  entryPrice: Big;
  qty: Big;
  entryCommission: Big;
}

interface RunState {
  config: BacktestConfig;
  portfolio: Portfolio;
  trades: Trade[];
  position: OpenPosition | null;
  slippageCost: Big;
}

/**
 * 백테스트 실행
 *
 * 봉마다 현재 봉까지의 이력으로 계산한 시그널에 따라 그 봉 종가(슬리피지 반영)로 체결한 뒤
 * cash + qty × close 를 자본 곡선에 기록한다. 마지막 봉에서 포지션이 남아 있으면
 * 자본을 기록하기 전에 같은 봉 종가로 청산한다.
 *
 * @param bars - 시간 오름차순 봉 데이터
 * @param config - 백테스트 설정
 * @param options - 벤치마크 자본 곡선 (알파/베타 계산용)
 * @returns 백테스트 결과
 * @throws BacktestInputError - 봉 데이터 오류
 * @throws BacktestConfigError - 설정 오류
 */
export function runBacktest(
  bars: readonly Bar[],
  config: BacktestConfig,
  options: BacktestOptions = {}
): BacktestResult {
  validateBars(bars);
  assertValidConfig(config);

  const strategy = resolveStrategy(config.strategy);

  logger.info('백테스트 시작', {
    strategy: strategy.name,
    symbol: config.symbol,
    bars: bars.length,
    minimumBars: strategy.minimumBars,
    sizing: config.sizing.type,
  });

  const state: RunState = {
    config,
    portfolio: new Portfolio(config.initialCapital),
    trades: [],
    position: null,
    slippageCost: new Big(0),
  };
  const equity: EquityPoint[] = [];
  const lastIndex = bars.length - 1;

  // i번째 시그널은 bars[0..i] 만 보고 계산된다 (워밍업 구간은 HOLD)
  const signals = strategy.computeSignals(bars);

  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i]!;
    const signal = signals[i]!;

    if (signal.action === 'ENTER_LONG' && state.position === null) {
      executeBuy(state, bar, i, signal.reason);
    } else if (signal.action === 'EXIT_LONG' && state.position !== null) {
      executeSell(state, bar, i, 'SIGNAL');
    }

    if (i === lastIndex && state.position !== null) {
      executeSell(state, bar, i, 'END_OF_DATA');
      logger.info('마지막 포지션 강제 청산', { timestamp: bar.timestamp, close: bar.close.toString() });
    }

    equity.push({
      timestamp: bar.timestamp,
      equity: state.portfolio.markToMarket(bar.close),
    });
  }

  const metrics = calculateMetrics(equity, state.trades, {
    riskFreeRate: config.riskFreeRate,
    benchmark: options.benchmark,
  });
  const drawdowns = calculateDrawdowns(equity);
  const finalCapital = equity[equity.length - 1]!.equity;

  const result: BacktestResult = {
    strategy: strategy.name,
    config,
    symbol: config.symbol,
    startDate: bars[0]!.timestamp,
    endDate: bars[lastIndex]!.timestamp,
    initialCapital: config.initialCapital,
    finalCapital,
    metrics,
    trades: state.trades,
    equity,
    drawdowns,
    totalSlippageCost: state.slippageCost,
  };

  logger.info('백테스트 완료', {
    strategy: strategy.name,
    finalCapital: finalCapital.toString(),
    totalReturn: `${(metrics.totalReturn * 100).toFixed(2)}%`,
    sharpeRatio: metrics.sharpeRatio.toFixed(2),
    maxDrawdown: `${(metrics.maxDrawdown * 100).toFixed(2)}%`,
    totalTrades: metrics.totalTrades,
  });

  return result;
}

/**
 * 매수 후 보유 벤치마크 실행 (같은 비용/수량 설정)
 */
export function runBenchmark(
  bars: readonly Bar[],
  config: BacktestConfig,
  options: BacktestOptions = {}
): BacktestResult {
  return runBacktest(bars, { ...config, strategy: { kind: 'buy-and-hold', params: {} } }, options);
}

/**
 * 매수 주문 실행
 *
 * 수량이 0이면 체결하지 않고 FLAT 유지.
 */
function executeBuy(state: RunState, bar: Bar, index: number, reason: string | undefined): void {
  const { config, portfolio } = state;

  const price = applySlippage(bar.close, config.slippageRate, 'BUY');
  const qty = computeOrderQty(config.sizing, portfolio.availableCash, price, config.commissionRate);

  if (qty.lte(0)) {
    logger.warn('주문 수량 0, 진입 생략', {
      timestamp: bar.timestamp,
      price: price.toString(),
      cash: portfolio.availableCash.toString(),
    });
    return;
  }

  const commission = calculateCommission(qty.times(price), config.commissionRate);
  portfolio.applyBuy(qty, price, commission);
  state.slippageCost = state.slippageCost.plus(calculateSlippageCost(bar.close, price, qty));

  state.position = {
    entryIndex: index,
    entryTime: bar.timestamp,
    entryPrice: price,
    qty,
    entryCommission: commission,
  };

  logger.debug('매수 실행', {
    timestamp: bar.timestamp,
    price: price.toString(),
    qty: qty.toString(),
    commission: commission.toString(),
    cash: portfolio.availableCash.toString(),
    reason,
  });
}

/**
 * 매도 주문 실행 (전량 청산)
 */
function executeSell(state: RunState, bar: Bar, index: number, exitReason: ExitReason): void {
  const { config, portfolio, position } = state;
  if (position === null) {
    return;
  }

  const price = applySlippage(bar.close, config.slippageRate, 'SELL');
  const commission = calculateCommission(position.qty.times(price), config.commissionRate);
  portfolio.applySell(position.qty, price, commission);
  state.slippageCost = state.slippageCost.plus(calculateSlippageCost(bar.close, price, position.qty));

  // 실현 손익 = (청산가 - 진입가) × 수량 - 양쪽 수수료
  const realizedPnL = price
    .minus(position.entryPrice)
    .times(position.qty)
    .minus(position.entryCommission)
    .minus(commission);
  const costBasis = position.entryPrice.times(position.qty);

  state.trades.push({
    entryIndex: position.entryIndex,
    exitIndex: index,
    entryTime: position.entryTime,
    exitTime: bar.timestamp,
    entryPrice: position.entryPrice,
    exitPrice: price,
    qty: position.qty,
    entryCommission: position.entryCommission,
    exitCommission: commission,
    realizedPnL,
    returnPct: costBasis.gt(0) ? realizedPnL.div(costBasis).times(100).toNumber() : 0,
    exitReason,
  });
  state.position = null;

  logger.debug('매도 실행', {
    timestamp: bar.timestamp,
    price: price.toString(),
    realizedPnL: realizedPnL.toString(),
    cash: portfolio.availableCash.toString(),
    exitReason,
  });
}
