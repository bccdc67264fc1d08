import Big from 'big.js';
import { z } from 'zod';
import { BacktestConfigError } from '../errors.js';
import type { BacktestConfig, StrategyConfig } from '../types.js';
import {
  DEFAULT_COMMISSION_RATE,
  DEFAULT_INITIAL_CAPITAL,
  DEFAULT_RISK_FREE_RATE,
  DEFAULT_SLIPPAGE_RATE,
  DEFAULT_STRATEGY_PARAMS,
  DEFAULT_SYMBOL,
} from './defaults.js';

const positiveInt = z.number().int().positive();
const windowSize = z.number().int().min(2);

// ============================================================
// 전략 파라미터 스키마
// ============================================================

const defaults = DEFAULT_STRATEGY_PARAMS;

export const MACrossoverParamsSchema = z
  .object({
    fastWindow: positiveInt.default(defaults['ma-crossover'].fastWindow),
    slowWindow: positiveInt.default(defaults['ma-crossover'].slowWindow),
  })
  .refine((p) => p.fastWindow < p.slowWindow, {
    message: 'fastWindow must be less than slowWindow',
    path: ['fastWindow'],
  });

export const RSIParamsSchema = z
  .object({
    period: positiveInt.default(defaults.rsi.period),
    oversold: z.number().default(defaults.rsi.oversold),
    overbought: z.number().default(defaults.rsi.overbought),
  })
  .refine((p) => p.oversold > 0 && p.oversold < p.overbought && p.overbought < 100, {
    message: 'must satisfy 0 < oversold < overbought < 100',
    path: ['oversold'],
  });

export const MACDParamsSchema = z
  .object({
    fastPeriod: positiveInt.default(defaults.macd.fastPeriod),
    slowPeriod: positiveInt.default(defaults.macd.slowPeriod),
    signalPeriod: positiveInt.default(defaults.macd.signalPeriod),
  })
  .refine((p) => p.fastPeriod < p.slowPeriod, {
    message: 'fastPeriod must be less than slowPeriod',
    path: ['fastPeriod'],
  });

export const BollingerBandsParamsSchema = z.object({
  window: windowSize.default(defaults['bollinger-bands'].window),
  numStdDev: z.number().positive().default(defaults['bollinger-bands'].numStdDev),
});

export const MeanReversionParamsSchema = z.object({
  window: windowSize.default(defaults['mean-reversion'].window),
  entryZ: z.number().positive().default(defaults['mean-reversion'].entryZ),
  exitZ: z.number().min(0).default(defaults['mean-reversion'].exitZ),
  exitPolicy: z.enum(['threshold', 'zero-cross']).default(defaults['mean-reversion'].exitPolicy),
});

export const StrategyConfigSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ma-crossover'), params: MACrossoverParamsSchema.default({}) }),
  z.object({ kind: z.literal('rsi'), params: RSIParamsSchema.default({}) }),
  z.object({ kind: z.literal('macd'), params: MACDParamsSchema.default({}) }),
  z.object({ kind: z.literal('bollinger-bands'), params: BollingerBandsParamsSchema.default({}) }),
  z.object({ kind: z.literal('mean-reversion'), params: MeanReversionParamsSchema.default({}) }),
  z.object({ kind: z.literal('buy-and-hold'), params: z.object({}).strict().default({}) }),
]);

export type StrategyConfigInput = z.input<typeof StrategyConfigSchema>;

// ============================================================
// 실행 설정 스키마
// ============================================================

const rate = z.number().min(0).lt(1);

export const SizingPolicySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('all-in') }),
  z.object({ type: z.literal('fractional') }),
  z.object({ type: z.literal('fixed-fraction'), fraction: z.number().gt(0).max(1) }),
]);

export const BacktestConfigSchema = z.object({
  symbol: z.string().min(1).default(DEFAULT_SYMBOL),
  strategy: StrategyConfigSchema,
  initialCapital: z.number().finite().positive().default(DEFAULT_INITIAL_CAPITAL),
  commissionRate: rate.default(DEFAULT_COMMISSION_RATE),
  slippageRate: rate.default(DEFAULT_SLIPPAGE_RATE),
  riskFreeRate: z.number().gt(-1).lt(1).default(DEFAULT_RISK_FREE_RATE),
  sizing: SizingPolicySchema.default({ type: 'all-in' }),
});

export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * 전략 설정 검증 + 기본 파라미터 채우기
 *
 * @throws BacktestConfigError
 */
export function parseStrategyConfig(raw: unknown): StrategyConfig {
  const parsed = StrategyConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BacktestConfigError(formatIssues(parsed.error).map((m) => `strategy.${m}`));
  }
  return parsed.data;
}

/**
 * 실행 설정 검증 + 기본값 채우기
 *
 * @throws BacktestConfigError
 */
export function resolveBacktestConfig(raw: unknown): BacktestConfig {
  const parsed = BacktestConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BacktestConfigError(formatIssues(parsed.error));
  }

  const { initialCapital, ...rest } = parsed.data;
  return { ...rest, initialCapital: new Big(initialCapital) };
}

/**
 * 이미 만들어진 설정 값을 시뮬레이션 전에 다시 검증한다.
 *
 * @throws BacktestConfigError
 */
export function assertValidConfig(config: BacktestConfig): void {
  const issues: string[] = [];

  const strategy = StrategyConfigSchema.safeParse(config.strategy);
  if (!strategy.success) {
    issues.push(...formatIssues(strategy.error).map((m) => `strategy.${m}`));
  }

  if (!config.initialCapital.gt(0)) {
    issues.push('initialCapital: must be greater than 0');
  }

  const rest = BacktestConfigSchema.pick({
    commissionRate: true,
    slippageRate: true,
    riskFreeRate: true,
    sizing: true,
  }).safeParse(config);
  if (!rest.success) {
    issues.push(...formatIssues(rest.error));
  }

  if (issues.length > 0) {
    throw new BacktestConfigError(issues);
  }
}
