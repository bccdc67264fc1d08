import { createLogger } from '@backtester/shared-utils';
import { loadBarsFromFile } from '../data/loader.js';
import { loadBacktestDefaults, type BacktestDefaults } from '../config/defaults.js';
import { parseStrategyConfig, resolveBacktestConfig } from '../config/schema.js';
import { runBacktest, runBenchmark } from '../engine/backtest.js';
import { generateBacktestReport, generateBenchmarkComparison } from '../reports/reporter.js';
import { serializeBacktestResult } from '../reports/serializer.js';
import type { BacktestConfig, Bar } from '../types.js';

const logger = createLogger('backtest-run');

export interface RunCommandOptions {
  file: string;
  symbol?: string;
  strategy: string;
  // ma-crossover
  fast?: number;
  slow?: number;
  // rsi
  period?: number;
  oversold?: number;
  overbought?: number;
  // macd
  fastPeriod?: number;
  slowPeriod?: number;
  signalPeriod?: number;
  // bollinger-bands / mean-reversion
  window?: number;
  numStd?: number;
  entryZ?: number;
  exitZ?: number;
  exitPolicy?: string;
  // 실행 설정
  capital?: number;
  commission?: number;
  slippage?: number;
  riskFree?: number;
  sizing?: string;
  fraction?: number;
  benchmark?: boolean;
  json?: boolean;
}

/**
 * CLI 옵션 → 전략 파라미터 (지정하지 않은 값은 스키마 기본값)
 */
function strategyParams(options: RunCommandOptions): Record<string, unknown> {
  switch (options.strategy) {
    case 'ma-crossover':
      return { fastWindow: options.fast, slowWindow: options.slow };
    case 'rsi':
      return { period: options.period, oversold: options.oversold, overbought: options.overbought };
    case 'macd':
      return {
        fastPeriod: options.fastPeriod,
        slowPeriod: options.slowPeriod,
        signalPeriod: options.signalPeriod,
      };
    case 'bollinger-bands':
      return { window: options.window, numStdDev: options.numStd };
    case 'mean-reversion':
      return {
        window: options.window,
        entryZ: options.entryZ,
        exitZ: options.exitZ,
        exitPolicy: options.exitPolicy,
      };
    default:
      return {};
  }
}

/**
 * CLI 옵션 + 환경변수 기본값 → 검증된 백테스트 설정
 *
 * @throws BacktestConfigError
 */
export function buildRunConfig(
  options: RunCommandOptions,
  defaults: BacktestDefaults = loadBacktestDefaults()
): BacktestConfig {
  const strategy = parseStrategyConfig({ kind: options.strategy, params: strategyParams(options) });
  const sizing = options.sizing ?? defaults.sizing;

  return resolveBacktestConfig({
    symbol: options.symbol,
    strategy,
    initialCapital: options.capital ?? defaults.initialCapital,
    commissionRate: options.commission ?? defaults.commissionRate,
    slippageRate: options.slippage ?? defaults.slippageRate,
    riskFreeRate: options.riskFree ?? defaults.riskFreeRate,
    sizing: sizing === 'fixed-fraction' ? { type: sizing, fraction: options.fraction } : { type: sizing },
  });
}

/**
 * 백테스트 실행 후 출력 텍스트 생성
 *
 * --benchmark 이면 매수 후 보유를 먼저 돌려 알파/베타와 비교표를 붙인다.
 */
export function renderRun(
  bars: readonly Bar[],
  config: BacktestConfig,
  options: Pick<RunCommandOptions, 'benchmark' | 'json'>
): string {
  const benchmark = options.benchmark ? runBenchmark(bars, config) : null;
  const result = runBacktest(bars, config, benchmark ? { benchmark: benchmark.equity } : {});

  if (options.json) {
    return JSON.stringify(
      {
        result: serializeBacktestResult(result),
        benchmark: benchmark ? serializeBacktestResult(benchmark) : null,
      },
      null,
      2
    );
  }

  const sections = [generateBacktestReport(result)];
  if (benchmark) {
    sections.push(generateBenchmarkComparison(result, benchmark));
  }
  return sections.join('\n');
}

/**
 * run 명령: 파일 로드 → 설정 검증 → 백테스트 → 리포트
 */
export async function runCommand(options: RunCommandOptions): Promise<string> {
  const config = buildRunConfig(options);
  logger.info('실행 설정', {
    strategy: config.strategy,
    symbol: config.symbol,
    initialCapital: config.initialCapital.toString(),
    sizing: config.sizing,
  });

  const bars = await loadBarsFromFile(options.file);
  return renderRun(bars, config, options);
}
