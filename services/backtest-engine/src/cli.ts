#!/usr/bin/env node
import '@backtester/shared-utils/env-loader';
import { Command, InvalidArgumentError, Option } from 'commander';
import { createLogger } from '@backtester/shared-utils';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { formatStrategyList } from './commands/strategies.js';
import { STRATEGY_DEFINITIONS } from './strategies/index.js';
import { SIZING_TYPES } from './config/defaults.js';

const logger = createLogger('backtest-cli');
const program = new Command();

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`숫자가 아닙니다: ${value}`);
  }
  return parsed;
}

program
  .name('backtest')
  .description('시그널 백테스트 CLI')
  .version('1.0.0');

/**
 * 단순 백테스트 명령
 */
program
  .command('run')
  .description('봉 데이터 파일로 백테스트 실행')
  .requiredOption('-f, --file <path>', '봉 데이터 JSON 파일 (timestamp, open, high, low, close, volume 배열)')
  .option('-s, --symbol <symbol>', '심볼 (리포트 표시용)')
  .addOption(
    new Option('--strategy <kind>', '전략')
      .choices(STRATEGY_DEFINITIONS.map((def) => def.kind))
      .default('ma-crossover')
  )
  .option('--fast <n>', '[ma-crossover] 단기 이평선 기간', parseNumber)
  .option('--slow <n>', '[ma-crossover] 장기 이평선 기간', parseNumber)
  .option('--period <n>', '[rsi] RSI 기간', parseNumber)
  .option('--oversold <n>', '[rsi] 과매도 기준', parseNumber)
  .option('--overbought <n>', '[rsi] 과매수 기준', parseNumber)
  .option('--fast-period <n>', '[macd] 빠른 EMA 기간', parseNumber)
  .option('--slow-period <n>', '[macd] 느린 EMA 기간', parseNumber)
  .option('--signal-period <n>', '[macd] 시그널 EMA 기간', parseNumber)
  .option('--window <n>', '[bollinger-bands, mean-reversion] 윈도우', parseNumber)
  .option('--num-std <n>', '[bollinger-bands] 표준편차 배수', parseNumber)
  .option('--entry-z <n>', '[mean-reversion] 진입 z-score', parseNumber)
  .option('--exit-z <n>', '[mean-reversion] 청산 z-score', parseNumber)
  .addOption(new Option('--exit-policy <policy>', '[mean-reversion] 청산 방식').choices(['threshold', 'zero-cross']))
  .option('--capital <amount>', '초기 자본 (기본: BACKTEST_INITIAL_CAPITAL 또는 10000)', parseNumber)
  .option('--commission <rate>', '수수료율 (0.001 = 0.1%)', parseNumber)
  .option('--slippage <rate>', '슬리피지율 (0.0005 = 0.05%)', parseNumber)
  .option('--risk-free <rate>', '연 무위험 수익률 (0.02 = 2%)', parseNumber)
  .addOption(
    new Option('--sizing <policy>', '주문 수량 정책 (기본: BACKTEST_SIZING 또는 all-in)').choices(SIZING_TYPES)
  )
  .option('--fraction <ratio>', '[fixed-fraction] 투입 비율 (0~1)', parseNumber)
  .option('--benchmark', '매수 후 보유와 비교 (alpha/beta 포함)', false)
  .option('--json', '리포트 대신 JSON 출력', false)
  .action(async (options: RunCommandOptions) => {
    try {
      const output = await runCommand(options);
      console.log(output);
    } catch (error) {
      logger.error('백테스트 실패', error);
      console.error(`❌ 백테스트 실패: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

/**
 * 전략 목록 명령
 */
program
  .command('strategies')
  .description('사용 가능한 전략과 기본 파라미터')
  .action(() => {
    for (const line of formatStrategyList()) {
      console.log(line);
    }
  });

// CLI 실행
program.parseAsync().catch((error: unknown) => {
  logger.error('CLI 실행 실패', error);
  process.exitCode = 1;
});
