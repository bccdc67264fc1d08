import { BacktestConfigError } from '../errors.js';
import type {
  Bar,
  Strategy,
  StrategyConfig,
  StrategyDefinition,
  StrategyKind,
  StrategyOf,
  StrategySignal,
} from '../types.js';
import { HOLD } from './prices.js';
import { maCrossoverStrategy } from './ma-crossover.js';
import { rsiStrategy } from './rsi.js';
import { macdStrategy } from './macd.js';
import { bollingerBandsStrategy } from './bollinger-bands.js';
import { meanReversionStrategy } from './mean-reversion.js';
import { buyAndHoldStrategy } from './buy-and-hold.js';

export const STRATEGY_DEFINITIONS = [
  maCrossoverStrategy,
  rsiStrategy,
  macdStrategy,
  bollingerBandsStrategy,
  meanReversionStrategy,
  buyAndHoldStrategy,
] as const;

function bind<K extends StrategyKind>(
  definition: StrategyDefinition<K>,
  params: StrategyOf<K>['params']
): Strategy {
  const minimumBars = definition.minimumBarsRequired(params);

  return {
    kind: definition.kind,
    name: definition.describe(params),
    minimumBars,
    computeSignal(history: readonly Bar[]): StrategySignal {
      // 워밍업 구간은 전략 로직을 타지 않고 HOLD
      if (history.length < minimumBars) {
        return HOLD;
      }
      return definition.computeSignal(history, params);
    },
    computeSignals(bars: readonly Bar[]): StrategySignal[] {
      if (bars.length < minimumBars) {
        return bars.map(() => HOLD);
      }
      if (definition.computeSignals) {
        return definition.computeSignals(bars, params);
      }
      return bars.map((_, i) =>
        i + 1 < minimumBars ? HOLD : definition.computeSignal(bars.slice(0, i + 1), params)
      );
    },
  };
}

/**
 * 전략 설정 → 실행용 전략
 *
 * 새 전략 추가 시 여기에 case 하나만 추가한다.
 */
export function resolveStrategy(config: StrategyConfig): Strategy {
  switch (config.kind) {
    case 'ma-crossover':
      return bind(maCrossoverStrategy, config.params);
    case 'rsi':
      return bind(rsiStrategy, config.params);
    case 'macd':
      return bind(macdStrategy, config.params);
    case 'bollinger-bands':
      return bind(bollingerBandsStrategy, config.params);
    case 'mean-reversion':
      return bind(meanReversionStrategy, config.params);
    case 'buy-and-hold':
      return bind(buyAndHoldStrategy, config.params);
    default: {
      const unknownConfig: never = config;
      throw new BacktestConfigError([`strategy.kind: 알 수 없는 전략 ${JSON.stringify(unknownConfig)}`]);
    }
  }
}

/**
 * 현재 봉까지의 데이터로 시그널 계산
 */
export function computeSignal(history: readonly Bar[], config: StrategyConfig): StrategySignal {
  return resolveStrategy(config).computeSignal(history);
}

export function minimumBarsRequired(config: StrategyConfig): number {
  return resolveStrategy(config).minimumBars;
}

export function describeStrategy(config: StrategyConfig): string {
  return resolveStrategy(config).name;
}
