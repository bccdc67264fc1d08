import { parseStrategyConfig } from '../config/schema.js';
import { STRATEGY_DEFINITIONS, resolveStrategy } from '../strategies/index.js';

/**
 * 전략 목록 (기본 파라미터 기준 설명과 최소 봉 수)
 */
export function formatStrategyList(): string[] {
  const width = Math.max(...STRATEGY_DEFINITIONS.map((def) => def.kind.length));

  return STRATEGY_DEFINITIONS.map((def) => {
    const strategy = resolveStrategy(parseStrategyConfig({ kind: def.kind }));
    return `${def.kind.padEnd(width)}  ${strategy.name} | 최소 봉 ${strategy.minimumBars}개`;
  });
}
