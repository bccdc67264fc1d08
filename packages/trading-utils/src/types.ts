import type Big from 'big.js';

// =============================================================================
// Indicators
// =============================================================================

/**
 * 단기/장기 이동평균 한 쌍
 */
export interface MAPair {
  short: Big;
  long: Big;
}

export type CrossoverDirection = 'golden' | 'death';

/**
 * MACD result
 */
export interface MACDResult {
  macd: Big;
  signal: Big;
  histogram: Big;
}

/**
 * Bollinger Bands result
 */
export interface BollingerBandsResult {
  middle: Big;
  upper: Big;
  lower: Big;
  stdDev: Big;
}
