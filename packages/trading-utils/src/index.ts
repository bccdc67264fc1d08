export type * from './types.js';

export { EMA_DECIMALS, calculateSMA, calculateEMASeries, checkMACrossover } from './indicators/ma.js';
export { calculateRSI, calculateRSISeries } from './indicators/rsi.js';
export { calculateMACD, calculateMACDSeries, checkMACDCrossover, macdMinimumLength } from './indicators/macd.js';
export { calculateBollingerBands } from './indicators/bollinger.js';
export { calculateStdDev, calculateZScore } from './indicators/statistics.js';
