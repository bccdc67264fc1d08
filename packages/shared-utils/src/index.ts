export { Logger, createLogger, parseLogLevel } from './logger.js';
export type { LogLevel, LogEntry, LogSink, LoggerOptions } from './logger.js';
export { env, envNumber, envChoice } from './env.js';
export { nowIso, parseUtcIso, hoursBetween } from './date.js';
