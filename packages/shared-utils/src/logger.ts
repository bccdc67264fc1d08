import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'DEBUG':
    case 'INFO':
      console.log(line);
      break;
    case 'WARN':
      console.warn(line);
      break;
    case 'ERROR':
      console.error(line);
      break;
  }
};

/**
 * LOG_LEVEL 환경변수 해석 (알 수 없는 값이면 INFO)
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (normalized === 'DEBUG' || normalized === 'INFO' || normalized === 'WARN' || normalized === 'ERROR') {
    return normalized;
  }
  return 'INFO';
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(
    private serviceName: string,
    options: LoggerOptions = {}
  ) {
    this.minLevel = options.minLevel ?? parseLogLevel(process.env['LOG_LEVEL']);
    this.sink = options.sink ?? consoleSink;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    this.sink(level, JSON.stringify(entry));
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }
}

export function createLogger(serviceName: string, options?: LoggerOptions): Logger {
  return new Logger(serviceName, options);
}
