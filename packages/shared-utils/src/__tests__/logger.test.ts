import { describe, it, expect } from 'vitest';
import { createLogger, parseLogLevel } from '../logger.js';
import type { LogLevel } from '../logger.js';

function collectingSink() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return {
    lines,
    sink: (level: LogLevel, line: string) => {
      lines.push({ level, line });
    },
  };
}

describe('Logger', () => {
  it('JSON 한 줄로 서비스명과 데이터를 기록해야 함', () => {
    const { lines, sink } = collectingSink();
    const logger = createLogger('test-service', { minLevel: 'DEBUG', sink });

    logger.info('실행 시작', { bars: 3 });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]!.line);
    expect(entry.level).toBe('INFO');
    expect(entry.service).toBe('test-service');
    expect(entry.message).toBe('실행 시작');
    expect(entry.data).toEqual({ bars: 3 });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('최소 레벨보다 낮은 로그는 버려야 함', () => {
    const { lines, sink } = collectingSink();
    const logger = createLogger('test-service', { minLevel: 'WARN', sink });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(lines.map((l) => l.level)).toEqual(['WARN', 'ERROR']);
  });

  it('Error 객체는 name/message로 풀어서 기록해야 함', () => {
    const { lines, sink } = collectingSink();
    const logger = createLogger('test-service', { minLevel: 'DEBUG', sink });

    logger.error('실패', new RangeError('bad range'));

    const entry = JSON.parse(lines[0]!.line);
    expect(entry.data.name).toBe('RangeError');
    expect(entry.data.message).toBe('bad range');
  });
});

describe('parseLogLevel', () => {
  it('대소문자 무시', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel(' Warn ')).toBe('WARN');
  });

  it('알 수 없는 값이나 미설정은 INFO', () => {
    expect(parseLogLevel(undefined)).toBe('INFO');
    expect(parseLogLevel('verbose')).toBe('INFO');
  });
});
