import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { Logger, LogLevel, logPerformance } from '../../../src/utils/logger.js';
import { ConfigService } from '../../../src/config/config-service.js';

describe('Logger', { concurrency: false }, () => {
  let originalError: typeof console.error;
  let lines: string[];

  beforeEach(() => {
    lines = [];
    originalError = console.error;
    console.error = (message?: unknown) => {
      lines.push(String(message ?? ''));
    };
  });

  afterEach(() => {
    console.error = originalError;
  });

  it('低于最小级别的日志被丢弃', () => {
    const logger = new Logger('format', LogLevel.WARN);
    logger.debug('hidden');
    logger.info('hidden');
    assert.equal(lines.length, 0);
  });

  it('默认级别为 INFO，debug 被丢弃', () => {
    const logger = new Logger('format');
    logger.debug('hidden');
    logger.info('shown');
    assert.equal(lines.length, 1);
  });

  it('输出带组件与元数据的 JSON 行', () => {
    new Logger('format', LogLevel.DEBUG).debug('built query', { lines: 3 });
    assert.equal(lines.length, 1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    assert.equal(entry.level, 'DEBUG');
    assert.equal(entry.component, 'format');
    assert.equal(entry.message, 'built query');
    assert.equal(entry.lines, 3);
    assert.equal(typeof entry.timestamp, 'string');
  });

  it('logPerformance 以组件名记录耗时', () => {
    const originalLevel = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    ConfigService.resetForTesting();
    try {
      logPerformance({ component: 'cli', operation: 'format', duration: 12, metadata: { file: 'a.sql' } });
    } finally {
      if (originalLevel === undefined) delete process.env.LOG_LEVEL;
      else process.env.LOG_LEVEL = originalLevel;
      ConfigService.resetForTesting();
    }
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '{}');
    assert.equal(entry.level, 'INFO');
    assert.equal(entry.component, 'cli');
    assert.equal(entry.message, 'format completed');
    assert.equal(entry.duration_ms, 12);
    assert.equal(entry.file, 'a.sql');
  });
});
