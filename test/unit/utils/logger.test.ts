import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { Logger, LogLevel } from '../../../src/utils/logger.js';

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

  it('向 stderr 输出一行 JSON，带组件名与元数据', () => {
    new Logger('diacritics.loader', LogLevel.INFO).info('Diacritic definitions loaded', { count: 6 });
    assert.equal(lines.length, 1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? '');
    assert.equal(typeof entry.timestamp, 'string');
    delete entry.timestamp;
    assert.deepEqual(entry, {
      level: 'INFO',
      component: 'diacritics.loader',
      message: 'Diacritic definitions loaded',
      count: 6,
    });
  });

  it('低于阈值的条目被丢弃', () => {
    const logger = new Logger('symbols.scanner', LogLevel.INFO);
    logger.debug('Scanning symbol definitions');
    assert.deepEqual(lines, []);

    const quiet = new Logger('symbols.scanner', LogLevel.WARN);
    quiet.info('Symbol associations found');
    quiet.debug('Scanning symbol definitions');
    assert.deepEqual(lines, []);
  });

  it('DEBUG 阈值输出全部条目', () => {
    const logger = new Logger('symbols.generator', LogLevel.DEBUG);
    logger.debug('a');
    logger.info('b');
    const levels = lines.map(line => {
      const entry: Record<string, unknown> = JSON.parse(line);
      return entry.level;
    });
    assert.deepEqual(levels, ['DEBUG', 'INFO']);
  });
});
