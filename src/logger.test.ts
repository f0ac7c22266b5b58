import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, isLogLevel, type LogLevel, parseLogLevel } from './logger.js';

const capture = (): { lines: Array<{ level: LogLevel, entry: Record<string, unknown> }>, sink: (level: LogLevel, line: string) => void } => {
  const lines: Array<{ level: LogLevel, entry: Record<string, unknown> }> = [];
  return {
    lines,
    sink: (level, line) => { lines.push({ level, entry: JSON.parse(line) as Record<string, unknown> }); }
  };
};

describe('createLogger', () => {
  it('drops entries below the threshold', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'warn', sink });
    log.info('hidden');
    log.warn('shown', { count: 2 });
    assert.equal(lines.length, 1);
    assert.equal(lines[0].level, 'warn');
    assert.equal(lines[0].entry.msg, 'shown');
    assert.equal(lines[0].entry.count, 2);
  });

  it('merges child bindings into every entry', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'debug', sink }).child({ component: 'splitwise' });
    log.debug('request', { endpoint: 'get_groups' });
    assert.equal(lines[0].entry.component, 'splitwise');
    assert.equal(lines[0].entry.endpoint, 'get_groups');
    assert.equal(lines[0].entry.level, 'debug');
  });
});

describe('parseLogLevel', () => {
  it('falls back to info for unknown values', () => {
    assert.equal(parseLogLevel('ERROR'), 'error');
    assert.equal(parseLogLevel('verbose'), 'info');
    assert.equal(parseLogLevel(undefined), 'info');
  });

  it('does not accept inherited object keys as levels', () => {
    assert.equal(isLogLevel('constructor'), false);
    assert.equal(isLogLevel('toString'), false);
    assert.equal(parseLogLevel('constructor'), 'info');
  });

  it('keeps trace lines out when an inherited key is configured', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: parseLogLevel('constructor'), sink: (_level, line) => { lines.push(line); } });
    logger.trace('hidden');
    logger.info('shown');
    assert.equal(lines.length, 1);
    assert.equal((JSON.parse(lines[0]) as { msg: string }).msg, 'shown');
  });
});
