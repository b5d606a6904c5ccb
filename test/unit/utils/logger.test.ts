import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Logger, LogLevel, createLogger } from '../../../src/utils/logger.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { captureLines } from '../../helpers/tree-builders.js';

function parse(line: string | undefined): Record<string, unknown> {
  assert.ok(line !== undefined, 'expected a log line');
  const value: unknown = JSON.parse(line);
  assert.ok(typeof value === 'object' && value !== null);
  return Object.fromEntries(Object.entries(value));
}

describe('Logger', () => {
  afterEach(() => {
    delete process.env.LOG_LEVEL;
    ConfigService.resetForTesting();
  });

  it('应该输出 JSON 行并带上组件名和元数据', () => {
    const { lines, sink } = captureLines();
    const logger = new Logger('builder', LogLevel.DEBUG, sink);
    logger.info('tree built', { nodes: 3 });
    assert.equal(lines.length, 1);
    const entry = parse(lines[0]);
    assert.equal(entry.level, 'INFO');
    assert.equal(entry.component, 'builder');
    assert.equal(entry.message, 'tree built');
    assert.equal(entry.nodes, 3);
    assert.equal(typeof entry.timestamp, 'string');
  });

  it('低于最低级别的日志应该被丢弃', () => {
    const { lines, sink } = captureLines();
    const logger = new Logger('cache', LogLevel.WARN, sink);
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    assert.deepEqual(lines.map(line => parse(line).message), ['shown']);
    assert.equal(logger.isEnabled(LogLevel.ERROR), true);
    assert.equal(logger.isEnabled(LogLevel.INFO), false);
  });

  it('error 应该附带错误消息', () => {
    const { lines, sink } = captureLines();
    new Logger('cli', LogLevel.INFO, sink).error('failed', new Error('boom'), { file: 'a.txt' });
    const entry = parse(lines[0]);
    assert.equal(entry.level, 'ERROR');
    assert.equal(entry.error, 'boom');
    assert.equal(entry.file, 'a.txt');
    assert.equal(typeof entry.stack, 'string');
  });

  it('child 应该拼接组件名并共享输出', () => {
    const { lines, sink } = captureLines();
    new Logger('red', LogLevel.INFO, sink).child('data').info('set');
    assert.equal(parse(lines[0]).component, 'red.data');
  });

  it('createLogger 应该读取 LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'debug';
    ConfigService.resetForTesting();
    const { lines, sink } = captureLines();
    createLogger('test', sink).debug('visible');
    assert.equal(lines.length, 1);
  });
});
