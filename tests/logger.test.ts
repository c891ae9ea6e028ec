import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger, getLogger, initLogger, resetLogger, truncate, preview } from '../src/logger.js';

describe('Logger', () => {
  let lines: string[];
  let testStream: Writable;

  beforeEach(() => {
    lines = [];
    testStream = new Writable({
      write(chunk, _enc, cb) {
        // pino writes JSON lines
        const text = chunk.toString().trim();
        if (text) lines.push(text);
        cb();
      },
    });
  });

  it('should log info with message and details', () => {
    const logger = createLogger({ stream: testStream, level: 'debug' });
    logger.info('completion_request', { prompt: 'Hi' });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.level).toBe(30);
    expect(entry.msg).toBe('completion_request');
    expect(entry.prompt).toBe('Hi');
  });

  it('should map each method to its pino level', () => {
    const logger = createLogger({ stream: testStream, level: 'debug' });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    logger.fatal('e');

    expect(lines.map(l => JSON.parse(l).level)).toEqual([20, 30, 40, 50, 60]);
  });

  it('should respect the level filter', () => {
    const logger = createLogger({ stream: testStream, level: 'warn' });
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe('shown');
  });

  it('should log nothing when silent', () => {
    const logger = createLogger({ stream: testStream, level: 'silent' });
    logger.error('hidden');
    expect(lines).toEqual([]);
  });

  it('should carry child bindings', () => {
    const logger = createLogger({ stream: testStream, level: 'debug' });
    logger.child({ component: 'gateway' }).info('session_created', { session: 1 });

    const entry = JSON.parse(lines[0]);
    expect(entry.component).toBe('gateway');
    expect(entry.session).toBe(1);
  });
});

describe('logger singleton', () => {
  afterEach(() => resetLogger());

  it('initLogger replaces the default logger', () => {
    const custom = initLogger({ level: 'silent', file: false });
    expect(getLogger()).toBe(custom);
  });

  it('resetLogger forces a fresh default', () => {
    const first = initLogger({ level: 'silent', file: false });
    resetLogger();
    expect(getLogger()).not.toBe(first);
  });
});

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('cuts long strings and notes the length', () => {
    expect(truncate('abcdefghij', 4)).toBe('abcd...[10 total]');
  });
});

describe('preview', () => {
  it('keeps strings of 50 characters or fewer', () => {
    const fifty = 'x'.repeat(50);
    expect(preview(fifty)).toBe(fifty);
  });

  it('cuts at 50 characters and appends an ellipsis', () => {
    expect(preview('y'.repeat(60))).toBe(`${'y'.repeat(50)}...`);
  });
});
