import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AppError, Logger, errorMessage, getGlobalLogLevel, handleError, isLogLevel, setGlobalLogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  const initialLevel = getGlobalLogLevel();

  beforeEach(() => {
    logger = new Logger({ context: 'test' });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setGlobalLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('writes each level to the matching console stream', () => {
    setGlobalLogLevel('debug');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e', new Error('boom'));

    expect(console.log).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('includes the context and structured data in the line', () => {
    setGlobalLogLevel('info');
    logger.info('Synced', { bytes: 10 });

    const line = String(vi.mocked(console.log).mock.calls[0][0]);
    expect(line).toContain('INFO  [test] Synced');
    expect(line).toContain('"bytes": 10');
  });

  it('follows the global level unless given its own', () => {
    setGlobalLogLevel('warn');
    logger.info('hidden');
    expect(logger.getLogs()).toHaveLength(0);

    const verbose = new Logger({ minLevel: 'debug' });
    verbose.debug('shown');
    expect(verbose.getLogs('debug')).toHaveLength(1);
  });

  it('prints stack traces only at debug level', () => {
    setGlobalLogLevel('info');
    logger.error('failed', new Error('boom'));
    expect(String(vi.mocked(console.error).mock.calls[0][0])).not.toContain('Stack:');

    setGlobalLogLevel('debug');
    logger.error('failed', new Error('boom'));
    expect(String(vi.mocked(console.error).mock.calls[1][0])).toContain('Stack:');
  });

  it('clears retained entries', () => {
    setGlobalLogLevel('info');
    logger.info('one');
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('isLogLevel', () => {
  it('recognises the four levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('AppError and handleError', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('carries a code, status and context', () => {
    const error = new AppError('nope', 'SYNC_FAILED', 503, { sharedPath: '/share' });
    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ name: 'AppError', code: 'SYNC_FAILED', statusCode: 503, context: { sharedPath: '/share' } });
  });

  it('passes AppErrors through and wraps everything else', () => {
    const original = new AppError('known');
    expect(handleError(original)).toBe(original);
    expect(handleError(new Error('plain'))).toMatchObject({ message: 'plain', code: 'INTERNAL_ERROR' });
    expect(handleError('text')).toMatchObject({ message: 'text', code: 'UNKNOWN_ERROR' });
  });

  it('extracts a message from any thrown value', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
  });
});
