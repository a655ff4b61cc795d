/**
 * Tests for the logger and error helpers
 */

import { isLogLevel, logger } from '../logger';
import { CleaningPipelineError, LoadError, WriteError, getErrorMessage } from '../errors';

describe('logger', () => {
  const initialLevel = logger.getLevel();

  afterEach(() => {
    logger.setLevel(initialLevel);
  });

  it('should pick up LOG_LEVEL from the test environment', () => {
    expect(initialLevel).toBe('error');
  });

  it('should suppress messages below the current level', () => {
    logger.setLevel('warn');
    logger.info('hidden');
    logger.warn('shown', { count: 2 });

    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[WARN\]$/), 'shown', { count: 2 });
  });

  it('should pass errors through to console.error', () => {
    const error = new Error('boom');
    logger.error('failed', error);

    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/\[ERROR\]$/), 'failed', '', error);
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('errors', () => {
  it('should format unknown thrown values', () => {
    expect(getErrorMessage(new Error('plain'))).toBe('plain');
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(getErrorMessage(42)).toBe('Unknown error occurred');
  });

  it('should name errors after their class and keep the cause', () => {
    const cause = new Error('ENOENT');
    const error = new LoadError('input.json', 'ENOENT', { cause });

    expect(error).toBeInstanceOf(CleaningPipelineError);
    expect(error.name).toBe('LoadError');
    expect(error.message).toBe('Failed to load input.json: ENOENT');
    expect(error.path).toBe('input.json');
    expect(error.cause).toBe(cause);
  });

  it('should describe write failures with the underlying message', () => {
    const error = new WriteError('out.json', { cause: new Error('EACCES') });
    expect(error.message).toBe('Failed to write out.json: EACCES');
  });
});
