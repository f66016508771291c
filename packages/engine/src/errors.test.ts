// Error System Tests
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  EngineError,
  createAmountError,
  createHealthError,
  createLogger,
  createNetworkError,
  isEngineError,
  resolveLogLevel,
  wrapError,
} from './errors';

describe('EngineError', () => {
  it('should carry code, user message and suggestion', () => {
    const error = createHealthError('HEALTH_FACTOR_TOO_LOW', { healthFactor: 5n });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('EngineError');
    expect(error.code).toBe('HEALTH_FACTOR_TOO_LOW');
    expect(error.message).toBe('Health factor is below the minimum');
    expect(error.userMessage).toBe('This action would leave your position undercollateralized.');
    expect(error.suggestion).toBe('Deposit more collateral or mint less.');
    expect(error.recoverable).toBe(true);
  });

  it('should mark configuration errors as not recoverable', () => {
    expect(new EngineError('CONFIGURATION_INVALID', 'bad').recoverable).toBe(false);
    expect(new EngineError('CONFIGURATION_INVALID', 'bad', { recoverable: true }).recoverable).toBe(true);
  });

  it('should serialize bigint context as strings', () => {
    const error = createAmountError('UNDERFLOW', { debt: 10n, requested: [11n, 12n], user: 'x' });

    const json = error.toJSON();

    expect(json.code).toBe('UNDERFLOW');
    expect(json.context).toEqual({ debt: '10', requested: ['11', '12'], user: 'x' });
    expect(() => JSON.stringify(error)).not.toThrow();
  });

  it('should narrow by code', () => {
    const error = createAmountError('DIVISION_BY_ZERO');

    expect(isEngineError(error)).toBe(true);
    expect(isEngineError(error, 'DIVISION_BY_ZERO')).toBe(true);
    expect(isEngineError(error, 'UNDERFLOW')).toBe(false);
    expect(isEngineError(new Error('plain'))).toBe(false);
  });
});

describe('wrapError', () => {
  it('should pass engine errors through', () => {
    const error = createNetworkError('TIMEOUT', 'slow');

    expect(wrapError(error)).toBe(error);
  });

  it('should map bigint division by zero', () => {
    const wrapped = wrapError(new RangeError('Division by zero'));

    expect(wrapped.code).toBe('DIVISION_BY_ZERO');
    expect(wrapped.cause).toBeInstanceOf(RangeError);
  });

  it('should detect timeouts and network failures', () => {
    const aborted = new Error('aborted');
    aborted.name = 'AbortError';

    expect(wrapError(aborted).code).toBe('TIMEOUT');
    expect(wrapError(new Error('request timeout')).code).toBe('TIMEOUT');
    expect(wrapError(new TypeError('fetch failed')).code).toBe('NETWORK_ERROR');
  });

  it('should fall back to the given code', () => {
    expect(wrapError(new Error('odd')).code).toBe('UNKNOWN_ERROR');
    expect(wrapError('text', 'VALIDATION_ERROR')).toMatchObject({ code: 'VALIDATION_ERROR', message: 'text' });
  });
});

describe('resolveLogLevel', () => {
  it('should prefer the configured level', () => {
    expect(resolveLogLevel({ STABLECORE_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('should default by environment', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('warn');
    expect(resolveLogLevel({})).toBe('info');
    expect(resolveLogLevel({ STABLECORE_LOG_LEVEL: 'loud' })).toBe('info');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix messages and drop those below the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createLogger('StablecoinEngine', { level: 'warn' });

    logger.debug('hidden');
    logger.warn('mintDsc aborted', { amount: 5n });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[StablecoinEngine] [WARN] mintDsc aborted', { amount: '5' });
  });

  it('should serialize engine errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('Test', { level: 'error' });

    logger.error('listener failed', createAmountError('UNDERFLOW'), { event: 'DscBurned' });

    expect(error).toHaveBeenCalledWith(
      '[Test] [ERROR] listener failed',
      expect.objectContaining({
        error: expect.objectContaining({ code: 'UNDERFLOW' }),
        context: { event: 'DscBurned' },
      })
    );
  });

  it('should stay quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('Test', { level: 'silent' }).error('nothing');

    expect(error).not.toHaveBeenCalled();
  });
});
