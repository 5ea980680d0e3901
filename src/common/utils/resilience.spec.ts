import {
  CircuitBreaker,
  CircuitOpenError,
  isTransientDbError,
  withRetry,
} from './resilience';

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt with the last error', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('down'));

    await expect(
      withRetry(fn, { maxAttempts: 3, baseDelayMs: 1 }),
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops at once when the error is not retryable', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('bad input'));

    await expect(
      withRetry(fn, { baseDelayMs: 1, shouldRetry: () => false }),
    ).rejects.toThrow('bad input');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and fails fast', async () => {
    const breaker = new CircuitBreaker('interpreter', {
      failureThreshold: 2,
      resetTimeoutMs: 60_000,
    });
    const failing = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('boom'));

    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    await expect(breaker.execute(failing)).rejects.toThrow('boom');
    expect(breaker.getState()).toBe('OPEN');

    await expect(breaker.execute(failing)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(failing).toHaveBeenCalledTimes(2);
  });

  it('resets the failure count after a success', async () => {
    const breaker = new CircuitBreaker('interpreter', { failureThreshold: 2 });

    await expect(breaker.execute(() => Promise.reject(new Error('x')))).rejects.toThrow();
    await breaker.execute(() => Promise.resolve(1));

    expect(breaker.getStats()).toEqual({ state: 'CLOSED', failures: 0 });
  });
});

describe('isTransientDbError', () => {
  it.each([
    [{ code: '40001', message: 'serialization failure' }, true],
    [{ message: 'TypeError: fetch failed' }, true],
    [new Error('connect ECONNREFUSED 127.0.0.1:5432'), true],
    [{ code: '23505', message: 'duplicate key' }, false],
    ['ETIMEDOUT', false],
    [null, false],
  ])('classifies %j as %s', (error, expected) => {
    expect(isTransientDbError(error)).toBe(expected);
  });
});
