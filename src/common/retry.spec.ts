import { Logger } from '@nestjs/common';
import { isTransientDatabaseError, withRetry } from './retry';

describe('withRetry', () => {
  const logger = new Logger('RetryTest');

  beforeEach(() => {
    jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the first successful result', async () => {
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(
      withRetry(operation, {
        maxAttempts: 3,
        baseDelayMs: 0,
        isRetryable: () => true,
        label: 'test',
        logger,
      }),
    ).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
  });

  it('should retry retryable errors until success', async () => {
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error('deadlock'))
      .mockRejectedValueOnce(new Error('deadlock'))
      .mockResolvedValue('ok');

    await expect(
      withRetry(operation, {
        maxAttempts: 3,
        baseDelayMs: 0,
        isRetryable: () => true,
        label: 'test',
        logger,
      }),
    ).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('should rethrow the last error once attempts are exhausted', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('still down'));

    await expect(
      withRetry(operation, {
        maxAttempts: 2,
        baseDelayMs: 0,
        isRetryable: () => true,
        label: 'test',
      }),
    ).rejects.toThrow('still down');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should not retry non-retryable errors', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('constraint'));

    await expect(
      withRetry(operation, {
        maxAttempts: 5,
        baseDelayMs: 0,
        isRetryable: () => false,
        label: 'test',
      }),
    ).rejects.toThrow('constraint');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should double the delay between attempts', async () => {
    jest.useFakeTimers();
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('ok');

    const promise = withRetry(operation, {
      maxAttempts: 3,
      baseDelayMs: 100,
      isRetryable: () => true,
      label: 'test',
      logger,
    });

    await jest.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await jest.advanceTimersByTimeAsync(199);
    expect(operation).toHaveBeenCalledTimes(2);
    await jest.advanceTimersByTimeAsync(1);
    await expect(promise).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);

    jest.useRealTimers();
  });
});

describe('isTransientDatabaseError', () => {
  it.each(['40001', '40P01', '57014', '08006', 'ECONNRESET'])(
    'should treat code %s as transient',
    (code) => {
      expect(isTransientDatabaseError(Object.assign(new Error(), { code }))).toBe(
        true,
      );
    },
  );

  it('should read the code of a wrapped driver error', () => {
    const error = Object.assign(new Error('query failed'), {
      driverError: { code: '40P01' },
    });
    expect(isTransientDatabaseError(error)).toBe(true);
  });

  it('should not retry constraint violations or plain errors', () => {
    expect(
      isTransientDatabaseError(Object.assign(new Error(), { code: '23505' })),
    ).toBe(false);
    expect(isTransientDatabaseError(new Error('boom'))).toBe(false);
    expect(isTransientDatabaseError('boom')).toBe(false);
  });
});
