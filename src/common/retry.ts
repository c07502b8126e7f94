import { Logger } from '@nestjs/common';

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the 2nd attempt; doubled for each following attempt */
  baseDelayMs: number;
  /** Only errors for which this returns true are retried */
  isRetryable: (error: unknown) => boolean;
  /** Used in log lines */
  label: string;
  logger?: Logger;
}

/**
 * Run `operation`, retrying retryable failures with exponential backoff.
 * The last error is rethrown unchanged once attempts are exhausted, and
 * non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, isRetryable, label, logger } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      logger?.warn(
        `${label} failed (attempt ${attempt}/${maxAttempts}): ${describeError(error)}. Retrying in ${delay}ms...`,
      );
      await sleep(delay);
    }
  }
}

/** PostgreSQL SQLSTATE codes worth retrying */
const TRANSIENT_SQLSTATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '55P03', // lock_not_available
  '57014', // query_canceled (statement timeout)
  '57P01', // admin_shutdown
  '08000',
  '08003',
  '08006',
  '53300', // too_many_connections
]);

const TRANSIENT_NODE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
]);

/**
 * True for database errors that may succeed on a later attempt
 * (lock conflicts, timeouts, dropped connections).
 */
export function isTransientDatabaseError(error: unknown): boolean {
  const code = readCode(error) ?? readCode(readProperty(error, 'driverError'));
  if (code === undefined) {
    return false;
  }
  return TRANSIENT_SQLSTATES.has(code) || TRANSIENT_NODE_CODES.has(code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function readCode(value: unknown): string | undefined {
  const code = readProperty(value, 'code');
  return typeof code === 'string' ? code : undefined;
}
