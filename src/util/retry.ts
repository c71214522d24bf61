import { describeError, type Logger } from '../config/logger';
import { getStatus } from './errors';

type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Pick<Logger, 'warn'>;
};

const RETRYABLE_STATUSES = new Set([429, 500, 503, 504]);

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const computeDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 30_000, factor = 2 }: Pick<BackoffOptions, 'initialDelayMs' | 'maxDelayMs' | 'factor'> = {},
): number => Math.min(initialDelayMs * factor ** (attempt - 1), maxDelayMs);

// Errors without a status are transport failures and worth another attempt.
export const isRetryableStatus = (error: unknown): boolean => {
  const status = getStatus(error);
  return status === undefined || RETRYABLE_STATUSES.has(status);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const {
    maxAttempts = 5,
    jitter = true,
    onRetry,
    shouldRetry,
    sleep = wait,
    logger,
  } = options;

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts) {
        throw error;
      }

      if (typeof shouldRetry === 'function' && !shouldRetry(error, attempt)) {
        throw error;
      }

      const cappedDelay = computeDelay(attempt, options);
      const delay = jitter
        ? Math.round(cappedDelay / 2 + Math.random() * (cappedDelay / 2))
        : Math.round(cappedDelay);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          logger?.warn('retry.hook.failed', { attempt, error: describeError(hookError) });
        }
      }

      await sleep(delay);
    }
  }
};

export type { BackoffOptions };
