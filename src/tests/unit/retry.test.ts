import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { computeDelay, exponentialBackoff, isRetryableStatus } from '../../util/retry';

const withStatus = (status: number): Error & { status: number } =>
  Object.assign(new Error(`HTTP ${status}`), { status });

describe('exponentialBackoff', () => {
  it('retries until the action succeeds, growing the delay by the factor', async () => {
    const delays: number[] = [];
    let calls = 0;

    const value = await exponentialBackoff(
      async (attempt) => {
        calls += 1;
        if (attempt < 3) {
          throw withStatus(503);
        }
        return 'done';
      },
      {
        initialDelayMs: 1000,
        factor: 7,
        jitter: false,
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );

    assert.equal(value, 'done');
    assert.equal(calls, 3);
    assert.deepEqual(delays, [1000, 7000]);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    let calls = 0;

    await assert.rejects(
      exponentialBackoff(
        async () => {
          calls += 1;
          throw new Error(`failure ${calls}`);
        },
        { maxAttempts: 3, initialDelayMs: 0, sleep: async () => {} },
      ),
      { message: 'failure 3' },
    );

    assert.equal(calls, 3);
  });

  it('stops immediately when shouldRetry declines', async () => {
    let calls = 0;

    await assert.rejects(
      exponentialBackoff(
        async () => {
          calls += 1;
          throw withStatus(400);
        },
        { shouldRetry: isRetryableStatus, sleep: async () => {} },
      ),
      { message: 'HTTP 400' },
    );

    assert.equal(calls, 1);
  });

  it('keeps retrying when the onRetry hook throws and logs the hook failure', async () => {
    const attempts: number[] = [];
    const warnings: { message: string; meta?: Record<string, unknown> }[] = [];

    const value = await exponentialBackoff(
      async (attempt) => {
        if (attempt === 1) {
          throw new Error('transient');
        }
        return attempt;
      },
      {
        sleep: async () => {},
        logger: { warn: (message, meta) => warnings.push({ message, meta }) },
        onRetry: (_error, attempt) => {
          attempts.push(attempt);
          throw new Error('hook failure');
        },
      },
    );

    assert.equal(value, 2);
    assert.deepEqual(attempts, [1]);
    assert.deepEqual(warnings, [
      { message: 'retry.hook.failed', meta: { attempt: 1, error: 'hook failure' } },
    ]);
  });
});

describe('computeDelay', () => {
  it('caps the delay at maxDelayMs', () => {
    assert.equal(computeDelay(1, { initialDelayMs: 1000, factor: 7 }), 1000);
    assert.equal(computeDelay(3, { initialDelayMs: 1000, factor: 7 }), 30_000);
    assert.equal(computeDelay(3, { initialDelayMs: 1000, factor: 7, maxDelayMs: 60_000 }), 49_000);
  });
});

describe('isRetryableStatus', () => {
  it('retries rate limits, server errors and transport failures only', () => {
    assert.equal(isRetryableStatus(withStatus(429)), true);
    assert.equal(isRetryableStatus(withStatus(500)), true);
    assert.equal(isRetryableStatus(withStatus(503)), true);
    assert.equal(isRetryableStatus(withStatus(504)), true);
    assert.equal(isRetryableStatus(withStatus(502)), false);
    assert.equal(isRetryableStatus(withStatus(401)), false);
    assert.equal(isRetryableStatus(new Error('socket hang up')), true);
  });
});
