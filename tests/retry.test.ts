import { describe, expect, it } from 'vitest';
import { SourceApiError } from '../src/errors.js';
import { SOURCE_RETRY_POLICY, exponentialBackoff, isRetryableSourceError, withRetry } from '../src/retry.js';

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    }
  };
}

describe('exponentialBackoff', () => {
  it('doubles from the initial delay and caps at the maximum', () => {
    const backoff = exponentialBackoff(1000, 4000);
    expect([1, 2, 3, 4].map(backoff)).toEqual([1000, 2000, 4000, 4000]);
  });
});

describe('isRetryableSourceError', () => {
  it('retries only source errors marked retryable', () => {
    expect(isRetryableSourceError(new SourceApiError('down', { status: 503, retryable: true }))).toBe(true);
    expect(isRetryableSourceError(new SourceApiError('missing', { status: 404, retryable: false }))).toBe(false);
    expect(isRetryableSourceError(new Error('other'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('gives up after maxAttempts and rethrows the last error', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const result = withRetry(
      async () => {
        calls++;
        throw new SourceApiError(`attempt ${calls}`, { status: 503, retryable: true });
      },
      SOURCE_RETRY_POLICY,
      { sleep }
    );

    await expect(result).rejects.toThrow('attempt 3');
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('returns the first successful result', async () => {
    const { delays, sleep } = recordingSleep();

    const value = await withRetry(
      async (attempt) => {
        if (attempt === 1) throw new SourceApiError('timeout', { retryable: true });
        return 'ok';
      },
      SOURCE_RETRY_POLICY,
      { sleep }
    );

    expect(value).toBe('ok');
    expect(delays).toEqual([1000]);
  });

  it('does not retry terminal errors', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new SourceApiError('not found', { status: 404, retryable: false });
        },
        SOURCE_RETRY_POLICY,
        { sleep }
      )
    ).rejects.toThrow('not found');

    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  it('reports each retry to onRetry', async () => {
    const { sleep } = recordingSleep();
    const retries: Array<{ attempt: number; delayMs: number }> = [];

    await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new SourceApiError('busy', { status: 502, retryable: true });
        return attempt;
      },
      SOURCE_RETRY_POLICY,
      { sleep, onRetry: ({ attempt, delayMs }) => retries.push({ attempt, delayMs }) }
    );

    expect(retries).toEqual([
      { attempt: 1, delayMs: 1000 },
      { attempt: 2, delayMs: 2000 }
    ]);
  });
});
