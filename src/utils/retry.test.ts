import { backoffDelay, withRetry } from './retry';

describe('backoffDelay', () => {
  it('doubles from the minimum and stops at the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 2000, 20000))).toEqual([2000, 4000, 8000, 16000, 20000]);
  });
});

describe('withRetry', () => {
  const noSleep = async () => undefined;

  it('rethrows a non-retryable error without another attempt', async () => {
    const fn = jest.fn(async () => {
      throw new Error('fatal');
    });

    await expect(withRetry(fn, { attempts: 3, minDelayMs: 10, maxDelayMs: 100, shouldRetry: () => false, sleep: noSleep }))
      .rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports each retry with its attempt number and delay', async () => {
    const retries: Array<[number, number]> = [];
    let calls = 0;

    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new Error('flaky');
        return 'done';
      },
      {
        attempts: 3,
        minDelayMs: 10,
        maxDelayMs: 100,
        shouldRetry: () => true,
        sleep: noSleep,
        onRetry: (_error, attempt, delayMs) => retries.push([attempt, delayMs]),
      }
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(retries).toEqual([
      [1, 10],
      [2, 20],
    ]);
  });

  it('still makes one attempt when attempts is zero', async () => {
    const fn = jest.fn(async () => 'once');

    await expect(withRetry(fn, { attempts: 0, minDelayMs: 1, maxDelayMs: 1, shouldRetry: () => true, sleep: noSleep }))
      .resolves.toBe('once');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
