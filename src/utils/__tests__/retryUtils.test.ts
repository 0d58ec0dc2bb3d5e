import { retryDelayFor, withRetry } from '../retryUtils';

describe('retryDelayFor', () => {
  it('doubles from one second and caps at ten', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => retryDelayFor(attempt))).toEqual([1000, 2000, 4000, 8000, 10000]);
  });

  it('follows an explicit schedule and repeats its last entry', () => {
    const options = { delaysMs: [5, 10] };
    expect([1, 2, 3].map((attempt) => retryDelayFor(attempt, options))).toEqual([5, 10, 10]);
  });
});

describe('withRetry', () => {
  const sleep = jest.fn<Promise<void>, [number]>();

  beforeEach(() => {
    sleep.mockResolvedValue(undefined);
  });

  it('retries until the call succeeds', async () => {
    const error = new Error('unavailable');
    const fn = jest.fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(error)
      .mockRejectedValueOnce(error)
      .mockResolvedValueOnce('done');
    const onRetry = jest.fn();

    await expect(withRetry(fn, { sleep, onRetry })).resolves.toBe('done');

    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    expect(onRetry.mock.calls).toEqual([
      [error, 1, 1000],
      [error, 2, 2000],
    ]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(new Error('still down'));

    await expect(withRetry(fn, { maxAttempts: 2, sleep })).rejects.toThrow('still down');

    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('stops at the first error that should not be retried', async () => {
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(new Error('invalid'));

    await expect(withRetry(fn, { sleep, shouldRetry: () => false })).rejects.toThrow('invalid');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
