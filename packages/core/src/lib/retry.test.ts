import { describe, expect, it, vi } from 'vitest';
import { withRetry } from './retry';

class BusyError extends Error {
  code = 'SQLITE_BUSY';
}

const isBusy = (error: unknown) => error instanceof BusyError;

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const operation = vi.fn(async () => 42);

    await expect(withRetry(operation, isBusy, 3, 0)).resolves.toBe(42);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries transient errors until the operation succeeds', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new BusyError('database is locked'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, isBusy, 3, 0)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt', async () => {
    const operation = vi.fn(async () => {
      throw new BusyError('database is locked');
    });

    await expect(withRetry(operation, isBusy, 3, 0)).rejects.toThrow('database is locked');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const operation = vi.fn(async () => {
      throw new Error('syntax error');
    });

    await expect(withRetry(operation, isBusy, 3, 0)).rejects.toThrow('syntax error');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
