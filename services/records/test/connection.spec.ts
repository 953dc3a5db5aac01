import { describe, expect, it, vi } from 'vitest';
import { connectWithRetry, withConnection } from '../src/db/connection';
import type { Connector, SqlConnection } from '../src/db/connection';
import { StoreError, StoreUnavailableError } from '../src/errors';

function fakeConnection(): SqlConnection & { close: ReturnType<typeof vi.fn> } {
  return {
    query: vi.fn(async () => ({ rows: [], rowCount: 0 })),
    close: vi.fn(async () => undefined),
  };
}

describe('withConnection', () => {
  it('closes the connection after a successful operation', async () => {
    const conn = fakeConnection();
    const connector: Connector = { dialect: 'sqlite', open: async () => conn };

    const result = await withConnection(connector, async () => 42);

    expect(result).toBe(42);
    expect(conn.close).toHaveBeenCalledTimes(1);
  });

  it('closes the connection when the operation throws', async () => {
    const conn = fakeConnection();
    const connector: Connector = { dialect: 'sqlite', open: async () => conn };

    await expect(
      withConnection(connector, async () => {
        throw new StoreError('statement failed');
      }),
    ).rejects.toThrow('statement failed');
    expect(conn.close).toHaveBeenCalledTimes(1);
  });

  it('does not run the operation when the connection cannot be opened', async () => {
    const fn = vi.fn();
    const connector: Connector = {
      dialect: 'postgres',
      open: async () => {
        throw new StoreUnavailableError('refused');
      },
    };

    await expect(withConnection(connector, fn)).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('connectWithRetry', () => {
  it('retries while the store is unavailable, with a fixed delay', async () => {
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new StoreUnavailableError('down'))
      .mockRejectedValueOnce(new StoreUnavailableError('down'))
      .mockResolvedValue('ready');

    const result = await connectWithRetry(fn, { attempts: 3, delayMs: 50, sleep, onRetry });

    expect(result).toBe('ready');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(50);
    expect(onRetry.mock.calls.map(([attempt, attempts]) => [attempt, attempts])).toEqual([
      [1, 3],
      [2, 3],
    ]);
  });

  it('fails with StoreUnavailableError once attempts are exhausted', async () => {
    const sleep = vi.fn(async () => undefined);
    const fn = vi.fn(async () => {
      throw new StoreUnavailableError('down');
    });

    const attempt = connectWithRetry(fn, { attempts: 3, delayMs: 10, sleep });

    await expect(attempt).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(attempt).rejects.toThrow('Failed to connect to the database after 3 attempt(s): down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry other errors', async () => {
    const sleep = vi.fn(async () => undefined);
    const fn = vi.fn(async () => {
      throw new StoreError('syntax error');
    });

    await expect(connectWithRetry(fn, { attempts: 5, delayMs: 10, sleep })).rejects.toThrow('syntax error');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('treats attempts below one as a single attempt', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(connectWithRetry(fn, { attempts: 0, delayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
