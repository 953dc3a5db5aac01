import { StoreUnavailableError } from '../errors';

export type SqlDialect = 'sqlite' | 'postgres';
export type SqlParam = string | number | null;

export interface QueryResult<T> {
  rows: T[];
  /** Rows returned for reads, rows affected for writes. */
  rowCount: number;
}

/**
 * One open connection, used for a single store operation.
 * SQL is written with `$1..$n` placeholders, each used once and in order.
 */
export interface SqlConnection {
  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>>;
  close(): Promise<void>;
}

/** Opens connections; raises `StoreUnavailableError` when the database cannot be reached. */
export interface Connector {
  readonly dialect: SqlDialect;
  open(): Promise<SqlConnection>;
}

/**
 * Runs `fn` on a fresh connection and closes it on every exit path.
 */
export async function withConnection<T>(
  connector: Connector,
  fn: (conn: SqlConnection) => Promise<T>,
): Promise<T> {
  const conn = await connector.open();
  try {
    return await fn(conn);
  } finally {
    await conn.close();
  }
}

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  onRetry?: (attempt: number, attempts: number, err: StoreUnavailableError) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Retries `fn` while the store is unavailable, with a fixed delay between attempts.
 * Any other error is rethrown at once.
 */
export async function connectWithRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  const sleep = opts.sleep ?? defaultSleep;

  let lastError: StoreUnavailableError | undefined;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      lastError = err;
      if (attempt < attempts) {
        opts.onRetry?.(attempt, attempts, err);
        await sleep(opts.delayMs);
      }
    }
  }

  throw new StoreUnavailableError(
    `Failed to connect to the database after ${attempts} attempt(s): ${lastError?.message ?? 'unknown error'}`,
    { cause: lastError },
  );
}
