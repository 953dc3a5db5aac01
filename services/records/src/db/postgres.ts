import { Client } from 'pg';
import { ConstraintViolationError, StoreError, StoreUnavailableError, errorMessage } from '../errors';
import type { Connector, QueryResult, SqlConnection, SqlParam } from './connection';

const UNIQUE_VIOLATION = '23505';

/**
 * Network connector: one `pg.Client` per operation, ended on close.
 * No pool; the service opens and closes a connection per store call.
 */
export class PostgresConnector implements Connector {
  readonly dialect = 'postgres' as const;

  constructor(private readonly connectionString: string) {}

  async open(): Promise<SqlConnection> {
    const client = new Client({ connectionString: this.connectionString });
    try {
      await client.connect();
    } catch (err) {
      throw new StoreUnavailableError(`Cannot connect to PostgreSQL: ${errorMessage(err)}`, { cause: err });
    }
    return new PostgresConnection(client);
  }
}

class PostgresConnection implements SqlConnection {
  constructor(private readonly client: Client) {}

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<QueryResult<T>> {
    try {
      const result = await this.client.query(sql, params);
      const rows: T[] = result.rows;
      return { rows, rowCount: result.rowCount ?? rows.length };
    } catch (err) {
      if (pgCode(err) === UNIQUE_VIOLATION) {
        throw new ConstraintViolationError(errorMessage(err), { cause: err });
      }
      throw new StoreError(`PostgreSQL statement failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

function pgCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}
