import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { ConstraintViolationError, StoreError, StoreUnavailableError, errorMessage } from '../errors';
import type { Connector, QueryResult, SqlConnection, SqlParam } from './connection';

const MEMORY_PATH = ':memory:';

/**
 * File-backed connector. better-sqlite3 is synchronous; the async surface
 * matches the PostgreSQL connector so the store stays driver-agnostic.
 *
 * Each `open()` opens the file and each `close()` closes it. An in-memory
 * database lives as long as the connector instead, so every connection
 * sees the same data.
 */
export class SqliteConnector implements Connector {
  readonly dialect = 'sqlite' as const;
  private memoryDb?: Database.Database;

  constructor(private readonly path: string) {}

  async open(): Promise<SqlConnection> {
    try {
      if (this.path === MEMORY_PATH) {
        if (!this.memoryDb) this.memoryDb = openDatabase(MEMORY_PATH);
        return new SqliteConnection(this.memoryDb, true);
      }
      mkdirSync(dirname(this.path), { recursive: true });
      return new SqliteConnection(openDatabase(this.path), false);
    } catch (err) {
      throw new StoreUnavailableError(`Cannot open SQLite database at ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

// built-in LOWER() only folds ASCII
function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  db.function('LOWER', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );
  return db;
}

class SqliteConnection implements SqlConnection {
  constructor(
    private readonly db: Database.Database,
    private readonly shared: boolean,
  ) {}

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<QueryResult<T>> {
    try {
      const stmt = this.db.prepare<SqlParam[], T>(toSqlitePlaceholders(sql));
      if (stmt.reader) {
        // SELECT, or a write with RETURNING
        const rows = stmt.all(...params);
        return { rows, rowCount: rows.length };
      }
      const info = stmt.run(...params);
      return { rows: [], rowCount: info.changes };
    } catch (err) {
      if (sqliteCode(err)?.startsWith('SQLITE_CONSTRAINT_UNIQUE')) {
        throw new ConstraintViolationError(errorMessage(err), { cause: err });
      }
      throw new StoreError(`SQLite statement failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (!this.shared && this.db.open) this.db.close();
  }
}

/** `$1, $2, ...` → `?`; callers bind parameters in placeholder order. */
export function toSqlitePlaceholders(sql: string): string {
  return sql.replace(/\$\d+/g, '?');
}

function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}
