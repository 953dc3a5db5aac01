import type { SqlDialect } from '../db/connection';

export const TABLE = 'records';

// external_key UNIQUE is the backstop for the service's pre-check
const CREATE_TABLE: Record<SqlDialect, string> = {
  sqlite: `
    CREATE TABLE IF NOT EXISTS ${TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      external_key TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      rights TEXT,
      status TEXT,
      remarks TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )`,
  postgres: `
    CREATE TABLE IF NOT EXISTS ${TABLE} (
      id SERIAL PRIMARY KEY,
      external_key VARCHAR(50) NOT NULL UNIQUE,
      name VARCHAR(100) NOT NULL,
      rights VARCHAR(50),
      status VARCHAR(50),
      remarks VARCHAR(500),
      created_at BIGINT NOT NULL,
      updated_at BIGINT NOT NULL
    )`,
};

export function createTableSql(dialect: SqlDialect): string {
  return CREATE_TABLE[dialect];
}

export const SELECT_COLUMNS =
  'id, external_key, name, rights, status, remarks, created_at, updated_at';

/** Row shape as drivers return it; pg hands BIGINT back as a string. */
export interface RecordRow {
  id: number | string;
  external_key: string;
  name: string;
  rights: string | null;
  status: string | null;
  remarks: string | null;
  created_at: number | string;
  updated_at: number | string;
}
