import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../src/config';
import type { AppConfig } from '../src/config';
import { SqliteConnector } from '../src/db/sqlite';
import { SqlRecordStore } from '../src/storage/sqlRecordStore';

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'records-test-'));
}

export function removeDir(dir: string) {
  rmSync(dir, { recursive: true, force: true });
}

/** Defaults from an empty environment, with a few sections swapped out. */
export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig({}), ...overrides };
}

export async function createSqliteStore(dir: string, now?: () => number): Promise<SqlRecordStore> {
  const store = new SqlRecordStore(new SqliteConnector(join(dir, 'db', 'records.db')), { now });
  await store.initialize();
  return store;
}
