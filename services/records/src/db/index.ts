// src/db/index.ts
import type { AppConfig } from '../config';
import type { Connector } from './connection';
import { PostgresConnector } from './postgres';
import { SqliteConnector } from './sqlite';

export function createConnector(store: AppConfig['store']): Connector {
  switch (store.driver) {
    case 'sqlite':
      return new SqliteConnector(store.sqlitePath);
    case 'postgres':
      if (!store.databaseUrl) throw new Error('DATABASE_URL is required for the postgres driver');
      return new PostgresConnector(store.databaseUrl);
    default:
      throw new Error(`Unsupported store driver: ${String(store.driver)}`);
  }
}

export * from './connection';
