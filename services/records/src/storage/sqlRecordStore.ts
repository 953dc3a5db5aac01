import { connectWithRetry, withConnection } from '../db/connection';
import type { Connector, SqlParam } from '../db/connection';
import type { InitializeOptions, RecordStore } from '../contracts/recordStore';
import type { CreateRecordArgs, ListQuery, MutableField, RecordEntity, RecordId, RecordPatch } from '../types';
import { MUTABLE_FIELDS } from '../types';
import { SELECT_COLUMNS, TABLE, createTableSql } from './schema';
import type { RecordRow } from './schema';

const COLUMN_BY_FIELD: Record<MutableField, string> = {
  externalKey: 'external_key',
  name: 'name',
  rights: 'rights',
  status: 'status',
  remarks: 'remarks',
};

export interface SqlRecordStoreOptions {
  /** Epoch-ms clock used for created_at / updated_at. */
  now?: () => number;
}

/**
 * Implements `RecordStore` over any `Connector`.
 * SQL is shared between dialects except for the DDL.
 */
export class SqlRecordStore implements RecordStore {
  private readonly now: () => number;

  constructor(private readonly connector: Connector, opts: SqlRecordStoreOptions = {}) {
    this.now = opts.now ?? Date.now;
  }

  async initialize(opts: InitializeOptions = {}): Promise<void> {
    const ddl = createTableSql(this.connector.dialect);
    await connectWithRetry(
      () => withConnection(this.connector, async (conn) => {
        await conn.query(ddl);
      }),
      {
        attempts: opts.attempts ?? 1,
        delayMs: opts.delayMs ?? 0,
        onRetry: opts.onRetry,
      },
    );
  }

  async listAll(query: ListQuery = {}): Promise<RecordEntity[]> {
    const params: SqlParam[] = [];
    let sql = `SELECT ${SELECT_COLUMNS} FROM ${TABLE}${this.searchClause(query.search, params)} ORDER BY id DESC`;

    // skip only applies together with limit
    if (query.limit !== undefined) {
      params.push(query.limit, query.skip ?? 0);
      sql += ` LIMIT $${params.length - 1} OFFSET $${params.length}`;
    }

    return withConnection(this.connector, async (conn) => {
      const { rows } = await conn.query<RecordRow>(sql, params);
      return rows.map(toEntity);
    });
  }

  async count(search?: string): Promise<number> {
    const params: SqlParam[] = [];
    const sql = `SELECT COUNT(*) AS total FROM ${TABLE}${this.searchClause(search, params)}`;
    return withConnection(this.connector, async (conn) => {
      const { rows } = await conn.query<{ total: number | string }>(sql, params);
      return Number(rows[0]?.total ?? 0);
    });
  }

  async findByExternalKey(key: string, excludeId?: RecordId): Promise<RecordEntity | null> {
    const params: SqlParam[] = [key];
    let sql = `SELECT ${SELECT_COLUMNS} FROM ${TABLE} WHERE external_key = $1`;
    if (excludeId !== undefined) {
      params.push(excludeId);
      sql += ' AND id <> $2';
    }
    sql += ' LIMIT 1';

    return withConnection(this.connector, async (conn) => {
      const { rows } = await conn.query<RecordRow>(sql, params);
      return rows[0] ? toEntity(rows[0]) : null;
    });
  }

  async findById(id: RecordId): Promise<RecordEntity | null> {
    return withConnection(this.connector, async (conn) => {
      const { rows } = await conn.query<RecordRow>(
        `SELECT ${SELECT_COLUMNS} FROM ${TABLE} WHERE id = $1`,
        [id],
      );
      return rows[0] ? toEntity(rows[0]) : null;
    });
  }

  async insert(args: CreateRecordArgs): Promise<RecordId> {
    const ts = this.now();
    return withConnection(this.connector, async (conn) => {
      const { rows } = await conn.query<{ id: number | string }>(
        `INSERT INTO ${TABLE} (external_key, name, rights, status, remarks, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING id`,
        [args.externalKey, args.name, args.rights ?? null, args.status ?? null, args.remarks ?? null, ts, ts],
      );
      const row = rows[0];
      if (!row) throw new Error('insert returned no id');
      return Number(row.id);
    });
  }

  async update(id: RecordId, patch: RecordPatch): Promise<number> {
    const sets: string[] = [];
    const params: SqlParam[] = [];

    for (const field of MUTABLE_FIELDS) {
      const value = patch[field];
      if (value === undefined) continue;
      params.push(value);
      sets.push(`${COLUMN_BY_FIELD[field]} = $${params.length}`);
    }
    params.push(this.now());
    sets.push(`updated_at = $${params.length}`);
    params.push(id);

    const sql = `UPDATE ${TABLE} SET ${sets.join(', ')} WHERE id = $${params.length}`;
    return withConnection(this.connector, async (conn) => {
      const { rowCount } = await conn.query(sql, params);
      return rowCount;
    });
  }

  async delete(id: RecordId): Promise<number> {
    return withConnection(this.connector, async (conn) => {
      const { rowCount } = await conn.query(`DELETE FROM ${TABLE} WHERE id = $1`, [id]);
      return rowCount;
    });
  }

  /** Appends the case-insensitive substring filter (if any) and its params. */
  private searchClause(search: string | undefined, params: SqlParam[]): string {
    if (!search?.trim()) return '';
    const pattern = `%${escapeLike(search.toLowerCase())}%`;
    params.push(pattern, pattern);
    return ` WHERE LOWER(external_key) LIKE $${params.length - 1} ESCAPE '\\' OR LOWER(name) LIKE $${params.length} ESCAPE '\\'`;
  }
}

/** `%`, `_` and `\` in user text match literally. */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toEntity(row: RecordRow): RecordEntity {
  const entity: RecordEntity = {
    id: Number(row.id),
    externalKey: row.external_key,
    name: row.name,
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
  if (row.rights !== null) entity.rights = row.rights;
  if (row.status !== null) entity.status = row.status;
  if (row.remarks !== null) entity.remarks = row.remarks;
  return entity;
}
