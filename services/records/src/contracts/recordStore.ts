import type { CreateRecordArgs, ListQuery, RecordEntity, RecordId, RecordPatch } from '../types';

/** Options for the one-time schema bootstrap. */
export interface InitializeOptions {
  attempts?: number;
  delayMs?: number;
  onRetry?: (attempt: number, attempts: number, err: Error) => void;
}

/**
 * Durable storage for records behind a minimal query surface.
 * Each call opens its own connection and runs a single statement.
 */
export interface RecordStore {
  /** Creates the table if absent. Safe to call on every start. */
  initialize(opts?: InitializeOptions): Promise<void>;
  /** Newest first (`id` descending). */
  listAll(query?: ListQuery): Promise<RecordEntity[]>;
  count(search?: string): Promise<number>;
  findByExternalKey(key: string, excludeId?: RecordId): Promise<RecordEntity | null>;
  findById(id: RecordId): Promise<RecordEntity | null>;
  /** Returns the assigned id; throws `ConstraintViolationError` on a duplicate key. */
  insert(args: CreateRecordArgs): Promise<RecordId>;
  /** Returns affected rows (0 or 1). */
  update(id: RecordId, patch: RecordPatch): Promise<number>;
  /** Returns affected rows (0 or 1). */
  delete(id: RecordId): Promise<number>;
}

