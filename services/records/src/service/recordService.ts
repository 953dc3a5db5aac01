import { ConstraintViolationError, DuplicateKeyError, NotFoundError, ValidationError } from '../errors';
import { serialize } from '../export/exporter';
import type { RecordStore } from '../contracts/recordStore';
import { MUTABLE_FIELDS } from '../types';
import type {
  CreateRecordArgs,
  ExportFormat,
  ListQuery,
  RecordEntity,
  RecordId,
  RecordPage,
  RecordPatch,
  UpdateRecordArgs,
} from '../types';

export interface RecordServiceOptions {
  defaultLimit?: number;
}

/**
 * Business rules on top of a `RecordStore`: external-key uniqueness,
 * partial updates and typed outcomes. Never logs and never retries;
 * callers decide how failures surface.
 */
export class RecordService {
  private readonly defaultLimit: number;

  constructor(private readonly store: RecordStore, opts: RecordServiceOptions = {}) {
    this.defaultLimit = opts.defaultLimit ?? 100;
  }

  async create(input: CreateRecordArgs): Promise<RecordEntity> {
    const existing = await this.store.findByExternalKey(input.externalKey);
    if (existing) throw new DuplicateKeyError(input.externalKey);

    let id: RecordId;
    try {
      id = await this.store.insert(input);
    } catch (err) {
      // lost a race with a concurrent create; the unique constraint caught it
      if (err instanceof ConstraintViolationError) throw new DuplicateKeyError(input.externalKey);
      throw err;
    }

    const created = await this.store.findById(id);
    if (!created) throw new NotFoundError(id);
    return created;
  }

  async update(id: RecordId, input: UpdateRecordArgs): Promise<RecordEntity> {
    const patch = toPatch(input);
    if (Object.keys(patch).length === 0) {
      throw new ValidationError('No fields provided for update.');
    }

    if (patch.externalKey !== undefined) {
      const holder = await this.store.findByExternalKey(patch.externalKey, id);
      if (holder) {
        throw new DuplicateKeyError(
          patch.externalKey,
          `External key '${patch.externalKey}' is already used by another record.`,
        );
      }
    }

    let affected: number;
    try {
      affected = await this.store.update(id, patch);
    } catch (err) {
      if (err instanceof ConstraintViolationError && patch.externalKey !== undefined) {
        throw new DuplicateKeyError(patch.externalKey);
      }
      throw err;
    }
    if (affected === 0) throw new NotFoundError(id);

    const updated = await this.store.findById(id);
    if (!updated) throw new NotFoundError(id);
    return updated;
  }

  async delete(id: RecordId): Promise<void> {
    const affected = await this.store.delete(id);
    if (affected === 0) throw new NotFoundError(id);
  }

  async get(id: RecordId): Promise<RecordEntity> {
    const record = await this.store.findById(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }

  /** Paged listing; blank search means no filter. */
  async list(query: ListQuery = {}): Promise<RecordPage> {
    const search = normalizeSearch(query.search);
    const skip = query.skip ?? 0;
    const limit = query.limit ?? this.defaultLimit;

    const [records, total] = await Promise.all([
      this.store.listAll({ search, skip, limit }),
      this.store.count(search),
    ]);
    return { records, total, skip, limit };
  }

  /** Full matching set; blank text returns every record. */
  async search(text?: string): Promise<RecordEntity[]> {
    return this.store.listAll({ search: normalizeSearch(text) });
  }

  async exportAll(format: ExportFormat): Promise<string> {
    const records = await this.store.listAll();
    return serialize(format, records);
  }

  async ping(): Promise<void> {
    await this.store.count();
  }
}

// blank means no filter; anything else is matched as given
function normalizeSearch(text: string | undefined): string | undefined {
  return text?.trim() ? text : undefined;
}

/** Keeps the declared fields that carry a value; null and '' mean unchanged. */
export function toPatch(input: UpdateRecordArgs): RecordPatch {
  const patch: RecordPatch = {};
  for (const field of MUTABLE_FIELDS) {
    const value = input[field];
    if (value === undefined || value === null || value === '') continue;
    patch[field] = value;
  }
  return patch;
}
