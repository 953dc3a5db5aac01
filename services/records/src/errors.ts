export type RecordErrorCode =
  | 'validation_error'
  | 'duplicate_key'
  | 'not_found'
  | 'constraint_violation'
  | 'store_unavailable'
  | 'store_error';

/**
 * Base class for every failure the store and service report.
 * Carries a stable `code`; the HTTP layer alone decides the status.
 */
export class RecordError extends Error {
  constructor(
    public readonly code: RecordErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends RecordError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation_error', message, details);
  }
}

export class DuplicateKeyError extends RecordError {
  constructor(public readonly externalKey: string, message?: string) {
    super('duplicate_key', message ?? `Record with external key '${externalKey}' already exists.`, {
      externalKey,
    });
  }
}

export class NotFoundError extends RecordError {
  constructor(public readonly id: number) {
    super('not_found', `Record with ID ${id} not found.`, { id });
  }
}

/** Raised by a connector when the storage-level unique constraint rejects a write. */
export class ConstraintViolationError extends RecordError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('constraint_violation', message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class StoreUnavailableError extends RecordError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_unavailable', message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class StoreError extends RecordError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_error', message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
