/**
 * Error taxonomy for catalog and sales operations.
 * Operations return SalesResult; the menu prints error.message and carries on.
 */

export type SalesErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_STOCK'
  | 'REFERENTIAL_CONFLICT'
  | 'STORAGE_CORRUPT';

export class SalesError extends Error {
  constructor(
    public readonly code: SalesErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'SalesError';
  }
}

export class InvalidInputError extends SalesError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends SalesError {
  constructor(
    public readonly entity: 'Product' | 'Client' | 'Vendor',
    public readonly id: number
  ) {
    super('NOT_FOUND', `${entity} ${id} not found.`);
    this.name = 'NotFoundError';
  }
}

export class InsufficientStockError extends SalesError {
  constructor(
    public readonly productName: string,
    public readonly available: number
  ) {
    super('INSUFFICIENT_STOCK', `Only ${available} units of ${productName} left in stock.`);
    this.name = 'InsufficientStockError';
  }
}

export class ReferentialConflictError extends SalesError {
  constructor(
    public readonly entity: 'Product' | 'Client' | 'Vendor',
    public readonly id: number
  ) {
    super('REFERENTIAL_CONFLICT', `${entity} ${id} has associated sales and cannot be deleted.`);
    this.name = 'ReferentialConflictError';
  }
}

/** Logged by the record store when a file cannot be decoded; never returned to callers. */
export class StorageCorruptError extends SalesError {
  constructor(public readonly file: string, cause?: unknown) {
    super('STORAGE_CORRUPT', `File ${file} is corrupt or empty. Starting with an empty collection.`);
    this.name = 'StorageCorruptError';
    if (cause !== undefined) this.cause = cause;
  }
}

export type SalesResult<T> = { ok: true; value: T } | { ok: false; error: SalesError };

export function ok<T>(value: T): SalesResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: SalesError): SalesResult<T> {
  return { ok: false, error };
}
