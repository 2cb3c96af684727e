import { QueryFailedError, TypeORMError } from 'typeorm';
import { LedgerError, StorageFailureError } from '@app/common';

/** PostgreSQL SQLSTATE codes the ledger cares about */
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
  LOCK_NOT_AVAILABLE: '55P03',
  SERIALIZATION_FAILURE: '40001',
  DEADLOCK_DETECTED: '40P01',
} as const;

const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  PG_ERROR_CODES.LOCK_NOT_AVAILABLE,
  PG_ERROR_CODES.SERIALIZATION_FAILURE,
  PG_ERROR_CODES.DEADLOCK_DETECTED,
]);

/**
 * Extract the SQLSTATE code and constraint name reported by the pg driver.
 */
export function driverErrorDetails(error: QueryFailedError): {
  code?: string;
  constraint?: string;
} {
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return {};
  }
  const code =
    'code' in driverError && typeof driverError.code === 'string'
      ? driverError.code
      : undefined;
  const constraint =
    'constraint' in driverError && typeof driverError.constraint === 'string'
      ? driverError.constraint
      : undefined;
  return { code, constraint };
}

/**
 * Translate a failure raised inside a unit of work.
 *
 * Ledger errors pass through untouched. TypeORM and driver failures become
 * {@link StorageFailureError}, retryable for lock timeouts, serialization
 * failures and deadlocks. Anything else is rethrown as is.
 */
export function toLedgerError(error: unknown): unknown {
  if (error instanceof LedgerError) {
    return error;
  }
  if (error instanceof QueryFailedError) {
    const { code } = driverErrorDetails(error);
    const retryable = code !== undefined && RETRYABLE_CODES.has(code);
    return new StorageFailureError(
      `Storage operation failed${code ? ` (${code})` : ''}: ${error.message}`,
      retryable,
      error,
    );
  }
  if (error instanceof TypeORMError) {
    return new StorageFailureError(
      `Storage operation failed: ${error.message}`,
      false,
      error,
    );
  }
  return error;
}
