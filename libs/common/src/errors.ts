import type { Money } from './money';

/**
 * Machine-readable codes for every failure the ledger core reports.
 */
export enum LedgerErrorCode {
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  DUPLICATE_EMAIL = 'DUPLICATE_EMAIL',
  INVALID_USER_DETAILS = 'INVALID_USER_DETAILS',
  STORAGE_FAILURE = 'STORAGE_FAILURE',
}

/**
 * Base class for typed ledger failures. Callers switch on {@link code}
 * rather than on message text.
 */
export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed, non-positive, out-of-limit or over-precision amount. */
export class InvalidAmountError extends LedgerError {
  readonly code = LedgerErrorCode.INVALID_AMOUNT;
}

export class InsufficientFundsError extends LedgerError {
  readonly code = LedgerErrorCode.INSUFFICIENT_FUNDS;
  readonly shortfall: Money;

  constructor(
    readonly current: Money,
    readonly requested: Money,
  ) {
    super(
      `Insufficient funds: current=${current.toString()}, requested=${requested.toString()}`,
    );
    this.shortfall = requested.minus(current);
  }
}

export class UserNotFoundError extends LedgerError {
  readonly code = LedgerErrorCode.USER_NOT_FOUND;

  constructor(readonly userId: string) {
    super(`User not found: ${userId}`);
  }
}

export class DuplicateEmailError extends LedgerError {
  readonly code = LedgerErrorCode.DUPLICATE_EMAIL;

  constructor(readonly email: string) {
    super(`User with this email already exists: ${email}`);
  }
}

export class InvalidUserDetailsError extends LedgerError {
  readonly code = LedgerErrorCode.INVALID_USER_DETAILS;
}

/**
 * The backing store failed to commit an atomic unit.
 * Lock timeouts, serialization failures and deadlocks are `retryable`.
 */
export class StorageFailureError extends LedgerError {
  readonly code = LedgerErrorCode.STORAGE_FAILURE;

  constructor(
    message: string,
    readonly retryable: boolean,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export function isRetryableStorageFailure(error: unknown): boolean {
  return error instanceof StorageFailureError && error.retryable;
}
