// Wallet transaction types
export enum TransactionType {
  CREDIT = 'CREDIT',
  DEBIT = 'DEBIT',
}

// History listing
export const DEFAULT_HISTORY_LIMIT = 50;

// Per-transaction limits, overridable through configuration
export const DEFAULT_MIN_TRANSACTION_AMOUNT = '0.01';
export const DEFAULT_MAX_TRANSACTION_AMOUNT = '10000.00';

// Row lock wait before a mutation gives up with a retryable storage failure
export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;

/** Optional `+`, then 7 to 15 digits with a non-zero first digit. */
export const PHONE_PATTERN = /^\+?[1-9]\d{6,14}$/;

export const MAX_NAME_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 500;

// Service Ports
export const SERVICE_PORTS = {
  WALLET_SERVICE: 3001,
} as const;
