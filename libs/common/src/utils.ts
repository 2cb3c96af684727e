import { DEFAULT_HISTORY_LIMIT, TransactionType } from './constants';

/**
 * Resolve a requested history size.
 *
 * Missing, unparsable, fractional or non-positive values fall back to
 * {@link DEFAULT_HISTORY_LIMIT}; they are never truncated to zero.
 */
export function resolveHistoryLimit(raw?: string | number | null): number {
  if (raw == null) {
    return DEFAULT_HISTORY_LIMIT;
  }
  const text = String(raw).trim();
  if (!/^[+-]?\d+$/.test(text)) {
    return DEFAULT_HISTORY_LIMIT;
  }
  const limit = Number(text);
  return Number.isSafeInteger(limit) && limit > 0
    ? limit
    : DEFAULT_HISTORY_LIMIT;
}

/**
 * Parse a transaction type filter, case-insensitively.
 * Anything other than CREDIT or DEBIT means "all types".
 */
export function parseTransactionType(
  raw?: string | null,
): TransactionType | undefined {
  switch (raw?.trim().toUpperCase()) {
    case TransactionType.CREDIT:
      return TransactionType.CREDIT;
    case TransactionType.DEBIT:
      return TransactionType.DEBIT;
    default:
      return undefined;
  }
}
