import { DEFAULT_HISTORY_LIMIT, TransactionType } from './constants';
import { parseTransactionType, resolveHistoryLimit } from './utils';

describe('resolveHistoryLimit', () => {
  it('should default when no limit is given', () => {
    expect(resolveHistoryLimit()).toBe(DEFAULT_HISTORY_LIMIT);
    expect(resolveHistoryLimit(null)).toBe(DEFAULT_HISTORY_LIMIT);
  });

  it('should accept positive integers as strings or numbers', () => {
    expect(resolveHistoryLimit('10')).toBe(10);
    expect(resolveHistoryLimit(3)).toBe(3);
    expect(resolveHistoryLimit(' 7 ')).toBe(7);
    expect(resolveHistoryLimit('+4')).toBe(4);
  });

  it.each([0, -5, '0', '-5', '2.5', 2.5, 'abc', ''])(
    'should fall back to the default for %p',
    (raw) => {
      expect(resolveHistoryLimit(raw)).toBe(DEFAULT_HISTORY_LIMIT);
    },
  );
});

describe('parseTransactionType', () => {
  it('should match types case-insensitively', () => {
    expect(parseTransactionType('credit')).toBe(TransactionType.CREDIT);
    expect(parseTransactionType(' Debit ')).toBe(TransactionType.DEBIT);
    expect(parseTransactionType('DEBIT')).toBe(TransactionType.DEBIT);
  });

  it('should treat anything else as all types', () => {
    expect(parseTransactionType('ALL')).toBeUndefined();
    expect(parseTransactionType('refund')).toBeUndefined();
    expect(parseTransactionType(undefined)).toBeUndefined();
    expect(parseTransactionType(null)).toBeUndefined();
  });
});
