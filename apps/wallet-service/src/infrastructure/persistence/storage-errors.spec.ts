import { QueryFailedError, TypeORMError } from 'typeorm';
import {
  InsufficientFundsError,
  Money,
  StorageFailureError,
} from '@app/common';
import {
  PG_ERROR_CODES,
  driverErrorDetails,
  toLedgerError,
} from './storage-errors';

function queryFailed(
  message: string,
  details: { code?: string; constraint?: string } = {},
): QueryFailedError {
  return new QueryFailedError(
    'UPDATE "wallets" SET "balance" = $1',
    ['1000'],
    Object.assign(new Error(message), details),
  );
}

describe('storage errors', () => {
  describe('driverErrorDetails', () => {
    it('should read the SQLSTATE code and constraint', () => {
      const error = queryFailed('duplicate key', {
        code: PG_ERROR_CODES.UNIQUE_VIOLATION,
        constraint: 'UQ_users_email',
      });

      expect(driverErrorDetails(error)).toEqual({
        code: '23505',
        constraint: 'UQ_users_email',
      });
    });

    it('should leave missing details undefined', () => {
      expect(driverErrorDetails(queryFailed('boom'))).toEqual({
        code: undefined,
        constraint: undefined,
      });
    });
  });

  describe('toLedgerError', () => {
    it('should pass ledger errors through', () => {
      const error = new InsufficientFundsError(Money.of('1'), Money.of('2'));

      expect(toLedgerError(error)).toBe(error);
    });

    it.each([
      PG_ERROR_CODES.LOCK_NOT_AVAILABLE,
      PG_ERROR_CODES.SERIALIZATION_FAILURE,
      PG_ERROR_CODES.DEADLOCK_DETECTED,
    ])('should mark SQLSTATE %s as retryable', (code) => {
      const cause = queryFailed('could not obtain lock', { code });

      const mapped = toLedgerError(cause);

      expect(mapped).toBeInstanceOf(StorageFailureError);
      expect(mapped).toMatchObject({ retryable: true, cause });
    });

    it('should mark other query failures as not retryable', () => {
      const mapped = toLedgerError(
        queryFailed('check constraint violated', { code: '23514' }),
      );

      expect(mapped).toBeInstanceOf(StorageFailureError);
      expect(mapped).toMatchObject({
        retryable: false,
        message: 'Storage operation failed (23514): check constraint violated',
      });
    });

    it('should wrap other TypeORM errors', () => {
      const mapped = toLedgerError(new TypeORMError('connection lost'));

      expect(mapped).toMatchObject({
        retryable: false,
        message: 'Storage operation failed: connection lost',
      });
    });

    it('should leave unrelated errors alone', () => {
      const error = new RangeError('unexpected');

      expect(toLedgerError(error)).toBe(error);
    });
  });
});
