import type { Money, TransactionType } from '@app/common';
import type { Transaction } from '../entities/transaction.entity';

export const TRANSACTION_REPOSITORY = Symbol('TRANSACTION_REPOSITORY');

export interface TransactionListOptions {
  readonly type?: TransactionType;
  readonly limit: number;
}

export interface TransactionAggregate {
  readonly totalCredits: Money;
  readonly totalDebits: Money;
  readonly count: number;
}

/**
 * Append-only store of wallet transactions. Entries are never updated or
 * deleted through it.
 */
export interface TransactionRepository {
  append(transaction: Transaction): Promise<Transaction>;
  /**
   * List a wallet's transactions newest-first (creation time, then
   * insertion order), optionally restricted to one type.
   */
  listByWallet(
    walletId: string,
    options: TransactionListOptions,
  ): Promise<Transaction[]>;
  /**
   * Sum every transaction of the wallet, ignoring any listing filter.
   */
  aggregateByWallet(walletId: string): Promise<TransactionAggregate>;
}
