import type { Money, TransactionType } from '@app/common';

interface TransactionProps {
  readonly transactionId: string;
  readonly walletId: string;
  readonly amount: Money;
  readonly type: TransactionType;
  readonly description: string | null;
  readonly createdAt: Date;
}

/**
 * Domain entity representing one immutable entry of a wallet's
 * transaction log.
 *
 * Entries are only ever appended; the wallet balance always equals the
 * sum of its credits minus its debits.
 */
export class Transaction {
  readonly transactionId!: string;

  readonly walletId!: string;

  /** Always strictly positive; the direction comes from {@link type}. */
  readonly amount!: Money;

  readonly type!: TransactionType;

  readonly description!: string | null;

  readonly createdAt!: Date;

  /**
   * Factory method to create a new Transaction instance.
   */
  static create(props: TransactionProps): Transaction {
    return Object.freeze(Object.assign(new Transaction(), props));
  }
}
