import { Inject, Injectable } from '@nestjs/common';
import { v7 as uuidv7 } from 'uuid';
import {
  CLOCK,
  InvalidAmountError,
  resolveHistoryLimit,
  type Clock,
  type Money,
  type TransactionType,
} from '@app/common';
import { Transaction } from '../../domain/entities/transaction.entity';
import {
  TRANSACTION_REPOSITORY,
  type TransactionAggregate,
  type TransactionRepository,
} from '../../domain/repositories/transaction.repository';

export interface ListTransactionsOptions {
  readonly type?: TransactionType;
  /** Raw requested size; see {@link resolveHistoryLimit}. */
  readonly limit?: string | number | null;
}

/**
 * Append-only log of wallet transactions.
 */
@Injectable()
export class TransactionLogService {
  constructor(
    @Inject(TRANSACTION_REPOSITORY)
    private readonly transactionRepository: TransactionRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Record a new immutable transaction.
   *
   * @param repository - Repository of an open unit of work, so the append
   * commits together with the caller's balance update
   * @throws InvalidAmountError if `amount` is not strictly positive
   */
  async append(
    walletId: string,
    amount: Money,
    type: TransactionType,
    description: string | null,
    repository: TransactionRepository = this.transactionRepository,
  ): Promise<Transaction> {
    if (!amount.isPositive()) {
      throw new InvalidAmountError(
        `Transaction amount must be greater than 0: ${amount.toString()}`,
      );
    }

    const transaction = Transaction.create({
      transactionId: uuidv7(),
      walletId,
      amount,
      type,
      description,
      createdAt: this.clock.now(),
    });

    return repository.append(transaction);
  }

  /**
   * Newest-first transactions of a wallet. Each call re-reads the store.
   */
  async listFor(
    walletId: string,
    options: ListTransactionsOptions = {},
  ): Promise<Transaction[]> {
    return this.transactionRepository.listByWallet(walletId, {
      type: options.type,
      limit: resolveHistoryLimit(options.limit),
    });
  }

  /**
   * Totals over the wallet's full, unfiltered log.
   */
  async aggregate(walletId: string): Promise<TransactionAggregate> {
    return this.transactionRepository.aggregateByWallet(walletId);
  }
}
