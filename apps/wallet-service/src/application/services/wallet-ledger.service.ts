import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Retryable,
  BackOffPolicy,
  type RetryOptions,
} from 'typescript-retry-decorator';
import {
  CLOCK,
  DEFAULT_MAX_TRANSACTION_AMOUNT,
  DEFAULT_MIN_TRANSACTION_AMOUNT,
  InsufficientFundsError,
  InvalidAmountError,
  Money,
  TransactionType,
  UserNotFoundError,
  isRetryableStorageFailure,
  type Clock,
} from '@app/common';
import {
  UNIT_OF_WORK,
  type UnitOfWork,
} from '../../domain/repositories/unit-of-work';
import { TransactionLogService } from './transaction-log.service';

/** Retry configuration for lock contention on the wallet row */
export const LEDGER_RETRY_CONFIG = {
  maxAttempts: 3,
  backOffPolicy: BackOffPolicy.ExponentialBackOffPolicy,
  backOff: 100,
  exponentialOption: { maxInterval: 2000, multiplier: 2 },
  doRetry: isRetryableStorageFailure,
  useOriginalError: true,
  useConsoleLogger: false,
} satisfies RetryOptions;

export interface LedgerMutationResult {
  readonly userId: string;
  readonly walletId: string;
  readonly transactionId: string;
  readonly type: TransactionType;
  readonly amount: Money;
  readonly description: string;
  readonly previousBalance: Money;
  readonly newBalance: Money;
  readonly updatedAt: Date;
}

/**
 * The only component allowed to change a wallet balance.
 *
 * Each credit or debit runs in one unit of work that locks the wallet row,
 * checks the funds, appends the transaction and writes the new balance.
 * Either all of it commits or none of it does.
 */
@Injectable()
export class WalletLedgerService {
  private readonly logger = new Logger(WalletLedgerService.name);
  private readonly minAmount: Money;
  private readonly maxAmount: Money;

  constructor(
    @Inject(UNIT_OF_WORK)
    private readonly unitOfWork: UnitOfWork,
    private readonly transactionLog: TransactionLogService,
    private readonly configService: ConfigService,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {
    this.minAmount = Money.of(
      this.configService.get<string>(
        'MIN_TRANSACTION_AMOUNT',
        DEFAULT_MIN_TRANSACTION_AMOUNT,
      ),
    );
    this.maxAmount = Money.of(
      this.configService.get<string>(
        'MAX_TRANSACTION_AMOUNT',
        DEFAULT_MAX_TRANSACTION_AMOUNT,
      ),
    );
  }

  async credit(
    userId: string,
    amount: Money,
    description?: string | null,
  ): Promise<LedgerMutationResult> {
    return this.applyMutation(
      userId,
      amount,
      TransactionType.CREDIT,
      description,
    );
  }

  /**
   * @throws InsufficientFundsError if the balance is lower than `amount`;
   * nothing is written in that case
   */
  async debit(
    userId: string,
    amount: Money,
    description?: string | null,
  ): Promise<LedgerMutationResult> {
    return this.applyMutation(userId, amount, TransactionType.DEBIT, description);
  }

  /**
   * Retried only for retryable storage failures; every other error
   * surfaces on the first attempt.
   */
  @Retryable(LEDGER_RETRY_CONFIG)
  private async applyMutation(
    userId: string,
    amount: Money,
    type: TransactionType,
    description?: string | null,
  ): Promise<LedgerMutationResult> {
    this.assertWithinLimits(amount);
    const entryDescription =
      description?.trim() || defaultDescription(type, amount);

    const result = await this.unitOfWork.run(async (repositories) => {
      const wallet = await repositories.wallets.findByUserIdForUpdate(userId);
      if (!wallet) {
        throw new UserNotFoundError(userId);
      }

      const previousBalance = wallet.balance;
      if (
        type === TransactionType.DEBIT &&
        previousBalance.lessThan(amount)
      ) {
        this.logger.warn(
          `Insufficient funds for user ${userId}: balance=${previousBalance.toString()}, requested=${amount.toString()}`,
        );
        throw new InsufficientFundsError(previousBalance, amount);
      }

      const newBalance =
        type === TransactionType.CREDIT
          ? previousBalance.plus(amount)
          : previousBalance.minus(amount);

      const transaction = await this.transactionLog.append(
        wallet.walletId,
        amount,
        type,
        entryDescription,
        repositories.transactions,
      );

      const updated = await repositories.wallets.updateBalance(
        wallet.walletId,
        newBalance,
        this.nextUpdatedAt(wallet.updatedAt),
      );

      return {
        userId,
        walletId: wallet.walletId,
        transactionId: transaction.transactionId,
        type,
        amount,
        description: entryDescription,
        previousBalance,
        newBalance: updated.balance,
        updatedAt: updated.updatedAt,
      };
    });

    this.logger.log(
      `${type} ${amount.toString()} on wallet ${result.walletId}: ${result.previousBalance.toString()} -> ${result.newBalance.toString()}`,
    );
    return result;
  }

  private assertWithinLimits(amount: Money): void {
    if (!amount.isPositive()) {
      throw new InvalidAmountError('Amount must be greater than 0');
    }
    if (amount.lessThan(this.minAmount)) {
      throw new InvalidAmountError(
        `Amount must be at least ${this.minAmount.toString()}`,
      );
    }
    if (amount.greaterThan(this.maxAmount)) {
      throw new InvalidAmountError(
        `Amount exceeds maximum limit of ${this.maxAmount.toString()}`,
      );
    }
  }

  // updatedAt never moves backwards, even if the clock does
  private nextUpdatedAt(previous: Date): Date {
    const now = this.clock.now();
    return now.getTime() > previous.getTime()
      ? now
      : new Date(previous.getTime() + 1);
  }
}

function defaultDescription(type: TransactionType, amount: Money): string {
  return type === TransactionType.CREDIT
    ? `Added ${amount.toString()} to wallet`
    : `Deducted ${amount.toString()} from wallet`;
}
