import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  UserNotFoundError,
  resolveHistoryLimit,
  type Money,
  type TransactionType,
} from '@app/common';
import type { Transaction } from '../../domain/entities/transaction.entity';
import type { User } from '../../domain/entities/user.entity';
import type { Wallet } from '../../domain/entities/wallet.entity';
import {
  USER_REPOSITORY,
  type UserRepository,
} from '../../domain/repositories/user.repository';
import {
  WALLET_REPOSITORY,
  type WalletRepository,
} from '../../domain/repositories/wallet.repository';
import { TransactionLogService } from './transaction-log.service';

export interface HistoryQuery {
  readonly type?: TransactionType;
  readonly limit?: string | number | null;
}

export interface WalletBalance {
  readonly userId: string;
  readonly walletId: string;
  readonly balance: Money;
  readonly updatedAt: Date;
}

/**
 * Summary over a wallet's full log. `totalCount` covers every transaction;
 * `filteredCount` only the entries returned by the accompanying listing.
 */
export interface WalletSummary {
  readonly totalCredits: Money;
  readonly totalDebits: Money;
  readonly net: Money;
  readonly totalCount: number;
  readonly filteredCount: number;
}

export interface WalletHistory {
  readonly user: User;
  readonly currentBalance: Money;
  readonly transactions: Transaction[];
  readonly summary: WalletSummary;
  readonly filters: {
    readonly type: TransactionType | null;
    readonly limit: number;
  };
}

/**
 * Read-only views over wallets and their transaction logs.
 */
@Injectable()
export class WalletQueryService {
  private readonly logger = new Logger(WalletQueryService.name);

  constructor(
    @Inject(USER_REPOSITORY)
    private readonly userRepository: UserRepository,
    @Inject(WALLET_REPOSITORY)
    private readonly walletRepository: WalletRepository,
    private readonly transactionLog: TransactionLogService,
  ) {}

  /**
   * Stored balance of the user's wallet. Not recomputed from the log.
   */
  async balanceOf(userId: string): Promise<WalletBalance> {
    const wallet = await this.requireWallet(userId);
    return {
      userId,
      walletId: wallet.walletId,
      balance: wallet.balance,
      updatedAt: wallet.updatedAt,
    };
  }

  async historyOf(
    userId: string,
    query: HistoryQuery = {},
  ): Promise<WalletHistory> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    const wallet = await this.requireWallet(userId);

    const limit = resolveHistoryLimit(query.limit);
    const transactions = await this.transactionLog.listFor(wallet.walletId, {
      type: query.type,
      limit,
    });
    const summary = await this.summarize(wallet.walletId, transactions.length);

    this.logger.debug(
      `History for wallet ${wallet.walletId}: ${String(transactions.length)} of ${String(summary.totalCount)} transactions`,
    );

    return {
      user,
      currentBalance: wallet.balance,
      transactions,
      summary,
      filters: { type: query.type ?? null, limit },
    };
  }

  /**
   * Totals over the unfiltered log. `filteredCount` reflects `query`
   * (no type filter and the default limit when omitted).
   */
  async summaryOf(
    userId: string,
    query: HistoryQuery = {},
  ): Promise<WalletSummary> {
    const wallet = await this.requireWallet(userId);
    const listed = await this.transactionLog.listFor(wallet.walletId, query);
    return this.summarize(wallet.walletId, listed.length);
  }

  private async summarize(
    walletId: string,
    filteredCount: number,
  ): Promise<WalletSummary> {
    const aggregate = await this.transactionLog.aggregate(walletId);
    return {
      totalCredits: aggregate.totalCredits,
      totalDebits: aggregate.totalDebits,
      net: aggregate.totalCredits.minus(aggregate.totalDebits),
      totalCount: aggregate.count,
      filteredCount,
    };
  }

  private async requireWallet(userId: string): Promise<Wallet> {
    const wallet = await this.walletRepository.findByUserId(userId);
    if (!wallet) {
      throw new UserNotFoundError(userId);
    }
    return wallet;
  }
}
