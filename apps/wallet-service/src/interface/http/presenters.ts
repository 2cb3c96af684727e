import { plainToInstance } from 'class-transformer';
import type { RegisteredUser } from '../../application/services/user-registry.service';
import type { LedgerMutationResult } from '../../application/services/wallet-ledger.service';
import type {
  WalletBalance,
  WalletHistory,
  WalletSummary,
} from '../../application/services/wallet-query.service';
import {
  UserListResponseDto,
  UserResponseDto,
} from '../../application/dtos/user-response.dto';
import {
  BalanceResponseDto,
  SummaryResponseDto,
  TransactionHistoryResponseDto,
  WalletMutationResponseDto,
} from '../../application/dtos/wallet-response.dto';

const TO_DTO = { excludeExtraneousValues: true } as const;

function userPlain({ user, balance }: RegisteredUser): Record<string, unknown> {
  return {
    id: user.userId,
    name: user.name,
    email: user.email,
    phone: user.phone,
    walletBalance: balance.toString(),
    createdAt: user.createdAt.toISOString(),
  };
}

function summaryPlain(summary: WalletSummary): Record<string, unknown> {
  return {
    totalTransactions: summary.totalCount,
    filteredCount: summary.filteredCount,
    totalCredits: summary.totalCredits.toString(),
    totalDebits: summary.totalDebits.toString(),
    netBalance: summary.net.toString(),
  };
}

export function presentUser(registered: RegisteredUser): UserResponseDto {
  return plainToInstance(UserResponseDto, userPlain(registered), TO_DTO);
}

export function presentUsers(users: RegisteredUser[]): UserListResponseDto {
  return plainToInstance(
    UserListResponseDto,
    { count: users.length, users: users.map(userPlain) },
    TO_DTO,
  );
}

export function presentMutation(
  result: LedgerMutationResult,
): WalletMutationResponseDto {
  return plainToInstance(
    WalletMutationResponseDto,
    {
      userId: result.userId,
      walletId: result.walletId,
      transactionId: result.transactionId,
      type: result.type,
      amount: result.amount.toString(),
      description: result.description,
      previousBalance: result.previousBalance.toString(),
      newBalance: result.newBalance.toString(),
      updatedAt: result.updatedAt.toISOString(),
    },
    TO_DTO,
  );
}

export function presentBalance(balance: WalletBalance): BalanceResponseDto {
  return plainToInstance(
    BalanceResponseDto,
    {
      userId: balance.userId,
      walletId: balance.walletId,
      balance: balance.balance.toString(),
      updatedAt: balance.updatedAt.toISOString(),
    },
    TO_DTO,
  );
}

export function presentSummary(summary: WalletSummary): SummaryResponseDto {
  return plainToInstance(SummaryResponseDto, summaryPlain(summary), TO_DTO);
}

export function presentHistory(
  history: WalletHistory,
): TransactionHistoryResponseDto {
  return plainToInstance(
    TransactionHistoryResponseDto,
    {
      user: {
        id: history.user.userId,
        name: history.user.name,
        email: history.user.email,
        phone: history.user.phone,
        currentBalance: history.currentBalance.toString(),
      },
      summary: summaryPlain(history.summary),
      filtersApplied: {
        type: history.filters.type ?? 'ALL',
        limit: history.filters.limit,
      },
      transactions: history.transactions.map((transaction) => ({
        id: transaction.transactionId,
        amount: transaction.amount.toString(),
        type: transaction.type,
        description: transaction.description,
        createdAt: transaction.createdAt.toISOString(),
      })),
    },
    TO_DTO,
  );
}
