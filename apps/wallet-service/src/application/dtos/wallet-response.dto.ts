import { Expose, Type } from 'class-transformer';

/**
 * Response DTO for a completed credit or debit.
 * Money values are decimal strings with two fractional digits.
 */
export class WalletMutationResponseDto {
  @Expose()
  userId!: string;

  @Expose()
  walletId!: string;

  @Expose()
  transactionId!: string;

  @Expose()
  type!: string;

  @Expose()
  amount!: string;

  @Expose()
  description!: string;

  @Expose()
  previousBalance!: string;

  @Expose()
  newBalance!: string;

  @Expose()
  updatedAt!: string;
}

export class BalanceResponseDto {
  @Expose()
  userId!: string;

  @Expose()
  walletId!: string;

  @Expose()
  balance!: string;

  @Expose()
  updatedAt!: string;
}

export class TransactionResponseDto {
  @Expose()
  id!: string;

  @Expose()
  amount!: string;

  @Expose()
  type!: string;

  @Expose()
  description!: string | null;

  @Expose()
  createdAt!: string;
}

export class SummaryResponseDto {
  @Expose()
  totalTransactions!: number;

  @Expose()
  filteredCount!: number;

  @Expose()
  totalCredits!: string;

  @Expose()
  totalDebits!: string;

  @Expose()
  netBalance!: string;
}

export class HistoryUserDto {
  @Expose()
  id!: string;

  @Expose()
  name!: string;

  @Expose()
  email!: string;

  @Expose()
  phone!: string;

  @Expose()
  currentBalance!: string;
}

export class FiltersAppliedDto {
  @Expose()
  type!: string;

  @Expose()
  limit!: number;
}

export class TransactionHistoryResponseDto {
  @Expose()
  @Type(() => HistoryUserDto)
  user!: HistoryUserDto;

  @Expose()
  @Type(() => SummaryResponseDto)
  summary!: SummaryResponseDto;

  @Expose()
  @Type(() => FiltersAppliedDto)
  filtersApplied!: FiltersAppliedDto;

  @Expose()
  @Type(() => TransactionResponseDto)
  transactions!: TransactionResponseDto[];
}
