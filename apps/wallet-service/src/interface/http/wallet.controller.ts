import { Controller, Get, Put, Body, Param, Query } from '@nestjs/common';
import { Money, TransactionType, parseTransactionType } from '@app/common';
import { WalletLedgerService } from '../../application/services/wallet-ledger.service';
import { WalletQueryService } from '../../application/services/wallet-query.service';
import { UpdateWalletDto } from '../../application/dtos/update-wallet.dto';
import { UserParams } from '../../application/dtos/user-params.dto';
import { HistoryQueryDto } from '../../application/dtos/history-query.dto';
import type {
  BalanceResponseDto,
  SummaryResponseDto,
  TransactionHistoryResponseDto,
  WalletMutationResponseDto,
} from '../../application/dtos/wallet-response.dto';
import {
  presentBalance,
  presentHistory,
  presentMutation,
  presentSummary,
} from './presenters';

@Controller('wallets')
export class WalletController {
  constructor(
    private readonly walletLedger: WalletLedgerService,
    private readonly walletQuery: WalletQueryService,
  ) {}

  /**
   * Credit or debit a user's wallet.
   * PUT /wallets/:userId
   */
  @Put(':userId')
  async updateWallet(
    @Param() params: UserParams,
    @Body() dto: UpdateWalletDto,
  ): Promise<WalletMutationResponseDto> {
    const amount = Money.of(dto.amount);
    const result =
      dto.type === TransactionType.CREDIT
        ? await this.walletLedger.credit(params.userId, amount, dto.description)
        : await this.walletLedger.debit(params.userId, amount, dto.description);
    return presentMutation(result);
  }

  @Get(':userId/balance')
  async getBalance(@Param() params: UserParams): Promise<BalanceResponseDto> {
    return presentBalance(await this.walletQuery.balanceOf(params.userId));
  }

  /**
   * Transaction history, newest first.
   * GET /wallets/:userId/transactions?type=DEBIT&limit=10
   */
  @Get(':userId/transactions')
  async getTransactions(
    @Param() params: UserParams,
    @Query() query: HistoryQueryDto,
  ): Promise<TransactionHistoryResponseDto> {
    const history = await this.walletQuery.historyOf(params.userId, {
      type: parseTransactionType(query.type),
      limit: query.limit,
    });
    return presentHistory(history);
  }

  @Get(':userId/summary')
  async getSummary(@Param() params: UserParams): Promise<SummaryResponseDto> {
    return presentSummary(await this.walletQuery.summaryOf(params.userId));
  }
}
