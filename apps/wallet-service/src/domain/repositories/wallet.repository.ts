import type { Money } from '@app/common';
import type { Wallet } from '../entities/wallet.entity';

export const WALLET_REPOSITORY = Symbol('WALLET_REPOSITORY');

export interface WalletRepository {
  insert(wallet: Wallet): Promise<Wallet>;
  findByUserId(userId: string): Promise<Wallet | null>;
  /**
   * Load a wallet and hold a row lock on it until the surrounding unit of
   * work ends. Concurrent callers for the same wallet wait here.
   * Only valid inside {@link UnitOfWork.run}.
   */
  findByUserIdForUpdate(userId: string): Promise<Wallet | null>;
  /**
   * Overwrite the balance of a wallet locked by
   * {@link findByUserIdForUpdate}.
   *
   * @returns The updated wallet
   */
  updateBalance(
    walletId: string,
    balance: Money,
    updatedAt: Date,
  ): Promise<Wallet>;
}
