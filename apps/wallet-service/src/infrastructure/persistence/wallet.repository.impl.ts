import { Injectable } from '@nestjs/common';
import { InjectEntityManager } from '@nestjs/typeorm';
import type { EntityManager, Repository } from 'typeorm';
import { StorageFailureError, type Money } from '@app/common';
import type { Wallet } from '../../domain/entities/wallet.entity';
import type { WalletRepository } from '../../domain/repositories/wallet.repository';
import { WalletOrmEntity } from './wallet.orm-entity';
import { toWallet } from './mappers';

@Injectable()
export class WalletRepositoryImpl implements WalletRepository {
  constructor(
    @InjectEntityManager()
    private readonly manager: EntityManager,
  ) {}

  private get ormRepository(): Repository<WalletOrmEntity> {
    return this.manager.getRepository(WalletOrmEntity);
  }

  async insert(wallet: Wallet): Promise<Wallet> {
    await this.ormRepository.insert({
      walletId: wallet.walletId,
      userId: wallet.userId,
      balance: wallet.balance,
      createdAt: wallet.createdAt,
      updatedAt: wallet.updatedAt,
    });
    return wallet;
  }

  async findByUserId(userId: string): Promise<Wallet | null> {
    const entity = await this.ormRepository.findOne({ where: { userId } });
    return entity ? toWallet(entity) : null;
  }

  async findByUserIdForUpdate(userId: string): Promise<Wallet | null> {
    // SELECT ... FOR UPDATE: held until the surrounding transaction ends
    const entity = await this.ormRepository.findOne({
      where: { userId },
      lock: { mode: 'pessimistic_write' },
    });
    return entity ? toWallet(entity) : null;
  }

  async updateBalance(
    walletId: string,
    balance: Money,
    updatedAt: Date,
  ): Promise<Wallet> {
    await this.ormRepository.update({ walletId }, { balance, updatedAt });

    const updated = await this.ormRepository.findOne({ where: { walletId } });
    if (!updated) {
      throw new StorageFailureError(
        `Wallet disappeared after update: ${walletId}`,
        false,
      );
    }
    return toWallet(updated);
  }
}
