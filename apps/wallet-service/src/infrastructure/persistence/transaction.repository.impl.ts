import { Injectable } from '@nestjs/common';
import { InjectEntityManager } from '@nestjs/typeorm';
import type { EntityManager, Repository } from 'typeorm';
import { Money, TransactionType } from '@app/common';
import type { Transaction } from '../../domain/entities/transaction.entity';
import type {
  TransactionAggregate,
  TransactionListOptions,
  TransactionRepository,
} from '../../domain/repositories/transaction.repository';
import { TransactionOrmEntity } from './transaction.orm-entity';
import { toTransaction } from './mappers';

interface AggregateRow {
  type: TransactionType;
  total: string;
  count: string;
}

@Injectable()
export class TransactionRepositoryImpl implements TransactionRepository {
  constructor(
    @InjectEntityManager()
    private readonly manager: EntityManager,
  ) {}

  private get ormRepository(): Repository<TransactionOrmEntity> {
    return this.manager.getRepository(TransactionOrmEntity);
  }

  async append(transaction: Transaction): Promise<Transaction> {
    await this.ormRepository.insert({
      transactionId: transaction.transactionId,
      walletId: transaction.walletId,
      amount: transaction.amount,
      type: transaction.type,
      description: transaction.description,
      createdAt: transaction.createdAt,
    });
    return transaction;
  }

  async listByWallet(
    walletId: string,
    options: TransactionListOptions,
  ): Promise<Transaction[]> {
    const entities = await this.ormRepository.find({
      where: {
        walletId,
        ...(options.type && { type: options.type }),
      },
      order: { createdAt: 'DESC', sequence: 'DESC' },
      take: options.limit,
    });
    return entities.map(toTransaction);
  }

  async aggregateByWallet(walletId: string): Promise<TransactionAggregate> {
    // SUM over bigint comes back from pg as a numeric string
    const rows = await this.ormRepository
      .createQueryBuilder('entry')
      .select('entry.type', 'type')
      .addSelect('COALESCE(SUM(entry.amount), 0)', 'total')
      .addSelect('COUNT(*)', 'count')
      .where('entry.walletId = :walletId', { walletId })
      .groupBy('entry.type')
      .getRawMany<AggregateRow>();

    let totalCredits = Money.ZERO;
    let totalDebits = Money.ZERO;
    let count = 0;
    for (const row of rows) {
      const total = Money.fromCents(Number(row.total));
      if (row.type === TransactionType.CREDIT) {
        totalCredits = totalCredits.plus(total);
      } else {
        totalDebits = totalDebits.plus(total);
      }
      count += Number(row.count);
    }

    return { totalCredits, totalDebits, count };
  }
}
