import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { DEFAULT_LOCK_TIMEOUT_MS } from '@app/common';
import type {
  LedgerRepositories,
  UnitOfWork,
} from '../../domain/repositories/unit-of-work';
import { TransactionRepositoryImpl } from './transaction.repository.impl';
import { UserRepositoryImpl } from './user.repository.impl';
import { WalletRepositoryImpl } from './wallet.repository.impl';
import { toLedgerError } from './storage-errors';

/**
 * Unit of work backed by one PostgreSQL transaction (READ COMMITTED).
 *
 * Row locks taken with `SELECT ... FOR UPDATE` wait at most
 * `LEDGER_LOCK_TIMEOUT_MS` before failing with a retryable storage error.
 */
@Injectable()
export class TypeOrmUnitOfWork implements UnitOfWork {
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {
    const configured = Number(
      this.configService.get<string>(
        'LEDGER_LOCK_TIMEOUT_MS',
        String(DEFAULT_LOCK_TIMEOUT_MS),
      ),
    );
    this.lockTimeoutMs =
      Number.isSafeInteger(configured) && configured > 0
        ? configured
        : DEFAULT_LOCK_TIMEOUT_MS;
  }

  async run<T>(
    work: (repositories: LedgerRepositories) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.dataSource.transaction(
        'READ COMMITTED',
        async (manager) => {
          // SET does not take bind parameters; the value is a validated integer
          await manager.query(
            `SET LOCAL lock_timeout = '${String(this.lockTimeoutMs)}ms'`,
          );
          return work({
            users: new UserRepositoryImpl(manager),
            wallets: new WalletRepositoryImpl(manager),
            transactions: new TransactionRepositoryImpl(manager),
          });
        },
      );
    } catch (error) {
      throw toLedgerError(error);
    }
  }
}
