import type { TransactionRepository } from './transaction.repository';
import type { UserRepository } from './user.repository';
import type { WalletRepository } from './wallet.repository';

export const UNIT_OF_WORK = Symbol('UNIT_OF_WORK');

/**
 * Repositories bound to one open unit of work.
 */
export interface LedgerRepositories {
  readonly users: UserRepository;
  readonly wallets: WalletRepository;
  readonly transactions: TransactionRepository;
}

export interface UnitOfWork {
  /**
   * Run `work` as one atomic unit: every write made through the given
   * repositories commits together when it resolves, and none is visible
   * if it rejects. Row locks taken inside are released at the end.
   *
   * @throws StorageFailureError if the store cannot commit
   */
  run<T>(work: (repositories: LedgerRepositories) => Promise<T>): Promise<T>;
}
