import type { Provider } from '@nestjs/common';
import { TRANSACTION_REPOSITORY } from '../../domain/repositories/transaction.repository';
import { UNIT_OF_WORK } from '../../domain/repositories/unit-of-work';
import { USER_REPOSITORY } from '../../domain/repositories/user.repository';
import { WALLET_REPOSITORY } from '../../domain/repositories/wallet.repository';
import { TransactionRepositoryImpl } from './transaction.repository.impl';
import { TypeOrmUnitOfWork } from './typeorm-unit-of-work';
import { UserRepositoryImpl } from './user.repository.impl';
import { WalletRepositoryImpl } from './wallet.repository.impl';

/**
 * Bindings of the repository and unit-of-work ports to TypeORM.
 * Repositories outside a unit of work use the default entity manager.
 */
export const typeOrmPersistenceProviders: Provider[] = [
  {
    provide: UNIT_OF_WORK,
    useClass: TypeOrmUnitOfWork,
  },
  {
    provide: USER_REPOSITORY,
    useClass: UserRepositoryImpl,
  },
  {
    provide: WALLET_REPOSITORY,
    useClass: WalletRepositoryImpl,
  },
  {
    provide: TRANSACTION_REPOSITORY,
    useClass: TransactionRepositoryImpl,
  },
];
