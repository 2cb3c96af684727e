/**
 * TypeORM DataSource configuration for the Wallet Service.
 *
 * {@link createDataSourceOptions} is shared by the runtime AppModule and the
 * exported {@link WalletDataSource}, which the TypeORM CLI uses for schema
 * synchronization and migrations.
 */

import { DataSource, type DataSourceOptions } from 'typeorm';
import { UserOrmEntity } from './infrastructure/persistence/user.orm-entity';
import { WalletOrmEntity } from './infrastructure/persistence/wallet.orm-entity';
import { TransactionOrmEntity } from './infrastructure/persistence/transaction.orm-entity';

export type EnvReader = (key: string) => string | undefined;

export function createDataSourceOptions(read: EnvReader): DataSourceOptions {
  return {
    type: 'postgres',
    host: read('WALLET_DB_HOST') ?? 'localhost',
    port: parseInt(read('WALLET_DB_PORT') ?? '5432', 10),
    username: read('WALLET_DB_USER') ?? 'wallet_user',
    password: read('WALLET_DB_PASSWORD') ?? 'wallet_pass',
    database: read('WALLET_DB_NAME') ?? 'wallet_db',
    entities: [UserOrmEntity, WalletOrmEntity, TransactionOrmEntity],
    synchronize: read('WALLET_DB_SYNCHRONIZE') === 'true',
  };
}

export const WalletDataSource = new DataSource(
  createDataSourceOptions((key) => process.env[key]),
);
