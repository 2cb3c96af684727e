import { Module, type DynamicModule, type Provider } from '@nestjs/common';
import { CLOCK, systemClock } from '@app/common';
import { UserController } from './interface/http/user.controller';
import { WalletController } from './interface/http/wallet.controller';
import { TransactionLogService } from './application/services/transaction-log.service';
import { UserRegistryService } from './application/services/user-registry.service';
import { WalletLedgerService } from './application/services/wallet-ledger.service';
import { WalletQueryService } from './application/services/wallet-query.service';

export interface LedgerModuleOptions {
  /**
   * Bindings for UNIT_OF_WORK, USER_REPOSITORY, WALLET_REPOSITORY and
   * TRANSACTION_REPOSITORY.
   */
  readonly persistence: Provider[];
  readonly clock?: Provider;
}

/**
 * Ledger core (registry, ledger, log, queries) and its HTTP controllers,
 * independent of the storage behind the repository ports.
 */
@Module({})
export class LedgerModule {
  static register(options: LedgerModuleOptions): DynamicModule {
    return {
      module: LedgerModule,
      controllers: [UserController, WalletController],
      providers: [
        ...options.persistence,
        options.clock ?? { provide: CLOCK, useValue: systemClock },
        TransactionLogService,
        WalletLedgerService,
        WalletQueryService,
        UserRegistryService,
      ],
      exports: [WalletLedgerService, WalletQueryService, UserRegistryService],
    };
  }
}
