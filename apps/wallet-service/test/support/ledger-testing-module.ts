import { ConfigModule } from '@nestjs/config';
import { Test, type TestingModule } from '@nestjs/testing';
import { CLOCK, type Clock } from '@app/common';
import { LedgerModule } from '../../src/ledger.module';
import {
  InMemoryLedgerStore,
  SteppingClock,
  inMemoryPersistenceProviders,
} from './in-memory-ledger-store';

export interface LedgerTestingOptions {
  /** Configuration values, e.g. `MAX_TRANSACTION_AMOUNT` */
  readonly config?: Record<string, string>;
  readonly clock?: Clock;
}

export interface LedgerTestingContext {
  readonly moduleRef: TestingModule;
  readonly store: InMemoryLedgerStore;
  readonly clock: Clock;
}

/**
 * Compile the ledger module on top of a fresh in-memory store.
 */
export async function createLedgerTestingModule(
  options: LedgerTestingOptions = {},
): Promise<LedgerTestingContext> {
  const store = new InMemoryLedgerStore();
  const clock = options.clock ?? new SteppingClock();

  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [() => options.config ?? {}],
      }),
      LedgerModule.register({
        persistence: inMemoryPersistenceProviders(store),
        clock: { provide: CLOCK, useValue: clock },
      }),
    ],
  }).compile();

  return { moduleRef, store, clock };
}
