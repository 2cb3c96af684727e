import {
  DuplicateEmailError,
  InvalidUserDetailsError,
  Money,
  UserNotFoundError,
} from '@app/common';
import { User } from '../../domain/entities/user.entity';
import type { InMemoryLedgerStore } from '../../../test/support/in-memory-ledger-store';
import {
  createLedgerTestingModule,
  type LedgerTestingContext,
} from '../../../test/support/ledger-testing-module';
import { UserRegistryService } from './user-registry.service';
import { WalletLedgerService } from './wallet-ledger.service';
import { WalletQueryService } from './wallet-query.service';

const UNKNOWN_USER_ID = '0190d1a8-0000-7000-8000-000000000000';

describe('UserRegistryService', () => {
  let context: LedgerTestingContext;
  let store: InMemoryLedgerStore;
  let registry: UserRegistryService;

  beforeEach(async () => {
    context = await createLedgerTestingModule();
    store = context.store;
    registry = context.moduleRef.get(UserRegistryService);
  });

  afterEach(async () => {
    await context.moduleRef.close();
  });

  describe('createUser', () => {
    it('should create the user with an empty wallet', async () => {
      const { user, balance } = await registry.createUser({
        name: '  Alan Turing ',
        email: ' Alan@Example.COM ',
        phone: '+441632960000',
      });

      expect(user.name).toBe('Alan Turing');
      expect(user.email).toBe('alan@example.com');
      expect(user.phone).toBe('+441632960000');
      expect(balance.toString()).toBe('0.00');
      expect(store.userCount()).toBe(1);
      expect(store.walletCount()).toBe(1);

      const wallet = await context.moduleRef
        .get(WalletQueryService)
        .balanceOf(user.userId);
      expect(wallet.balance).toBe(Money.ZERO);
    });

    it('should reject an email that differs only in case', async () => {
      await registry.createUser({
        name: 'Alan Turing',
        email: 'alan@example.com',
        phone: '15550102',
      });

      await expect(
        registry.createUser({
          name: 'Another Alan',
          email: 'ALAN@example.com',
          phone: '15550103',
        }),
      ).rejects.toBeInstanceOf(DuplicateEmailError);
      expect(store.userCount()).toBe(1);
      expect(store.walletCount()).toBe(1);
    });

    it('should not leave a user behind when the wallet cannot be created', async () => {
      store.failNextCommit(new Error('connection reset'));

      await expect(
        registry.createUser({
          name: 'Alan Turing',
          email: 'alan@example.com',
          phone: '15550102',
        }),
      ).rejects.toThrow('connection reset');
      expect(store.userCount()).toBe(0);
      expect(store.walletCount()).toBe(0);
    });

    it.each([
      { name: '   ', phone: '15550102' },
      { name: 'x'.repeat(101), phone: '15550102' },
      { name: 'Alan Turing', phone: 'call me' },
      { name: 'Alan Turing', phone: '012345678' },
      { name: 'Alan Turing', phone: '12345' },
    ])('should reject name=$name phone=$phone', async ({ name, phone }) => {
      await expect(
        registry.createUser({ name, email: 'alan@example.com', phone }),
      ).rejects.toBeInstanceOf(InvalidUserDetailsError);
      expect(store.userCount()).toBe(0);
    });
  });

  describe('listUsers', () => {
    it('should list users by name with their balances', async () => {
      const bob = await registry.createUser({
        name: 'Bob',
        email: 'bob@example.com',
        phone: '15550201',
      });
      await registry.createUser({
        name: 'Carol',
        email: 'carol@example.com',
        phone: '15550202',
      });
      await registry.createUser({
        name: 'Alice',
        email: 'alice@example.com',
        phone: '15550203',
      });
      await context.moduleRef
        .get(WalletLedgerService)
        .credit(bob.user.userId, Money.of('12.5'));

      const users = await registry.listUsers();

      expect(
        users.map(({ user, balance }) => [user.name, balance.toString()]),
      ).toEqual([
        ['Alice', '0.00'],
        ['Bob', '12.50'],
        ['Carol', '0.00'],
      ]);
    });

    it('should be empty without users', async () => {
      await expect(registry.listUsers()).resolves.toEqual([]);
    });
  });

  describe('getUser', () => {
    it('should return the user with its balance', async () => {
      const { user } = await registry.createUser({
        name: 'Alice',
        email: 'alice@example.com',
        phone: '15550203',
      });

      const found = await registry.getUser(user.userId);

      expect(found.user).toEqual(user);
      expect(found.balance.toString()).toBe('0.00');
    });

    it('should report a zero balance for a user without a wallet', async () => {
      const orphan = User.create({
        userId: '0190d1a8-4444-7000-8000-000000000004',
        name: 'Orphan',
        email: 'orphan@example.com',
        phone: '15550204',
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
      });
      store.insertOrphanUser(orphan);

      const found = await registry.getUser(orphan.userId);

      expect(found.balance).toBe(Money.ZERO);
    });

    it('should reject an unknown user', async () => {
      await expect(registry.getUser(UNKNOWN_USER_ID)).rejects.toBeInstanceOf(
        UserNotFoundError,
      );
    });
  });

  describe('deleteUser', () => {
    it('should remove the user with its wallet and transactions', async () => {
      const { user } = await registry.createUser({
        name: 'Alice',
        email: 'alice@example.com',
        phone: '15550203',
      });
      const query = context.moduleRef.get(WalletQueryService);
      const { walletId } = await query.balanceOf(user.userId);
      await context.moduleRef
        .get(WalletLedgerService)
        .credit(user.userId, Money.of('10'));

      await registry.deleteUser(user.userId);

      expect(store.userCount()).toBe(0);
      expect(store.walletCount()).toBe(0);
      expect(store.committedTransactions(walletId)).toHaveLength(0);
      await expect(query.balanceOf(user.userId)).rejects.toBeInstanceOf(
        UserNotFoundError,
      );
    });

    it('should free the email for a new registration', async () => {
      const { user } = await registry.createUser({
        name: 'Alice',
        email: 'alice@example.com',
        phone: '15550203',
      });
      await registry.deleteUser(user.userId);

      const again = await registry.createUser({
        name: 'Alice',
        email: 'alice@example.com',
        phone: '15550203',
      });

      expect(again.user.userId).not.toBe(user.userId);
    });

    it('should reject an unknown user', async () => {
      await expect(
        registry.deleteUser(UNKNOWN_USER_ID),
      ).rejects.toBeInstanceOf(UserNotFoundError);
    });
  });
});
