import { Transaction } from '../../domain/entities/transaction.entity';
import { User } from '../../domain/entities/user.entity';
import { Wallet } from '../../domain/entities/wallet.entity';
import type { TransactionOrmEntity } from './transaction.orm-entity';
import type { UserOrmEntity } from './user.orm-entity';
import type { WalletOrmEntity } from './wallet.orm-entity';

export function toUser(entity: UserOrmEntity): User {
  return User.create({
    userId: entity.userId,
    name: entity.name,
    email: entity.email,
    phone: entity.phone,
    createdAt: entity.createdAt,
  });
}

export function toWallet(entity: WalletOrmEntity): Wallet {
  return Wallet.create({
    walletId: entity.walletId,
    userId: entity.userId,
    balance: entity.balance,
    createdAt: entity.createdAt,
    updatedAt: entity.updatedAt,
  });
}

export function toTransaction(entity: TransactionOrmEntity): Transaction {
  return Transaction.create({
    transactionId: entity.transactionId,
    walletId: entity.walletId,
    amount: entity.amount,
    type: entity.type,
    description: entity.description,
    createdAt: entity.createdAt,
  });
}
