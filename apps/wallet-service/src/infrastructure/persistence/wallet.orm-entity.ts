import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  Index,
  Check,
  OneToOne,
  JoinColumn,
} from 'typeorm';
import { moneyTransformer, type Money } from '@app/common';
import { UserOrmEntity } from './user.orm-entity';

@Entity('wallets')
@Check('"balance" >= 0')
export class WalletOrmEntity {
  @PrimaryColumn('uuid', { name: 'wallet_id' })
  walletId!: string;

  @Column('uuid', { name: 'user_id' })
  @Index({ unique: true })
  userId!: string;

  @Column('bigint', { default: 0, transformer: moneyTransformer })
  balance!: Money;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  // Written explicitly by the ledger so it only moves on balance changes
  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @OneToOne(() => UserOrmEntity, (user) => user.wallet, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'user_id' })
  user?: UserOrmEntity;
}
