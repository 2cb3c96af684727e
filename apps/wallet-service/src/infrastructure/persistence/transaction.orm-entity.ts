import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  Generated,
  Index,
  Check,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { moneyTransformer, TransactionType, type Money } from '@app/common';
import { WalletOrmEntity } from './wallet.orm-entity';

@Entity('transactions')
@Check('"amount" > 0')
@Index(['walletId', 'createdAt', 'sequence'])
export class TransactionOrmEntity {
  @PrimaryColumn('uuid', { name: 'transaction_id' })
  transactionId!: string;

  /** Insertion order; breaks ties between equal timestamps. */
  @Column('bigint', { unique: true })
  @Generated('increment')
  sequence!: string;

  @Column('uuid', { name: 'wallet_id' })
  walletId!: string;

  @Column('bigint', { transformer: moneyTransformer })
  amount!: Money;

  @Column({
    type: 'varchar',
    length: 6,
  })
  type!: TransactionType;

  @Column('text', { nullable: true })
  description!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @ManyToOne(() => WalletOrmEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'wallet_id' })
  wallet?: WalletOrmEntity;
}
