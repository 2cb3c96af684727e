import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  Index,
  OneToOne,
} from 'typeorm';
import { MAX_NAME_LENGTH } from '@app/common';
import { WalletOrmEntity } from './wallet.orm-entity';

export const USER_EMAIL_INDEX = 'UQ_users_email';

@Entity('users')
export class UserOrmEntity {
  @PrimaryColumn('uuid', { name: 'user_id' })
  userId!: string;

  @Column({ type: 'varchar', length: MAX_NAME_LENGTH })
  @Index()
  name!: string;

  @Column({ type: 'varchar', length: 254 })
  @Index(USER_EMAIL_INDEX, { unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 16 })
  phone!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @OneToOne(() => WalletOrmEntity, (wallet) => wallet.user)
  wallet?: WalletOrmEntity;
}
