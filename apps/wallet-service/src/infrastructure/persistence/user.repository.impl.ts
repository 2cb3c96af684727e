import { Injectable } from '@nestjs/common';
import { InjectEntityManager } from '@nestjs/typeorm';
import { QueryFailedError, type EntityManager, type Repository } from 'typeorm';
import { DuplicateEmailError } from '@app/common';
import type { User } from '../../domain/entities/user.entity';
import type {
  UserRepository,
  UserWithBalance,
} from '../../domain/repositories/user.repository';
import { USER_EMAIL_INDEX, UserOrmEntity } from './user.orm-entity';
import { toUser } from './mappers';
import { PG_ERROR_CODES, driverErrorDetails } from './storage-errors';

@Injectable()
export class UserRepositoryImpl implements UserRepository {
  constructor(
    @InjectEntityManager()
    private readonly manager: EntityManager,
  ) {}

  private get ormRepository(): Repository<UserOrmEntity> {
    return this.manager.getRepository(UserOrmEntity);
  }

  async insert(user: User): Promise<User> {
    try {
      await this.ormRepository.insert({
        userId: user.userId,
        name: user.name,
        email: user.email,
        phone: user.phone,
        createdAt: user.createdAt,
      });
    } catch (error) {
      // A concurrent registration won the race past the existence check
      if (error instanceof QueryFailedError) {
        const { code, constraint } = driverErrorDetails(error);
        if (
          code === PG_ERROR_CODES.UNIQUE_VIOLATION &&
          constraint === USER_EMAIL_INDEX
        ) {
          throw new DuplicateEmailError(user.email);
        }
      }
      throw error;
    }
    return user;
  }

  async findById(userId: string): Promise<User | null> {
    const entity = await this.ormRepository.findOne({ where: { userId } });
    return entity ? toUser(entity) : null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const count = await this.ormRepository.count({ where: { email } });
    return count > 0;
  }

  async listWithBalances(): Promise<UserWithBalance[]> {
    const entities = await this.ormRepository.find({
      relations: { wallet: true },
      order: { name: 'ASC', createdAt: 'ASC' },
    });
    return entities.map((entity) => this.withBalance(entity));
  }

  async findWithBalance(userId: string): Promise<UserWithBalance | null> {
    const entity = await this.ormRepository.findOne({
      where: { userId },
      relations: { wallet: true },
    });
    return entity ? this.withBalance(entity) : null;
  }

  async delete(userId: string): Promise<boolean> {
    // wallets and transactions go with it through ON DELETE CASCADE
    const result = await this.ormRepository.delete({ userId });
    return (result.affected ?? 0) > 0;
  }

  private withBalance(entity: UserOrmEntity): UserWithBalance {
    return {
      user: toUser(entity),
      balance: entity.wallet?.balance ?? null,
    };
  }
}
