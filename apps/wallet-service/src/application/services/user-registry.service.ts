import { Inject, Injectable, Logger } from '@nestjs/common';
import { v7 as uuidv7 } from 'uuid';
import {
  CLOCK,
  DuplicateEmailError,
  InvalidUserDetailsError,
  MAX_NAME_LENGTH,
  Money,
  PHONE_PATTERN,
  UserNotFoundError,
  type Clock,
} from '@app/common';
import { User } from '../../domain/entities/user.entity';
import { Wallet } from '../../domain/entities/wallet.entity';
import {
  UNIT_OF_WORK,
  type UnitOfWork,
} from '../../domain/repositories/unit-of-work';
import {
  USER_REPOSITORY,
  type UserRepository,
  type UserWithBalance,
} from '../../domain/repositories/user.repository';

export interface CreateUserInput {
  readonly name: string;
  readonly email: string;
  readonly phone: string;
}

export interface RegisteredUser {
  readonly user: User;
  readonly balance: Money;
}

@Injectable()
export class UserRegistryService {
  private readonly logger = new Logger(UserRegistryService.name);

  constructor(
    @Inject(UNIT_OF_WORK)
    private readonly unitOfWork: UnitOfWork,
    @Inject(USER_REPOSITORY)
    private readonly userRepository: UserRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Create a user and its zero-balance wallet in one unit of work.
   *
   * @throws DuplicateEmailError if the email is already registered
   * @throws InvalidUserDetailsError if name or phone are malformed
   */
  async createUser(input: CreateUserInput): Promise<RegisteredUser> {
    const name = input.name.trim();
    const email = normalizeEmail(input.email);
    const phone = input.phone.trim();

    if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
      throw new InvalidUserDetailsError(
        `Name must be between 1 and ${String(MAX_NAME_LENGTH)} characters`,
      );
    }
    if (!PHONE_PATTERN.test(phone)) {
      throw new InvalidUserDetailsError(
        `Phone number must be 7 to 15 digits with an optional leading '+': ${phone}`,
      );
    }

    const user = await this.unitOfWork.run(async (repositories) => {
      if (await repositories.users.existsByEmail(email)) {
        throw new DuplicateEmailError(email);
      }

      const now = this.clock.now();
      const created = await repositories.users.insert(
        User.create({ userId: uuidv7(), name, email, phone, createdAt: now }),
      );
      await repositories.wallets.insert(
        Wallet.create({
          walletId: uuidv7(),
          userId: created.userId,
          balance: Money.ZERO,
          createdAt: now,
          updatedAt: now,
        }),
      );
      return created;
    });

    this.logger.log(`Created user ${user.userId} with an empty wallet`);
    return { user, balance: Money.ZERO };
  }

  /**
   * Every user ordered by name, with its wallet balance.
   */
  async listUsers(): Promise<RegisteredUser[]> {
    const rows = await this.userRepository.listWithBalances();
    return rows.map((row) => this.withFallbackBalance(row));
  }

  async getUser(userId: string): Promise<RegisteredUser> {
    const row = await this.userRepository.findWithBalance(userId);
    if (!row) {
      throw new UserNotFoundError(userId);
    }
    return this.withFallbackBalance(row);
  }

  /**
   * Remove a user with its wallet and whole transaction history.
   */
  async deleteUser(userId: string): Promise<void> {
    const deleted = await this.unitOfWork.run((repositories) =>
      repositories.users.delete(userId),
    );
    if (!deleted) {
      throw new UserNotFoundError(userId);
    }
    this.logger.log(`Deleted user ${userId} and its wallet`);
  }

  private withFallbackBalance(row: UserWithBalance): RegisteredUser {
    if (row.balance === null) {
      this.logger.warn(`User ${row.user.userId} has no wallet`);
      return { user: row.user, balance: Money.ZERO };
    }
    return { user: row.user, balance: row.balance };
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
