import type { Money } from '@app/common';
import type { User } from '../entities/user.entity';

export const USER_REPOSITORY = Symbol('USER_REPOSITORY');

export interface UserWithBalance {
  readonly user: User;
  /** Null only when the user's wallet row is missing. */
  readonly balance: Money | null;
}

export interface UserRepository {
  /**
   * @throws DuplicateEmailError if the email is already taken
   */
  insert(user: User): Promise<User>;
  findById(userId: string): Promise<User | null>;
  existsByEmail(email: string): Promise<boolean>;
  /**
   * All users ordered by name ascending, then creation time.
   */
  listWithBalances(): Promise<UserWithBalance[]>;
  findWithBalance(userId: string): Promise<UserWithBalance | null>;
  /**
   * Delete a user together with its wallet and transactions.
   *
   * @returns true if the user existed
   */
  delete(userId: string): Promise<boolean>;
}
