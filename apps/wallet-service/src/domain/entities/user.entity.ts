interface UserProps {
  readonly userId: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly createdAt: Date;
}

/**
 * Domain entity representing a wallet holder.
 * Every user owns exactly one wallet, created together with it.
 */
export class User {
  readonly userId!: string;

  readonly name!: string;

  readonly email!: string;

  readonly phone!: string;

  readonly createdAt!: Date;

  static create(props: UserProps): User {
    return Object.freeze(Object.assign(new User(), props));
  }
}
