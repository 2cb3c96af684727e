import type { Money } from '@app/common';

interface WalletProps {
  readonly walletId: string;
  readonly userId: string;
  readonly balance: Money;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * A user's wallet. Exactly one per user, created with the user.
 *
 * The balance only changes through the wallet ledger, which pairs every
 * change with an appended transaction, so it never goes below zero.
 */
export class Wallet {
  readonly walletId!: string;

  readonly userId!: string;

  /** Stored, never recomputed from the log on read. */
  readonly balance!: Money;

  readonly createdAt!: Date;

  readonly updatedAt!: Date;

  /**
   * @returns A frozen Wallet; updates produce a new instance
   */
  static create(props: WalletProps): Wallet {
    return Object.freeze(Object.assign(new Wallet(), props));
  }
}
