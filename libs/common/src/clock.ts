export const CLOCK = Symbol('CLOCK');

/**
 * Source of timestamps for transactions and wallet updates.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
