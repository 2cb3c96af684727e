import { InvalidAmountError } from './errors';

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Exact fixed-point amount with two fractional digits.
 *
 * Stored as an integer number of cents, so arithmetic never goes through
 * binary floating point. Every entry point that accepts an amount builds it
 * with {@link Money.of}; that is the only place precision rules live.
 */
export class Money {
  static readonly ZERO = new Money(0);

  private constructor(private readonly cents: number) {}

  /**
   * Parse a decimal string (`"12.5"`, `"100.00"`) or a number.
   *
   * @throws InvalidAmountError when the value is not a finite number or has
   * more than two fractional digits
   */
  static of(value: string | number): Money {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new InvalidAmountError(`Amount must be a finite number`);
    }

    const text = String(value).trim();
    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
      throw new InvalidAmountError(
        `Amount must be a decimal with at most 2 fractional digits: ${text}`,
      );
    }

    const [, sign, whole, fraction = ''] = match;
    const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
    return Money.fromCents(sign ? -cents : cents);
  }

  static fromCents(cents: number): Money {
    if (!Number.isSafeInteger(cents)) {
      throw new InvalidAmountError(
        `Amount is out of range: ${String(cents)} cents`,
      );
    }
    return cents === 0 ? Money.ZERO : new Money(cents);
  }

  toCents(): number {
    return this.cents;
  }

  plus(other: Money): Money {
    return Money.fromCents(this.cents + other.cents);
  }

  minus(other: Money): Money {
    return Money.fromCents(this.cents - other.cents);
  }

  compare(other: Money): -1 | 0 | 1 {
    if (this.cents === other.cents) return 0;
    return this.cents < other.cents ? -1 : 1;
  }

  equals(other: Money): boolean {
    return this.cents === other.cents;
  }

  lessThan(other: Money): boolean {
    return this.cents < other.cents;
  }

  greaterThan(other: Money): boolean {
    return this.cents > other.cents;
  }

  isPositive(): boolean {
    return this.cents > 0;
  }

  isZero(): boolean {
    return this.cents === 0;
  }

  /** Decimal string with exactly two fractional digits, e.g. `"-0.50"`. */
  toString(): string {
    const abs = Math.abs(this.cents);
    const whole = Math.floor(abs / 100);
    const fraction = String(abs % 100).padStart(2, '0');
    return `${this.cents < 0 ? '-' : ''}${String(whole)}.${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
