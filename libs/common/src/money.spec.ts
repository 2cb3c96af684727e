import { InvalidAmountError } from './errors';
import { Money } from './money';

describe('Money', () => {
  describe('of', () => {
    it('should pad to two fractional digits', () => {
      expect(Money.of('12.5').toString()).toBe('12.50');
      expect(Money.of(10).toString()).toBe('10.00');
      expect(Money.of(' 7.25 ').toString()).toBe('7.25');
    });

    it('should keep the sign of negative amounts', () => {
      expect(Money.of('-5.5').toString()).toBe('-5.50');
      expect(Money.of('-0.5').toString()).toBe('-0.50');
    });

    it('should collapse zero in any spelling to ZERO', () => {
      expect(Money.of('0')).toBe(Money.ZERO);
      expect(Money.of('-0.00')).toBe(Money.ZERO);
      expect(Money.ZERO.toString()).toBe('0.00');
    });

    it.each(['10.123', 'abc', '', '1e3', '1.', '.5', '12,50'])(
      'should reject %p',
      (value) => {
        expect(() => Money.of(value)).toThrow(InvalidAmountError);
      },
    );

    it('should reject non-finite numbers', () => {
      expect(() => Money.of(Number.NaN)).toThrow(InvalidAmountError);
      expect(() => Money.of(Number.POSITIVE_INFINITY)).toThrow(
        InvalidAmountError,
      );
    });

    it('should reject floats that are not exact to the cent', () => {
      expect(() => Money.of(0.1 + 0.2)).toThrow(InvalidAmountError);
    });
  });

  describe('arithmetic', () => {
    it('should add without binary rounding error', () => {
      expect(Money.of('0.1').plus(Money.of('0.2')).toString()).toBe('0.30');
    });

    it('should subtract below zero', () => {
      expect(Money.of('20').minus(Money.of('80')).toString()).toBe('-60.00');
    });

    it('should compare by value', () => {
      const small = Money.of('9.99');
      const large = Money.of('10');

      expect(small.compare(large)).toBe(-1);
      expect(large.compare(small)).toBe(1);
      expect(large.compare(Money.of('10.00'))).toBe(0);
      expect(small.lessThan(large)).toBe(true);
      expect(large.greaterThan(small)).toBe(true);
      expect(large.equals(Money.of('10.0'))).toBe(true);
    });

    it('should report its sign', () => {
      expect(Money.of('0.01').isPositive()).toBe(true);
      expect(Money.ZERO.isPositive()).toBe(false);
      expect(Money.ZERO.isZero()).toBe(true);
      expect(Money.of('-1').isPositive()).toBe(false);
    });
  });

  describe('fromCents', () => {
    it('should build from integer cents', () => {
      expect(Money.fromCents(12345).toString()).toBe('123.45');
      expect(Money.of('123.45').toCents()).toBe(12345);
    });

    it('should reject fractional cents', () => {
      expect(() => Money.fromCents(1.5)).toThrow(InvalidAmountError);
    });
  });

  it('should serialize to its decimal string', () => {
    expect(JSON.stringify({ amount: Money.of('1') })).toBe(
      '{"amount":"1.00"}',
    );
  });
});
