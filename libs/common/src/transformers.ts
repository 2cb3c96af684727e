import type { ValueTransformer } from 'typeorm';
import { Money } from './money';

/**
 * TypeORM transformer for monetary `bigint` columns holding cents.
 * PostgreSQL returns bigint as a string; it is converted to {@link Money}.
 *
 * @remarks
 * Cents are kept in a JavaScript `number`, which is exact up to
 * Number.MAX_SAFE_INTEGER (about 90 trillion in major units).
 */
export const moneyTransformer: ValueTransformer = {
  to: (value: Money | null | undefined): string | null =>
    value == null ? null : String(value.toCents()),
  from: (value: string | null | undefined): Money | null =>
    value == null ? null : Money.fromCents(Number(value)),
};
