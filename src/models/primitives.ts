import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { safeWrap } from '../utils/wrap.js';
import { Timestamp } from './timestamp.js';

/**
 * Non-negative decimal amount. Accepts the wire string (`"12.5"`) or a JSON
 * number and decodes into a {@link Decimal}, so no binary rounding creeps in.
 */
export const amountSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const [err, amount] = safeWrap(() => new Decimal(value));
  if (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid decimal amount ${JSON.stringify(value)}` });
    return z.NEVER;
  }

  if (!amount.isFinite() || amount.isNegative()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `amount must be a non-negative number, got ${amount.toString()}` });
    return z.NEVER;
  }

  return amount;
});

/** Wire form of an amount: plain notation, never exponent notation. */
export function encodeAmount(amount: Decimal): string {
  return amount.toFixed();
}

/**
 * RFC 3339 timestamp decoded into a {@link Timestamp}. Offsets are accepted;
 * the value is always re-encoded in UTC with its fraction digits intact.
 */
export const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value, ctx) => {
    const timestamp = Timestamp.parse(value);
    if (!timestamp) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp ${JSON.stringify(value)}` });
      return z.NEVER;
    }

    return timestamp;
  });

/** Wire form of a timestamp (UTC). */
export function encodeTimestamp(timestamp: Timestamp): string {
  return timestamp.toISOString();
}

/** Any JSON value. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);
