import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { amountSchema, encodeAmount } from '../primitives.js';

export const REJECTION_REASONS = ['UNSOLICITED_SERVICE', 'BAD_SERVICE', 'INCORRECT_AMOUNT'] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

/** Why an invoice or debit note was rejected, and how much of it was accepted anyway. */
export const RejectionSchema = z.object({
  rejectionReason: z.enum(REJECTION_REASONS),
  totalAmountAccepted: amountSchema,
  message: z
    .string()
    .nullish()
    .transform((message) => message ?? undefined),
});

export type Rejection = z.output<typeof RejectionSchema>;

export interface RejectionJson {
  rejectionReason: RejectionReason;
  totalAmountAccepted: string;
  message?: string;
}

export function encodeRejection(rejection: Rejection): RejectionJson {
  return {
    rejectionReason: rejection.rejectionReason,
    totalAmountAccepted: encodeAmount(rejection.totalAmountAccepted),
    ...(rejection.message === undefined ? {} : { message: rejection.message }),
  };
}

/** First declared reason, nothing accepted, no message. */
export function defaultRejection(): Rejection {
  return { rejectionReason: REJECTION_REASONS[0], totalAmountAccepted: new Decimal(0) };
}
