import { z } from 'zod';
import { amountSchema, encodeAmount, encodeTimestamp, timestampSchema } from '../primitives.js';

const optionalTimestampSchema = timestampSchema.nullish().transform((timeout) => timeout ?? undefined);

/** Funds reserved for future payments, with what is spent and what remains. */
export const AllocationSchema = z.object({
  allocationId: z.string(),
  totalAmount: amountSchema,
  spentAmount: amountSchema,
  remainingAmount: amountSchema,
  timeout: optionalTimestampSchema,
  makeDeposit: z.boolean(),
});

export type Allocation = z.output<typeof AllocationSchema>;

export interface AllocationJson {
  allocationId: string;
  totalAmount: string;
  spentAmount: string;
  remainingAmount: string;
  timeout?: string;
  makeDeposit: boolean;
}

/** Allocation request; the id and balances are assigned by the server. */
export const NewAllocationSchema = z.object({
  totalAmount: amountSchema,
  timeout: optionalTimestampSchema,
  makeDeposit: z.boolean(),
});

export type NewAllocation = z.output<typeof NewAllocationSchema>;

export interface NewAllocationJson {
  totalAmount: string;
  timeout?: string;
  makeDeposit: boolean;
}

export function encodeAllocation(allocation: Allocation): AllocationJson {
  return {
    allocationId: allocation.allocationId,
    totalAmount: encodeAmount(allocation.totalAmount),
    spentAmount: encodeAmount(allocation.spentAmount),
    remainingAmount: encodeAmount(allocation.remainingAmount),
    ...(allocation.timeout === undefined ? {} : { timeout: encodeTimestamp(allocation.timeout) }),
    makeDeposit: allocation.makeDeposit,
  };
}

export function encodeNewAllocation(allocation: NewAllocation): NewAllocationJson {
  return {
    totalAmount: encodeAmount(allocation.totalAmount),
    ...(allocation.timeout === undefined ? {} : { timeout: encodeTimestamp(allocation.timeout) }),
    makeDeposit: allocation.makeDeposit,
  };
}
