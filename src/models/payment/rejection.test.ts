import { describe, expect, it } from 'vitest';
import { encodeRejection, RejectionSchema } from './rejection.js';

describe('RejectionSchema', () => {
  it('reads a null message as unset', () => {
    const rejection = RejectionSchema.parse({
      rejectionReason: 'INCORRECT_AMOUNT',
      totalAmountAccepted: '3',
      message: null,
    });

    expect(rejection.message).toBeUndefined();
    expect(encodeRejection(rejection)).toEqual({ rejectionReason: 'INCORRECT_AMOUNT', totalAmountAccepted: '3' });
  });

  it('rejects an unknown reason', () => {
    expect(RejectionSchema.safeParse({ rejectionReason: 'TOO_LATE', totalAmountAccepted: '0' }).success).toBe(false);
  });
});
