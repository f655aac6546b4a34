import { z } from 'zod';
import { ValidationError } from '../../error/validationError.js';
import type { SafeWrap } from '../../utils/wrap.js';

/** Invoice lifecycle states, in lifecycle order. */
export const INVOICE_STATUSES = ['ISSUED', 'RECEIVED', 'ACCEPTED', 'REJECTED', 'FAILED', 'SETTLED', 'CANCELLED'] as const;

export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const InvoiceStatusSchema = z.enum(INVOICE_STATUSES);

export function parseInvoiceStatus(value: string): SafeWrap<ValidationError, InvoiceStatus> {
  const status = INVOICE_STATUSES.find((candidate) => candidate === value);
  if (status === undefined) {
    return [new ValidationError('error parsing invoice status', [{ message: `unknown status ${JSON.stringify(value)}` }]), null];
  }

  return [null, status];
}

export function invoiceStatusToString(status: InvoiceStatus): string {
  return status;
}

/** Orders statuses by their position in {@link INVOICE_STATUSES}. */
export function compareInvoiceStatus(a: InvoiceStatus, b: InvoiceStatus): number {
  return INVOICE_STATUSES.indexOf(a) - INVOICE_STATUSES.indexOf(b);
}
