import { describe, expect, it } from 'vitest';
import {
  compareInvoiceStatus,
  INVOICE_STATUSES,
  type InvoiceStatus,
  invoiceStatusToString,
  parseInvoiceStatus,
} from './invoiceStatus.js';

describe('InvoiceStatus', () => {
  it('parses and prints the wire names', () => {
    const [err, status] = parseInvoiceStatus('SETTLED');

    expect(err).toBeNull();
    expect(status).toBe('SETTLED');
    expect(invoiceStatusToString('ACCEPTED')).toBe('ACCEPTED');
  });

  it('parses every printed status back', () => {
    for (const status of INVOICE_STATUSES) {
      expect(parseInvoiceStatus(invoiceStatusToString(status))).toEqual([null, status]);
    }
  });

  it('fails on an unknown status', () => {
    const [err] = parseInvoiceStatus('PAID');

    expect(err?.message).toBe('error parsing invoice status: unknown status "PAID"');
  });

  it('orders statuses by lifecycle', () => {
    const statuses: InvoiceStatus[] = ['CANCELLED', 'ISSUED', 'SETTLED', 'REJECTED'];

    expect(statuses.sort(compareInvoiceStatus)).toEqual(['ISSUED', 'REJECTED', 'SETTLED', 'CANCELLED']);
    expect(compareInvoiceStatus('RECEIVED', 'RECEIVED')).toBe(0);
  });
});
