import { z } from 'zod';
import { ValidationError } from '../../error/validationError.js';
import type { SafeWrap } from '../../utils/wrap.js';
import { encodeTimestamp, timestampSchema } from '../primitives.js';
import { defaultRejection, encodeRejection, type Rejection, type RejectionJson, RejectionSchema } from './rejection.js';

/** Event variants that carry nothing besides their name. */
export const PLAIN_INVOICE_EVENTS = [
  'InvoiceReceivedEvent',
  'InvoiceAcceptedEvent',
  'InvoiceCancelledEvent',
  'InvoiceSettledEvent',
] as const;

export type PlainInvoiceEventName = (typeof PLAIN_INVOICE_EVENTS)[number];

/** What happened to an invoice. Only the rejection carries a payload. */
export type InvoiceEventType =
  | { type: 'InvoiceReceivedEvent' }
  | { type: 'InvoiceAcceptedEvent' }
  | { type: 'InvoiceRejectedEvent'; rejection: Rejection }
  | { type: 'InvoiceCancelledEvent' }
  | { type: 'InvoiceSettledEvent' };

export type InvoiceEventName = InvoiceEventType['type'];

/** Short tag of each variant, as used in query strings and logs. */
export const INVOICE_EVENT_TAGS = {
  InvoiceReceivedEvent: 'RECEIVED',
  InvoiceAcceptedEvent: 'ACCEPTED',
  InvoiceRejectedEvent: 'REJECTED',
  InvoiceCancelledEvent: 'CANCELLED',
  InvoiceSettledEvent: 'SETTLED',
} as const satisfies Record<InvoiceEventName, string>;

export type InvoiceEventTag = (typeof INVOICE_EVENT_TAGS)[InvoiceEventName];

/**
 * JSON form: the bare variant name, or `{"InvoiceRejectedEvent":{"rejection":{...}}}`.
 */
export type InvoiceEventTypeJson = PlainInvoiceEventName | { InvoiceRejectedEvent: { rejection: RejectionJson } };

export const InvoiceEventTypeSchema = z.union([
  z.enum(PLAIN_INVOICE_EVENTS).transform((type): InvoiceEventType => ({ type })),
  z
    .object({ InvoiceRejectedEvent: z.object({ rejection: RejectionSchema }) })
    .strict()
    .transform(({ InvoiceRejectedEvent }): InvoiceEventType => ({
      type: 'InvoiceRejectedEvent',
      rejection: InvoiceRejectedEvent.rejection,
    })),
]);

export function encodeInvoiceEventType(eventType: InvoiceEventType): InvoiceEventTypeJson {
  switch (eventType.type) {
    case 'InvoiceRejectedEvent':
      return { InvoiceRejectedEvent: { rejection: encodeRejection(eventType.rejection) } };
    default:
      return eventType.type;
  }
}

/** Short tag of the variant, e.g. `SETTLED`. */
export function invoiceEventTypeToString(eventType: InvoiceEventType): InvoiceEventTag {
  return INVOICE_EVENT_TAGS[eventType.type];
}

/**
 * Parses a short tag such as `RECEIVED`. The tag has no payload, so `REJECTED`
 * yields a rejection with {@link defaultRejection}.
 */
export function parseInvoiceEventType(tag: string): SafeWrap<ValidationError, InvoiceEventType> {
  for (const name of PLAIN_INVOICE_EVENTS) {
    if (INVOICE_EVENT_TAGS[name] === tag) {
      return [null, { type: name }];
    }
  }

  if (tag === INVOICE_EVENT_TAGS.InvoiceRejectedEvent) {
    return [null, { type: 'InvoiceRejectedEvent', rejection: defaultRejection() }];
  }

  return [new ValidationError('error parsing invoice event type', [{ message: `unknown tag ${JSON.stringify(tag)}` }]), null];
}

/** Timestamped change of an invoice. */
export const InvoiceEventSchema = z.object({
  invoiceId: z.string(),
  eventDate: timestampSchema,
  eventType: InvoiceEventTypeSchema,
});

export type InvoiceEvent = z.output<typeof InvoiceEventSchema>;

export interface InvoiceEventJson {
  invoiceId: string;
  eventDate: string;
  eventType: InvoiceEventTypeJson;
}

export function encodeInvoiceEvent(event: InvoiceEvent): InvoiceEventJson {
  return {
    invoiceId: event.invoiceId,
    eventDate: encodeTimestamp(event.eventDate),
    eventType: encodeInvoiceEventType(event.eventType),
  };
}
