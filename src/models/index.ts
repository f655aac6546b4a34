/**
 * Models entrypoint: schemas, types and encoders for the market and payment payloads.
 * @module
 */

export { ErrorMessageSchema, type ErrorMessage } from './errorMessage.js';
export {
  createDemandOfferBase,
  type DemandOfferBase,
  DemandOfferBaseSchema,
  type NewDemand,
  type NewOffer,
  type NewProposal,
} from './market/demandOfferBase.js';
export {
  type Allocation,
  type AllocationJson,
  AllocationSchema,
  encodeAllocation,
  encodeNewAllocation,
  type NewAllocation,
  type NewAllocationJson,
  NewAllocationSchema,
} from './payment/allocation.js';
export {
  encodeInvoiceEvent,
  encodeInvoiceEventType,
  INVOICE_EVENT_TAGS,
  type InvoiceEvent,
  type InvoiceEventJson,
  type InvoiceEventName,
  InvoiceEventSchema,
  type InvoiceEventTag,
  type InvoiceEventType,
  type InvoiceEventTypeJson,
  InvoiceEventTypeSchema,
  invoiceEventTypeToString,
  parseInvoiceEventType,
  PLAIN_INVOICE_EVENTS,
  type PlainInvoiceEventName,
} from './payment/invoiceEvent.js';
export {
  compareInvoiceStatus,
  INVOICE_STATUSES,
  type InvoiceStatus,
  InvoiceStatusSchema,
  invoiceStatusToString,
  parseInvoiceStatus,
} from './payment/invoiceStatus.js';
export {
  defaultRejection,
  encodeRejection,
  REJECTION_REASONS,
  type Rejection,
  type RejectionJson,
  type RejectionReason,
  RejectionSchema,
} from './payment/rejection.js';
export { amountSchema, encodeAmount, encodeTimestamp, type JsonValue, jsonValueSchema, timestampSchema } from './primitives.js';
export { Timestamp } from './timestamp.js';
