/**
 * Sub-API bindings, bound through `WebClient.interface`.
 * @module
 */
export { MarketApi } from './market.js';
export { type InvoiceEventsQuery, PaymentApi } from './payment.js';
