import { z } from 'zod';
import { type JsonValue, jsonValueSchema } from '../primitives.js';

/**
 * Demand, Offer or Proposal as sent to the market.
 *
 * `properties` is a JSON object in "flat convention": keys are full property
 * names and values are the property values, e.g.
 *
 * ```json
 * {
 *   "market.pricing.model": "linear",
 *   "market.pricing.model.linear.coeffs": [0.001, 0.002, 0.0],
 *   "node.cpu.cores": 4,
 *   "node.mem.gib": 10.5,
 *   "node.runtime.name": "vm"
 * }
 * ```
 *
 * The structure of `properties` is not validated here.
 */
export const DemandOfferBaseSchema = z.object({
  properties: jsonValueSchema,
  constraints: z.string(),
});

export type DemandOfferBase = z.output<typeof DemandOfferBaseSchema>;

export type NewOffer = DemandOfferBase;
export type NewDemand = DemandOfferBase;
export type NewProposal = DemandOfferBase;

export function createDemandOfferBase(properties: JsonValue, constraints: string): DemandOfferBase {
  return { properties, constraints };
}
