/**
 * attributes.ts — Zod schema for the free-form "data" map carried by every object.
 *
 * The map is opaque to the client: any JSON value is accepted and kept with its
 * original type, so 123 stays a number and true stays a boolean after a round trip.
 */

import { z } from 'zod';

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueSchema),
    z.record(AttributeValueSchema),
  ]),
);

export const AttributesSchema = z.record(AttributeValueSchema);
