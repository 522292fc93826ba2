/**
 * object.ts — Zod schemas for the /objects resource.
 *
 * Wire shape: { id, name, data, createdAt, updatedAt }.
 * The live API sends timestamps as ISO-8601 strings; epoch milliseconds are
 * accepted too. Both are normalized to epoch milliseconds.
 */

import { z } from 'zod';
import { AttributesSchema } from './attributes.js';

const TimestampSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'number') return value;
    const ms = Date.parse(value);
    if (Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable timestamp: ${value}` });
      return z.NEVER;
    }
    return ms;
  })
  .nullish()
  .transform((value) => value ?? null);

export const ApiObjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  data: AttributesSchema.nullish().transform((value) => value ?? null),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
});

export const ApiObjectListSchema = z.array(ApiObjectSchema);

// Body of POST and PUT — PUT replaces the whole object, so it takes the same shape
export const ObjectCreateRequestSchema = z.object({
  name: z.string(),
  data: AttributesSchema.nullish(),
});

export const DeleteResultSchema = z.object({
  message: z.string().nullish().transform((value) => value ?? null),
});

export type ApiObject = z.infer<typeof ApiObjectSchema>;
export type ObjectCreateRequest = z.infer<typeof ObjectCreateRequestSchema>;
export type DeleteResult = z.infer<typeof DeleteResultSchema>;
