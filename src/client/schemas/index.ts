/**
 * schemas/index.ts — Re-exports all /objects schemas and TypeScript types.
 *
 * Import from this file for all schema/type access:
 *   import { ApiObjectSchema, ApiObject, ... } from './schemas/index.js';
 */

export { AttributeValueSchema, AttributesSchema } from './attributes.js';
export type { AttributeValue, Attributes } from './attributes.js';

export {
  ApiObjectSchema,
  ApiObjectListSchema,
  ObjectCreateRequestSchema,
  DeleteResultSchema,
} from './object.js';
export type { ApiObject, ObjectCreateRequest, DeleteResult } from './object.js';
