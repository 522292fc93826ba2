import type { z } from 'zod';

/**
 * decodeJson — best-effort decode of a response body.
 *
 * Blank text, malformed JSON and schema mismatches all yield null, so callers can
 * tell "bad status" and "good status, unusable body" apart without a try/catch.
 */
export function decodeJson<T>(text: string | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!text || text.trim() === '') return null;

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }

  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}
