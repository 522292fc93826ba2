import type { AttributeValue, Attributes } from './schemas/index.js';

// Readers never coerce: "123" is not a number and "true" is not a boolean.

function lookup(data: Attributes | null | undefined, key: string): AttributeValue | undefined {
  if (!data || !Object.prototype.hasOwnProperty.call(data, key)) return undefined;
  return data[key];
}

export function readString(data: Attributes | null | undefined, key: string): string | undefined {
  const value = lookup(data, key);
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(data: Attributes | null | undefined, key: string): number | undefined {
  const value = lookup(data, key);
  return typeof value === 'number' ? value : undefined;
}

export function readInteger(data: Attributes | null | undefined, key: string): number | undefined {
  const value = readNumber(data, key);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
}

export function readBoolean(data: Attributes | null | undefined, key: string): boolean | undefined {
  const value = lookup(data, key);
  return typeof value === 'boolean' ? value : undefined;
}
