/**
 * Payload field readers shared by the tool handlers
 *
 * Fields with aliases take the first alias that holds a non-empty value;
 * empty strings, zero, false, and empty lists count as absent.
 */

import { z } from 'zod';

import type { ToolPayload } from './types.js';

const integerSchema = z.number().int();
const stringListSchema = z.array(z.string());

function isEmptyValue(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === '' ||
    value === 0 ||
    value === false ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * First alias holding a non-empty value
 */
export function pickField(
  payload: ToolPayload,
  names: readonly string[]
): unknown {
  for (const name of names) {
    const value = payload[name];
    if (!isEmptyValue(value)) {
      return value;
    }
  }
  return undefined;
}

export function isPlainObject(value: unknown): value is ToolPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readInteger(value: unknown): number | null {
  const parsed = integerSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * A list whose elements are all strings, or null
 */
export function readStringList(value: unknown): string[] | null {
  const parsed = stringListSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
