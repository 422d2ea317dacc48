/**
 * Generic JSON values.
 *
 * RD Station response shapes vary by endpoint, so the client returns
 * JsonValue and leaves narrowing to the caller.
 */

import { z } from 'zod';

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * True when `value` is made only of JSON values.
 * Walks with an explicit stack, so nesting depth is bounded by memory, not the call stack.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  const pending: unknown[] = [value];
  const seen = new Set<object>();

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === null || typeof current === 'string' || typeof current === 'boolean') {
      continue;
    }
    if (typeof current === 'number') {
      if (!Number.isFinite(current)) return false;
      continue;
    }
    if (typeof current !== 'object') {
      return false;
    }
    // Shared references are checked once
    if (seen.has(current)) continue;
    seen.add(current);

    if (Array.isArray(current)) {
      for (const item of current) pending.push(item);
      continue;
    }
    const proto: unknown = Object.getPrototypeOf(current);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
    for (const item of Object.values(current)) pending.push(item);
  }
  return true;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.custom<JsonValue>(isJsonValue, 'expected a JSON value');

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse text as JSON.
 * Returns undefined when the text is not valid JSON.
 */
export function parseJson(text: string): JsonValue | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isJsonValue(raw) ? raw : undefined;
}
