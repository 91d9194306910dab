/**
 * Coercion helpers for loosely structured JSON payloads
 *
 * TYPE SAFETY: payloads arrive as `unknown`; every read goes through one of
 * these guards so a missing or non-coercible field becomes null instead of
 * an exception.
 */

import { errorMessage } from './errors.js';

export type JsonObject = { readonly [key: string]: unknown };

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finite number from a JSON number or numeric string, else null
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Integer from a JSON number or numeric string, else null
 */
export function toInteger(value: unknown): number | null {
  const num = toNumber(value);
  return num !== null && Number.isInteger(num) ? num : null;
}

/**
 * Text value of a scalar; objects and arrays are not text
 */
export function toText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return null;
}

/**
 * Walk a dotted path; numeric segments index into arrays
 */
export function getPath(root: unknown, path: string): unknown {
  let current: unknown = root;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export type ParsedPayload =
  | { readonly success: true; readonly data: unknown }
  | { readonly success: false; readonly error: string };

/**
 * Payload columns hold either parsed JSON or JSON text
 */
export function parsePayload(value: unknown): ParsedPayload {
  if (typeof value !== 'string') {
    return { success: true, data: value };
  }
  try {
    const data: unknown = JSON.parse(value);
    return { success: true, data };
  } catch (error) {
    return {
      success: false,
      error: errorMessage(error),
    };
  }
}
