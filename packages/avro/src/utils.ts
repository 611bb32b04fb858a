// Utility functions for JSON Pointer paths and JSON helpers

import type { JsonObject, JsonValue, PrimitiveTypeName } from './types.js';
import { PRIMITIVE_TYPES } from './types.js';

/**
 * Format a JSON Pointer path (RFC 6901)
 */
export function formatPath(segments: (string | number)[]): string {
  if (segments.length === 0) return '';
  return '/' + segments.map((segment) => encodePointerSegment(String(segment))).join('/');
}

/**
 * Encode a JSON Pointer segment (escape ~ and /)
 */
function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Append a segment to a JSON Pointer path
 */
export function appendPath(path: string, segment: string | number): string {
  return path + '/' + encodePointerSegment(String(segment));
}

/**
 * Get the JSON type of a value
 */
export function getType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPrimitiveTypeName(value: string): value is PrimitiveTypeName {
  return PRIMITIVE_TYPES.some((name) => name === value);
}

/**
 * Pretty-print a schema document; text that is not JSON is returned unchanged.
 */
export function prettyPrintSchema(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}
