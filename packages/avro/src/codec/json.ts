/**
 * Conversion between hand-written JSON documents and avsc values.
 *
 * Documents follow the editing conventions of the template generator:
 * - bytes and fixed values are strings whose code points are byte values
 * - union members may be bare (`"x"`) or wrapped (`{"string": "x"}`)
 */

import avro from 'avsc';
import type { Type } from 'avsc';
import type { JsonObject, JsonValue } from '../types.js';
import { appendPath, getType, isJsonObject } from '../utils.js';

const { types } = avro;

export type Conversion = { value: unknown; errors: string[] };

export function fromJson(type: Type, json: JsonValue): Conversion {
  const errors: string[] = [];
  const value = convert(type, json, '', errors);
  return { value, errors };
}

function convert(type: Type, json: JsonValue, path: string, errors: string[]): unknown {
  if (type instanceof types.RecordType) {
    if (!isJsonObject(json)) {
      errors.push(`${path || '/'}: expected record${type.name ? ` ${type.name}` : ''}, got ${getType(json)}`);
      return undefined;
    }
    const record: Record<string, unknown> = {};
    for (const field of type.fields) {
      const fieldValue = json[field.name];
      record[field.name] =
        fieldValue === undefined
          ? field.defaultValue()
          : convert(field.type, fieldValue, appendPath(path, field.name), errors);
    }
    return record;
  }

  if (type instanceof types.ArrayType) {
    if (!Array.isArray(json)) {
      errors.push(`${path || '/'}: expected array, got ${getType(json)}`);
      return undefined;
    }
    return json.map((item, index) => convert(type.itemsType, item, appendPath(path, index), errors));
  }

  if (type instanceof types.MapType) {
    if (!isJsonObject(json)) {
      errors.push(`${path || '/'}: expected map, got ${getType(json)}`);
      return undefined;
    }
    const map: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(json)) {
      map[key] = convert(type.valuesType, entry, appendPath(path, key), errors);
    }
    return map;
  }

  if (type instanceof types.UnwrappedUnionType) {
    const chosen = chooseBranch(type.types, json, path, errors);
    return chosen?.value;
  }

  if (type instanceof types.WrappedUnionType) {
    const chosen = chooseBranch(type.types, json, path, errors);
    if (!chosen || chosen.value === null) return chosen?.value;
    const branchName = chosen.branch.branchName;
    return branchName ? { [branchName]: chosen.value } : chosen.value;
  }

  if (type instanceof types.BytesType || type instanceof types.FixedType) {
    if (typeof json !== 'string') {
      errors.push(`${path || '/'}: expected string of bytes, got ${getType(json)}`);
      return undefined;
    }
    const wide = [...json].find((char) => (char.codePointAt(0) ?? 0) > 0xff);
    if (wide !== undefined) {
      const code = (wide.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
      errors.push(`${path || '/'}: character U+${code} is not a byte`);
      return undefined;
    }
    return Buffer.from(json, 'latin1');
  }

  // Primitives and enums are checked by the type itself
  return json;
}

/**
 * Pick the union branch for a value: the first branch the bare value converts to
 * and validates against, then explicit {"branch": value} wrapping.
 */
function chooseBranch(
  branches: Type[],
  json: JsonValue,
  path: string,
  errors: string[],
): { branch: Type; value: unknown } | undefined {
  if (json === null) {
    const nullBranch = branches.find((branch) => branch instanceof types.NullType);
    if (nullBranch) return { branch: nullBranch, value: null };
  }

  for (const branch of branches) {
    if (branch instanceof types.NullType) continue;
    if (branch instanceof types.RecordType && hasUnknownFields(branch.fields, json)) continue;
    const attempt: string[] = [];
    const value = convert(branch, json, path, attempt);
    if (attempt.length === 0 && branch.isValid(value)) {
      return { branch, value };
    }
  }

  if (isJsonObject(json)) {
    const keys = Object.keys(json);
    const wrapped = keys.length === 1 ? branches.find((branch) => branch.branchName === keys[0]) : undefined;
    if (wrapped) {
      return { branch: wrapped, value: convert(wrapped, json[keys[0]], appendPath(path, keys[0]), errors) };
    }
  }

  errors.push(`${path || '/'}: ${JSON.stringify(json)} matches no union branch`);
  return undefined;
}

// Keys outside the fields mark a wrapped member, not this record
function hasUnknownFields(fields: readonly { name: string }[], json: JsonValue): boolean {
  if (!isJsonObject(json)) return false;
  const known = new Set(fields.map((field) => field.name));
  return Object.keys(json).some((key) => !known.has(key));
}

/**
 * Convert a decoded avsc value to plain JSON (bytes as strings of byte code points).
 */
export function toJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (Buffer.isBuffer(value)) return value.toString('latin1');
  if (Array.isArray(value)) return value.map(toJson);
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toJson(entry);
    }
    return result;
  }
  return String(value);
}
