/**
 * Payload codec
 *
 * Validates JSON documents against a schema and converts them to and from
 * the schema's binary encoding. Each call binds a fresh avsc type.
 */

import avro from 'avsc';
import type { Type } from 'avsc';
import { PayloadDecodeError, PayloadValidationError, SchemaDefinitionError, errorMessage } from '../errors.js';
import type { CompiledSchema, JsonValue, ValidationResult } from '../types.js';
import { formatPath } from '../utils.js';
import { fromJson, toJson } from './json.js';

type Checked = { valid: true; value: unknown } | { valid: false; errors: string[] };

function bindType(schema: CompiledSchema): Type {
  try {
    return avro.Type.forSchema(JSON.parse(schema.text));
  } catch (error) {
    throw new SchemaDefinitionError(`cannot bind schema: ${errorMessage(error)}`);
  }
}

function describeValue(value: unknown): string {
  if (value === undefined) return 'missing value';
  if (Buffer.isBuffer(value)) return `${value.length} bytes`;
  return JSON.stringify(value) ?? String(value);
}

function check(type: Type, text: string): Checked {
  let json: JsonValue;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return { valid: false, errors: [`invalid JSON: ${errorMessage(error)}`] };
  }

  const conversion = fromJson(type, json);
  if (conversion.errors.length > 0) {
    return { valid: false, errors: conversion.errors };
  }

  const errors: string[] = [];
  type.isValid(conversion.value, {
    errorHook: (path: string[], invalid: unknown) => {
      errors.push(`validation failed at ${formatPath(path) || '/'}: ${describeValue(invalid)}`);
    },
  });

  return errors.length === 0 ? { valid: true, value: conversion.value } : { valid: false, errors };
}

export function validatePayload(schema: CompiledSchema, text: string): ValidationResult {
  const result = check(bindType(schema), text);
  return result.valid ? { valid: true, errors: [] } : { valid: false, errors: result.errors };
}

/**
 * Validate a JSON document and encode it to the schema's binary form.
 * Throws PayloadValidationError; never returns partial output.
 */
export function encodePayload(schema: CompiledSchema, text: string): Buffer {
  const type = bindType(schema);
  const result = check(type, text);
  if (!result.valid) {
    throw new PayloadValidationError(result.errors);
  }

  try {
    return type.toBuffer(result.value);
  } catch (error) {
    throw new PayloadValidationError([`encoding failed: ${errorMessage(error)}`]);
  }
}

/**
 * Decode schema-encoded bytes (envelope already stripped) to indented JSON.
 */
export function decodePayload(schema: CompiledSchema, payload: Uint8Array): string {
  const type = bindType(schema);
  try {
    const value: unknown = type.fromBuffer(Buffer.from(payload));
    return JSON.stringify(toJson(value), null, 2);
  } catch (error) {
    throw new PayloadDecodeError(`decoding failed: ${errorMessage(error)}`);
  }
}
