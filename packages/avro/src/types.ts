// Core Avro schema types

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

export const PRIMITIVE_TYPES = [
  'null',
  'boolean',
  'int',
  'long',
  'float',
  'double',
  'bytes',
  'string',
] as const;

export type PrimitiveTypeName = (typeof PRIMITIVE_TYPES)[number];

/** Complex types that declare a name and can be referenced elsewhere in the document */
export type NamedTypeKind = 'record' | 'error' | 'enum' | 'fixed';

export type NamedType = {
  kind: NamedTypeKind;
  name: string;
  fullName: string;
  namespace: string | undefined;
  definition: JsonObject;
};

/**
 * A parsed schema document with every named type indexed by full name.
 *
 * The definition is kept as plain JSON; references are resolved on demand
 * through {@link resolveNamedType} so that cyclic types never need a cyclic
 * object graph.
 */
export type CompiledSchema = {
  text: string;
  definition: JsonValue;
  namedTypes: ReadonlyMap<string, NamedType>;
};

// Validation result - collects all errors
export type ValidationResult = {
  valid: boolean;
  errors: string[];
};
