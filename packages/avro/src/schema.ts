// Schema compilation: parse the document and index its named types

import { SchemaDefinitionError, errorMessage } from './errors.js';
import type { CompiledSchema, JsonObject, JsonValue, NamedType, NamedTypeKind } from './types.js';
import { isJsonObject } from './utils.js';

const NAMED_KINDS: readonly NamedTypeKind[] = ['record', 'error', 'enum', 'fixed'];

function namedKind(value: JsonValue | undefined): NamedTypeKind | undefined {
  return NAMED_KINDS.find((kind) => kind === value);
}

/**
 * Parse schema text and index its named types.
 *
 * Only JSON syntax and duplicate names are checked here; structural problems
 * surface when the schema is walked (template generation) or bound (encoding).
 */
export function compileSchema(text: string): CompiledSchema {
  let definition: JsonValue;
  try {
    definition = JSON.parse(text);
  } catch (error) {
    throw new SchemaDefinitionError(`invalid schema JSON: ${errorMessage(error)}`);
  }

  const namedTypes = new Map<string, NamedType>();
  collectNamedTypes(definition, undefined, namedTypes);

  return { text, definition, namedTypes };
}

/**
 * Split a declared name into name, namespace and full name.
 * A dotted name is already fully qualified and ignores the namespace attribute.
 */
export function qualifyName(
  name: string,
  namespace: string | undefined,
): { name: string; namespace: string | undefined; fullName: string } {
  const lastDot = name.lastIndexOf('.');
  if (lastDot !== -1) {
    return { name: name.slice(lastDot + 1), namespace: name.slice(0, lastDot), fullName: name };
  }
  return { name, namespace: namespace || undefined, fullName: namespace ? `${namespace}.${name}` : name };
}

/**
 * Namespace that applies to definitions nested inside `definition`.
 */
export function namespaceOf(definition: JsonObject, enclosing: string | undefined): string | undefined {
  const { name, namespace } = definition;
  if (typeof name !== 'string') return enclosing;
  const ownNamespace = typeof namespace === 'string' ? namespace : enclosing;
  return qualifyName(name, ownNamespace).namespace;
}

function collectNamedTypes(
  definition: JsonValue,
  enclosing: string | undefined,
  into: Map<string, NamedType>,
): void {
  if (Array.isArray(definition)) {
    for (const branch of definition) {
      collectNamedTypes(branch, enclosing, into);
    }
    return;
  }

  if (!isJsonObject(definition)) return;

  const { type } = definition;
  if (typeof type !== 'string') {
    // Wrapped definition such as {"type": {"type": "record", ...}}
    if (type !== undefined) collectNamedTypes(type, enclosing, into);
    return;
  }

  const kind = namedKind(type);
  const namespace = namespaceOf(definition, enclosing);

  if (kind && typeof definition.name === 'string') {
    const ownNamespace = typeof definition.namespace === 'string' ? definition.namespace : enclosing;
    const qualified = qualifyName(definition.name, ownNamespace);
    if (into.has(qualified.fullName)) {
      throw new SchemaDefinitionError(`duplicate named type ${qualified.fullName}`);
    }
    into.set(qualified.fullName, { kind, ...qualified, definition });
  }

  switch (type) {
    case 'record':
    case 'error': {
      const { fields } = definition;
      if (!Array.isArray(fields)) return;
      for (const field of fields) {
        if (isJsonObject(field) && field.type !== undefined) {
          collectNamedTypes(field.type, namespace, into);
        }
      }
      return;
    }
    case 'array':
      if (definition.items !== undefined) collectNamedTypes(definition.items, namespace, into);
      return;
    case 'map':
      if (definition.values !== undefined) collectNamedTypes(definition.values, namespace, into);
      return;
  }
}

/**
 * Resolve a type reference following Avro naming rules:
 * qualified with the enclosing namespace, then the reference as written.
 */
export function resolveNamedType(
  schema: CompiledSchema,
  reference: string,
  namespace: string | undefined,
): NamedType | undefined {
  if (!reference.includes('.') && namespace) {
    const qualified = schema.namedTypes.get(`${namespace}.${reference}`);
    if (qualified) return qualified;
  }

  return schema.namedTypes.get(reference);
}
