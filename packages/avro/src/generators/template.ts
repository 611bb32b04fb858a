/**
 * Template generator
 *
 * Produces a placeholder document for a schema: one value per field, valid
 * against the schema without edits, meant as a starting point for hand-editing.
 */

import { SchemaDefinitionError } from '../errors.js';
import { namespaceOf, qualifyName, resolveNamedType } from '../schema.js';
import type { CompiledSchema, JsonObject, JsonValue, PrimitiveTypeName } from '../types.js';
import { appendPath, getType, isJsonObject, isPrimitiveTypeName } from '../utils.js';

const PRIMITIVE_PLACEHOLDERS: Record<PrimitiveTypeName, JsonValue> = {
  null: null,
  boolean: false,
  int: 0,
  long: 0,
  float: 0.0,
  double: 0.0,
  bytes: '',
  string: '',
};

export function generateTemplate(schema: CompiledSchema): JsonValue {
  return new TemplateGenerator(schema).generate();
}

/**
 * Generate the template and format it as 2-space indented JSON.
 */
export function renderTemplate(schema: CompiledSchema): string {
  return JSON.stringify(generateTemplate(schema), null, 2);
}

class TemplateGenerator {
  /** Full names of the named types on the current expansion path */
  private expanding = new Set<string>();

  constructor(private schema: CompiledSchema) {}

  generate(): JsonValue {
    return this.generateValue(this.schema.definition, undefined, '');
  }

  private generateValue(definition: JsonValue, namespace: string | undefined, path: string): JsonValue {
    if (typeof definition === 'string') {
      return this.generateReference(definition, namespace, path);
    }
    if (Array.isArray(definition)) {
      return this.generateUnion(definition, namespace, path);
    }
    if (isJsonObject(definition)) {
      return this.generateComplex(definition, namespace, path);
    }
    throw new SchemaDefinitionError(`unexpected schema value of type ${getType(definition)}`, path);
  }

  private generateReference(name: string, namespace: string | undefined, path: string): JsonValue {
    if (isPrimitiveTypeName(name)) {
      return PRIMITIVE_PLACEHOLDERS[name];
    }

    const named = resolveNamedType(this.schema, name, namespace);
    if (!named) {
      throw new SchemaDefinitionError(`unknown type '${name}'`, path);
    }

    // Self-reference: the type is already being expanded further up this path
    if (this.expanding.has(named.fullName)) {
      return null;
    }

    return this.expandNamed(named.fullName, named.definition, named.namespace, path);
  }

  private generateUnion(branches: JsonValue[], namespace: string | undefined, path: string): JsonValue {
    // Prefer the first non-null branch; unions are usually ["null", T]
    const index = branches.findIndex((branch) => !isNullType(branch));
    if (index === -1) {
      return null;
    }
    return this.generateValue(branches[index], namespace, appendPath(path, index));
  }

  private generateComplex(definition: JsonObject, namespace: string | undefined, path: string): JsonValue {
    const { type } = definition;

    if (Array.isArray(type) || isJsonObject(type)) {
      return this.generateValue(type, namespace, appendPath(path, 'type'));
    }
    if (typeof type !== 'string') {
      throw new SchemaDefinitionError("missing or invalid 'type' field", path);
    }

    switch (type) {
      case 'record':
      case 'error':
      case 'enum':
      case 'fixed': {
        if (typeof definition.name !== 'string') {
          throw new SchemaDefinitionError(`${type} missing 'name'`, path);
        }
        const ownNamespace = typeof definition.namespace === 'string' ? definition.namespace : namespace;
        const { fullName } = qualifyName(definition.name, ownNamespace);
        if (this.expanding.has(fullName)) {
          return null;
        }
        return this.expandNamed(fullName, definition, namespace, path);
      }
      case 'array':
        return [];
      case 'map':
        return {};
      default:
        // Primitive in complex form (including logical types) or a reference
        return this.generateReference(type, namespace, path);
    }
  }

  private expandNamed(
    fullName: string,
    definition: JsonObject,
    namespace: string | undefined,
    path: string,
  ): JsonValue {
    this.expanding.add(fullName);
    try {
      switch (definition.type) {
        case 'record':
        case 'error':
          return this.generateRecord(definition, namespaceOf(definition, namespace), path);
        case 'enum':
          return generateEnum(definition);
        case 'fixed':
          return '';
        default:
          throw new SchemaDefinitionError(`'${fullName}' is not a named type`, path);
      }
    } finally {
      this.expanding.delete(fullName);
    }
  }

  private generateRecord(definition: JsonObject, namespace: string | undefined, path: string): JsonObject {
    const { fields } = definition;
    if (!Array.isArray(fields)) {
      throw new SchemaDefinitionError("record missing 'fields'", path);
    }

    const result: JsonObject = {};

    fields.forEach((field, index) => {
      const fieldPath = appendPath(appendPath(path, 'fields'), index);
      if (!isJsonObject(field) || typeof field.name !== 'string') {
        throw new SchemaDefinitionError("field missing 'name'", fieldPath);
      }
      if (field.type === undefined) {
        throw new SchemaDefinitionError(`field '${field.name}' missing 'type'`, fieldPath);
      }

      // Declared defaults are schema-valid by definition
      if (field.default !== undefined) {
        result[field.name] = field.default;
        return;
      }

      result[field.name] = this.generateValue(field.type, namespace, appendPath(fieldPath, 'type'));
    });

    return result;
  }
}

function generateEnum(definition: JsonObject): JsonValue {
  const { symbols } = definition;
  if (!Array.isArray(symbols) || symbols.length === 0) {
    return '';
  }
  const [first] = symbols;
  return typeof first === 'string' ? first : '';
}

function isNullType(definition: JsonValue): boolean {
  return definition === 'null' || (isJsonObject(definition) && definition.type === 'null');
}
