/**
 * Error types for schema handling
 *
 * Schema errors carry the JSON Pointer of the offending definition when known.
 */

/**
 * Thrown when a schema document is not valid JSON or its declared shape is broken
 * (record without fields, complex type without a type discriminator, unknown reference).
 */
export class SchemaDefinitionError extends Error {
  /** Location inside the schema document ('' for the root) */
  readonly path: string;

  constructor(message: string, path = '') {
    super(path ? `${message} at ${path}` : message);
    this.name = 'SchemaDefinitionError';
    this.path = path;
  }
}

/**
 * Thrown when a candidate document cannot be encoded with the schema
 */
export class PayloadValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join('; '));
    this.name = 'PayloadValidationError';
    this.errors = errors;
  }
}

/**
 * Thrown when binary data cannot be decoded with the schema
 */
export class PayloadDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadDecodeError';
  }
}

/**
 * Thrown for framing violations of the 5-byte wire envelope
 */
export class EnvelopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvelopeError';
  }
}

/**
 * Extract just the error message from an unknown error value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
