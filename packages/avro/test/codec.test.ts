import { describe, expect, it } from 'vitest';
import { decodePayload, encodePayload, validatePayload } from '../src/codec/payload.js';
import { PayloadDecodeError, PayloadValidationError, SchemaDefinitionError } from '../src/errors.js';
import { renderTemplate } from '../src/generators/template.js';
import { compileSchema } from '../src/schema.js';

const userSchema = compileSchema(
  JSON.stringify({
    type: 'record',
    name: 'User',
    namespace: 'com.acme',
    fields: [
      { name: 'id', type: 'long' },
      { name: 'name', type: 'string' },
      { name: 'email', type: ['null', 'string'] },
      { name: 'role', type: { type: 'enum', name: 'Role', symbols: ['ADMIN', 'MEMBER'] } },
      { name: 'tags', type: { type: 'array', items: 'string' } },
      { name: 'active', type: 'boolean', default: true },
    ],
  }),
);

function user(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    id: 7,
    name: 'Ada',
    email: 'ada@example.com',
    role: 'MEMBER',
    tags: ['a'],
    active: false,
    ...overrides,
  });
}

function catchValidation(fn: () => unknown): PayloadValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof PayloadValidationError) return error;
    throw error;
  }
  throw new Error('expected PayloadValidationError');
}

describe('payload codec', () => {
  describe('template round trip', () => {
    it('should encode the generated template and decode it back unchanged', () => {
      const template = renderTemplate(userSchema);

      const decoded = decodePayload(userSchema, encodePayload(userSchema, template));

      expect(JSON.parse(decoded)).toEqual({
        id: 0,
        name: '',
        email: '',
        role: 'ADMIN',
        tags: [],
        active: true,
      });
    });

    it('should accept the template of a schema with nested records and maps', () => {
      const schema = compileSchema(
        JSON.stringify({
          type: 'record',
          name: 'Envelope',
          fields: [
            { name: 'meta', type: { type: 'map', values: 'string' } },
            {
              name: 'body',
              type: {
                type: 'record',
                name: 'Body',
                fields: [
                  { name: 'raw', type: 'bytes' },
                  { name: 'score', type: ['null', 'double'] },
                ],
              },
            },
          ],
        }),
      );

      expect(validatePayload(schema, renderTemplate(schema))).toEqual({ valid: true, errors: [] });
    });
  });

  describe('validatePayload', () => {
    it('should accept a conforming document', () => {
      expect(validatePayload(userSchema, user())).toEqual({ valid: true, errors: [] });
    });

    it('should accept an explicitly wrapped union member', () => {
      expect(validatePayload(userSchema, user({ email: { string: 'ada@example.com' } })).valid).toBe(true);
    });

    it('should accept null for a nullable union', () => {
      expect(validatePayload(userSchema, user({ email: null })).valid).toBe(true);
    });

    it('should fill missing fields from their defaults', () => {
      const { active: _active, ...rest } = JSON.parse(user());

      expect(validatePayload(userSchema, JSON.stringify(rest)).valid).toBe(true);
    });

    it('should report invalid JSON', () => {
      const result = validatePayload(userSchema, '{"id": ');

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^invalid JSON: /);
    });

    it('should report a value of the wrong type with its path', () => {
      const result = validatePayload(userSchema, user({ id: 'seven' }));

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('validation failed at /id: "seven"');
    });

    it('should report a missing field without default', () => {
      const { name: _name, ...rest } = JSON.parse(user());

      const result = validatePayload(userSchema, JSON.stringify(rest));

      expect(result.errors).toContain('validation failed at /name: missing value');
    });

    it('should report an unknown enum symbol', () => {
      const result = validatePayload(userSchema, user({ role: 'OWNER' }));

      expect(result.errors).toContain('validation failed at /role: "OWNER"');
    });

    it('should report a union value that matches no branch', () => {
      const result = validatePayload(userSchema, user({ email: 5 }));

      expect(result).toEqual({ valid: false, errors: ['/email: 5 matches no union branch'] });
    });

    it('should read a one-key object as a map when a map branch accepts it', () => {
      const schema = compileSchema(
        JSON.stringify({
          type: 'record',
          name: 'Labels',
          fields: [{ name: 'v', type: ['null', 'string', { type: 'map', values: 'string' }] }],
        }),
      );

      const decoded = decodePayload(schema, encodePayload(schema, '{"v": {"string": "x"}}'));

      expect(JSON.parse(decoded)).toEqual({ v: { string: 'x' } });
    });

    it('should unwrap a member named after a record whose fields all have defaults', () => {
      const schema = compileSchema(
        JSON.stringify({
          type: 'record',
          name: 'Shape',
          fields: [
            {
              name: 'origin',
              type: ['null', { type: 'record', name: 'Point', fields: [{ name: 'x', type: 'int', default: 0 }] }],
            },
          ],
        }),
      );

      const decoded = decodePayload(schema, encodePayload(schema, '{"origin": {"Point": {"x": 3}}}'));

      expect(JSON.parse(decoded)).toEqual({ origin: { x: 3 } });
    });

    it('should report bytes characters above U+00FF', () => {
      const schema = compileSchema(
        JSON.stringify({ type: 'record', name: 'Blob', fields: [{ name: 'raw', type: 'bytes' }] }),
      );

      expect(validatePayload(schema, '{"raw": "a\u20ac"}')).toEqual({
        valid: false,
        errors: ['/raw: character U+20AC is not a byte'],
      });
    });

    it('should report a non-object where a record is expected', () => {
      const result = validatePayload(userSchema, '[]');

      expect(result).toEqual({ valid: false, errors: ['/: expected record com.acme.User, got array'] });
    });
  });

  describe('encodePayload', () => {
    it('should throw PayloadValidationError carrying every message', () => {
      const error = catchValidation(() => encodePayload(userSchema, user({ email: 5, tags: 'x' })));

      expect(error.errors).toEqual(['/email: 5 matches no union branch', '/tags: expected array, got string']);
      expect(error.message).toBe('/email: 5 matches no union branch; /tags: expected array, got string');
    });

    it('should refuse fixed values with characters outside the byte range', () => {
      const schema = compileSchema(
        JSON.stringify({ type: 'record', name: 'Digest', fields: [{ name: 'sum', type: { type: 'fixed', name: 'Sum', size: 2 } }] }),
      );

      const error = catchValidation(() => encodePayload(schema, JSON.stringify({ sum: 'é€' })));

      expect(error.errors).toEqual(['/sum: character U+20AC is not a byte']);
    });

    it('should throw SchemaDefinitionError when the schema cannot be bound', () => {
      const broken = compileSchema('{"type": "record", "name": "Broken"}');

      expect(() => encodePayload(broken, '{}')).toThrow(SchemaDefinitionError);
    });
  });

  describe('decodePayload', () => {
    it('should decode bytes fields as strings of byte values', () => {
      const schema = compileSchema(
        JSON.stringify({ type: 'record', name: 'Blob', fields: [{ name: 'data', type: 'bytes' }] }),
      );
      const encoded = encodePayload(schema, JSON.stringify({ data: '\u0001ÿ' }));

      expect(JSON.parse(decodePayload(schema, encoded))).toEqual({ data: '\u0001ÿ' });
    });

    it('should format the decoded document with two-space indentation', () => {
      const schema = compileSchema(
        JSON.stringify({ type: 'record', name: 'Point', fields: [{ name: 'x', type: 'int' }] }),
      );

      expect(decodePayload(schema, encodePayload(schema, '{"x": 3}'))).toBe('{\n  "x": 3\n}');
    });

    it('should throw PayloadDecodeError for truncated data', () => {
      expect(() => decodePayload(userSchema, new Uint8Array())).toThrow(PayloadDecodeError);
    });
  });
});
