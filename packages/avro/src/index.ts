// @avrodeck/avro - Avro schema compilation, template generation and wire encoding

// Codec
export * from './codec/envelope.js';
export * from './codec/json.js';
export * from './codec/payload.js';

// Generators
export * from './generators/template.js';

// Core
export * from './errors.js';
export * from './schema.js';
export * from './types.js';
export * from './utils.js';
