// @avrodeck/engine - session state, pure workflow engine and command runtime

// Engine
export { DEFAULT_ENGINE_OPTIONS, initialize, update } from './engine.js';
export { Runtime } from './runtime.js';
export type { RuntimeOptions } from './runtime.js';

// Dispatch
export { decodeMessages } from './dispatch/decode.js';
export { executeCommand } from './dispatch/execute.js';
export type { ExecuteContext } from './dispatch/execute.js';

// Planning helpers used by renderers
export { filterSubjects, keyId, KEYS, selectedSubject } from './planning/index.js';

// Core
export * from './errors.js';
export * from './gateways.js';
export * from './text-buffer.js';
export * from './topic.js';
export * from './types.js';
