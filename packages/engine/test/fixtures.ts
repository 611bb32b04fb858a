/**
 * Shared fixtures for engine tests: schemas, key presses and session
 * builders that drive `update` to a given mode.
 */

import { createContext } from '../src/planning/browser.js';
import { initialize, update } from '../src/engine.js';
import type {
  Command,
  ConsumerHandle,
  EngineEvent,
  Key,
  RegistrySchema,
  SchemaContext,
  Session,
  Transition,
} from '../src/types.js';

// ============================================================================
// Schemas
// ============================================================================

export const ORDER_SCHEMA = JSON.stringify({
  type: 'record',
  name: 'Order',
  namespace: 'com.acme',
  fields: [
    { name: 'id', type: 'long' },
    { name: 'note', type: ['null', 'string'] },
  ],
});

export const ORDER_TEMPLATE = '{\n  "id": 0,\n  "note": ""\n}';

export const SUBJECTS = ['orders-value', 'payments-value', 'users-value'];

export function createRegistrySchema(overrides: Partial<RegistrySchema> = {}): RegistrySchema {
  return {
    subject: 'orders-value',
    version: 3,
    id: 42,
    schemaText: ORDER_SCHEMA,
    ...overrides,
  };
}

export function createSchemaContext(overrides: Partial<RegistrySchema> = {}): SchemaContext {
  return createContext(createRegistrySchema(overrides));
}

export const HANDLE: ConsumerHandle = { id: 'consumer-1', topic: 'orders' };

// ============================================================================
// Keys
// ============================================================================

/** A key press; single characters are printable and carry their text */
export function key(name: string): Key {
  return name.length === 1 ? { name, text: name } : { name };
}

export function ctrl(name: string): Key {
  return { name, ctrl: true };
}

export function keyEvent(input: string | Key): EngineEvent {
  return { type: 'KEY', key: typeof input === 'string' ? key(input) : input };
}

// ============================================================================
// Driving the engine
// ============================================================================

/**
 * Apply events in order and return the final transition; commands from
 * earlier steps are dropped.
 */
export function feed(session: Session, ...events: EngineEvent[]): Transition {
  let transition: Transition = { session, commands: [] };
  for (const event of events) {
    transition = update(transition.session, event);
  }
  return transition;
}

/** Press each key in turn, returning every command issued along the way */
export function press(session: Session, ...keys: (string | Key)[]): { session: Session; commands: Command[] } {
  let current = session;
  const commands: Command[] = [];
  for (const input of keys) {
    const transition = update(current, keyEvent(input));
    current = transition.session;
    commands.push(...transition.commands);
  }
  return { session: current, commands };
}

export function typeText(session: Session, text: string): Session {
  return press(session, ...[...text].map((char) => key(char))).session;
}

export function browsingSession(subjects: string[] = SUBJECTS): Session {
  return feed(initialize().session, { type: 'SUBJECTS_LOADED', result: { ok: true, value: subjects } }).session;
}

/** Browsing with the first subject's schema loaded */
export function viewingSession(schema: RegistrySchema = createRegistrySchema()): Session {
  const requested = press(browsingSession([schema.subject, 'payments-value']), 'enter').session;
  return feed(requested, { type: 'SCHEMA_LOADED', subject: schema.subject, result: { ok: true, value: schema } })
    .session;
}

export function sendDraftSession(): Session {
  return press(viewingSession(), 'e').session;
}

export function consumingSession(): Session {
  const opening = press(viewingSession(), 'c').session;
  return feed(opening, { type: 'CONSUMER_OPENED', requestId: 1, result: { ok: true, value: HANDLE } }).session;
}

export function modeOf<K extends Session['mode']['kind']>(
  session: Session,
  kind: K,
): Extract<Session['mode'], { kind: K }> {
  const { mode } = session;
  if (!isMode(mode, kind)) {
    throw new Error(`expected mode ${kind}, got ${mode.kind}`);
  }
  return mode;
}

function isMode<K extends Session['mode']['kind']>(
  mode: Session['mode'],
  kind: K,
): mode is Extract<Session['mode'], { kind: K }> {
  return mode.kind === kind;
}
