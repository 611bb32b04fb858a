/**
 * Helpers shared by the planning modules: key matching, status updates and
 * transition builders.
 */

import type { Command, Key, Mode, Session, StatusLevel, Transition } from '../types.js';

// ============================================================================
// Keys
// ============================================================================

/**
 * Canonical id of a key press: 'ctrl+s', 'shift+tab', 'enter', 'E', '/'.
 * Shift only appears for non-printable keys; printable keys carry their case.
 */
export function keyId(key: Key): string {
  const ctrl = key.ctrl ? 'ctrl+' : '';
  const shift = key.shift && key.text === undefined ? 'shift+' : '';
  return `${ctrl}${shift}${key.name}`;
}

export const KEYS = {
  up: ['up', 'k'],
  down: ['down', 'j'],
  pageUp: ['pageup', 'ctrl+u'],
  pageDown: ['pagedown', 'ctrl+d'],
  enter: ['enter'],
  escape: ['escape'],
  quit: ['q', 'ctrl+c'],
  search: ['/'],
  switchPane: ['tab'],
  copy: ['y'],
  edit: ['e', 's'],
  editExternal: ['E'],
  consume: ['c'],
  fetch: ['enter', 'f'],
  send: ['ctrl+s'],
  saveDraft: ['ctrl+n'],
  loadDraft: ['ctrl+o'],
  switchField: ['tab', 'shift+tab'],
  draftEditor: ['ctrl+e'],
  copyDraft: ['ctrl+y'],
} as const satisfies Record<string, readonly string[]>;

export type Binding = keyof typeof KEYS;

export function matches(key: Key, binding: Binding): boolean {
  const ids: readonly string[] = KEYS[binding];
  return ids.includes(keyId(key));
}

/** Text a key inserts into an input field, if any */
export function typedText(key: Key): string | undefined {
  return key.ctrl ? undefined : key.text;
}

// ============================================================================
// Transitions
// ============================================================================

export function stay(session: Session): Transition {
  return { session, commands: [] };
}

export function discard(session: Session, reason: string): Transition {
  return { session, commands: [], discarded: reason };
}

export function toMode(session: Session, mode: Mode, commands: Command[] = []): Transition {
  return { session: { ...session, mode }, commands };
}

export function withStatus(session: Session, level: StatusLevel, text: string): Session {
  return { ...session, status: { level, text } };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
