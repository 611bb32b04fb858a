/**
 * Send Planning
 *
 * Send-draft editing, the synchronous validate-and-encode step behind
 * ctrl+s, the Sending wait and the external editor round trip.
 */

import { encodePayload, renderTemplate, wrapEnvelope } from '@avrodeck/avro';
import { errorMessage } from '../errors.js';
import {
  bufferText,
  createBuffer,
  deleteBackward,
  deleteForward,
  insertNewline,
  insertText,
  moveCursor,
} from '../text-buffer.js';
import type { CursorMove } from '../text-buffer.js';
import type {
  Draft,
  EngineOptions,
  Key,
  Outcome,
  SchemaContext,
  SendDraftMode,
  SendingMode,
  Session,
  Transition,
} from '../types.js';
import { discard, matches, stay, toMode, typedText, withStatus } from './shared.js';

const CURSOR_KEYS = new Map<string, CursorMove>([
  ['left', 'left'],
  ['right', 'right'],
  ['up', 'up'],
  ['down', 'down'],
  ['home', 'home'],
  ['end', 'end'],
]);

export function sendDraftMode(context: SchemaContext, draft: Draft): SendDraftMode {
  return { kind: 'sendDraft', context, draft, editor: null, error: null };
}

/**
 * Enter Send-draft with a fresh draft generated from the schema. With
 * `external`, the draft goes straight to the external editor.
 */
export function enterSendDraft(session: Session, context: SchemaContext, external: boolean): Transition {
  let template: string;
  try {
    template = renderTemplate(context.compiled);
  } catch (error) {
    return stay(withStatus(session, 'error', `Cannot generate a draft: ${errorMessage(error)}`));
  }

  const draft: Draft = { value: createBuffer(template), key: '', focus: 'value' };
  const next = withStatus(session, 'info', `Target topic: ${context.topic}`);

  if (external) {
    return toMode(next, { ...sendDraftMode(context, draft), editor: 'viewing' }, [
      { type: 'OPEN_EDITOR', text: template },
    ]);
  }
  return toMode(next, sendDraftMode(context, draft));
}

// ============================================================================
// Send-draft
// ============================================================================

export function handleSendDraftKey(
  session: Session,
  mode: SendDraftMode,
  key: Key,
  options: EngineOptions,
): Transition {
  // The external editor owns the terminal
  if (mode.editor !== null) return stay(session);

  const { context, draft } = mode;

  if (matches(key, 'escape')) {
    return toMode(withStatus(session, 'info', context.subject), { kind: 'viewing', context });
  }
  if (matches(key, 'send')) {
    return publish(session, mode, options);
  }
  if (matches(key, 'saveDraft')) {
    return toMode(session, { kind: 'saveDraft', context, draft, name: '', saving: false, error: null });
  }
  if (matches(key, 'loadDraft')) {
    return toMode(
      session,
      { kind: 'loadDraft', context, draft, entries: null, index: 0, loading: true, error: null },
      [{ type: 'LIST_DRAFTS', topic: context.topic }],
    );
  }
  if (matches(key, 'switchField')) {
    const focus = draft.focus === 'value' ? 'key' : 'value';
    return toMode(session, { ...mode, draft: { ...draft, focus } });
  }
  if (matches(key, 'draftEditor')) {
    return toMode(session, { ...mode, editor: 'sendDraft' }, [
      { type: 'OPEN_EDITOR', text: bufferText(draft.value) },
    ]);
  }
  if (matches(key, 'copyDraft')) {
    return { session, commands: [{ type: 'COPY', label: 'draft', text: bufferText(draft.value) }] };
  }

  const edited = editDraft(draft, key);
  if (edited === draft) return stay(session);
  return toMode(session, { ...mode, draft: edited, error: null });
}

function editDraft(draft: Draft, key: Key): Draft {
  if (draft.focus === 'key') {
    if (key.name === 'backspace' && !key.ctrl) {
      return draft.key === '' ? draft : { ...draft, key: draft.key.slice(0, -1) };
    }
    const text = typedText(key);
    return text === undefined ? draft : { ...draft, key: draft.key + text };
  }

  const buffer = draft.value;
  if (key.ctrl) return draft;

  const move = CURSOR_KEYS.get(key.name);
  if (move !== undefined && key.text === undefined) {
    return { ...draft, value: moveCursor(buffer, move) };
  }

  switch (key.name) {
    case 'enter':
      return { ...draft, value: insertNewline(buffer) };
    case 'backspace':
      return { ...draft, value: deleteBackward(buffer) };
    case 'delete':
      return { ...draft, value: deleteForward(buffer) };
  }

  return key.text === undefined ? draft : { ...draft, value: insertText(buffer, key.text) };
}

/**
 * Validate and encode the draft, then hand the enveloped bytes to the
 * producer. Validation failures leave the draft untouched.
 */
function publish(session: Session, mode: SendDraftMode, options: EngineOptions): Transition {
  const { context, draft } = mode;

  let value: Buffer;
  try {
    value = wrapEnvelope(context.schemaId, encodePayload(context.compiled, bufferText(draft.value)));
  } catch (error) {
    const message = errorMessage(error);
    return toMode(withStatus(session, 'error', `Validation failed: ${message}`), { ...mode, error: message });
  }

  const key = draft.key.trim() === '' ? null : draft.key;
  const sending: SendingMode = { kind: 'sending', context, draft };

  return toMode(withStatus(session, 'info', `Publishing to ${context.topic}...`), sending, [
    {
      type: 'PUBLISH',
      subject: context.subject,
      schemaId: context.schemaId,
      topic: context.topic,
      key,
      value,
      timeoutMs: options.publishTimeoutMs,
    },
  ]);
}

// ============================================================================
// Sending
// ============================================================================

export function handlePublished(
  session: Session,
  subject: string,
  schemaId: number,
  result: Outcome<{ topic: string }>,
): Transition {
  const { mode } = session;
  if (mode.kind !== 'sending' || mode.context.subject !== subject || mode.context.schemaId !== schemaId) {
    return discard(session, `publish result for ${subject} (id ${schemaId}) has no matching send`);
  }

  if (!result.ok) {
    return toMode(
      withStatus(session, 'error', `Publish failed: ${result.error}`),
      { ...sendDraftMode(mode.context, mode.draft), error: result.error },
    );
  }

  return toMode(
    withStatus(session, 'success', `Message produced to topic '${result.value.topic}'`),
    { kind: 'viewing', context: mode.context },
  );
}

// ============================================================================
// External editor
// ============================================================================

export function handleEditorClosed(session: Session, result: Outcome<string>): Transition {
  const { mode } = session;
  if (mode.kind !== 'sendDraft' || mode.editor === null) {
    return discard(session, 'editor closed outside of an editing session');
  }

  if (!result.ok) {
    const next = withStatus(session, 'error', `Editor failed: ${result.error}`);
    return mode.editor === 'viewing'
      ? toMode(next, { kind: 'viewing', context: mode.context })
      : toMode(next, { ...mode, editor: null });
  }

  const draft: Draft = { ...mode.draft, value: createBuffer(result.value), focus: 'value' };
  return toMode(withStatus(session, 'info', 'Draft updated from editor'), { ...mode, draft, editor: null, error: null });
}
