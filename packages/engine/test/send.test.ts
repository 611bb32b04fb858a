/**
 * Unit tests for Send-draft, Sending and the external editor round trip.
 */

import { describe, expect, it } from 'vitest';
import { update } from '../src/engine.js';
import { bufferText } from '../src/text-buffer.js';
import type { EngineEvent, Key, Session } from '../src/types.js';
import {
  ORDER_TEMPLATE,
  createRegistrySchema,
  ctrl,
  feed,
  keyEvent,
  modeOf,
  press,
  sendDraftSession,
  typeText,
  viewingSession,
} from './fixtures.js';

function published(ok: boolean, schemaId = 42): EngineEvent {
  return {
    type: 'PUBLISHED',
    subject: 'orders-value',
    schemaId,
    result: ok ? { ok: true, value: { topic: 'orders' } } : { ok: false, error: 'broker unavailable' },
  };
}

function sendingSession(): Session {
  return press(sendDraftSession(), ctrl('s')).session;
}

describe('entering Send-draft', () => {
  it('generates the draft from the schema template', () => {
    const session = sendDraftSession();
    const mode = modeOf(session, 'sendDraft');

    expect(bufferText(mode.draft.value)).toBe(ORDER_TEMPLATE);
    expect(mode.draft.key).toBe('');
    expect(mode.draft.focus).toBe('value');
    expect(mode.editor).toBeNull();
    expect(session.status).toEqual({ level: 'info', text: 'Target topic: orders' });
  });

  it('accepts s as well as e', () => {
    expect(press(viewingSession(), 's').session.mode.kind).toBe('sendDraft');
  });

  it('stays in Viewing when no template can be generated', () => {
    const viewing = viewingSession(createRegistrySchema({ schemaText: '{"type": "record", "name": "Broken"}' }));

    const { session, commands } = press(viewing, 'e');

    expect(commands).toEqual([]);
    expect(session.mode.kind).toBe('viewing');
    expect(session.status).toEqual({ level: 'error', text: "Cannot generate a draft: record missing 'fields'" });
  });

  it('leaves for Viewing on escape', () => {
    const session = press(sendDraftSession(), 'escape').session;

    expect(modeOf(session, 'viewing').context.subject).toBe('orders-value');
  });
});

describe('editing the draft', () => {
  it('edits the value at the cursor', () => {
    const session = press(sendDraftSession(), 'end', 'enter', 'backspace', 'x').session;

    expect(modeOf(session, 'sendDraft').draft.value.lines[0]).toBe('{x');
  });

  it('edits the key after switching fields', () => {
    let session = press(sendDraftSession(), 'tab').session;
    session = typeText(session, 'k12');
    session = press(session, 'backspace').session;

    const { draft } = modeOf(session, 'sendDraft');
    expect(draft.focus).toBe('key');
    expect(draft.key).toBe('k1');
    expect(bufferText(draft.value)).toBe(ORDER_TEMPLATE);
  });

  it('switches back with shift+tab', () => {
    const shiftTab: Key = { name: 'tab', shift: true };
    const session = press(sendDraftSession(), 'tab', shiftTab).session;

    expect(modeOf(session, 'sendDraft').draft.focus).toBe('value');
  });

  it('copies the draft with ctrl+y', () => {
    expect(press(sendDraftSession(), ctrl('y')).commands).toEqual([
      { type: 'COPY', label: 'draft', text: ORDER_TEMPLATE },
    ]);
  });
});

describe('publishing', () => {
  it('validates, encodes and enters Sending', () => {
    const { session, commands } = press(sendDraftSession(), ctrl('s'));

    expect(session.mode.kind).toBe('sending');
    expect(session.status).toEqual({ level: 'info', text: 'Publishing to orders...' });
    expect(commands).toHaveLength(1);

    const [command] = commands;
    if (command.type !== 'PUBLISH') throw new Error(`unexpected ${command.type}`);
    expect(command.subject).toBe('orders-value');
    expect(command.schemaId).toBe(42);
    expect(command.topic).toBe('orders');
    expect(command.key).toBeNull();
    expect(command.timeoutMs).toBe(10_000);
    // envelope (marker, id 42) + long 0, union branch 1, empty string
    expect([...command.value]).toEqual([0, 0, 0, 0, 42, 0, 2, 0]);
  });

  it('sends the key when one is given', () => {
    const withKey = typeText(press(sendDraftSession(), 'tab').session, 'order-1');

    const [command] = press(withKey, ctrl('s')).commands;

    expect(command).toMatchObject({ type: 'PUBLISH', key: 'order-1' });
  });

  it('stays in Send-draft with the draft unchanged when validation fails', () => {
    const broken = press(sendDraftSession(), 'x').session;

    const { session, commands } = press(broken, ctrl('s'));
    const mode = modeOf(session, 'sendDraft');

    expect(commands).toEqual([]);
    expect(mode.draft).toBe(modeOf(broken, 'sendDraft').draft);
    expect(mode.error).toMatch(/^invalid JSON: /);
    expect(session.status?.level).toBe('error');
    expect(session.status?.text).toMatch(/^Validation failed: invalid JSON: /);
  });

  it('reports schema mismatches', () => {
    let session = sendDraftSession();
    // Replace the template through the editor path
    session = press(session, ctrl('e')).session;
    session = feed(session, { type: 'EDITOR_CLOSED', result: { ok: true, value: '{"id": "one", "note": null}' } })
      .session;

    const mode = modeOf(press(session, ctrl('s')).session, 'sendDraft');

    expect(mode.error).toBe('validation failed at /id: "one"');
  });
});

describe('Sending', () => {
  it('ignores every key', () => {
    const session = sendingSession();

    for (const input of ['q', 'escape', 'enter', 'a', ctrl('c'), ctrl('s'), ctrl('n')]) {
      const transition = update(session, keyEvent(input));
      expect(transition.session).toBe(session);
      expect(transition.commands).toEqual([]);
    }
  });

  it('returns to Viewing when the message is produced', () => {
    const { session } = feed(sendingSession(), published(true));

    expect(session.mode.kind).toBe('viewing');
    expect(session.status).toEqual({ level: 'success', text: "Message produced to topic 'orders'" });
  });

  it('returns to Send-draft with the draft when publishing fails', () => {
    const sending = sendingSession();

    const { session } = feed(sending, published(false));
    const mode = modeOf(session, 'sendDraft');

    expect(mode.draft).toBe(modeOf(sending, 'sending').draft);
    expect(mode.error).toBe('broker unavailable');
    expect(session.status).toEqual({ level: 'error', text: 'Publish failed: broker unavailable' });
  });

  it('discards a publish result for another schema', () => {
    const sending = sendingSession();

    const transition = update(sending, published(true, 41));

    expect(transition.session).toBe(sending);
    expect(transition.discarded).toBeDefined();
  });

  it('discards a publish result outside Sending', () => {
    const viewing = viewingSession();

    expect(update(viewing, published(true)).session).toBe(viewing);
  });
});

describe('external editor', () => {
  it('opens the template in the editor from Viewing', () => {
    const { session, commands } = press(viewingSession(), 'E');

    expect(modeOf(session, 'sendDraft').editor).toBe('viewing');
    expect(commands).toEqual([{ type: 'OPEN_EDITOR', text: ORDER_TEMPLATE }]);
  });

  it('ignores keys while the editor is open', () => {
    const editing = press(viewingSession(), 'E').session;

    expect(press(editing, 'x', ctrl('s')).session).toBe(editing);
  });

  it('replaces the draft with the edited text', () => {
    const editing = press(viewingSession(), 'E').session;

    const { session } = feed(editing, { type: 'EDITOR_CLOSED', result: { ok: true, value: '{"id": 5,\n"note": null}' } });
    const mode = modeOf(session, 'sendDraft');

    expect(mode.editor).toBeNull();
    expect(mode.draft.value.lines).toEqual(['{"id": 5,', '"note": null}']);
    expect(session.status).toEqual({ level: 'info', text: 'Draft updated from editor' });
  });

  it('returns to Viewing when an editor started from Viewing fails', () => {
    const editing = press(viewingSession(), 'E').session;

    const { session } = feed(editing, { type: 'EDITOR_CLOSED', result: { ok: false, error: 'no editor found' } });

    expect(session.mode.kind).toBe('viewing');
    expect(session.status).toEqual({ level: 'error', text: 'Editor failed: no editor found' });
  });

  it('keeps the draft when an editor started from Send-draft fails', () => {
    const editing = press(sendDraftSession(), ctrl('e')).session;

    const { session } = feed(editing, { type: 'EDITOR_CLOSED', result: { ok: false, error: 'no editor found' } });
    const mode = modeOf(session, 'sendDraft');

    expect(mode.editor).toBeNull();
    expect(bufferText(mode.draft.value)).toBe(ORDER_TEMPLATE);
  });

  it('discards an editor result when no editor is open', () => {
    const session = sendDraftSession();

    expect(update(session, { type: 'EDITOR_CLOSED', result: { ok: true, value: '{}' } }).discarded).toBeDefined();
  });
});
