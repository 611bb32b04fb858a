/**
 * Draft Planning
 *
 * Save-draft (name prompt) and Load-draft (picker over saved drafts for the
 * current topic). Both return to Send-draft on success or Esc.
 */

import { bufferText, createBuffer } from '../text-buffer.js';
import type {
  Draft,
  Key,
  LoadDraftMode,
  Outcome,
  SaveDraftMode,
  SavedDraft,
  SavedDraftEntry,
  Session,
  Transition,
} from '../types.js';
import { sendDraftMode } from './send.js';
import { clamp, discard, matches, stay, toMode, typedText, withStatus } from './shared.js';

// ============================================================================
// Save-draft
// ============================================================================

export function handleSaveDraftKey(session: Session, mode: SaveDraftMode, key: Key): Transition {
  if (mode.saving) return stay(session);

  if (matches(key, 'escape')) {
    return toMode(session, sendDraftMode(mode.context, mode.draft));
  }

  if (matches(key, 'enter')) {
    const name = mode.name.trim();
    return toMode(session, { ...mode, saving: true, error: null }, [
      {
        type: 'SAVE_DRAFT',
        topic: mode.context.topic,
        schemaId: mode.context.schemaId,
        payload: bufferText(mode.draft.value),
        ...(name === '' ? {} : { name }),
      },
    ]);
  }

  if (key.name === 'backspace' && !key.ctrl) {
    return toMode(session, { ...mode, name: mode.name.slice(0, -1) });
  }

  const text = typedText(key);
  return text === undefined ? stay(session) : toMode(session, { ...mode, name: mode.name + text });
}

export function handleDraftSaved(session: Session, result: Outcome<string>): Transition {
  const { mode } = session;
  if (mode.kind !== 'saveDraft' || !mode.saving) {
    return discard(session, 'draft save finished outside of Save-draft');
  }

  if (!result.ok) {
    return toMode(withStatus(session, 'error', `Save failed: ${result.error}`), {
      ...mode,
      saving: false,
      error: result.error,
    });
  }

  return toMode(withStatus(session, 'success', `Saved draft to ${result.value}`), sendDraftMode(mode.context, mode.draft));
}

// ============================================================================
// Load-draft
// ============================================================================

export function handleLoadDraftKey(session: Session, mode: LoadDraftMode, key: Key): Transition {
  if (matches(key, 'escape')) {
    return toMode(session, sendDraftMode(mode.context, mode.draft));
  }
  if (mode.loading || mode.entries === null) return stay(session);

  const last = mode.entries.length - 1;
  if (matches(key, 'up')) {
    return toMode(session, { ...mode, index: clamp(mode.index - 1, 0, Math.max(last, 0)) });
  }
  if (matches(key, 'down')) {
    return toMode(session, { ...mode, index: clamp(mode.index + 1, 0, Math.max(last, 0)) });
  }

  if (matches(key, 'enter')) {
    const entry = mode.entries[mode.index];
    if (entry === undefined) return stay(session);
    return toMode(session, { ...mode, loading: true, error: null }, [{ type: 'LOAD_DRAFT', path: entry.path }]);
  }

  return stay(session);
}

export function handleDraftsListed(session: Session, result: Outcome<SavedDraftEntry[]>): Transition {
  const { mode } = session;
  if (mode.kind !== 'loadDraft' || !mode.loading || mode.entries !== null) {
    return discard(session, 'draft listing arrived outside of Load-draft');
  }

  if (!result.ok) {
    return toMode(withStatus(session, 'error', `Cannot list drafts: ${result.error}`), {
      ...mode,
      entries: [],
      loading: false,
      error: result.error,
    });
  }

  const next =
    result.value.length === 0 ? withStatus(session, 'info', `No saved drafts for topic ${mode.context.topic}`) : session;
  return toMode(next, { ...mode, entries: result.value, index: 0, loading: false });
}

export function handleDraftLoaded(session: Session, result: Outcome<SavedDraft>): Transition {
  const { mode } = session;
  if (mode.kind !== 'loadDraft' || !mode.loading || mode.entries === null) {
    return discard(session, 'draft load finished outside of Load-draft');
  }

  if (!result.ok) {
    return toMode(withStatus(session, 'error', `Cannot load draft: ${result.error}`), {
      ...mode,
      loading: false,
      error: result.error,
    });
  }

  const saved = result.value;
  const draft: Draft = { ...mode.draft, value: createBuffer(saved.payload), focus: 'value' };
  const next =
    saved.schemaId === mode.context.schemaId
      ? withStatus(session, 'success', `Loaded draft ${saved.name}`)
      : withStatus(
          session,
          'info',
          `Loaded draft ${saved.name} (saved with schema id ${saved.schemaId}, current ${mode.context.schemaId})`,
        );
  return toMode(next, sendDraftMode(mode.context, draft));
}
