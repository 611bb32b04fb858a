/**
 * Workflow Engine
 *
 * `initialize` and `update` are pure: they take the current session and an
 * event and return the next session plus the commands to run. Nothing here
 * performs I/O; the runtime executes the commands and feeds their outcomes
 * back through `update`.
 */

import {
  emptyBrowser,
  handleBrowseKey,
  handleConsumerOpened,
  handleConsumingKey,
  handleDraftLoaded,
  handleDraftSaved,
  handleDraftsListed,
  handleEditorClosed,
  handleLoadDraftKey,
  handleMessagesFetched,
  handlePublished,
  handleSaveDraftKey,
  handleSchemaLoaded,
  handleSearchKey,
  handleSendDraftKey,
  handleSubjectsLoaded,
} from './planning/index.js';
import { stay, withStatus } from './planning/shared.js';
import type { EngineEvent, EngineOptions, Key, Outcome, Session, Transition } from './types.js';

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  consumeBatchSize: 10,
  consumeTimeoutMs: 5_000,
  publishTimeoutMs: 10_000,
  pageSize: 10,
};

export function initialize(): Transition {
  const session: Session = {
    browser: emptyBrowser(),
    status: { level: 'info', text: 'Loading subjects...' },
    requestCounter: 0,
    mode: { kind: 'loading' },
  };
  return { session, commands: [{ type: 'LOAD_SUBJECTS' }] };
}

export function update(
  session: Session,
  event: EngineEvent,
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS,
): Transition {
  switch (event.type) {
    case 'KEY':
      return handleKey(session, event.key, options);
    case 'SUBJECTS_LOADED':
      return handleSubjectsLoaded(session, event.result);
    case 'SCHEMA_LOADED':
      return handleSchemaLoaded(session, event.subject, event.result);
    case 'PUBLISHED':
      return handlePublished(session, event.subject, event.schemaId, event.result);
    case 'CONSUMER_OPENED':
      return handleConsumerOpened(session, event.requestId, event.result);
    case 'MESSAGES_FETCHED':
      return handleMessagesFetched(session, event.requestId, event.result);
    case 'DRAFT_SAVED':
      return handleDraftSaved(session, event.result);
    case 'DRAFTS_LISTED':
      return handleDraftsListed(session, event.result);
    case 'DRAFT_LOADED':
      return handleDraftLoaded(session, event.result);
    case 'EDITOR_CLOSED':
      return handleEditorClosed(session, event.result);
    case 'COPIED':
      return handleCopied(session, event.label, event.result);
  }
}

/**
 * Route a key to the active mode. Modes with their own input take every key;
 * global bindings only exist in Loading, Browsing and Viewing.
 */
function handleKey(session: Session, key: Key, options: EngineOptions): Transition {
  // Errors stay on screen until the next key press
  const current = session.status?.level === 'error' ? { ...session, status: null } : session;
  const { mode } = current;

  switch (mode.kind) {
    case 'loading':
    case 'browsing':
    case 'viewing':
      return handleBrowseKey(current, mode, key, options);
    case 'searching':
      return handleSearchKey(current, mode, key);
    case 'sendDraft':
      return handleSendDraftKey(current, mode, key, options);
    case 'sending':
      // Only the publish outcome leaves Sending
      return stay(session);
    case 'saveDraft':
      return handleSaveDraftKey(current, mode, key);
    case 'loadDraft':
      return handleLoadDraftKey(current, mode, key);
    case 'consuming':
      return handleConsumingKey(current, mode, key, options);
  }
}

function handleCopied(session: Session, label: string, result: Outcome<null>): Transition {
  return result.ok
    ? stay(withStatus(session, 'success', `Copied ${label} to clipboard`))
    : stay(withStatus(session, 'error', `Copy failed: ${result.error}`));
}
