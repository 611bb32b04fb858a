/**
 * Browse Planning
 *
 * Key handling for the modes without exclusive input (Loading, Browsing,
 * Viewing) and the registry outcomes that drive them.
 *
 * Schema fetches are never cancelled: each carries its subject and only the
 * result for the most recently requested subject is applied.
 */

import type {
  BrowsingMode,
  EngineOptions,
  Key,
  LoadingMode,
  Outcome,
  RegistrySchema,
  Session,
  Transition,
  ViewingMode,
} from '../types.js';
import { errorMessage } from '../errors.js';
import {
  applyFilter,
  createContext,
  lineCount,
  moveSelection,
  scrollViewer,
  selectedSubject,
  updateBrowser,
} from './browser.js';
import { enterConsuming } from './consume.js';
import { enterSendDraft } from './send.js';
import { discard, matches, stay, toMode, withStatus } from './shared.js';

type BrowseMode = LoadingMode | BrowsingMode | ViewingMode;

/** Modes whose data depends on the current schema context */
const CONTEXT_BOUND_MODES = new Set(['sendDraft', 'sending', 'saveDraft', 'loadDraft', 'consuming']);

// ============================================================================
// Keys
// ============================================================================

export function handleBrowseKey(
  session: Session,
  mode: BrowseMode,
  key: Key,
  options: EngineOptions,
): Transition {
  if (matches(key, 'quit')) {
    return { session, commands: [{ type: 'QUIT' }] };
  }

  if (mode.kind === 'loading') {
    return stay(session);
  }

  if (matches(key, 'search')) {
    return toMode(session, { kind: 'searching', resume: mode });
  }

  if (matches(key, 'switchPane')) {
    const focusedPane = session.browser.focusedPane === 'list' ? 'viewer' : 'list';
    return stay(updateBrowser(session, (browser) => ({ ...browser, focusedPane })));
  }

  if (matches(key, 'copy')) {
    if (mode.kind !== 'viewing') {
      return stay(withStatus(session, 'error', 'No schema loaded'));
    }
    return { session, commands: [{ type: 'COPY', label: 'schema', text: mode.context.prettySchema }] };
  }

  if (mode.kind === 'viewing') {
    if (matches(key, 'edit')) return enterSendDraft(session, mode.context, false);
    if (matches(key, 'editExternal')) return enterSendDraft(session, mode.context, true);
    if (matches(key, 'consume')) return enterConsuming(session, mode.context);
  }

  return session.browser.focusedPane === 'list'
    ? handleListKey(session, key, options)
    : handleViewerKey(session, mode, key, options);
}

function handleListKey(session: Session, key: Key, options: EngineOptions): Transition {
  if (matches(key, 'up')) return stay(updateBrowser(session, (browser) => moveSelection(browser, -1)));
  if (matches(key, 'down')) return stay(updateBrowser(session, (browser) => moveSelection(browser, 1)));
  if (matches(key, 'pageUp')) {
    return stay(updateBrowser(session, (browser) => moveSelection(browser, -options.pageSize)));
  }
  if (matches(key, 'pageDown')) {
    return stay(updateBrowser(session, (browser) => moveSelection(browser, options.pageSize)));
  }
  if (matches(key, 'enter')) return requestSchema(session);
  return stay(session);
}

function handleViewerKey(session: Session, mode: BrowseMode, key: Key, options: EngineOptions): Transition {
  if (mode.kind !== 'viewing') return stay(session);

  const lines = lineCount(mode.context.prettySchema);
  const scroll = (delta: number) => stay(updateBrowser(session, (browser) => scrollViewer(browser, delta, lines)));

  if (matches(key, 'up')) return scroll(-1);
  if (matches(key, 'down')) return scroll(1);
  if (matches(key, 'pageUp')) return scroll(-options.pageSize);
  if (matches(key, 'pageDown')) return scroll(options.pageSize);
  return stay(session);
}

/**
 * Fetch the selected subject's latest schema. The mode does not change until
 * the result arrives.
 */
export function requestSchema(session: Session): Transition {
  const subject = selectedSubject(session.browser);
  if (subject === undefined) return stay(session);

  const next = withStatus(
    updateBrowser(session, (browser) => ({ ...browser, requestedSubject: subject })),
    'info',
    `Loading schema for ${subject}...`,
  );
  return { session: next, commands: [{ type: 'LOAD_SCHEMA', subject }] };
}

// ============================================================================
// Registry outcomes
// ============================================================================

export function handleSubjectsLoaded(session: Session, result: Outcome<string[]>): Transition {
  if (session.mode.kind !== 'loading') {
    return discard(session, 'subject list arrived after loading finished');
  }

  if (!result.ok) {
    return toMode(withStatus(session, 'error', `Failed to load subjects: ${result.error}`), { kind: 'browsing' });
  }

  const subjects = [...result.value];
  const loaded = updateBrowser(session, (browser) => applyFilter({ ...browser, subjects }, browser.filter));
  return toMode(withStatus(loaded, 'info', `Loaded ${subjects.length} subjects`), { kind: 'browsing' });
}

export function handleSchemaLoaded(session: Session, subject: string, result: Outcome<RegistrySchema>): Transition {
  if (subject !== session.browser.requestedSubject) {
    return discard(session, `schema for ${subject} superseded by ${session.browser.requestedSubject}`);
  }
  if (CONTEXT_BOUND_MODES.has(session.mode.kind)) {
    return discard(session, `schema for ${subject} arrived during ${session.mode.kind}`);
  }

  if (!result.ok) {
    return stay(withStatus(session, 'error', `Failed to load schema for ${subject}: ${result.error}`));
  }

  let viewing: ViewingMode;
  try {
    viewing = { kind: 'viewing', context: createContext(result.value) };
  } catch (error) {
    return stay(withStatus(session, 'error', `Schema for ${subject} is unusable: ${errorMessage(error)}`));
  }

  const { version, id } = result.value;
  const next = withStatus(
    updateBrowser(session, (browser) => ({ ...browser, viewerScroll: 0 })),
    'info',
    `${subject} (version ${version}, id ${id})`,
  );

  // A search in progress resumes into the new schema
  if (session.mode.kind === 'searching') {
    return toMode(next, { kind: 'searching', resume: viewing });
  }
  return toMode(next, viewing);
}
