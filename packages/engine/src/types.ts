/**
 * Engine Type Definitions
 *
 * - Session: the complete UI state, owned by the engine
 * - Mode: the active workflow step and the data it carries
 * - EngineEvent: key presses and completed background operations
 * - Command: pure data describing background work for the runtime
 */

import type { CompiledSchema } from '@avrodeck/avro';

// ============================================================================
// Outcomes
// ============================================================================

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

// ============================================================================
// Domain Data
// ============================================================================

/** Latest schema of a subject as returned by the registry */
export type RegistrySchema = {
  subject: string;
  version: number;
  id: number;
  schemaText: string;
};

/**
 * Everything derived from one fetched schema. Replaced wholesale when
 * another subject's schema arrives; never mutated.
 */
export type SchemaContext = {
  subject: string;
  version: number;
  schemaId: number;
  schemaText: string;
  prettySchema: string;
  compiled: CompiledSchema;
  topic: string;
};

/** Multi-line text with a cursor; row and column index into lines */
export type TextBuffer = {
  lines: string[];
  row: number;
  col: number;
};

export type DraftField = 'value' | 'key';

export type Draft = {
  value: TextBuffer;
  key: string;
  focus: DraftField;
};

/** Opaque reference to an open consumer, owned by the Consuming mode that opened it */
export type ConsumerHandle = {
  readonly id: string;
  readonly topic: string;
};

/** A record as read from the broker, before the envelope is stripped */
export type RawMessage = {
  key: Buffer | null;
  value: Buffer | null;
  partition: number;
  offset: string;
  timestamp: string;
};

export type ConsumedMessage = {
  key: string | null;
  value: string;
  partition: number;
  offset: string;
  timestamp: string;
  /** Schema id read from the envelope; null when the value carries none */
  schemaId: number | null;
  decodeError?: string;
};

export type ConsumeResult =
  | { kind: 'messages'; messages: ConsumedMessage[] }
  | { kind: 'empty' }
  | { kind: 'error'; error: string };

export type SavedDraftEntry = {
  name: string;
  path: string;
};

export type SavedDraft = {
  name: string;
  payload: string;
  topic: string;
  schemaId: number;
  savedAt: string;
};

// ============================================================================
// Input
// ============================================================================

/**
 * A normalized key press. Printable characters use the character itself as
 * `name` and carry it in `text`; special keys use names such as 'enter',
 * 'escape', 'tab', 'up', 'pageup', 'backspace'.
 */
export type Key = {
  name: string;
  text?: string;
  ctrl?: boolean;
  shift?: boolean;
};

// ============================================================================
// Session State
// ============================================================================

export type Pane = 'list' | 'viewer';

export type BrowserState = {
  subjects: string[];
  filtered: string[];
  filter: string;
  selectedIndex: number;
  focusedPane: Pane;
  /** Subject of the most recent schema fetch; older results are discarded */
  requestedSubject: string | null;
  viewerScroll: number;
};

export type StatusLevel = 'info' | 'success' | 'error';

export type StatusLine = {
  level: StatusLevel;
  text: string;
};

export type LoadingMode = { kind: 'loading' };

export type BrowsingMode = { kind: 'browsing' };

export type ViewingMode = { kind: 'viewing'; context: SchemaContext };

export type SearchingMode = { kind: 'searching'; resume: BrowsingMode | ViewingMode };

/** Where an external editor session was started from */
export type EditorOrigin = 'viewing' | 'sendDraft';

export type SendDraftMode = {
  kind: 'sendDraft';
  context: SchemaContext;
  draft: Draft;
  /** Set while the external editor owns the terminal */
  editor: EditorOrigin | null;
  error: string | null;
};

export type SendingMode = {
  kind: 'sending';
  context: SchemaContext;
  draft: Draft;
};

export type SaveDraftMode = {
  kind: 'saveDraft';
  context: SchemaContext;
  draft: Draft;
  name: string;
  saving: boolean;
  error: string | null;
};

export type LoadDraftMode = {
  kind: 'loadDraft';
  context: SchemaContext;
  draft: Draft;
  /** null until the listing arrives */
  entries: SavedDraftEntry[] | null;
  index: number;
  loading: boolean;
  error: string | null;
};

export type ConsumingMode = {
  kind: 'consuming';
  context: SchemaContext;
  requestId: number;
  handle: ConsumerHandle | null;
  fetching: boolean;
  messages: ConsumedMessage[];
  index: number;
};

export type Mode =
  | LoadingMode
  | BrowsingMode
  | SearchingMode
  | ViewingMode
  | SendDraftMode
  | SendingMode
  | SaveDraftMode
  | LoadDraftMode
  | ConsumingMode;

export type ModeKind = Mode['kind'];

export type Session = {
  browser: BrowserState;
  status: StatusLine | null;
  /** Monotonic counter for tagging consumer requests */
  requestCounter: number;
  mode: Mode;
};

// ============================================================================
// Events
// ============================================================================

export type EngineEvent =
  | { type: 'KEY'; key: Key }
  | { type: 'SUBJECTS_LOADED'; result: Outcome<string[]> }
  | { type: 'SCHEMA_LOADED'; subject: string; result: Outcome<RegistrySchema> }
  | { type: 'PUBLISHED'; subject: string; schemaId: number; result: Outcome<{ topic: string }> }
  | { type: 'CONSUMER_OPENED'; requestId: number; result: Outcome<ConsumerHandle> }
  | { type: 'MESSAGES_FETCHED'; requestId: number; result: ConsumeResult }
  | { type: 'DRAFT_SAVED'; result: Outcome<string> }
  | { type: 'DRAFTS_LISTED'; result: Outcome<SavedDraftEntry[]> }
  | { type: 'DRAFT_LOADED'; result: Outcome<SavedDraft> }
  | { type: 'EDITOR_CLOSED'; result: Outcome<string> }
  | { type: 'COPIED'; label: string; result: Outcome<null> };

// ============================================================================
// Commands (pure data for background work)
// ============================================================================

/**
 * Commands are pure data describing background work.
 * The engine returns Command[], the runtime executes them through gateways
 * and feeds each outcome back as an event.
 */
export type Command =
  // Registry
  | { type: 'LOAD_SUBJECTS' }
  | { type: 'LOAD_SCHEMA'; subject: string }

  // Broker
  | {
      type: 'PUBLISH';
      subject: string;
      schemaId: number;
      topic: string;
      key: string | null;
      value: Buffer;
      timeoutMs: number;
    }
  | { type: 'OPEN_CONSUMER'; requestId: number; topic: string }
  | {
      type: 'FETCH_MESSAGES';
      requestId: number;
      handle: ConsumerHandle;
      maxCount: number;
      timeoutMs: number;
      context: SchemaContext;
    }
  | { type: 'CLOSE_CONSUMER'; handle: ConsumerHandle }

  // Drafts
  | { type: 'SAVE_DRAFT'; topic: string; schemaId: number; payload: string; name?: string }
  | { type: 'LIST_DRAFTS'; topic: string }
  | { type: 'LOAD_DRAFT'; path: string }

  // Terminal
  | { type: 'OPEN_EDITOR'; text: string }
  | { type: 'COPY'; label: string; text: string }
  | { type: 'QUIT' };

// ============================================================================
// Engine
// ============================================================================

export type EngineOptions = {
  /** Maximum messages per consume fetch */
  consumeBatchSize: number;
  consumeTimeoutMs: number;
  publishTimeoutMs: number;
  /** Rows moved by page up/down */
  pageSize: number;
};

/** Result of initialize/update - the next session and the work to start */
export type Transition = {
  session: Session;
  commands: Command[];
  /** Why the event was ignored, when it was a stale or mismatched completion */
  discarded?: string;
};
