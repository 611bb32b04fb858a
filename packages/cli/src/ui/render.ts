/**
 * Screen rendering
 *
 * A pure projection of the session onto terminal rows. The caller supplies
 * the dimensions and the theme; nothing here touches the terminal.
 */

import type {
  BrowserState,
  ConsumingMode,
  Draft,
  LoadDraftMode,
  ModeKind,
  SchemaContext,
  Session,
  StatusLine,
} from '@avrodeck/engine';
import type { Paint, Theme } from './theme.js';

export type View = {
  width: number;
  height: number;
  theme: Theme;
  profileName: string;
  brokerConfigured: boolean;
};

export const HELP: Record<ModeKind, string> = {
  loading: 'q quit',
  browsing: 'j/k move  enter load  / search  tab pane  y copy  q quit',
  searching: 'type to filter  up/down move  enter keep  esc clear',
  viewing: 'e edit  E editor  c consume  y copy  / search  tab pane  q quit',
  sendDraft: 'ctrl+s send  tab field  ctrl+n save  ctrl+o load  ctrl+e editor  ctrl+y copy  esc back',
  sending: 'waiting for the broker',
  saveDraft: 'enter save  esc cancel',
  loadDraft: 'j/k move  enter load  esc cancel',
  consuming: 'enter fetch  j/k move  y copy  esc close',
};

const LIST_SEPARATOR = ' │ ';

/** Header, body, status line and help line; always exactly `height` rows when height >= 4 */
export function render(session: Session, view: View): string[] {
  const { theme, width } = view;
  const bodyHeight = Math.max(1, view.height - 3);
  const body = renderBody(session, width, bodyHeight, theme);

  return [
    renderHeader(view),
    ...fill(body, bodyHeight),
    renderStatus(session.status, width, theme),
    theme.dim(fit(HELP[session.mode.kind], width)),
  ];
}

function renderHeader(view: View): string {
  const header = `${view.theme.title('avrodeck')} ${view.profileName}`;
  return view.brokerConfigured ? header : `${header}  ${view.theme.error('[broker: not configured]')}`;
}

function renderStatus(status: StatusLine | null, width: number, theme: Theme): string {
  if (!status) return '';
  const paint = status.level === 'error' ? theme.error : status.level === 'success' ? theme.success : theme.info;
  return paint(fit(status.text, width));
}

function renderBody(session: Session, width: number, height: number, theme: Theme): string[] {
  const { mode } = session;
  switch (mode.kind) {
    case 'loading':
    case 'browsing':
    case 'searching':
    case 'viewing':
      return renderBrowser(session, width, height, theme);

    case 'sendDraft': {
      const footer = mode.editor
        ? [theme.dim('Waiting for the external editor to close...')]
        : mode.error
          ? [theme.error(fit(mode.error, width))]
          : [];
      return [...renderDraft(mode.context, mode.draft, width, height - footer.length, theme, !mode.editor), ...footer];
    }

    case 'sending':
      return renderDraft(mode.context, mode.draft, width, height, theme, false);

    case 'saveDraft': {
      const prompt = mode.saving ? `Save as: ${mode.name}` : `Save as: ${mode.name}${theme.cursor(' ')}`;
      const footer = [
        '',
        prompt,
        theme.dim(mode.saving ? 'Saving...' : 'Leave empty for a timestamped name'),
        ...(mode.error ? [theme.error(fit(mode.error, width))] : []),
      ];
      return [...renderDraft(mode.context, mode.draft, width, height - footer.length, theme, false), ...footer];
    }

    case 'loadDraft':
      return renderDraftList(mode, width, height, theme);

    case 'consuming':
      return renderMessages(mode, width, height, theme);
  }
}

// ============================================================================
// Subject browser
// ============================================================================

function renderBrowser(session: Session, width: number, height: number, theme: Theme): string[] {
  const { browser, mode } = session;
  const listWidth = Math.min(40, Math.max(16, Math.floor(width / 3)));
  const viewerWidth = Math.max(0, width - listWidth - LIST_SEPARATOR.length);

  const context =
    mode.kind === 'viewing' ? mode.context : mode.kind === 'searching' && mode.resume.kind === 'viewing' ? mode.resume.context : null;

  const left = renderSubjects(session, listWidth, height, theme);
  const right = context
    ? renderSchema(context, browser, viewerWidth, height, theme)
    : [theme.dim(fit('Select a subject and press enter', viewerWidth))];

  const blank = ' '.repeat(listWidth);
  return Array.from({ length: height }, (_, row) => `${left[row] ?? blank}${LIST_SEPARATOR}${right[row] ?? ''}`.trimEnd());
}

function renderSubjects(session: Session, width: number, height: number, theme: Theme): string[] {
  const { browser, mode } = session;
  const rows: string[] = [];

  if (mode.kind === 'searching') {
    rows.push(cell(`/${browser.filter}`, width, theme.accent));
  } else if (browser.filter !== '') {
    rows.push(cell(`filter: ${browser.filter}`, width, theme.dim));
  }

  if (mode.kind === 'loading') {
    rows.push(cell('Loading subjects...', width, theme.dim));
    return rows;
  }
  if (browser.filtered.length === 0) {
    rows.push(cell(browser.subjects.length === 0 ? 'No subjects' : 'No matches', width, theme.dim));
    return rows;
  }

  const visible = Math.max(1, height - rows.length);
  const start = windowStart(browser.selectedIndex, visible);
  const highlight = browser.focusedPane === 'list' ? theme.selected : theme.accent;

  browser.filtered.slice(start, start + visible).forEach((subject, offset) => {
    const selected = start + offset === browser.selectedIndex;
    rows.push(cell(`${selected ? '>' : ' '} ${subject}`, width, selected ? highlight : identity));
  });
  return rows;
}

function renderSchema(context: SchemaContext, browser: BrowserState, width: number, height: number, theme: Theme): string[] {
  const title = `${context.subject}  v${context.version}  id ${context.schemaId}  topic ${context.topic}`;
  const lines = context.prettySchema.split('\n').slice(browser.viewerScroll, browser.viewerScroll + height - 1);
  return [theme.title(fit(title, width)), ...lines.map((line) => fit(line, width))];
}

// ============================================================================
// Drafts
// ============================================================================

function renderDraft(
  context: SchemaContext,
  draft: Draft,
  width: number,
  height: number,
  theme: Theme,
  showCursor: boolean,
): string[] {
  const keyCursor = showCursor && draft.focus === 'key' ? theme.cursor(' ') : '';
  const rows = [
    theme.title(fit(`Publish to ${context.topic} (${context.subject}, schema id ${context.schemaId})`, width)),
    `${marker(draft.focus === 'key')} Key: ${draft.key}${keyCursor}`,
    `${marker(draft.focus === 'value')} Value:`,
  ];

  const { lines, row, col } = draft.value;
  const visible = Math.max(1, height - rows.length);
  const start = windowStart(row, visible);
  const valueCursor = showCursor && draft.focus === 'value';

  lines.slice(start, start + visible).forEach((line, offset) => {
    const text = valueCursor && start + offset === row ? withCursor(line, col, theme.cursor) : fit(line, width - 2);
    rows.push(`  ${text}`);
  });
  return rows;
}

function renderDraftList(mode: LoadDraftMode, width: number, height: number, theme: Theme): string[] {
  const rows = [theme.title(fit(`Saved drafts for ${mode.context.topic}`, width))];

  if (mode.entries === null) {
    rows.push(theme.dim('Loading drafts...'));
  } else if (mode.entries.length === 0) {
    rows.push(theme.dim('No saved drafts'));
  } else {
    const visible = Math.max(1, height - rows.length - (mode.error ? 1 : 0));
    const start = windowStart(mode.index, visible);
    mode.entries.slice(start, start + visible).forEach((entry, offset) => {
      const selected = start + offset === mode.index;
      const text = fit(`${marker(selected)} ${entry.name}`, width);
      rows.push(selected ? theme.selected(text) : text);
    });
  }

  if (mode.error) rows.push(theme.error(fit(mode.error, width)));
  return rows;
}

// ============================================================================
// Consumed messages
// ============================================================================

function renderMessages(mode: ConsumingMode, width: number, height: number, theme: Theme): string[] {
  const state = mode.handle === null ? ' (opening consumer)' : mode.fetching ? ' (fetching)' : '';
  const rows = [theme.title(fit(`Messages from ${mode.context.topic}${state}`, width))];

  if (mode.messages.length === 0) {
    rows.push(theme.dim('No messages yet, press enter to fetch'));
    return rows;
  }

  const listRows = Math.min(mode.messages.length, Math.max(1, Math.floor((height - 1) / 3)));
  const start = windowStart(mode.index, listRows);
  mode.messages.slice(start, start + listRows).forEach((message, offset) => {
    const index = start + offset;
    const selected = index === mode.index;
    const summary =
      `${marker(selected)} ${index + 1}. p${message.partition} @${message.offset}` +
      `  key ${message.key ?? '(none)'}  schema ${message.schemaId ?? '-'}`;
    const text = fit(summary, width);
    rows.push(selected ? theme.selected(text) : text);
  });

  rows.push('');
  const current = mode.messages[mode.index];
  if (current) {
    if (current.decodeError) rows.push(theme.error(fit(current.decodeError, width)));
    rows.push(...current.value.split('\n').map((line) => fit(line, width)));
  }
  return rows;
}

// ============================================================================
// Helpers
// ============================================================================

const identity: Paint = (text) => text;

function marker(active: boolean): string {
  return active ? '>' : ' ';
}

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, Math.max(0, width)) : text;
}

function cell(text: string, width: number, paint: Paint): string {
  return paint(fit(text, width).padEnd(width));
}

function fill(rows: string[], height: number): string[] {
  const visible = rows.slice(0, height);
  while (visible.length < height) visible.push('');
  return visible;
}

/** First visible index that keeps `index` on screen */
function windowStart(index: number, visible: number): number {
  return Math.max(0, index - visible + 1);
}

function withCursor(line: string, col: number, cursor: Paint): string {
  return `${line.slice(0, col)}${cursor(line[col] ?? ' ')}${line.slice(col + 1)}`;
}
