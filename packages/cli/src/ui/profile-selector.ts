/**
 * Startup profile picker (--select-config)
 *
 * Besides choosing a profile it can create (n), edit (e) and delete (x)
 * profiles and mark one as the default (d). Every change is handed back as a
 * new config file for the caller to persist.
 */

import { keyId, type Key } from '@avrodeck/engine';
import { orderedProfiles, type ConfigFile } from '../config.js';
import { editProfileForm, editorKey, newProfileForm, renderEditor, type ProfileForm } from './profile-editor.js';
import type { Terminal } from './terminal.js';
import type { Theme } from './theme.js';

export type SelectorView =
  | { kind: 'list' }
  | { kind: 'editing'; form: ProfileForm }
  | { kind: 'confirm-delete'; id: string };

export type SelectorState = {
  file: ConfigFile;
  ids: string[];
  index: number;
  view: SelectorView;
  message: { level: 'success' | 'error'; text: string } | null;
};

export type SelectorStep =
  | { kind: 'pending'; state: SelectorState; save?: ConfigFile }
  | { kind: 'selected'; id: string }
  | { kind: 'cancelled' };

export type Selection = {
  /** The config file after any changes made in the picker */
  file: ConfigFile;
  /** null when the user cancelled */
  id: string | null;
};

const UP = ['up', 'k'];
const DOWN = ['down', 'j'];
const CANCEL = ['q', 'escape', 'ctrl+c'];

export function createSelector(file: ConfigFile): SelectorState {
  return { file, ids: orderedProfiles(file), index: 0, view: { kind: 'list' }, message: null };
}

export function selectorKey(state: SelectorState, key: Key): SelectorStep {
  switch (state.view.kind) {
    case 'list':
      return listKey({ ...state, message: null }, key);
    case 'editing':
      return editingKey(state, state.view.form, key);
    case 'confirm-delete':
      return confirmKey(state, state.view.id, key);
  }
}

function listKey(state: SelectorState, key: Key): SelectorStep {
  const id = keyId(key);
  const last = Math.max(0, state.ids.length - 1);
  const current = state.ids[state.index];
  const pending = (next: SelectorState): SelectorStep => ({ kind: 'pending', state: next });

  if (UP.includes(id)) return pending({ ...state, index: Math.max(0, state.index - 1) });
  if (DOWN.includes(id)) return pending({ ...state, index: Math.min(last, state.index + 1) });
  if (CANCEL.includes(id)) return { kind: 'cancelled' };

  if (id === 'enter') {
    return current === undefined ? { kind: 'cancelled' } : { kind: 'selected', id: current };
  }

  if (id === 'n') return pending({ ...state, view: { kind: 'editing', form: newProfileForm() } });

  const profile = current === undefined ? undefined : state.file.configurations[current];
  if (current === undefined || !profile) return pending(state);

  switch (id) {
    case 'e':
      return pending({ ...state, view: { kind: 'editing', form: editProfileForm(current, profile) } });
    case 'x':
      return pending({ ...state, view: { kind: 'confirm-delete', id: current } });
    case 'd':
      return changed(state, { ...state.file, default: current }, current, `"${current}" is now the default`);
    default:
      return pending(state);
  }
}

function editingKey(state: SelectorState, form: ProfileForm, key: Key): SelectorStep {
  const step = editorKey(form, key, state.file);

  switch (step.kind) {
    case 'editing':
      return { kind: 'pending', state: { ...state, view: { kind: 'editing', form: step.form } } };
    case 'cancelled':
      return { kind: 'pending', state: { ...state, view: { kind: 'list' } } };
    case 'saved': {
      const { file } = state;
      const next: ConfigFile = {
        default: file.default in file.configurations ? file.default : step.id,
        configurations: { ...file.configurations, [step.id]: step.profile },
      };
      return changed(state, next, step.id, `Saved "${step.id}"`);
    }
  }
}

function confirmKey(state: SelectorState, id: string, key: Key): SelectorStep {
  if (keyId(key) !== 'y') {
    return { kind: 'pending', state: { ...state, view: { kind: 'list' } } };
  }

  const configurations = Object.fromEntries(
    Object.entries(state.file.configurations).filter(([profileId]) => profileId !== id),
  );
  const remaining = Object.keys(configurations).sort();
  const next: ConfigFile = {
    default: state.file.default === id ? (remaining[0] ?? '') : state.file.default,
    configurations,
  };
  return changed(state, next, null, `Deleted "${id}"`);
}

/** Back to the list on `file`, with the cursor on `focus` when it is given */
function changed(state: SelectorState, file: ConfigFile, focus: string | null, text: string): SelectorStep {
  const ids = orderedProfiles(file);
  const focused = focus === null ? -1 : ids.indexOf(focus);
  const index = focused === -1 ? Math.min(state.index, Math.max(0, ids.length - 1)) : focused;

  return {
    kind: 'pending',
    state: { file, ids, index, view: { kind: 'list' }, message: { level: 'success', text } },
    save: file,
  };
}

export function renderSelector(state: SelectorState, theme: Theme): string[] {
  if (state.view.kind === 'editing') return renderEditor(state.view.form, theme);

  const { file } = state;
  const rows = [theme.title('Select a configuration'), ''];

  if (state.ids.length === 0) rows.push(theme.dim('  no configurations, press n to create one'));

  state.ids.forEach((id, index) => {
    const profile = file.configurations[id];
    const isDefault = id === file.default ? ' (default)' : '';
    const text = `${index === state.index ? '>' : ' '} ${profile?.name ?? id} [${id}]${isDefault}`;
    rows.push(index === state.index ? theme.selected(text) : text);
  });

  rows.push('');
  if (state.view.kind === 'confirm-delete') {
    rows.push(theme.error(`Delete "${state.view.id}"? y to confirm, any other key to keep it`));
  } else {
    if (state.message) {
      const paint = state.message.level === 'error' ? theme.error : theme.success;
      rows.push(paint(state.message.text), '');
    }
    rows.push(theme.dim('j/k move  enter select  n new  e edit  d default  x delete  q cancel'));
  }
  return rows;
}

/**
 * Show the picker on an open terminal. Each change is written through
 * `persist` before the next one; a failed write is shown and the picker stays
 * open.
 */
export function selectProfile(
  file: ConfigFile,
  terminal: Pick<Terminal, 'draw' | 'onKey'>,
  theme: Theme,
  persist: (file: ConfigFile) => Promise<void>,
): Promise<Selection> {
  let state = createSelector(file);
  let writes = Promise.resolve();
  const draw = () => terminal.draw(renderSelector(state, theme));
  draw();

  return new Promise<Selection>((resolve) => {
    terminal.onKey((key) => {
      const step = selectorKey(state, key);
      if (step.kind !== 'pending') {
        const id = step.kind === 'selected' ? step.id : null;
        const selection: Selection = { file: state.file, id };
        resolve(writes.then(() => selection));
        return;
      }

      state = step.state;
      draw();

      const { save } = step;
      if (save) {
        writes = writes
          .then(() => persist(save))
          .catch((error: unknown) => {
            const text = `cannot save configuration: ${error instanceof Error ? error.message : String(error)}`;
            state = { ...state, message: { level: 'error', text } };
            draw();
          });
      }
    });
  });
}
