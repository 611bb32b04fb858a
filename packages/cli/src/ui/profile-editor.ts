/**
 * Profile form shown from the selector (n to create, e to edit).
 *
 * Credentials only appear for the auth settings that use them, and secrets
 * are rendered as asterisks.
 */

import { keyId, type Key } from '@avrodeck/engine';
import { profileSchema, type ConfigFile, type ProfileConfig } from '../config.js';
import type { Theme } from './theme.js';

export type FieldKey =
  | 'id'
  | 'name'
  | 'url'
  | 'auth_method'
  | 'api_key'
  | 'api_secret'
  | 'bootstrap_servers'
  | 'security_protocol'
  | 'sasl_username'
  | 'sasl_password';

type FieldSpec = {
  key: FieldKey;
  label: string;
  placeholder: string;
  masked?: boolean;
  choices?: readonly string[];
};

const FIELDS: readonly FieldSpec[] = [
  { key: 'id', label: 'Profile id', placeholder: 'e.g. staging' },
  { key: 'name', label: 'Display name', placeholder: 'e.g. Staging' },
  { key: 'url', label: 'Registry URL', placeholder: 'http://localhost:8081' },
  { key: 'auth_method', label: 'Registry auth', placeholder: '', choices: ['none', 'basic'] },
  { key: 'api_key', label: 'API key', placeholder: '(basic auth)' },
  { key: 'api_secret', label: 'API secret', placeholder: '(basic auth)', masked: true },
  { key: 'bootstrap_servers', label: 'Bootstrap servers', placeholder: 'localhost:9092 (optional)' },
  { key: 'security_protocol', label: 'Security protocol', placeholder: '', choices: ['PLAINTEXT', 'SASL_SSL'] },
  { key: 'sasl_username', label: 'SASL username', placeholder: '(SASL_SSL)' },
  { key: 'sasl_password', label: 'SASL password', placeholder: '(SASL_SSL)', masked: true },
];

const LABEL_WIDTH = 20;

export type ProfileForm = {
  /** Id of the profile being edited; null while creating one */
  editing: string | null;
  values: Record<FieldKey, string>;
  focus: FieldKey;
  error: string | null;
};

export type EditorStep =
  | { kind: 'editing'; form: ProfileForm }
  | { kind: 'saved'; id: string; profile: ProfileConfig }
  | { kind: 'cancelled' };

const NEXT = ['tab', 'down'];
const PREVIOUS = ['shift+tab', 'up'];
const CYCLE_FORWARD = ['right', ' '];
const CYCLE_BACK = ['left'];

export function newProfileForm(): ProfileForm {
  return {
    editing: null,
    values: {
      id: '',
      name: '',
      url: '',
      auth_method: 'none',
      api_key: '',
      api_secret: '',
      bootstrap_servers: '',
      security_protocol: 'PLAINTEXT',
      sasl_username: '',
      sasl_password: '',
    },
    focus: 'id',
    error: null,
  };
}

export function editProfileForm(id: string, profile: ProfileConfig): ProfileForm {
  const { schema_registry: registry, kafka } = profile;
  // Files written by hand may carry keys without naming the method
  const authMethod = registry.auth_method ?? (registry.api_key ? 'basic' : 'none');

  return {
    editing: id,
    values: {
      id,
      name: profile.name,
      url: registry.url,
      auth_method: authMethod,
      api_key: registry.api_key ?? '',
      api_secret: registry.api_secret ?? '',
      bootstrap_servers: kafka?.bootstrap_servers ?? '',
      security_protocol: kafka?.security_protocol ?? 'PLAINTEXT',
      sasl_username: kafka?.sasl_username ?? '',
      sasl_password: kafka?.sasl_password ?? '',
    },
    focus: 'name',
    error: null,
  };
}

export function visibleFields(form: ProfileForm): FieldKey[] {
  return FIELDS.filter((field) => {
    switch (field.key) {
      case 'id':
        return form.editing === null;
      case 'api_key':
      case 'api_secret':
        return form.values.auth_method === 'basic';
      case 'sasl_username':
      case 'sasl_password':
        return form.values.security_protocol === 'SASL_SSL';
      default:
        return true;
    }
  }).map((field) => field.key);
}

function fieldSpec(key: FieldKey): FieldSpec {
  return FIELDS.find((field) => field.key === key) ?? { key, label: key, placeholder: '' };
}

function moveFocus(form: ProfileForm, delta: number): ProfileForm {
  const keys = visibleFields(form);
  const index = keys.indexOf(form.focus);
  const next = keys[(index + delta + keys.length) % keys.length] ?? form.focus;
  return { ...form, focus: next };
}

function setValue(form: ProfileForm, value: string): ProfileForm {
  return { ...form, values: { ...form.values, [form.focus]: value } };
}

function cycle(form: ProfileForm, choices: readonly string[], delta: number): ProfileForm {
  const index = choices.indexOf(form.values[form.focus]);
  const next = choices[(index + delta + choices.length) % choices.length] ?? form.values[form.focus];
  return setValue(form, next);
}

/**
 * Apply a key press to the form. `file` is consulted for id clashes on save.
 */
export function editorKey(form: ProfileForm, key: Key, file: ConfigFile): EditorStep {
  const id = keyId(key);
  const editing = (next: ProfileForm): EditorStep => ({ kind: 'editing', form: next });

  if (id === 'escape') return { kind: 'cancelled' };
  if (id === 'ctrl+s') return submit(form, file);
  if (NEXT.includes(id)) return editing(moveFocus(form, 1));
  if (PREVIOUS.includes(id)) return editing(moveFocus(form, -1));

  if (id === 'enter') {
    const keys = visibleFields(form);
    return keys[keys.length - 1] === form.focus ? submit(form, file) : editing(moveFocus(form, 1));
  }

  const { choices } = fieldSpec(form.focus);
  if (choices) {
    if (CYCLE_FORWARD.includes(id)) return editing(cycle(form, choices, 1));
    if (CYCLE_BACK.includes(id)) return editing(cycle(form, choices, -1));
    return editing(form);
  }

  const value = form.values[form.focus];
  if (id === 'backspace') return editing(setValue(form, [...value].slice(0, -1).join('')));
  if (id === 'ctrl+u') return editing(setValue(form, ''));
  if (key.text !== undefined && !key.ctrl) return editing(setValue(form, value + key.text));
  return editing(form);
}

function submit(form: ProfileForm, file: ConfigFile): EditorStep {
  const fail = (error: string): EditorStep => ({ kind: 'editing', form: { ...form, error } });
  const { values } = form;
  const id = form.editing ?? values.id.trim();

  if (!id) return fail('profile id is required');
  if (/\s/.test(id)) return fail('profile id cannot contain spaces');
  if (form.editing === null && id in file.configurations) return fail(`profile "${id}" already exists`);

  const basic = values.auth_method === 'basic';
  const sasl = values.security_protocol === 'SASL_SSL';
  const servers = values.bootstrap_servers.trim();

  const parsed = profileSchema.safeParse({
    name: values.name.trim(),
    schema_registry: {
      url: values.url.trim(),
      auth_method: values.auth_method,
      ...(basic && values.api_key ? { api_key: values.api_key } : {}),
      ...(basic && values.api_secret ? { api_secret: values.api_secret } : {}),
    },
    ...(servers
      ? {
          kafka: {
            bootstrap_servers: servers,
            security_protocol: values.security_protocol,
            ...(sasl && values.sasl_username ? { sasl_username: values.sasl_username } : {}),
            ...(sasl && values.sasl_password ? { sasl_password: values.sasl_password } : {}),
          },
        }
      : {}),
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail(issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid profile');
  }
  return { kind: 'saved', id, profile: parsed.data };
}

export function renderEditor(form: ProfileForm, theme: Theme): string[] {
  const title = form.editing === null ? 'New configuration' : `Edit configuration: ${form.editing}`;
  const rows = [theme.title(title), ''];

  for (const key of visibleFields(form)) {
    const spec = fieldSpec(key);
    const value = form.values[key];
    const shown = spec.masked ? '*'.repeat([...value].length) : value;
    const focused = key === form.focus;
    const label = `${focused ? '>' : ' '} ${`${spec.label}:`.padEnd(LABEL_WIDTH)} `;

    if (focused) {
      rows.push(theme.selected(label + (shown || spec.placeholder)));
    } else {
      rows.push(label + (shown || theme.dim(spec.placeholder)));
    }
  }

  rows.push('');
  if (form.error) rows.push(theme.error(form.error), '');
  rows.push(theme.dim('tab move  left/right change  enter next  ctrl+s save  esc cancel'));
  return rows;
}
