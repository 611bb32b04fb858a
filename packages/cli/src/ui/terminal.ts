/**
 * Raw-mode terminal: key input, full-screen drawing and handing the screen
 * to child processes.
 */

import type { Key } from '@avrodeck/engine';
import { emitKeypressEvents, type Key as KeypressInfo } from 'node:readline';
import type { TerminalHandoff } from '../editor/external.js';

const ALT_SCREEN_ON = '\x1b[?1049h';
const ALT_SCREEN_OFF = '\x1b[?1049l';
const CURSOR_HIDE = '\x1b[?25l';
const CURSOR_SHOW = '\x1b[?25h';
const HOME = '\x1b[H';
const CLEAR_LINE = '\x1b[K';
const CLEAR_BELOW = '\x1b[J';

/** readline names that map onto the engine's special keys */
const SPECIAL_KEYS = new Map<string, string>([
  ['return', 'enter'],
  ['enter', 'enter'],
  ['escape', 'escape'],
  ['tab', 'tab'],
  ['backspace', 'backspace'],
  ['delete', 'delete'],
  ['up', 'up'],
  ['down', 'down'],
  ['left', 'left'],
  ['right', 'right'],
  ['home', 'home'],
  ['end', 'end'],
  ['pageup', 'pageup'],
  ['pagedown', 'pagedown'],
]);

/**
 * Translate a readline keypress into an engine key. Resolves to null for
 * presses the engine has no use for (alt combinations, function keys).
 */
export function normalizeKey(text: string | undefined, info: KeypressInfo | undefined): Key | null {
  const name = info?.name;

  if (name !== undefined && SPECIAL_KEYS.has(name)) {
    const special = SPECIAL_KEYS.get(name) ?? name;
    return {
      name: special,
      ...(info?.ctrl ? { ctrl: true } : {}),
      ...(info?.shift ? { shift: true } : {}),
    };
  }

  if (info?.meta) return null;

  if (info?.ctrl) {
    return name !== undefined && /^[a-z]$/.test(name) ? { name, ctrl: true } : null;
  }

  if (text !== undefined && isPrintable(text)) {
    return { name: text, text };
  }
  return null;
}

function isPrintable(text: string): boolean {
  return text.length > 0 && [...text].every((char) => {
    const code = char.codePointAt(0) ?? 0;
    return code >= 0x20 && code !== 0x7f;
  });
}

export class Terminal implements TerminalHandoff {
  private handler: ((key: Key) => void) | null = null;
  private active = false;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout,
  ) {
    emitKeypressEvents(this.input);
  }

  get size(): { width: number; height: number } {
    return { width: this.output.columns || 80, height: this.output.rows || 24 };
  }

  /** Route key presses to `handler`, replacing any previous one */
  onKey(handler: (key: Key) => void): void {
    this.handler = handler;
  }

  onResize(listener: () => void): void {
    this.output.on('resize', listener);
  }

  open(): void {
    if (this.active) return;
    this.active = true;
    this.output.write(ALT_SCREEN_ON + CURSOR_HIDE);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.input.on('keypress', this.handleKeypress);
    this.input.resume();
  }

  close(): void {
    if (!this.active) return;
    this.active = false;
    this.input.off('keypress', this.handleKeypress);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
    this.output.write(CURSOR_SHOW + ALT_SCREEN_OFF);
  }

  release(): void {
    this.close();
  }

  reclaim(): void {
    this.open();
  }

  draw(lines: string[]): void {
    if (!this.active) return;
    this.output.write(HOME + lines.map((line) => line + CLEAR_LINE).join('\r\n') + CLEAR_BELOW);
  }

  private readonly handleKeypress = (text: string | undefined, info: KeypressInfo | undefined): void => {
    const key = normalizeKey(text, info);
    if (key && this.handler) this.handler(key);
  };
}
