/**
 * External editor sessions
 *
 * The text is written to a temporary .json file, the editor runs with the
 * terminal handed over to it, and the file is read back once it exits.
 */

import type { EditorGateway } from '@avrodeck/engine';
import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { EditorError } from '../errors.js';

type Env = Record<string, string | undefined>;

const FALLBACK_EDITORS = ['vim', 'vi', 'nano'];

export type TerminalHandoff = {
  /** Give the terminal to a child process */
  release(): void;
  /** Take it back once the child exits */
  reclaim(): void;
};

/**
 * Pick the editor command: $EDITOR, then $VISUAL, then the first fallback
 * found on PATH (notepad on Windows). Resolves with null when none exists.
 */
export async function findEditor(env: Env = process.env, platform: NodeJS.Platform = process.platform): Promise<string | null> {
  if (env.EDITOR) return env.EDITOR;
  if (env.VISUAL) return env.VISUAL;
  if (platform === 'win32') return 'notepad';

  const dirs = (env.PATH ?? '').split(path.delimiter).filter((dir) => dir !== '');
  for (const editor of FALLBACK_EDITORS) {
    for (const dir of dirs) {
      const candidate = path.join(dir, editor);
      if (await isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class ExternalEditor implements EditorGateway {
  constructor(
    private readonly terminal: TerminalHandoff,
    private readonly env: Env = process.env,
  ) {}

  async open(text: string): Promise<string> {
    const editor = await findEditor(this.env);
    if (!editor) {
      throw new EditorError('no editor found: set $EDITOR');
    }

    const dir = await mkdtemp(path.join(os.tmpdir(), 'avrodeck-'));
    const filePath = path.join(dir, 'draft.json');
    try {
      await writeFile(filePath, text, { mode: 0o600 });
      this.terminal.release();
      try {
        await run(editor, filePath);
      } finally {
        this.terminal.reclaim();
      }
      return await readFile(filePath, 'utf-8');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

// $EDITOR may carry arguments ("code --wait"), so it runs through the shell.
function run(editor: string, filePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(`${editor} "${filePath}"`, { stdio: 'inherit', shell: true });
    child.on('error', (error) => reject(new EditorError(`cannot start ${editor}: ${error.message}`)));
    child.on('exit', (code) => {
      if (code === 0) resolve();
      else reject(new EditorError(`${editor} exited with code ${code ?? 'null'}`));
    });
  });
}
