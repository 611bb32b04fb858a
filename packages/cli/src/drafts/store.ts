/**
 * Saved drafts on disk
 *
 * Layout: <baseDir>/events/<topic>/<name>.json, one JSON document per draft.
 */

import type { DraftStore, SaveDraftRequest, SavedDraft, SavedDraftEntry } from '@avrodeck/engine';
import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { hasErrorCode } from '../errors.js';

const draftFileSchema = z.object({
  topic: z.string(),
  schema_id: z.number().int(),
  payload: z.string(),
  timestamp: z.string(),
  name: z.string(),
});

type DraftFile = z.infer<typeof draftFileSchema>;

export type FileDraftStoreOptions = {
  baseDir: string;
  /** Clock used for default names and timestamps */
  now?: () => Date;
};

export class FileDraftStore implements DraftStore {
  private readonly baseDir: string;
  private readonly now: () => Date;

  constructor(options: FileDraftStoreOptions) {
    this.baseDir = options.baseDir;
    this.now = options.now ?? (() => new Date());
  }

  topicDir(topic: string): string {
    if (!topic || topic.includes('/') || topic.includes('\\') || topic === '.' || topic === '..') {
      throw new Error(`invalid topic "${topic}"`);
    }
    return path.join(this.baseDir, 'events', topic);
  }

  async save(request: SaveDraftRequest): Promise<string> {
    const dir = this.topicDir(request.topic);
    await mkdir(dir, { recursive: true, mode: 0o700 });

    const savedAt = this.now();
    const fileName = draftFileName(request.name?.trim() || formatTimestamp(savedAt));
    const base = fileName.slice(0, -'.json'.length);

    for (let counter = 0; ; counter++) {
      const name = counter === 0 ? fileName : `${base}_${counter}.json`;
      const filePath = path.join(dir, name);
      const document: DraftFile = {
        topic: request.topic,
        schema_id: request.schemaId,
        payload: request.payload,
        timestamp: savedAt.toISOString(),
        name,
      };

      try {
        await writeFile(filePath, JSON.stringify(document, null, 2), { mode: 0o600, flag: 'wx' });
        return filePath;
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) throw error;
      }
    }
  }

  async list(topic: string): Promise<SavedDraftEntry[]> {
    const dir = this.topicDir(topic);

    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw error;
    }

    const entries = await Promise.all(
      names
        .filter((name) => path.extname(name) === '.json')
        .map(async (name) => {
          const filePath = path.join(dir, name);
          const info = await stat(filePath);
          return { name, path: filePath, modified: info.mtimeMs, isFile: info.isFile() };
        }),
    );

    return entries
      .filter((entry) => entry.isFile)
      .sort((a, b) => b.modified - a.modified || b.name.localeCompare(a.name))
      .map(({ name, path: filePath }) => ({ name, path: filePath }));
  }

  async load(filePath: string): Promise<SavedDraft> {
    const content = await readFile(filePath, 'utf-8');
    const parsed = draftFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`${path.basename(filePath)} is not a saved draft: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const draft = parsed.data;
    return {
      name: draft.name,
      payload: draft.payload,
      topic: draft.topic,
      schemaId: draft.schema_id,
      savedAt: draft.timestamp,
    };
  }
}

function draftFileName(name: string): string {
  if (name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
    throw new Error(`invalid draft name "${name}"`);
  }
  return path.extname(name) === '.json' ? name : `${name}.json`;
}

/** Local time as YYYY-MM-DD_HH-mm-ss */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}
