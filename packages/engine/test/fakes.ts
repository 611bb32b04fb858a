/**
 * In-memory gateway fakes for runtime tests.
 */

import type {
  ClipboardGateway,
  ConsumerGateway,
  DraftStore,
  EditorGateway,
  Gateways,
  ProducerGateway,
  PublishRequest,
  RegistryGateway,
  SaveDraftRequest,
} from '../src/gateways.js';
import type { ConsumerHandle, RawMessage, RegistrySchema, SavedDraft, SavedDraftEntry } from '../src/types.js';

export class FakeRegistry implements RegistryGateway {
  subjects: string[] = [];
  schemas = new Map<string, RegistrySchema>();
  schemasById = new Map<number, string>();
  /** Subjects whose fetch waits until released */
  held = new Map<string, () => void>();
  holdAll = false;
  failSubjects: string | null = null;

  async listSubjects(): Promise<string[]> {
    if (this.failSubjects !== null) throw new Error(this.failSubjects);
    return this.subjects;
  }

  async getLatestSchema(subject: string): Promise<RegistrySchema> {
    if (this.holdAll) {
      await new Promise<void>((resolve) => this.held.set(subject, resolve));
    }
    const schema = this.schemas.get(subject);
    if (!schema) throw new Error(`subject ${subject} not found`);
    return schema;
  }

  async getSchemaById(id: number): Promise<string> {
    const text = this.schemasById.get(id);
    if (text === undefined) throw new Error(`schema ${id} not found`);
    return text;
  }

  release(subject: string): void {
    this.held.get(subject)?.();
  }
}

export class FakeProducer implements ProducerGateway {
  published: PublishRequest[] = [];
  failure: string | null = null;

  async publish(request: PublishRequest): Promise<void> {
    if (this.failure !== null) throw new Error(this.failure);
    this.published.push(request);
  }
}

/**
 * Consumer over a fixed list of messages. A fetch returns whatever is
 * available up to maxCount, like a broker read that hits its timeout.
 */
export class FakeConsumer implements ConsumerGateway {
  available: RawMessage[] = [];
  opened: string[] = [];
  closed: string[] = [];
  private nextId = 1;

  async open(topic: string): Promise<ConsumerHandle> {
    const handle = { id: `consumer-${this.nextId++}`, topic };
    this.opened.push(handle.id);
    return handle;
  }

  async fetch(handle: ConsumerHandle, maxCount: number): Promise<RawMessage[]> {
    if (this.closed.includes(handle.id)) throw new Error('consumer closed');
    return this.available.splice(0, maxCount);
  }

  async close(handle: ConsumerHandle): Promise<void> {
    this.closed.push(handle.id);
  }
}

export class FakeDraftStore implements DraftStore {
  saved: SaveDraftRequest[] = [];
  drafts = new Map<string, SavedDraft>();

  async save(request: SaveDraftRequest): Promise<string> {
    this.saved.push(request);
    return `/drafts/${request.topic}/${request.name ?? 'draft'}.json`;
  }

  async list(): Promise<SavedDraftEntry[]> {
    return [...this.drafts.entries()].map(([path, draft]) => ({ name: draft.name, path }));
  }

  async load(path: string): Promise<SavedDraft> {
    const draft = this.drafts.get(path);
    if (!draft) throw new Error(`no draft at ${path}`);
    return draft;
  }
}

export class FakeEditor implements EditorGateway {
  opened: string[] = [];
  result = '';

  async open(text: string): Promise<string> {
    this.opened.push(text);
    return this.result;
  }
}

export class FakeClipboard implements ClipboardGateway {
  written: string[] = [];

  async write(text: string): Promise<void> {
    this.written.push(text);
  }
}

export function createFakeGateways() {
  const fakes = {
    registry: new FakeRegistry(),
    producer: new FakeProducer(),
    consumer: new FakeConsumer(),
    drafts: new FakeDraftStore(),
    editor: new FakeEditor(),
    clipboard: new FakeClipboard(),
  };
  const gateways: Gateways = fakes;
  return { fakes, gateways };
}
