/**
 * Collaborator contracts
 *
 * The runtime reaches the outside world only through these interfaces.
 * Implementations live in the CLI; tests use in-memory fakes.
 */

import type { ConsumerHandle, RawMessage, RegistrySchema, SavedDraft, SavedDraftEntry } from './types.js';

export interface RegistryGateway {
  listSubjects(): Promise<string[]>;
  getLatestSchema(subject: string): Promise<RegistrySchema>;
  /** Schema text for an id, used to decode messages written with another schema */
  getSchemaById(id: number): Promise<string>;
}

export type PublishRequest = {
  topic: string;
  key: string | null;
  /** Enveloped payload */
  value: Buffer;
  timeoutMs: number;
};

export interface ProducerGateway {
  publish(request: PublishRequest): Promise<void>;
}

export interface ConsumerGateway {
  open(topic: string): Promise<ConsumerHandle>;
  /**
   * Resolves with up to maxCount messages once that many arrived or the
   * timeout elapsed, whichever comes first.
   */
  fetch(handle: ConsumerHandle, maxCount: number, timeoutMs: number): Promise<RawMessage[]>;
  close(handle: ConsumerHandle): Promise<void>;
}

export type SaveDraftRequest = {
  topic: string;
  schemaId: number;
  payload: string;
  name?: string;
};

export interface DraftStore {
  /** Resolves with the path written */
  save(request: SaveDraftRequest): Promise<string>;
  /** Newest first */
  list(topic: string): Promise<SavedDraftEntry[]>;
  load(path: string): Promise<SavedDraft>;
}

export interface EditorGateway {
  /** Resolves with the edited text */
  open(text: string): Promise<string>;
}

export interface ClipboardGateway {
  write(text: string): Promise<void>;
}

export type Gateways = {
  registry: RegistryGateway;
  producer: ProducerGateway;
  consumer: ConsumerGateway;
  drafts: DraftStore;
  editor: EditorGateway;
  clipboard: ClipboardGateway;
};
