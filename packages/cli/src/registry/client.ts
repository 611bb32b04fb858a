/**
 * Confluent-compatible schema registry client over fetch
 */

import type { RegistryGateway, RegistrySchema } from '@avrodeck/engine';
import { z } from 'zod';
import type { RegistryConfig } from '../config.js';
import { RegistryError } from '../errors.js';

const ACCEPT = 'application/vnd.schemaregistry.v1+json';

const subjectsResponse = z.array(z.string());

const schemaResponse = z.object({
  subject: z.string(),
  version: z.number().int(),
  id: z.number().int(),
  schemaType: z.string().optional(),
  schema: z.string(),
});

const schemaByIdResponse = z.object({
  schema: z.string(),
});

export class RegistryClient implements RegistryGateway {
  private readonly baseUrl: string;
  private readonly authorization: string | null;

  constructor(config: RegistryConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.authorization =
      config.apiKey && config.apiSecret
        ? `Basic ${Buffer.from(`${config.apiKey}:${config.apiSecret}`).toString('base64')}`
        : null;
  }

  async listSubjects(): Promise<string[]> {
    return this.get('/subjects', subjectsResponse);
  }

  async getLatestSchema(subject: string): Promise<RegistrySchema> {
    const body = await this.get(`/subjects/${encodeURIComponent(subject)}/versions/latest`, schemaResponse);
    if (body.schemaType !== undefined && body.schemaType !== 'AVRO') {
      throw new RegistryError(`subject ${subject} holds a ${body.schemaType} schema, not Avro`);
    }
    return { subject: body.subject, version: body.version, id: body.id, schemaText: body.schema };
  }

  async getSchemaById(id: number): Promise<string> {
    const body = await this.get(`/schemas/ids/${id}`, schemaByIdResponse);
    return body.schema;
  }

  private async get<T>(path: string, schema: z.ZodType<T>): Promise<T> {
    const headers: Record<string, string> = { Accept: ACCEPT };
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, { method: 'GET', headers });
    } catch (error) {
      throw new RegistryError(`request to ${path} failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new RegistryError(text || response.statusText, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new RegistryError(`response from ${path} is not JSON`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryError(`unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }
}
