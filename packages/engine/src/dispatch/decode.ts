/**
 * Consumed message decoding
 *
 * Strips the envelope and decodes the value with the context schema when the
 * ids match, otherwise with the schema the registry holds for the id. Values
 * that cannot be decoded are shown as UTF-8 text with a note.
 */

import { compileSchema, decodePayload, unwrapEnvelope } from '@avrodeck/avro';
import type { CompiledSchema } from '@avrodeck/avro';
import { errorMessage } from '../errors.js';
import type { RegistryGateway } from '../gateways.js';
import type { ConsumedMessage, RawMessage, SchemaContext } from '../types.js';

type SchemaLookup = (id: number) => Promise<CompiledSchema>;

export async function decodeMessages(
  messages: RawMessage[],
  context: SchemaContext,
  registry: RegistryGateway,
): Promise<ConsumedMessage[]> {
  const lookup = schemaLookup(context, registry);
  const decoded: ConsumedMessage[] = [];
  for (const message of messages) {
    decoded.push(await decodeMessage(message, lookup));
  }
  return decoded;
}

/**
 * Schema lookup for one batch: the context schema plus every id fetched so far.
 */
function schemaLookup(context: SchemaContext, registry: RegistryGateway): SchemaLookup {
  const cache = new Map<number, Promise<CompiledSchema>>([[context.schemaId, Promise.resolve(context.compiled)]]);
  return (id) => {
    let schema = cache.get(id);
    if (schema === undefined) {
      schema = registry.getSchemaById(id).then(compileSchema);
      cache.set(id, schema);
    }
    return schema;
  };
}

async function decodeMessage(message: RawMessage, lookup: SchemaLookup): Promise<ConsumedMessage> {
  const base = {
    key: message.key === null ? null : message.key.toString('utf8'),
    partition: message.partition,
    offset: message.offset,
    timestamp: message.timestamp,
  };

  if (message.value === null) {
    return { ...base, value: '', schemaId: null, decodeError: 'message has no value' };
  }

  let envelope: ReturnType<typeof unwrapEnvelope>;
  try {
    envelope = unwrapEnvelope(message.value);
  } catch (error) {
    return { ...base, value: message.value.toString('utf8'), schemaId: null, decodeError: errorMessage(error) };
  }

  const { schemaId, payload } = envelope;
  try {
    const schema = await lookup(schemaId);
    return { ...base, value: decodePayload(schema, payload), schemaId };
  } catch (error) {
    return {
      ...base,
      value: payload.toString('utf8'),
      schemaId,
      decodeError: `cannot decode with schema ${schemaId}: ${errorMessage(error)}`,
    };
  }
}
