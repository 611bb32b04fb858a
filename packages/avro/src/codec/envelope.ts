/**
 * Wire envelope
 *
 * Layout: byte 0 = 0x00 (format marker), bytes 1-4 = schema id (uint32,
 * big-endian), bytes 5.. = schema-encoded payload.
 */

import { EnvelopeError } from '../errors.js';

export const ENVELOPE_MAGIC_BYTE = 0x00;
export const ENVELOPE_HEADER_LENGTH = 5;

const MAX_SCHEMA_ID = 0xffffffff;

export type Envelope = {
  schemaId: number;
  payload: Buffer;
};

export function wrapEnvelope(schemaId: number, payload: Uint8Array): Buffer {
  if (!Number.isInteger(schemaId) || schemaId < 0 || schemaId > MAX_SCHEMA_ID) {
    throw new EnvelopeError(`schema id ${schemaId} does not fit in 4 bytes`);
  }

  const framed = Buffer.alloc(ENVELOPE_HEADER_LENGTH + payload.length);
  framed.writeUInt8(ENVELOPE_MAGIC_BYTE, 0);
  framed.writeUInt32BE(schemaId, 1);
  framed.set(payload, ENVELOPE_HEADER_LENGTH);
  return framed;
}

export function unwrapEnvelope(framed: Uint8Array): Envelope {
  if (framed.length < ENVELOPE_HEADER_LENGTH) {
    throw new EnvelopeError(`message is ${framed.length} bytes, shorter than the 5-byte envelope`);
  }

  const buffer = Buffer.from(framed.buffer, framed.byteOffset, framed.length);
  const marker = buffer.readUInt8(0);
  if (marker !== ENVELOPE_MAGIC_BYTE) {
    throw new EnvelopeError(`unknown envelope marker 0x${marker.toString(16).padStart(2, '0')}`);
  }

  return {
    schemaId: buffer.readUInt32BE(1),
    payload: buffer.subarray(ENVELOPE_HEADER_LENGTH),
  };
}
