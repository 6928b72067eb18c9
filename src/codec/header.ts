/**
 * @module codec/header
 * @description Envelope header framing.
 *
 * Layout (11 bytes, big-endian, no padding):
 * - typeId: 1 byte (uint8)
 * - messageId: 2 bytes (uint16)
 * - sentAt: 8 bytes (float64 seconds, sender's clock)
 *
 * There is no length field: the body is whatever follows the header.
 */

import { EnvelopeError } from "../interfaces/codec.js";
import { layoutSize, packLayout, unpackLayout } from "./layout.js";
import type { Layout } from "./layout.js";
import type { MessageId, Seconds, TypeId } from "../types/branded.js";

export const HEADER_LAYOUT = ["uint8", "uint16", "float64"] as const satisfies Layout;

export const HEADER_LENGTH = layoutSize(HEADER_LAYOUT);

export interface EnvelopeHeader {
  readonly typeId: TypeId;
  readonly messageId: MessageId;
  readonly sentAt: Seconds;
}

/**
 * Serialize a header to its 11-byte wire form.
 *
 * @throws {EnvelopeError} code=ENCODE_ERROR if an id does not fit its field.
 */
export function encodeHeader(
  typeId: TypeId,
  messageId: MessageId,
  sentAt: Seconds
): Uint8Array {
  return packLayout(HEADER_LAYOUT, [typeId, messageId, sentAt]);
}

/**
 * Parse the header from the first 11 bytes. Trailing bytes are ignored.
 *
 * @throws {EnvelopeError} code=HEADER_TOO_SHORT if fewer than 11 bytes are supplied.
 */
export function decodeHeader(bytes: Uint8Array): EnvelopeHeader {
  assertHeaderPresent(bytes);

  return unpackLayout(HEADER_LAYOUT, bytes.subarray(0, HEADER_LENGTH), (next) => ({
    typeId: next() as TypeId,
    messageId: next() as MessageId,
    sentAt: next() as Seconds,
  }));
}

/**
 * Split a raw envelope into header and body views (no copy).
 *
 * @throws {EnvelopeError} code=HEADER_TOO_SHORT
 */
export function splitEnvelope(raw: Uint8Array): {
  header: Uint8Array;
  body: Uint8Array;
} {
  assertHeaderPresent(raw);
  return {
    header: raw.subarray(0, HEADER_LENGTH),
    body: raw.subarray(HEADER_LENGTH),
  };
}

/**
 * Concatenate header and body into one envelope.
 */
export function joinEnvelope(header: Uint8Array, body: Uint8Array): Uint8Array {
  const envelope = new Uint8Array(header.length + body.length);
  envelope.set(header, 0);
  envelope.set(body, header.length);
  return envelope;
}

function assertHeaderPresent(bytes: Uint8Array): void {
  if (bytes.length < HEADER_LENGTH) {
    throw new EnvelopeError(
      `Envelope header needs ${HEADER_LENGTH} bytes, got ${bytes.length}`,
      "HEADER_TOO_SHORT",
      { length: bytes.length, expectedLength: HEADER_LENGTH }
    );
  }
}
