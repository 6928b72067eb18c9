/**
 * @module interfaces/codec
 * @description Codec contracts and the envelope error taxonomy.
 *
 * Only DUPLICATE_IDENTIFIER is fatal (it can only happen while the
 * registry is built). Every other code describes a single envelope or
 * send request and never stops the pipelines.
 */

import type { MessageId, TypeId } from "../types/branded.js";

export type EnvelopeErrorCode =
  | "DUPLICATE_IDENTIFIER"
  | "UNKNOWN_TYPE"
  | "HEADER_TOO_SHORT"
  | "BODY_LENGTH_MISMATCH"
  | "ENVELOPE_TOO_LARGE"
  | "ENCODE_ERROR";

/**
 * Diagnostic context attached to an EnvelopeError. Every field is
 * optional because failures can happen before the header is parsed.
 */
export interface EnvelopeErrorContext {
  readonly typeId?: TypeId;
  readonly typeName?: string;
  readonly messageId?: MessageId;
  /** Byte length of the offending envelope or body. */
  readonly length?: number;
  /** Byte length the layout required. */
  readonly expectedLength?: number;
}

/**
 * Errors raised by the registry, the codecs and the pipelines.
 */
export class EnvelopeError extends Error {
  constructor(
    message: string,
    public readonly code: EnvelopeErrorCode,
    public readonly context: EnvelopeErrorContext = {}
  ) {
    super(message);
    this.name = "EnvelopeError";
  }
}

/**
 * @interface IBodyCodec
 * @description Encoder/decoder pair for one message body.
 *
 * @typeParam T - Structured field set of the body.
 */
export interface IBodyCodec<T> {
  /**
   * @throws {EnvelopeError} code=ENCODE_ERROR if fields do not match the layout.
   * @throws {EnvelopeError} code=ENVELOPE_TOO_LARGE for oversized raw bodies.
   */
  encode(fields: unknown): Uint8Array;

  /**
   * @throws {EnvelopeError} code=BODY_LENGTH_MISMATCH if the body has the wrong size.
   */
  decode(body: Uint8Array): T;
}
