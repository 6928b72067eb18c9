/**
 * @module primitives/outgoing-pipeline
 * @description Assembles envelopes from application messages and hands
 * them to the transport.
 *
 * Order of operations for every send:
 * 1. resolve the type by name
 * 2. encode the body
 * 3. check the envelope fits in one burst
 * 4. take the next message id and timestamp
 * 5. encode the header, concatenate, publish
 *
 * Steps 1–3 may reject the request; they never touch the counter.
 */

import { EnvelopeError } from "../interfaces/codec.js";
import type { IModemTransport } from "../interfaces/transport.js";
import type { ITypeRegistry } from "../interfaces/registry.js";
import type { IEnvelopeEmitter } from "../interfaces/event-emitter.js";
import { EnvelopeEmitter } from "./base-emitter.js";
import { SequenceCounter } from "./sequence-counter.js";
import { registeredLayouts } from "./type-registry.js";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import {
  HEADER_LENGTH,
  MAX_ENVELOPE_LENGTH,
  createBodyCodecs,
  encodeHeader,
  joinEnvelope,
} from "../codec/index.js";
import type { BodyCodecTable } from "../codec/index.js";
import type { ModemAddress, MessageId, Seconds, TypeId } from "../types/branded.js";
import type { ApplicationTypeName, BodyFields } from "../types/messages.js";
import type { MessageTypeDescriptor } from "../types/registry.js";

// ─── Types ──────────────────────────────────────────────────────────

/**
 * An envelope that has been assembled and handed to the transport.
 */
export interface Envelope {
  readonly bytes: Uint8Array;
  readonly typeName: string;
  readonly typeId: TypeId;
  readonly messageId: MessageId;
  readonly sentAt: Seconds;
  readonly address: ModemAddress;
}

export interface OutgoingPipelineOptions {
  readonly registry: ITypeRegistry;
  readonly transport: Pick<IModemTransport, "publish">;
  readonly targetAddress: ModemAddress;
  /** Default: 9000 bytes. */
  readonly maxEnvelopeLength?: number;
  readonly clock?: Clock;
  readonly counter?: SequenceCounter;
  /** Where events go. Default: a private emitter. */
  readonly events?: IEnvelopeEmitter;
}

// ─── Pipeline ───────────────────────────────────────────────────────

export class OutgoingPipeline {
  readonly events: IEnvelopeEmitter;

  private readonly registry: ITypeRegistry;
  private readonly transport: Pick<IModemTransport, "publish">;
  private readonly targetAddress: ModemAddress;
  private readonly maxEnvelopeLength: number;
  private readonly clock: Clock;
  private readonly counter: SequenceCounter;
  private readonly codecs: BodyCodecTable;

  constructor(options: OutgoingPipelineOptions) {
    this.registry = options.registry;
    this.transport = options.transport;
    this.targetAddress = options.targetAddress;
    this.maxEnvelopeLength = options.maxEnvelopeLength ?? MAX_ENVELOPE_LENGTH;
    this.clock = options.clock ?? systemClock;
    this.counter = options.counter ?? new SequenceCounter();
    this.events = options.events ?? new EnvelopeEmitter();
    this.codecs = createBodyCodecs(this.maxEnvelopeLength, registeredLayouts(this.registry));
  }

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Encode and publish one application message.
   *
   * @throws {EnvelopeError} code=UNKNOWN_TYPE if the type is not registered.
   * @throws {EnvelopeError} code=ENCODE_ERROR if the fields do not match the
   * type, or the type is `ack`.
   * @throws {EnvelopeError} code=ENVELOPE_TOO_LARGE if the envelope exceeds
   * the maximum length.
   */
  send<K extends ApplicationTypeName>(typeName: K, fields: BodyFields[K]): Envelope;
  /** Names outside the fixed types (general types, or names known only at run time). */
  send<N extends string>(
    typeName: N extends ApplicationTypeName | "ack" ? never : N,
    payload: Uint8Array
  ): Envelope;
  send(typeName: string, fields: unknown): Envelope {
    return this.guard(typeName, () => {
      if (typeName === "ack") {
        throw new EnvelopeError(
          "Acknowledgments are generated by the receiving pipeline",
          "ENCODE_ERROR",
          { typeName }
        );
      }
      const descriptor = this.registry.resolveByName(typeName);
      return this.transmit(descriptor, this.encodeBody(descriptor, fields));
    });
  }

  /**
   * Publish an opaque body as a general type, looked up by name.
   */
  sendGeneral(name: string, payload: Uint8Array): Envelope {
    return this.guard(name, () => {
      const descriptor = this.registry.resolveByName(name);
      if (descriptor.kind !== "general") {
        throw new EnvelopeError(`"${name}" is not a general type`, "ENCODE_ERROR", {
          typeName: name,
          typeId: descriptor.id,
        });
      }
      return this.transmit(descriptor, this.encodeBody(descriptor, payload));
    });
  }

  /**
   * Publish an opaque body read from a local topic bound to a general type.
   */
  sendFromTopic(topic: string, payload: Uint8Array): Envelope {
    return this.guard(topic, () => {
      const descriptor = this.registry.resolveBySubscribeTopic(topic);
      return this.transmit(descriptor, this.encodeBody(descriptor, payload));
    });
  }

  /**
   * Acknowledge a received message. Only the incoming pipeline calls this.
   */
  sendAck(messageId: MessageId): Envelope {
    return this.guard("ack", () => {
      const descriptor = this.registry.resolveByName("ack");
      return this.transmit(descriptor, this.codecs.ack.encode(messageId));
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  /** Envelopes sent so far (not wrapped). */
  get messagesSent(): number {
    return this.counter.total;
  }

  /** Id the next successful send will carry. */
  get nextMessageId(): MessageId {
    return this.counter.peekMessageId();
  }

  // ─── Internal ───────────────────────────────────────────────────

  private encodeBody(descriptor: MessageTypeDescriptor, fields: unknown): Uint8Array {
    if (descriptor.kind === "general") {
      if (!(fields instanceof Uint8Array)) {
        throw new EnvelopeError(
          `General type "${descriptor.name}" takes a Uint8Array body`,
          "ENCODE_ERROR",
          { typeName: descriptor.name, typeId: descriptor.id }
        );
      }
      return new Uint8Array(fields);
    }
    return this.codecs[descriptor.name].encode(fields);
  }

  private transmit(descriptor: MessageTypeDescriptor, body: Uint8Array): Envelope {
    const length = HEADER_LENGTH + body.length;
    if (length > this.maxEnvelopeLength) {
      throw new EnvelopeError(
        `Envelope of ${length} bytes exceeds the ${this.maxEnvelopeLength}-byte limit`,
        "ENVELOPE_TOO_LARGE",
        { typeName: descriptor.name, typeId: descriptor.id, length, expectedLength: this.maxEnvelopeLength }
      );
    }

    const messageId = this.counter.nextMessageId();
    const sentAt = this.clock();
    const bytes = joinEnvelope(encodeHeader(descriptor.id, messageId, sentAt), body);

    const envelope: Envelope = {
      bytes,
      typeName: descriptor.name,
      typeId: descriptor.id,
      messageId,
      sentAt,
      address: this.targetAddress,
    };

    this.events.emit({
      type: "ENVELOPE_SENT",
      typeName: envelope.typeName,
      typeId: envelope.typeId,
      messageId,
      length: bytes.length,
      address: envelope.address,
      sentAt,
    });

    this.publish(envelope);
    return envelope;
  }

  /**
   * Fire-and-forget handoff. A failing transport is reported, never thrown:
   * the id has already been consumed.
   */
  private publish(envelope: Envelope): void {
    let pending: Promise<void>;
    try {
      pending = this.transport.publish(envelope.bytes, envelope.address);
    } catch (error) {
      pending = Promise.reject(error);
    }

    void pending.catch((error: unknown) => {
      this.events.emit({
        type: "TRANSPORT_FAILED",
        typeName: envelope.typeName,
        messageId: envelope.messageId,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  /**
   * Report an EnvelopeError as SEND_REJECTED, then rethrow it.
   */
  private guard(typeName: string, work: () => Envelope): Envelope {
    try {
      return work();
    } catch (error) {
      if (error instanceof EnvelopeError) {
        this.events.emit({
          type: "SEND_REJECTED",
          typeName: error.context.typeName ?? typeName,
          code: error.code,
          reason: error.message,
          length: error.context.length,
        });
      }
      throw error;
    }
  }
}
