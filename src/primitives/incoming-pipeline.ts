/**
 * @module primitives/incoming-pipeline
 * @description Turns received envelopes back into application messages.
 *
 * Stages:
 *   RECEIVED → HEADER_PARSED → TYPE_RESOLVED → BODY_DECODED → DISPATCHED → ACKED
 *
 * Any stage may drop the envelope. A drop is reported as an
 * ENVELOPE_DROPPED event and returned to the caller; `receive` itself
 * never throws for a malformed envelope. A failed ack leaves the
 * message DISPATCHED with `ackError` set.
 */

import { EnvelopeError } from "../interfaces/codec.js";
import type { ITypeRegistry } from "../interfaces/registry.js";
import type { IEnvelopeEmitter } from "../interfaces/event-emitter.js";
import { EnvelopeEmitter } from "./base-emitter.js";
import { SequenceCounter } from "./sequence-counter.js";
import { registeredLayouts } from "./type-registry.js";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import type { Envelope } from "./outgoing-pipeline.js";
import { createBodyCodecs, decodeHeader, splitEnvelope } from "../codec/index.js";
import type { BodyCodecTable, EnvelopeHeader } from "../codec/index.js";
import type { ModemAddress, MessageId } from "../types/branded.js";
import type {
  DecodedMessage,
  DecodedMessageKind,
  GeneralMessage,
  MessageOf,
} from "../types/messages.js";
import type { MessageTypeDescriptor } from "../types/registry.js";

// ─── Types ──────────────────────────────────────────────────────────

export type ReceiveStage =
  | "RECEIVED"
  | "HEADER_PARSED"
  | "TYPE_RESOLVED"
  | "BODY_DECODED"
  | "DISPATCHED"
  | "ACKED";

/**
 * Terminal state of one `receive` call. A dropped envelope records the
 * last stage it completed.
 */
export type ReceiveResult =
  | {
      readonly status: "DISPATCHED";
      readonly message: DecodedMessage;
      /** Set when an ack was due but could not be sent. */
      readonly ackError?: EnvelopeError;
    }
  | { readonly status: "ACKED"; readonly message: DecodedMessage; readonly ack: Envelope }
  | {
      readonly status: "DROPPED";
      readonly failedAt: Exclude<ReceiveStage, "DISPATCHED" | "ACKED">;
      readonly error: EnvelopeError;
    };

/** Kinds a consumer subscribes to by type; general messages go by topic. */
export type TypedMessageKind = Exclude<DecodedMessageKind, "general">;

export type MessageHandler<K extends DecodedMessageKind> = (message: MessageOf<K>) => void;

/** Sends the acknowledgment for a received message id. */
export interface AckSender {
  sendAck(messageId: MessageId): Envelope;
}

export interface IncomingPipelineOptions {
  readonly registry: ITypeRegistry;
  readonly acks: AckSender;
  /** Type names whose receipt triggers an ack. */
  readonly requiringAck?: Iterable<string>;
  readonly clock?: Clock;
  readonly counter?: SequenceCounter;
  readonly events?: IEnvelopeEmitter;
}

type HandlerTable = {
  readonly [K in TypedMessageKind]: Set<MessageHandler<K>>;
};

/** Default ack set: motion requests. */
export const DEFAULT_REQUIRING_ACK: readonly string[] = ["position_request", "body_request"];

// ─── Pipeline ───────────────────────────────────────────────────────

export class IncomingPipeline {
  readonly events: IEnvelopeEmitter;

  private readonly registry: ITypeRegistry;
  private readonly acks: AckSender;
  private readonly requiringAck: ReadonlySet<string>;
  private readonly clock: Clock;
  private readonly counter: SequenceCounter;
  private readonly codecs: BodyCodecTable;

  private readonly handlers: HandlerTable = {
    position_request: new Set(),
    body_request: new Set(),
    nav: new Set(),
    string_image: new Set(),
    ack: new Set(),
  };
  private readonly topicHandlers = new Map<string, Set<MessageHandler<"general">>>();

  constructor(options: IncomingPipelineOptions) {
    this.registry = options.registry;
    this.acks = options.acks;
    this.requiringAck = new Set(options.requiringAck ?? DEFAULT_REQUIRING_ACK);
    this.clock = options.clock ?? systemClock;
    this.counter = options.counter ?? new SequenceCounter();
    this.events = options.events ?? new EnvelopeEmitter();
    this.codecs = createBodyCodecs(undefined, registeredLayouts(this.registry));
  }

  // ─── Consumers ──────────────────────────────────────────────────

  /**
   * Register a consumer for one decoded type.
   * @returns Unsubscribe function.
   */
  onMessage<K extends TypedMessageKind>(type: K, handler: MessageHandler<K>): () => void {
    const set: Set<MessageHandler<K>> = this.handlers[type];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /**
   * Register a consumer for general messages forwarded to `topic`.
   * @returns Unsubscribe function.
   */
  onTopic(topic: string, handler: MessageHandler<"general">): () => void {
    let set = this.topicHandlers.get(topic);
    if (!set) {
      set = new Set();
      this.topicHandlers.set(topic, set);
    }
    set.add(handler);
    return () => {
      const current = this.topicHandlers.get(topic);
      current?.delete(handler);
      if (current?.size === 0) this.topicHandlers.delete(topic);
    };
  }

  // ─── Receive ────────────────────────────────────────────────────

  /**
   * Process one raw envelope.
   *
   * @param source - Modem address the envelope came from, when the
   * transport knows it.
   */
  receive(raw: Uint8Array, source: ModemAddress | null = null): ReceiveResult {
    let header: EnvelopeHeader;
    let body: Uint8Array;
    try {
      const parts = splitEnvelope(raw);
      header = decodeHeader(parts.header);
      body = parts.body;
    } catch (error) {
      return this.drop("RECEIVED", expectEnvelopeError(error), raw, source);
    }

    let descriptor: MessageTypeDescriptor;
    try {
      descriptor = this.registry.resolveById(header.typeId);
    } catch (error) {
      return this.drop("HEADER_PARSED", expectEnvelopeError(error), raw, source, header);
    }

    this.recordReceipt(descriptor, header, raw.length, source);

    let message: DecodedMessage;
    try {
      message = this.decode(descriptor, header, body);
    } catch (error) {
      return this.drop("TYPE_RESOLVED", expectEnvelopeError(error), raw, source, header);
    }

    this.dispatch(message, source);

    if (!this.requiringAck.has(descriptor.name)) {
      return { status: "DISPATCHED", message };
    }
    // The ack sender reports its own rejection as SEND_REJECTED.
    try {
      return { status: "ACKED", message, ack: this.acks.sendAck(header.messageId) };
    } catch (error) {
      return { status: "DISPATCHED", message, ackError: expectEnvelopeError(error) };
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  /** Envelopes whose type resolved (not wrapped). */
  get messagesReceived(): number {
    return this.counter.total;
  }

  requiresAck(typeName: string): boolean {
    return this.requiringAck.has(typeName);
  }

  // ─── Internal ───────────────────────────────────────────────────

  private recordReceipt(
    descriptor: MessageTypeDescriptor,
    header: EnvelopeHeader,
    length: number,
    source: ModemAddress | null
  ): void {
    const receivedAt = this.clock();
    const transitSeconds = receivedAt - header.sentAt;

    if (transitSeconds < 0) {
      this.events.emit({
        type: "CLOCK_SKEW",
        typeId: header.typeId,
        messageId: header.messageId,
        transitSeconds,
      });
    }

    const receiveCount = this.counter.increment();

    this.events.emit({
      type: "ENVELOPE_RECEIVED",
      typeName: descriptor.name,
      typeId: header.typeId,
      messageId: header.messageId,
      source,
      sentAt: header.sentAt,
      receivedAt,
      length,
      transitSeconds,
      throughput: transitSeconds > 0 ? length / transitSeconds : null,
      receiveCount,
    });
  }

  private decode(
    descriptor: MessageTypeDescriptor,
    header: EnvelopeHeader,
    body: Uint8Array
  ): DecodedMessage {
    const base = {
      typeId: header.typeId,
      messageId: header.messageId,
      sentAt: header.sentAt,
    };

    if (descriptor.kind === "general") {
      return {
        ...base,
        type: "general",
        name: descriptor.name,
        topic: descriptor.binding.publishTopic ?? descriptor.name,
        payload: new Uint8Array(body),
      };
    }

    const name = descriptor.name;
    switch (name) {
      case "position_request":
        return { ...base, type: "position_request", pose: this.codecs.position_request.decode(body) };
      case "body_request":
        return { ...base, type: "body_request", pose: this.codecs.body_request.decode(body) };
      case "nav":
        return { ...base, type: "nav", nav: this.codecs.nav.decode(body) };
      case "string_image":
        return { ...base, type: "string_image", payload: this.codecs.string_image.decode(body) };
      case "ack":
        return { ...base, type: "ack", ackedId: this.codecs.ack.decode(body) };
      default:
        return assertNever(name);
    }
  }

  private dispatch(message: DecodedMessage, source: ModemAddress | null): void {
    switch (message.type) {
      case "position_request":
        this.deliver(this.handlers.position_request, message, message.type);
        break;
      case "body_request":
        this.deliver(this.handlers.body_request, message, message.type);
        break;
      case "nav":
        this.deliver(this.handlers.nav, message, message.type);
        break;
      case "string_image":
        this.deliver(this.handlers.string_image, message, message.type);
        break;
      case "ack":
        this.events.emit({ type: "MESSAGE_DELIVERED", ackedId: message.ackedId, source });
        this.deliver(this.handlers.ack, message, message.type);
        break;
      case "general":
        this.deliver(this.topicHandlers.get(message.topic), message, message.name);
        break;
      default:
        assertNever(message);
    }
  }

  /**
   * Invoke every consumer. A throwing consumer is reported and does not
   * stop the others.
   */
  private deliver<M extends DecodedMessage>(
    handlers: ReadonlySet<(message: M) => void> | undefined,
    message: M,
    typeName: string
  ): void {
    if (!handlers) return;
    for (const handler of [...handlers]) {
      try {
        handler(message);
      } catch (error) {
        this.events.emit({
          type: "CONSUMER_FAILED",
          typeName,
          messageId: message.messageId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private drop(
    failedAt: "RECEIVED" | "HEADER_PARSED" | "TYPE_RESOLVED",
    error: EnvelopeError,
    raw: Uint8Array,
    source: ModemAddress | null,
    header?: EnvelopeHeader
  ): ReceiveResult {
    this.events.emit({
      type: "ENVELOPE_DROPPED",
      code: error.code,
      reason: error.message,
      length: raw.length,
      source,
      typeId: header?.typeId,
      messageId: header?.messageId,
    });
    return { status: "DROPPED", failedAt, error };
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

/** Per-envelope failures are EnvelopeErrors; anything else is a defect. */
function expectEnvelopeError(error: unknown): EnvelopeError {
  if (error instanceof EnvelopeError) return error;
  throw error;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message kind: ${JSON.stringify(value)}`);
}
