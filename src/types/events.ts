/**
 * @module types/events
 * @description Event catalog for the envelope pipelines.
 *
 * The pipelines never log directly. Every send, receipt, drop and anomaly
 * becomes a typed event; the logging forwarder (or any other observer)
 * turns them into records.
 */

import type { ModemAddress, MessageId, Seconds, TypeId } from "./branded.js";
import type { EnvelopeErrorCode } from "../interfaces/codec.js";

// ─── Outgoing Events ────────────────────────────────────────────────

/** Emitted when an envelope has been assembled and handed to the transport. */
export interface EnvelopeSentEvent {
  readonly type: "ENVELOPE_SENT";
  readonly typeName: string;
  readonly typeId: TypeId;
  readonly messageId: MessageId;
  readonly length: number;
  readonly address: ModemAddress;
  readonly sentAt: Seconds;
}

/** Emitted when a send request is refused before any id is assigned. */
export interface SendRejectedEvent {
  readonly type: "SEND_REJECTED";
  readonly typeName: string;
  readonly code: EnvelopeErrorCode;
  readonly reason: string;
  readonly length?: number;
}

/** Emitted when the transport fails to publish an envelope already counted as sent. */
export interface TransportFailedEvent {
  readonly type: "TRANSPORT_FAILED";
  readonly typeName: string;
  readonly messageId: MessageId;
  readonly error: string;
}

// ─── Incoming Events ────────────────────────────────────────────────

/**
 * Per-receipt telemetry record. `throughput` is bytes per second, or
 * null when the transit time is zero or negative.
 */
export interface EnvelopeReceivedEvent {
  readonly type: "ENVELOPE_RECEIVED";
  readonly typeName: string;
  readonly typeId: TypeId;
  readonly messageId: MessageId;
  readonly source: ModemAddress | null;
  readonly sentAt: Seconds;
  readonly receivedAt: Seconds;
  readonly length: number;
  readonly transitSeconds: number;
  readonly throughput: number | null;
  readonly receiveCount: number;
}

/** Emitted when the sender's timestamp is ahead of the local clock. */
export interface ClockSkewEvent {
  readonly type: "CLOCK_SKEW";
  readonly typeId: TypeId;
  readonly messageId: MessageId;
  readonly transitSeconds: number;
}

/** Emitted when an envelope is discarded. Fields are present when known. */
export interface EnvelopeDroppedEvent {
  readonly type: "ENVELOPE_DROPPED";
  readonly code: EnvelopeErrorCode;
  readonly reason: string;
  readonly length: number;
  readonly source: ModemAddress | null;
  readonly typeId?: TypeId;
  readonly messageId?: MessageId;
}

/** Emitted when a remote node acknowledges one of our messages. */
export interface MessageDeliveredEvent {
  readonly type: "MESSAGE_DELIVERED";
  readonly ackedId: MessageId;
  readonly source: ModemAddress | null;
}

/** Emitted when a consumer throws while handling a dispatched message. */
export interface ConsumerFailedEvent {
  readonly type: "CONSUMER_FAILED";
  readonly typeName: string;
  readonly messageId: MessageId;
  readonly error: string;
}

/**
 * Emitted when an event listener throws. The failing event is not
 * re-dispatched; the remaining listeners still run.
 */
export interface ListenerFailedEvent {
  readonly type: "LISTENER_FAILED";
  /** Event the listener was handling. */
  readonly eventType: Exclude<EnvelopeEventType, "LISTENER_FAILED">;
  readonly error: string;
}

// ─── Union Types ────────────────────────────────────────────────────

export type OutgoingEvent = EnvelopeSentEvent | SendRejectedEvent | TransportFailedEvent;

export type IncomingEvent =
  | EnvelopeReceivedEvent
  | ClockSkewEvent
  | EnvelopeDroppedEvent
  | MessageDeliveredEvent
  | ConsumerFailedEvent;

/** Union of all envelope events. */
export type EnvelopeEvent = OutgoingEvent | IncomingEvent | ListenerFailedEvent;

/**
 * Extract the event type string literal from an EnvelopeEvent.
 */
export type EnvelopeEventType = EnvelopeEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type EnvelopeEventMap = {
  ENVELOPE_SENT: EnvelopeSentEvent;
  SEND_REJECTED: SendRejectedEvent;
  TRANSPORT_FAILED: TransportFailedEvent;
  ENVELOPE_RECEIVED: EnvelopeReceivedEvent;
  CLOCK_SKEW: ClockSkewEvent;
  ENVELOPE_DROPPED: EnvelopeDroppedEvent;
  MESSAGE_DELIVERED: MessageDeliveredEvent;
  CONSUMER_FAILED: ConsumerFailedEvent;
  LISTENER_FAILED: ListenerFailedEvent;
};
