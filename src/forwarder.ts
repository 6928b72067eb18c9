/**
 * @module forwarder
 * @description Wires envelope events to a logger.
 *
 * The pipelines and the bridge only emit events. Without the forwarder,
 * every host writes this:
 *   bridge.on("ENVELOPE_SENT", e => log.info(e, "Sending message"));
 *   bridge.on("ENVELOPE_DROPPED", e => log.warn(e, "Dropped envelope"));
 *   // ... one line per event
 *
 * With the forwarder:
 *   const handle = wireLogger(bridge, logger);
 *
 * Level mapping:
 * - info: sent, received, delivered
 * - debug: per-receipt telemetry
 * - warn: dropped, rejected, clock skew
 * - error: consumer, listener and transport failures
 */

import type { IEnvelopeEmitter } from "./interfaces/event-emitter.js";
import type { EnvelopeEventMap, EnvelopeEventType } from "./types/events.js";

// ─── Types ──────────────────────────────────────────────────────────

type LogMethod = (obj: Record<string, unknown>, msg: string) => void;

/**
 * Minimal logger interface. A pino logger satisfies it.
 */
export interface LoggerLike {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export type EventSource = Pick<IEnvelopeEmitter, "on">;

/**
 * Active forwarding handle, used for cleanup.
 */
export interface ForwarderHandle {
  /** Event types currently forwarded. */
  readonly events: readonly EnvelopeEventType[];
  /** Tear down all forwarding. */
  teardown(): void;
}

// ─── Records ────────────────────────────────────────────────────────

type Formatters = {
  readonly [T in EnvelopeEventType]: (event: EnvelopeEventMap[T], log: LoggerLike) => void;
};

const FORMATTERS: Formatters = {
  ENVELOPE_SENT: (e, log) =>
    log.info(
      { typeId: e.typeId, messageId: e.messageId, length: e.length, address: e.address },
      `Sending message of type ${e.typeName} with id ${e.messageId} to ${e.address}`
    ),

  SEND_REJECTED: (e, log) =>
    log.warn({ code: e.code, length: e.length }, `Rejected ${e.typeName} send: ${e.reason}`),

  TRANSPORT_FAILED: (e, log) =>
    log.error(
      { messageId: e.messageId, err: e.error },
      `Transport failed to publish ${e.typeName} message ${e.messageId}`
    ),

  ENVELOPE_RECEIVED: (e, log) => {
    log.info(
      { typeId: e.typeId, messageId: e.messageId, source: e.source, length: e.length },
      `Received message of type ${e.typeName} with id ${e.messageId}`
    );
    log.debug(
      {
        sentAt: e.sentAt,
        receivedAt: e.receivedAt,
        transitSeconds: e.transitSeconds,
        throughput: e.throughput,
        receiveCount: e.receiveCount,
      },
      "Receipt telemetry"
    );
  },

  CLOCK_SKEW: (e, log) =>
    log.warn(
      { typeId: e.typeId, messageId: e.messageId, transitSeconds: e.transitSeconds },
      "Sender clock is ahead of local clock"
    ),

  ENVELOPE_DROPPED: (e, log) =>
    log.warn(
      { code: e.code, typeId: e.typeId, messageId: e.messageId, length: e.length, source: e.source },
      `Dropped envelope: ${e.reason}`
    ),

  MESSAGE_DELIVERED: (e, log) =>
    log.info({ ackedId: e.ackedId, source: e.source }, `Message with id ${e.ackedId} was delivered`),

  CONSUMER_FAILED: (e, log) =>
    log.error(
      { messageId: e.messageId, err: e.error },
      `Consumer failed on ${e.typeName} message ${e.messageId}`
    ),

  LISTENER_FAILED: (e, log) =>
    log.error({ eventType: e.eventType, err: e.error }, `Listener failed on ${e.eventType}`),
};

const ALL_EVENTS: readonly EnvelopeEventType[] = [
  "ENVELOPE_SENT",
  "SEND_REJECTED",
  "TRANSPORT_FAILED",
  "ENVELOPE_RECEIVED",
  "CLOCK_SKEW",
  "ENVELOPE_DROPPED",
  "MESSAGE_DELIVERED",
  "CONSUMER_FAILED",
  "LISTENER_FAILED",
];

// ─── Forwarder ──────────────────────────────────────────────────────

function forward<T extends EnvelopeEventType>(
  source: EventSource,
  eventType: T,
  log: LoggerLike
): () => void {
  const format: Formatters[T] = FORMATTERS[eventType];
  return source.on(eventType, (event) => format(event, log));
}

/**
 * Forward envelope events from `source` to `log`.
 *
 * @param only - Restrict forwarding to these event types.
 * @returns A handle with teardown() for cleanup.
 *
 * @example
 * ```ts
 * const handle = wireLogger(bridge, logger.child({ node: config.name }));
 * // ...
 * handle.teardown();
 * ```
 */
export function wireLogger(
  source: EventSource,
  log: LoggerLike,
  only: readonly EnvelopeEventType[] = ALL_EVENTS
): ForwarderHandle {
  const events = [...new Set(only)];
  const unsubscribers = events.map((eventType) => forward(source, eventType, log));

  return {
    events,
    teardown() {
      for (const unsubscribe of unsubscribers.splice(0)) {
        unsubscribe();
      }
    },
  };
}
