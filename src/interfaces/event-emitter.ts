/**
 * @module interfaces/event-emitter
 * @description Observer contract for envelope traffic.
 *
 * Both pipelines take an `IEnvelopeEmitter` in their options, so a host
 * can point them at one shared hub (the bridge does) or give each its own.
 */

import type { EnvelopeEventMap, EnvelopeEventType } from "../types/events.js";

export type EventListener<T extends EnvelopeEventType> = (
  event: EnvelopeEventMap[T]
) => void;

/**
 * @interface IEnvelopeEmitter
 * @description Where the pipelines report sends, receipts, drops and
 * failures.
 */
export interface IEnvelopeEmitter {
  /**
   * @query Observe one event type.
   * @returns Unsubscribe function.
   */
  on<T extends EnvelopeEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void;

  off<T extends EnvelopeEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * @command Report an event to its listeners, synchronously and in
   * registration order. Never throws because of a listener.
   */
  emit<T extends EnvelopeEventType>(event: EnvelopeEventMap[T]): void;
}
