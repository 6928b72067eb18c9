/**
 * @module primitives/base-emitter
 * @description Event hub shared by the pipelines and the bridge.
 *
 * Listeners observe the pipelines; they never take part in them. A
 * listener that throws is counted and reported as LISTENER_FAILED, and
 * the send or receive that emitted the event carries on.
 */

import type {
  IEnvelopeEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  EnvelopeEvent,
  EnvelopeEventMap,
  EnvelopeEventType,
} from "../types/events.js";

export class EnvelopeEmitter implements IEnvelopeEmitter {
  private readonly listeners = new Map<
    EnvelopeEventType,
    Set<EventListener<EnvelopeEventType>>
  >();
  private failures = 0;

  on<T extends EnvelopeEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<EnvelopeEventType>);
    return () => this.off(eventType, listener);
  }

  off<T extends EnvelopeEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as EventListener<EnvelopeEventType>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends EnvelopeEventType>(event: EnvelopeEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (!set) return;

    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (error) {
        this.listenerFailed(event, error);
      }
    }
  }

  listenerCount(eventType: EnvelopeEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }

  /** Listener throws seen so far, including ones on LISTENER_FAILED itself. */
  get listenerFailures(): number {
    return this.failures;
  }

  private listenerFailed(event: EnvelopeEvent, error: unknown): void {
    this.failures += 1;
    // A failing failure listener is counted, not reported again.
    if (event.type === "LISTENER_FAILED") return;

    this.emit({
      type: "LISTENER_FAILED",
      eventType: event.type,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
