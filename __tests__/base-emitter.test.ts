/**
 * @module __tests__/base-emitter.test
 * @description Tests for the envelope event hub (registration, listener isolation).
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { EnvelopeEmitter } from "../src/primitives/base-emitter.js";
import { toMessageId } from "../src/types/branded.js";
import type { EnvelopeEvent } from "../src/types/events.js";

const DELIVERED = { type: "MESSAGE_DELIVERED", ackedId: toMessageId(9), source: null } as const;

describe("EnvelopeEmitter", () => {
  let emitter: EnvelopeEmitter;

  beforeEach(() => {
    emitter = new EnvelopeEmitter();
  });

  it("should call listeners in registration order", () => {
    const order: string[] = [];
    emitter.on("MESSAGE_DELIVERED", () => order.push("first"));
    emitter.on("MESSAGE_DELIVERED", () => order.push("second"));

    emitter.emit(DELIVERED);

    expect(order).toEqual(["first", "second"]);
  });

  it("should stop calling a listener once unsubscribed", () => {
    const listener = vi.fn();
    const unsubscribe = emitter.on("MESSAGE_DELIVERED", listener);
    unsubscribe();

    emitter.emit(DELIVERED);

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.listenerCount("MESSAGE_DELIVERED")).toBe(0);
  });

  it("should keep notifying after a listener throws and report the failure", () => {
    const failures: EnvelopeEvent[] = [];
    const after = vi.fn();
    emitter.on("LISTENER_FAILED", (event) => failures.push(event));
    emitter.on("MESSAGE_DELIVERED", () => {
      throw new Error("listener down");
    });
    emitter.on("MESSAGE_DELIVERED", after);

    expect(() => emitter.emit(DELIVERED)).not.toThrow();

    expect(after).toHaveBeenCalledTimes(1);
    expect(failures).toEqual([
      { type: "LISTENER_FAILED", eventType: "MESSAGE_DELIVERED", error: "listener down" },
    ]);
    expect(emitter.listenerFailures).toBe(1);
  });

  it("should describe non-Error throws", () => {
    const failures: EnvelopeEvent[] = [];
    emitter.on("LISTENER_FAILED", (event) => failures.push(event));
    emitter.on("MESSAGE_DELIVERED", () => {
      throw "plain string";
    });

    emitter.emit(DELIVERED);

    expect(failures).toEqual([
      { type: "LISTENER_FAILED", eventType: "MESSAGE_DELIVERED", error: "plain string" },
    ]);
  });

  it("should count a failing failure listener without reporting it again", () => {
    const failureListener = vi.fn(() => {
      throw new Error("also down");
    });
    emitter.on("LISTENER_FAILED", failureListener);
    emitter.on("MESSAGE_DELIVERED", () => {
      throw new Error("listener down");
    });

    expect(() => emitter.emit(DELIVERED)).not.toThrow();

    expect(failureListener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerFailures).toBe(2);
  });
});
