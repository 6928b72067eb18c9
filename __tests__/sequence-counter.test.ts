/**
 * @module __tests__/sequence-counter.test
 * @description Tests for message id allocation and wrap-around.
 */

import { describe, it, expect } from "vitest";
import { SequenceCounter } from "../src/primitives/sequence-counter.js";

describe("SequenceCounter", () => {
  it("should start message ids at 0", () => {
    const counter = new SequenceCounter();
    expect(counter.nextMessageId()).toBe(0);
    expect(counter.nextMessageId()).toBe(1);
    expect(counter.total).toBe(2);
  });

  it("should wrap message ids after 65535", () => {
    const counter = new SequenceCounter();
    for (let i = 0; i < 65535; i++) counter.nextMessageId();
    expect(counter.peekMessageId()).toBe(65535);
    expect(counter.nextMessageId()).toBe(65535);
    expect(counter.nextMessageId()).toBe(0);
    expect(counter.total).toBe(65537);
  });

  it("should return the new count from increment()", () => {
    const counter = new SequenceCounter();
    expect(counter.increment()).toBe(1);
    expect(counter.increment()).toBe(2);
  });
});
