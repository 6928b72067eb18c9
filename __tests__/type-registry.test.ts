/**
 * @module __tests__/type-registry.test
 * @description Tests for the type registry (fixed types, general registration, freezing).
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TypeRegistry, FIXED_MESSAGE_TYPES, registeredLayouts } from "../src/primitives/type-registry.js";
import { ACK_LAYOUT, NAV_LAYOUT, POSE_LAYOUT } from "../src/codec/body.js";
import { EnvelopeError } from "../src/interfaces/codec.js";
import { toTypeId } from "../src/types/branded.js";

function captureError(fn: () => unknown): EnvelopeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof EnvelopeError) return error;
    throw error;
  }
  throw new Error("Expected an EnvelopeError");
}

const BINDING = { publishTopic: null, subscribeTopic: null, messageType: "Opaque" };

describe("TypeRegistry", () => {
  let registry: TypeRegistry;

  beforeEach(() => {
    registry = TypeRegistry.withFixedTypes();
  });

  describe("Fixed types", () => {
    it("should register the fixed ids", () => {
      expect(registry.list().map((d) => [d.name, d.id])).toEqual([
        ["position_request", 1],
        ["body_request", 2],
        ["nav", 5],
        ["string_image", 10],
        ["ack", 32],
        ["ros_message", 100],
        ["ros_service", 101],
      ]);
    });

    it("should be a bijection over every fixed type", () => {
      for (const descriptor of FIXED_MESSAGE_TYPES) {
        expect(registry.resolveByName(descriptor.name).id).toBe(descriptor.id);
        expect(registry.resolveById(descriptor.id).name).toBe(descriptor.name);
      }
    });

    it("should forward the built-in pass-through types to their own name", () => {
      const descriptor = registry.resolveByName("ros_message");
      expect(descriptor.kind).toBe("general");
      if (descriptor.kind === "general") {
        expect(descriptor.binding.publishTopic).toBe("ros_message");
      }
    });
  });

  describe("register()", () => {
    it("should reject a duplicate id", () => {
      const error = captureError(() =>
        registry.register({ kind: "general", name: "other", id: toTypeId(5), binding: BINDING })
      );
      expect(error.code).toBe("DUPLICATE_IDENTIFIER");
      expect(error.message).toBe('Type id 5 is already registered as "nav"');
    });

    it("should reject a duplicate name", () => {
      const error = captureError(() =>
        registry.register({ kind: "fixed", name: "nav", id: toTypeId(6), layout: null })
      );
      expect(error.code).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should reserve id 0", () => {
      expect(() =>
        registry.register({ kind: "general", name: "zero", id: toTypeId(0), binding: BINDING })
      ).toThrow(RangeError);
    });
  });

  describe("resolve", () => {
    it("should fail UNKNOWN_TYPE for an unregistered id", () => {
      const error = captureError(() => registry.resolveById(toTypeId(77)));
      expect(error.code).toBe("UNKNOWN_TYPE");
      expect(error.message).toBe("Unknown type id 77");
    });

    it("should fail UNKNOWN_TYPE for an unregistered name", () => {
      expect(captureError(() => registry.resolveByName("sonar")).code).toBe("UNKNOWN_TYPE");
      expect(registry.has("sonar")).toBe(false);
    });
  });

  describe("registerGeneral()", () => {
    it("should register a general type with its topic binding", () => {
      const descriptor = registry.registerGeneral({
        name: "battery",
        id: 120,
        messageType: "BatteryState",
        subscribeTopic: "/battery",
      });
      expect(descriptor.binding).toEqual({
        publishTopic: null,
        subscribeTopic: "/battery",
        messageType: "BatteryState",
      });
      expect(registry.resolveBySubscribeTopic("/battery").name).toBe("battery");
      expect(registry.resolveById(toTypeId(120)).name).toBe("battery");
    });

    it("should merge the outgoing and incoming halves of one type", () => {
      registry.registerGeneral({ name: "battery", id: 120, messageType: "BatteryState", subscribeTopic: "/battery" });
      registry.registerGeneral({ name: "battery", id: 120, messageType: "BatteryState", publishTopic: "/remote/battery" });

      const descriptor = registry.resolveByName("battery");
      expect(descriptor.kind === "general" && descriptor.binding).toEqual({
        publishTopic: "/remote/battery",
        subscribeTopic: "/battery",
        messageType: "BatteryState",
      });
      expect(registry.list()).toHaveLength(FIXED_MESSAGE_TYPES.length + 1);
    });

    it("should reject the same name with another id", () => {
      registry.registerGeneral({ name: "battery", id: 120, messageType: "BatteryState" });
      const error = captureError(() =>
        registry.registerGeneral({ name: "battery", id: 121, messageType: "BatteryState" })
      );
      expect(error.code).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should reject the same name with another message type", () => {
      registry.registerGeneral({ name: "battery", id: 120, messageType: "BatteryState" });
      expect(
        captureError(() => registry.registerGeneral({ name: "battery", id: 120, messageType: "Float32" })).code
      ).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should reject a fixed type name", () => {
      expect(
        captureError(() => registry.registerGeneral({ name: "ros_message", id: 100, messageType: "ros_message" })).code
      ).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should reject a fixed type id", () => {
      expect(
        captureError(() => registry.registerGeneral({ name: "depth", id: 5, messageType: "Float32" })).code
      ).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should reject a subscribe topic already bound", () => {
      registry.registerGeneral({ name: "a", id: 120, messageType: "A", subscribeTopic: "/shared" });
      expect(
        captureError(() => registry.registerGeneral({ name: "b", id: 121, messageType: "B", subscribeTopic: "/shared" })).code
      ).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should reject conflicting topics for the same type", () => {
      registry.registerGeneral({ name: "a", id: 120, messageType: "A", publishTopic: "/one" });
      expect(
        captureError(() => registry.registerGeneral({ name: "a", id: 120, messageType: "A", publishTopic: "/two" })).code
      ).toBe("DUPLICATE_IDENTIFIER");
    });

    it("should fail UNKNOWN_TYPE for an unbound topic", () => {
      expect(captureError(() => registry.resolveBySubscribeTopic("/nowhere")).code).toBe("UNKNOWN_TYPE");
    });
  });

  describe("registeredLayouts()", () => {
    it("should return the layout of every fixed-layout type", () => {
      expect(registeredLayouts(registry)).toEqual({
        position_request: POSE_LAYOUT,
        body_request: POSE_LAYOUT,
        nav: NAV_LAYOUT,
        ack: ACK_LAYOUT,
      });
    });

    it("should fail when a fixed-layout type is missing", () => {
      const error = captureError(() => registeredLayouts(new TypeRegistry()));
      expect(error.code).toBe("UNKNOWN_TYPE");
      expect(error.message).toBe('Unknown type "position_request"');
    });

    it("should fail when a fixed-layout type was registered without one", () => {
      const bare = new TypeRegistry();
      bare.register({ kind: "fixed", name: "position_request", id: toTypeId(1), layout: null });
      const error = captureError(() => registeredLayouts(bare));
      expect(error.message).toBe('"position_request" is not registered with a layout');
    });
  });

  describe("freeze()", () => {
    it("should refuse registration once frozen", () => {
      registry.freeze();
      expect(registry.isFrozen()).toBe(true);
      expect(() => registry.registerGeneral({ name: "late", id: 200, messageType: "Late" })).toThrow(
        "Type registry is frozen"
      );
    });

    it("should keep resolving once frozen", () => {
      registry.freeze();
      expect(registry.resolveById(toTypeId(32)).name).toBe("ack");
    });
  });
});
