/**
 * @module __tests__/config.test
 * @description Tests for configuration defaults, validation and file loading.
 */

import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { ConfigError, loadConfig, parseConfig, resolveConfig } from "../src/config/index.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function errorsOf(input: unknown): string[] {
  const result = parseConfig(input);
  return result.success ? [] : result.errors;
}

describe("Configuration", () => {
  describe("parseConfig()", () => {
    it("should fill every default from an empty object", () => {
      const result = parseConfig({});
      expect(result).toEqual({
        success: true,
        config: {
          name: "packer_parser",
          targetAddress: 5,
          requiringAck: ["position_request", "body_request"],
          retries: 3,
          retryDelay: 30,
          maxEnvelopeLength: 9000,
          generalMessagesOutgoing: [],
          generalMessagesIncoming: [],
          logging: { level: "info" },
        },
      });
    });

    it("should treat a missing document as empty", () => {
      expect(parseConfig(undefined).success).toBe(true);
    });

    it("should reject an out-of-range target address", () => {
      expect(errorsOf({ targetAddress: 300 })).toEqual([
        "targetAddress: Number must be less than or equal to 255",
      ]);
    });

    it("should require room for the largest fixed envelope", () => {
      expect(errorsOf({ maxEnvelopeLength: 50 })).toEqual([
        "maxEnvelopeLength: Number must be greater than or equal to 51",
      ]);
      expect(errorsOf({ maxEnvelopeLength: 51 })).toEqual([]);
    });

    it("should reject unknown keys", () => {
      expect(errorsOf({ target_address: 5 })).toEqual(["Unrecognized key(s) in object: 'target_address'"]);
    });

    it("should reject general types that reuse a fixed name", () => {
      expect(
        errorsOf({
          generalMessagesIncoming: [{ name: "nav", id: 130, publishTopic: "/nav", messageType: "Nav" }],
        })
      ).toEqual(['generalMessagesIncoming.0.name: "nav" is a fixed message type']);
    });

    it("should reject general types that reuse a fixed id", () => {
      expect(
        errorsOf({
          generalMessagesOutgoing: [{ name: "depth", id: 32, subscribeTopic: "/depth", messageType: "Float32" }],
        })
      ).toEqual(['generalMessagesOutgoing.0.id: id 32 is reserved for "ack"']);
    });

    it("should reject one name configured with two ids", () => {
      expect(
        errorsOf({
          generalMessagesOutgoing: [{ name: "battery", id: 120, subscribeTopic: "/battery", messageType: "BatteryState" }],
          generalMessagesIncoming: [{ name: "battery", id: 122, publishTopic: "/remote/battery", messageType: "BatteryState" }],
        })
      ).toEqual(['generalMessagesIncoming.0.name: "battery" is configured with id 120 (BatteryState) elsewhere']);
    });

    it("should reject one id configured for two names", () => {
      expect(
        errorsOf({
          generalMessagesOutgoing: [{ name: "a", id: 120, subscribeTopic: "/a", messageType: "A" }],
          generalMessagesIncoming: [{ name: "b", id: 120, publishTopic: "/b", messageType: "B" }],
        })
      ).toEqual(['generalMessagesIncoming.0.id: id 120 is already used by "a"']);
    });

    it("should reject two outgoing types reading one topic", () => {
      expect(
        errorsOf({
          generalMessagesOutgoing: [
            { name: "a", id: 120, subscribeTopic: "/shared", messageType: "A" },
            { name: "b", id: 121, subscribeTopic: "/shared", messageType: "B" },
          ],
        })
      ).toEqual(['generalMessagesOutgoing.1.subscribeTopic: topic "/shared" already feeds another type']);
    });

    it("should reject acknowledgment of unregistered types", () => {
      expect(errorsOf({ requiringAck: ["sonar"] })).toEqual(['requiringAck.0: unknown message type "sonar"']);
    });

    it("should reject acknowledgment of acks", () => {
      expect(errorsOf({ requiringAck: ["ack"] })).toEqual(["requiringAck.0: acks are never acknowledged"]);
    });
  });

  describe("loadConfig()", () => {
    it("should load and validate a JSON file", () => {
      const result = loadConfig(fixture("modem.config.json"));

      expect(result.path).toBe(fixture("modem.config.json"));
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.config.name).toBe("surface_packer");
        expect(result.config.targetAddress).toBe(7);
        expect(result.config.requiringAck).toEqual(["position_request", "body_request", "battery"]);
        expect(result.config.generalMessagesIncoming.map((entry) => entry.id)).toEqual([120, 121]);
        expect(result.config.logging.level).toBe("debug");
        expect(result.config.retries).toBe(3);
      }
    });

    it("should report a missing file", () => {
      const missing = path.resolve(fixture("absent.json"));
      expect(loadConfig(missing)).toEqual({
        success: false,
        errors: [`Config file not found: ${missing}`],
        path: missing,
      });
    });

    it("should report malformed JSON", () => {
      const result = loadConfig(fixture("broken.config.json"));
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toHaveLength(1);
      }
    });
  });

  describe("resolveConfig()", () => {
    it("should return the parsed configuration", () => {
      expect(resolveConfig({ targetAddress: 9 }).targetAddress).toBe(9);
    });

    it("should throw ConfigError with every problem", () => {
      let caught: unknown;
      try {
        resolveConfig({ targetAddress: -1, retries: 1.5 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.errors).toEqual([
          "targetAddress: Number must be greater than or equal to 0",
          "retries: Expected integer, received float",
        ]);
        expect(caught.message).toBe(
          "Invalid modem configuration: targetAddress: Number must be greater than or equal to 0; retries: Expected integer, received float"
        );
      }
    });
  });
});
