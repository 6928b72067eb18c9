/**
 * @module __tests__/bridge-integration.test
 * @description Two ModemBridge instances exchanging envelopes over the
 * in-memory modem bus.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ModemBridge } from "../src/bridge.js";
import { ConfigError } from "../src/config/index.js";
import { InMemoryModemBus } from "../src/transports/memory.js";
import { toModemAddress, toSeconds } from "../src/types/branded.js";
import type { LoggerLike } from "../src/forwarder.js";
import type { EnvelopeEvent } from "../src/types/events.js";
import type { NavFix, Pose } from "../src/types/messages.js";

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

const POSE: Pose = { x: 1, y: 2, z: 3, roll: 0, pitch: 0, yaw: 1.5708 };

const NAV: NavFix = {
  latitude: 43.25,
  longitude: 5.375,
  north: 12.5,
  east: -3,
  depth: 40,
  roll: 0,
  pitch: 0.5,
  yaw: 1,
};

describe("ModemBridge Integration", () => {
  let bus: InMemoryModemBus;
  let surface: ModemBridge;
  let vehicle: ModemBridge;

  beforeEach(() => {
    bus = new InMemoryModemBus();
    const clock = () => toSeconds(1000);

    surface = new ModemBridge({
      transport: bus.attach(toModemAddress(1)),
      config: {
        name: "surface",
        targetAddress: 2,
        generalMessagesOutgoing: [
          { name: "battery", id: 120, subscribeTopic: "/battery", messageType: "BatteryState" },
        ],
      },
      clock,
      logger: false,
    });

    vehicle = new ModemBridge({
      transport: bus.attach(toModemAddress(2)),
      config: {
        name: "vehicle",
        targetAddress: 1,
        generalMessagesIncoming: [
          { name: "battery", id: 120, publishTopic: "/remote/battery", messageType: "BatteryState" },
        ],
      },
      clock,
      logger: false,
    });

    surface.start();
    vehicle.start();
  });

  afterEach(() => {
    surface.stop();
    vehicle.stop();
  });

  describe("Acknowledged requests", () => {
    it("should deliver a position request and confirm it with an ack", async () => {
      const onRequest = vi.fn();
      vehicle.onMessage("position_request", onRequest);
      const delivered: EnvelopeEvent[] = [];
      surface.on("MESSAGE_DELIVERED", (event) => delivered.push(event));

      const envelope = surface.sendPositionRequest(POSE);
      await flush();

      expect(onRequest).toHaveBeenCalledWith(
        expect.objectContaining({
          type: "position_request",
          messageId: 0,
          pose: { x: 1, y: 2, z: 3, roll: 0, pitch: 0, yaw: Math.fround(1.5708) },
        })
      );
      expect(delivered).toEqual([
        { type: "MESSAGE_DELIVERED", ackedId: envelope.messageId, source: 2 },
      ]);
    });

    it("should acknowledge even when a receipt listener throws", async () => {
      vehicle.on("ENVELOPE_RECEIVED", () => {
        throw new Error("listener down");
      });
      const delivered: EnvelopeEvent[] = [];
      surface.on("MESSAGE_DELIVERED", (event) => delivered.push(event));

      const envelope = surface.sendPositionRequest(POSE);
      await flush();

      expect(delivered).toEqual([
        { type: "MESSAGE_DELIVERED", ackedId: envelope.messageId, source: 2 },
      ]);
      expect(vehicle.listenerFailures).toBe(1);
      expect(vehicle.getStats().messagesReceived).toBe(1);
    });

    it("should count both directions in the stats", async () => {
      surface.sendBodyRequest(POSE);
      await flush();

      expect(surface.getStats()).toEqual({
        running: true,
        messagesSent: 1,
        messagesReceived: 1,
        nextMessageId: 1,
      });
      expect(vehicle.getStats()).toEqual({
        running: true,
        messagesSent: 1,
        messagesReceived: 1,
        nextMessageId: 1,
      });
    });
  });

  describe("Unacknowledged messages", () => {
    it("should deliver nav without an ack", async () => {
      const onNav = vi.fn();
      surface.onMessage("nav", onNav);

      vehicle.sendNav(NAV);
      await flush();

      expect(onNav).toHaveBeenCalledWith(expect.objectContaining({ type: "nav", nav: NAV }));
      expect(surface.getStats().messagesSent).toBe(0);
    });

    it("should deliver string_image bytes", async () => {
      const onImage = vi.fn();
      vehicle.onMessage("string_image", onImage);

      surface.sendStringImage(new Uint8Array([0x68, 0x69]));
      await flush();

      expect(onImage).toHaveBeenCalledWith(
        expect.objectContaining({ type: "string_image", payload: new Uint8Array([0x68, 0x69]) })
      );
    });
  });

  describe("General messages", () => {
    it("should carry a topic-bound general type between topics", async () => {
      const onBattery = vi.fn();
      vehicle.onTopic("/remote/battery", onBattery);

      surface.sendFromTopic("/battery", new Uint8Array([42]));
      await flush();

      expect(onBattery).toHaveBeenCalledWith(
        expect.objectContaining({
          type: "general",
          name: "battery",
          topic: "/remote/battery",
          payload: new Uint8Array([42]),
        })
      );
    });

    it("should carry the built-in pass-through types", async () => {
      const onRos = vi.fn();
      vehicle.onTopic("ros_service", onRos);

      surface.sendGeneral("ros_service", new Uint8Array([1, 2]));
      await flush();

      expect(onRos).toHaveBeenCalledTimes(1);
    });

    it("should refuse a topic no outgoing type reads from", () => {
      expect(() => vehicle.sendFromTopic("/battery", new Uint8Array([1]))).toThrow(
        'No general type reads from topic "/battery"'
      );
      expect(vehicle.getStats().messagesSent).toBe(0);
    });

    it("should drop a general type the receiver does not know", async () => {
      const sonar = new ModemBridge({
        transport: bus.attach(toModemAddress(3)),
        config: {
          targetAddress: 1,
          generalMessagesOutgoing: [
            { name: "sonar", id: 130, subscribeTopic: "/sonar", messageType: "Range" },
          ],
        },
        logger: false,
      });
      const dropped: EnvelopeEvent[] = [];
      surface.on("ENVELOPE_DROPPED", (event) => dropped.push(event));

      sonar.sendFromTopic("/sonar", new Uint8Array([1]));
      await flush();

      expect(dropped).toEqual([
        expect.objectContaining({ code: "UNKNOWN_TYPE", typeId: 130, messageId: 0, source: 3 }),
      ]);
      expect(surface.getStats().messagesReceived).toBe(0);
    });
  });

  describe("Lifecycle", () => {
    it("should stop receiving after stop()", async () => {
      const onNav = vi.fn();
      surface.onMessage("nav", onNav);

      surface.stop();
      expect(surface.isRunning).toBe(false);

      vehicle.sendNav(NAV);
      await flush();
      expect(onNav).not.toHaveBeenCalled();
    });

    it("should subscribe once however often start() is called", async () => {
      const onNav = vi.fn();
      surface.onMessage("nav", onNav);
      surface.start();

      vehicle.sendNav(NAV);
      await flush();
      expect(onNav).toHaveBeenCalledTimes(1);
    });

    it("should drop garbage handed to receive()", () => {
      const result = surface.receive(new Uint8Array([1, 2, 3]));
      expect(result.status).toBe("DROPPED");
    });

    it("should refuse an invalid configuration", () => {
      expect(
        () =>
          new ModemBridge({
            transport: bus.attach(toModemAddress(3)),
            config: { requiringAck: ["sonar"] },
            logger: false,
          })
      ).toThrow(ConfigError);
    });

    it("should refuse an envelope limit too small for an ack", () => {
      expect(
        () =>
          new ModemBridge({
            transport: bus.attach(toModemAddress(3)),
            config: { maxEnvelopeLength: 12 },
            logger: false,
          })
      ).toThrow(
        "Invalid modem configuration: maxEnvelopeLength: Number must be greater than or equal to 51"
      );
    });
  });

  describe("Logging", () => {
    it("should forward events to the logger while running", async () => {
      const log = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      } satisfies LoggerLike;

      const logged = new ModemBridge({
        transport: bus.attach(toModemAddress(4)),
        config: { targetAddress: 2 },
        clock: () => toSeconds(1000),
        logger: log,
      });
      logged.start();
      expect(log.info).toHaveBeenCalledWith({ targetAddress: 2, types: 7 }, "Modem bridge started");

      logged.sendNav(NAV);
      expect(log.info).toHaveBeenLastCalledWith(
        { typeId: 5, messageId: 0, length: 51, address: 2 },
        "Sending message of type nav with id 0 to 2"
      );

      logged.stop();
      expect(log.info).toHaveBeenLastCalledWith({}, "Modem bridge stopped");

      log.info.mockClear();
      logged.sendNav(NAV);
      expect(log.info).not.toHaveBeenCalled();
      await flush();
    });
  });
});
