/**
 * @module bridge
 * @description ModemBridge: the orchestrator that wires registry, codecs,
 * pipelines, transport and logging together.
 *
 * A ModemBridge instance manages:
 * - the type registry (fixed types plus configured general types, frozen)
 * - the outgoing pipeline (typed sends addressed to `targetAddress`)
 * - the incoming pipeline (decode, dispatch, automatic acks)
 * - the transport subscription
 * - event forwarding to the logger
 *
 * @example
 * ```ts
 * const bridge = new ModemBridge({ transport, config: { targetAddress: 7 } });
 * bridge.onMessage("nav", (message) => console.log(message.nav.depth));
 * bridge.start();
 *
 * bridge.sendPositionRequest({ x: 1, y: 2, z: 3, roll: 0, pitch: 0, yaw: 1.5708 });
 * ```
 */

import { EnvelopeEmitter } from "./primitives/base-emitter.js";
import { TypeRegistry } from "./primitives/type-registry.js";
import { OutgoingPipeline } from "./primitives/outgoing-pipeline.js";
import type { Envelope } from "./primitives/outgoing-pipeline.js";
import { IncomingPipeline } from "./primitives/incoming-pipeline.js";
import type {
  MessageHandler,
  ReceiveResult,
  TypedMessageKind,
} from "./primitives/incoming-pipeline.js";
import { systemClock } from "./primitives/clock.js";
import type { Clock } from "./primitives/clock.js";
import { wireLogger } from "./forwarder.js";
import type { ForwarderHandle, LoggerLike } from "./forwarder.js";
import { logger as rootLogger } from "./logger.js";
import { resolveConfig } from "./config/index.js";
import type { ModemConfig } from "./config/index.js";
import type { IModemTransport } from "./interfaces/transport.js";
import { toModemAddress } from "./types/branded.js";
import type { ModemAddress, MessageId } from "./types/branded.js";
import type { NavFix, Pose } from "./types/messages.js";

// ─── Configuration ────────────────────────────────────────────────

export interface ModemBridgeOptions {
  readonly transport: IModemTransport;
  /** Raw configuration, validated on construction. Default: all defaults. */
  readonly config?: unknown;
  /** Default: wall clock in seconds. */
  readonly clock?: Clock;
  /** Where events are logged, or false for none. Default: the root pino logger. */
  readonly logger?: LoggerLike | false;
}

export interface BridgeStats {
  readonly running: boolean;
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly nextMessageId: MessageId;
}

/**
 * Build the frozen registry for a configuration.
 *
 * @throws {EnvelopeError} code=DUPLICATE_IDENTIFIER on conflicting types.
 */
export function buildRegistry(config: ModemConfig): TypeRegistry {
  const registry = TypeRegistry.withFixedTypes();
  for (const entry of config.generalMessagesOutgoing) {
    registry.registerGeneral(entry);
  }
  for (const entry of config.generalMessagesIncoming) {
    registry.registerGeneral(entry);
  }
  registry.freeze();
  return registry;
}

// ─── Orchestrator ──────────────────────────────────────────────────

export class ModemBridge extends EnvelopeEmitter {
  readonly config: ModemConfig;
  readonly registry: TypeRegistry;
  readonly outgoing: OutgoingPipeline;
  readonly incoming: IncomingPipeline;
  readonly targetAddress: ModemAddress;

  private readonly transport: IModemTransport;
  private readonly log: LoggerLike | null;
  private unsubscribeTransport: (() => void) | null = null;
  private forwarder: ForwarderHandle | null = null;

  /**
   * @throws {ConfigError} if the configuration is invalid.
   * @throws {EnvelopeError} code=DUPLICATE_IDENTIFIER on conflicting types.
   */
  constructor(options: ModemBridgeOptions) {
    super();
    this.config = resolveConfig(options.config ?? {});
    this.registry = buildRegistry(this.config);
    this.targetAddress = toModemAddress(this.config.targetAddress);
    this.transport = options.transport;

    const clock = options.clock ?? systemClock;

    this.outgoing = new OutgoingPipeline({
      registry: this.registry,
      transport: this.transport,
      targetAddress: this.targetAddress,
      maxEnvelopeLength: this.config.maxEnvelopeLength,
      clock,
      events: this,
    });

    this.incoming = new IncomingPipeline({
      registry: this.registry,
      acks: this.outgoing,
      requiringAck: this.config.requiringAck,
      clock,
      events: this,
    });

    this.log =
      options.logger === false
        ? null
        : options.logger ??
          rootLogger.child({ node: this.config.name }, { level: this.config.logging.level });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * Subscribe to the transport and start logging. Idempotent.
   */
  start(): void {
    if (this.unsubscribeTransport) return;

    if (this.log) {
      this.forwarder = wireLogger(this, this.log);
      this.log.info(
        { targetAddress: this.targetAddress, types: this.registry.list().length },
        "Modem bridge started"
      );
    }

    this.unsubscribeTransport = this.transport.subscribe((data, source) => {
      this.incoming.receive(data, source);
    });
  }

  /**
   * Unsubscribe from the transport and stop logging. Idempotent.
   */
  stop(): void {
    if (!this.unsubscribeTransport) return;

    this.unsubscribeTransport();
    this.unsubscribeTransport = null;

    this.log?.info({}, "Modem bridge stopped");
    this.forwarder?.teardown();
    this.forwarder = null;
  }

  get isRunning(): boolean {
    return this.unsubscribeTransport !== null;
  }

  // ─── Sending ────────────────────────────────────────────────────

  sendPositionRequest(pose: Pose): Envelope {
    return this.outgoing.send("position_request", pose);
  }

  sendBodyRequest(pose: Pose): Envelope {
    return this.outgoing.send("body_request", pose);
  }

  sendNav(nav: NavFix): Envelope {
    return this.outgoing.send("nav", nav);
  }

  sendStringImage(payload: Uint8Array): Envelope {
    return this.outgoing.send("string_image", payload);
  }

  sendGeneral(name: string, payload: Uint8Array): Envelope {
    return this.outgoing.sendGeneral(name, payload);
  }

  /**
   * Forward a body read from a local topic configured in
   * `generalMessagesOutgoing`.
   */
  sendFromTopic(topic: string, payload: Uint8Array): Envelope {
    return this.outgoing.sendFromTopic(topic, payload);
  }

  // ─── Receiving ──────────────────────────────────────────────────

  onMessage<K extends TypedMessageKind>(type: K, handler: MessageHandler<K>): () => void {
    return this.incoming.onMessage(type, handler);
  }

  onTopic(topic: string, handler: MessageHandler<"general">): () => void {
    return this.incoming.onTopic(topic, handler);
  }

  /**
   * Process an envelope obtained outside the transport subscription.
   */
  receive(raw: Uint8Array, source: ModemAddress | null = null): ReceiveResult {
    return this.incoming.receive(raw, source);
  }

  // ─── Queries ────────────────────────────────────────────────────

  getStats(): BridgeStats {
    return {
      running: this.isRunning,
      messagesSent: this.outgoing.messagesSent,
      messagesReceived: this.incoming.messagesReceived,
      nextMessageId: this.outgoing.nextMessageId,
    };
  }
}
