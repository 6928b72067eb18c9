/**
 * @module modem-envelope
 * @description Envelope codec and dispatch engine for a low-bandwidth
 * acoustic modem link.
 *
 * Exports the type definitions, the codec and transport contracts, the
 * binary envelope codec, the type registry and pipelines, the in-memory
 * transport, configuration, logging and the ModemBridge orchestrator.
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Envelope Codec ─────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Configuration ──────────────────────────────────────────────────
export * from "./config/index.js";

// ─── Logging ────────────────────────────────────────────────────────
export { logger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { LogLevel } from "./logger.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { ModemBridge, buildRegistry } from "./bridge.js";
export type { ModemBridgeOptions, BridgeStats } from "./bridge.js";

// ─── Forwarder (wires bridge events → logger) ───────────────────────
export { wireLogger } from "./forwarder.js";
export type { EventSource, LoggerLike, ForwarderHandle } from "./forwarder.js";
