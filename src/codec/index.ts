/**
 * @module codec
 * @description Envelope codec: binary framing for the acoustic modem link.
 *
 * Translates application messages into packed, big-endian envelopes:
 * an 11-byte header followed by a type-specific body.
 */

export * from "./layout.js";
export * from "./header.js";
export * from "./body.js";
