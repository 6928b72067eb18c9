/**
 * @module types
 * @description Public type exports for the envelope protocol.
 */

export * from "./branded.js";
export * from "./messages.js";
export * from "./registry.js";
export * from "./transport.js";
export * from "./events.js";
