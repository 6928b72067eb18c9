/**
 * @module interfaces
 * @description Public interface exports for the envelope protocol.
 */

export * from "./event-emitter.js";
export * from "./codec.js";
export * from "./registry.js";
export * from "./transport.js";
