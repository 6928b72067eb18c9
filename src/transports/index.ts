/**
 * @module transports
 * @description Transport implementations for the modem link.
 */

export { InMemoryModemBus, MemoryModemTransport } from "./memory.js";
export type { MemoryTransportOptions } from "./memory.js";
