/**
 * @module interfaces/transport
 * @description IModemTransport: abstraction of the acoustic modem link.
 *
 * The link moves opaque byte buffers between addressed nodes. Acoustic
 * bursts are slow (seconds per kilobyte), so publishing is asynchronous
 * and callers never wait on it from inside the codec.
 */

import type { ModemAddress } from "../types/branded.js";
import type { TransportReceiveCallback } from "../types/transport.js";

/**
 * Errors that may be thrown by IModemTransport operations.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "MEDIUM_UNAVAILABLE"
      | "MTU_EXCEEDED"
      | "UNREACHABLE"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * @interface IModemTransport
 * @description The publish/subscribe surface the pipelines depend on.
 */
export interface IModemTransport {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Transmits one envelope to a remote modem address.
   *
   * @param data - Complete envelope bytes (header ++ body).
   * @param address - Destination modem address.
   * @throws {TransportError} code=MEDIUM_UNAVAILABLE if the link is closed.
   * @throws {TransportError} code=MTU_EXCEEDED if the burst is too long for the modem.
   */
  publish(data: Uint8Array, address: ModemAddress): Promise<void>;

  /**
   * @command
   * @description Registers a handler for incoming envelopes.
   *
   * @returns Unsubscribe function.
   */
  subscribe(handler: TransportReceiveCallback): () => void;
}
