/**
 * @module types/transport
 * @description Transport-facing types for the acoustic modem link.
 *
 * The codec only needs byte-buffer semantics from the transport: opaque
 * envelopes go out to an address and come back in with a source address.
 * Ordering is preserved; delivery may be concurrent.
 */

import type { ModemAddress } from "./branded.js";

/**
 * Callback for receiving one complete envelope from the transport.
 */
export type TransportReceiveCallback = (data: Uint8Array, source: ModemAddress) => void;

/**
 * Address that every node on the in-memory bus receives.
 */
export const BROADCAST_ADDRESS = 255 as ModemAddress;
