/**
 * @module transports/memory
 * @description In-process modem link for tests and local wiring.
 *
 * Each transport attaches to a bus at one modem address. Publishing to an
 * address delivers to that node only; publishing to BROADCAST_ADDRESS
 * delivers to every other attached node. Delivery is asynchronous
 * (microtask) and each receiver gets its own copy of the bytes.
 */

import { TransportError } from "../interfaces/transport.js";
import type { IModemTransport } from "../interfaces/transport.js";
import { BROADCAST_ADDRESS } from "../types/transport.js";
import type { TransportReceiveCallback } from "../types/transport.js";
import type { ModemAddress } from "../types/branded.js";

// ─── Bus ────────────────────────────────────────────────────────────

export class InMemoryModemBus {
  private readonly nodes = new Map<ModemAddress, MemoryModemTransport>();

  /**
   * Attach a new transport at `address`.
   *
   * @throws {Error} if the address is taken or is the broadcast address.
   */
  attach(address: ModemAddress, options: MemoryTransportOptions = {}): MemoryModemTransport {
    if (address === BROADCAST_ADDRESS) {
      throw new Error(`Address ${address} is reserved for broadcast`);
    }
    if (this.nodes.has(address)) {
      throw new Error(`Address ${address} is already attached`);
    }
    const transport = new MemoryModemTransport(this, address, options);
    this.nodes.set(address, transport);
    return transport;
  }

  /** @internal */
  detach(transport: MemoryModemTransport): void {
    if (this.nodes.get(transport.address) === transport) {
      this.nodes.delete(transport.address);
    }
  }

  /** @internal */
  route(source: ModemAddress, destination: ModemAddress, data: Uint8Array): void {
    if (destination === BROADCAST_ADDRESS) {
      for (const node of this.nodes.values()) {
        if (node.address !== source) node.deliver(data, source);
      }
      return;
    }

    const target = this.nodes.get(destination);
    if (!target) {
      throw new TransportError(`No modem at address ${destination}`, "UNREACHABLE");
    }
    target.deliver(data, source);
  }

  /** Addresses currently attached. */
  get addresses(): ModemAddress[] {
    return [...this.nodes.keys()];
  }
}

// ─── Transport ──────────────────────────────────────────────────────

export interface MemoryTransportOptions {
  /** Longest burst this modem transmits. Default: unlimited. */
  readonly mtu?: number;
}

export class MemoryModemTransport implements IModemTransport {
  private readonly handlers = new Set<TransportReceiveCallback>();
  private closed = false;
  private published = 0;

  constructor(
    private readonly bus: InMemoryModemBus,
    readonly address: ModemAddress,
    private readonly options: MemoryTransportOptions = {}
  ) {}

  async publish(data: Uint8Array, address: ModemAddress): Promise<void> {
    if (this.closed) {
      throw new TransportError("Modem link is closed", "MEDIUM_UNAVAILABLE");
    }
    if (this.options.mtu !== undefined && data.length > this.options.mtu) {
      throw new TransportError(
        `Burst of ${data.length} bytes exceeds MTU ${this.options.mtu}`,
        "MTU_EXCEEDED"
      );
    }
    this.bus.route(this.address, address, data);
    this.published += 1;
  }

  subscribe(handler: TransportReceiveCallback): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Detach from the bus. Later publishes fail MEDIUM_UNAVAILABLE. */
  close(): void {
    this.closed = true;
    this.handlers.clear();
    this.bus.detach(this);
  }

  /** Envelopes accepted for delivery. */
  get publishedCount(): number {
    return this.published;
  }

  /** @internal */
  deliver(data: Uint8Array, source: ModemAddress): void {
    const copy = new Uint8Array(data);
    for (const handler of [...this.handlers]) {
      queueMicrotask(() => handler(copy, source));
    }
  }
}
