/**
 * @module primitives/sequence-counter
 * @description Message counters owned by the pipeline pair.
 *
 * The outgoing counter assigns message ids; the incoming counter only
 * feeds telemetry. Each read-modify-write happens inside one synchronous
 * call, so concurrent sends or receives on the event loop can never
 * observe the same value twice.
 */

import { MAX_MESSAGE_ID } from "../types/branded.js";
import type { MessageId } from "../types/branded.js";

export class SequenceCounter {
  private count = 0;

  /**
   * Total number of increments since construction (not wrapped).
   */
  get total(): number {
    return this.count;
  }

  /**
   * Advance by one and return the new count.
   */
  increment(): number {
    return ++this.count;
  }

  /**
   * Take the next message id: the current count modulo 2^16, then advance.
   * The first id is 0; after 65535 ids wrap to 0.
   */
  nextMessageId(): MessageId {
    const id = this.count % (MAX_MESSAGE_ID + 1);
    this.count += 1;
    return id as MessageId;
  }

  /**
   * Id the next call to `nextMessageId` will return.
   */
  peekMessageId(): MessageId {
    return (this.count % (MAX_MESSAGE_ID + 1)) as MessageId;
  }
}
