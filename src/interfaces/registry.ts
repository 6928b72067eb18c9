/**
 * @module interfaces/registry
 * @description ITypeRegistry: the bidirectional name ↔ id table.
 */

import type { TypeId } from "../types/branded.js";
import type {
  GeneralTypeDescriptor,
  GeneralTypeEntry,
  MessageTypeDescriptor,
} from "../types/registry.js";

/**
 * @interface ITypeRegistry
 * @description Read/write contract of the type registry. Writes only
 * happen during start-up; after `freeze()` the table is read-only.
 */
export interface ITypeRegistry {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @throws {EnvelopeError} code=DUPLICATE_IDENTIFIER if the id or name is taken.
   */
  register(descriptor: MessageTypeDescriptor): void;

  /**
   * @command
   * @description Registers a configured general type, merging the
   * outgoing and incoming halves of the same entry.
   * @throws {EnvelopeError} code=DUPLICATE_IDENTIFIER on any other collision.
   */
  registerGeneral(entry: GeneralTypeEntry): GeneralTypeDescriptor;

  /**
   * @command
   * @description Makes the registry immutable.
   */
  freeze(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /** @throws {EnvelopeError} code=UNKNOWN_TYPE */
  resolveById(id: TypeId): MessageTypeDescriptor;

  /** @throws {EnvelopeError} code=UNKNOWN_TYPE */
  resolveByName(name: string): MessageTypeDescriptor;

  /** @throws {EnvelopeError} code=UNKNOWN_TYPE */
  resolveBySubscribeTopic(topic: string): GeneralTypeDescriptor;

  has(name: string): boolean;

  list(): readonly MessageTypeDescriptor[];
}
