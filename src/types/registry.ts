/**
 * @module types/registry
 * @description Message type descriptors.
 */

import type { TypeId } from "./branded.js";
import type { DecodedTypeName } from "./messages.js";
import type { Layout } from "../codec/layout.js";

// ─── Descriptors ────────────────────────────────────────────────────

/**
 * A type with a decoded body known to both ends. `layout` is the packed
 * field order its codec follows, or null for raw bodies (string_image).
 */
export interface FixedTypeDescriptor {
  readonly kind: "fixed";
  readonly name: DecodedTypeName;
  readonly id: TypeId;
  readonly layout: Layout | null;
}

/**
 * Where a general type's body comes from and goes to.
 */
export interface GeneralBinding {
  /** Local topic incoming bodies are forwarded to. Null if never received. */
  readonly publishTopic: string | null;
  /** Local topic outgoing bodies are read from. Null if never sent. */
  readonly subscribeTopic: string | null;
  /** Application message type the opaque body represents. */
  readonly messageType: string;
}

/**
 * A pass-through type: either a built-in (ros_message, ros_service) or
 * one registered from configuration.
 */
export interface GeneralTypeDescriptor {
  readonly kind: "general";
  readonly name: string;
  readonly id: TypeId;
  readonly binding: GeneralBinding;
}

export type MessageTypeDescriptor = FixedTypeDescriptor | GeneralTypeDescriptor;

/**
 * A general type entry as supplied by configuration, before merging.
 */
export interface GeneralTypeEntry {
  readonly name: string;
  readonly id: number;
  readonly messageType: string;
  readonly publishTopic?: string;
  readonly subscribeTopic?: string;
}
