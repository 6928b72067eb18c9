/**
 * @module primitives/type-registry
 * @description Bidirectional name ↔ id table for envelope message types.
 *
 * Fixed types are registered first, then general types from
 * configuration. Once the bridge starts, the registry is frozen and
 * read without locking from every receive and send.
 */

import { EnvelopeError } from "../interfaces/codec.js";
import type { ITypeRegistry } from "../interfaces/registry.js";
import { ACK_LAYOUT, NAV_LAYOUT, POSE_LAYOUT } from "../codec/body.js";
import type { FixedLayouts, LayoutTypeName } from "../codec/body.js";
import type { Layout } from "../codec/layout.js";
import { toTypeId } from "../types/branded.js";
import type { TypeId } from "../types/branded.js";
import type {
  GeneralTypeDescriptor,
  GeneralTypeEntry,
  MessageTypeDescriptor,
} from "../types/registry.js";

// ─── Fixed Types ────────────────────────────────────────────────────

function builtinGeneral(name: string, id: number): GeneralTypeDescriptor {
  return {
    kind: "general",
    name,
    id: toTypeId(id),
    binding: { publishTopic: name, subscribeTopic: null, messageType: name },
  };
}

/**
 * Types every node understands, in registration order.
 */
export const FIXED_MESSAGE_TYPES: readonly MessageTypeDescriptor[] = [
  { kind: "fixed", name: "position_request", id: toTypeId(1), layout: POSE_LAYOUT },
  { kind: "fixed", name: "body_request", id: toTypeId(2), layout: POSE_LAYOUT },
  { kind: "fixed", name: "nav", id: toTypeId(5), layout: NAV_LAYOUT },
  { kind: "fixed", name: "string_image", id: toTypeId(10), layout: null },
  { kind: "fixed", name: "ack", id: toTypeId(32), layout: ACK_LAYOUT },
  builtinGeneral("ros_message", 100),
  builtinGeneral("ros_service", 101),
];

const FIXED_NAMES = new Set(FIXED_MESSAGE_TYPES.map((d) => d.name));

// ─── Registry ───────────────────────────────────────────────────────

/**
 * TypeRegistry: keeps the name ↔ id mapping a bijection.
 *
 * @example
 * ```ts
 * const registry = TypeRegistry.withFixedTypes();
 * registry.registerGeneral({ name: "battery", id: 120, messageType: "BatteryState", publishTopic: "/battery" });
 * registry.freeze();
 * registry.resolveById(toTypeId(5)).name; // "nav"
 * ```
 */
export class TypeRegistry implements ITypeRegistry {
  private readonly byId = new Map<TypeId, MessageTypeDescriptor>();
  private readonly byName = new Map<string, MessageTypeDescriptor>();
  private frozen = false;

  /**
   * Create a registry pre-populated with FIXED_MESSAGE_TYPES.
   */
  static withFixedTypes(): TypeRegistry {
    const registry = new TypeRegistry();
    for (const descriptor of FIXED_MESSAGE_TYPES) {
      registry.register(descriptor);
    }
    return registry;
  }

  // ─── Commands ───────────────────────────────────────────────────

  register(descriptor: MessageTypeDescriptor): void {
    this.assertWritable();

    if (descriptor.id === 0) {
      throw new RangeError(`Type id 0 is reserved (${descriptor.name})`);
    }

    const byId = this.byId.get(descriptor.id);
    if (byId) {
      throw new EnvelopeError(
        `Type id ${descriptor.id} is already registered as "${byId.name}"`,
        "DUPLICATE_IDENTIFIER",
        { typeId: descriptor.id, typeName: descriptor.name }
      );
    }

    const byName = this.byName.get(descriptor.name);
    if (byName) {
      throw new EnvelopeError(
        `Type name "${descriptor.name}" is already registered with id ${byName.id}`,
        "DUPLICATE_IDENTIFIER",
        { typeId: descriptor.id, typeName: descriptor.name }
      );
    }

    if (descriptor.kind === "general") {
      this.assertSubscribeTopicFree(descriptor);
    }

    this.byId.set(descriptor.id, descriptor);
    this.byName.set(descriptor.name, descriptor);
  }

  registerGeneral(entry: GeneralTypeEntry): GeneralTypeDescriptor {
    this.assertWritable();

    const id = toTypeId(entry.id);
    const incoming: GeneralTypeDescriptor = {
      kind: "general",
      name: entry.name,
      id,
      binding: {
        publishTopic: entry.publishTopic ?? null,
        subscribeTopic: entry.subscribeTopic ?? null,
        messageType: entry.messageType,
      },
    };

    const existing = this.byName.get(entry.name);
    if (!existing) {
      this.register(incoming);
      return incoming;
    }

    const merged = this.mergeGeneral(existing, incoming);
    this.byId.set(merged.id, merged);
    this.byName.set(merged.name, merged);
    return merged;
  }

  freeze(): void {
    this.frozen = true;
  }

  // ─── Queries ────────────────────────────────────────────────────

  resolveById(id: TypeId): MessageTypeDescriptor {
    const descriptor = this.byId.get(id);
    if (!descriptor) {
      throw new EnvelopeError(`Unknown type id ${id}`, "UNKNOWN_TYPE", { typeId: id });
    }
    return descriptor;
  }

  resolveByName(name: string): MessageTypeDescriptor {
    const descriptor = this.byName.get(name);
    if (!descriptor) {
      throw new EnvelopeError(`Unknown type "${name}"`, "UNKNOWN_TYPE", { typeName: name });
    }
    return descriptor;
  }

  resolveBySubscribeTopic(topic: string): GeneralTypeDescriptor {
    for (const descriptor of this.byId.values()) {
      if (descriptor.kind === "general" && descriptor.binding.subscribeTopic === topic) {
        return descriptor;
      }
    }
    throw new EnvelopeError(`No general type reads from topic "${topic}"`, "UNKNOWN_TYPE");
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  list(): readonly MessageTypeDescriptor[] {
    return [...this.byId.values()].sort((a, b) => a.id - b.id);
  }

  // ─── Internal ───────────────────────────────────────────────────

  private assertWritable(): void {
    if (this.frozen) {
      throw new Error("Type registry is frozen");
    }
  }

  private assertSubscribeTopicFree(descriptor: GeneralTypeDescriptor, ignoreName?: string): void {
    const topic = descriptor.binding.subscribeTopic;
    if (topic === null) return;

    for (const other of this.byId.values()) {
      if (
        other.kind === "general" &&
        other.name !== ignoreName &&
        other.binding.subscribeTopic === topic
      ) {
        throw new EnvelopeError(
          `Topic "${topic}" already feeds general type "${other.name}"`,
          "DUPLICATE_IDENTIFIER",
          { typeId: descriptor.id, typeName: descriptor.name }
        );
      }
    }
  }

  /**
   * The outgoing and incoming halves of one configured type share a name
   * and id; combine their topics. Anything else is a collision.
   */
  private mergeGeneral(
    existing: MessageTypeDescriptor,
    incoming: GeneralTypeDescriptor
  ): GeneralTypeDescriptor {
    const duplicate = (detail: string) =>
      new EnvelopeError(
        `Type name "${incoming.name}" is already registered: ${detail}`,
        "DUPLICATE_IDENTIFIER",
        { typeId: incoming.id, typeName: incoming.name }
      );

    if (existing.kind !== "general" || FIXED_NAMES.has(existing.name)) {
      throw duplicate("reserved by a fixed type");
    }
    if (existing.id !== incoming.id) {
      throw duplicate(`registered with id ${existing.id}, not ${incoming.id}`);
    }
    if (existing.binding.messageType !== incoming.binding.messageType) {
      throw duplicate(
        `message type ${existing.binding.messageType} differs from ${incoming.binding.messageType}`
      );
    }

    const publishTopic = pickTopic(existing.binding.publishTopic, incoming.binding.publishTopic);
    const subscribeTopic = pickTopic(existing.binding.subscribeTopic, incoming.binding.subscribeTopic);
    if (publishTopic === undefined || subscribeTopic === undefined) {
      throw duplicate("conflicting topics");
    }

    const merged: GeneralTypeDescriptor = {
      kind: "general",
      name: existing.name,
      id: existing.id,
      binding: { publishTopic, subscribeTopic, messageType: existing.binding.messageType },
    };
    this.assertSubscribeTopicFree(merged, merged.name);
    return merged;
  }
}

// ─── Layouts ────────────────────────────────────────────────────────

/**
 * The packed layouts the registry holds for the fixed-layout types. The
 * pipelines build their codecs from these.
 *
 * @throws {EnvelopeError} code=UNKNOWN_TYPE if one of them is missing or
 * registered without a layout.
 */
export function registeredLayouts(registry: ITypeRegistry): FixedLayouts {
  const layoutOf = (name: LayoutTypeName): Layout => {
    const descriptor = registry.resolveByName(name);
    if (descriptor.kind !== "fixed" || descriptor.layout === null) {
      throw new EnvelopeError(`"${name}" is not registered with a layout`, "UNKNOWN_TYPE", {
        typeName: name,
        typeId: descriptor.id,
      });
    }
    return descriptor.layout;
  };

  return {
    position_request: layoutOf("position_request"),
    body_request: layoutOf("body_request"),
    nav: layoutOf("nav"),
    ack: layoutOf("ack"),
  };
}

/**
 * Combine two optional topics. Returns undefined when both are set and differ.
 */
function pickTopic(a: string | null, b: string | null): string | null | undefined {
  if (a === null) return b;
  if (b === null || a === b) return a;
  return undefined;
}
