/**
 * @module types/messages
 * @description Application-level messages carried inside envelopes.
 *
 * Fixed types have a binary body layout known to both ends. General
 * types are configured at start-up and their bodies travel opaquely.
 *
 * | Type             | Id  | Body                          |
 * |------------------|-----|-------------------------------|
 * | position_request | 1   | 6 × float32 (24 bytes)        |
 * | body_request     | 2   | 6 × float32 (24 bytes)        |
 * | nav              | 5   | 2 × float64 + 6 × float32 (40)|
 * | string_image     | 10  | raw bytes                     |
 * | ack              | 32  | uint16 (2 bytes)              |
 * | ros_message      | 100 | opaque                        |
 * | ros_service      | 101 | opaque                        |
 */

import type { MessageId, Seconds, TypeId } from "./branded.js";

// ─── Type Names ─────────────────────────────────────────────────────

/** Types whose body this layer decodes. */
export type DecodedTypeName =
  | "position_request"
  | "body_request"
  | "nav"
  | "string_image"
  | "ack";

/** Built-in pass-through types. */
export type PassThroughTypeName = "ros_message" | "ros_service";

export type FixedTypeName = DecodedTypeName | PassThroughTypeName;

/** Fixed types an application may send directly. Acks are generated by the receiver. */
export type ApplicationTypeName = Exclude<DecodedTypeName, "ack">;

// ─── Bodies ─────────────────────────────────────────────────────────

/**
 * A pose target on six axes, as requested from the pilot.
 * All values travel as float32.
 */
export interface Pose {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly roll: number;
  readonly pitch: number;
  readonly yaw: number;
}

/**
 * Navigation status: global fix (float64) plus local position and
 * orientation (float32).
 */
export interface NavFix {
  readonly latitude: number;
  readonly longitude: number;
  readonly north: number;
  readonly east: number;
  readonly depth: number;
  readonly roll: number;
  readonly pitch: number;
  readonly yaw: number;
}

/** Field set accepted by the body encoder for each decoded type. */
export interface BodyFields {
  position_request: Pose;
  body_request: Pose;
  nav: NavFix;
  string_image: Uint8Array;
  ack: MessageId;
}

// ─── Decoded Messages ───────────────────────────────────────────────

interface MessageBase {
  readonly typeId: TypeId;
  readonly messageId: MessageId;
  readonly sentAt: Seconds;
}

export interface PositionRequestMessage extends MessageBase {
  readonly type: "position_request";
  readonly pose: Pose;
}

export interface BodyRequestMessage extends MessageBase {
  readonly type: "body_request";
  readonly pose: Pose;
}

export interface NavMessage extends MessageBase {
  readonly type: "nav";
  readonly nav: NavFix;
}

export interface StringImageMessage extends MessageBase {
  readonly type: "string_image";
  readonly payload: Uint8Array;
}

export interface AckMessage extends MessageBase {
  readonly type: "ack";
  /** Id of the message being acknowledged (from the body, not the header). */
  readonly ackedId: MessageId;
}

/**
 * A general (pass-through) message. `topic` is where the opaque body is
 * forwarded on this side.
 */
export interface GeneralMessage extends MessageBase {
  readonly type: "general";
  readonly name: string;
  readonly topic: string;
  readonly payload: Uint8Array;
}

/** Every message the incoming pipeline can dispatch. */
export type DecodedMessage =
  | PositionRequestMessage
  | BodyRequestMessage
  | NavMessage
  | StringImageMessage
  | AckMessage
  | GeneralMessage;

export type DecodedMessageKind = DecodedMessage["type"];

/** Narrow DecodedMessage by its `type` tag. */
export type MessageOf<K extends DecodedMessageKind> = Extract<DecodedMessage, { type: K }>;
