/**
 * @module codec/body
 * @description Encoder/decoder pairs for the fixed message bodies.
 *
 * Body layouts (big-endian, packed):
 * - position_request / body_request: x, y, z, roll, pitch, yaw (6 × float32, 24 bytes)
 * - nav: latitude, longitude (2 × float64) + north, east, depth,
 *   roll, pitch, yaw (6 × float32), 40 bytes
 * - ack: acknowledged message id (uint16, 2 bytes)
 * - string_image: raw bytes, shorter than the maximum envelope length
 *
 * Caller fields are validated with zod before packing, so a missing or
 * mistyped field is reported by name instead of being packed as NaN.
 */

import { z } from "zod";
import { EnvelopeError } from "../interfaces/codec.js";
import type { IBodyCodec } from "../interfaces/codec.js";
import { packLayout, unpackLayout } from "./layout.js";
import type { Layout } from "./layout.js";
import type { MessageId } from "../types/branded.js";
import type { BodyFields, DecodedTypeName, NavFix, Pose } from "../types/messages.js";

// ─── Constants ──────────────────────────────────────────────────────

/** Largest envelope the modem accepts in one burst. */
export const MAX_ENVELOPE_LENGTH = 9000;

export const POSE_LAYOUT = [
  "float32", "float32", "float32", "float32", "float32", "float32",
] as const satisfies Layout;

export const NAV_LAYOUT = [
  "float64", "float64",
  "float32", "float32", "float32", "float32", "float32", "float32",
] as const satisfies Layout;

export const ACK_LAYOUT = ["uint16"] as const satisfies Layout;

/** Fixed types whose body follows a packed layout. */
export type LayoutTypeName = Exclude<DecodedTypeName, "string_image">;

export type FixedLayouts = { readonly [K in LayoutTypeName]: Layout };

export const DEFAULT_LAYOUTS: FixedLayouts = {
  position_request: POSE_LAYOUT,
  body_request: POSE_LAYOUT,
  nav: NAV_LAYOUT,
  ack: ACK_LAYOUT,
};

// ─── Schemas ────────────────────────────────────────────────────────

/** A number that survives a float32 round trip without becoming infinite. */
const Float32Schema = z
  .number()
  .refine((value) => !Number.isFinite(value) || Number.isFinite(Math.fround(value)), {
    message: "Number does not fit in float32",
  });

export const PoseSchema = z.object({
  x: Float32Schema,
  y: Float32Schema,
  z: Float32Schema,
  roll: Float32Schema,
  pitch: Float32Schema,
  yaw: Float32Schema,
});

export const NavFixSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  north: Float32Schema,
  east: Float32Schema,
  depth: Float32Schema,
  roll: Float32Schema,
  pitch: Float32Schema,
  yaw: Float32Schema,
});

const AckSchema = z.number().int().min(0).max(0xffff);

const BlobSchema = z.instanceof(Uint8Array);

function validate<T>(schema: z.ZodType<T>, fields: unknown, typeName: string): T {
  const result = schema.safeParse(fields);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new EnvelopeError(`Invalid ${typeName} fields: ${detail}`, "ENCODE_ERROR", { typeName });
  }
  return result.data;
}

/** Codecs are built once; a layout with the wrong field count is a start-up error. */
function expectFields(layout: Layout, count: number, typeName: string): void {
  if (layout.length !== count) {
    throw new RangeError(`${typeName} layout needs ${count} fields, got ${layout.length}`);
  }
}

// ─── Pose Codec ─────────────────────────────────────────────────────

/**
 * Codec for the 24-byte pose body shared by position and body requests.
 */
export function createPoseCodec(
  typeName: "position_request" | "body_request",
  layout: Layout = POSE_LAYOUT
): IBodyCodec<Pose> {
  expectFields(layout, 6, typeName);
  return {
    encode(fields: unknown): Uint8Array {
      const pose = validate(PoseSchema, fields, typeName);
      return packLayout(layout, [pose.x, pose.y, pose.z, pose.roll, pose.pitch, pose.yaw]);
    },

    decode(body: Uint8Array): Pose {
      return unpackLayout(
        layout,
        body,
        (next) => ({ x: next(), y: next(), z: next(), roll: next(), pitch: next(), yaw: next() }),
        typeName
      );
    },
  };
}

// ─── Nav Codec ──────────────────────────────────────────────────────

export function createNavCodec(layout: Layout = NAV_LAYOUT): IBodyCodec<NavFix> {
  expectFields(layout, 8, "nav");
  return {
    encode(fields: unknown): Uint8Array {
      const nav = validate(NavFixSchema, fields, "nav");
      return packLayout(layout, [
        nav.latitude,
        nav.longitude,
        nav.north,
        nav.east,
        nav.depth,
        nav.roll,
        nav.pitch,
        nav.yaw,
      ]);
    },

    decode(body: Uint8Array): NavFix {
      return unpackLayout(
        layout,
        body,
        (next) => ({
          latitude: next(),
          longitude: next(),
          north: next(),
          east: next(),
          depth: next(),
          roll: next(),
          pitch: next(),
          yaw: next(),
        }),
        "nav"
      );
    },
  };
}

// ─── Ack Codec ──────────────────────────────────────────────────────

export function createAckCodec(layout: Layout = ACK_LAYOUT): IBodyCodec<MessageId> {
  expectFields(layout, 1, "ack");
  return {
    encode(fields: unknown): Uint8Array {
      return packLayout(layout, [validate(AckSchema, fields, "ack")]);
    },

    decode(body: Uint8Array): MessageId {
      return unpackLayout(layout, body, (next) => next() as MessageId, "ack");
    },
  };
}

// ─── String/Image Codec ─────────────────────────────────────────────

/**
 * Raw blob codec. Encoding refuses bodies of `maxEnvelopeLength` bytes or
 * more; this is an admission check, the wire format itself has no limit.
 */
export function createBlobCodec(maxEnvelopeLength = MAX_ENVELOPE_LENGTH): IBodyCodec<Uint8Array> {
  return {
    encode(fields: unknown): Uint8Array {
      const payload = validate(BlobSchema, fields, "string_image");
      if (payload.length >= maxEnvelopeLength) {
        throw new EnvelopeError(
          `string_image body of ${payload.length} bytes must be shorter than ${maxEnvelopeLength}`,
          "ENVELOPE_TOO_LARGE",
          { typeName: "string_image", length: payload.length, expectedLength: maxEnvelopeLength }
        );
      }
      return new Uint8Array(payload);
    },

    decode(body: Uint8Array): Uint8Array {
      return new Uint8Array(body);
    },
  };
}

// ─── Codec Table ────────────────────────────────────────────────────

/** One codec per decoded type, keyed by type name. */
export type BodyCodecTable = {
  readonly [K in DecodedTypeName]: IBodyCodec<BodyFields[K]>;
};

/**
 * Build the codec table for every decoded type. The pipelines pass the
 * layouts their registry holds.
 */
export function createBodyCodecs(
  maxEnvelopeLength = MAX_ENVELOPE_LENGTH,
  layouts: FixedLayouts = DEFAULT_LAYOUTS
): BodyCodecTable {
  return {
    position_request: createPoseCodec("position_request", layouts.position_request),
    body_request: createPoseCodec("body_request", layouts.body_request),
    nav: createNavCodec(layouts.nav),
    string_image: createBlobCodec(maxEnvelopeLength),
    ack: createAckCodec(layouts.ack),
  };
}
