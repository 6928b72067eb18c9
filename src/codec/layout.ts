/**
 * @module codec/layout
 * @description Explicit-width field packing shared by the header and
 * the fixed bodies.
 *
 * Fields are packed back to back with no alignment padding, and every
 * multi-byte field is big-endian (network order), so the wire format is
 * identical on every host.
 */

import { EnvelopeError } from "../interfaces/codec.js";

// ─── Field Widths ───────────────────────────────────────────────────

/** Wire field kinds. Widths: uint8 1, uint16 2, float32 4, float64 8. */
export type FieldKind = "uint8" | "uint16" | "float32" | "float64";

/** Ordered list of packed fields. */
export type Layout = readonly FieldKind[];

export const FIELD_WIDTHS: Readonly<Record<FieldKind, number>> = {
  uint8: 1,
  uint16: 2,
  float32: 4,
  float64: 8,
};

const UINT_MAX: Readonly<Record<"uint8" | "uint16", number>> = {
  uint8: 0xff,
  uint16: 0xffff,
};

const LITTLE_ENDIAN = false;

/**
 * Total packed size of a layout in bytes.
 */
export function layoutSize(layout: Layout): number {
  let size = 0;
  for (const kind of layout) {
    size += FIELD_WIDTHS[kind];
  }
  return size;
}

// ─── Writer ─────────────────────────────────────────────────────────

/**
 * Sequential big-endian writer over a fixed-size buffer.
 */
class FieldWriter {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(length: number) {
    this.buffer = new Uint8Array(length);
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * @throws {EnvelopeError} code=ENCODE_ERROR for non-numbers, integers out
   * of range, or finite values beyond the float32 range.
   */
  write(kind: FieldKind, value: number): void {
    if (typeof value !== "number") {
      throw new EnvelopeError(`Expected a number for ${kind} field, got ${typeof value}`, "ENCODE_ERROR");
    }

    switch (kind) {
      case "uint8":
      case "uint16":
        if (!Number.isInteger(value) || value < 0 || value > UINT_MAX[kind]) {
          throw new EnvelopeError(
            `Value ${value} does not fit in ${kind}`,
            "ENCODE_ERROR"
          );
        }
        if (kind === "uint8") {
          this.view.setUint8(this.offset, value);
        } else {
          this.view.setUint16(this.offset, value, LITTLE_ENDIAN);
        }
        break;
      case "float32":
        if (Number.isFinite(value) && !Number.isFinite(Math.fround(value))) {
          throw new EnvelopeError(`Value ${value} does not fit in float32`, "ENCODE_ERROR");
        }
        this.view.setFloat32(this.offset, value, LITTLE_ENDIAN);
        break;
      case "float64":
        this.view.setFloat64(this.offset, value, LITTLE_ENDIAN);
        break;
    }
    this.offset += FIELD_WIDTHS[kind];
  }

  finish(): Uint8Array {
    return this.buffer;
  }
}

// ─── Reader ─────────────────────────────────────────────────────────

/**
 * Sequential big-endian reader. Bounds are the caller's concern: check
 * the byte count against `layoutSize` before reading.
 */
class FieldReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  read(kind: FieldKind): number {
    const value = this.readAt(kind, this.offset);
    this.offset += FIELD_WIDTHS[kind];
    return value;
  }

  private readAt(kind: FieldKind, offset: number): number {
    switch (kind) {
      case "uint8":
        return this.view.getUint8(offset);
      case "uint16":
        return this.view.getUint16(offset, LITTLE_ENDIAN);
      case "float32":
        return this.view.getFloat32(offset, LITTLE_ENDIAN);
      case "float64":
        return this.view.getFloat64(offset, LITTLE_ENDIAN);
    }
  }
}

// ─── Whole-Layout Helpers ───────────────────────────────────────────

/**
 * Pack values according to a layout.
 *
 * @throws {EnvelopeError} code=ENCODE_ERROR if the value count differs
 * from the layout or a value does not fit its field.
 */
export function packLayout(layout: Layout, values: readonly number[]): Uint8Array {
  if (values.length !== layout.length) {
    throw new EnvelopeError(
      `Layout has ${layout.length} fields, got ${values.length} values`,
      "ENCODE_ERROR"
    );
  }

  const writer = new FieldWriter(layoutSize(layout));
  layout.forEach((kind, index) => {
    writer.write(kind, values[index] ?? Number.NaN);
  });
  return writer.finish();
}

/** Returns the next field of a layout being unpacked. */
export type NextField = () => number;

/**
 * Unpack a buffer that must hold exactly one instance of the layout.
 * `build` pulls the fields in layout order and must consume all of them.
 *
 * @throws {EnvelopeError} code=BODY_LENGTH_MISMATCH on any other byte count.
 */
export function unpackLayout<T>(
  layout: Layout,
  bytes: Uint8Array,
  build: (next: NextField) => T,
  typeName?: string
): T {
  expectLength(bytes, layoutSize(layout), typeName);
  const reader = new FieldReader(bytes);
  let index = 0;

  const next: NextField = () => {
    const kind = layout[index];
    if (kind === undefined) {
      throw new Error(`Layout has only ${layout.length} fields`);
    }
    index += 1;
    return reader.read(kind);
  };

  const value = build(next);
  if (index !== layout.length) {
    throw new Error(`Layout has ${layout.length} fields, ${index} were read`);
  }
  return value;
}

/**
 * @throws {EnvelopeError} code=BODY_LENGTH_MISMATCH unless `bytes` is exactly `expected` long.
 */
export function expectLength(
  bytes: Uint8Array,
  expected: number,
  typeName?: string
): void {
  if (bytes.length !== expected) {
    const subject = typeName ? `${typeName} body` : "Body";
    throw new EnvelopeError(
      `${subject} must be ${expected} bytes, got ${bytes.length}`,
      "BODY_LENGTH_MISMATCH",
      { typeName, length: bytes.length, expectedLength: expected }
    );
  }
}
