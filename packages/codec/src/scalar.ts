import { UnsupportedTypeError } from "@treecodec/core";
import type { Scalar } from "./types.js";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

// UTF-8 cannot carry an unpaired surrogate; the encoder would replace it
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** A scalar together with the encoding it gets on the wire. */
export type ClassifiedScalar =
  | { readonly kind: "null" }
  | { readonly kind: "undefined" }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "int32"; readonly value: number }
  | { readonly kind: "float64"; readonly value: number }
  | { readonly kind: "int64"; readonly value: bigint }
  | { readonly kind: "uint64"; readonly value: bigint }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "bytes"; readonly value: Uint8Array }
  | { readonly kind: "date"; readonly value: Date }
  | { readonly kind: "array"; readonly items: readonly ClassifiedScalar[] };

function isInt32(value: number): boolean {
  return (value | 0) === value && !Object.is(value, -0);
}

/** Name used in error messages for a value of unknown shape. */
export function describeValueType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
}

/**
 * Decide how a scalar is encoded.
 *
 * @throws UnsupportedTypeError for values with no encoding
 */
export function classifyScalar(value: unknown, path?: string): ClassifiedScalar {
  if (value === null) return { kind: "null" };
  if (value === undefined) return { kind: "undefined" };

  switch (typeof value) {
    case "boolean":
      return { kind: "boolean", value };
    case "number":
      return isInt32(value) ? { kind: "int32", value } : { kind: "float64", value };
    case "bigint":
      if (value >= INT64_MIN && value <= INT64_MAX) return { kind: "int64", value };
      if (value > INT64_MAX && value <= UINT64_MAX) return { kind: "uint64", value };
      throw new UnsupportedTypeError("bigint outside the 64-bit range", path);
    case "string":
      if (LONE_SURROGATE.test(value)) {
        throw new UnsupportedTypeError("string with a lone surrogate", path);
      }
      return { kind: "string", value };
  }

  if (value instanceof Date) return { kind: "date", value };
  if (value instanceof Uint8Array) return { kind: "bytes", value };
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return { kind: "array", items: items.map((item) => classifyScalar(item, path)) };
  }

  throw new UnsupportedTypeError(describeValueType(value), path);
}

/** Rebuild a scalar from its classification, copying mutable values. */
export function materializeScalar(scalar: ClassifiedScalar): Scalar {
  switch (scalar.kind) {
    case "null":
      return null;
    case "undefined":
      return undefined;
    case "date":
      return new Date(scalar.value.getTime());
    case "bytes":
      return scalar.value.slice();
    case "array":
      return scalar.items.map(materializeScalar);
    default:
      return scalar.value;
  }
}

/**
 * Validate and copy a scalar so the copy shares no mutable state with the
 * original.
 */
export function copyScalar(value: Scalar, path?: string): Scalar {
  return materializeScalar(classifyScalar(value, path));
}

function toHex(bytes: Uint8Array): string {
  let out = "0x";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

/** Textual form of a scalar as printed by the renderer. */
export function scalarText(value: Scalar): string {
  if (value === null || value === undefined) return "[null]";
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (value instanceof Uint8Array) return toHex(value);
  if (isScalarList(value)) return `[${value.map(scalarText).join(", ")}]`;
  return String(value);
}

export function isScalarList(value: Scalar): value is readonly Scalar[] {
  return Array.isArray(value);
}
