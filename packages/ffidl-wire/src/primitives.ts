// Canonical wire forms of primitive kinds.
//
// bool      true / false
// i32, u32  JSON number
// i64, u64  decimal string (integral JSON numbers are accepted on decode)
// f32, f64  finite JSON number; f32 also within ±3.4028234663852886e38
// string    JSON string
// bytes     base64, standard alphabet, padded
// uuid      lowercase 8-4-4-4-12 hex
// timestamp ISO-8601 with millisecond precision, years 0000-9999; encoded
//           with `Z`, any offset accepted on decode
//
// Map keys are the key's canonical text: decimal integers without leading
// zeros or `-0`, lower-case uuids.

import type { PrimitiveKind } from "@ffidl/schema";

import { WireError, WireErrorKind } from "./errors.ts";

/** JSON-compatible tree produced by the encoder. */
export type WireValue = null | boolean | number | string | WireValue[] | { [key: string]: WireValue };

const INT_RANGES = {
  i32: [-(2 ** 31), 2 ** 31 - 1],
  u32: [0, 2 ** 32 - 1],
} as const;

const BIGINT_RANGES = {
  i64: [-(2n ** 63n), 2n ** 63n - 1n],
  u64: [0n, 2n ** 64n - 1n],
} as const;

const UUID = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.(\d+))?(?:Z|[+-]\d{2}:\d{2})$/;
const DECIMAL = /^-?\d+$/;
const CANONICAL_DECIMAL = /^(?:0|-?[1-9]\d*)$/;
const CANONICAL_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/** Largest finite f32. */
const F32_MAX = 3.4028234663852886e38;

function invalid(expected: string, value: unknown, path: string): WireError {
  const got = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  return new WireError(WireErrorKind.INVALID_VALUE, `Expected ${expected}, got ${got}`, path);
}

function checkInt(kind: "i32" | "u32", value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw invalid(`${kind} integer`, value, path);
  }
  const [min, max] = INT_RANGES[kind];
  if (value < min || value > max) {
    throw new WireError(WireErrorKind.OUT_OF_RANGE, `${value} is out of range for ${kind}`, path);
  }
  return value;
}

function checkBigInt(kind: "i64" | "u64", value: bigint, path: string): bigint {
  const [min, max] = BIGINT_RANGES[kind];
  if (value < min || value > max) {
    throw new WireError(WireErrorKind.OUT_OF_RANGE, `${value} is out of range for ${kind}`, path);
  }
  return value;
}

function checkUuid(value: unknown, path: string): string {
  if (typeof value !== "string" || !UUID.test(value)) {
    throw invalid("uuid", value, path);
  }
  return value.toLowerCase();
}

function checkFloat(kind: "f32" | "f64", value: number, path: string): number {
  if (!Number.isFinite(value)) {
    throw new WireError(WireErrorKind.OUT_OF_RANGE, `${value} is not a finite ${kind}`, path);
  }
  if (kind === "f32" && Math.abs(value) > F32_MAX) {
    throw new WireError(WireErrorKind.OUT_OF_RANGE, `${value} is out of range for f32`, path);
  }
  return value;
}

function encodeTimestamp(value: unknown, path: string): string {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) throw invalid("valid Date", value, path);
  const year = value.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new WireError(WireErrorKind.INVALID_VALUE, `Timestamp year ${year} is outside 0000-9999`, path);
  }
  return value.toISOString();
}

function decodeTimestamp(wire: unknown, path: string): Date {
  const match = typeof wire === "string" ? ISO_TIMESTAMP.exec(wire) : null;
  if (match === null) throw invalid("ISO-8601 timestamp", wire, path);
  const fraction = match[1] ?? "";
  if (/[1-9]/.test(fraction.slice(3))) {
    throw new WireError(WireErrorKind.INVALID_VALUE, "Timestamp has sub-millisecond precision", path);
  }
  const date = new Date(match[0]);
  if (Number.isNaN(date.getTime())) throw invalid("ISO-8601 timestamp", wire, path);
  return date;
}

function checkKeyText(kind: PrimitiveKind, text: string, pattern: RegExp, path: string): void {
  if (!pattern.test(text)) {
    throw new WireError(WireErrorKind.INVALID_VALUE, `Map key ${JSON.stringify(text)} is not a canonical ${kind}`, path);
  }
}

function parseBigInt(kind: "i64" | "u64", wire: unknown, path: string): bigint {
  if (typeof wire === "string" && DECIMAL.test(wire)) {
    return checkBigInt(kind, BigInt(wire), path);
  }
  if (typeof wire === "number" && Number.isSafeInteger(wire)) {
    return checkBigInt(kind, BigInt(wire), path);
  }
  throw invalid(`${kind} decimal string`, wire, path);
}

// ============================================================================
// Values
// ============================================================================

/**
 * Encode an in-memory primitive to its wire form.
 *
 * @throws WireError if the value does not fit the kind
 */
export function encodePrimitive(kind: PrimitiveKind, value: unknown, path: string): WireValue {
  switch (kind) {
    case "bool":
      if (typeof value !== "boolean") throw invalid("bool", value, path);
      return value;
    case "i32":
    case "u32":
      return checkInt(kind, value, path);
    case "i64":
    case "u64":
      if (typeof value !== "bigint") throw invalid(`${kind} bigint`, value, path);
      return checkBigInt(kind, value, path).toString();
    case "f32":
    case "f64":
      if (typeof value !== "number") throw invalid(kind, value, path);
      return checkFloat(kind, value, path);
    case "string":
      if (typeof value !== "string") throw invalid("string", value, path);
      return value;
    case "bytes":
      if (!(value instanceof Uint8Array)) throw invalid("Uint8Array", value, path);
      return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64");
    case "uuid":
      return checkUuid(value, path);
    case "timestamp":
      return encodeTimestamp(value, path);
  }
}

/**
 * Decode a primitive from its wire form.
 *
 * @throws WireError if the wire value is malformed
 */
export function decodePrimitive(kind: PrimitiveKind, wire: unknown, path: string): unknown {
  switch (kind) {
    case "bool":
      if (typeof wire !== "boolean") throw invalid("bool", wire, path);
      return wire;
    case "i32":
    case "u32":
      return checkInt(kind, wire, path);
    case "i64":
    case "u64":
      return parseBigInt(kind, wire, path);
    case "f32":
    case "f64":
      if (typeof wire !== "number") throw invalid(kind, wire, path);
      return checkFloat(kind, wire, path);
    case "string":
      if (typeof wire !== "string") throw invalid("string", wire, path);
      return wire;
    case "bytes":
      if (typeof wire !== "string" || !BASE64.test(wire)) throw invalid("base64 string", wire, path);
      return new Uint8Array(Buffer.from(wire, "base64"));
    case "uuid":
      return checkUuid(wire, path);
    case "timestamp":
      return decodeTimestamp(wire, path);
  }
}

// ============================================================================
// Map Keys
// ============================================================================

/** Encode a map key to the object key text. */
export function encodeMapKey(kind: PrimitiveKind, key: unknown, path: string): string {
  switch (kind) {
    case "string":
      if (typeof key !== "string") throw invalid("string key", key, path);
      return key;
    case "i32":
    case "u32":
      return String(checkInt(kind, key, path));
    case "i64":
    case "u64":
      if (typeof key !== "bigint") throw invalid(`${kind} bigint key`, key, path);
      return checkBigInt(kind, key, path).toString();
    case "uuid":
      return checkUuid(key, path);
    default:
      throw new WireError(WireErrorKind.UNSUPPORTED, `${kind} cannot be a map key`, path);
  }
}

/**
 * Decode a map key from the object key text.
 *
 * Only canonical text is accepted, so two distinct keys on the wire never
 * decode to the same in-memory key.
 */
export function decodeMapKey(kind: PrimitiveKind, text: string, path: string): unknown {
  switch (kind) {
    case "string":
      return text;
    case "i32":
    case "u32":
      checkKeyText(kind, text, CANONICAL_DECIMAL, path);
      return checkInt(kind, Number(text), path);
    case "i64":
    case "u64":
      checkKeyText(kind, text, CANONICAL_DECIMAL, path);
      return checkBigInt(kind, BigInt(text), path);
    case "uuid":
      checkKeyText(kind, text, CANONICAL_UUID, path);
      return text;
    default:
      throw new WireError(WireErrorKind.UNSUPPORTED, `${kind} cannot be a map key`, path);
  }
}
