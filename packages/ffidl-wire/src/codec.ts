// Schema-driven encoding/decoding for the JSON wire format.
//
// This is the reference implementation every generated codec must agree
// with: it walks a resolved schema at run time instead of emitting code.

import {
  formatTypeRef,
  lookupType,
  type CompositeType,
  type ListRef,
  type MapRef,
  type OptionalRef,
  type ResolvedSchema,
  type TypeRef,
} from "@ffidl/schema";

import { WireError, WireErrorKind } from "./errors.ts";
import { decodeMapKey, decodePrimitive, encodeMapKey, encodePrimitive, type WireValue } from "./primitives.ts";

export interface WireCodecOptions {
  /**
   * Map a schema field name to the property name used by in-memory values.
   * Defaults to the schema name; the wire key is always the schema name.
   */
  fieldName?: (schemaName: string) => string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Value Path - tracks where in the value an error occurred
// ============================================================================

class ValuePath {
  private segments: string[] = [];

  constructor(private readonly root: string) {}

  /** Run `fn` with `segment` appended to the path. */
  within<T>(segment: string, fn: () => T): T {
    this.segments.push(segment);
    try {
      return fn();
    } finally {
      this.segments.pop();
    }
  }

  toString(): string {
    return this.root + this.segments.join("");
  }
}

class Codec {
  private readonly fieldName: (schemaName: string) => string;

  constructor(
    private readonly resolved: ResolvedSchema,
    private readonly path: ValuePath,
    options: WireCodecOptions,
  ) {
    this.fieldName = options.fieldName ?? ((name) => name);
  }

  private error(kind: WireErrorKind, message: string): WireError {
    return new WireError(kind, message, this.path.toString());
  }

  private checkOptional(ref: OptionalRef): void {
    if (ref.inner.kind === "optional") {
      throw this.error(WireErrorKind.UNSUPPORTED, "An optional of an optional cannot be represented on the wire");
    }
  }

  // ==========================================================================
  // Encoding
  // ==========================================================================

  encode(value: unknown, ref: TypeRef): WireValue {
    switch (ref.kind) {
      case "primitive":
        return encodePrimitive(ref.primitive, value, this.path.toString());
      case "optional":
        this.checkOptional(ref);
        return value === undefined || value === null ? null : this.encode(value, ref.inner);
      case "list":
        return this.encodeList(value, ref);
      case "map":
        return this.encodeMap(value, ref);
      case "unit":
        return {};
      case "named": {
        const type = lookupType(this.resolved, ref.name);
        if (type.kind === "enum") {
          if (typeof value !== "string" || !type.variants.includes(value)) {
            throw this.error(WireErrorKind.UNKNOWN_VARIANT, `Expected one of ${type.variants.join(", ")}`);
          }
          return value;
        }
        return this.encodeComposite(value, type);
      }
    }
  }

  private encodeList(value: unknown, ref: ListRef): WireValue {
    if (!Array.isArray(value)) {
      throw this.error(WireErrorKind.INVALID_VALUE, "Expected an array");
    }
    if (ref.length !== undefined && value.length !== ref.length) {
      throw this.error(WireErrorKind.INVALID_VALUE, `Expected ${ref.length} elements, got ${value.length}`);
    }
    return value.map((item, index) => this.path.within(`[${index}]`, () => this.encode(item, ref.element)));
  }

  private encodeMap(value: unknown, ref: MapRef): WireValue {
    if (!(value instanceof Map)) {
      throw this.error(WireErrorKind.INVALID_VALUE, "Expected a Map");
    }
    const entries: [string, WireValue][] = [];
    for (const [key, item] of value) {
      const text = encodeMapKey(ref.key, key, this.path.toString());
      entries.push([text, this.path.within(`[${JSON.stringify(text)}]`, () => this.encode(item, ref.value))]);
    }
    return Object.fromEntries(entries);
  }

  private encodeComposite(value: unknown, type: CompositeType): WireValue {
    if (!isRecord(value)) {
      throw this.error(WireErrorKind.INVALID_VALUE, `Expected a ${type.name} object`);
    }
    const entries: [string, WireValue][] = [];
    for (const field of type.fields) {
      const item = value[this.fieldName(field.name)];
      if (field.type.kind === "optional" && (item === undefined || item === null)) {
        continue;
      }
      entries.push([field.name, this.path.within(`.${field.name}`, () => this.encode(item, field.type))]);
    }
    return Object.fromEntries(entries);
  }

  // ==========================================================================
  // Decoding
  // ==========================================================================

  decode(wire: unknown, ref: TypeRef): unknown {
    switch (ref.kind) {
      case "primitive":
        return decodePrimitive(ref.primitive, wire, this.path.toString());
      case "optional":
        this.checkOptional(ref);
        return wire === undefined || wire === null ? undefined : this.decode(wire, ref.inner);
      case "list":
        return this.decodeList(wire, ref);
      case "map":
        return this.decodeMap(wire, ref);
      case "unit":
        if (!isRecord(wire)) throw this.error(WireErrorKind.INVALID_VALUE, "Expected an empty object");
        return {};
      case "named": {
        const type = lookupType(this.resolved, ref.name);
        if (type.kind === "enum") {
          if (typeof wire !== "string" || !type.variants.includes(wire)) {
            throw this.error(WireErrorKind.UNKNOWN_VARIANT, `Expected one of ${type.variants.join(", ")}`);
          }
          return wire;
        }
        return this.decodeComposite(wire, type);
      }
    }
  }

  private decodeList(wire: unknown, ref: ListRef): unknown[] {
    // Go encodes nil slices as null.
    if (wire === null && ref.length === undefined) return [];
    if (!Array.isArray(wire)) {
      throw this.error(WireErrorKind.INVALID_VALUE, "Expected an array");
    }
    if (ref.length !== undefined && wire.length !== ref.length) {
      throw this.error(WireErrorKind.INVALID_VALUE, `Expected ${ref.length} elements, got ${wire.length}`);
    }
    return wire.map((item, index) => this.path.within(`[${index}]`, () => this.decode(item, ref.element)));
  }

  private decodeMap(wire: unknown, ref: MapRef): Map<unknown, unknown> {
    const out = new Map<unknown, unknown>();
    if (wire === null) return out;
    if (!isRecord(wire)) {
      throw this.error(WireErrorKind.INVALID_VALUE, "Expected an object");
    }
    for (const [text, item] of Object.entries(wire)) {
      this.path.within(`[${JSON.stringify(text)}]`, () => {
        out.set(decodeMapKey(ref.key, text, this.path.toString()), this.decode(item, ref.value));
      });
    }
    return out;
  }

  private decodeComposite(wire: unknown, type: CompositeType): Record<string, unknown> {
    if (!isRecord(wire)) {
      throw this.error(WireErrorKind.INVALID_VALUE, `Expected a ${type.name} object`);
    }
    const entries: [string, unknown][] = [];
    for (const field of type.fields) {
      const item = Object.hasOwn(wire, field.name) ? wire[field.name] : undefined;
      if (field.type.kind === "optional" && (item === undefined || item === null)) {
        continue;
      }
      if (item === undefined) {
        throw this.error(WireErrorKind.MISSING_FIELD, `Missing field "${field.name}" of ${type.name}`);
      }
      entries.push([this.fieldName(field.name), this.path.within(`.${field.name}`, () => this.decode(item, field.type))]);
    }
    return Object.fromEntries(entries);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Encode an in-memory value to a JSON-compatible tree.
 *
 * @param value - The value to encode
 * @param ref - Type of the value
 * @param resolved - Schema the type's named references resolve against
 * @throws WireError if the value does not match the type
 */
export function encodeValue(
  value: unknown,
  ref: TypeRef,
  resolved: ResolvedSchema,
  options: WireCodecOptions = {},
): WireValue {
  return new Codec(resolved, new ValuePath(formatTypeRef(ref)), options).encode(value, ref);
}

/**
 * Decode a JSON-compatible tree into an in-memory value.
 *
 * @throws WireError with the path of the first malformed value
 */
export function decodeValue(
  wire: unknown,
  ref: TypeRef,
  resolved: ResolvedSchema,
  options: WireCodecOptions = {},
): unknown {
  return new Codec(resolved, new ValuePath(formatTypeRef(ref)), options).decode(wire, ref);
}

/**
 * Serialize a value of a named type to UTF-8 JSON bytes.
 */
export function serialize(
  value: unknown,
  typeName: string,
  resolved: ResolvedSchema,
  options: WireCodecOptions = {},
): Uint8Array {
  const wire = encodeValue(value, { kind: "named", name: typeName }, resolved, options);
  return new TextEncoder().encode(JSON.stringify(wire));
}

/**
 * Deserialize UTF-8 JSON bytes into a value of a named type.
 *
 * @throws WireError on invalid UTF-8, invalid JSON, or a malformed value
 */
export function deserialize(
  bytes: Uint8Array,
  typeName: string,
  resolved: ResolvedSchema,
  options: WireCodecOptions = {},
): unknown {
  let wire: unknown;
  try {
    wire = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WireError(WireErrorKind.INVALID_JSON, `Invalid JSON payload: ${reason}`, typeName);
  }
  return decodeValue(wire, { kind: "named", name: typeName }, resolved, options);
}
