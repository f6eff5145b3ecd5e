// Wire codec errors

export const WireErrorKind = {
  /** The value does not have the shape its type requires. */
  INVALID_VALUE: "invalid_value",
  /** A required composite field is absent. */
  MISSING_FIELD: "missing_field",
  /** A number or integer falls outside its kind's range. */
  OUT_OF_RANGE: "out_of_range",
  /** An enum value names no declared variant. */
  UNKNOWN_VARIANT: "unknown_variant",
  /** The bytes are not UTF-8 JSON. */
  INVALID_JSON: "invalid_json",
  /** The type cannot be carried by the wire format (e.g. an optional of an optional). */
  UNSUPPORTED: "unsupported",
} as const;

export type WireErrorKind = (typeof WireErrorKind)[keyof typeof WireErrorKind];

/** Encoding or decoding failure, located by the value path (e.g. `Node.position[2]`). */
export class WireError extends Error {
  readonly kind: WireErrorKind;
  readonly path: string;

  constructor(kind: WireErrorKind, message: string, path: string) {
    super(`${message} at ${path}`);
    this.name = "WireError";
    this.kind = kind;
    this.path = path;
  }
}
