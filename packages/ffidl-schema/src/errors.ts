// Parse and resolve errors.
//
// Schema authoring errors are deterministic: they are reported once, with
// enough context (type, field, or document position) to find the construct,
// and never retried.

import type { SourceLocation } from "./model.ts";

function describeLocation(location: SourceLocation | null): string {
  return location ? ` at line ${location.line}, column ${location.column}` : "";
}

// ============================================================================
// Parse Errors
// ============================================================================

export const ParseErrorKind = {
  /** The document does not have the expected shape. */
  SYNTAX: "syntax",
  /** A composite lists the same field name twice. */
  DUPLICATE_FIELD: "duplicate_field",
} as const;

export type ParseErrorKind = (typeof ParseErrorKind)[keyof typeof ParseErrorKind];

export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly location: SourceLocation | null;
  /** Dotted path of the construct being parsed, e.g. `types.Node.position`. */
  readonly context: string | null;

  constructor(kind: ParseErrorKind, message: string, location: SourceLocation | null, context: string | null) {
    const where = context ? ` in ${context}` : "";
    super(`${message}${where}${describeLocation(location)}`);
    this.name = "ParseError";
    this.kind = kind;
    this.location = location;
    this.context = context;
  }

  static syntax(message: string, location: SourceLocation | null = null, context: string | null = null): ParseError {
    return new ParseError(ParseErrorKind.SYNTAX, message, location, context);
  }

  static duplicateField(typeName: string, fieldName: string, location: SourceLocation | null = null): ParseError {
    return new ParseError(
      ParseErrorKind.DUPLICATE_FIELD,
      `Duplicate field "${fieldName}"`,
      location,
      `types.${typeName}`,
    );
  }
}

// ============================================================================
// Resolve Errors
// ============================================================================

export const ResolveErrorKind = {
  UNKNOWN_TYPE: "unknown_type",
  /** A composite embeds itself by value, directly or through other composites. */
  INVALID_CYCLE: "invalid_cycle",
  DUPLICATE_TYPE_NAME: "duplicate_type_name",
  DUPLICATE_FUNCTION_NAME: "duplicate_function_name",
} as const;

export type ResolveErrorKind = (typeof ResolveErrorKind)[keyof typeof ResolveErrorKind];

export class ResolveError extends Error {
  readonly kind: ResolveErrorKind;
  /** The type or function name the error is about. */
  readonly symbol: string;
  readonly location: SourceLocation | null;

  constructor(kind: ResolveErrorKind, symbol: string, message: string, location: SourceLocation | null) {
    super(`${message}${describeLocation(location)}`);
    this.name = "ResolveError";
    this.kind = kind;
    this.symbol = symbol;
    this.location = location;
  }

  /**
   * @param referencedFrom - Where the reference appears, e.g. `Node.parent` or `addNode.input`
   */
  static unknownType(name: string, referencedFrom: string, location: SourceLocation | null = null): ResolveError {
    return new ResolveError(
      ResolveErrorKind.UNKNOWN_TYPE,
      name,
      `Unknown type "${name}" referenced from ${referencedFrom}`,
      location,
    );
  }

  /**
   * @param cycle - Type names along the cycle, starting and ending with `name`
   */
  static invalidCycle(name: string, cycle: readonly string[], location: SourceLocation | null = null): ResolveError {
    return new ResolveError(
      ResolveErrorKind.INVALID_CYCLE,
      name,
      `Type "${name}" contains itself by value (${cycle.join(" -> ")}); wrap the reference in an optional, list or map`,
      location,
    );
  }

  static duplicateTypeName(name: string, location: SourceLocation | null = null): ResolveError {
    return new ResolveError(ResolveErrorKind.DUPLICATE_TYPE_NAME, name, `Type "${name}" is declared more than once`, location);
  }

  static duplicateFunctionName(name: string, location: SourceLocation | null = null): ResolveError {
    return new ResolveError(
      ResolveErrorKind.DUPLICATE_FUNCTION_NAME,
      name,
      `Function "${name}" is declared more than once`,
      location,
    );
  }
}
