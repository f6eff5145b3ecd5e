// Schema model: the in-memory form of a parsed schema document.
//
// The model is pure data. The parser builds it, the resolver validates it,
// and generators only ever read it.

// ============================================================================
// Primitive Kinds
// ============================================================================

/** Every primitive kind, in canonical order. */
export const PRIMITIVE_KINDS = [
  "bool",
  "i32",
  "i64",
  "u32",
  "u64",
  "f32",
  "f64",
  "string",
  "bytes",
  "uuid",
  "timestamp",
] as const;

/** Primitive types with a fixed wire encoding. */
export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];

/** Primitive kinds allowed as map keys. */
export const MAP_KEY_KINDS: readonly PrimitiveKind[] = ["string", "i32", "i64", "u32", "u64", "uuid"];

/** Name of the empty payload, valid only as a function input or output. */
export const UNIT_NAME = "Unit";

export function isPrimitiveKind(name: string): name is PrimitiveKind {
  return PRIMITIVE_KINDS.some((kind) => kind === name);
}

export function isMapKeyKind(kind: PrimitiveKind): boolean {
  return MAP_KEY_KINDS.includes(kind);
}

// ============================================================================
// Type References
// ============================================================================

export interface PrimitiveRef {
  kind: "primitive";
  primitive: PrimitiveKind;
}

/** Reference to a type declared under `types`. Existence is checked by the resolver. */
export interface NamedRef {
  kind: "named";
  name: string;
}

export interface OptionalRef {
  kind: "optional";
  inner: TypeRef;
}

export interface ListRef {
  kind: "list";
  element: TypeRef;
  /** Present for fixed-length lists written `[T; N]`. */
  length?: number;
}

export interface MapRef {
  kind: "map";
  key: PrimitiveKind;
  value: TypeRef;
}

export interface UnitRef {
  kind: "unit";
}

export type TypeRef = PrimitiveRef | NamedRef | OptionalRef | ListRef | MapRef | UnitRef;

export function primitive(kind: PrimitiveKind): PrimitiveRef {
  return { kind: "primitive", primitive: kind };
}

export function named(name: string): NamedRef {
  return { kind: "named", name };
}

export function optional(inner: TypeRef): OptionalRef {
  return { kind: "optional", inner };
}

export function list(element: TypeRef, length?: number): ListRef {
  return length === undefined ? { kind: "list", element } : { kind: "list", element, length };
}

export function map(key: PrimitiveKind, value: TypeRef): MapRef {
  return { kind: "map", key, value };
}

export const unit: UnitRef = { kind: "unit" };

/**
 * Render a type reference back to type-expression syntax.
 *
 * `formatTypeRef(parseTypeExpr(text))` is the canonical spelling of `text`.
 */
export function formatTypeRef(ref: TypeRef): string {
  switch (ref.kind) {
    case "primitive":
      return ref.primitive;
    case "named":
      return ref.name;
    case "optional":
      return `${formatTypeRef(ref.inner)}?`;
    case "list":
      return ref.length === undefined
        ? `[${formatTypeRef(ref.element)}]`
        : `[${formatTypeRef(ref.element)}; ${ref.length}]`;
    case "map":
      return `map<${ref.key}, ${formatTypeRef(ref.value)}>`;
    case "unit":
      return UNIT_NAME;
  }
}

/** Call `visit` for every named reference inside `ref`. */
export function forEachNamedRef(ref: TypeRef, visit: (name: string) => void): void {
  switch (ref.kind) {
    case "named":
      visit(ref.name);
      return;
    case "optional":
      forEachNamedRef(ref.inner, visit);
      return;
    case "list":
      forEachNamedRef(ref.element, visit);
      return;
    case "map":
      forEachNamedRef(ref.value, visit);
      return;
    case "primitive":
    case "unit":
      return;
  }
}

// ============================================================================
// Declarations
// ============================================================================

/** 1-based position in the source document. */
export interface SourceLocation {
  line: number;
  column: number;
}

export interface FieldDef {
  name: string;
  type: TypeRef;
  location?: SourceLocation;
}

export interface CompositeType {
  kind: "composite";
  name: string;
  /** Fields in declaration order. Order is significant for generation. */
  fields: FieldDef[];
  location?: SourceLocation;
}

/**
 * Closed set of variant names. Variants carry no data; payload-carrying
 * variants would need a new wire form in every generator.
 */
export interface EnumType {
  kind: "enum";
  name: string;
  variants: string[];
  location?: SourceLocation;
}

export type NamedType = CompositeType | EnumType;

export interface FunctionContract {
  name: string;
  input: TypeRef;
  output: TypeRef;
  location?: SourceLocation;
}

/**
 * A parsed schema document.
 *
 * `types` keeps declaration order and may still hold duplicate names; the
 * resolver rejects them.
 */
export interface Schema {
  /** Value of the optional top-level `schema:` key. */
  name?: string;
  types: NamedType[];
  functions: FunctionContract[];
}

// ============================================================================
// Resolved Schema
// ============================================================================

/** A validated schema with a deterministic generation order. */
export interface ResolvedSchema {
  readonly schema: Schema;
  /** Types by name. */
  readonly types: ReadonlyMap<string, NamedType>;
  /** Types in generation order: by-value dependencies come first. */
  readonly order: readonly NamedType[];
  readonly functions: readonly FunctionContract[];
  /** True when `from` and `to` belong to the same reference cycle. */
  isRecursive(from: string, to: string): boolean;
}

/** Look up a named type, failing loudly on a reference the resolver let through. */
export function lookupType(resolved: ResolvedSchema, name: string): NamedType {
  const type = resolved.types.get(name);
  if (!type) {
    throw new Error(`Unknown type ref: ${name}`);
  }
  return type;
}
