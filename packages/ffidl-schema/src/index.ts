// Schema model, parser and resolver
//
// This package turns a schema document into a validated, ordered model that
// the generators and the reference wire codec read.

// ============================================================================
// Model
// ============================================================================

export type {
  PrimitiveKind,
  PrimitiveRef,
  NamedRef,
  OptionalRef,
  ListRef,
  MapRef,
  UnitRef,
  TypeRef,
  SourceLocation,
  FieldDef,
  CompositeType,
  EnumType,
  NamedType,
  FunctionContract,
  Schema,
  ResolvedSchema,
} from "./model.ts";

export {
  PRIMITIVE_KINDS,
  MAP_KEY_KINDS,
  UNIT_NAME,
  isPrimitiveKind,
  isMapKeyKind,
  primitive,
  named,
  optional,
  list,
  map,
  unit,
  formatTypeRef,
  forEachNamedRef,
  lookupType,
} from "./model.ts";

// ============================================================================
// Errors
// ============================================================================

export { ParseError, ParseErrorKind, ResolveError, ResolveErrorKind } from "./errors.ts";

// ============================================================================
// Parsing
// ============================================================================

export { TypeExprError, parseTypeExpr, type TypeExprOptions } from "./type_expr.ts";
export { parseSchema, tryParseSchema, type ParseResult } from "./parser.ts";

// ============================================================================
// Resolution
// ============================================================================

export { resolveSchema, tryResolveSchema, type ResolveResult } from "./resolver.ts";
