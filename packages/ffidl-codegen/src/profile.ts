// Language profiles: the per-target tables the emitters consult.
//
// Everything that differs between targets in naming and type mapping lives
// here. Emitters read a profile instead of branching on the target.

import type { PrimitiveKind } from "@ffidl/schema";

import reservedWords from "../data/reserved.json";
import { convertCase, type CaseStyle } from "./casing.ts";

export type TargetId = "typescript" | "rust" | "go" | "fsharp";

export const TARGET_IDS: readonly TargetId[] = ["typescript", "rust", "go", "fsharp"];

/** Schema constructs a profile may leave unsupported. */
export const CONSTRUCTS = [
  "nested-optional",
  "fixed-list",
  "non-string-map-key",
  "map",
  "enum",
  "empty-composite",
] as const;

export type Construct = (typeof CONSTRUCTS)[number];

/**
 * Package-level names an emitter derives from schema names:
 * `enum-constants` is `<Type><Variant>`, `codec-functions` is
 * `Deserialize<Type>`, `payload-wrappers` is `<Function>Input` and
 * `<Function>Output` for inline function types.
 */
export type DerivedName = "enum-constants" | "codec-functions" | "payload-wrappers";

export interface LanguageProfile {
  readonly id: TargetId;
  readonly displayName: string;
  /** Subdirectory of the output root the target writes into. */
  readonly directory: string;
  /** In-memory type text for each primitive kind. */
  readonly primitives: Readonly<Record<PrimitiveKind, string>>;
  readonly typeCase: CaseStyle;
  readonly fieldCase: CaseStyle;
  readonly variantCase: CaseStyle;
  readonly functionCase: CaseStyle;
  readonly unsupported: ReadonlySet<Construct>;
  /** Identifiers that get a trailing `_` after case conversion. */
  readonly reserved: ReadonlySet<string>;
  /** Generated names sharing the namespace of type names. */
  readonly derived: ReadonlySet<DerivedName>;
}

// ============================================================================
// Profiles
// ============================================================================

export const TYPESCRIPT: LanguageProfile = {
  id: "typescript",
  displayName: "TypeScript",
  directory: "ts",
  primitives: {
    bool: "boolean",
    i32: "number",
    i64: "bigint",
    u32: "number",
    u64: "bigint",
    f32: "number",
    f64: "number",
    string: "string",
    bytes: "Uint8Array",
    uuid: "string",
    timestamp: "Date",
  },
  typeCase: "pascal",
  fieldCase: "camel",
  // Variants are string literals and must stay the wire names.
  variantCase: "preserve",
  functionCase: "camel",
  unsupported: new Set(["nested-optional"]),
  reserved: new Set(reservedWords.typescript),
  derived: new Set(),
};

export const RUST: LanguageProfile = {
  id: "rust",
  displayName: "Rust",
  directory: "rust",
  primitives: {
    bool: "bool",
    i32: "i32",
    i64: "i64",
    u32: "u32",
    u64: "u64",
    f32: "f32",
    f64: "f64",
    string: "String",
    bytes: "Vec<u8>",
    uuid: "uuid::Uuid",
    timestamp: "chrono::DateTime<chrono::Utc>",
  },
  typeCase: "pascal",
  fieldCase: "snake",
  variantCase: "pascal",
  functionCase: "snake",
  unsupported: new Set(["nested-optional"]),
  reserved: new Set(reservedWords.rust),
  derived: new Set(["payload-wrappers"]),
};

export const GO: LanguageProfile = {
  id: "go",
  displayName: "Go",
  directory: "go",
  primitives: {
    bool: "bool",
    i32: "int32",
    i64: "I64",
    u32: "uint32",
    u64: "U64",
    f32: "float32",
    f64: "float64",
    string: "string",
    bytes: "Bytes",
    uuid: "UUID",
    timestamp: "Timestamp",
  },
  typeCase: "pascal",
  fieldCase: "pascal",
  variantCase: "pascal",
  functionCase: "pascal",
  unsupported: new Set(["nested-optional"]),
  reserved: new Set(reservedWords.go),
  derived: new Set(["enum-constants", "codec-functions"]),
};

export const FSHARP: LanguageProfile = {
  id: "fsharp",
  displayName: "F#",
  directory: "fsharp",
  primitives: {
    bool: "bool",
    i32: "int",
    i64: "int64",
    u32: "uint32",
    u64: "uint64",
    f32: "float32",
    f64: "float",
    string: "string",
    bytes: "byte[]",
    uuid: "Guid",
    timestamp: "DateTimeOffset",
  },
  typeCase: "pascal",
  fieldCase: "pascal",
  variantCase: "pascal",
  functionCase: "camel",
  unsupported: new Set(["nested-optional", "fixed-list", "non-string-map-key"]),
  reserved: new Set(reservedWords.fsharp),
  derived: new Set(),
};

export const PROFILES: Readonly<Record<TargetId, LanguageProfile>> = {
  typescript: TYPESCRIPT,
  rust: RUST,
  go: GO,
  fsharp: FSHARP,
};

export function isTargetId(id: string): id is TargetId {
  return TARGET_IDS.some((target) => target === id);
}

/** Look up a profile by target id, or undefined for an unknown target. */
export function getProfile(id: string): LanguageProfile | undefined {
  return isTargetId(id) ? PROFILES[id] : undefined;
}

// ============================================================================
// Identifiers
// ============================================================================

function identifier(profile: LanguageProfile, name: string, style: CaseStyle): string {
  const converted = convertCase(name, style);
  return profile.reserved.has(converted) ? `${converted}_` : converted;
}

export function typeIdent(profile: LanguageProfile, name: string): string {
  return identifier(profile, name, profile.typeCase);
}

export function fieldIdent(profile: LanguageProfile, name: string): string {
  return identifier(profile, name, profile.fieldCase);
}

export function variantIdent(profile: LanguageProfile, name: string): string {
  return identifier(profile, name, profile.variantCase);
}

export function functionIdent(profile: LanguageProfile, name: string): string {
  return identifier(profile, name, profile.functionCase);
}

/** Wrapper type for an inline function input or output. */
export function payloadIdent(name: string, role: "Input" | "Output"): string {
  return `${convertCase(name, "pascal")}${role}`;
}
