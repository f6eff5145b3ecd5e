// Rust emitter
//
// serde structs and enums. 64-bit integers, bytes, timestamps and fixed
// lists go through serde_with adapters so the derive output matches the wire
// format; an optional that reaches its owner by value is boxed. Functions become a `Handlers` trait plus a
// byte-in/byte-out `dispatch`.

import type { CompositeType, EnumType, FieldDef, FunctionContract, OptionalRef, TypeRef } from "@ffidl/schema";

import { convertCase } from "./casing.ts";
import { loadTemplate, type EmitContext, type GeneratedFile } from "./context.ts";
import { fieldIdent, functionIdent, payloadIdent, typeIdent, variantIdent } from "./profile.ts";
import { isInlinePayload } from "./constructs.ts";
import { CodeWriter } from "./writer.ts";

const STRUCT_DERIVES = "#[derive(Debug, Clone, PartialEq, Serialize, Deserialize)]";
const ENUM_DERIVES = "#[derive(Debug, Clone, Copy, PartialEq, Eq, Hash, PartialOrd, Ord, Serialize, Deserialize)]";

function usesMap(ref: TypeRef): boolean {
  switch (ref.kind) {
    case "map":
      return true;
    case "optional":
      return usesMap(ref.inner);
    case "list":
      return usesMap(ref.element);
    default:
      return false;
  }
}

function usesTimestamp(ref: TypeRef): boolean {
  switch (ref.kind) {
    case "primitive":
      return ref.primitive === "timestamp";
    case "optional":
      return usesTimestamp(ref.inner);
    case "list":
      return usesTimestamp(ref.element);
    case "map":
      return usesTimestamp(ref.value);
    default:
      return false;
  }
}

/**
 * `serde_as` adapter for `ref`, or null when the plain serde derive already
 * produces the wire form.
 */
export function serdeAdapter(ref: TypeRef): string | null {
  switch (ref.kind) {
    case "primitive":
      if (ref.primitive === "i64" || ref.primitive === "u64") {
        return "serde_with::PickFirst<(serde_with::DisplayFromStr, _)>";
      }
      if (ref.primitive === "bytes") return "serde_with::base64::Base64";
      return ref.primitive === "timestamp" ? "WireTimestamp" : null;
    case "optional": {
      const inner = serdeAdapter(ref.inner);
      return inner === null ? null : `Option<${inner}>`;
    }
    case "list": {
      const element = serdeAdapter(ref.element);
      // serde's own array impls stop at 32 elements.
      if (ref.length !== undefined) return `[${element ?? "_"}; ${ref.length}]`;
      // Go encodes nil slices as null.
      return `serde_with::DefaultOnNull<Vec<${element ?? "_"}>>`;
    }
    case "map":
      return `serde_with::DefaultOnNull<BTreeMap<_, ${serdeAdapter(ref.value) ?? "_"}>>`;
    case "named":
    case "unit":
      return null;
  }
}

class RustEmitter {
  private readonly out = new CodeWriter("    ");

  constructor(private readonly context: EmitContext) {}

  private typeName(name: string): string {
    return typeIdent(this.context.profile, name);
  }

  /** Whether `ref` holds a value of `owner`'s recursive group without indirection. */
  private reachesByValue(ref: TypeRef, owner: string): boolean {
    switch (ref.kind) {
      case "named":
        return this.context.resolved.isRecursive(owner, ref.name);
      case "optional":
        return this.reachesByValue(ref.inner, owner);
      case "list":
        return ref.length !== undefined && this.reachesByValue(ref.element, owner);
      default:
        return false;
    }
  }

  private isBoxed(ref: OptionalRef, owner: string | null): boolean {
    return owner !== null && this.reachesByValue(ref.inner, owner);
  }

  /** `serde_as` adapter of `ref` as a field of `owner`. */
  private fieldAdapter(ref: TypeRef, owner: string | null): string | null {
    if (ref.kind !== "optional" || !this.isBoxed(ref, owner)) return serdeAdapter(ref);
    const inner = serdeAdapter(ref.inner);
    return inner === null ? null : `Option<Box<${inner}>>`;
  }

  /** Type text of `ref` as a field of `owner`. */
  private typeText(ref: TypeRef, owner: string | null): string {
    switch (ref.kind) {
      case "primitive":
        return this.context.profile.primitives[ref.primitive];
      case "named":
        return this.typeName(ref.name);
      case "optional":
        return this.isBoxed(ref, owner)
          ? `Option<Box<${this.typeText(ref.inner, owner)}>>`
          : `Option<${this.typeText(ref.inner, owner)}>`;
      case "list":
        return ref.length === undefined
          ? `Vec<${this.typeText(ref.element, owner)}>`
          : `[${this.typeText(ref.element, owner)}; ${ref.length}]`;
      case "map":
        return `BTreeMap<${this.context.profile.primitives[ref.key]}, ${this.typeText(ref.value, owner)}>`;
      case "unit":
        return "()";
    }
  }

  emit(): string {
    const { resolved } = this.context;
    const out = this.out;
    const refs = [
      ...resolved.order.flatMap((type) => (type.kind === "composite" ? type.fields.map((field) => field.type) : [])),
      ...resolved.functions.flatMap((fn) => [fn.input, fn.output]),
    ];

    out.line(`// ${this.context.header}`);
    out.blank();
    if (refs.some(usesMap)) {
      out.line("use std::collections::BTreeMap;");
      out.blank();
    }
    out.line("use serde::{Deserialize, Serialize};");
    if (refs.some(usesTimestamp)) {
      out.blank();
      out.lines(loadTemplate("rust_timestamp.rs.txt"));
    }

    for (const type of resolved.order) {
      out.blank();
      if (type.kind === "enum") this.emitEnum(type);
      else this.emitStruct(type);
      out.blank();
      this.emitCodec(type.name);
    }

    if (resolved.functions.length > 0) {
      out.blank();
      out.lines(loadTemplate("rust_dispatch.rs.txt"));
      this.emitFunctions();
    }
    return out.toString();
  }

  // ==========================================================================
  // Types
  // ==========================================================================

  private emitEnum(type: EnumType): void {
    const out = this.out;
    out.line(ENUM_DERIVES);
    out.block(`pub enum ${this.typeName(type.name)} {`, () => {
      for (const variant of type.variants) {
        const ident = variantIdent(this.context.profile, variant);
        if (ident !== variant) out.line(`#[serde(rename = ${JSON.stringify(variant)})]`);
        out.line(`${ident},`);
      }
    });
  }

  private emitStruct(type: CompositeType): void {
    const out = this.out;
    const adapted = type.fields.some((field) => this.fieldAdapter(field.type, type.name) !== null);
    if (adapted) out.line("#[serde_with::serde_as]");
    out.line(STRUCT_DERIVES);
    if (type.fields.length === 0) {
      out.line(`pub struct ${this.typeName(type.name)} {}`);
      return;
    }
    out.block(`pub struct ${this.typeName(type.name)} {`, () => {
      for (const field of type.fields) this.emitField(type, field);
    });
  }

  private emitField(owner: CompositeType, field: FieldDef): void {
    const ident = fieldIdent(this.context.profile, field.name);
    const adapter = this.fieldAdapter(field.type, owner.name);
    const serde: string[] = [];
    if (ident !== field.name) serde.push(`rename = ${JSON.stringify(field.name)}`);
    if (field.type.kind === "optional") {
      // serde_as adds `default` itself for adapted options.
      if (adapter === null) serde.push("default");
      serde.push('skip_serializing_if = "Option::is_none"');
    }

    if (adapter !== null) this.out.line(`#[serde_as(as = ${JSON.stringify(adapter)})]`);
    if (serde.length > 0) this.out.line(`#[serde(${serde.join(", ")})]`);
    this.out.line(`pub ${ident}: ${this.typeText(field.type, owner.name)},`);
  }

  private emitCodec(typeName: string): void {
    const out = this.out;
    out.block(`impl ${this.typeName(typeName)} {`, () => {
      out.line("/// Encode as UTF-8 JSON in the ffidl wire format.");
      out.block("pub fn serialize(&self) -> Result<Vec<u8>, serde_json::Error> {", () => {
        out.line("serde_json::to_vec(self)");
      });
      out.blank();
      out.line("/// Decode from UTF-8 JSON in the ffidl wire format.");
      out.block("pub fn deserialize(bytes: &[u8]) -> Result<Self, serde_json::Error> {", () => {
        out.line("serde_json::from_slice(bytes)");
      });
    });
  }

  // ==========================================================================
  // Functions
  // ==========================================================================

  /** Wrapper struct for a function input or output that is not a named type. */
  private payloadName(fn: FunctionContract, role: "Input" | "Output"): string {
    return payloadIdent(fn.name, role);
  }

  private emitPayloadWrapper(name: string, ref: TypeRef): void {
    const out = this.out;
    const adapter = serdeAdapter(ref);
    out.blank();
    if (adapter !== null) out.line("#[serde_with::serde_as]");
    out.line("#[derive(Serialize, Deserialize)]");
    out.line("#[serde(transparent)]");
    const attribute = adapter === null ? "" : `#[serde_as(as = ${JSON.stringify(adapter)})] `;
    out.line(`struct ${name}(${attribute}${this.typeText(ref, null)});`);
  }


  private emitFunctions(): void {
    const out = this.out;
    const functions = this.context.resolved.functions;

    for (const fn of functions) {
      if (isInlinePayload(fn.input)) this.emitPayloadWrapper(this.payloadName(fn, "Input"), fn.input);
      if (isInlinePayload(fn.output)) this.emitPayloadWrapper(this.payloadName(fn, "Output"), fn.output);
    }

    out.blank();
    out.line("/// Implementations of the schema's functions.");
    out.block("pub trait Handlers {", () => {
      for (const fn of functions) {
        const params = fn.input.kind === "unit" ? "&self" : `&self, input: ${this.typeText(fn.input, null)}`;
        const output = this.typeText(fn.output, null);
        out.line(`fn ${functionIdent(this.context.profile, fn.name)}(${params}) -> Result<${output}, String>;`);
      }
    });

    const inputParam = functions.some((fn) => fn.input.kind !== "unit") ? "input" : "_input";
    out.blank();
    out.line("/// Decode `input`, call the handler registered for `method`, and encode its result.");
    out.block(
      `pub fn dispatch<H: Handlers>(handlers: &H, method: &str, ${inputParam}: &[u8]) -> Result<Vec<u8>, DispatchError> {`,
      () => {
        out.block("match method {", () => {
          for (const fn of functions) this.emitDispatchArm(fn);
          out.line("other => Err(DispatchError::UnknownMethod(other.to_string())),");
        });
      },
    );
  }

  private emitDispatchArm(fn: FunctionContract): void {
    const out = this.out;
    const handler = functionIdent(this.context.profile, fn.name);
    out.block(`${JSON.stringify(fn.name)} => {`, () => {
      let argument = "";
      if (fn.input.kind === "named") {
        out.line(`let input = ${this.typeName(fn.input.name)}::deserialize(input).map_err(DispatchError::Parse)?;`);
        argument = "input";
      } else if (fn.input.kind !== "unit") {
        const wrapper = this.payloadName(fn, "Input");
        out.line(`let input: ${wrapper} = serde_json::from_slice(input).map_err(DispatchError::Parse)?;`);
        argument = "input.0";
      }

      const call = `handlers.${handler}(${argument}).map_err(DispatchError::Handler)?`;
      if (fn.output.kind === "unit") {
        out.line(`${call};`);
        out.line('Ok(b"{}".to_vec())');
      } else if (fn.output.kind === "named") {
        out.line(`let output = ${call};`);
        out.line("output.serialize().map_err(DispatchError::Serialization)");
      } else {
        out.line(`let output = ${call};`);
        out.line(`serde_json::to_vec(&${this.payloadName(fn, "Output")}(output)).map_err(DispatchError::Serialization)`);
      }
    });
  }
}

function cargoManifest(context: EmitContext): string {
  const crate = convertCase(context.moduleName, "snake");
  return [
    `# ${context.header}`,
    "",
    "[package]",
    `name = ${JSON.stringify(crate)}`,
    'version = "0.1.0"',
    'edition = "2021"',
    "",
    "[dependencies]",
    'chrono = { version = "0.4", features = ["serde"] }',
    'serde = { version = "1", features = ["derive"] }',
    'serde_json = "1"',
    'serde_with = { version = "3", features = ["base64", "chrono_0_4"] }',
    'uuid = { version = "1", features = ["serde"] }',
    "",
  ].join("\n");
}

export function emitRust(context: EmitContext): GeneratedFile[] {
  return [
    { path: "Cargo.toml", contents: cargoManifest(context) },
    { path: "src/lib.rs", contents: new RustEmitter(context).emit() },
  ];
}
