// TypeScript emitter
//
// Produces one standalone module: interfaces and string-literal unions, an
// encode/decode/serialize/deserialize quartet per type, and a client class
// over the native call boundary. The output has no imports.

import { formatTypeRef, type CompositeType, type EnumType, type FunctionContract, type PrimitiveKind, type TypeRef } from "@ffidl/schema";

import { convertCase } from "./casing.ts";
import { loadTemplate, type EmitContext, type GeneratedFile } from "./context.ts";
import { fieldIdent, functionIdent, typeIdent } from "./profile.ts";
import { CodeWriter } from "./writer.ts";

/** Template literal that appends `suffix` to the path held in `base`. */
function pathAppend(base: string, suffix: string): string {
  return "`${" + base + "}" + suffix + "`";
}

function parenthesizeUnion(type: string): string {
  return type.includes("|") ? `(${type})` : type;
}

function banner(out: CodeWriter, title: string): void {
  out.blank();
  out.line("// " + "=".repeat(76));
  out.line(`// ${title}`);
  out.line("// " + "=".repeat(76));
  out.blank();
}

class TypeScriptEmitter {
  private readonly out = new CodeWriter("  ");

  constructor(private readonly context: EmitContext) {}

  emit(): string {
    const { resolved } = this.context;
    this.out.line(`// ${this.context.header}`);
    this.out.blank();
    this.out.lines(loadTemplate("typescript_prelude.ts.txt"));

    if (resolved.order.length > 0) banner(this.out, "Types");
    for (const type of resolved.order) {
      if (type.kind === "enum") this.emitEnum(type);
      else this.emitComposite(type);
    }

    if (resolved.functions.length > 0) {
      this.out.blank();
      this.out.lines(loadTemplate("typescript_boundary.ts.txt"));
      this.emitClient();
    }
    return this.out.toString();
  }

  // ==========================================================================
  // Type text
  // ==========================================================================

  private typeName(name: string): string {
    return typeIdent(this.context.profile, name);
  }

  private typeText(ref: TypeRef): string {
    switch (ref.kind) {
      case "primitive":
        return this.context.profile.primitives[ref.primitive];
      case "named":
        return this.typeName(ref.name);
      case "optional":
        return `${this.typeText(ref.inner)} | undefined`;
      case "list":
        return `${parenthesizeUnion(this.typeText(ref.element))}[]`;
      case "map":
        return `Map<${this.context.profile.primitives[ref.key]}, ${this.typeText(ref.value)}>`;
      case "unit":
        return "void";
    }
  }

  // ==========================================================================
  // Codec expressions
  // ==========================================================================

  private encodePrimitive(kind: PrimitiveKind, value: string, path: string): string {
    switch (kind) {
      case "bool":
      case "string":
        return value;
      case "i32":
      case "u32":
        return `wireCheckInt("${kind}", ${value}, ${path})`;
      case "i64":
      case "u64":
        return `wireEncodeBigInt("${kind}", ${value}, ${path})`;
      case "f32":
      case "f64":
        return `wireCheckFinite("${kind}", ${value}, ${path})`;
      case "bytes":
        return `wireEncodeBytes(${value})`;
      case "uuid":
        return `wireCheckUuid(${value}, ${path})`;
      case "timestamp":
        return `wireEncodeTimestamp(${value}, ${path})`;
    }
  }

  private decodePrimitive(kind: PrimitiveKind, wire: string, path: string): string {
    switch (kind) {
      case "bool":
        return `wireDecodeBool(${wire}, ${path})`;
      case "string":
        return `wireDecodeString(${wire}, ${path})`;
      case "i32":
      case "u32":
        return `wireCheckInt("${kind}", ${wire}, ${path})`;
      case "i64":
      case "u64":
        return `wireDecodeBigInt("${kind}", ${wire}, ${path})`;
      case "f32":
      case "f64":
        return `wireDecodeFloat("${kind}", ${wire}, ${path})`;
      case "bytes":
        return `wireDecodeBytes(${wire}, ${path})`;
      case "uuid":
        return `wireCheckUuid(${wire}, ${path})`;
      case "timestamp":
        return `wireDecodeTimestamp(${wire}, ${path})`;
    }
  }

  private encodeKey(kind: PrimitiveKind, key: string, path: string): string {
    switch (kind) {
      case "string":
        return key;
      case "i32":
      case "u32":
        return `String(wireCheckInt("${kind}", ${key}, ${path}))`;
      case "i64":
      case "u64":
      case "uuid":
        return this.encodePrimitive(kind, key, path);
      default:
        throw new Error(`${kind} cannot be a map key`);
    }
  }

  private decodeKey(kind: PrimitiveKind, text: string, path: string): string {
    switch (kind) {
      case "string":
        return text;
      case "i32":
      case "u32":
        return `wireDecodeIntKey("${kind}", ${text}, ${path})`;
      case "i64":
      case "u64":
        return `wireDecodeBigIntKey("${kind}", ${text}, ${path})`;
      case "uuid":
        return `wireDecodeUuidKey(${text}, ${path})`;
      default:
        throw new Error(`${kind} cannot be a map key`);
    }
  }

  /** Expression encoding `value` (an expression of type `ref`) to a WireValue. */
  private encodeExpr(ref: TypeRef, value: string, path: string, depth: number): string {
    const item = `item${depth}`;
    const itemPath = `path${depth}`;
    switch (ref.kind) {
      case "primitive":
        return this.encodePrimitive(ref.primitive, value, path);
      case "named":
        return `encode${this.typeName(ref.name)}(${value}, ${path})`;
      case "optional":
        return `(${value} === undefined ? null : ${this.encodeExpr(ref.inner, value, path, depth)})`;
      case "list": {
        const element = this.encodeExpr(ref.element, item, itemPath, depth + 1);
        return `wireEncodeList(${value}, ${path}, ${ref.length ?? "undefined"}, (${item}, ${itemPath}) => ${element})`;
      }
      case "map": {
        const key = `key${depth}`;
        const encodeKey = this.encodeKey(ref.key, key, itemPath);
        const element = this.encodeExpr(ref.value, item, itemPath, depth + 1);
        return `wireEncodeMap(${value}, ${path}, (${key}, ${itemPath}) => ${encodeKey}, (${item}, ${itemPath}) => ${element})`;
      }
      case "unit":
        return "{}";
    }
  }

  /** Expression decoding `wire` (an unknown) to the in-memory form of `ref`. */
  private decodeExpr(ref: TypeRef, wire: string, path: string, depth: number): string {
    const item = `item${depth}`;
    const itemPath = `path${depth}`;
    switch (ref.kind) {
      case "primitive":
        return this.decodePrimitive(ref.primitive, wire, path);
      case "named":
        return `decode${this.typeName(ref.name)}(${wire}, ${path})`;
      case "optional":
        return `wireDecodeOptional(${wire}, (${item}) => ${this.decodeExpr(ref.inner, item, path, depth + 1)})`;
      case "list": {
        const element = this.decodeExpr(ref.element, item, itemPath, depth + 1);
        return `wireDecodeList(${wire}, ${path}, ${ref.length ?? "undefined"}, (${item}, ${itemPath}) => ${element})`;
      }
      case "map": {
        const key = `key${depth}`;
        const decodeKey = this.decodeKey(ref.key, key, itemPath);
        const element = this.decodeExpr(ref.value, item, itemPath, depth + 1);
        return `wireDecodeMap(${wire}, ${path}, (${key}, ${itemPath}) => ${decodeKey}, (${item}, ${itemPath}) => ${element})`;
      }
      case "unit":
        return "{}";
    }
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  private emitEnum(type: EnumType): void {
    const name = this.typeName(type.name);
    const variants = `${convertCase(type.name, "snake").toUpperCase()}_VARIANTS`;
    const literals = type.variants.map((variant) => JSON.stringify(variant));
    const expected = JSON.stringify(`Expected one of ${type.variants.join(", ")}`);
    const out = this.out;

    out.blank();
    out.line(`export type ${name} = ${literals.join(" | ")};`);
    out.blank();
    out.line(`export const ${variants}: readonly ${name}[] = [${literals.join(", ")}];`);
    out.blank();
    out.block(`export function encode${name}(value: ${name}, path = ${JSON.stringify(type.name)}): WireValue {`, () => {
      out.block(`if (!${variants}.includes(value)) {`, () => {
        out.line(`throw new WireError("unknown_variant", ${expected}, path);`);
      });
      out.line("return value;");
    });
    out.blank();
    out.block(`export function decode${name}(wire: unknown, path = ${JSON.stringify(type.name)}): ${name} {`, () => {
      out.line(`const variant = ${variants}.find((candidate) => candidate === wire);`);
      out.block("if (variant === undefined) {", () => {
        out.line(`throw new WireError("unknown_variant", ${expected}, path);`);
      });
      out.line("return variant;");
    });
    this.emitPayloadFunctions(type.name);
  }

  private emitComposite(type: CompositeType): void {
    const name = this.typeName(type.name);
    const typeLiteral = JSON.stringify(type.name);
    const { profile } = this.context;
    const out = this.out;

    out.blank();
    if (type.fields.length === 0) {
      out.line(`export interface ${name} {}`);
    } else {
      out.block(`export interface ${name} {`, () => {
        for (const field of type.fields) {
          const ident = fieldIdent(profile, field.name);
          if (field.type.kind === "list" && field.type.length !== undefined) {
            out.line(`/** Exactly ${field.type.length} elements. */`);
          }
          if (field.type.kind === "optional") {
            out.line(`${ident}?: ${this.typeText(field.type.inner)};`);
          } else {
            out.line(`${ident}: ${this.typeText(field.type)};`);
          }
        }
      });
    }

    out.blank();
    const valueParam = type.fields.length === 0 ? "_value" : "value";
    out.block(`export function encode${name}(${valueParam}: ${name}, path = ${typeLiteral}): WireValue {`, () => {
      out.line("const wire: { [key: string]: WireValue } = {};");
      for (const field of type.fields) {
        const key = JSON.stringify(field.name);
        const access = `value.${fieldIdent(profile, field.name)}`;
        const fieldPath = pathAppend("path", `.${field.name}`);
        if (field.type.kind === "optional") {
          const inner = field.type.inner;
          out.block(`if (${access} !== undefined) {`, () => {
            out.line(`wire[${key}] = ${this.encodeExpr(inner, access, fieldPath, 0)};`);
          });
        } else {
          out.line(`wire[${key}] = ${this.encodeExpr(field.type, access, fieldPath, 0)};`);
        }
      }
      out.line("return wire;");
    });

    out.blank();
    out.block(`export function decode${name}(wire: unknown, path = ${typeLiteral}): ${name} {`, () => {
      out.block("if (!wireIsRecord(wire)) {", () => {
        out.line(`throw new WireError("invalid_value", ${JSON.stringify(`Expected a ${type.name} object`)}, path);`);
      });
      type.fields.forEach((field, index) => {
        const key = JSON.stringify(field.name);
        const fieldPath = pathAppend("path", `.${field.name}`);
        const source =
          field.type.kind === "optional"
            ? `wireField(wire, ${key})`
            : `wireRequired(wire, ${key}, ${typeLiteral}, path)`;
        out.line(`const field${index} = ${this.decodeExpr(field.type, source, fieldPath, 0)};`);
      });
      const required = type.fields
        .map((field, index) => ({ field, index }))
        .filter(({ field }) => field.type.kind !== "optional")
        .map(({ field, index }) => `${fieldIdent(profile, field.name)}: field${index}`);
      out.line(`const value: ${name} = ${required.length === 0 ? "{}" : `{ ${required.join(", ")} }`};`);
      type.fields.forEach((field, index) => {
        if (field.type.kind !== "optional") return;
        out.line(`if (field${index} !== undefined) value.${fieldIdent(profile, field.name)} = field${index};`);
      });
      out.line("return value;");
    });
    this.emitPayloadFunctions(type.name);
  }

  private emitPayloadFunctions(typeName: string): void {
    const name = this.typeName(typeName);
    const out = this.out;
    out.blank();
    out.block(`export function serialize${name}(value: ${name}): Uint8Array {`, () => {
      out.line(`return wireToBytes(encode${name}(value));`);
    });
    out.blank();
    out.block(`export function deserialize${name}(bytes: Uint8Array): ${name} {`, () => {
      out.line(`return decode${name}(wireFromBytes(bytes, ${JSON.stringify(typeName)}));`);
    });
  }

  // ==========================================================================
  // Client
  // ==========================================================================

  private emitClient(): void {
    const client = `${typeIdent(this.context.profile, this.context.moduleName)}Client`;
    const out = this.out;

    banner(out, "Client");
    out.line("/** Typed wrappers over the native call boundary. */");
    out.block(`export class ${client} {`, () => {
      out.line("readonly #boundary: NativeBoundary;");
      out.blank();
      out.block("private constructor(boundary: NativeBoundary) {", () => {
        out.line("this.#boundary = boundary;");
      });
      out.blank();
      out.line("/** Initialize the native runtime and bind a client to it. */");
      out.block(`static connect(boundary: NativeBoundary): ${client} {`, () => {
        out.line("const status = boundary.init();");
        out.line(`if (status !== NativeStatus.OK) throw new NativeCallError("init", status);`);
        out.line(`return new ${client}(boundary);`);
      });
      out.blank();
      out.block("#invoke<T>(method: string, input: Uint8Array, decode: (bytes: Uint8Array) => T): T {", () => {
        out.line("const result = this.#boundary.call(method, input);");
        out.line("if (!result.ok) throw new NativeCallError(method, result.status);");
        out.block("try {", () => {
          out.line("return decode(result.buffer.bytes);");
        }, "} finally {");
        out.indented(() => out.line("this.#boundary.release(result.buffer);"));
        out.line("}");
      });
      for (const fn of this.context.resolved.functions) {
        out.blank();
        this.emitMethod(fn);
      }
    });
  }

  private emitMethod(fn: FunctionContract): void {
    const method = functionIdent(this.context.profile, fn.name);
    const methodLiteral = JSON.stringify(fn.name);
    const params = fn.input.kind === "unit" ? "" : `input: ${this.typeText(fn.input)}`;
    const call = `this.#invoke(${methodLiteral}, ${this.inputBytes(fn.input)}, ${this.outputDecoder(fn)})`;

    this.out.block(`${method}(${params}): ${this.typeText(fn.output)} {`, () => {
      this.out.line(fn.output.kind === "unit" ? `${call};` : `return ${call};`);
    });
  }

  private inputBytes(ref: TypeRef): string {
    switch (ref.kind) {
      case "unit":
        return "WIRE_UNIT_BYTES";
      case "named":
        return `serialize${this.typeName(ref.name)}(input)`;
      default:
        return `wireToBytes(${this.encodeExpr(ref, "input", JSON.stringify(formatTypeRef(ref)), 0)})`;
    }
  }

  private outputDecoder(fn: FunctionContract): string {
    const ref = fn.output;
    switch (ref.kind) {
      case "unit":
        return `(bytes) => wireDecodeUnit(bytes, ${JSON.stringify(fn.name)})`;
      case "named":
        return `deserialize${this.typeName(ref.name)}`;
      default: {
        const path = JSON.stringify(formatTypeRef(ref));
        return `(bytes) => ${this.decodeExpr(ref, `wireFromBytes(bytes, ${path})`, path, 0)}`;
      }
    }
  }
}

export function emitTypeScript(context: EmitContext): GeneratedFile[] {
  const contents = new TypeScriptEmitter(context).emit();
  return [{ path: `${convertCase(context.moduleName, "snake")}.ts`, contents }];
}
