// Go emitter
//
// Structs with json tags, string-typed enums with a checking UnmarshalJSON,
// and the I64/U64/UUID helper types that give encoding/json the wire forms
// of 64-bit integers and identifiers. No call wrappers.

import type { CompositeType, EnumType, TypeRef } from "@ffidl/schema";

import { splitWords } from "./casing.ts";
import { loadTemplate, type EmitContext, type GeneratedFile } from "./context.ts";
import { fieldIdent, typeIdent, variantIdent } from "./profile.ts";
import { CodeWriter, alignColumns } from "./writer.ts";

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

/** Go package name: the module's words, lower case, run together. */
export function goPackageName(context: EmitContext): string {
  const name = splitWords(context.moduleName).join("").toLowerCase();
  return context.profile.reserved.has(name) ? `${name}_` : name;
}

class GoEmitter {
  private readonly out = new CodeWriter("\t");

  constructor(private readonly context: EmitContext) {}

  private typeName(name: string): string {
    return typeIdent(this.context.profile, name);
  }

  private typeText(ref: TypeRef): string {
    const { primitives } = this.context.profile;
    switch (ref.kind) {
      case "primitive":
        return primitives[ref.primitive];
      case "named":
        return this.typeName(ref.name);
      case "optional":
        return `*${this.typeText(ref.inner)}`;
      case "list":
        return ref.length === undefined ? `[]${this.typeText(ref.element)}` : `[${ref.length}]${this.typeText(ref.element)}`;
      case "map":
        return `map[${primitives[ref.key]}]${this.typeText(ref.value)}`;
      case "unit":
        return "struct{}";
    }
  }

  emit(): string {
    const { resolved } = this.context;
    const out = this.out;
    const imports = ["encoding/json", "fmt", "strconv", "strings"];
    const timestamps = resolved.order.some(
      (type) => type.kind === "composite" && type.fields.some((field) => usesTimestamp(field.type)),
    );
    if (timestamps) imports.push("time");

    out.line(`// ${this.context.header}`);
    out.blank();
    out.line(`package ${goPackageName(this.context)}`);
    out.blank();
    out.block("import (", () => {
      for (const path of imports) out.line(JSON.stringify(path));
    }, ")");
    out.blank();
    out.lines(loadTemplate("go_prelude.go.txt"));
    if (timestamps) {
      out.blank();
      out.lines(loadTemplate("go_timestamp.go.txt"));
    }

    for (const type of resolved.order) {
      out.blank();
      if (type.kind === "enum") this.emitEnum(type);
      else this.emitStruct(type);
      out.blank();
      this.emitCodec(type.name);
    }
    return out.toString();
  }

  private emitEnum(type: EnumType): void {
    const out = this.out;
    const name = this.typeName(type.name);
    const constants = type.variants.map((variant) => `${name}${variantIdent(this.context.profile, variant)}`);

    out.line(`// ${name} is the schema enum ${type.name}.`);
    out.line(`type ${name} string`);
    out.blank();
    out.block("const (", () => {
      const rows = type.variants.map((variant) => [
        `${name}${variantIdent(this.context.profile, variant)}`,
        `${name} = ${JSON.stringify(variant)}`,
      ]);
      out.lines(alignColumns(rows));
    }, ")");
    out.blank();
    out.line(`// UnmarshalJSON accepts only the declared variants of ${name}.`);
    out.block(`func (v *${name}) UnmarshalJSON(data []byte) error {`, () => {
      out.line("var s string");
      out.block("if err := json.Unmarshal(data, &s); err != nil {", () => out.line("return err"));
      out.line(`switch ${name}(s) {`);
      out.line(`case ${constants.join(", ")}:`);
      out.indented(() => {
        out.line(`*v = ${name}(s)`);
        out.line("return nil");
      });
      out.line("}");
      out.line(`return fmt.Errorf("unknown ${name} variant %q", s)`);
    });
  }

  private emitStruct(type: CompositeType): void {
    const out = this.out;
    const name = this.typeName(type.name);
    out.line(`// ${name} is the schema type ${type.name}.`);
    if (type.fields.length === 0) {
      out.line(`type ${name} struct{}`);
      return;
    }
    out.block(`type ${name} struct {`, () => {
      const rows = type.fields.map((field) => {
        const options = field.type.kind === "optional" ? ",omitempty" : "";
        return [
          fieldIdent(this.context.profile, field.name),
          this.typeText(field.type),
          "`json:" + JSON.stringify(field.name + options) + "`",
        ];
      });
      out.lines(alignColumns(rows));
    });
  }

  private emitCodec(typeName: string): void {
    const out = this.out;
    const name = this.typeName(typeName);
    out.line("// Serialize encodes v in the ffidl wire format.");
    out.block(`func (v *${name}) Serialize() ([]byte, error) {`, () => out.line("return json.Marshal(v)"));
    out.blank();
    out.line(`// Deserialize${name} decodes a ${name} from the ffidl wire format.`);
    out.block(`func Deserialize${name}(data []byte) (*${name}, error) {`, () => {
      out.line(`var v ${name}`);
      out.block("if err := json.Unmarshal(data, &v); err != nil {", () => out.line("return nil, err"));
      out.line("return &v, nil");
    });
  }
}

export function emitGo(context: EmitContext): GeneratedFile[] {
  const pkg = goPackageName(context);
  return [
    { path: "go.mod", contents: `// ${context.header}\n\nmodule ${pkg}\n\ngo 1.21\n` },
    { path: `${pkg}.go`, contents: new GoEmitter(context).emit() },
  ];
}
