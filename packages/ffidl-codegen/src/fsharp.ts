// F# emitter
//
// One recursive `type ... and ...` group, so declaration order never matters
// to the compiler. Records carry System.Text.Json attributes; the `Codec`
// module configures FSharp.SystemTextJson for the wire format, with a
// converter that keeps timestamps to milliseconds.

import type { CompositeType, EnumType, FieldDef, TypeRef } from "@ffidl/schema";

import { convertCase } from "./casing.ts";
import { loadTemplate, type EmitContext, type GeneratedFile } from "./context.ts";
import { fieldIdent, typeIdent, variantIdent } from "./profile.ts";
import { CodeWriter } from "./writer.ts";

const STRING_NUMBERS =
  "JsonNumberHandling(JsonNumberHandling.WriteAsString ||| JsonNumberHandling.AllowReadingFromString)";

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

function carries64BitInteger(ref: TypeRef): boolean {
  switch (ref.kind) {
    case "primitive":
      return ref.primitive === "i64" || ref.primitive === "u64";
    case "optional":
      return carries64BitInteger(ref.inner);
    case "list":
      return carries64BitInteger(ref.element);
    case "map":
      return carries64BitInteger(ref.value);
    default:
      return false;
  }
}

class FSharpEmitter {
  private readonly out = new CodeWriter("    ");

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
        return `${this.typeText(ref.inner)} option`;
      case "list":
        return `${this.typeText(ref.element)} list`;
      case "map":
        return `Map<${primitives[ref.key]}, ${this.typeText(ref.value)}>`;
      case "unit":
        return "unit";
    }
  }

  emit(): string {
    const { resolved } = this.context;
    const out = this.out;
    const timestamps = [
      ...resolved.order.flatMap((type) => (type.kind === "composite" ? type.fields.map((field) => field.type) : [])),
      ...resolved.functions.flatMap((fn) => [fn.input, fn.output]),
    ].some(usesTimestamp);

    out.line(`// ${this.context.header}`);
    out.blank();
    out.line(`namespace ${convertCase(this.context.moduleName, "pascal")}`);
    out.blank();
    out.line("open System");
    out.line("open System.Text.Json");
    out.line("open System.Text.Json.Serialization");
    if (timestamps) {
      out.blank();
      out.lines(loadTemplate("fsharp_timestamp.fs.txt"));
    }

    resolved.order.forEach((type, index) => {
      const keyword = index === 0 ? "type" : "and";
      out.blank();
      if (type.kind === "enum") this.emitUnion(keyword, type);
      else if (type.fields.length === 0) this.emitEmpty(keyword, type);
      else this.emitRecord(keyword, type);
    });

    out.blank();
    this.emitCodecModule(timestamps);
    for (const type of resolved.order) {
      const name = this.typeName(type.name);
      out.blank();
      out.line("[<RequireQualifiedAccess>]");
      out.block(`module ${name}Codec =`, () => {
        out.line(`let serialize (value: ${name}) : byte[] = Codec.serialize value`);
        out.line(`let deserialize (bytes: byte[]) : ${name} = Codec.deserialize<${name}> bytes`);
      }, "");
    }
    return out.toString();
  }

  private emitUnion(keyword: string, type: EnumType): void {
    this.out.block(`${keyword} ${this.typeName(type.name)} =`, () => {
      for (const variant of type.variants) {
        const ident = variantIdent(this.context.profile, variant);
        const attribute = ident === variant ? "" : `[<JsonName(${JSON.stringify(variant)})>] `;
        this.out.line(`| ${attribute}${ident}`);
      }
    }, "");
  }

  /** A record needs at least one field; an empty composite is a class that serializes as `{}`. */
  private emitEmpty(keyword: string, type: CompositeType): void {
    const name = this.typeName(type.name);
    this.out.block(`${keyword} ${name}() =`, () => {
      this.out.line(`override _.Equals(other: obj) = other :? ${name}`);
      this.out.line("override _.GetHashCode() = 0");
    }, "");
  }

  private emitRecord(keyword: string, type: CompositeType): void {
    const out = this.out;
    out.line(`${keyword} ${this.typeName(type.name)} =`);
    out.indented(() => {
      type.fields.forEach((field, index) => {
        const open = index === 0 ? "{ " : "  ";
        const close = index === type.fields.length - 1 ? " }" : "";
        out.line(`${open}${this.fieldText(field)}${close}`);
      });
    });
  }

  private fieldText(field: FieldDef): string {
    const attributes = [`JsonPropertyName(${JSON.stringify(field.name)})`];
    if (carries64BitInteger(field.type)) attributes.push(STRING_NUMBERS);
    const ident = fieldIdent(this.context.profile, field.name);
    return `[<${attributes.join("; ")}>] ${ident}: ${this.typeText(field.type)}`;
  }

  private emitCodecModule(timestamps: boolean): void {
    const out = this.out;
    out.line("/// Serializer options for the ffidl wire format.");
    out.block("module Codec =", () => {
      out.line("let options =");
      out.indented(() => {
        out.line("let options =");
        out.indented(() => {
          out.line("JsonFSharpOptions.Default()");
          out.indented(() => {
            out.line(".WithSkippableOptionFields(SkippableOptionFields.Always)");
            out.line(".WithUnionUnwrapFieldlessTags()");
            out.line(".ToJsonSerializerOptions()");
          });
        });
        if (timestamps) out.line("options.Converters.Add(WireTimestampConverter())");
        out.line("options");
      });
      out.blank();
      out.line("let serialize<'T> (value: 'T) : byte[] =");
      out.indented(() => out.line("JsonSerializer.SerializeToUtf8Bytes<'T>(value, options)"));
      out.blank();
      out.line("let deserialize<'T> (bytes: byte[]) : 'T =");
      out.indented(() => out.line("JsonSerializer.Deserialize<'T>(ReadOnlySpan<byte>(bytes), options)"));
    }, "");
  }
}

function projectFile(context: EmitContext): string {
  return [
    `<!-- ${context.header} -->`,
    '<Project Sdk="Microsoft.NET.Sdk">',
    "  <PropertyGroup>",
    "    <TargetFramework>net8.0</TargetFramework>",
    "  </PropertyGroup>",
    "  <ItemGroup>",
    '    <Compile Include="Generated.fs" />',
    "  </ItemGroup>",
    "  <ItemGroup>",
    '    <PackageReference Include="FSharp.SystemTextJson" Version="1.3.13" />',
    "  </ItemGroup>",
    "</Project>",
    "",
  ].join("\n");
}

export function emitFSharp(context: EmitContext): GeneratedFile[] {
  return [
    { path: `${convertCase(context.moduleName, "pascal")}.fsproj`, contents: projectFile(context) },
    { path: "Generated.fs", contents: new FSharpEmitter(context).emit() },
  ];
}
