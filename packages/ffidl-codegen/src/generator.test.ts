// Tests for target dispatch, support checks and the Rust, Go and F# output

import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { parseSchema, resolveSchema, type ResolvedSchema } from "@ffidl/schema";
import { GenerateError, GenerateErrorKind } from "./errors.ts";
import { generate, tryGenerate } from "./generator.ts";
import { FSHARP, GO, PROFILES, RUST, TARGET_IDS, TYPESCRIPT, type LanguageProfile } from "./profile.ts";

const FIXTURES = new URL("../../../test-fixtures/", import.meta.url);

const workspace = resolveSchema(parseSchema(readFileSync(new URL("schemas/workspace.yaml", FIXTURES), "utf8")));

const GRAPH_STORE = `
schema: graph_store
types:
  Node:
    id: uuid
    title: string
    weight: i64
    parent: Node?
    labels: map<string, string>
  Status:
    enum: [Draft, in_review]
  Marker: {}
`;

function resolve(document: string): ResolvedSchema {
  return resolveSchema(parseSchema(document));
}

function generateFailure(resolved: ResolvedSchema, profile: LanguageProfile): GenerateError {
  const result = tryGenerate(resolved, profile);
  if (result.ok) throw new Error("expected generation to fail");
  return result.error;
}

/** Contents of one generated file, split into trimmed lines. */
function linesOf(resolved: ResolvedSchema, profile: LanguageProfile, path: string): string[] {
  const file = generate(resolved, profile, { sourceName: "test.yaml" }).files.find((f) => f.path === path);
  if (file === undefined) throw new Error(`no file ${path}`);
  return file.contents.split("\n").map((line) => line.trim());
}

/** The line following `line`, for checking an attribute sits on its field. */
function after(lines: string[], line: string): string | undefined {
  const index = lines.indexOf(line);
  if (index < 0) throw new Error(`missing line: ${line}`);
  return lines[index + 1];
}

describe("generate", () => {
  it("writes each target's files", () => {
    const graph = resolve(GRAPH_STORE);
    const paths = TARGET_IDS.map((id) => generate(graph, PROFILES[id]).files.map((file) => file.path));
    expect(paths).toEqual([
      ["graph_store.ts"],
      ["Cargo.toml", "src/lib.rs"],
      ["go.mod", "graphstore.go"],
      ["GraphStore.fsproj", "Generated.fs"],
    ]);
  });

  it("is byte-identical across runs", () => {
    for (const id of TARGET_IDS) {
      const first = tryGenerate(workspace, PROFILES[id], { sourceName: "workspace.yaml" });
      const second = tryGenerate(workspace, PROFILES[id], { sourceName: "workspace.yaml" });
      expect(second).toEqual(first);
    }
  });

  it("starts every source with a generated-code header", () => {
    const source = generate(workspace, GO, { sourceName: "workspace.yaml" });
    for (const file of source.files) {
      expect(file.contents.split("\n")[0]).toBe("// Code generated by ffidl from workspace.yaml. DO NOT EDIT.");
    }
  });

  it("takes the module name from options before the schema", () => {
    const paths = generate(workspace, TYPESCRIPT, { moduleName: "GraphClient" }).files.map((file) => file.path);
    expect(paths).toEqual(["graph_client.ts"]);
  });
});

describe("unsupported constructs", () => {
  it("fails only the target that lacks the construct", () => {
    const error = generateFailure(workspace, FSHARP);
    expect(error.kind).toBe(GenerateErrorKind.UNSUPPORTED_CONSTRUCT);
    expect(error.typeName).toBe("Document");
    expect(error.construct).toBe("non-string-map-key");
    expect(error.message).toBe("Document uses non-string-map-key, which the fsharp target does not support");

    expect(tryGenerate(workspace, RUST).ok).toBe(true);
  });

  it("rejects fixed lists for F#", () => {
    const error = generateFailure(resolve("types:\n  Pair:\n    xy: '[f64; 2]'\n"), FSHARP);
    expect(error.construct).toBe("fixed-list");
  });

  it("rejects optionals of optionals everywhere", () => {
    const resolved = resolve("types:\n  Odd:\n    value: i32??\n");
    for (const id of TARGET_IDS) {
      expect(generateFailure(resolved, PROFILES[id])).toMatchObject({ typeName: "Odd", construct: "nested-optional" });
    }
  });

  it("checks function contracts", () => {
    const error = generateFailure(resolve("functions:\n  lookup:\n    output: i32??\n"), TYPESCRIPT);
    expect(error).toMatchObject({ typeName: "lookup", construct: "nested-optional" });
  });

  it("reports names that collide after case conversion", () => {
    const error = generateFailure(resolve("types:\n  Row:\n    parent_id: uuid\n    parentId: uuid\n"), TYPESCRIPT);
    expect(error.construct).toBe("name-collision:parent_id/parentId");
    expect(error.typeName).toBe("Row");
  });

  it("reports a Go enum constant that repeats a type name", () => {
    const resolved = resolve("types:\n  Status:\n    enum: [Draft]\n  StatusDraft: {}\n");
    expect(generateFailure(resolved, GO)).toMatchObject({
      typeName: "Status",
      construct: "name-collision:StatusDraft/Status.Draft",
    });
    expect(tryGenerate(resolved, RUST).ok).toBe(true);
  });

  it("reports a Go codec function that repeats a type name", () => {
    const resolved = resolve("types:\n  Node: {}\n  DeserializeNode: {}\n");
    expect(generateFailure(resolved, GO)).toMatchObject({
      typeName: "Node",
      construct: "name-collision:DeserializeNode/Node.deserialize",
    });
  });

  it("reports a Rust payload wrapper that repeats a type name", () => {
    const resolved = resolve("types:\n  AddNodeInput: {}\nfunctions:\n  addNode:\n    input: '[string]'\n");
    expect(generateFailure(resolved, RUST)).toMatchObject({
      typeName: "addNode",
      construct: "name-collision:AddNodeInput/addNode.input",
    });
    expect(tryGenerate(resolved, GO).ok).toBe(true);
  });

  it("throws from generate", () => {
    expect(() => generate(workspace, FSHARP)).toThrow(GenerateError);
  });
});

describe("rust output", () => {
  const lines = linesOf(workspace, RUST, "src/lib.rs");

  it("carries 64-bit integers as strings and bytes as base64", () => {
    expect(after(lines, "pub struct Everything {")).toBe("pub flag: bool,");
    expect(lines[lines.indexOf("pub big: i64,") - 1]).toBe(
      '#[serde_as(as = "serde_with::PickFirst<(serde_with::DisplayFromStr, _)>")]',
    );
    expect(lines[lines.indexOf("pub blob: Vec<u8>,") - 1]).toBe('#[serde_as(as = "serde_with::base64::Base64")]');
  });

  it("renames fields whose Rust name differs from the wire name", () => {
    expect(after(lines, '#[serde(rename = "createdAt")]')).toBe("pub created_at: chrono::DateTime<chrono::Utc>,");
  });

  it("writes timestamps through the millisecond adapter", () => {
    expect(lines[lines.indexOf('#[serde(rename = "createdAt")]') - 1]).toBe('#[serde_as(as = "WireTimestamp")]');
    expect(lines).toContain("pub struct WireTimestamp;");
    expect(lines).toContain(
      "serializer.serialize_str(&value.to_rfc3339_opts(chrono::SecondsFormat::Millis, true))",
    );
    expect(linesOf(resolve(GRAPH_STORE), RUST, "src/lib.rs")).not.toContain("pub struct WireTimestamp;");
  });

  it("adapts fixed lists of any length", () => {
    const wide = linesOf(resolve("types:\n  Wide:\n    xs: '[f64; 40]'\n"), RUST, "src/lib.rs");
    expect(after(wide, '#[serde_as(as = "[_; 40]")]')).toBe("pub xs: [f64; 40],");
    expect(after(wide, "#[serde_with::serde_as]")).toBe(
      "#[derive(Debug, Clone, PartialEq, Serialize, Deserialize)]",
    );
  });

  it("omits absent optionals and reads null lists as empty", () => {
    expect(after(lines, '#[serde(default, skip_serializing_if = "Option::is_none")]')).toBe(
      "pub label: Option<String>,",
    );
    expect(lines[lines.indexOf("pub children: Vec<TreeNode>,") - 1]).toBe(
      '#[serde_as(as = "serde_with::DefaultOnNull<Vec<_>>")]',
    );
  });

  it("boxes recursion through an optional", () => {
    const chain = linesOf(resolve("types:\n  Chain:\n    next: Chain?\n"), RUST, "src/lib.rs");
    expect(chain).toContain("pub next: Option<Box<Chain>>,");
  });

  it("boxes an optional fixed list that holds its owner", () => {
    const rec = linesOf(resolve("types:\n  Rec:\n    kids: '[Rec; 2]?'\n"), RUST, "src/lib.rs");
    expect(rec).toContain("pub kids: Option<Box<[Rec; 2]>>,");
    expect(rec[rec.indexOf("pub kids: Option<Box<[Rec; 2]>>,") - 2]).toBe('#[serde_as(as = "Option<Box<[_; 2]>>")]');
  });

  it("escapes reserved field names", () => {
    const tagged = linesOf(resolve("types:\n  Tagged:\n    type: string\n"), RUST, "src/lib.rs");
    expect(after(tagged, '#[serde(rename = "type")]')).toBe("pub type_: String,");
  });

  it("emits a handler trait and a dispatch arm per function", () => {
    expect(lines).toContain("fn add_node(&self, input: Node) -> Result<Node, String>;");
    expect(lines).toContain("fn snapshot(&self) -> Result<Document, String>;");
    expect(after(lines, '"connect" => {')).toBe(
      "let input = HyperEdge::deserialize(input).map_err(DispatchError::Parse)?;",
    );
    expect(lines).toContain('Ok(b"{}".to_vec())');
    expect(lines).toContain("other => Err(DispatchError::UnknownMethod(other.to_string())),");
  });

  it("renames enum variants that are not Rust case", () => {
    const graph = linesOf(resolve(GRAPH_STORE), RUST, "src/lib.rs");
    expect(after(graph, '#[serde(rename = "in_review")]')).toBe("InReview,");
    expect(graph).toContain("pub struct Marker {}");
  });
});

describe("go output", () => {
  const lines = linesOf(workspace, GO, "workspace.go");

  it("aligns struct fields and tags", () => {
    expect(lines).toContain("Big" + " ".repeat(7) + "I64" + " ".repeat(7) + '`json:"big"`');
    expect(lines).toContain('Label *string `json:"label,omitempty"`');
  });

  it("carries timestamps in the millisecond helper, only when a timestamp is used", () => {
    expect(lines).toContain('"time"');
    expect(lines).toContain("CreatedAt Timestamp " + '`json:"createdAt"`');
    expect(lines).toContain("type Timestamp struct{ time.Time }");
    expect(lines).toContain('const timestampLayout = "2006-01-02T15:04:05.000Z07:00"');
    expect(lines).toContain("if t.Nanosecond()%int(time.Millisecond) != 0 {");

    const graph = linesOf(resolve(GRAPH_STORE), GO, "graphstore.go");
    expect(graph).not.toContain('"time"');
    expect(graph).not.toContain("type Timestamp struct{ time.Time }");
  });

  it("writes nil bytes as an empty string", () => {
    expect(lines).toContain("Blob" + " ".repeat(6) + "Bytes" + " ".repeat(5) + '`json:"blob"`');
    expect(lines).toContain("func (v Bytes) MarshalJSON() ([]byte, error) {");
    expect(lines).toContain("return []byte(`\"\"`), nil");
  });

  it("checks enum variants on decode", () => {
    expect(lines).toContain('StatusDraft' + " ".repeat(5) + 'Status = "Draft"');
    expect(lines).toContain("case StatusDraft, StatusPublished, StatusArchived:");
  });

  it("emits a codec per type", () => {
    expect(lines).toContain("func (v *Node) Serialize() ([]byte, error) {");
    expect(lines).toContain("func DeserializeNode(data []byte) (*Node, error) {");
    expect(lines).toContain("package workspace");
  });
});

describe("fsharp output", () => {
  const lines = linesOf(resolve(GRAPH_STORE), FSHARP, "Generated.fs");

  it("declares one recursive type group", () => {
    expect(lines).toContain("namespace GraphStore");
    expect(lines).toContain("type Node =");
    expect(lines).toContain("and Status =");
    expect(lines).toContain("and Marker() =");
  });

  it("maps fields to their wire names", () => {
    expect(lines).toContain('{ [<JsonPropertyName("id")>] Id: Guid');
    expect(lines).toContain(
      '[<JsonPropertyName("weight"); JsonNumberHandling(JsonNumberHandling.WriteAsString ||| JsonNumberHandling.AllowReadingFromString)>] Weight: int64',
    );
    expect(lines).toContain('[<JsonPropertyName("labels")>] Labels: Map<string, string> }');
    expect(lines).toContain('[<JsonPropertyName("parent")>] Parent: Node option');
  });

  it("keeps variant wire names", () => {
    expect(lines).toContain("| Draft");
    expect(lines).toContain('| [<JsonName("in_review")>] InReview');
  });

  it("configures the serializer for the wire format", () => {
    expect(lines).toContain(".WithSkippableOptionFields(SkippableOptionFields.Always)");
    expect(lines).toContain(".WithUnionUnwrapFieldlessTags()");
    expect(lines).toContain("let deserialize (bytes: byte[]) : Node = Codec.deserialize<Node> bytes");
  });

  it("keeps timestamps to milliseconds through a converter", () => {
    const stamped = linesOf(resolve("types:\n  Event:\n    at: timestamp\n"), FSHARP, "Generated.fs");
    expect(stamped).toContain("type WireTimestampConverter() =");
    expect(stamped).toContain("if value.Ticks % TimeSpan.TicksPerMillisecond <> 0L then");
    expect(after(stamped, "type WireTimestampConverter() =")).toBe("inherit JsonConverter<DateTimeOffset>()");
    expect(stamped).toContain('{ [<JsonPropertyName("at")>] At: DateTimeOffset }');
    expect(after(stamped, ".ToJsonSerializerOptions()")).toBe("options.Converters.Add(WireTimestampConverter())");

    expect(lines).not.toContain("type WireTimestampConverter() =");
    expect(after(lines, ".ToJsonSerializerOptions()")).toBe("options");
  });
});
