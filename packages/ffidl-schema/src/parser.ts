// Schema document parser.
//
// Reads the YAML schema document into a Schema. Only syntax and structure
// are checked here; name resolution and cycle checks happen in the resolver.
//
//   schema: workspace
//   types:
//     Node:
//       id: uuid
//       position: [f64]
//     Color:
//       enum: [Red, Green]
//   functions:
//     addNode:
//       input: Node
//       output: Unit

import { LineCounter, isMap, isNode, isScalar, isSeq, parseDocument } from "yaml";
import type { Pair, YAMLMap } from "yaml";

import { ParseError } from "./errors.ts";
import {
  UNIT_NAME,
  isPrimitiveKind,
  unit,
  type CompositeType,
  type EnumType,
  type FieldDef,
  type FunctionContract,
  type NamedType,
  type Schema,
  type SourceLocation,
  type TypeRef,
} from "./model.ts";
import { TypeExprError, parseTypeExpr } from "./type_expr.ts";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const TOP_LEVEL_KEYS = new Set(["schema", "types", "functions", "ui"]);
const FUNCTION_KEYS = new Set(["input", "output"]);
const ENUM_MARKER = "enum";

export type ParseResult = { ok: true; schema: Schema } | { ok: false; error: ParseError };

class DocumentParser {
  constructor(private readonly lines: LineCounter) {}

  locate(node: unknown): SourceLocation | null {
    if (!isNode(node) || !node.range) return null;
    const pos = this.lines.linePos(node.range[0]);
    return { line: pos.line, column: pos.col };
  }

  /** Read a mapping key that must be an identifier. */
  private identifierKey(pair: Pair<unknown, unknown>, what: string, context: string): string {
    const key = pair.key;
    if (!isScalar(key) || typeof key.value !== "string") {
      throw ParseError.syntax(`Expected a ${what} name`, this.locate(key), context);
    }
    if (!IDENTIFIER.test(key.value)) {
      throw ParseError.syntax(`Invalid ${what} name "${key.value}"`, this.locate(key), context);
    }
    return key.value;
  }

  /** Mapping, or null for an empty value. */
  private optionalMap(node: unknown, context: string): YAMLMap<unknown, unknown> | null {
    if (node === null || node === undefined) return null;
    if (isScalar(node) && node.value === null) return null;
    if (!isMap(node)) {
      throw ParseError.syntax("Expected a mapping", this.locate(node), context);
    }
    return node;
  }

  parse(root: unknown): Schema {
    const top = this.optionalMap(root, "document");
    const schema: Schema = { types: [], functions: [] };
    if (!top) return schema;

    for (const pair of top.items) {
      const key = pair.key;
      const section = isScalar(key) && typeof key.value === "string" ? key.value : null;
      if (section === null || !TOP_LEVEL_KEYS.has(section)) {
        const found = section === null ? "a non-string key" : `"${section}"`;
        throw ParseError.syntax(
          `Unknown top-level key ${found}; expected schema, types or functions`,
          this.locate(key),
          "document",
        );
      }
      switch (section) {
        case "schema":
          schema.name = this.schemaName(pair.value);
          break;
        case "types":
          schema.types.push(...this.types(pair.value));
          break;
        case "functions":
          schema.functions.push(...this.functions(pair.value));
          break;
        case "ui":
          break;
      }
    }
    return schema;
  }

  private schemaName(node: unknown): string {
    if (isScalar(node) && (typeof node.value === "string" || typeof node.value === "number")) {
      return String(node.value);
    }
    throw ParseError.syntax("Expected the schema name to be a string", this.locate(node), "schema");
  }

  private types(node: unknown): NamedType[] {
    const section = this.optionalMap(node, "types");
    if (!section) return [];
    return section.items.map((pair) => {
      const name = this.identifierKey(pair, "type", "types");
      if (isPrimitiveKind(name) || name === UNIT_NAME) {
        throw ParseError.syntax(`Type name "${name}" shadows a built-in type`, this.locate(pair.key), "types");
      }
      return this.namedType(name, pair);
    });
  }

  private namedType(name: string, pair: Pair<unknown, unknown>): NamedType {
    const context = `types.${name}`;
    const location = this.locate(pair.key);
    const body = this.optionalMap(pair.value, context);
    if (!body) return { kind: "composite", name, fields: [], location: location ?? undefined };

    const marker = body.items.find(
      (item) => isScalar(item.key) && item.key.value === ENUM_MARKER && isSeq(item.value),
    );
    if (marker) {
      if (body.items.length !== 1) {
        throw ParseError.syntax(`An enum must declare only "${ENUM_MARKER}"`, this.locate(pair.value), context);
      }
      return this.enumType(name, marker.value, location);
    }
    return this.compositeType(name, body, location);
  }

  private enumType(name: string, node: unknown, location: SourceLocation | null): EnumType {
    const context = `types.${name}.${ENUM_MARKER}`;
    if (!isSeq(node)) {
      throw ParseError.syntax("Expected a list of variant names", this.locate(node), context);
    }
    if (node.items.length === 0) {
      throw ParseError.syntax("An enum must declare at least one variant", this.locate(node), context);
    }
    const variants: string[] = [];
    for (const item of node.items) {
      if (!isScalar(item) || typeof item.value !== "string" || !IDENTIFIER.test(item.value)) {
        throw ParseError.syntax("Expected a variant name", this.locate(item), context);
      }
      if (variants.includes(item.value)) {
        throw ParseError.syntax(`Duplicate variant "${item.value}"`, this.locate(item), context);
      }
      variants.push(item.value);
    }
    return { kind: "enum", name, variants, location: location ?? undefined };
  }

  private compositeType(name: string, body: YAMLMap<unknown, unknown>, location: SourceLocation | null): CompositeType {
    const fields: FieldDef[] = [];
    for (const pair of body.items) {
      const fieldName = this.identifierKey(pair, "field", `types.${name}`);
      const fieldLocation = this.locate(pair.key);
      if (fields.some((field) => field.name === fieldName)) {
        throw ParseError.duplicateField(name, fieldName, fieldLocation);
      }
      const type = this.typeExpr(pair.value, `types.${name}.${fieldName}`, false);
      fields.push({ name: fieldName, type, location: fieldLocation ?? undefined });
    }
    return { kind: "composite", name, fields, location: location ?? undefined };
  }

  private functions(node: unknown): FunctionContract[] {
    const section = this.optionalMap(node, "functions");
    if (!section) return [];
    return section.items.map((pair) => {
      const name = this.identifierKey(pair, "function", "functions");
      const context = `functions.${name}`;
      const location = this.locate(pair.key) ?? undefined;
      const body = this.optionalMap(pair.value, context);
      let input: TypeRef = unit;
      let output: TypeRef = unit;
      for (const entry of body?.items ?? []) {
        const key = entry.key;
        const which = isScalar(key) && typeof key.value === "string" ? key.value : "";
        if (!FUNCTION_KEYS.has(which)) {
          throw ParseError.syntax("Expected input or output", this.locate(key), context);
        }
        const ref = this.typeExpr(entry.value, `${context}.${which}`, true);
        if (which === "input") input = ref;
        else output = ref;
      }
      return { name, input, output, location };
    });
  }

  private typeExpr(node: unknown, context: string, allowUnit: boolean): TypeRef {
    const text = typeExprText(node);
    if (text === null) {
      throw ParseError.syntax("Expected a type expression", this.locate(node), context);
    }
    try {
      return parseTypeExpr(text, { allowUnit });
    } catch (error) {
      if (error instanceof TypeExprError) {
        throw ParseError.syntax(
          `Invalid type expression "${text}": ${error.message} (offset ${error.offset})`,
          this.locate(node),
          context,
        );
      }
      throw error;
    }
  }
}

/**
 * Recover the type-expression text from a YAML node. An unquoted `[uuid]`
 * is a one-element flow sequence, so it is read back as `[uuid]`.
 */
function typeExprText(node: unknown): string | null {
  if (isScalar(node)) {
    return typeof node.value === "string" ? node.value : null;
  }
  if (isSeq(node) && node.items.length === 1) {
    const inner = typeExprText(node.items[0]);
    return inner === null ? null : `[${inner}]`;
  }
  return null;
}

/**
 * Parse a schema document.
 *
 * @param document - YAML text with `types` and `functions` sections
 * @returns The schema, in declaration order
 * @throws ParseError on malformed input or a duplicate field
 */
export function parseSchema(document: string): Schema {
  const lines = new LineCounter();
  // Duplicate type and function names are the resolver's to report, so the
  // YAML layer must not reject repeated keys.
  const doc = parseDocument(document, { lineCounter: lines, uniqueKeys: false });
  const parser = new DocumentParser(lines);

  if (doc.errors.length > 0) {
    const first = doc.errors[0];
    const pos = first.linePos?.[0];
    throw ParseError.syntax(
      first.message.split("\n")[0],
      pos ? { line: pos.line, column: pos.col } : null,
      "document",
    );
  }
  return parser.parse(doc.contents);
}

/**
 * Parse a schema document without throwing.
 *
 * @returns ParseResult with the schema, or the ParseError
 */
export function tryParseSchema(document: string): ParseResult {
  try {
    return { ok: true, schema: parseSchema(document) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
