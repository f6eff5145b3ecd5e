// Tests for the type-expression grammar

import { describe, it, expect } from "vitest";
import { TypeExprError, parseTypeExpr } from "./type_expr.ts";
import { formatTypeRef, list, map, named, optional, primitive, unit } from "./model.ts";

function expectError(text: string, message: string, offset: number): void {
  try {
    parseTypeExpr(text);
  } catch (error) {
    expect(error).toBeInstanceOf(TypeExprError);
    if (error instanceof TypeExprError) {
      expect(error.message).toBe(message);
      expect(error.offset).toBe(offset);
    }
    return;
  }
  throw new Error(`expected "${text}" to fail`);
}

describe("parseTypeExpr", () => {
  it("parses primitives and named types", () => {
    expect(parseTypeExpr("uuid")).toEqual(primitive("uuid"));
    expect(parseTypeExpr("timestamp")).toEqual(primitive("timestamp"));
    expect(parseTypeExpr("Node")).toEqual(named("Node"));
  });

  it("parses optionals, including repeated markers", () => {
    expect(parseTypeExpr("string?")).toEqual(optional(primitive("string")));
    expect(parseTypeExpr("string??")).toEqual(optional(optional(primitive("string"))));
  });

  it("parses dynamic and fixed-length lists", () => {
    expect(parseTypeExpr("[f64]")).toEqual(list(primitive("f64")));
    expect(parseTypeExpr("[f64;4]")).toEqual(list(primitive("f64"), 4));
    expect(parseTypeExpr("[ f64 ; 4 ]")).toEqual(list(primitive("f64"), 4));
  });

  it("parses maps with nested values", () => {
    expect(parseTypeExpr("map<string, [uuid]>")).toEqual(map("string", list(primitive("uuid"))));
    expect(parseTypeExpr("map<i64,Node?>")).toEqual(map("i64", optional(named("Node"))));
  });

  it("applies optional markers to the whole atom", () => {
    expect(parseTypeExpr("[Node?]?")).toEqual(optional(list(optional(named("Node")))));
  });

  it("treats map without angle brackets as a named type", () => {
    expect(parseTypeExpr("map")).toEqual(named("map"));
  });

  it("accepts Unit only on its own and only when allowed", () => {
    expect(parseTypeExpr("Unit", { allowUnit: true })).toEqual(unit);
    expect(() => parseTypeExpr("Unit")).toThrow(TypeExprError);
    expect(() => parseTypeExpr("[Unit]", { allowUnit: true })).toThrow(
      "Unit is only valid on its own as a function input or output",
    );
  });

  it("rejects non-primitive map keys", () => {
    expectError("map<Node, string>", 'Map key must be one of string, i32, i64, u32, u64, uuid but found "Node"', 4);
    expectError("map<f64, string>", 'Map key must be one of string, i32, i64, u32, u64, uuid but found "f64"', 4);
  });

  it("reports unterminated and malformed expressions with offsets", () => {
    expectError("[f64", 'Expected "]" but found end of expression', 4);
    expectError("[f64; 0]", "Expected a positive list length but found 0", 6);
    expectError("f64 extra", 'Unexpected "extra" after type', 4);
    expectError("a-b", 'Unexpected character "-"', 1);
    expectError("", "Expected a type but found end of expression", 0);
  });
});

describe("formatTypeRef", () => {
  it("renders the canonical spelling", () => {
    expect(formatTypeRef(parseTypeExpr("map<u64,[f64;4]?>"))).toBe("map<u64, [f64; 4]?>");
    expect(formatTypeRef(parseTypeExpr("[ Node ]?"))).toBe("[Node]?");
    expect(formatTypeRef(unit)).toBe("Unit");
  });
});
