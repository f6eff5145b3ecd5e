// Type-expression grammar.
//
//   expr := atom "?"*
//   atom := ident
//         | "[" expr ( ";" int )? "]"
//         | "map" "<" ident "," expr ">"
//
// An ident is a primitive kind, `Unit`, or the name of a declared type.
// Named references are not checked here; that is the resolver's job.

import {
  MAP_KEY_KINDS,
  UNIT_NAME,
  isMapKeyKind,
  isPrimitiveKind,
  list,
  map,
  named,
  optional,
  primitive,
  unit,
  type TypeRef,
} from "./model.ts";

type Token =
  | { kind: "ident"; text: string; offset: number }
  | { kind: "int"; value: number; offset: number }
  | { kind: "punct"; text: "?" | "[" | "]" | ";" | "<" | ">" | ","; offset: number }
  | { kind: "end"; offset: number };

/** A malformed type expression. `offset` is the 0-based character position. */
export class TypeExprError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = "TypeExprError";
    this.offset = offset;
  }
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === " " || ch === "\t") {
      i++;
      continue;
    }
    if (IDENT_START.test(ch)) {
      const start = i;
      while (i < text.length && IDENT_PART.test(text[i])) i++;
      tokens.push({ kind: "ident", text: text.slice(start, i), offset: start });
      continue;
    }
    if (DIGIT.test(ch)) {
      const start = i;
      while (i < text.length && DIGIT.test(text[i])) i++;
      tokens.push({ kind: "int", value: Number(text.slice(start, i)), offset: start });
      continue;
    }
    if (ch === "?" || ch === "[" || ch === "]" || ch === ";" || ch === "<" || ch === ">" || ch === ",") {
      tokens.push({ kind: "punct", text: ch, offset: i });
      i++;
      continue;
    }
    throw new TypeExprError(`Unexpected character "${ch}"`, i);
  }
  tokens.push({ kind: "end", offset: text.length });
  return tokens;
}

function describe(token: Token): string {
  switch (token.kind) {
    case "ident":
      return `"${token.text}"`;
    case "int":
      return `${token.value}`;
    case "punct":
      return `"${token.text}"`;
    case "end":
      return "end of expression";
  }
}

class TypeExprParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (token.kind !== "end") this.pos++;
    return token;
  }

  private expectPunct(text: string): void {
    const token = this.next();
    if (token.kind !== "punct" || token.text !== text) {
      throw new TypeExprError(`Expected "${text}" but found ${describe(token)}`, token.offset);
    }
  }

  parseRoot(): TypeRef {
    const ref = this.parseExpr();
    const rest = this.peek();
    if (rest.kind !== "end") {
      throw new TypeExprError(`Unexpected ${describe(rest)} after type`, rest.offset);
    }
    return ref;
  }

  private parseExpr(): TypeRef {
    let ref = this.parseAtom();
    for (;;) {
      const token = this.peek();
      if (token.kind !== "punct" || token.text !== "?") return ref;
      this.next();
      ref = optional(ref);
    }
  }

  private parseAtom(): TypeRef {
    const token = this.next();

    if (token.kind === "punct" && token.text === "[") {
      const element = this.parseExpr();
      let length: number | undefined;
      const sep = this.peek();
      if (sep.kind === "punct" && sep.text === ";") {
        this.next();
        const count = this.next();
        if (count.kind !== "int" || count.value < 1) {
          throw new TypeExprError(`Expected a positive list length but found ${describe(count)}`, count.offset);
        }
        length = count.value;
      }
      this.expectPunct("]");
      return list(element, length);
    }

    if (token.kind !== "ident") {
      throw new TypeExprError(`Expected a type but found ${describe(token)}`, token.offset);
    }

    const after = this.peek();
    if (token.text === "map" && after.kind === "punct" && after.text === "<") {
      this.next();
      const keyToken = this.next();
      if (keyToken.kind !== "ident" || !isPrimitiveKind(keyToken.text) || !isMapKeyKind(keyToken.text)) {
        throw new TypeExprError(
          `Map key must be one of ${MAP_KEY_KINDS.join(", ")} but found ${describe(keyToken)}`,
          keyToken.offset,
        );
      }
      const key = keyToken.text;
      this.expectPunct(",");
      const value = this.parseExpr();
      this.expectPunct(">");
      return map(key, value);
    }

    if (isPrimitiveKind(token.text)) return primitive(token.text);
    if (token.text === UNIT_NAME) return unit;
    return named(token.text);
  }
}

function containsUnit(ref: TypeRef): boolean {
  switch (ref.kind) {
    case "unit":
      return true;
    case "optional":
      return containsUnit(ref.inner);
    case "list":
      return containsUnit(ref.element);
    case "map":
      return containsUnit(ref.value);
    case "primitive":
    case "named":
      return false;
  }
}

export interface TypeExprOptions {
  /** Accept a bare `Unit` (function inputs and outputs). Defaults to false. */
  allowUnit?: boolean;
}

/**
 * Parse a type expression such as `[uuid]`, `string?` or `map<string, [f64; 4]>`.
 *
 * @throws TypeExprError if the text does not follow the grammar
 */
export function parseTypeExpr(text: string, options: TypeExprOptions = {}): TypeRef {
  const ref = new TypeExprParser(tokenize(text)).parseRoot();
  const bareUnit = ref.kind === "unit";
  if (containsUnit(ref) && !(bareUnit && options.allowUnit)) {
    throw new TypeExprError(`${UNIT_NAME} is only valid on its own as a function input or output`, 0);
  }
  return ref;
}
