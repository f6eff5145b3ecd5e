// Support check run before any emitter: a target either supports every
// construct the schema uses or generates nothing.

import type { FunctionContract, NamedType, ResolvedSchema, TypeRef } from "@ffidl/schema";

import { GenerateError } from "./errors.ts";
import {
  fieldIdent,
  functionIdent,
  payloadIdent,
  typeIdent,
  variantIdent,
  type Construct,
  type LanguageProfile,
} from "./profile.ts";

/** Constructs used by a type reference, outermost first. */
export function refConstructs(ref: TypeRef): Construct[] {
  const found: Construct[] = [];
  const visit = (current: TypeRef): void => {
    switch (current.kind) {
      case "optional":
        if (current.inner.kind === "optional") found.push("nested-optional");
        visit(current.inner);
        return;
      case "list":
        if (current.length !== undefined) found.push("fixed-list");
        visit(current.element);
        return;
      case "map":
        found.push("map");
        if (current.key !== "string") found.push("non-string-map-key");
        visit(current.value);
        return;
      case "primitive":
      case "named":
      case "unit":
        return;
    }
  };
  visit(ref);
  return found;
}

function typeConstructs(type: NamedType): Construct[] {
  if (type.kind === "enum") return ["enum"];
  const found: Construct[] = type.fields.length === 0 ? ["empty-composite"] : [];
  for (const field of type.fields) found.push(...refConstructs(field.type));
  return found;
}

/** Whether a function input or output is carried in a generated wrapper type. */
export function isInlinePayload(ref: TypeRef): boolean {
  return ref.kind !== "named" && ref.kind !== "unit";
}

interface Collision {
  first: string;
  second: string;
}

/** First pair of names that convert to the same identifier, if any. */
function findCollision(names: readonly string[], convert: (name: string) => string): Collision | null {
  const seen = new Map<string, string>();
  for (const name of names) {
    const ident = convert(name);
    const previous = seen.get(ident);
    if (previous !== undefined) return { first: previous, second: name };
    seen.set(ident, name);
  }
  return null;
}

function collisionConstruct(collision: Collision): string {
  return `name-collision:${collision.first}/${collision.second}`;
}

interface TypeLevelName {
  /** Schema type or function the name comes from. */
  owner: string;
  /** How the name is reported: the schema name, or `owner.part` for a derived one. */
  label: string;
  ident: string;
}

/** Type names plus the names `profile` derives beside them, in generation order. */
function typeLevelNames(resolved: ResolvedSchema, profile: LanguageProfile): TypeLevelName[] {
  const names: TypeLevelName[] = resolved.order.map((type) => ({
    owner: type.name,
    label: type.name,
    ident: typeIdent(profile, type.name),
  }));
  for (const type of resolved.order) {
    const ident = typeIdent(profile, type.name);
    if (type.kind === "enum" && profile.derived.has("enum-constants")) {
      for (const variant of type.variants) {
        names.push({ owner: type.name, label: `${type.name}.${variant}`, ident: ident + variantIdent(profile, variant) });
      }
    }
    if (profile.derived.has("codec-functions")) {
      names.push({ owner: type.name, label: `${type.name}.deserialize`, ident: `Deserialize${ident}` });
    }
  }
  if (profile.derived.has("payload-wrappers")) {
    for (const fn of resolved.functions) {
      if (isInlinePayload(fn.input)) {
        names.push({ owner: fn.name, label: `${fn.name}.input`, ident: payloadIdent(fn.name, "Input") });
      }
      if (isInlinePayload(fn.output)) {
        names.push({ owner: fn.name, label: `${fn.name}.output`, ident: payloadIdent(fn.name, "Output") });
      }
    }
  }
  return names;
}

/**
 * Check that `profile` can represent every type and function of the schema.
 *
 * @returns the first problem found, in generation order, or null
 */
export function checkConstructs(resolved: ResolvedSchema, profile: LanguageProfile): GenerateError | null {
  const fail = (owner: string, construct: string): GenerateError =>
    GenerateError.unsupportedConstruct(profile.id, owner, construct);

  const seen = new Map<string, TypeLevelName>();
  for (const name of typeLevelNames(resolved, profile)) {
    const previous = seen.get(name.ident);
    if (previous !== undefined) {
      return fail(name.owner, collisionConstruct({ first: previous.label, second: name.label }));
    }
    seen.set(name.ident, name);
  }

  for (const type of resolved.order) {
    const unsupported = typeConstructs(type).find((construct) => profile.unsupported.has(construct));
    if (unsupported !== undefined) return fail(type.name, unsupported);

    const collision =
      type.kind === "enum"
        ? findCollision(type.variants, (name) => variantIdent(profile, name))
        : findCollision(
            type.fields.map((field) => field.name),
            (name) => fieldIdent(profile, name),
          );
    if (collision !== null) return fail(type.name, collisionConstruct(collision));
  }

  for (const fn of resolved.functions) {
    const unsupported = contractConstructs(fn).find((construct) => profile.unsupported.has(construct));
    if (unsupported !== undefined) return fail(fn.name, unsupported);
  }

  const fnCollision = findCollision(
    resolved.functions.map((fn) => fn.name),
    (name) => functionIdent(profile, name),
  );
  if (fnCollision !== null) return fail(fnCollision.second, collisionConstruct(fnCollision));

  return null;
}

function contractConstructs(fn: FunctionContract): Construct[] {
  return [...refConstructs(fn.input), ...refConstructs(fn.output)];
}
