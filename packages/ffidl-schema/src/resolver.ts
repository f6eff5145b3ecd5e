// Type resolver and validator.
//
// Checks that every named reference exists, that no composite contains
// itself by value, and that names are unique, then computes the order in
// which generators emit types.

import { ResolveError } from "./errors.ts";
import {
  forEachNamedRef,
  type NamedType,
  type ResolvedSchema,
  type Schema,
  type SourceLocation,
  type TypeRef,
} from "./model.ts";

export type ResolveResult = { ok: true; resolved: ResolvedSchema } | { ok: false; error: ResolveError };

/**
 * Named types a reference embeds by value. Optionals, dynamic lists and maps
 * are indirections; a fixed-length list is laid out inline and is not.
 */
function byValueRefs(ref: TypeRef, out: string[]): void {
  switch (ref.kind) {
    case "named":
      out.push(ref.name);
      return;
    case "list":
      if (ref.length !== undefined) byValueRefs(ref.element, out);
      return;
    case "optional":
    case "map":
    case "primitive":
    case "unit":
      return;
  }
}

function uniqueInOrder(names: string[]): string[] {
  return [...new Set(names)];
}

function valueDependencies(type: NamedType): string[] {
  if (type.kind === "enum") return [];
  const out: string[] = [];
  for (const field of type.fields) byValueRefs(field.type, out);
  return uniqueInOrder(out);
}

function allDependencies(type: NamedType): string[] {
  if (type.kind === "enum") return [];
  const out: string[] = [];
  for (const field of type.fields) forEachNamedRef(field.type, (name) => out.push(name));
  return uniqueInOrder(out);
}

function checkDuplicates(schema: Schema): void {
  const typeNames = new Set<string>();
  for (const type of schema.types) {
    if (typeNames.has(type.name)) {
      throw ResolveError.duplicateTypeName(type.name, type.location ?? null);
    }
    typeNames.add(type.name);
  }

  const functionNames = new Set<string>();
  for (const fn of schema.functions) {
    if (functionNames.has(fn.name)) {
      throw ResolveError.duplicateFunctionName(fn.name, fn.location ?? null);
    }
    functionNames.add(fn.name);
  }
}

function checkReferences(schema: Schema, types: ReadonlyMap<string, NamedType>): void {
  const check = (ref: TypeRef, referencedFrom: string, location: SourceLocation | undefined) => {
    forEachNamedRef(ref, (name) => {
      if (!types.has(name)) {
        throw ResolveError.unknownType(name, referencedFrom, location ?? null);
      }
    });
  };

  for (const type of schema.types) {
    if (type.kind !== "composite") continue;
    for (const field of type.fields) {
      check(field.type, `${type.name}.${field.name}`, field.location);
    }
  }
  for (const fn of schema.functions) {
    check(fn.input, `${fn.name}.input`, fn.location);
    check(fn.output, `${fn.name}.output`, fn.location);
  }
}

/** Depth-first search for a by-value cycle, visiting types in declaration order. */
function checkValueCycles(schema: Schema, types: ReadonlyMap<string, NamedType>): void {
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (name: string): void => {
    if (done.has(name)) return;
    if (onStack.has(name)) {
      const cycle = [...stack.slice(stack.indexOf(name)), name];
      throw ResolveError.invalidCycle(name, cycle, types.get(name)?.location ?? null);
    }
    const type = types.get(name);
    if (!type) return;

    stack.push(name);
    onStack.add(name);
    for (const dep of valueDependencies(type)) visit(dep);
    stack.pop();
    onStack.delete(name);
    done.add(name);
  };

  for (const type of schema.types) visit(type.name);
}

/**
 * Kahn's algorithm over by-value dependencies. Among the types whose
 * dependencies are already placed, the earliest-declared goes next.
 */
function generationOrder(schema: Schema): NamedType[] {
  const pending = [...schema.types];
  const placed = new Set<string>();
  const order: NamedType[] = [];

  while (pending.length > 0) {
    const index = pending.findIndex((type) => valueDependencies(type).every((dep) => placed.has(dep)));
    if (index === -1) {
      // Unreachable once checkValueCycles has passed.
      throw new Error(`No orderable type among: ${pending.map((t) => t.name).join(", ")}`);
    }
    const [next] = pending.splice(index, 1);
    placed.add(next.name);
    order.push(next);
  }
  return order;
}

/**
 * Tarjan's strongly connected components over every reference, direct or
 * not. Returns the component id of each type that sits on a cycle.
 */
function recursiveComponents(schema: Schema, types: ReadonlyMap<string, NamedType>): Map<string, number> {
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const cyclic = new Map<string, number>();
  let counter = 0;
  let componentId = 0;

  const connect = (name: string): void => {
    index.set(name, counter);
    lowLink.set(name, counter);
    counter++;
    stack.push(name);
    onStack.add(name);

    const type = types.get(name);
    const deps = type ? allDependencies(type) : [];
    for (const dep of deps) {
      if (!index.has(dep)) {
        connect(dep);
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, lowLink.get(dep) ?? 0));
      } else if (onStack.has(dep)) {
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, index.get(dep) ?? 0));
      }
    }

    if (lowLink.get(name) === index.get(name)) {
      const members: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        members.push(member);
      } while (member !== name);

      const selfLoop = deps.includes(name);
      if (members.length > 1 || selfLoop) {
        for (const m of members) cyclic.set(m, componentId);
      }
      componentId++;
    }
  };

  for (const type of schema.types) {
    if (!index.has(type.name)) connect(type.name);
  }
  return cyclic;
}

/**
 * Resolve and validate a schema.
 *
 * Checks run in a fixed order: duplicate type names, duplicate function
 * names, unknown references, by-value cycles.
 *
 * @throws ResolveError on the first problem found
 */
export function resolveSchema(schema: Schema): ResolvedSchema {
  checkDuplicates(schema);

  const types = new Map<string, NamedType>(schema.types.map((type) => [type.name, type]));
  checkReferences(schema, types);
  checkValueCycles(schema, types);

  const order = generationOrder(schema);
  const components = recursiveComponents(schema, types);

  return Object.freeze({
    schema,
    types,
    order,
    functions: schema.functions,
    isRecursive(from: string, to: string): boolean {
      const a = components.get(from);
      return a !== undefined && a === components.get(to);
    },
  });
}

/**
 * Resolve a schema without throwing.
 *
 * @returns ResolveResult with the resolved schema, or the ResolveError
 */
export function tryResolveSchema(schema: Schema): ResolveResult {
  try {
    return { ok: true, resolved: resolveSchema(schema) };
  } catch (error) {
    if (error instanceof ResolveError) {
      return { ok: false, error };
    }
    throw error;
  }
}
