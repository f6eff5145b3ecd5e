// Shared inputs and outputs of the emitters.

import { readFileSync } from "node:fs";

import type { ResolvedSchema } from "@ffidl/schema";

import type { LanguageProfile, TargetId } from "./profile.ts";

export interface GenerateOptions {
  /**
   * Module, package, crate or namespace name of the generated code.
   * Defaults to the schema's `schema:` name, then `"schema"`.
   */
  moduleName?: string;
  /** Source named in each file's header. Defaults to `"schema"`. */
  sourceName?: string;
}

export interface GeneratedFile {
  /** Path relative to the target's output directory, `/`-separated. */
  path: string;
  contents: string;
}

export interface GeneratedSource {
  target: TargetId;
  files: GeneratedFile[];
}

export interface EmitContext {
  readonly resolved: ResolvedSchema;
  readonly profile: LanguageProfile;
  readonly moduleName: string;
  /** Header text without comment markers. */
  readonly header: string;
}

export type Emitter = (context: EmitContext) => GeneratedFile[];

/** Read a fixed block of target code shipped beside the sources. */
export function loadTemplate(name: string): string[] {
  const text = readFileSync(new URL(`../templates/${name}`, import.meta.url), "utf8");
  return text.trimEnd().split("\n");
}
