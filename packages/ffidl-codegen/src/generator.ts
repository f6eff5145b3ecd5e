// Generation entry points and the target dispatch table.

import type { ResolvedSchema } from "@ffidl/schema";

import { checkConstructs } from "./constructs.ts";
import type { Emitter, GenerateOptions, GeneratedSource } from "./context.ts";
import { GenerateError } from "./errors.ts";
import { emitFSharp } from "./fsharp.ts";
import { emitGo } from "./go.ts";
import type { LanguageProfile, TargetId } from "./profile.ts";
import { emitRust } from "./rust.ts";
import { emitTypeScript } from "./typescript.ts";

const EMITTERS: Readonly<Record<TargetId, Emitter>> = {
  typescript: emitTypeScript,
  rust: emitRust,
  go: emitGo,
  fsharp: emitFSharp,
};

export type GenerateResult = { ok: true; source: GeneratedSource } | { ok: false; error: GenerateError };

/**
 * Generate the source files of one target.
 *
 * Output depends only on the resolved schema, the profile and the options,
 * so two runs produce byte-identical files.
 *
 * @throws GenerateError if the schema uses a construct the profile does not support
 */
export function generate(
  resolved: ResolvedSchema,
  profile: LanguageProfile,
  options: GenerateOptions = {},
): GeneratedSource {
  const unsupported = checkConstructs(resolved, profile);
  if (unsupported !== null) throw unsupported;

  const sourceName = options.sourceName ?? "schema";
  const files = EMITTERS[profile.id]({
    resolved,
    profile,
    moduleName: options.moduleName ?? resolved.schema.name ?? "schema",
    header: `Code generated by ffidl from ${sourceName}. DO NOT EDIT.`,
  });
  return { target: profile.id, files };
}

/** Like {@link generate}, but returns the error instead of throwing it. */
export function tryGenerate(
  resolved: ResolvedSchema,
  profile: LanguageProfile,
  options: GenerateOptions = {},
): GenerateResult {
  try {
    return { ok: true, source: generate(resolved, profile, options) };
  } catch (error) {
    if (error instanceof GenerateError) {
      return { ok: false, error };
    }
    throw error;
  }
}
