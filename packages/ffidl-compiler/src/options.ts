// Driver options and reports.

import { TARGET_IDS, type GenerateError, type TargetId } from "@ffidl/codegen";

import type { CompileError } from "./errors.ts";
import type { LoggingOptions } from "./logging.ts";

export interface DriverOptions {
  /** Path of the YAML schema document. */
  schemaPath: string;
  /** Each target writes into `<outputRoot>/<profile.directory>/`. */
  outputRoot: string;
  /** Targets to generate. Defaults to every target. */
  targets?: readonly TargetId[];
  /** Overrides the schema's `schema:` name. */
  moduleName?: string;
  logging?: LoggingOptions;
}

export interface VerifyOptions extends Omit<DriverOptions, "outputRoot"> {
  /** Checked-in tree laid out the way {@link DriverOptions.outputRoot} is. */
  referenceRoot: string;
}

export interface TargetReport {
  target: TargetId;
  /** Absolute directory the target writes to, or is compared against. */
  directory: string;
  /** Files written or compared, relative to `directory`. Empty on failure. */
  files: string[];
  error?: GenerateError;
}

export interface Report {
  /** True when there are no errors. */
  ok: boolean;
  targets: TargetReport[];
  errors: CompileError[];
}

export function resolveTargets(targets: readonly TargetId[] | undefined): TargetId[] {
  const requested = targets ?? TARGET_IDS;
  // Keep the canonical order so reports and output are stable.
  return TARGET_IDS.filter((target) => requested.includes(target));
}
