// Compile errors
//
// The driver wraps parse and resolve failures, collects per-target
// generation failures, and reports verification drift. Each kind carries
// what a caller needs to point at the schema or the stale file.

import type { ParseError, ResolveError } from "@ffidl/schema";
import type { GenerateError, TargetId } from "@ffidl/codegen";

export const CompileErrorKind = {
  /** The schema document could not be parsed. */
  PARSE_FAILED: "parse_failed",
  /** The schema parsed but did not resolve. */
  RESOLVE_FAILED: "resolve_failed",
  /** One or more targets could not be generated; the others were. */
  PER_TARGET_FAILURES: "per_target_failures",
  /** A reference file differs from what would be generated. */
  DRIFT_DETECTED: "drift_detected",
} as const;

export type CompileErrorKind = (typeof CompileErrorKind)[keyof typeof CompileErrorKind];

/** How a reference tree differs from the generated output. */
export type DriftReason = "changed" | "missing" | "extra";

const DRIFT_MESSAGES: Readonly<Record<DriftReason, string>> = {
  changed: "differs from the generated output",
  missing: "is missing from the reference tree",
  extra: "is in the reference tree but not generated",
};

export class CompileError extends Error {
  readonly kind: CompileErrorKind;
  /** Target of a drift report. */
  readonly target: TargetId | null;
  /** File of a drift report, relative to the target directory. */
  readonly file: string | null;
  readonly reason: DriftReason | null;
  /** Generation failures, one per failed target. */
  readonly failures: readonly GenerateError[];

  private constructor(
    kind: CompileErrorKind,
    message: string,
    details: {
      target?: TargetId;
      file?: string;
      reason?: DriftReason;
      failures?: readonly GenerateError[];
      cause?: Error;
    } = {},
  ) {
    super(message, details.cause ? { cause: details.cause } : undefined);
    this.name = "CompileError";
    this.kind = kind;
    this.target = details.target ?? null;
    this.file = details.file ?? null;
    this.reason = details.reason ?? null;
    this.failures = details.failures ?? [];
  }

  static parseFailed(schemaPath: string, cause: ParseError): CompileError {
    return new CompileError(CompileErrorKind.PARSE_FAILED, `${schemaPath}: ${cause.message}`, { cause });
  }

  static resolveFailed(schemaPath: string, cause: ResolveError): CompileError {
    return new CompileError(CompileErrorKind.RESOLVE_FAILED, `${schemaPath}: ${cause.message}`, { cause });
  }

  static perTargetFailures(failures: readonly GenerateError[]): CompileError {
    const lines = failures.map((failure) => `  ${failure.target}: ${failure.message}`);
    return new CompileError(
      CompileErrorKind.PER_TARGET_FAILURES,
      `${failures.length} target(s) failed:\n${lines.join("\n")}`,
      { failures },
    );
  }

  static driftDetected(target: TargetId, file: string, reason: DriftReason): CompileError {
    return new CompileError(CompileErrorKind.DRIFT_DETECTED, `${target}/${file} ${DRIFT_MESSAGES[reason]}`, {
      target,
      file,
      reason,
    });
  }
}
