// Command-line entry point
//
//   ffidl compile <schema> -o <dir> [--target <lang>]... [--module <name>]
//   ffidl verify <schema> --reference <dir> [--target <lang>]...
//
// Exit codes: 0 success, 1 compile failure or drift, 2 usage error.

import { TARGET_IDS, isTargetId, type TargetId } from "@ffidl/codegen";

import { run, verify } from "./driver.ts";
import { createLogger } from "./logging.ts";
import type { Report } from "./options.ts";

export const USAGE = `Usage:
  ffidl compile <schema> -o <dir> [--target <lang>]... [--module <name>]
  ffidl verify <schema> --reference <dir> [--target <lang>]...

Targets: ${TARGET_IDS.join(", ")} (default: all)`;

export const ExitCode = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type Command =
  | { command: "compile"; schemaPath: string; outputRoot: string; targets?: TargetId[]; moduleName?: string }
  | { command: "verify"; schemaPath: string; referenceRoot: string; targets?: TargetId[] };

export type ParsedArguments = { ok: true; command: Command } | { ok: false; message: string };

const VALUE_FLAGS: Readonly<Record<string, string>> = {
  "-o": "output",
  "--output": "output",
  "--reference": "reference",
  "--target": "target",
  "--module": "module",
};

/** Parse argv (without the node and script entries). */
export function parseArguments(argv: readonly string[]): ParsedArguments {
  const [command, ...rest] = argv;
  if (command !== "compile" && command !== "verify") {
    return { ok: false, message: command === undefined ? "Missing command" : `Unknown command "${command}"` };
  }

  const positional: string[] = [];
  const values = new Map<string, string>();
  const targets: TargetId[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const flag = VALUE_FLAGS[arg];
    if (flag === undefined) {
      if (arg.startsWith("-")) return { ok: false, message: `Unknown option "${arg}"` };
      positional.push(arg);
      continue;
    }

    const value = rest[i + 1];
    if (value === undefined) return { ok: false, message: `Option "${arg}" needs a value` };
    i++;
    if (flag === "target") {
      if (!isTargetId(value)) return { ok: false, message: `Unknown target "${value}"` };
      if (!targets.includes(value)) targets.push(value);
    } else {
      values.set(flag, value);
    }
  }

  if (positional.length !== 1) {
    return { ok: false, message: positional.length === 0 ? "Missing schema path" : "Expected one schema path" };
  }
  const schemaPath = positional[0];
  const selected = targets.length > 0 ? { targets } : {};

  if (command === "compile") {
    if (values.has("reference")) return { ok: false, message: "--reference is only valid with verify" };
    const outputRoot = values.get("output");
    if (outputRoot === undefined) return { ok: false, message: "compile needs -o <dir>" };
    const moduleName = values.get("module");
    return {
      ok: true,
      command: { command, schemaPath, outputRoot, ...selected, ...(moduleName === undefined ? {} : { moduleName }) },
    };
  }

  if (values.has("output") || values.has("module")) {
    return { ok: false, message: "verify takes --reference, not -o or --module" };
  }
  const referenceRoot = values.get("reference");
  if (referenceRoot === undefined) return { ok: false, message: "verify needs --reference <dir>" };
  return { ok: true, command: { command, schemaPath, referenceRoot, ...selected } };
}

export interface CliIO {
  /** Diagnostics; defaults to stderr. */
  error: (line: string) => void;
  /** Progress; defaults to stdout. */
  out: (line: string) => void;
}

const PROCESS_IO: CliIO = {
  error: (line) => process.stderr.write(`${line}\n`),
  out: (line) => process.stdout.write(`${line}\n`),
};

function printReport(report: Report, verb: string, io: CliIO): void {
  for (const target of report.targets) {
    if (!target.error) io.out(`${verb} ${target.target}: ${target.files.length} file(s) in ${target.directory}`);
  }
  for (const error of report.errors) io.error(`error: ${error.message}`);
}

/** Run the CLI and return its exit code. */
export async function main(argv: readonly string[], io: CliIO = PROCESS_IO): Promise<ExitCode> {
  const log = createLogger("ffidl:cli");
  const parsed = parseArguments(argv);
  if (!parsed.ok) {
    io.error(`error: ${parsed.message}`);
    io.error(USAGE);
    return ExitCode.USAGE;
  }

  const { command } = parsed;
  log("command", { ...command });

  let report: Report;
  try {
    report = command.command === "compile" ? await run(command) : await verify(command);
  } catch (error) {
    io.error(`error: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.FAILED;
  }

  printReport(report, command.command === "compile" ? "wrote" : "checked", io);
  return report.ok ? ExitCode.OK : ExitCode.FAILED;
}
