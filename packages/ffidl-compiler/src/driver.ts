// Generation driver
//
// parse -> resolve -> generate per target -> write (or compare, in verify
// mode). Parse and resolve failures stop the run before any target is
// touched; a generation failure only skips its own target.

import { readFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";

import { tryParseSchema, tryResolveSchema, type ResolvedSchema } from "@ffidl/schema";
import { PROFILES, tryGenerate, type GenerateError, type GeneratedSource, type TargetId } from "@ffidl/codegen";

import { CompileError } from "./errors.ts";
import { createLogger, type LoggingOptions } from "./logging.ts";
import { resolveTargets, type DriverOptions, type Report, type TargetReport, type VerifyOptions } from "./options.ts";
import { listFiles, readReference, replaceDirectory } from "./writer.ts";

type Loaded = { ok: true; resolved: ResolvedSchema } | { ok: false; error: CompileError };

async function loadSchema(schemaPath: string, logging: LoggingOptions): Promise<Loaded> {
  const log = createLogger("ffidl:driver", logging);
  const document = await readFile(schemaPath, "utf8");

  const parsed = tryParseSchema(document);
  if (!parsed.ok) return { ok: false, error: CompileError.parseFailed(schemaPath, parsed.error) };

  const resolved = tryResolveSchema(parsed.schema);
  if (!resolved.ok) return { ok: false, error: CompileError.resolveFailed(schemaPath, resolved.error) };

  log("resolved schema", {
    path: schemaPath,
    types: resolved.resolved.order.length,
    functions: resolved.resolved.functions.length,
  });
  return { ok: true, resolved: resolved.resolved };
}

interface Generated {
  sources: GeneratedSource[];
  failures: TargetReport[];
}

function generateTargets(
  resolved: ResolvedSchema,
  targets: readonly TargetId[],
  root: string,
  options: { schemaPath: string; moduleName?: string },
): Generated {
  const sources: GeneratedSource[] = [];
  const failures: TargetReport[] = [];
  for (const target of targets) {
    const result = tryGenerate(resolved, PROFILES[target], {
      moduleName: options.moduleName,
      sourceName: basename(options.schemaPath),
    });
    if (result.ok) sources.push(result.source);
    else failures.push({ target, directory: join(root, PROFILES[target].directory), files: [], error: result.error });
  }
  return { sources, failures };
}

function finish(targets: TargetReport[], errors: CompileError[]): Report {
  const failures = targets.flatMap((target): GenerateError[] => (target.error ? [target.error] : []));
  if (failures.length > 0) errors.unshift(CompileError.perTargetFailures(failures));
  return { ok: errors.length === 0, targets, errors };
}

function byTarget(order: readonly TargetId[]): (a: TargetReport, b: TargetReport) => number {
  return (a, b) => order.indexOf(a.target) - order.indexOf(b.target);
}

/**
 * Generate every requested target and write it under the output root.
 *
 * Each target directory is replaced as a whole, so it holds exactly the
 * generated files afterwards. A target that fails keeps its previous tree.
 *
 * @throws file system errors while reading the schema or writing output
 */
export async function run(options: DriverOptions): Promise<Report> {
  const logging = options.logging ?? {};
  const log = createLogger("ffidl:driver", logging);

  const loaded = await loadSchema(options.schemaPath, logging);
  if (!loaded.ok) return { ok: false, targets: [], errors: [loaded.error] };

  const targets = resolveTargets(options.targets);
  const root = resolve(options.outputRoot);
  const { sources, failures } = generateTargets(loaded.resolved, targets, root, options);

  const reports: TargetReport[] = [...failures];
  for (const source of sources) {
    const directory = join(root, PROFILES[source.target].directory);
    await replaceDirectory(directory, source.files, logging);
    reports.push({ target: source.target, directory, files: source.files.map((file) => file.path) });
    log("wrote target", { target: source.target, directory, files: source.files.length });
  }
  for (const failure of failures) {
    log("target failed", { target: failure.target, error: failure.error?.message });
  }

  return finish(reports.sort(byTarget(targets)), []);
}

/**
 * Generate in memory and compare byte for byte with a reference tree.
 * Writes nothing.
 *
 * Every changed, missing or extra file is reported as its own
 * `drift_detected` error.
 */
export async function verify(options: VerifyOptions): Promise<Report> {
  const logging = options.logging ?? {};
  const log = createLogger("ffidl:driver", logging);

  const loaded = await loadSchema(options.schemaPath, logging);
  if (!loaded.ok) return { ok: false, targets: [], errors: [loaded.error] };

  const targets = resolveTargets(options.targets);
  const root = resolve(options.referenceRoot);
  const { sources, failures } = generateTargets(loaded.resolved, targets, root, options);

  const reports: TargetReport[] = [...failures];
  const drift: CompileError[] = [];
  for (const source of sources) {
    const directory = join(root, PROFILES[source.target].directory);
    const generated = new Set(source.files.map((file) => file.path));

    for (const file of source.files) {
      const reference = await readReference(directory, file.path);
      if (reference === null) {
        drift.push(CompileError.driftDetected(source.target, file.path, "missing"));
      } else if (!reference.equals(Buffer.from(file.contents, "utf8"))) {
        drift.push(CompileError.driftDetected(source.target, file.path, "changed"));
      }
    }
    for (const path of await listFiles(directory)) {
      if (!generated.has(path)) drift.push(CompileError.driftDetected(source.target, path, "extra"));
    }

    reports.push({ target: source.target, directory, files: [...generated] });
    log("compared target", { target: source.target, directory, files: generated.size });
  }

  return finish(reports.sort(byTarget(targets)), drift);
}
