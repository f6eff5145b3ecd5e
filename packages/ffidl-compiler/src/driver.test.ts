// Tests for the generation driver

import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { GenerateErrorKind } from "@ffidl/codegen";
import { ParseErrorKind, ResolveError, ResolveErrorKind } from "@ffidl/schema";
import { run, verify } from "./driver.ts";
import { CompileErrorKind, type CompileError } from "./errors.ts";
import { listFiles } from "./writer.ts";

const WORKSPACE = fileURLToPath(new URL("../../../test-fixtures/schemas/workspace.yaml", import.meta.url));

const HEADER = "// Code generated by ffidl from workspace.yaml. DO NOT EDIT.";

function drift(errors: readonly CompileError[]): Array<[string | null, string | null, string | null]> {
  return errors.map((error) => [error.target, error.file, error.reason]);
}

describe("driver", () => {
  let root: string;
  let out: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "ffidl-driver-"));
    out = join(root, "out");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function schemaFile(text: string): Promise<string> {
    const path = join(root, "schema.yaml");
    await writeFile(path, text, "utf8");
    return path;
  }

  describe("run", () => {
    it("writes each target into its own directory", async () => {
      const report = await run({ schemaPath: WORKSPACE, outputRoot: out, targets: ["typescript", "rust", "go"] });

      expect(report.ok).toBe(true);
      expect(report.errors).toEqual([]);
      expect(report.targets.map((target) => [target.target, target.files])).toEqual([
        ["typescript", ["workspace.ts"]],
        ["rust", ["Cargo.toml", "src/lib.rs"]],
        ["go", ["go.mod", "workspace.go"]],
      ]);
      expect((await readdir(out)).sort()).toEqual(["go", "rust", "ts"]);

      const source = await readFile(join(out, "ts", "workspace.ts"), "utf8");
      expect(source.split("\n")[0]).toBe(HEADER);
      expect(await listFiles(join(out, "rust"))).toEqual(["Cargo.toml", "src/lib.rs"]);
    });

    it("keeps going when one target fails", async () => {
      await mkdir(join(out, "fsharp"), { recursive: true });
      await writeFile(join(out, "fsharp", "Generated.fs"), "previous", "utf8");

      const report = await run({ schemaPath: WORKSPACE, outputRoot: out });

      expect(report.ok).toBe(false);
      expect(report.errors).toHaveLength(1);
      const [error] = report.errors;
      expect(error.kind).toBe(CompileErrorKind.PER_TARGET_FAILURES);
      expect(error.failures.map((failure) => [failure.kind, failure.target, failure.construct])).toEqual([
        [GenerateErrorKind.UNSUPPORTED_CONSTRUCT, "fsharp", "non-string-map-key"],
      ]);

      expect(report.targets.map((target) => target.target)).toEqual(["typescript", "rust", "go", "fsharp"]);
      expect(report.targets[3].files).toEqual([]);
      expect(await readFile(join(out, "fsharp", "Generated.fs"), "utf8")).toBe("previous");
      expect(await listFiles(join(out, "go"))).toEqual(["go.mod", "workspace.go"]);
    });

    it("replaces stale files in a target directory", async () => {
      await mkdir(join(out, "ts"), { recursive: true });
      await writeFile(join(out, "ts", "removed_type.ts"), "stale", "utf8");

      await run({ schemaPath: WORKSPACE, outputRoot: out, targets: ["typescript"] });

      expect(await listFiles(join(out, "ts"))).toEqual(["workspace.ts"]);
      expect(await readdir(out)).toEqual(["ts"]);
    });

    it("uses the module name option", async () => {
      const report = await run({
        schemaPath: WORKSPACE,
        outputRoot: out,
        targets: ["typescript"],
        moduleName: "graph",
      });
      expect(report.targets[0].files).toEqual(["graph.ts"]);
    });

    it("stops before generation when the schema does not parse", async () => {
      const report = await run({ schemaPath: await schemaFile("types: 5\n"), outputRoot: out });

      expect(report.ok).toBe(false);
      expect(report.targets).toEqual([]);
      expect(report.errors.map((error) => error.kind)).toEqual([CompileErrorKind.PARSE_FAILED]);
      expect(report.errors[0].cause).toMatchObject({ kind: ParseErrorKind.SYNTAX });
      await expect(stat(out)).rejects.toThrow();
    });

    it("writes nothing for a type that contains itself", async () => {
      const schemaPath = await schemaFile("types:\n  Bad:\n    self: Bad\n");
      const report = await run({ schemaPath, outputRoot: out });

      expect(report.errors.map((error) => error.kind)).toEqual([CompileErrorKind.RESOLVE_FAILED]);
      const cause = report.errors[0].cause;
      expect(cause).toBeInstanceOf(ResolveError);
      expect(cause).toMatchObject({ kind: ResolveErrorKind.INVALID_CYCLE });
      await expect(stat(out)).rejects.toThrow();
    });

    it("generates a list-recursive type", async () => {
      const schemaPath = await schemaFile("types:\n  TreeNode:\n    children: '[TreeNode]'\n");
      const report = await run({ schemaPath, outputRoot: out });
      expect(report.ok).toBe(true);
      expect(report.targets.map((target) => target.files.length)).toEqual([1, 2, 2, 2]);
    });
  });

  describe("verify", () => {
    const targets = ["typescript", "rust", "go"] as const;

    it("passes against a freshly written tree", async () => {
      await run({ schemaPath: WORKSPACE, outputRoot: out, targets });
      const report = await verify({ schemaPath: WORKSPACE, referenceRoot: out, targets });
      expect(report.ok).toBe(true);
      expect(report.errors).toEqual([]);
    });

    it("reports changed, extra and missing files without writing", async () => {
      await run({ schemaPath: WORKSPACE, outputRoot: out, targets });
      await writeFile(join(out, "ts", "workspace.ts"), "edited by hand\n", "utf8");
      await writeFile(join(out, "rust", "notes.txt"), "scratch", "utf8");
      await rm(join(out, "go", "go.mod"));

      const report = await verify({ schemaPath: WORKSPACE, referenceRoot: out, targets });

      expect(report.ok).toBe(false);
      expect(report.errors.every((error) => error.kind === CompileErrorKind.DRIFT_DETECTED)).toBe(true);
      expect(drift(report.errors)).toEqual([
        ["typescript", "workspace.ts", "changed"],
        ["rust", "notes.txt", "extra"],
        ["go", "go.mod", "missing"],
      ]);
      expect(report.errors[0].message).toBe("typescript/workspace.ts differs from the generated output");

      expect(await readFile(join(out, "ts", "workspace.ts"), "utf8")).toBe("edited by hand\n");
      expect(await listFiles(join(out, "go"))).toEqual(["workspace.go"]);
    });

    it("treats an absent reference tree as missing files", async () => {
      const report = await verify({ schemaPath: WORKSPACE, referenceRoot: out, targets: ["rust"] });
      expect(drift(report.errors)).toEqual([
        ["rust", "Cargo.toml", "missing"],
        ["rust", "src/lib.rs", "missing"],
      ]);
      await expect(stat(out)).rejects.toThrow();
    });

    it("reports generation failures alongside drift", async () => {
      const report = await verify({ schemaPath: WORKSPACE, referenceRoot: out, targets: ["fsharp"] });
      expect(report.errors.map((error) => error.kind)).toEqual([CompileErrorKind.PER_TARGET_FAILURES]);
    });
  });
});
