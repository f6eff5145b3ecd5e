// Tests for argument parsing and the CLI exit codes

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ExitCode, main, parseArguments, type CliIO } from "./cli.ts";

const WORKSPACE = fileURLToPath(new URL("../../../test-fixtures/schemas/workspace.yaml", import.meta.url));

describe("parseArguments", () => {
  it("parses compile with repeated targets", () => {
    expect(
      parseArguments(["compile", "api.yaml", "-o", "gen", "--target", "rust", "--target", "go", "--target", "rust"]),
    ).toEqual({
      ok: true,
      command: { command: "compile", schemaPath: "api.yaml", outputRoot: "gen", targets: ["rust", "go"] },
    });
  });

  it("parses the module name", () => {
    expect(parseArguments(["compile", "--module", "graph", "api.yaml", "--output", "gen"])).toEqual({
      ok: true,
      command: { command: "compile", schemaPath: "api.yaml", outputRoot: "gen", moduleName: "graph" },
    });
  });

  it("parses verify", () => {
    expect(parseArguments(["verify", "api.yaml", "--reference", "examples"])).toEqual({
      ok: true,
      command: { command: "verify", schemaPath: "api.yaml", referenceRoot: "examples" },
    });
  });

  it("rejects bad usage", () => {
    const cases: Array<[string[], string]> = [
      [[], "Missing command"],
      [["build"], 'Unknown command "build"'],
      [["compile", "api.yaml"], "compile needs -o <dir>"],
      [["compile", "api.yaml", "-o"], 'Option "-o" needs a value'],
      [["compile", "api.yaml", "-o", "gen", "--target", "java"], 'Unknown target "java"'],
      [["compile", "-o", "gen"], "Missing schema path"],
      [["compile", "a.yaml", "b.yaml", "-o", "gen"], "Expected one schema path"],
      [["compile", "api.yaml", "-o", "gen", "--force"], 'Unknown option "--force"'],
      [["verify", "api.yaml"], "verify needs --reference <dir>"],
      [["verify", "api.yaml", "--reference", "r", "-o", "gen"], "verify takes --reference, not -o or --module"],
    ];
    for (const [argv, message] of cases) {
      expect(parseArguments(argv)).toEqual({ ok: false, message });
    }
  });
});

describe("main", () => {
  let root: string;
  let io: CliIO;
  let errors: string[];
  let output: string[];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "ffidl-cli-"));
    errors = [];
    output = [];
    io = { error: (line) => errors.push(line), out: (line) => output.push(line) };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("exits 2 with usage on bad arguments", async () => {
    expect(await main(["compile"], io)).toBe(ExitCode.USAGE);
    expect(errors[0]).toBe("error: Missing schema path");
    expect(errors[1]).toMatch(/^Usage:/);
  });

  it("exits 0 after compiling, and 0 when verifying the result", async () => {
    const out = join(root, "gen");
    expect(await main(["compile", WORKSPACE, "-o", out, "--target", "go"], io)).toBe(ExitCode.OK);
    expect(output).toEqual([`wrote go: 2 file(s) in ${join(out, "go")}`]);
    expect(await main(["verify", WORKSPACE, "--reference", out, "--target", "go"], io)).toBe(ExitCode.OK);
    expect(errors).toEqual([]);
  });

  it("exits 1 on drift", async () => {
    const code = await main(["verify", WORKSPACE, "--reference", join(root, "none"), "--target", "typescript"], io);
    expect(code).toBe(ExitCode.FAILED);
    expect(errors).toEqual(["error: typescript/workspace.ts is missing from the reference tree"]);
  });

  it("exits 1 when the schema is invalid", async () => {
    const schemaPath = join(root, "bad.yaml");
    await writeFile(schemaPath, "types:\n  Bad:\n    self: Bad\n", "utf8");
    expect(await main(["compile", schemaPath, "-o", join(root, "gen")], io)).toBe(ExitCode.FAILED);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^error: .*bad\.yaml: Type "Bad" contains itself by value/);
  });

  it("exits 1 when the schema file is missing", async () => {
    expect(await main(["compile", join(root, "missing.yaml"), "-o", join(root, "gen")], io)).toBe(ExitCode.FAILED);
    expect(errors[0]).toMatch(/^error: ENOENT/);
  });
});
