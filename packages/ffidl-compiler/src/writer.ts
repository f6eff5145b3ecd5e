// Output tree writer
//
// A target directory is replaced as a whole: files are written into a fresh
// sibling directory which is then renamed into place. A failed write leaves
// the previous tree as it was.

import { mkdir, mkdtemp, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import type { GeneratedFile } from "@ffidl/codegen";

import { createLogger, type LoggingOptions } from "./logging.ts";

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
}

/**
 * Replace `directory` with exactly `files`.
 *
 * @throws the underlying file system error; the temporary directory is removed first
 */
export async function replaceDirectory(
  directory: string,
  files: readonly GeneratedFile[],
  logging: LoggingOptions = {},
): Promise<void> {
  const log = createLogger("ffidl:writer", logging);
  const parent = dirname(directory);
  await mkdir(parent, { recursive: true });

  const staging = await mkdtemp(join(parent, `.${basename(directory)}-`));
  const retired = `${staging}-old`;
  let previousMoved = false;

  try {
    for (const file of files) {
      const path = join(staging, ...file.path.split("/"));
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, file.contents, "utf8");
    }

    if (await exists(directory)) {
      await rename(directory, retired);
      previousMoved = true;
    }
    await rename(staging, directory);
  } catch (error) {
    if (previousMoved) await rename(retired, directory);
    await rm(staging, { recursive: true, force: true });
    log("write failed", { directory, error: error instanceof Error ? error.message : String(error) });
    throw error;
  }

  if (previousMoved) await rm(retired, { recursive: true, force: true });
  log("replaced", { directory, files: files.length });
}

/** Every file under `directory`, relative and `/`-separated, sorted. Empty if it does not exist. */
export async function listFiles(directory: string): Promise<string[]> {
  if (!(await exists(directory))) return [];

  const out: string[] = [];
  const walk = async (relative: string[]): Promise<void> => {
    const entries = await readdir(join(directory, ...relative), { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) await walk([...relative, entry.name]);
      else out.push([...relative, entry.name].join("/"));
    }
  };
  await walk([]);
  return out.sort();
}

/** Contents of a file under `directory`, or null if it is missing. */
export async function readReference(directory: string, path: string): Promise<Buffer | null> {
  try {
    return await readFile(join(directory, ...path.split("/")));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
}
