import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ExitCode, ScanFatalError, formatError } from "./errors.js";

export type WorkDir = {
  readonly dir: string;
  writeFile: (name: string, contents: string) => Promise<string>;
  removeFile: (filePath: string) => Promise<void>;
};

function safeName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, "_") || "scratch";
}

/**
 * Gives `fn` a private scratch directory and removes it on every exit path,
 * including a rejection caused by an abort.
 */
export async function withWorkDir<T>(
  fn: (work: WorkDir) => Promise<T>,
  opts: { parent?: string; prefix?: string } = {},
): Promise<T> {
  const parent = opts.parent || os.tmpdir();
  let dir: string;
  try {
    dir = await fs.mkdtemp(path.join(parent, opts.prefix ?? "keysweep-"));
  } catch (err) {
    throw new ScanFatalError(`cannot create work directory in ${parent}: ${formatError(err)}`, ExitCode.WORKDIR_UNAVAILABLE, {
      cause: err,
    });
  }

  let counter = 0;
  const work: WorkDir = {
    dir,
    writeFile: async (name, contents) => {
      counter += 1;
      const filePath = path.join(dir, `${counter}.${safeName(name)}`);
      await fs.writeFile(filePath, contents, { mode: 0o600, flag: "wx" });
      return filePath;
    },
    removeFile: async (filePath) => {
      await fs.rm(filePath, { force: true });
    },
  };

  try {
    return await fn(work);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
