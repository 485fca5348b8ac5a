import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

export type Candidate = {
  path: string;
  stat: Stats;
};

export type WalkOpts = {
  /** Absolute directory paths not to descend into. */
  skipDirs?: ReadonlySet<string>;
  include?: (entry: Candidate) => boolean;
  onError?: (err: unknown, entryPath: string) => void;
  signal?: AbortSignal;
};

/**
 * Depth-first walk yielding regular files. Symlinks are neither followed nor
 * yielded. Unreadable directories and vanished entries go to `onError` and the
 * walk moves on.
 */
export async function* walkRegularFiles(root: string, opts: WalkOpts = {}): AsyncGenerator<Candidate> {
  const stack: string[] = [root];
  while (stack.length > 0) {
    if (opts.signal?.aborted) return;
    const dir = stack.pop();
    if (dir === undefined) break;

    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      opts.onError?.(err, dir);
      continue;
    }

    const subdirs: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!opts.skipDirs?.has(entryPath)) subdirs.push(entryPath);
        continue;
      }
      if (!entry.isFile()) continue;

      let stat: Stats;
      try {
        stat = await fs.lstat(entryPath);
      } catch (err) {
        opts.onError?.(err, entryPath);
        continue;
      }
      if (!stat.isFile()) continue;
      const candidate = { path: entryPath, stat };
      if (opts.include && !opts.include(candidate)) continue;
      yield candidate;
    }
    // Reverse so the stack pops subdirectories in readdir order.
    for (let i = subdirs.length - 1; i >= 0; i -= 1) {
      const subdir = subdirs[i];
      if (subdir !== undefined) stack.push(subdir);
    }
  }
}
