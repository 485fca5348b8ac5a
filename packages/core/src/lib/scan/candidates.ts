import fs from "node:fs/promises";
import path from "node:path";
import type { AccountDb } from "../host/accounts.js";
import { ExitCode, ScanFatalError, formatError } from "../runtime/errors.js";
import { silentLogger, type ScanLogger } from "../runtime/logger.js";
import { walkRegularFiles, type Candidate } from "./walk.js";

export const DEFAULT_MIN_SIZE = 200;
export const DEFAULT_MAX_SIZE = 14_000;
/** Pseudo filesystems and runtime state; never descended into by the full scan. */
export const FULL_SCAN_SKIP_DIRS = ["/proc", "/sys", "/dev", "/run"] as const;

async function isDirectory(dirPath: string): Promise<boolean> {
  const stat = await fs.stat(dirPath).catch(() => null);
  return stat?.isDirectory() ?? false;
}

/** Distinct home directories of the account database that exist on this host. */
export async function listHomeDirs(accounts: AccountDb): Promise<string[]> {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const account of accounts.accounts) {
    const home = account.home.trim();
    if (!home || !path.isAbsolute(home) || seen.has(home)) continue;
    seen.add(home);
    if (await isDirectory(home)) out.push(home);
  }
  return out;
}

/** Every regular non-`.pub` file below each `<home>/.ssh`. */
export async function* homeCandidates(params: {
  accounts: AccountDb;
  logger?: ScanLogger;
  signal?: AbortSignal;
}): AsyncGenerator<Candidate> {
  const logger = params.logger ?? silentLogger;
  const homes = await listHomeDirs(params.accounts);
  if (homes.length === 0) {
    throw new ScanFatalError("no readable home directories found in the account database", ExitCode.NO_READABLE_ROOT);
  }

  for (const home of homes) {
    const sshDir = path.join(home, ".ssh");
    if (!(await isDirectory(sshDir))) continue;
    logger.debug({ sshDir }, "scanning ssh directory");
    yield* walkRegularFiles(sshDir, {
      include: (c) => !c.path.endsWith(".pub"),
      onError: (err, entryPath) => logger.debug({ err, path: entryPath }, "skipping unreadable entry"),
      signal: params.signal,
    });
  }
}

/** Every regular file under `root` whose size lies within `[minSize, maxSize]`. */
export async function* fullCandidates(params: {
  root: string;
  minSize?: number;
  maxSize?: number;
  logger?: ScanLogger;
  signal?: AbortSignal;
}): AsyncGenerator<Candidate> {
  const logger = params.logger ?? silentLogger;
  const root = path.resolve(params.root);
  const minSize = params.minSize ?? DEFAULT_MIN_SIZE;
  const maxSize = params.maxSize ?? DEFAULT_MAX_SIZE;

  try {
    await fs.readdir(root);
  } catch (err) {
    throw new ScanFatalError(`scan root is not readable: ${root} (${formatError(err)})`, ExitCode.NO_READABLE_ROOT, {
      cause: err,
    });
  }

  yield* walkRegularFiles(root, {
    skipDirs: new Set<string>(FULL_SCAN_SKIP_DIRS),
    include: (c) => c.stat.size >= minSize && c.stat.size <= maxSize,
    onError: (err, entryPath) => logger.debug({ err, path: entryPath }, "skipping unreadable entry"),
    signal: params.signal,
  });
}
