import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import type { Account, AccountDb } from "../host/accounts.js";
import { describeFile, type FileMeta } from "../host/file-meta.js";
import type { KeyTool } from "../keys/keygen.js";
import { keyTypeFromToken, parsePublicKeyLine, type ParsedPublicKeyLine } from "../keys/key-types.js";
import { joinRecord } from "../keys/report.js";
import type { KeyType } from "../keys/types.js";
import { mapWithConcurrency } from "../runtime/concurrency.js";
import { ScanAbortedError, throwIfAborted } from "../runtime/errors.js";
import { silentLogger, type ScanLogger } from "../runtime/logger.js";
import type { RecordSink } from "../runtime/sink.js";
import type { ScanSummary } from "../scan/scan-keys.js";
import { expandAuthorizedKeysPath } from "./sshd-config.js";

const AUTHORIZED_KEYS_MAX_BYTES = 1024 * 1024;

export type AuthorizedKeyEntry = {
  file: FileMeta;
  account: string;
  line: string;
  parsed: ParsedPublicKeyLine;
  keyType: KeyType;
  bits: number;
  fingerprint: string;
};

export type AuthorizedKeysTarget = {
  account: Account;
  path: string;
};

/** One target per distinct file; the first account that resolves to it owns it. */
export function authorizedKeysTargets(accounts: readonly Account[], patterns: readonly string[]): AuthorizedKeysTarget[] {
  const seen = new Set<string>();
  const out: AuthorizedKeysTarget[] = [];
  for (const account of accounts) {
    if (!account.home) continue;
    for (const pattern of patterns) {
      const filePath = expandAuthorizedKeysPath(pattern, account);
      if (seen.has(filePath)) continue;
      seen.add(filePath);
      out.push({ account, path: filePath });
    }
  }
  return out;
}

export async function readAuthorizedKeys(
  target: AuthorizedKeysTarget,
  deps: { tool: KeyTool; accounts: AccountDb; signal?: AbortSignal },
): Promise<AuthorizedKeyEntry[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(target.path);
  } catch {
    // Most accounts have no such file.
    return [];
  }
  if (!stat.isFile() || stat.size > AUTHORIZED_KEYS_MAX_BYTES) return [];

  const text = await fs.readFile(target.path, "utf8");
  const file = describeFile(target.path, stat, deps.accounts);
  const out: AuthorizedKeyEntry[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const parsed = parsePublicKeyLine(raw);
    if (!parsed) continue;
    throwIfAborted(deps.signal);
    // Options are not part of the key; fingerprint the bare key.
    const info = await deps.tool.fingerprintLine(`${parsed.type} ${parsed.blob}`);
    out.push({
      file,
      account: target.account.name,
      line: raw.trim(),
      parsed,
      keyType: info?.keyType ?? keyTypeFromToken(parsed.type),
      bits: info?.bits ?? 0,
      fingerprint: info?.fingerprint ?? "",
    });
  }
  return out;
}

export function formatAuthorizedKey(entry: AuthorizedKeyEntry): string {
  return joinRecord(entry.file, [entry.fingerprint, entry.bits, entry.keyType, 0, entry.file.path, entry.line]);
}

export async function scanAuthorizedKeys(params: {
  accounts: AccountDb;
  patterns: readonly string[];
  tool: KeyTool;
  sink: RecordSink;
  concurrency: number;
  signal?: AbortSignal;
  logger?: ScanLogger;
}): Promise<ScanSummary> {
  const logger = params.logger ?? silentLogger;
  const targets = authorizedKeysTargets(params.accounts.accounts, params.patterns);
  let reported = 0;

  await mapWithConcurrency({
    items: targets,
    concurrency: params.concurrency,
    signal: params.signal,
    fn: async (target) => {
      let entries: AuthorizedKeyEntry[];
      try {
        entries = await readAuthorizedKeys(target, params);
      } catch (err) {
        if (err instanceof ScanAbortedError) throw err;
        logger.debug({ err, path: target.path }, "skipping authorized_keys file");
        return;
      }
      for (const entry of entries) {
        await params.sink.write(formatAuthorizedKey(entry));
        reported += 1;
      }
    },
  });

  return { scanned: targets.length, reported };
}
