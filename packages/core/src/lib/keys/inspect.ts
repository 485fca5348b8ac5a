import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import type { AccountDb } from "../host/accounts.js";
import { describeFile } from "../host/file-meta.js";
import { throwIfAborted } from "../runtime/errors.js";
import { classifyHeader, DEFAULT_HEADER_BYTES } from "./classify.js";
import { detectEncryption } from "./decoders/index.js";
import type { KeyTool } from "./keygen.js";
import {
  companionFallback,
  companionPath,
  derivePublicKeyRecord,
  reconcileWithCompanion,
} from "./reconcile.js";
import { assembleKeyReport } from "./report.js";
import type { KeyReport, PublicKeyRecord } from "./types.js";

/** Key containers are small; anything past this is read as truncated. */
export const MAX_KEY_FILE_BYTES = 64 * 1024;

export type InspectDeps = {
  tool: KeyTool;
  accounts: AccountDb;
  headerBytes?: number;
  signal?: AbortSignal;
};

export async function readPrefix(filePath: string, maxBytes: number): Promise<Buffer> {
  const handle = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(Math.max(0, Math.trunc(maxBytes)));
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    return buf.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Runs one candidate file through the whole pipeline. Returns null for files
 * that are not keys and for keys that yield nothing reportable. I/O errors on
 * the file itself propagate; the scanner decides what to do with them.
 */
export async function inspectKeyFile(filePath: string, stat: Stats, deps: InspectDeps): Promise<KeyReport | null> {
  if (!stat.isFile()) return null;
  const headerBytes = deps.headerBytes ?? DEFAULT_HEADER_BYTES;

  const header = await readPrefix(filePath, headerBytes);
  const format = classifyHeader(header, headerBytes);
  if (format === "UNRECOGNIZED") return null;

  const bytes = stat.size <= header.length ? header : await readPrefix(filePath, MAX_KEY_FILE_BYTES);
  const encryption = detectEncryption(format, bytes);
  const companion = companionPath(filePath);

  let publicKey: PublicKeyRecord | null = null;
  let probeFingerprint = "";
  if (encryption === "UNENCRYPTED") {
    const derived = await derivePublicKeyRecord(filePath, deps.tool);
    if (derived) publicKey = await reconcileWithCompanion(derived, companion, deps.tool);
  } else if (encryption === "ENCRYPTED" && format === "SSH1") {
    const probe = await deps.tool.fingerprintFile(filePath);
    probeFingerprint = probe?.fingerprint ?? "";
  }
  if (!publicKey) publicKey = await companionFallback(companion, deps.tool);

  throwIfAborted(deps.signal);
  return assembleKeyReport({
    file: describeFile(filePath, stat, deps.accounts),
    format,
    encryption,
    publicKey,
    probeFingerprint,
  });
}
