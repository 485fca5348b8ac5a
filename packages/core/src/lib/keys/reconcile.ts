import fs from "node:fs/promises";
import { errnoCode } from "../runtime/errors.js";
import type { KeyTool } from "./keygen.js";
import { firstPublicKeyLine } from "./key-types.js";
import type { PublicKeyRecord } from "./types.js";

const COMPANION_MAX_BYTES = 64 * 1024;

export function companionPath(privateKeyPath: string): string {
  return `${privateKeyPath}.pub`;
}

/** First public key line of `<key>.pub`, or null when there is no usable companion. */
export async function readCompanionLine(filePath: string): Promise<string | null> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile() || stat.size > COMPANION_MAX_BYTES) return null;
    return firstPublicKeyLine(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "EACCES" || code === "ENOTDIR" || code === "ELOOP") return null;
    throw err;
  }
}

/**
 * Derives the public half of an unencrypted key and fingerprints it. Any failure
 * along the way means the key is unusable: null, never an exception.
 */
export async function derivePublicKeyRecord(privateKeyPath: string, tool: KeyTool): Promise<PublicKeyRecord | null> {
  const line = await tool.derivePublicKey(privateKeyPath);
  if (!line) return null;
  const info = await tool.fingerprintLine(line);
  if (!info) return null;
  return {
    keyType: info.keyType ?? "NA",
    bits: info.bits,
    fingerprint: info.fingerprint,
    line,
    source: "derived",
    verified: true,
  };
}

/**
 * Prefers the companion's line (options, comment) when its fingerprint is
 * byte-equal to the derived one; otherwise the derived record stands.
 */
export async function reconcileWithCompanion(
  derived: PublicKeyRecord,
  companion: string,
  tool: KeyTool,
): Promise<PublicKeyRecord> {
  const line = await readCompanionLine(companion);
  if (!line) return derived;
  const info = await tool.fingerprintFile(companion);
  if (!info || info.fingerprint !== derived.fingerprint) return derived;
  return {
    ...derived,
    keyType: derived.keyType === "NA" ? (info.keyType ?? "NA") : derived.keyType,
    bits: derived.bits || info.bits,
    line,
    source: "companion",
  };
}

/**
 * Used only when nothing could be derived from the private key: the companion
 * is taken at its word, so the record is marked unverified.
 */
export async function companionFallback(companion: string, tool: KeyTool): Promise<PublicKeyRecord | null> {
  const line = await readCompanionLine(companion);
  if (!line) return null;
  const info = await tool.fingerprintFile(companion);
  return {
    keyType: info?.keyType ?? "NA",
    bits: info?.bits ?? 0,
    fingerprint: info?.fingerprint ?? "",
    line,
    source: "companion-fallback",
    verified: false,
  };
}
