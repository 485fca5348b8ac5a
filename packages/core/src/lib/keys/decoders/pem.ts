import type { EncryptionVerdict } from "../types.js";
import { readArmoredBlock, toText } from "./armor.js";

const PROC_TYPE_RE = /^proc-type:/i;

/**
 * RFC 1421 style: `Proc-Type: 4,ENCRYPTED` marks an encrypted body. The line is
 * looked for anywhere inside the block, not only in the leading header run.
 * Without it the body is taken as plaintext; that is a convention of the
 * format, not something checked cryptographically.
 */
export function detectPemEncryption(bytes: Uint8Array): EncryptionVerdict {
  const block = readArmoredBlock(toText(bytes));
  if (!block) return "UNKNOWN";
  if (block.label === "ENCRYPTED PRIVATE KEY") return "ENCRYPTED";

  for (const line of block.lines) {
    if (!PROC_TYPE_RE.test(line)) continue;
    const value = line.slice(line.indexOf(":") + 1);
    const kind = value.split(",")[1]?.trim();
    if (kind === "ENCRYPTED") return "ENCRYPTED";
  }

  if (!block.complete || !block.body) return "UNKNOWN";
  return "UNENCRYPTED";
}
