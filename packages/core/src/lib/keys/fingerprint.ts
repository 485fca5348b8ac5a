import { keyTypeFromLabel } from "./key-types.js";
import type { FingerprintInfo } from "./types.js";

/** 16 colon-separated hex octets: 47 characters. */
const MD5_FINGERPRINT_RE = /^(?:MD5:)?((?:[0-9a-f]{2}:){15}[0-9a-f]{2})$/i;

const LISTING_LINE_RE = /^(\d+)\s+(\S+)(.*)$/;
const TYPE_SUFFIX_RE = /(?:^|\s)\(([^()]+)\)$/;

export function normalizeFingerprint(token: string): string | null {
  const match = MD5_FINGERPRINT_RE.exec(token.trim());
  return match?.[1] ? match[1].toLowerCase() : null;
}

/**
 * One line of `ssh-keygen -l` / `ssh-add -l` output, e.g.
 * `2048 MD5:3f:...:9a alice@host (RSA)`. Lines whose fingerprint is not an MD5
 * colon-hex digest are rejected.
 */
export function parseFingerprintLine(line: string): FingerprintInfo | null {
  const match = LISTING_LINE_RE.exec(line.trim());
  if (!match) return null;
  const fingerprint = normalizeFingerprint(match[2] ?? "");
  if (!fingerprint) return null;
  const rest = (match[3] ?? "").trim();
  const typeMatch = TYPE_SUFFIX_RE.exec(rest);
  const comment = (typeMatch ? rest.slice(0, typeMatch.index) : rest).trim();
  return {
    bits: Number(match[1]),
    fingerprint,
    comment: comment === "no comment" ? "" : comment,
    keyType: typeMatch?.[1] ? keyTypeFromLabel(typeMatch[1]) : null,
  };
}

export function parseFingerprintListing(output: string): FingerprintInfo[] {
  const out: FingerprintInfo[] = [];
  for (const line of output.split(/\r?\n/)) {
    const parsed = parseFingerprintLine(line);
    if (parsed) out.push(parsed);
  }
  return out;
}
