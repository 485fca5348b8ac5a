import type { KeyType } from "./types.js";

const KEY_TYPE_BY_TOKEN: Readonly<Record<string, KeyType>> = {
  "ssh-rsa": "RSA",
  "ssh-dss": "DSA",
  "ssh-ed25519": "ED25519",
  "sk-ssh-ed25519@openssh.com": "ED25519",
  "ecdsa-sha2-nistp256": "ECDSA",
  "ecdsa-sha2-nistp384": "ECDSA",
  "ecdsa-sha2-nistp521": "ECDSA",
  "sk-ecdsa-sha2-nistp256@openssh.com": "ECDSA",
};

const KEY_TYPE_BY_LABEL: Readonly<Record<string, KeyType>> = {
  RSA1: "RSA1",
  RSA: "RSA",
  DSA: "DSA",
  ECDSA: "ECDSA",
  "ECDSA-SK": "ECDSA",
  ED25519: "ED25519",
  "ED25519-SK": "ED25519",
};

/** Leading identifier of a public key line (`ssh-rsa`, or the bit count of an RSA1 line). */
export function keyTypeFromToken(token: string): KeyType {
  const t = token.trim();
  const known = KEY_TYPE_BY_TOKEN[t];
  if (known) return known;
  if (/^ssh-rsa-cert-v\d+@openssh\.com$/.test(t)) return "RSA";
  if (/^ssh-dss-cert-v\d+@openssh\.com$/.test(t)) return "DSA";
  if (/^(?:sk-)?ssh-ed25519-cert-v\d+@openssh\.com$/.test(t)) return "ED25519";
  if (/^(?:sk-)?ecdsa-sha2-/.test(t)) return "ECDSA";
  if (/^\d+$/.test(t)) return "RSA1";
  return "NA";
}

/** Type label as printed in parentheses by the key listing tools, e.g. `RSA` or `ED25519-SK`. */
export function keyTypeFromLabel(label: string): KeyType | null {
  const normalized = label.trim().replace(/^\(|\)$/g, "").toUpperCase();
  return KEY_TYPE_BY_LABEL[normalized] ?? null;
}

export type ParsedPublicKeyLine = {
  /** authorized_keys options before the key, verbatim; empty when there are none. */
  options: string;
  type: string;
  blob: string;
  comment: string;
};

type Token = { text: string; start: number; end: number };

function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let start = -1;
  let quoted = false;
  for (let i = 0; i <= line.length; i += 1) {
    const ch = line[i];
    const boundary = ch === undefined || (!quoted && (ch === " " || ch === "\t"));
    if (boundary) {
      if (start >= 0) tokens.push({ text: line.slice(start, i), start, end: i });
      start = -1;
      continue;
    }
    if (start < 0) start = i;
    if (ch === "\\" && quoted) {
      i += 1;
      continue;
    }
    if (ch === '"') quoted = !quoted;
  }
  return tokens;
}

function blobNamesType(type: string, base64: string): boolean {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(base64)) return false;
  const buf = Buffer.from(base64, "base64");
  if (buf.length < 4) return false;
  const len = buf.readUInt32BE(0);
  if (len === 0 || 4 + len > buf.length) return false;
  return buf.subarray(4, 4 + len).toString("utf8") === type;
}

/**
 * Splits one public key or authorized_keys line. The key starts at the first
 * token pair whose base64 blob names the same type as the token before it, so
 * quoted option values containing spaces do not confuse the split. RSA1 lines
 * (`bits exponent modulus [comment]`) are recognized by their three integers.
 */
export function parsePublicKeyLine(line: string): ParsedPublicKeyLine | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const tokens = tokenize(trimmed);

  for (let i = 0; i < tokens.length - 1; i += 1) {
    const typeTok = tokens[i];
    const blobTok = tokens[i + 1];
    if (!typeTok || !blobTok) continue;

    if (blobNamesType(typeTok.text, blobTok.text)) {
      return {
        options: trimmed.slice(0, typeTok.start).trim(),
        type: typeTok.text,
        blob: blobTok.text,
        comment: trimmed.slice(blobTok.end).trim(),
      };
    }

    const modTok = tokens[i + 2];
    if (modTok && /^\d+$/.test(typeTok.text) && /^\d+$/.test(blobTok.text) && /^\d+$/.test(modTok.text)) {
      return {
        options: trimmed.slice(0, typeTok.start).trim(),
        type: typeTok.text,
        blob: `${blobTok.text} ${modTok.text}`,
        comment: trimmed.slice(modTok.end).trim(),
      };
    }
  }
  return null;
}

export function keyTypeFromLine(line: string): KeyType {
  const parsed = parsePublicKeyLine(line);
  if (parsed) return keyTypeFromToken(parsed.type);
  const first = line.trim().split(/\s+/)[0] ?? "";
  return keyTypeFromToken(first);
}

/** First line of a text that parses as a public key, trimmed. */
export function firstPublicKeyLine(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    if (parsePublicKeyLine(line)) return line.trim();
  }
  return null;
}
