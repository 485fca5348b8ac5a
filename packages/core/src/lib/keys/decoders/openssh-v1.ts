import type { EncryptionVerdict } from "../types.js";
import { readArmoredBlock, toText } from "./armor.js";

export const OPENSSH_V1_MAGIC = "openssh-key-v1\0";
const CIPHER_LEN_OFFSET = OPENSSH_V1_MAGIC.length;
const CIPHER_NAME_OFFSET = CIPHER_LEN_OFFSET + 4;
/** `none` plus the NUL that opens the kdfname length: bytes 20-24 counting from one. */
const PLAINTEXT_WINDOW = Buffer.from("none\0", "latin1");
const MAX_CIPHER_NAME_LEN = 64;
const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Layout after base64 decoding: magic, then the cipher name as an SSH string
 * (uint32 length + bytes). Only that field is read; the key material is never
 * touched. Anything that cannot be read that far is UNKNOWN.
 */
export function detectOpensshV1Encryption(bytes: Uint8Array): EncryptionVerdict {
  const block = readArmoredBlock(toText(bytes));
  if (!block || block.label !== "OPENSSH PRIVATE KEY") return "UNKNOWN";
  if (!block.complete || !BASE64_RE.test(block.body)) return "UNKNOWN";

  const decoded = Buffer.from(block.body, "base64");
  if (decoded.length < CIPHER_NAME_OFFSET + PLAINTEXT_WINDOW.length) return "UNKNOWN";
  if (decoded.subarray(0, CIPHER_LEN_OFFSET).toString("latin1") !== OPENSSH_V1_MAGIC) return "UNKNOWN";

  const window = decoded.subarray(CIPHER_NAME_OFFSET, CIPHER_NAME_OFFSET + PLAINTEXT_WINDOW.length);
  if (window.equals(PLAINTEXT_WINDOW)) return "UNENCRYPTED";

  const nameLen = decoded.readUInt32BE(CIPHER_LEN_OFFSET);
  if (nameLen === 0 || nameLen > MAX_CIPHER_NAME_LEN) return "UNKNOWN";
  if (CIPHER_NAME_OFFSET + nameLen > decoded.length) return "UNKNOWN";
  return "ENCRYPTED";
}
