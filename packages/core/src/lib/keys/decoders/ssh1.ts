import type { EncryptionVerdict } from "../types.js";

/** The legacy container opens with this id string, its newline and a NUL. */
export const SSH1_MAGIC = "SSH PRIVATE KEY FILE FORMAT 1.1\n\0";
/** Single-byte cipher type straight after the magic. */
export const SSH1_CIPHER_OFFSET = 33;
export const SSH1_CIPHER_NONE = 0;

export function detectSsh1Encryption(bytes: Uint8Array): EncryptionVerdict {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (buf.length <= SSH1_CIPHER_OFFSET) return "UNKNOWN";
  if (buf.subarray(0, SSH1_MAGIC.length).toString("latin1") !== SSH1_MAGIC) return "UNKNOWN";
  return buf[SSH1_CIPHER_OFFSET] === SSH1_CIPHER_NONE ? "UNENCRYPTED" : "ENCRYPTED";
}
