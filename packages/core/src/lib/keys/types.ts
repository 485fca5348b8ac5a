import type { FileMeta } from "../host/file-meta.js";

export const FORMAT_VERDICTS = ["SSH1", "PEM_GENERIC", "OPENSSH_V1", "UNRECOGNIZED"] as const;
export type FormatVerdict = (typeof FORMAT_VERDICTS)[number];
export type KeyFormat = Exclude<FormatVerdict, "UNRECOGNIZED">;

export const ENCRYPTION_VERDICTS = ["ENCRYPTED", "UNENCRYPTED", "UNKNOWN"] as const;
export type EncryptionVerdict = (typeof ENCRYPTION_VERDICTS)[number];

export const KEY_TYPES = ["RSA1", "RSA", "DSA", "ECDSA", "ED25519", "NA"] as const;
export type KeyType = (typeof KEY_TYPES)[number];

/** What a fingerprint listing (`ssh-keygen -l`, `ssh-add -l`) says about one key. */
export type FingerprintInfo = {
  bits: number;
  fingerprint: string;
  comment: string;
  keyType: KeyType | null;
};

/**
 * - `derived`: produced from the private key itself.
 * - `companion`: the `.pub` beside the key, fingerprint-matched against the derived key.
 * - `companion-fallback`: the `.pub` beside the key, adopted unchecked because nothing could be derived.
 */
export type PublicKeySource = "derived" | "companion" | "companion-fallback";

export type PublicKeyRecord = {
  keyType: KeyType;
  bits: number;
  fingerprint: string;
  line: string;
  source: PublicKeySource;
  verified: boolean;
};

export type KeyReport = {
  file: FileMeta;
  format: KeyFormat;
  encryption: EncryptionVerdict;
  keyType: KeyType;
  bits: number;
  fingerprint: string;
  publicKey: PublicKeyRecord | null;
};

export type AgentIdentity = {
  socket: FileMeta;
  keyType: KeyType;
  bits: number;
  fingerprint: string;
  remotePath: string;
};
