import type { FileMeta } from "../host/file-meta.js";
import { keyTypeFromLine } from "./key-types.js";
import type {
  AgentIdentity,
  EncryptionVerdict,
  KeyFormat,
  KeyReport,
  KeyType,
  PublicKeyRecord,
} from "./types.js";

export const FIELD_SEPARATOR = ";";

const FORMAT_KEY_TYPE: Readonly<Record<KeyFormat, KeyType>> = {
  SSH1: "RSA1",
  PEM_GENERIC: "NA",
  OPENSSH_V1: "NA",
};

/** UNKNOWN folds into 0 together with UNENCRYPTED. */
export function encryptedFlag(verdict: EncryptionVerdict): 0 | 1 {
  return verdict === "ENCRYPTED" ? 1 : 0;
}

function resolveKeyType(format: KeyFormat, publicKey: PublicKeyRecord | null): KeyType {
  if (publicKey && publicKey.keyType !== "NA") return publicKey.keyType;
  if (publicKey) {
    const fromLine = keyTypeFromLine(publicKey.line);
    if (fromLine !== "NA") return fromLine;
  }
  return FORMAT_KEY_TYPE[format];
}

/**
 * Merges the per-file results into one report. A file that is not encrypted and
 * has no public key from either derivation or its companion is dropped; an
 * encrypted one is kept with whatever the fingerprint probe gave.
 */
export function assembleKeyReport(params: {
  file: FileMeta;
  format: KeyFormat;
  encryption: EncryptionVerdict;
  publicKey: PublicKeyRecord | null;
  probeFingerprint?: string;
}): KeyReport | null {
  const { publicKey } = params;
  if (!publicKey && params.encryption !== "ENCRYPTED") return null;
  return {
    file: params.file,
    format: params.format,
    encryption: params.encryption,
    keyType: resolveKeyType(params.format, publicKey),
    bits: publicKey?.bits ?? 0,
    fingerprint: publicKey?.fingerprint || params.probeFingerprint || "",
    publicKey,
  };
}

function field(value: string | number): string {
  return String(value).replace(/[\r\n]+/g, " ");
}

/** `%` first, so an escaped separator reads back unambiguously. */
function escapeSeparator(value: string): string {
  return value.replace(/%/g, "%25").replace(/;/g, "%3B");
}

/**
 * The last field is free text (a public key line may carry `;` in its comment);
 * every field before it has the separator escaped so the count stays fixed.
 */
export function joinRecord(file: FileMeta, rest: Array<string | number>): string {
  const fields = [file.owner, file.group, file.mode, file.mtime, ...rest].map(field);
  const last = fields.length - 1;
  return fields.map((value, i) => (i < last ? escapeSeparator(value) : value)).join(FIELD_SEPARATOR);
}

export function formatKeyReport(report: KeyReport): string {
  return joinRecord(report.file, [
    report.fingerprint,
    report.bits,
    report.keyType,
    encryptedFlag(report.encryption),
    report.file.path,
    report.publicKey?.line ?? "",
  ]);
}

export function formatAgentIdentity(identity: AgentIdentity): string {
  return joinRecord(identity.socket, [
    identity.fingerprint,
    identity.bits,
    identity.keyType,
    0,
    identity.socket.path,
    identity.remotePath ? `remote_path=${identity.remotePath}` : "",
  ]);
}
