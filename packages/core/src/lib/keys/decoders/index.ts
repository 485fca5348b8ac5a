import type { EncryptionVerdict, KeyFormat } from "../types.js";
import { detectOpensshV1Encryption } from "./openssh-v1.js";
import { detectPemEncryption } from "./pem.js";
import { detectSsh1Encryption } from "./ssh1.js";

export function detectEncryption(format: KeyFormat, bytes: Uint8Array): EncryptionVerdict {
  switch (format) {
    case "SSH1":
      return detectSsh1Encryption(bytes);
    case "PEM_GENERIC":
      return detectPemEncryption(bytes);
    case "OPENSSH_V1":
      return detectOpensshV1Encryption(bytes);
  }
}
