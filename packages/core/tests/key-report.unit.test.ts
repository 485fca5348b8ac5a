import { describe, expect, it } from "vitest";
import type { FileMeta } from "../src/lib/host/file-meta.js";
import { assembleKeyReport, encryptedFlag, formatAgentIdentity, formatKeyReport } from "../src/lib/keys/report.js";
import type { PublicKeyRecord } from "../src/lib/keys/types.js";
import { makeEd25519PublicKey, md5Fingerprint } from "./helpers/ssh-keys.js";

const file: FileMeta = { path: "/home/alice/.ssh/id_ed25519", owner: "alice", group: "staff", mode: "600", mtime: 1700000000 };

function record(partial: Partial<PublicKeyRecord> = {}): PublicKeyRecord {
  return {
    keyType: "ED25519",
    bits: 256,
    fingerprint: md5Fingerprint(0xab),
    line: makeEd25519PublicKey({ comment: "alice@laptop" }),
    source: "derived",
    verified: true,
    ...partial,
  };
}

describe("encryptedFlag", () => {
  it("folds UNKNOWN into 0", () => {
    expect(encryptedFlag("ENCRYPTED")).toBe(1);
    expect(encryptedFlag("UNENCRYPTED")).toBe(0);
    expect(encryptedFlag("UNKNOWN")).toBe(0);
  });
});

describe("assembleKeyReport", () => {
  it("drops a plaintext key without a public key", () => {
    expect(assembleKeyReport({ file, format: "OPENSSH_V1", encryption: "UNENCRYPTED", publicKey: null })).toBeNull();
    expect(assembleKeyReport({ file, format: "PEM_GENERIC", encryption: "UNKNOWN", publicKey: null })).toBeNull();
  });

  it("keeps an encrypted key without a public key", () => {
    const report = assembleKeyReport({ file, format: "PEM_GENERIC", encryption: "ENCRYPTED", publicKey: null });
    expect(report).toMatchObject({ keyType: "NA", bits: 0, fingerprint: "", publicKey: null });
  });

  it("types an encrypted SSH1 key as RSA1 and keeps the probed fingerprint", () => {
    const report = assembleKeyReport({
      file,
      format: "SSH1",
      encryption: "ENCRYPTED",
      publicKey: null,
      probeFingerprint: md5Fingerprint(0x11),
    });
    expect(report).toMatchObject({ keyType: "RSA1", bits: 0, fingerprint: md5Fingerprint(0x11) });
  });

  it("falls back to the key token when the listing had no type", () => {
    const report = assembleKeyReport({
      file,
      format: "OPENSSH_V1",
      encryption: "UNENCRYPTED",
      publicKey: record({ keyType: "NA" }),
    });
    expect(report?.keyType).toBe("ED25519");
  });
});

describe("formatKeyReport", () => {
  it("renders the ten fields", () => {
    const pub = record();
    const report = assembleKeyReport({ file, format: "OPENSSH_V1", encryption: "UNENCRYPTED", publicKey: pub });
    if (!report) throw new Error("expected a report");
    expect(formatKeyReport(report)).toBe(
      `alice;staff;600;1700000000;${md5Fingerprint(0xab)};256;ED25519;0;/home/alice/.ssh/id_ed25519;${pub.line}`,
    );
  });

  it("leaves the public key field empty for an encrypted key", () => {
    const report = assembleKeyReport({ file, format: "PEM_GENERIC", encryption: "ENCRYPTED", publicKey: null });
    if (!report) throw new Error("expected a report");
    expect(formatKeyReport(report)).toBe("alice;staff;600;1700000000;;0;NA;1;/home/alice/.ssh/id_ed25519;");
  });

  it("keeps a record on one line", () => {
    const report = assembleKeyReport({
      file: { ...file, path: "/tmp/odd\nname" },
      format: "PEM_GENERIC",
      encryption: "ENCRYPTED",
      publicKey: null,
    });
    if (!report) throw new Error("expected a report");
    expect(formatKeyReport(report)).toBe("alice;staff;600;1700000000;;0;NA;1;/tmp/odd name;");
  });

  it("escapes the separator in every field but the last", () => {
    const pub = record({ line: "ssh-ed25519 AAAA x;y" });
    const report = assembleKeyReport({
      file: { ...file, path: "/srv/a;b/100%/id" },
      format: "OPENSSH_V1",
      encryption: "UNENCRYPTED",
      publicKey: pub,
    });
    if (!report) throw new Error("expected a report");
    const line = formatKeyReport(report);
    expect(line).toBe(
      `alice;staff;600;1700000000;${md5Fingerprint(0xab)};256;ED25519;0;/srv/a%3Bb/100%25/id;ssh-ed25519 AAAA x;y`,
    );
    expect(line.split(";")[8]).toBe("/srv/a%3Bb/100%25/id");
  });
});

describe("formatAgentIdentity", () => {
  it("uses the comment as the remote path", () => {
    const socket: FileMeta = { path: "/tmp/ssh-abc/agent.42", owner: "bob", group: "bob", mode: "600", mtime: 5 };
    const fp = md5Fingerprint(0x22);
    expect(
      formatAgentIdentity({ socket, keyType: "RSA", bits: 3072, fingerprint: fp, remotePath: "/home/bob/.ssh/id_rsa" }),
    ).toBe(`bob;bob;600;5;${fp};3072;RSA;0;/tmp/ssh-abc/agent.42;remote_path=/home/bob/.ssh/id_rsa`);
    expect(formatAgentIdentity({ socket, keyType: "RSA", bits: 3072, fingerprint: fp, remotePath: "" })).toBe(
      `bob;bob;600;5;${fp};3072;RSA;0;/tmp/ssh-abc/agent.42;`,
    );
  });
});
