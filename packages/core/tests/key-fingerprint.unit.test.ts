import { describe, expect, it } from "vitest";
import { normalizeFingerprint, parseFingerprintLine, parseFingerprintListing } from "../src/lib/keys/fingerprint.js";

const FP = "3f:0a:11:22:33:44:55:66:77:88:99:aa:bb:cc:dd:9a";

describe("normalizeFingerprint", () => {
  it("strips the MD5 prefix and lowercases", () => {
    expect(normalizeFingerprint(`MD5:${FP.toUpperCase()}`)).toBe(FP);
    expect(normalizeFingerprint(FP)).toBe(FP);
    expect(normalizeFingerprint(FP)).toHaveLength(47);
  });

  it("rejects other digests", () => {
    expect(normalizeFingerprint("SHA256:47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU")).toBeNull();
    expect(normalizeFingerprint("3f:0a:11")).toBeNull();
  });
});

describe("parseFingerprintLine", () => {
  it("parses bits, fingerprint, comment and type", () => {
    expect(parseFingerprintLine(`2048 MD5:${FP} alice@host (RSA)`)).toEqual({
      bits: 2048,
      fingerprint: FP,
      comment: "alice@host",
      keyType: "RSA",
    });
  });

  it("keeps comments with spaces and parentheses", () => {
    expect(parseFingerprintLine(`256 MD5:${FP} deploy key (old) for ci (ED25519)`)).toEqual({
      bits: 256,
      fingerprint: FP,
      comment: "deploy key (old) for ci",
      keyType: "ED25519",
    });
  });

  it("handles a missing comment", () => {
    expect(parseFingerprintLine(`256 MD5:${FP} (ED25519)`)?.comment).toBe("");
    expect(parseFingerprintLine(`256 MD5:${FP} no comment (ECDSA)`)?.comment).toBe("");
  });

  it("maps security key labels onto their base type", () => {
    expect(parseFingerprintLine(`256 MD5:${FP} yubi (ED25519-SK)`)?.keyType).toBe("ED25519");
    expect(parseFingerprintLine(`256 MD5:${FP} yubi (ECDSA-SK)`)?.keyType).toBe("ECDSA");
  });

  it("leaves an unknown type label as null", () => {
    expect(parseFingerprintLine(`256 MD5:${FP} x (XMSS)`)?.keyType).toBeNull();
  });

  it("rejects lines that are not listings", () => {
    expect(parseFingerprintLine("The agent has no identities.")).toBeNull();
    expect(parseFingerprintLine("")).toBeNull();
  });
});

describe("parseFingerprintListing", () => {
  it("keeps only listing lines", () => {
    const out = parseFingerprintListing(`2048 MD5:${FP} a (RSA)\nwarning: something\n256 MD5:${FP} b (ED25519)\n`);
    expect(out.map((i) => i.comment)).toEqual(["a", "b"]);
  });
});
