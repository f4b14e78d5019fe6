import { describe, it, expect } from "vitest";

import { derivePublicKey, sha256, signMessage, verifySignature } from "../src/crypto/signing.js";
import { ELLIPTIC_CURVES } from "../src/types/index.js";
import { bytesToHex } from "../src/utils/hex.js";

const message = new TextEncoder().encode("challenge and salt");

describe("signature primitives", () => {
  it("hashes with SHA-256", () => {
    expect(bytesToHex(sha256(new Uint8Array(0)))).toBe(
      "E3B0C44298FC1C149AFBF4C8996FB92427AE41E4649B934CA495991B7852B855",
    );
  });

  for (const curve of ELLIPTIC_CURVES) {
    it(`verifies ${curve} signatures and rejects other messages`, () => {
      const privateKey = sha256(`test-key-${curve}`);
      const publicKey = derivePublicKey(curve, privateKey);
      const signature = signMessage(curve, privateKey, message);

      expect(signature.byteLength).toBe(64);
      expect(verifySignature(curve, publicKey, message, signature)).toBe(true);
      expect(verifySignature(curve, publicKey, Uint8Array.of(1, 2, 3), signature)).toBe(false);
    });
  }

  it("treats malformed signatures and keys as invalid", () => {
    const publicKey = derivePublicKey("secp256k1", sha256("test-key"));
    expect(verifySignature("secp256k1", publicKey, message, Uint8Array.of(1, 2, 3))).toBe(false);
    expect(verifySignature("secp256k1", Uint8Array.of(4, 4), message, new Uint8Array(64))).toBe(false);
  });
});
