import { describe, it, expect } from "vitest";

import { SecureChannelEnvelope, decryptAesGcm, encryptAesGcm } from "../src/crypto/envelope.js";
import { CardSdkError } from "../src/errors.js";

const key = new Uint8Array(32).fill(7);
const payload = Uint8Array.of(0x01, 0x02, 0xaa, 0xbb);

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof CardSdkError ? error.code : "not-a-card-sdk-error";
  }
  return undefined;
}

describe("SecureChannelEnvelope", () => {
  it("is the identity without encryption", async () => {
    const envelope = SecureChannelEnvelope.none();
    expect(envelope.isActive).toBe(false);
    expect(await envelope.protect(payload)).toEqual(payload);
    expect(await envelope.unprotect(payload)).toEqual(payload);
  });

  it("is the identity when no key is set", async () => {
    const envelope = new SecureChannelEnvelope("fast");
    expect(envelope.isActive).toBe(false);
    expect(await envelope.protect(payload)).toEqual(payload);
  });

  it("adds a 12-byte IV and a 16-byte tag", async () => {
    const envelope = new SecureChannelEnvelope("fast", key);
    const sealed = await envelope.protect(payload);
    expect(sealed.byteLength).toBe(payload.byteLength + 28);
    expect(await envelope.unprotect(sealed)).toEqual(payload);
  });

  it.each([
    ["IV", 0],
    ["ciphertext", 12],
    ["tag", -1],
  ])("fails with decryptionFailed when a %s byte was altered", async (_part, offset) => {
    const envelope = new SecureChannelEnvelope("strong", key);
    const sealed = await envelope.protect(payload);
    const index = offset < 0 ? sealed.byteLength + offset : offset;
    sealed[index] ^= 0x01;
    expect(await codeOf(envelope.unprotect(sealed))).toBe("decryptionFailed");
  });

  it("fails with decryptionFailed under the wrong key", async () => {
    const sealed = await encryptAesGcm(payload, key);
    expect(await codeOf(decryptAesGcm(sealed, new Uint8Array(32).fill(8)))).toBe("decryptionFailed");
  });

  it("fails with decryptionFailed on input shorter than IV and tag", async () => {
    expect(await codeOf(decryptAesGcm(new Uint8Array(27), key))).toBe("decryptionFailed");
  });

  it("refuses keys that are not 32 bytes", async () => {
    expect(await codeOf(encryptAesGcm(payload, new Uint8Array(16)))).toBe("encodingFailed");
  });
});
