import { webcrypto } from "node:crypto";

import { CardSdkError } from "../errors.js";
import type { EncryptionMode } from "../types/index.js";
import { concatBytes } from "../utils/hex.js";

/**
 * Secure channel envelope for TLV payloads.
 *
 * AES-256-GCM through SubtleCrypto. Protected layout:
 *
 *   iv (12) | ciphertext | auth tag (16)
 *
 * With encryption mode `none` (or no key) protect/unprotect are identity.
 */

const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const subtle = webcrypto.subtle;

export function generateIv(): Uint8Array {
  const iv = new Uint8Array(IV_LENGTH);
  webcrypto.getRandomValues(iv);
  return iv;
}

async function importAesGcmKey(key: Uint8Array): Promise<webcrypto.CryptoKey> {
  if (key.byteLength !== KEY_LENGTH) {
    throw new CardSdkError("encodingFailed", "AES-256-GCM requires a 32-byte key");
  }
  return await subtle.importKey("raw", key, { name: "AES-GCM", length: 256 }, false, [
    "encrypt",
    "decrypt",
  ]);
}

/**
 * Encrypt and return iv | ciphertext | tag.
 */
export async function encryptAesGcm(
  plaintext: Uint8Array,
  key: Uint8Array,
  iv: Uint8Array = generateIv(),
): Promise<Uint8Array> {
  if (iv.byteLength !== IV_LENGTH) {
    throw new CardSdkError("encodingFailed", `AES-GCM IV must be ${IV_LENGTH} bytes`);
  }
  const cryptoKey = await importAesGcmKey(key);
  // SubtleCrypto appends the 16-byte tag to the ciphertext
  const sealed = await subtle.encrypt({ name: "AES-GCM", iv }, cryptoKey, plaintext);
  return concatBytes(iv, new Uint8Array(sealed));
}

/**
 * Decrypt iv | ciphertext | tag. Throws decryptionFailed on any
 * authentication or format problem.
 */
export async function decryptAesGcm(sealed: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
  if (sealed.byteLength < IV_LENGTH + TAG_LENGTH) {
    throw new CardSdkError(
      "decryptionFailed",
      `Protected payload too short (${sealed.byteLength} bytes)`,
    );
  }
  const iv = sealed.subarray(0, IV_LENGTH);
  const body = sealed.subarray(IV_LENGTH);

  try {
    const cryptoKey = await importAesGcmKey(key);
    const plain = await subtle.decrypt({ name: "AES-GCM", iv }, cryptoKey, body);
    return new Uint8Array(plain);
  } catch (error) {
    throw new CardSdkError("decryptionFailed", "Secure channel authentication failed", {
      cause: error,
    });
  }
}

/**
 * Envelope bound to one encryption mode and key. A session builds a new
 * one whenever its environment changes.
 */
export class SecureChannelEnvelope {
  constructor(
    readonly mode: EncryptionMode,
    private readonly key?: Uint8Array,
  ) {}

  static none(): SecureChannelEnvelope {
    return new SecureChannelEnvelope("none");
  }

  get isActive(): boolean {
    return this.mode !== "none" && this.key !== undefined;
  }

  async protect(serialized: Uint8Array): Promise<Uint8Array> {
    if (!this.isActive || !this.key) {
      return serialized;
    }
    return encryptAesGcm(serialized, this.key);
  }

  async unprotect(cipher: Uint8Array): Promise<Uint8Array> {
    if (!this.isActive || !this.key) {
      return cipher;
    }
    return decryptAesGcm(cipher, this.key);
  }
}
