import { webcrypto } from "node:crypto";

import { ed25519 } from "@noble/curves/ed25519";
import { p256 } from "@noble/curves/p256";
import { secp256k1 } from "@noble/curves/secp256k1";
import { sha256 as nobleSha256 } from "@noble/hashes/sha256";

import type { EllipticCurve } from "../types/index.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("shared:signing");

/**
 * Signature primitives used by attestation.
 *
 * secp256k1 / secp256r1 signatures are 64-byte compact r|s over SHA-256 of
 * the message; Ed25519 signs the message itself.
 */

export function sha256(data: Uint8Array | string): Uint8Array {
  return nobleSha256(data);
}

export function randomBytes(count: number): Uint8Array {
  const out = new Uint8Array(count);
  webcrypto.getRandomValues(out);
  return out;
}

/**
 * Verify a detached signature. Malformed keys or signatures verify as false.
 */
export function verifySignature(
  curve: EllipticCurve,
  publicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array,
): boolean {
  try {
    switch (curve) {
      case "secp256k1":
        // cards do not normalize S
        return secp256k1.verify(signature, sha256(message), publicKey, { lowS: false });
      case "secp256r1":
        return p256.verify(signature, sha256(message), publicKey, { lowS: false });
      case "ed25519":
        return ed25519.verify(signature, message, publicKey);
    }
  } catch (error) {
    logger.debug("Signature rejected as malformed", {
      curve,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Sign a message. Used by the in-process mock card and issuer tooling.
 */
export function signMessage(curve: EllipticCurve, privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  switch (curve) {
    case "secp256k1":
      return secp256k1.sign(sha256(message), privateKey).toCompactRawBytes();
    case "secp256r1":
      return p256.sign(sha256(message), privateKey).toCompactRawBytes();
    case "ed25519":
      return ed25519.sign(message, privateKey);
  }
}

/**
 * Public key for a private key; uncompressed (65 bytes) on the secp curves.
 */
export function derivePublicKey(curve: EllipticCurve, privateKey: Uint8Array): Uint8Array {
  switch (curve) {
    case "secp256k1":
      return secp256k1.getPublicKey(privateKey, false);
    case "secp256r1":
      return p256.getPublicKey(privateKey, false);
    case "ed25519":
      return ed25519.getPublicKey(privateKey);
  }
}
