/**
 * Shared type definitions
 */

/**
 * Curves a card wallet may be created on
 */
export type EllipticCurve = "secp256k1" | "ed25519" | "secp256r1";

export const ELLIPTIC_CURVES: readonly EllipticCurve[] = ["secp256k1", "ed25519", "secp256r1"];

/**
 * Life-cycle status reported by the card
 */
export type CardStatus = "notPersonalized" | "empty" | "loaded" | "purged";

/**
 * Secure channel modes. `none` means payloads travel in clear.
 */
export type EncryptionMode = "none" | "fast" | "strong";

export const ENCRYPTION_MODE_CODES: Record<EncryptionMode, number> = {
  none: 0x00,
  fast: 0x01,
  strong: 0x02,
};
