import type { CardStatus, EllipticCurve } from "@cardkit/shared";

import { EMPTY_ATTESTATION, type Attestation } from "../attestation/attestation.js";
import type { FirmwareVersion } from "./firmware-version.js";

/**
 * Bit flags of the card settings mask.
 */
export const SettingsMask = {
  isReusable: 0x0001,
  allowSetAccessCode: 0x0010,
  allowSetPasscode: 0x0020,
  protectIssuerDataAgainstReplay: 0x4000,
} as const;

export type SettingsFlag = keyof typeof SettingsMask;

export interface CardWallet {
  readonly index: number;
  readonly publicKey: Uint8Array;
  readonly curve: EllipticCurve;
  /** Signatures made by this wallet, as last read from the card. */
  readonly totalSignedHashes?: number;
  readonly remainingSignatures?: number;
}

export interface Card {
  readonly cardId: string;
  readonly cardPublicKey: Uint8Array;
  readonly firmwareVersion: FirmwareVersion;
  readonly status: CardStatus;
  readonly settingsMask: number;
  readonly issuerPublicKey?: Uint8Array;
  readonly manufacturerName?: string;
  readonly batchId?: string;
  readonly manufactureDate?: Date;
  readonly issuerName?: string;
  readonly walletsCount: number;
  readonly isTerminalLinked: boolean;
  readonly wallets: readonly CardWallet[];
  /** Last attestation verdict produced in this session. */
  readonly attestation: Attestation;
}

export function hasSetting(card: Pick<Card, "settingsMask">, flag: SettingsFlag): boolean {
  return (card.settingsMask & SettingsMask[flag]) !== 0;
}

export function isDevelopmentCard(card: Pick<Card, "firmwareVersion">): boolean {
  return card.firmwareVersion.type === "sdk";
}

export function withAttestation(card: Card, attestation: Attestation): Card {
  return { ...card, attestation };
}

export function newCard(fields: Omit<Card, "attestation" | "wallets">): Card {
  return { ...fields, wallets: [], attestation: EMPTY_ATTESTATION };
}
