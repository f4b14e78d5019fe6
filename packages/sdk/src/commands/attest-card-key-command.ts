import {
  CardSdkError,
  instructionApdu,
  TlvBuilder,
  concatBytes,
  randomBytes,
  verifySignature,
  type TlvDecoder,
  type CommandApdu,
} from "@cardkit/shared";

import type { Card } from "../card/card.js";
import { KEYS_IMPORT_AVAILABLE, compareFirmware } from "../card/firmware-version.js";
import type { SessionEnvironment } from "../session/environment.js";
import type { Command } from "./command.js";
import { InteractionMode } from "./read-command.js";

export type CardKeyAttestationMode = "default" | "full";

export const CHALLENGE_LENGTH = 16;

const BACKUP_CARDS_MARKER = new TextEncoder().encode("BACKUP_CARDS");

export interface AttestCardKeyResponse {
  cardId: string;
  salt: Uint8Array;
  cardSignature: Uint8Array;
  challenge: Uint8Array;
  /** Public keys of linked backup cards, full mode only. */
  linkedCardPublicKeys: Uint8Array[];
}

/**
 * Message the card signs: challenge | salt, followed in full mode by
 * "BACKUP_CARDS" and the linked card keys when there are any.
 */
export function cardKeyAttestationMessage(
  challenge: Uint8Array,
  salt: Uint8Array,
  linkedCardPublicKeys: readonly Uint8Array[] = [],
): Uint8Array {
  if (linkedCardPublicKeys.length === 0) {
    return concatBytes(challenge, salt);
  }
  return concatBytes(challenge, salt, BACKUP_CARDS_MARKER, ...linkedCardPublicKeys);
}

/**
 * Challenge-response proof that the card holds the private half of its
 * card public key.
 */
export class AttestCardKeyCommand implements Command<AttestCardKeyResponse> {
  readonly name = "AttestCardKey";
  readonly requiresCard = true;
  readonly challenge: Uint8Array;

  constructor(
    readonly mode: CardKeyAttestationMode = "default",
    challenge?: Uint8Array,
  ) {
    this.challenge = challenge ?? randomBytes(CHALLENGE_LENGTH);
  }

  precheck(card: Card): CardSdkError | null {
    if (this.mode === "full" && compareFirmware(card.firmwareVersion, KEYS_IMPORT_AVAILABLE) < 0) {
      return new CardSdkError("notSupportedFirmwareVersion", "Full card key attestation needs firmware 6.16");
    }
    return null;
  }

  serialize(environment: SessionEnvironment): CommandApdu {
    const builder = new TlvBuilder({ legacyMode: environment.legacyMode })
      .append("pin", environment.accessCode)
      .append("cardId", environment.card?.cardId)
      .append("challenge", this.challenge);
    if (this.mode === "full") {
      builder.append("interactionMode", InteractionMode.fullAttestation);
    }
    return instructionApdu("attestCardKey", builder.serialize());
  }

  deserialize(_environment: SessionEnvironment, decoder: TlvDecoder): AttestCardKeyResponse {
    return {
      cardId: decoder.decode("cardId"),
      salt: decoder.decode("salt"),
      cardSignature: decoder.decode("cardSignature"),
      challenge: this.challenge,
      linkedCardPublicKeys: decoder.decodeAll("backupCardPublicKey"),
    };
  }

  verifyResponse(environment: SessionEnvironment, result: AttestCardKeyResponse): void {
    const card = environment.card;
    if (!card) {
      throw new CardSdkError("missingPreflightRead", "No card to verify against");
    }
    if (result.cardId.toUpperCase() !== card.cardId.toUpperCase()) {
      throw new CardSdkError("cardVerificationFailed", `Response is for card ${result.cardId}`);
    }
    const message = cardKeyAttestationMessage(result.challenge, result.salt, result.linkedCardPublicKeys);
    if (!verifySignature("secp256k1", card.cardPublicKey, message, result.cardSignature)) {
      throw new CardSdkError("cardVerificationFailed", "Card key signature is invalid");
    }
  }
}
