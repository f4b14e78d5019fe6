import {
  CardSdkError,
  instructionApdu,
  TlvBuilder,
  bytesEqual,
  concatBytes,
  randomBytes,
  verifySignature,
  type TlvDecoder,
  type CommandApdu,
} from "@cardkit/shared";

import type { Card, CardWallet } from "../card/card.js";
import { WALLET_ATTESTATION_AVAILABLE, compareFirmware } from "../card/firmware-version.js";
import type { SessionEnvironment } from "../session/environment.js";
import { CHALLENGE_LENGTH } from "./attest-card-key-command.js";
import type { Command } from "./command.js";

export interface AttestWalletKeyResponse {
  cardId: string;
  salt: Uint8Array;
  walletSignature: Uint8Array;
  challenge: Uint8Array;
  /** Signatures made by the wallet, when the card reports it. */
  counter?: number;
}

function findWallet(card: Card | undefined, publicKey: Uint8Array): CardWallet | undefined {
  return card?.wallets.find((w) => bytesEqual(w.publicKey, publicKey));
}

/**
 * Proves the card holds a wallet's private key: the wallet signs
 * challenge | salt.
 */
export class AttestWalletKeyCommand implements Command<AttestWalletKeyResponse> {
  readonly name = "AttestWalletKey";
  readonly requiresCard = true;
  readonly challenge: Uint8Array;

  constructor(
    readonly publicKey: Uint8Array,
    challenge?: Uint8Array,
  ) {
    this.challenge = challenge ?? randomBytes(CHALLENGE_LENGTH);
  }

  precheck(card: Card): CardSdkError | null {
    if (compareFirmware(card.firmwareVersion, WALLET_ATTESTATION_AVAILABLE) < 0) {
      return new CardSdkError("notSupportedFirmwareVersion", "Wallet key attestation needs firmware 2.0");
    }
    if (!findWallet(card, this.publicKey)) {
      return new CardSdkError("walletNotFound", "No wallet with this public key on the card");
    }
    return null;
  }

  serialize(environment: SessionEnvironment): CommandApdu {
    const builder = new TlvBuilder({ legacyMode: environment.legacyMode })
      .append("pin", environment.accessCode)
      .append("cardId", environment.card?.cardId)
      .append("walletPublicKey", this.publicKey)
      .append("challenge", this.challenge);
    return instructionApdu("attestWalletKey", builder.serialize());
  }

  deserialize(_environment: SessionEnvironment, decoder: TlvDecoder): AttestWalletKeyResponse {
    return {
      cardId: decoder.decode("cardId"),
      salt: decoder.decode("salt"),
      walletSignature: decoder.decode("walletSignature"),
      challenge: this.challenge,
      counter: decoder.decodeOptional("checkWalletCounter"),
    };
  }

  verifyResponse(environment: SessionEnvironment, result: AttestWalletKeyResponse): void {
    const wallet = findWallet(environment.card, this.publicKey);
    if (!wallet) {
      throw new CardSdkError("walletNotFound", "Wallet disappeared from the card snapshot");
    }
    const message = concatBytes(result.challenge, result.salt);
    if (!verifySignature(wallet.curve, wallet.publicKey, message, result.walletSignature)) {
      throw new CardSdkError("cardVerificationFailed", `Wallet ${wallet.index} signature is invalid`);
    }
  }
}
