import {
  CardSdkError,
  instructionApdu,
  TlvBuilder,
  concatBytes,
  hexToBytes,
  verifySignature,
  type TlvDecoder,
  type CommandApdu,
} from "@cardkit/shared";

import { hasSetting, type Card } from "../card/card.js";
import type { SessionEnvironment } from "../session/environment.js";
import type { Command } from "./command.js";

export const MAX_ISSUER_DATA_SIZE = 512;

export interface WriteIssuerDataResponse {
  cardId: string;
}

function counterBytes(counter: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, counter);
  return out;
}

/**
 * Bytes the issuer signs: cardId | data [| counter as 4-byte big-endian].
 */
export function issuerDataMessage(cardId: string, data: Uint8Array, counter?: number): Uint8Array {
  const id = hexToBytes(cardId);
  return counter === undefined ? concatBytes(id, data) : concatBytes(id, data, counterBytes(counter));
}

/**
 * Stores issuer data signed by the issuer key. Cards with replay protection
 * require a strictly increasing counter.
 */
export class WriteIssuerDataCommand implements Command<WriteIssuerDataResponse> {
  readonly name = "WriteIssuerData";
  readonly requiresCard = true;

  constructor(
    readonly issuerData: Uint8Array,
    readonly issuerDataSignature: Uint8Array,
    readonly issuerDataCounter?: number,
    readonly issuerPublicKey?: Uint8Array,
  ) {}

  precheck(card: Card): CardSdkError | null {
    if (card.status === "notPersonalized") {
      return new CardSdkError("notPersonalized", "Card is not personalized");
    }
    const issuerPublicKey = this.issuerPublicKey ?? card.issuerPublicKey;
    if (!issuerPublicKey) {
      return new CardSdkError("missingIssuerPublicKey", "Issuer public key is unknown");
    }
    if (this.issuerData.byteLength > MAX_ISSUER_DATA_SIZE) {
      return new CardSdkError(
        "dataSizeTooLarge",
        `Issuer data is ${this.issuerData.byteLength} bytes, max ${MAX_ISSUER_DATA_SIZE}`,
      );
    }
    if (hasSetting(card, "protectIssuerDataAgainstReplay") && this.issuerDataCounter === undefined) {
      return new CardSdkError("missingCounter", "Card protects issuer data against replay");
    }
    const message = issuerDataMessage(card.cardId, this.issuerData, this.issuerDataCounter);
    if (!verifySignature("secp256k1", issuerPublicKey, message, this.issuerDataSignature)) {
      return new CardSdkError("issuerSignatureInvalid", "Issuer data signature does not verify");
    }
    return null;
  }

  serialize(environment: SessionEnvironment): CommandApdu {
    const builder = new TlvBuilder({ legacyMode: environment.legacyMode })
      .append("pin", environment.accessCode)
      .append("cardId", environment.card?.cardId)
      .append("issuerData", this.issuerData)
      .append("issuerDataSignature", this.issuerDataSignature)
      .append("issuerDataCounter", this.issuerDataCounter);
    return instructionApdu("writeIssuerData", builder.serialize());
  }

  deserialize(_environment: SessionEnvironment, decoder: TlvDecoder): WriteIssuerDataResponse {
    return { cardId: decoder.decode("cardId") };
  }

  mapError(card: Card | undefined, error: CardSdkError): CardSdkError {
    if (error.code === "invalidParams" && card && hasSetting(card, "protectIssuerDataAgainstReplay")) {
      return new CardSdkError("dataCannotBeWritten", "Card rejected the issuer data counter", {
        cause: error,
      });
    }
    return error;
  }
}
