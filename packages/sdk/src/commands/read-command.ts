import {
  CardSdkError,
  instructionApdu,
  TlvBuilder,
  TlvDecoder,
  type CommandApdu,
} from "@cardkit/shared";

import { newCard, type Card } from "../card/card.js";
import { parseFirmwareVersion, type FirmwareVersion } from "../card/firmware-version.js";
import type { SessionEnvironment } from "../session/environment.js";
import type { Command } from "./command.js";

export const InteractionMode = {
  readCard: 0x01,
  readWallet: 0x02,
  fullAttestation: 0x03,
} as const;

function readFirmware(raw: string): FirmwareVersion {
  try {
    return parseFirmwareVersion(raw);
  } catch (error) {
    throw new CardSdkError("decodingTypeMismatch", `Tag firmwareVersion: ${raw}`, { cause: error });
  }
}

/**
 * Preflight read. Every other command needs the card it returns.
 */
export class ReadCommand implements Command<Card> {
  readonly name = "Read";
  readonly requiresCard = false;

  serialize(environment: SessionEnvironment): CommandApdu {
    const builder = new TlvBuilder({ legacyMode: environment.legacyMode })
      .append("pin", environment.accessCode)
      .append("interactionMode", InteractionMode.readCard)
      .append("terminalPublicKey", environment.terminalKeys?.publicKey);
    return instructionApdu("read", builder.serialize());
  }

  deserialize(_environment: SessionEnvironment, decoder: TlvDecoder): Card {
    const status = decoder.decode("status");
    if (status === "notPersonalized") {
      throw new CardSdkError("notPersonalized", "Card is not personalized");
    }

    const cardData = decoder.decodeOptional("cardData");
    const manufacturing = cardData ? new TlvDecoder(cardData) : undefined;

    return newCard({
      cardId: decoder.decode("cardId"),
      cardPublicKey: decoder.decode("cardPublicKey"),
      firmwareVersion: readFirmware(decoder.decode("firmwareVersion")),
      status,
      settingsMask: decoder.decode("settingsMask"),
      issuerPublicKey: decoder.decodeOptional("issuerPublicKey"),
      manufacturerName: decoder.decodeOptional("manufacturerName"),
      batchId: manufacturing?.decodeOptional("batchId"),
      manufactureDate: manufacturing?.decodeOptional("manufactureDateTime"),
      issuerName: manufacturing?.decodeOptional("issuerName"),
      walletsCount: decoder.decodeOptional("walletsCount") ?? 0,
      isTerminalLinked: decoder.decodeOptional("terminalIsLinked") ?? false,
    });
  }
}
