import { TlvBuilder, instructionApdu, type CommandApdu, type TlvDecoder } from "@cardkit/shared";

import type { CardWallet } from "../card/card.js";
import type { SessionEnvironment } from "../session/environment.js";
import type { Command } from "./command.js";
import { InteractionMode } from "./read-command.js";

/**
 * Reads one wallet slot. Resolves null for an empty slot.
 */
export class ReadWalletCommand implements Command<CardWallet | null> {
  readonly name = "ReadWallet";
  readonly requiresCard = true;

  constructor(readonly index: number) {}

  serialize(environment: SessionEnvironment): CommandApdu {
    const builder = new TlvBuilder({ legacyMode: environment.legacyMode })
      .append("pin", environment.accessCode)
      .append("interactionMode", InteractionMode.readWallet)
      .append("walletIndex", this.index)
      .append("terminalPublicKey", environment.terminalKeys?.publicKey);
    return instructionApdu("read", builder.serialize());
  }

  deserialize(_environment: SessionEnvironment, decoder: TlvDecoder): CardWallet | null {
    const publicKey = decoder.decodeOptional("walletPublicKey");
    if (!publicKey) {
      return null;
    }
    return {
      index: decoder.decodeOptional("walletIndex") ?? this.index,
      publicKey,
      curve: decoder.decode("curveId"),
      totalSignedHashes: decoder.decodeOptional("walletSignedHashes"),
      remainingSignatures: decoder.decodeOptional("walletRemainingSignatures"),
    };
  }
}
