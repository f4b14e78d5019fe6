/**
 * Attestation Task
 * Card key check, trust cache short-circuit, online verification, wallet
 * key checks (full mode) and the final decision, with prompts where the
 * verdict is not good enough on its own.
 *
 * start → cardKey → (trusted | offline) → online dispatch → wallets →
 * wait online → decision → complete
 */

import {
  CardSdkError,
  createLogger,
  isCardSdkError,
  toCardSdkError,
  type Logger,
} from "@cardkit/shared";

import { isDevelopmentCard, withAttestation, type Card } from "../card/card.js";
import {
  KEYS_IMPORT_AVAILABLE,
  WALLET_ATTESTATION_AVAILABLE,
  compareFirmware,
} from "../card/firmware-version.js";
import { AttestCardKeyCommand } from "../commands/attest-card-key-command.js";
import { AttestWalletKeyCommand } from "../commands/attest-wallet-key-command.js";
import type { CardSession } from "../session/card-session.js";
import {
  attestationStatus,
  modeSatisfies,
  toVerdict,
  type Attestation,
  type AttestationMode,
  type AttestationStatus,
  type AttestationVerdict,
} from "./attestation.js";
import type { OnlineVerificationService } from "./online-card-verifier.js";
import { OnlineResultSlot, type OnlineOutcome } from "./online-result-slot.js";
import {
  askCompletedOffline,
  askCompletedWithWarnings,
  askDidFail,
  type AttestationPrompt,
} from "./prompt.js";
import type { TrustedCardsRepository } from "./trusted-cards-repository.js";

/** Wallets that signed more than this many hashes get a warning. */
export const MAX_COUNTER = 100000;

export interface AttestationTaskDependencies {
  session: CardSession;
  trustedCards: TrustedCardsRepository;
  verifier: OnlineVerificationService;
  prompt: AttestationPrompt;
  logger?: Logger;
}

export interface AttestationTaskOptions {
  /** Defaults to the configured attestation mode. */
  mode?: AttestationMode;
  /** Keep the radio up while waiting on the online lookup. */
  keepSessionOpened?: boolean;
}

export class AttestationTask {
  private readonly session: CardSession;
  private readonly trustedCards: TrustedCardsRepository;
  private readonly verifier: OnlineVerificationService;
  private readonly prompt: AttestationPrompt;
  private readonly logger: Logger;

  constructor(
    dependencies: AttestationTaskDependencies,
    private readonly options: AttestationTaskOptions = {},
  ) {
    this.session = dependencies.session;
    this.trustedCards = dependencies.trustedCards;
    this.verifier = dependencies.verifier;
    this.prompt = dependencies.prompt;
    this.logger = dependencies.logger ?? createLogger("sdk:attestation");
  }

  async run(): Promise<AttestationVerdict> {
    const card = this.session.card;
    if (!card) {
      throw new CardSdkError("missingPreflightRead", "Read the card before attesting it");
    }

    const mode = this.options.mode ?? this.session.environment.config.attestationMode;
    if (mode === "full" && compareFirmware(card.firmwareVersion, WALLET_ATTESTATION_AVAILABLE) < 0) {
      throw new CardSdkError("unsupportedAttestationMode", "Full attestation needs firmware 2.0");
    }

    const log = this.logger.child({ cardId: card.cardId, mode });
    log.info("Attestation started");

    const slot = new OnlineResultSlot(log);
    try {
      return await this.attest(card, mode, slot);
    } finally {
      slot.dispose();
    }
  }

  private async attest(card: Card, mode: AttestationMode, slot: OnlineResultSlot): Promise<AttestationVerdict> {
    let attestation: Attestation = {
      cardKeyAttestation: "notAttested",
      walletKeysAttestation: "notAttested",
      mode,
    };

    if (await this.attestCardKey(card, mode)) {
      const trusted = this.trustedCards.lookup(card.cardPublicKey);
      if (trusted && modeSatisfies(trusted.mode, mode)) {
        this.logger.info("Card found in trust cache", { cardId: card.cardId, trustedMode: trusted.mode });
        return this.complete(trusted);
      }
      attestation = { ...attestation, cardKeyAttestation: "verifiedOffline" };
    } else {
      attestation = { ...attestation, cardKeyAttestation: "failed" };
    }

    if (mode !== "offline") {
      this.dispatchOnline(slot, card);

      if (mode === "full") {
        attestation = { ...attestation, walletKeysAttestation: await this.attestWallets(card) };
      }
      if (!this.options.keepSessionOpened) {
        await this.session.pause();
      }
      attestation = await this.applyOnline(card, attestation, await slot.wait());
    }

    return this.decide(card, mode, attestation, slot);
  }

  /**
   * true when the card proved its key, false on a verification failure.
   */
  private async attestCardKey(card: Card, mode: AttestationMode): Promise<boolean> {
    const full = mode === "full" && compareFirmware(card.firmwareVersion, KEYS_IMPORT_AVAILABLE) >= 0;
    try {
      await this.session.send(new AttestCardKeyCommand(full ? "full" : "default"));
      return true;
    } catch (error) {
      if (isCardSdkError(error, "cardVerificationFailed")) {
        this.logger.warn("Card key attestation failed", { cardId: card.cardId });
        return false;
      }
      throw error;
    }
  }

  private async attestWallets(card: Card): Promise<AttestationStatus> {
    let status: AttestationStatus = "verified";
    for (const wallet of card.wallets) {
      if (wallet.totalSignedHashes !== undefined && wallet.totalSignedHashes > MAX_COUNTER) {
        this.logger.warn("Wallet signed too many hashes", { index: wallet.index, counter: wallet.totalSignedHashes });
        status = "warning";
      }
    }
    for (const wallet of card.wallets) {
      try {
        const response = await this.session.send(new AttestWalletKeyCommand(wallet.publicKey));
        if (response.counter !== undefined && response.counter > MAX_COUNTER) {
          this.logger.warn("Wallet signed too many hashes", { index: wallet.index, counter: response.counter });
          status = "warning";
        }
      } catch (error) {
        if (isCardSdkError(error, "cardVerificationFailed")) {
          this.logger.warn("Wallet key attestation failed", { index: wallet.index });
          return "failed";
        }
        throw error;
      }
    }
    return status;
  }

  private dispatchOnline(slot: OnlineResultSlot, card: Card): void {
    slot.dispatch(async (signal): Promise<OnlineOutcome> => {
      if (isDevelopmentCard(card) || card.attestation.cardKeyAttestation === "failed") {
        return {
          kind: "verificationFailed",
          error: new CardSdkError("cardVerificationFailed", "Online verification is not available for this card"),
        };
      }
      try {
        const info = await this.verifier.verify(card.cardId, card.cardPublicKey, signal);
        return { kind: "verified", info };
      } catch (error) {
        const failure = toCardSdkError(error, "networkError");
        return failure.isVerificationFailure
          ? { kind: "verificationFailed", error: failure }
          : { kind: "unavailable", error: failure };
      }
    });
  }

  private async applyOnline(card: Card, attestation: Attestation, outcome: OnlineOutcome): Promise<Attestation> {
    switch (outcome.kind) {
      case "verified": {
        const verified: Attestation = { ...attestation, cardKeyAttestation: "verified" };
        if (attestationStatus(verified) !== "failed") {
          await this.trustedCards.record(card.cardPublicKey, verified);
        }
        return verified;
      }
      case "verificationFailed":
        this.logger.warn("Online verification failed", { cardId: card.cardId, reason: outcome.error.message });
        return { ...attestation, cardKeyAttestation: "failed" };
      case "unavailable":
        this.logger.warn("Online verification unavailable", { cardId: card.cardId, reason: outcome.error.message });
        return attestation;
    }
  }

  private async decide(
    card: Card,
    mode: AttestationMode,
    attestation: Attestation,
    slot: OnlineResultSlot,
  ): Promise<AttestationVerdict> {
    switch (attestationStatus(attestation)) {
      case "verified":
        return this.complete(attestation);

      case "warning":
        await askCompletedWithWarnings(this.prompt);
        return this.complete(attestation);

      case "verifiedOffline": {
        if (mode === "offline") {
          return this.complete(attestation);
        }
        const decision = await askCompletedOffline(this.prompt);
        if (decision === "continue") {
          return this.complete(attestation);
        }
        if (decision === "retry") {
          this.dispatchOnline(slot, card);
          const retried = await this.applyOnline(card, attestation, await slot.wait());
          return this.decide(card, mode, retried, slot);
        }
        throw new CardSdkError("userCancelled", "Attestation cancelled by the user");
      }

      case "failed":
      case "skipped":
      case "notAttested": {
        const isDevelopment = isDevelopmentCard(card);
        if (!isDevelopment && !this.session.environment.config.allowUntrustedCards) {
          throw new CardSdkError("cardVerificationFailed", `Card ${card.cardId} failed attestation`);
        }
        const decision = await askDidFail(this.prompt, isDevelopment);
        if (decision === "continue") {
          return this.complete(attestation);
        }
        throw new CardSdkError("userCancelled", "Attestation cancelled by the user");
      }
    }
  }

  private complete(attestation: Attestation): AttestationVerdict {
    this.session.updateCard((card) => withAttestation(card, attestation));
    const verdict = toVerdict(attestation);
    this.logger.info("Attestation complete", { status: verdict.status, mode: verdict.mode });
    return verdict;
  }
}
