import { CardSdkError, createLogger, type Logger } from "@cardkit/shared";

import { AttestationTask, type AttestationTaskOptions } from "./attestation/attestation-task.js";
import type { AttestationVerdict } from "./attestation/attestation.js";
import { OnlineCardVerifier, type OnlineVerificationService } from "./attestation/online-card-verifier.js";
import type { AttestationPrompt } from "./attestation/prompt.js";
import { TrustedCardsRepository } from "./attestation/trusted-cards-repository.js";
import type { Card } from "./card/card.js";
import type { SdkConfig } from "./lib/config-manager.js";
import type { SecureStorage } from "./lib/secure-storage.js";
import { CardSession, type RecoveryHandler } from "./session/card-session.js";
import type { EnvironmentPatch } from "./session/environment.js";
import type { CardTransport } from "./session/transport.js";

export interface CardSdkOptions {
  config: SdkConfig;
  prompt: AttestationPrompt;
  storage?: SecureStorage;
  /** Defaults to the HTTP verifier at config.verifierUrl. */
  verifier?: OnlineVerificationService;
  recovery?: RecoveryHandler;
  logger?: Logger;
}

export interface ScanResult {
  card: Card;
  attestation: AttestationVerdict;
}

/**
 * Entry point for hosts: wires the trust cache, the verifier and the prompt
 * into sessions.
 *
 * ```typescript
 * const sdk = await CardSdk.create({ config, prompt, storage });
 * const { card, attestation } = await sdk.scanCard(transport);
 * ```
 */
export class CardSdk {
  private readonly logger: Logger;

  private constructor(
    private readonly options: CardSdkOptions,
    readonly trustedCards: TrustedCardsRepository,
    private readonly verifier: OnlineVerificationService,
  ) {
    this.logger = options.logger ?? createLogger("sdk", options.config.logLevel);
  }

  static async create(options: CardSdkOptions): Promise<CardSdk> {
    const logger = options.logger ?? createLogger("sdk", options.config.logLevel);
    const trustedCards = new TrustedCardsRepository({
      storage: options.storage,
      logger: logger.child({ operation: "trusted-cards" }),
    });
    await trustedCards.load();
    const verifier = options.verifier ?? new OnlineCardVerifier(options.config.verifierUrl);
    return new CardSdk(options, trustedCards, verifier);
  }

  openSession(transport: CardTransport, environment?: EnvironmentPatch): CardSession {
    return new CardSession(transport, this.options.config, {
      recovery: this.options.recovery,
      environment,
      logger: this.logger.child({ operation: "session" }),
    });
  }

  /**
   * Read the card and all wallets, then attest it.
   */
  async scanCard(transport: CardTransport, options?: AttestationTaskOptions): Promise<ScanResult> {
    const session = this.openSession(transport);
    await session.scan();
    return this.attest(session, options);
  }

  async attest(session: CardSession, options?: AttestationTaskOptions): Promise<ScanResult> {
    const task = new AttestationTask(
      {
        session,
        trustedCards: this.trustedCards,
        verifier: this.verifier,
        prompt: this.options.prompt,
        logger: this.logger.child({ operation: "attestation" }),
      },
      options,
    );
    const attestation = await task.run();
    const card = session.card;
    if (!card) {
      throw new CardSdkError("missingPreflightRead", "Card disappeared from the session");
    }
    return { card, attestation };
  }
}
