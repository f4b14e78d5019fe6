/**
 * Card Session
 * Owns the environment snapshot and the transport for one tap. Commands
 * run strictly one at a time; the environment only changes between them.
 */

import { CardSdkError, createLogger, type Logger } from "@cardkit/shared";

import type { Card, CardWallet } from "../card/card.js";
import { executeCommand, type Command, type CommandChannel } from "../commands/command.js";
import { ReadCommand } from "../commands/read-command.js";
import { ReadWalletCommand } from "../commands/read-wallet-command.js";
import type { SdkConfig } from "../lib/config-manager.js";
import {
  applyPatch,
  createEnvironment,
  hashCode,
  type EnvironmentPatch,
  type SessionEnvironment,
} from "./environment.js";
import type { CardTransport } from "./transport.js";

/**
 * Host hook for recoverable card errors (needEncryption,
 * invalidAccessCode, accessCodeRequired). Returning null gives up.
 */
export interface RecoveryHandler {
  recover(error: CardSdkError, environment: SessionEnvironment): Promise<EnvironmentPatch | null>;
}

export interface CardSessionOptions {
  recovery?: RecoveryHandler;
  environment?: EnvironmentPatch;
  logger?: Logger;
}

export class CardSession {
  private env: SessionEnvironment;
  private queue: Promise<unknown> = Promise.resolve();
  private paused = false;
  private readonly recovery?: RecoveryHandler;
  private readonly logger: Logger;

  constructor(
    private readonly transport: CardTransport,
    config: SdkConfig,
    options: CardSessionOptions = {},
  ) {
    this.env = createEnvironment(config, options.environment);
    this.recovery = options.recovery;
    this.logger = options.logger ?? createLogger("sdk:session", config.logLevel);
  }

  get environment(): SessionEnvironment {
    return this.env;
  }

  get card(): Card | undefined {
    return this.env.card;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Queue a command behind the ones already sent.
   */
  send<T>(command: Command<T>): Promise<T> {
    const run = this.queue.then(() => this.execute(command));
    // keep the chain alive; the caller gets the rejection through `run`
    this.queue = run.catch(() => undefined);
    return run;
  }

  apply(patch: EnvironmentPatch): void {
    this.env = applyPatch(this.env, patch);
  }

  /**
   * Replace the card snapshot, e.g. to record an attestation verdict.
   */
  updateCard(update: (card: Card) => Card): Card {
    const card = this.env.card;
    if (!card) {
      throw new CardSdkError("missingPreflightRead", "No card in session");
    }
    const next = update(card);
    this.apply({ card: next });
    return next;
  }

  setAccessCode(code: string): void {
    this.apply({ accessCode: hashCode(code) });
  }

  setPasscode(code: string): void {
    this.apply({ passcode: hashCode(code) });
  }

  /**
   * Preflight read followed by every wallet slot, in index order.
   */
  async scan(): Promise<Card> {
    const card = await this.send(new ReadCommand());
    this.apply({ card });
    this.logger.info("Card read", { cardId: card.cardId, walletsCount: card.walletsCount });

    const wallets: CardWallet[] = [];
    for (let index = 0; index < card.walletsCount; index++) {
      const wallet = await this.send(new ReadWalletCommand(index));
      if (wallet) {
        wallets.push(wallet);
      }
    }
    return this.updateCard((current) => ({ ...current, wallets }));
  }

  async pause(): Promise<void> {
    if (this.paused) {
      return;
    }
    await this.transport.pause();
    this.paused = true;
    this.logger.debug("Session paused");
  }

  async resume(): Promise<void> {
    if (!this.paused) {
      return;
    }
    await this.transport.resume();
    this.paused = false;
    this.logger.debug("Session resumed");
  }

  private async execute<T>(command: Command<T>): Promise<T> {
    await this.resume();
    return executeCommand(command, this.channel());
  }

  private channel(): CommandChannel {
    return {
      logger: this.logger,
      environment: () => this.env,
      transceive: (apdu) => this.transport.transceive(apdu),
      recover: async (error) => {
        if (!this.recovery) {
          return false;
        }
        const patch = await this.recovery.recover(error, this.env);
        if (!patch) {
          return false;
        }
        this.apply(patch);
        return true;
      },
    };
  }
}
