import chalk from "chalk";

import {
  CardSdk,
  ConfigManager,
  MemorySecureStorage,
  MockCard,
  isAttestationMode,
  type AttestationPrompt,
} from "@cardkit/sdk";

import { formatCard, formatVerdict } from "../format.js";

export type DemoCommandArgs = {
  mode?: string;
  config?: string;
};

/**
 * Answers every prompt with "continue" and says so.
 */
export const acceptingPrompt: AttestationPrompt = {
  attestationDidFail(isDevelopmentCard, { onContinue }) {
    console.info(chalk.yellow(`Attestation failed${isDevelopmentCard ? " (development card)" : ""}, continuing`));
    onContinue();
  },
  attestationCompletedOffline({ onContinue }) {
    console.info(chalk.yellow("Card verified offline only, continuing"));
    onContinue();
  },
  attestationCompletedWithWarnings({ onContinue }) {
    console.info(chalk.yellow("Attestation completed with warnings, continuing"));
    onContinue();
  },
};

/**
 * Scan and attest the in-process mock card.
 */
export async function run(argv: DemoCommandArgs): Promise<void> {
  const mode = argv.mode ?? "offline";
  if (!isAttestationMode(mode)) {
    console.error(chalk.red(`Unknown attestation mode: ${mode}`));
    process.exitCode = 2;
    return;
  }

  const config = { ...(argv.config ? new ConfigManager(argv.config) : new ConfigManager()).load(), attestationMode: mode };
  const sdk = await CardSdk.create({ config, prompt: acceptingPrompt, storage: new MemorySecureStorage() });
  const { card, attestation } = await sdk.scanCard(new MockCard());

  for (const line of formatCard(card)) {
    console.log(line);
  }
  console.log(formatVerdict(attestation));
}
