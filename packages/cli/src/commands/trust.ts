import chalk from "chalk";

import { FileSecureStorage, TrustedCardsRepository } from "@cardkit/sdk";

import { formatTrustedCard } from "../format.js";

export type TrustCommandArgs = {
  storage?: string;
};

async function openRepository(dir?: string): Promise<TrustedCardsRepository> {
  const repository = new TrustedCardsRepository({ storage: new FileSecureStorage(dir) });
  await repository.load();
  return repository;
}

export async function runList(argv: TrustCommandArgs): Promise<void> {
  const repository = await openRepository(argv.storage);
  const entries = repository.list();
  if (entries.length === 0) {
    console.info(chalk.gray("No trusted cards."));
    return;
  }
  for (const entry of entries) {
    console.log(formatTrustedCard(entry));
  }
  console.info(chalk.gray(`${entries.length} trusted card(s)`));
}

export async function runClear(argv: TrustCommandArgs): Promise<void> {
  const repository = await openRepository(argv.storage);
  const count = repository.size;
  await repository.clear();
  console.info(chalk.green(`Removed ${count} trusted card(s).`));
}
