#!/usr/bin/env node
/**
 * cardkit CLI
 * Thin command line layer around the SDK: decode TLV payloads, inspect the
 * trust cache, show or change configuration.
 */

import chalk from "chalk";
import yargs from "yargs";
import type { Argv } from "yargs";
import { hideBin } from "yargs/helpers";

import { runSet as runConfigSet, runShow as runConfigShow } from "./commands/config.js";
import { run as runDecode } from "./commands/decode.js";
import { run as runDemo } from "./commands/demo.js";
import { runClear as runTrustClear, runList as runTrustList } from "./commands/trust.js";

const configOption = {
  type: "string",
  desc: "Path to config.json (default ~/.cardkit/config.json)",
} as const;

const storageOption = {
  type: "string",
  desc: "Secure storage directory (default ~/.cardkit/storage)",
} as const;

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("cardkit")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .option("config", configOption)
    .command(
      "decode",
      "Decode a TLV payload (hex)",
      (y: Argv) =>
        y
          .option("hex", {
            type: "string",
            demandOption: true,
            desc: "TLV bytes as hex",
          })
          .option("response", {
            type: "boolean",
            default: false,
            desc: "Input is a response APDU ending in SW1SW2",
          }),
      (argv) => runDecode(argv),
    )
    .command("trust", "Inspect the trusted cards cache", (y: Argv) =>
      y
        .command(
          "list",
          "List trusted cards",
          (l: Argv) => l.option("storage", storageOption),
          (argv) => runTrustList(argv),
        )
        .command(
          "clear",
          "Forget every trusted card",
          (c: Argv) => c.option("storage", storageOption),
          (argv) => runTrustClear(argv),
        )
        .demandCommand(1, "Please specify list or clear"),
    )
    .command("config", "Show or change configuration", (y: Argv) =>
      y
        .command(
          "show",
          "Print the effective configuration",
          (c: Argv) => c.option("config", configOption),
          (argv) => runConfigShow(argv),
        )
        .command(
          "set <key> <value>",
          "Persist one setting",
          (c: Argv) =>
            c
              .option("config", configOption)
              .positional("key", { type: "string", desc: "Setting name" })
              .positional("value", { type: "string", desc: "New value" }),
          (argv) => runConfigSet(argv),
        )
        .demandCommand(1, "Please specify show or set"),
    )
    .command(
      "demo",
      "Scan and attest the built-in mock card",
      (y: Argv) =>
        y.option("config", configOption).option("mode", {
          type: "string",
          choices: ["offline", "normal", "full"],
          default: "offline",
          desc: "Attestation mode",
        }),
      (argv) => runDemo(argv),
    )
    .help()
    .alias("h", "help")
    .version("0.1.0")
    .demandCommand(1, "Please specify a command")
    .parseAsync();
}

main().catch((err) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
