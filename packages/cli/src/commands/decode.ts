import chalk from "chalk";

import {
  deserializeTlv,
  hexToBytes,
  isCardSdkError,
  isSuccessResponse,
  parseResponse,
  statusWordName,
} from "@cardkit/shared";

import { formatTlv } from "../format.js";

export type DecodeCommandArgs = {
  hex?: string;
  response?: boolean;
};

/**
 * Print a TLV payload, or a full response APDU with --response.
 */
export async function run(argv: DecodeCommandArgs): Promise<void> {
  const { hex, response } = argv;

  if (!hex) {
    console.error(chalk.red('Missing required option: --hex "<HEX>"'));
    process.exitCode = 2;
    return;
  }

  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(hex);
  } catch {
    console.error(chalk.red("Invalid hex format (must be even-length hex)"));
    process.exitCode = 2;
    return;
  }

  try {
    let payload = bytes;
    if (response) {
      const apdu = parseResponse(bytes);
      const sw = apdu.sw.toString(16).toUpperCase().padStart(4, "0");
      const line = `SW ${sw} ${statusWordName(apdu.sw)}`;
      console.log(isSuccessResponse(apdu) ? chalk.green(line) : chalk.red(line));
      payload = apdu.data;
    }
    for (const line of formatTlv(deserializeTlv(payload))) {
      console.log(line);
    }
  } catch (error) {
    if (!isCardSdkError(error)) {
      throw error;
    }
    console.error(chalk.red(`${error.code}: ${error.message}`));
    process.exitCode = 1;
  }
}
