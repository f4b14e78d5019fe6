/**
 * APDU framing on top of jsapdu-interface.
 *
 * Command:  CLA INS P1 P2 [Lc data]   (no Le)
 * Response: data SW1 SW2
 *
 * P1 carries the encryption mode of the data field.
 */

import { CommandApdu, ResponseApdu } from "@aokiapp/jsapdu-interface";

import { CardSdkError, type CardSdkErrorCode } from "../errors.js";

export { CommandApdu, ResponseApdu };

export const Instruction = {
  read: 0xf2,
  attestCardKey: 0xf3,
  writeIssuerData: 0xf6,
  attestWalletKey: 0xfb,
} as const;

export type InstructionName = keyof typeof Instruction;

export const CLA = 0x00;
export const MAX_APDU_DATA_LENGTH = 0xffff;

/**
 * Status words returned by the card, keyed by SW1SW2.
 */
export const STATUS_WORDS = {
  0x9000: "processCompleted",
  0x6a86: "invalidParams",
  0x6a82: "fileNotFound",
  0x6985: "invalidState",
  0x6982: "needEncryption",
  0x6af1: "invalidAccessCode",
  0x6af2: "accessCodeRequired",
  0x6d00: "insNotSupported",
  0x6286: "errorProcessingCommand",
} as const satisfies Record<number, "processCompleted" | CardSdkErrorCode>;

export type StatusWordName = (typeof STATUS_WORDS)[keyof typeof STATUS_WORDS] | "unknownStatus";

export const SW_SUCCESS = 0x9000;

const STATUS_WORD_NAMES = new Map<number, StatusWordName>(
  Object.entries(STATUS_WORDS).map(([sw, name]) => [Number(sw), name]),
);

export function statusWordName(sw: number): StatusWordName {
  return STATUS_WORD_NAMES.get(sw) ?? "unknownStatus";
}

function formatSw(sw: number): string {
  return sw.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Build a command with an optional data field. Empty data is sent as a
 * header-only APDU.
 */
export function commandApdu(ins: number, data: Uint8Array = new Uint8Array(0), p1 = 0x00, p2 = 0x00): CommandApdu {
  if (data.byteLength > MAX_APDU_DATA_LENGTH) {
    throw new CardSdkError(
      "payloadTooLarge",
      `APDU data is ${data.byteLength} bytes, max ${MAX_APDU_DATA_LENGTH}`,
    );
  }
  return new CommandApdu(CLA, ins, p1, p2, data.byteLength > 0 ? Uint8Array.from(data) : null, null);
}

export function instructionApdu(instruction: InstructionName, data?: Uint8Array, p1?: number): CommandApdu {
  return commandApdu(Instruction[instruction], data, p1);
}

/**
 * Same header with a replaced data field (after secure channel protection).
 */
export function withCommandData(apdu: CommandApdu, data: Uint8Array, p1: number = apdu.p1): CommandApdu {
  return commandApdu(apdu.ins, data, p1, apdu.p2);
}

export function commandData(apdu: CommandApdu): Uint8Array {
  return apdu.data ?? new Uint8Array(0);
}

export function parseCommand(bytes: Uint8Array): CommandApdu {
  if (bytes.byteLength < 4) {
    throw new CardSdkError("invalidParams", "APDU shorter than its 4-byte header");
  }
  try {
    return CommandApdu.fromUint8Array(Uint8Array.from(bytes));
  } catch (error) {
    throw new CardSdkError("invalidParams", "Malformed command APDU", { cause: error });
  }
}

export function parseResponse(bytes: Uint8Array): ResponseApdu {
  if (bytes.byteLength < 2) {
    throw new CardSdkError("invalidResponseApdu", `Response of ${bytes.byteLength} bytes has no status word`);
  }
  return ResponseApdu.fromUint8Array(Uint8Array.from(bytes));
}

export function statusResponse(sw: number, data: Uint8Array = new Uint8Array(0)): ResponseApdu {
  return new ResponseApdu(Uint8Array.from(data), (sw >> 8) & 0xff, sw & 0xff);
}

/**
 * Wire bytes of a response: data followed by SW1 SW2.
 */
export function responseBytes(response: ResponseApdu): Uint8Array {
  const out = new Uint8Array(response.data.byteLength + 2);
  out.set(response.data, 0);
  out[response.data.byteLength] = response.sw1;
  out[response.data.byteLength + 1] = response.sw2;
  return out;
}

export function isSuccessResponse(response: ResponseApdu): boolean {
  return response.sw === SW_SUCCESS;
}

/**
 * Error for a non-success status word.
 */
export function responseError(response: ResponseApdu): CardSdkError {
  const name = statusWordName(response.sw);
  const code: CardSdkErrorCode = name === "processCompleted" ? "unknownStatus" : name;
  return new CardSdkError(code, `Card returned SW ${formatSw(response.sw)} (${name})`);
}
