/**
 * Error taxonomy shared by the codec, the command protocol and the
 * attestation flow.
 *
 * Every failure is a CardSdkError carrying a stable string code. The
 * category is derived from the code and drives retry / fold-into-verdict
 * decisions in the sdk package.
 */

export type ErrorCategory =
  | "precheck"
  | "encoding"
  | "decoding"
  | "transport"
  | "verification"
  | "cancelled"
  | "configuration"
  | "session";

const CATEGORIES = {
  // precheck
  notSupportedFirmwareVersion: "precheck",
  notPersonalized: "precheck",
  missingIssuerPublicKey: "precheck",
  dataSizeTooLarge: "precheck",
  missingCounter: "precheck",
  issuerSignatureInvalid: "precheck",
  walletNotFound: "precheck",

  // encoding
  encodingFailed: "encoding",
  duplicateTag: "encoding",
  payloadTooLarge: "encoding",

  // decoding
  decodingMissingTag: "decoding",
  decodingTypeMismatch: "decoding",
  decodingMalformedTlv: "decoding",
  decryptionFailed: "decoding",
  invalidResponseApdu: "decoding",

  // transport / card status words
  invalidParams: "transport",
  fileNotFound: "transport",
  invalidState: "transport",
  needEncryption: "transport",
  invalidAccessCode: "transport",
  accessCodeRequired: "transport",
  insNotSupported: "transport",
  errorProcessingCommand: "transport",
  unknownStatus: "transport",
  dataCannotBeWritten: "transport",
  transportFailed: "transport",
  networkError: "transport",

  // verification
  cardVerificationFailed: "verification",

  // cancelled
  userCancelled: "cancelled",

  // configuration
  invalidConfig: "configuration",
  unsupportedAttestationMode: "configuration",

  // session
  missingPreflightRead: "session",
} as const satisfies Record<string, ErrorCategory>;

export type CardSdkErrorCode = keyof typeof CATEGORIES;

/**
 * Errors the command protocol may retry after the session's recovery
 * handler updated the environment (new encryption key, re-entered code).
 */
const RECOVERABLE: ReadonlySet<CardSdkErrorCode> = new Set([
  "needEncryption",
  "invalidAccessCode",
  "accessCodeRequired",
]);

export class CardSdkError extends Error {
  readonly code: CardSdkErrorCode;

  constructor(code: CardSdkErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = "CardSdkError";
    this.code = code;
  }

  get category(): ErrorCategory {
    return CATEGORIES[this.code];
  }

  get isRecoverable(): boolean {
    return RECOVERABLE.has(this.code);
  }

  get isVerificationFailure(): boolean {
    return this.code === "cardVerificationFailed";
  }
}

export function isCardSdkError(error: unknown, code?: CardSdkErrorCode): error is CardSdkError {
  if (!(error instanceof CardSdkError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Normalize anything thrown by a collaborator into a CardSdkError.
 */
export function toCardSdkError(
  error: unknown,
  fallback: CardSdkErrorCode = "transportFailed",
): CardSdkError {
  if (error instanceof CardSdkError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CardSdkError(fallback, message, { cause: error });
}
