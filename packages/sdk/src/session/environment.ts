import {
  SecureChannelEnvelope,
  derivePublicKey,
  randomBytes,
  sha256,
  type EncryptionMode,
} from "@cardkit/shared";

import type { Card } from "../card/card.js";
import type { SdkConfig } from "../lib/config-manager.js";

export const DEFAULT_ACCESS_CODE = "000000";
export const DEFAULT_PASSCODE = "000";

export interface TerminalKeys {
  readonly publicKey: Uint8Array;
  readonly privateKey: Uint8Array;
}

/**
 * Read-only snapshot of everything a command needs to serialize a request
 * and interpret its response. The session replaces it between commands.
 */
export interface SessionEnvironment {
  /** Set after the preflight read. */
  readonly card?: Card;
  readonly config: SdkConfig;
  readonly encryptionMode: EncryptionMode;
  readonly encryptionKey?: Uint8Array;
  /** SHA-256 of the access code. */
  readonly accessCode: Uint8Array;
  /** SHA-256 of the passcode. */
  readonly passcode: Uint8Array;
  readonly terminalKeys?: TerminalKeys;
  readonly legacyMode: boolean;
}

/**
 * Fields a recovery handler or the session may replace.
 */
export type EnvironmentPatch = Partial<Omit<SessionEnvironment, "config">>;

export function hashCode(code: string): Uint8Array {
  return sha256(code);
}

export function generateTerminalKeys(): TerminalKeys {
  const privateKey = randomBytes(32);
  return { privateKey, publicKey: derivePublicKey("secp256k1", privateKey) };
}

export function createEnvironment(config: SdkConfig, patch: EnvironmentPatch = {}): SessionEnvironment {
  return {
    config,
    encryptionMode: "none",
    accessCode: hashCode(DEFAULT_ACCESS_CODE),
    passcode: hashCode(DEFAULT_PASSCODE),
    terminalKeys: config.linkedTerminal ? generateTerminalKeys() : undefined,
    legacyMode: config.legacyMode,
    ...patch,
  };
}

export function applyPatch(environment: SessionEnvironment, patch: EnvironmentPatch): SessionEnvironment {
  return { ...environment, ...patch };
}

export function envelopeFor(environment: SessionEnvironment): SecureChannelEnvelope {
  return new SecureChannelEnvelope(environment.encryptionMode, environment.encryptionKey);
}
