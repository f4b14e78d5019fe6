/**
 * Configuration Manager
 * Loads SDK settings from ~/.cardkit/config.json, overlays environment
 * variables and validates the result.
 *
 * Precedence: environment > config file > defaults
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

import { CardSdkError, isLogLevel, type LogLevel } from "@cardkit/shared";

import { isAttestationMode, type AttestationMode } from "../attestation/attestation.js";

export interface SdkConfig {
  /** Mode the caller accepts without asking the user. */
  attestationMode: AttestationMode;
  /** Offer "continue anyway" for cards that fail attestation. */
  allowUntrustedCards: boolean;
  /** Prepend the legacyMode tag to every request. */
  legacyMode: boolean;
  /** Send the terminal public key so the card can skip the passcode. */
  linkedTerminal: boolean;
  /** Base URL of the online card verification service. */
  verifierUrl: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: SdkConfig = {
  attestationMode: "normal",
  allowUntrustedCards: false,
  legacyMode: false,
  linkedTerminal: false,
  verifierUrl: "http://localhost:8787",
  logLevel: "info",
};

export const CONFIG_DIR = join(homedir(), ".cardkit");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

type Env = Record<string, string | undefined>;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseBoolean(raw: string, name: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  throw new CardSdkError("invalidConfig", `${name} must be true/false, got "${raw}"`);
}

/**
 * Validate an untrusted object and fill the gaps from `base`.
 */
export function validateConfig(input: unknown, base: SdkConfig = DEFAULT_CONFIG): SdkConfig {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new CardSdkError("invalidConfig", "Config must be a JSON object");
  }
  const raw = new Map(Object.entries(input));
  const config: SdkConfig = { ...base };

  const mode = raw.get("attestationMode");
  if (mode !== undefined) {
    if (!isAttestationMode(mode)) {
      throw new CardSdkError("invalidConfig", `Invalid attestationMode: ${String(mode)}`);
    }
    config.attestationMode = mode;
  }

  for (const key of ["allowUntrustedCards", "legacyMode", "linkedTerminal"] as const) {
    const value = raw.get(key);
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "boolean") {
      throw new CardSdkError("invalidConfig", `${key} must be a boolean`);
    }
    config[key] = value;
  }

  const url = raw.get("verifierUrl");
  if (url !== undefined) {
    if (typeof url !== "string" || !/^https?:\/\//.test(url)) {
      throw new CardSdkError("invalidConfig", `verifierUrl must be an http(s) URL`);
    }
    config.verifierUrl = url.replace(/\/+$/, "");
  }

  const level = raw.get("logLevel");
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new CardSdkError("invalidConfig", `Invalid logLevel: ${String(level)}`);
    }
    config.logLevel = level;
  }

  return config;
}

function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.CARDKIT_ATTESTATION_MODE) {
    overrides.attestationMode = env.CARDKIT_ATTESTATION_MODE;
  }
  if (env.CARDKIT_VERIFIER_URL) {
    overrides.verifierUrl = env.CARDKIT_VERIFIER_URL;
  }
  if (env.CARDKIT_ALLOW_UNTRUSTED) {
    overrides.allowUntrustedCards = parseBoolean(env.CARDKIT_ALLOW_UNTRUSTED, "CARDKIT_ALLOW_UNTRUSTED");
  }
  if (env.CARDKIT_LOG_LEVEL) {
    overrides.logLevel = env.CARDKIT_LOG_LEVEL;
  }
  return overrides;
}

/**
 * Manages SDK configuration persistence
 */
export class ConfigManager {
  private config: SdkConfig | null = null;

  private configDir: string;

  constructor(
    private configPath: string = CONFIG_FILE,
    private env: Env = process.env,
  ) {
    this.configDir = dirname(configPath);
  }

  /**
   * Load the effective configuration (cached after the first call)
   */
  load(): SdkConfig {
    if (this.config) {
      return this.config;
    }
    const fromFile = validateConfig(this.readFile());
    this.config = validateConfig(envOverrides(this.env), fromFile);
    return this.config;
  }

  getConfig(): SdkConfig {
    if (!this.config) {
      throw new Error("Config not loaded. Call load() first.");
    }
    return this.config;
  }

  /**
   * Validate and persist a partial update. Environment overrides still apply
   * to the returned effective config.
   */
  update(patch: Partial<SdkConfig> | Record<string, unknown>): SdkConfig {
    const stored = validateConfig(patch, validateConfig(this.readFile()));
    this.save(stored);
    this.config = validateConfig(envOverrides(this.env), stored);
    return this.config;
  }

  private readFile(): unknown {
    if (!existsSync(this.configPath)) {
      return {};
    }
    try {
      return JSON.parse(readFileSync(this.configPath, "utf8"));
    } catch (error) {
      throw new CardSdkError(
        "invalidConfig",
        `Failed to load config from ${this.configPath}: ${describe(error)}`,
        { cause: error },
      );
    }
  }

  private save(config: SdkConfig): void {
    this.ensureConfigDir();
    try {
      writeFileSync(this.configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
    } catch (error) {
      throw new CardSdkError(
        "invalidConfig",
        `Failed to save config to ${this.configPath}: ${describe(error)}`,
        { cause: error },
      );
    }
  }

  private ensureConfigDir(): void {
    if (!existsSync(this.configDir)) {
      mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
    }
  }
}
