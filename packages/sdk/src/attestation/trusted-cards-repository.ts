/**
 * Trust cache: card public key → last online-verified verdict.
 *
 * Lives in memory and mirrors itself to SecureStorage as one JSON blob.
 * Keys are SHA-256 hex of the card public key. Entries never expire; the
 * oldest is evicted once the cache holds `maxEntries`.
 */

import { bytesToHex, createLogger, sha256, type Logger } from "@cardkit/shared";

import type { SecureStorage } from "../lib/secure-storage.js";
import { isAttestationMode, isAttestationStatus, type Attestation } from "./attestation.js";

export const TRUSTED_CARDS_KEY = "trusted-cards";
export const MAX_TRUSTED_CARDS = 1000;

export interface TrustedCardEntry {
  /** SHA-256 hex of the card public key. */
  readonly key: string;
  readonly attestation: Attestation;
}

interface StoredEntry {
  key: string;
  cardKeyAttestation: string;
  walletKeysAttestation: string;
  mode: string;
}

export function trustKey(cardPublicKey: Uint8Array): string {
  return bytesToHex(sha256(cardPublicKey));
}

function toEntry(raw: unknown): TrustedCardEntry | null {
  if (typeof raw !== "object" || raw === null) {
    return null;
  }
  const fields = new Map(Object.entries(raw));
  const key = fields.get("key");
  const cardKeyAttestation = fields.get("cardKeyAttestation");
  const walletKeysAttestation = fields.get("walletKeysAttestation");
  const mode = fields.get("mode");
  if (
    typeof key !== "string" ||
    !isAttestationStatus(cardKeyAttestation) ||
    !isAttestationStatus(walletKeysAttestation) ||
    !isAttestationMode(mode)
  ) {
    return null;
  }
  return { key, attestation: { cardKeyAttestation, walletKeysAttestation, mode } };
}

export interface TrustedCardsRepositoryOptions {
  storage?: SecureStorage;
  maxEntries?: number;
  logger?: Logger;
}

export class TrustedCardsRepository {
  private readonly entries = new Map<string, Attestation>();
  private readonly storage?: SecureStorage;
  private readonly maxEntries: number;
  private readonly logger: Logger;

  constructor(options: TrustedCardsRepositoryOptions = {}) {
    this.storage = options.storage;
    this.maxEntries = options.maxEntries ?? MAX_TRUSTED_CARDS;
    this.logger = options.logger ?? createLogger("sdk:trusted-cards");
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Replace the in-memory cache with the persisted mirror. A missing or
   * unreadable blob leaves the cache empty.
   */
  async load(): Promise<void> {
    this.entries.clear();
    if (!this.storage) {
      return;
    }
    const blob = await this.storage.get(TRUSTED_CARDS_KEY);
    if (!blob) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder().decode(blob));
    } catch (error) {
      this.logger.warn("Trusted cards blob is not JSON, starting empty", {
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (!Array.isArray(parsed)) {
      this.logger.warn("Trusted cards blob is not a list, starting empty");
      return;
    }

    const stored: unknown[] = parsed;
    for (const raw of stored.slice(-this.maxEntries)) {
      const entry = toEntry(raw);
      if (entry) {
        this.entries.set(entry.key, entry.attestation);
      } else {
        this.logger.warn("Skipping malformed trusted card entry");
      }
    }
    this.logger.debug("Trusted cards loaded", { count: this.entries.size });
  }

  lookup(cardPublicKey: Uint8Array): Attestation | undefined {
    return this.entries.get(trustKey(cardPublicKey));
  }

  /**
   * Visible to lookup() immediately; the mirror write happens after.
   */
  async record(cardPublicKey: Uint8Array, attestation: Attestation): Promise<void> {
    const key = trustKey(cardPublicKey);
    this.entries.delete(key);
    this.entries.set(key, attestation);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    await this.persist();
  }

  async clear(): Promise<void> {
    this.entries.clear();
    if (!this.storage) {
      return;
    }
    try {
      await this.storage.delete(TRUSTED_CARDS_KEY);
    } catch (error) {
      this.logger.error("Failed to delete trusted cards", error instanceof Error ? error : undefined);
    }
  }

  /**
   * Oldest first.
   */
  list(): TrustedCardEntry[] {
    return [...this.entries].map(([key, attestation]) => ({ key, attestation }));
  }

  private async persist(): Promise<void> {
    if (!this.storage) {
      return;
    }
    const stored: StoredEntry[] = this.list().map(({ key, attestation }) => ({ key, ...attestation }));
    try {
      await this.storage.set(TRUSTED_CARDS_KEY, new TextEncoder().encode(JSON.stringify(stored)));
    } catch (error) {
      this.logger.error("Failed to persist trusted cards", error instanceof Error ? error : undefined, {
        count: stored.length,
      });
    }
  }
}
