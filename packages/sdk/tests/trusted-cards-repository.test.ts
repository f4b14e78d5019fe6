import { describe, it, expect, vi } from "vitest";

import { createLogger, type LogSink } from "@cardkit/shared";

import type { Attestation } from "../src/attestation/attestation.js";
import {
  TRUSTED_CARDS_KEY,
  TrustedCardsRepository,
  trustKey,
} from "../src/attestation/trusted-cards-repository.js";
import { MemorySecureStorage } from "../src/lib/secure-storage.js";

const quiet = createLogger("test", "error");

const verified: Attestation = {
  cardKeyAttestation: "verified",
  walletKeysAttestation: "notAttested",
  mode: "normal",
};

const keyA = Uint8Array.from([0x04, 0x01]);
const keyB = Uint8Array.from([0x04, 0x02]);
const keyC = Uint8Array.from([0x04, 0x03]);

function storedKeys(storage: MemorySecureStorage): Promise<string[]> {
  return storage.get(TRUSTED_CARDS_KEY).then((blob) => {
    const parsed: { key: string }[] = JSON.parse(new TextDecoder().decode(blob ?? new Uint8Array()));
    return parsed.map((entry) => entry.key);
  });
}

describe("trustKey", () => {
  it("is the upper-case SHA-256 hex of the key", () => {
    expect(trustKey(new Uint8Array(0))).toBe(
      "E3B0C44298FC1C149AFBF4C8996FB92427AE41E4649B934CA495991B7852B855",
    );
  });
});

describe("TrustedCardsRepository", () => {
  it("returns recorded verdicts", async () => {
    const repo = new TrustedCardsRepository({ logger: quiet });

    await repo.record(keyA, verified);

    expect(repo.lookup(keyA)).toEqual(verified);
    expect(repo.lookup(keyB)).toBeUndefined();
    expect(repo.size).toBe(1);
  });

  it("survives a reload from storage", async () => {
    const storage = new MemorySecureStorage();
    await new TrustedCardsRepository({ storage, logger: quiet }).record(keyA, verified);

    const reloaded = new TrustedCardsRepository({ storage, logger: quiet });
    await reloaded.load();

    expect(reloaded.lookup(keyA)).toEqual(verified);
  });

  it("evicts the oldest entry when full", async () => {
    const storage = new MemorySecureStorage();
    const repo = new TrustedCardsRepository({ storage, maxEntries: 2, logger: quiet });

    await repo.record(keyA, verified);
    await repo.record(keyB, verified);
    await repo.record(keyC, verified);

    expect(repo.lookup(keyA)).toBeUndefined();
    expect(repo.list().map((e) => e.key)).toEqual([trustKey(keyB), trustKey(keyC)]);
    expect(await storedKeys(storage)).toEqual([trustKey(keyB), trustKey(keyC)]);
  });

  it("moves a re-recorded card to the newest position", async () => {
    const repo = new TrustedCardsRepository({ maxEntries: 2, logger: quiet });

    await repo.record(keyA, verified);
    await repo.record(keyB, verified);
    await repo.record(keyA, { ...verified, mode: "full" });
    await repo.record(keyC, verified);

    expect(repo.lookup(keyB)).toBeUndefined();
    expect(repo.lookup(keyA)?.mode).toBe("full");
  });

  it("keeps only the newest entries of an oversized blob", async () => {
    const storage = new MemorySecureStorage();
    await new TrustedCardsRepository({ storage, logger: quiet }).record(keyA, verified);
    const all = new TrustedCardsRepository({ storage, logger: quiet });
    await all.load();
    await all.record(keyB, verified);
    await all.record(keyC, verified);

    const small = new TrustedCardsRepository({ storage, maxEntries: 1, logger: quiet });
    await small.load();

    expect(small.list().map((e) => e.key)).toEqual([trustKey(keyC)]);
  });

  it("clears memory and storage", async () => {
    const storage = new MemorySecureStorage();
    const repo = new TrustedCardsRepository({ storage, logger: quiet });
    await repo.record(keyA, verified);

    await repo.clear();

    expect(repo.size).toBe(0);
    expect(await storage.get(TRUSTED_CARDS_KEY)).toBeNull();
  });

  it("starts empty on a malformed blob", async () => {
    const storage = new MemorySecureStorage();
    await storage.set(TRUSTED_CARDS_KEY, new TextEncoder().encode("{not json"));
    const repo = new TrustedCardsRepository({ storage, logger: quiet });

    await repo.load();

    expect(repo.size).toBe(0);
  });

  it("skips malformed entries", async () => {
    const storage = new MemorySecureStorage();
    const blob = JSON.stringify([
      { key: "AA", cardKeyAttestation: "verified", walletKeysAttestation: "notAttested", mode: "normal" },
      { key: "BB", cardKeyAttestation: "great", walletKeysAttestation: "notAttested", mode: "normal" },
    ]);
    await storage.set(TRUSTED_CARDS_KEY, new TextEncoder().encode(blob));
    const repo = new TrustedCardsRepository({ storage, logger: quiet });

    await repo.load();

    expect(repo.list()).toEqual([{ key: "AA", attestation: verified }]);
  });

  it("logs storage failures without throwing", async () => {
    const storage = new MemorySecureStorage();
    vi.spyOn(storage, "set").mockRejectedValue(new Error("disk full"));
    const sink: LogSink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const repo = new TrustedCardsRepository({ storage, logger: createLogger("test", "error", sink) });

    await expect(repo.record(keyA, verified)).resolves.toBeUndefined();

    expect(repo.lookup(keyA)).toEqual(verified);
    expect(sink.error).toHaveBeenCalledTimes(1);
  });
});
