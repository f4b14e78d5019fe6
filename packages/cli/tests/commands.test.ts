import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import chalk from "chalk";
import { describe, it, expect, beforeAll, beforeEach, afterEach, vi, type MockInstance } from "vitest";

import { TrustedCardsRepository, FileSecureStorage } from "@cardkit/sdk";

import { run as runDecode } from "../src/commands/decode.js";
import { run as runDemo } from "../src/commands/demo.js";
import { runClear, runList } from "../src/commands/trust.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("CLI commands", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let info: MockInstance<typeof console.info>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cardkit-cli-"));
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  describe("decode", () => {
    it("prints TLV records", async () => {
      await runDecode({ hex: "0108CB79000000018201" });

      expect(log.mock.calls).toEqual([["0x01 cardId [8] CB79000000018201"]]);
      expect(process.exitCode).toBeUndefined();
    });

    it("prints the status word of a response", async () => {
      await runDecode({ hex: "6A86", response: true });

      expect(log.mock.calls).toEqual([["SW 6A86 invalidParams"]]);
    });

    it("exits with 2 on bad hex", async () => {
      await runDecode({ hex: "ABC" });

      expect(error.mock.calls).toEqual([["Invalid hex format (must be even-length hex)"]]);
      expect(process.exitCode).toBe(2);
    });

    it("exits with 1 on truncated TLV", async () => {
      await runDecode({ hex: "0108CB79" });

      expect(error.mock.calls).toEqual([["decodingMalformedTlv: Tag 0x1 declares 8 bytes, 2 available"]]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe("trust", () => {
    it("lists and clears stored cards", async () => {
      const storage = join(dir, "storage");
      const repository = new TrustedCardsRepository({ storage: new FileSecureStorage(storage) });
      await repository.record(Uint8Array.of(0x04), {
        cardKeyAttestation: "verified",
        walletKeysAttestation: "notAttested",
        mode: "normal",
      });

      await runList({ storage });
      expect(log).toHaveBeenCalledTimes(1);
      expect(info).toHaveBeenLastCalledWith("1 trusted card(s)");

      await runClear({ storage });
      expect(info).toHaveBeenLastCalledWith("Removed 1 trusted card(s).");

      await runList({ storage });
      expect(info).toHaveBeenLastCalledWith("No trusted cards.");
    });
  });

  describe("demo", () => {
    it("scans the mock card offline", async () => {
      await runDemo({ config: join(dir, "config.json") });

      expect(log).toHaveBeenLastCalledWith(
        "attestation verifiedOffline (card verifiedOffline, wallets notAttested, mode offline)",
      );
      expect(log.mock.calls[0]).toEqual(["Card CB79000000018201"]);
    });

    it("rejects an unknown mode", async () => {
      await runDemo({ mode: "paranoid", config: join(dir, "config.json") });

      expect(error.mock.calls).toEqual([["Unknown attestation mode: paranoid"]]);
      expect(process.exitCode).toBe(2);
    });
  });
});
