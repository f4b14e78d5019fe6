import { describe, it, expect, beforeEach, vi } from "vitest";

import { CardSdkError, TlvDecoder, commandData, createLogger } from "@cardkit/shared";

import { AttestationTask, type AttestationTaskOptions } from "../src/attestation/attestation-task.js";
import type { OnlineCardInfo } from "../src/attestation/online-card-verifier.js";
import { TrustedCardsRepository } from "../src/attestation/trusted-cards-repository.js";
import type { SdkConfig } from "../src/lib/config-manager.js";
import { MockCard, testKey, type MockCardOptions } from "../src/lib/mock-card.js";
import { MemorySecureStorage } from "../src/lib/secure-storage.js";
import { CardSession } from "../src/session/card-session.js";
import { deferred, errorCode, fakePrompt, fakeVerifier, testConfig } from "./helpers.js";

const logger = createLogger("test", "error");

describe("AttestationTask", () => {
  let trustedCards: TrustedCardsRepository;

  beforeEach(() => {
    trustedCards = new TrustedCardsRepository({ storage: new MemorySecureStorage(), logger });
  });

  async function setup(
    options: { card?: MockCardOptions; config?: Partial<SdkConfig>; answers?: Parameters<typeof fakePrompt>[0] } = {},
  ) {
    const mock = new MockCard(options.card);
    const session = new CardSession(mock, testConfig(options.config), { logger });
    await session.scan();
    const { prompt, calls } = fakePrompt(options.answers);
    const { verifier, verify } = fakeVerifier();
    const task = (taskOptions?: AttestationTaskOptions) =>
      new AttestationTask({ session, trustedCards, verifier, prompt, logger }, taskOptions);
    return { mock, session, calls, verify, task };
  }

  it("accepts an offline-verified card in offline mode without asking", async () => {
    const { session, calls, verify, task } = await setup({ config: { attestationMode: "offline" } });

    const verdict = await task().run();

    expect(verdict).toEqual({
      cardKeyAttestation: "verifiedOffline",
      walletKeysAttestation: "notAttested",
      mode: "offline",
      status: "verifiedOffline",
    });
    expect(calls).toEqual([]);
    expect(verify).not.toHaveBeenCalled();
    expect(session.card?.attestation).toEqual({
      cardKeyAttestation: "verifiedOffline",
      walletKeysAttestation: "notAttested",
      mode: "offline",
    });
  });

  it("verifies online in normal mode and remembers the card", async () => {
    const { mock, calls, verify, task } = await setup();
    verify.mockResolvedValue({ cardId: mock.cardId });

    const verdict = await task().run();

    expect(verdict.status).toBe("verified");
    expect(verdict.cardKeyAttestation).toBe("verified");
    expect(calls).toEqual([]);
    expect(verify).toHaveBeenCalledTimes(1);
    expect(verify.mock.calls[0][0]).toBe("CB79000000018201");
    expect(verify.mock.calls[0][1]).toEqual(mock.cardPublicKey);
    expect(trustedCards.lookup(mock.cardPublicKey)).toEqual({
      cardKeyAttestation: "verified",
      walletKeysAttestation: "notAttested",
      mode: "normal",
    });
    expect(mock.pauseCount).toBe(1);
  });

  it("keeps the radio up with keepSessionOpened", async () => {
    const { mock, verify, task } = await setup();
    verify.mockResolvedValue({ cardId: mock.cardId });

    await task({ keepSessionOpened: true }).run();

    expect(mock.pauseCount).toBe(0);
  });

  it("short-circuits on a trusted card once the card key is proven", async () => {
    const { mock, verify, task } = await setup();
    verify.mockResolvedValue({ cardId: mock.cardId });
    await task().run();

    const verdict = await task().run();

    expect(verdict.status).toBe("verified");
    expect(verify).toHaveBeenCalledTimes(1);
    expect(mock.requests.filter((r) => r.ins === 0xf3)).toHaveLength(2);
  });

  it("does not short-circuit when the cached mode is weaker than requested", async () => {
    const { mock, verify, task } = await setup();
    verify.mockResolvedValue({ cardId: mock.cardId });
    await task().run();

    const verdict = await task({ mode: "full" }).run();

    expect(verdict).toMatchObject({ mode: "full", walletKeysAttestation: "verified", status: "verified" });
    expect(verify).toHaveBeenCalledTimes(2);
  });

  it("trusts the online result over a failed offline check", async () => {
    const { mock, verify, task } = await setup();
    mock.corruptCardSignature = true;
    verify.mockResolvedValue({ cardId: mock.cardId });

    const verdict = await task().run();

    expect(verdict.cardKeyAttestation).toBe("verified");
    expect(verdict.status).toBe("verified");
  });

  it("fails a production card that fails both checks", async () => {
    const { mock, calls, verify, task } = await setup();
    mock.corruptCardSignature = true;
    verify.mockRejectedValue(new CardSdkError("cardVerificationFailed", "unknown card"));

    expect(await errorCode(task().run())).toBe("cardVerificationFailed");
    expect(calls).toEqual([]);
  });

  it("asks before continuing with an untrusted card when allowed", async () => {
    const { mock, calls, verify, task } = await setup({ config: { allowUntrustedCards: true } });
    mock.corruptCardSignature = true;
    verify.mockRejectedValue(new CardSdkError("cardVerificationFailed", "unknown card"));

    const verdict = await task().run();

    expect(calls).toEqual(["didFail:false"]);
    expect(verdict.status).toBe("failed");
  });

  it("never verifies development cards online and always asks", async () => {
    const { calls, verify, task } = await setup({
      card: { firmwareVersion: "6.33d SDK" },
      answers: { didFail: ["cancel"] },
    });

    expect(await errorCode(task().run())).toBe("userCancelled");
    expect(verify).not.toHaveBeenCalled();
    expect(calls).toEqual(["didFail:true"]);
  });

  it("skips online verification for a card that already failed", async () => {
    const { mock, session, calls, verify, task } = await setup({
      config: { allowUntrustedCards: true },
    });
    mock.corruptCardSignature = true;
    await task({ mode: "offline" }).run();
    expect(session.card?.attestation.cardKeyAttestation).toBe("failed");

    mock.corruptCardSignature = false;
    const verdict = await task().run();

    expect(verify).not.toHaveBeenCalled();
    expect(verdict.cardKeyAttestation).toBe("failed");
    expect(calls).toEqual(["didFail:false", "didFail:false"]);
  });

  it("retries online verification from the offline prompt", async () => {
    const { mock, calls, verify, task } = await setup({ answers: { offline: ["retry"] } });
    verify
      .mockRejectedValueOnce(new CardSdkError("networkError", "service down"))
      .mockResolvedValueOnce({ cardId: mock.cardId });

    const verdict = await task().run();

    expect(calls).toEqual(["offline"]);
    expect(verify).toHaveBeenCalledTimes(2);
    expect(verdict.status).toBe("verified");
  });

  it("accepts an offline verdict when the user continues", async () => {
    const { verify, calls, task } = await setup();
    verify.mockRejectedValue(new CardSdkError("networkError", "service down"));

    const verdict = await task().run();

    expect(calls).toEqual(["offline"]);
    expect(verdict.status).toBe("verifiedOffline");
    expect(trustedCards.size).toBe(0);
  });

  it("cancels from the offline prompt", async () => {
    const { verify, task } = await setup({ answers: { offline: ["cancel"] } });
    verify.mockRejectedValue(new CardSdkError("networkError", "service down"));

    expect(await errorCode(task().run())).toBe("userCancelled");
  });

  it("warns about wallets that signed too many hashes", async () => {
    const { mock, calls, verify, task } = await setup({
      card: { wallets: [{ curve: "secp256k1", privateKey: testKey("busy-wallet"), counter: 150000 }] },
    });
    verify.mockResolvedValue({ cardId: mock.cardId });

    const verdict = await task({ mode: "full" }).run();

    expect(verdict).toEqual({
      cardKeyAttestation: "verified",
      walletKeysAttestation: "warning",
      mode: "full",
      status: "warning",
    });
    expect(calls).toEqual(["warnings"]);
    expect(trustedCards.lookup(mock.cardPublicKey)).toEqual({
      cardKeyAttestation: "verified",
      walletKeysAttestation: "warning",
      mode: "full",
    });
  });

  it("attests every wallet in slot order and warns about a busy one in the middle", async () => {
    const { mock, session, calls, verify, task } = await setup({
      card: {
        wallets: [
          { curve: "secp256k1", privateKey: testKey("wallet-a"), counter: 10 },
          { curve: "ed25519", privateKey: testKey("wallet-b"), counter: 150000 },
          { curve: "secp256k1", privateKey: testKey("wallet-c"), counter: 20 },
        ],
      },
    });
    verify.mockResolvedValue({ cardId: mock.cardId });

    const verdict = await task({ mode: "full" }).run();

    expect(verdict.walletKeysAttestation).toBe("warning");
    expect(calls).toEqual(["warnings"]);
    const attested = mock.requests
      .filter((r) => r.ins === 0xfb)
      .map((r) => TlvDecoder.fromBytes(commandData(r)).decode("walletPublicKey"));
    expect(attested).toHaveLength(3);
    expect(attested).toEqual(session.card?.wallets.map((wallet) => wallet.publicKey));
  });

  it("warns on a high stored count even when the fresh counter is low", async () => {
    const { mock, verify, task } = await setup({
      card: {
        wallets: [{ curve: "secp256k1", privateKey: testKey("reset-wallet"), signedHashes: 200000, counter: 5 }],
      },
    });
    verify.mockResolvedValue({ cardId: mock.cardId });

    const verdict = await task({ mode: "full" }).run();

    expect(verdict.walletKeysAttestation).toBe("warning");
    expect(verdict.status).toBe("warning");
  });

  it("retries with a fresh lookup after a slow one fails", async () => {
    const { mock, calls, verify, task } = await setup({ answers: { offline: ["retry"] } });
    const first = deferred<OnlineCardInfo>();
    const second = deferred<OnlineCardInfo>();
    verify.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);

    const run = task({ mode: "full" }).run();
    await vi.waitFor(() => expect(mock.pauseCount).toBe(1));
    first.reject(new CardSdkError("networkError", "service down"));
    await vi.waitFor(() => expect(verify).toHaveBeenCalledTimes(2));
    second.resolve({ cardId: mock.cardId });

    const verdict = await run;

    expect(calls).toEqual(["offline"]);
    expect(verdict).toMatchObject({ cardKeyAttestation: "verified", walletKeysAttestation: "verified" });
    expect(verify.mock.calls[1][2]).not.toBe(verify.mock.calls[0][2]);
    expect(verify.mock.calls[1][2]?.aborted).toBe(false);
  });

  it("drops a lookup that settles after the attestation was torn down", async () => {
    const { mock, session, verify, task } = await setup();
    const pending = deferred<OnlineCardInfo>();
    verify.mockImplementationOnce(() => {
      mock.failNext(0x6985);
      return pending.promise;
    });

    expect(await errorCode(task({ mode: "full" }).run())).toBe("invalidState");
    expect(verify.mock.calls[0][2]?.aborted).toBe(true);

    pending.resolve({ cardId: mock.cardId });
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(trustedCards.size).toBe(0);
    expect(session.card?.attestation.cardKeyAttestation).toBe("notAttested");
  });

  it("warns on the signed hashes read from the wallet", async () => {
    const { mock, verify, task } = await setup({
      card: { wallets: [{ curve: "ed25519", privateKey: testKey("old-wallet"), signedHashes: 200000 }] },
    });
    verify.mockResolvedValue({ cardId: mock.cardId });

    const verdict = await task({ mode: "full" }).run();

    expect(verdict.walletKeysAttestation).toBe("warning");
  });

  it("fails on a wallet that cannot prove its key", async () => {
    const { mock, verify, task } = await setup();
    mock.corruptWalletSignature = true;
    verify.mockResolvedValue({ cardId: mock.cardId });

    expect(await errorCode(task({ mode: "full" }).run())).toBe("cardVerificationFailed");
  });

  it("needs firmware 2.0 for full mode", async () => {
    const { task } = await setup({ card: { firmwareVersion: "1.21r" } });

    expect(await errorCode(task({ mode: "full" }).run())).toBe("unsupportedAttestationMode");
  });

  it("aborts on card errors that are not verification failures", async () => {
    const { mock, task } = await setup();
    mock.failNext(0x6985);

    expect(await errorCode(task().run())).toBe("invalidState");
  });

  it("needs a preflight read", async () => {
    const session = new CardSession(new MockCard(), testConfig(), { logger });
    const { prompt } = fakePrompt();
    const { verifier } = fakeVerifier();

    const run = new AttestationTask({ session, trustedCards, verifier, prompt, logger }).run();

    expect(await errorCode(run)).toBe("missingPreflightRead");
  });
});
