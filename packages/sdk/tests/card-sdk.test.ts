import { describe, it, expect } from "vitest";

import { createLogger } from "@cardkit/shared";

import { CardSdk } from "../src/card-sdk.js";
import { MockCard } from "../src/lib/mock-card.js";
import { MemorySecureStorage } from "../src/lib/secure-storage.js";
import { hashCode } from "../src/session/environment.js";
import { fakePrompt, fakeVerifier, testConfig } from "./helpers.js";

const logger = createLogger("test", "error");

describe("CardSdk", () => {
  it("scans and attests a card", async () => {
    const mock = new MockCard();
    const { verifier, verify } = fakeVerifier();
    verify.mockResolvedValue({ cardId: mock.cardId });
    const { prompt } = fakePrompt();
    const sdk = await CardSdk.create({ config: testConfig(), prompt, verifier, logger });

    const { card, attestation } = await sdk.scanCard(mock);

    expect(card.cardId).toBe("CB79000000018201");
    expect(card.wallets).toHaveLength(1);
    expect(card.attestation.cardKeyAttestation).toBe("verified");
    expect(attestation.status).toBe("verified");
  });

  it("loads the trust cache from storage", async () => {
    const storage = new MemorySecureStorage();
    const mock = new MockCard();
    const { verifier, verify } = fakeVerifier();
    verify.mockResolvedValue({ cardId: mock.cardId });
    const { prompt } = fakePrompt();

    const first = await CardSdk.create({ config: testConfig(), prompt, storage, verifier, logger });
    await first.scanCard(mock);
    const second = await CardSdk.create({ config: testConfig(), prompt, storage, verifier, logger });
    const { attestation } = await second.scanCard(new MockCard());

    expect(second.trustedCards.size).toBe(1);
    expect(attestation.status).toBe("verified");
    expect(verify).toHaveBeenCalledTimes(1);
  });

  it("opens sessions with an environment patch", async () => {
    const { verifier } = fakeVerifier();
    const { prompt } = fakePrompt();
    const sdk = await CardSdk.create({ config: testConfig(), prompt, verifier, logger });

    const session = sdk.openSession(new MockCard({ accessCode: "123456" }), {
      accessCode: hashCode("123456"),
    });
    const card = await session.scan();

    expect(card.cardId).toBe("CB79000000018201");
  });
});
