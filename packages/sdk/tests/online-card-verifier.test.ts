import { describe, it, expect, beforeEach, vi } from "vitest";

import { CardSdkError } from "@cardkit/shared";

import { OnlineCardVerifier } from "../src/attestation/online-card-verifier.js";
import { errorCode } from "./helpers.js";

const mockFetch = vi.hoisted(() => vi.fn());
vi.mock("undici", () => ({
  fetch: mockFetch,
}));

function mkResponse(ok: boolean, status: number, body: unknown) {
  return {
    ok,
    status,
    async json() {
      return body;
    },
    async text() {
      return typeof body === "string" ? body : JSON.stringify(body);
    },
  };
}

const CARD_ID = "CB79000000018201";
const PUBLIC_KEY = Uint8Array.from([0x04, 0xab, 0xcd]);

describe("OnlineCardVerifier", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("posts the card id and key and returns the card info", async () => {
    mockFetch.mockResolvedValue(
      mkResponse(true, 200, {
        results: [{ CID: CARD_ID, passed: true, batch: "AB01", artwork: { id: "art-1", hash: "00FF" } }],
      }),
    );
    const verifier = new OnlineCardVerifier("https://verify.example.com");

    const info = await verifier.verify(CARD_ID, PUBLIC_KEY);

    expect(info).toEqual({ cardId: CARD_ID, batch: "AB01", artwork: { id: "art-1", hash: "00FF" } });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://verify.example.com/card/verify-and-get-info");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({ requests: [{ CID: CARD_ID, publicKey: "04ABCD" }] });
  });

  it("drops trailing slashes from the base URL", async () => {
    mockFetch.mockResolvedValue(mkResponse(true, 200, { results: [{ CID: CARD_ID, passed: true }] }));

    await new OnlineCardVerifier("https://verify.example.com//").verify(CARD_ID, PUBLIC_KEY);

    expect(mockFetch.mock.calls[0][0]).toBe("https://verify.example.com/card/verify-and-get-info");
  });

  it("matches the card id case-insensitively", async () => {
    mockFetch.mockResolvedValue(mkResponse(true, 200, { results: [{ CID: "cb79000000018201", passed: true }] }));

    const info = await new OnlineCardVerifier("https://verify.example.com").verify(CARD_ID, PUBLIC_KEY);

    expect(info.cardId).toBe("cb79000000018201");
  });

  it("rejects an unknown card with cardVerificationFailed", async () => {
    mockFetch.mockResolvedValue(mkResponse(true, 200, { results: [{ CID: CARD_ID, passed: false }] }));

    const verify = new OnlineCardVerifier("https://verify.example.com").verify(CARD_ID, PUBLIC_KEY);

    expect(await errorCode(verify)).toBe("cardVerificationFailed");
  });

  it("reports server errors as networkError", async () => {
    mockFetch.mockResolvedValue(mkResponse(false, 500, "upstream down"));

    const verify = new OnlineCardVerifier("https://verify.example.com").verify(CARD_ID, PUBLIC_KEY);

    await expect(verify).rejects.toThrow("Verification service returned 500: upstream down");
  });

  it("wraps fetch failures as networkError with the cause", async () => {
    const cause = new Error("connect ECONNREFUSED");
    mockFetch.mockRejectedValue(cause);

    const error = await new OnlineCardVerifier("https://verify.example.com")
      .verify(CARD_ID, PUBLIC_KEY)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CardSdkError);
    expect(error).toMatchObject({ code: "networkError", cause });
  });

  it("rejects a body without results", async () => {
    mockFetch.mockResolvedValue(mkResponse(true, 200, { status: "ok" }));

    const verify = new OnlineCardVerifier("https://verify.example.com").verify(CARD_ID, PUBLIC_KEY);

    expect(await errorCode(verify)).toBe("networkError");
  });

  it("ignores malformed results and fails when none match", async () => {
    mockFetch.mockResolvedValue(
      mkResponse(true, 200, { results: [{ CID: CARD_ID, passed: "yes" }, { CID: "OTHER", passed: true }] }),
    );

    const verify = new OnlineCardVerifier("https://verify.example.com").verify(CARD_ID, PUBLIC_KEY);

    await expect(verify).rejects.toThrow(`No verification result for card ${CARD_ID}`);
  });
});
