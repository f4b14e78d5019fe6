/**
 * Online card verification over HTTP.
 */

import { fetch } from "undici";

import { CardSdkError, bytesToHex, createLogger, isCardSdkError } from "@cardkit/shared";

const logger = createLogger("sdk:verifier");

export interface OnlineCardInfo {
  cardId: string;
  batch?: string;
  artwork?: { id: string; hash?: string };
}

/**
 * Looks a card up by id and public key. Rejects with cardVerificationFailed
 * when the service does not know the pair, networkError for anything else.
 */
export interface OnlineVerificationService {
  verify(cardId: string, cardPublicKey: Uint8Array, signal?: AbortSignal): Promise<OnlineCardInfo>;
}

interface VerifyResult {
  CID: string;
  passed: boolean;
  batch?: string;
  artwork?: { id: string; hash?: string };
}

function isArtwork(value: unknown): value is VerifyResult["artwork"] {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    (!("hash" in value) || value.hash === undefined || typeof value.hash === "string")
  );
}

function isVerifyResult(value: unknown): value is VerifyResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "CID" in value &&
    typeof value.CID === "string" &&
    "passed" in value &&
    typeof value.passed === "boolean" &&
    (!("batch" in value) || value.batch === undefined || typeof value.batch === "string") &&
    (!("artwork" in value) || value.artwork === undefined || isArtwork(value.artwork))
  );
}

function parseResults(body: unknown): VerifyResult[] {
  if (typeof body !== "object" || body === null || !("results" in body) || !Array.isArray(body.results)) {
    throw new CardSdkError("networkError", "Verification response has no results array");
  }
  const results: unknown[] = body.results;
  return results.filter(isVerifyResult);
}

export class OnlineCardVerifier implements OnlineVerificationService {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async verify(cardId: string, cardPublicKey: Uint8Array, signal?: AbortSignal): Promise<OnlineCardInfo> {
    logger.debug("Verifying card online", { cardId });
    try {
      const response = await fetch(`${this.baseUrl}/card/verify-and-get-info`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ requests: [{ CID: cardId, publicKey: bytesToHex(cardPublicKey) }] }),
        signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new CardSdkError("networkError", `Verification service returned ${response.status}: ${text}`);
      }

      const result = parseResults(await response.json()).find(
        (r) => r.CID.toUpperCase() === cardId.toUpperCase(),
      );
      if (!result) {
        throw new CardSdkError("networkError", `No verification result for card ${cardId}`);
      }
      if (!result.passed) {
        throw new CardSdkError("cardVerificationFailed", `Card ${cardId} is not known to the issuer`);
      }

      logger.info("Card verified online", { cardId, batch: result.batch });
      return { cardId: result.CID, batch: result.batch, artwork: result.artwork };
    } catch (error) {
      if (isCardSdkError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CardSdkError("networkError", `Verification request failed: ${message}`, { cause: error });
    }
  }
}
