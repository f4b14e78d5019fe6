import { vi } from "vitest";

import { CardSdkError } from "@cardkit/shared";

import type { OnlineCardInfo, OnlineVerificationService } from "../src/attestation/online-card-verifier.js";
import type { AttestationPrompt, PromptDecision } from "../src/attestation/prompt.js";
import { DEFAULT_CONFIG, type SdkConfig } from "../src/lib/config-manager.js";

export function testConfig(overrides: Partial<SdkConfig> = {}): SdkConfig {
  return { ...DEFAULT_CONFIG, logLevel: "error", ...overrides };
}

export async function errorCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof CardSdkError ? error.code : `not-a-card-sdk-error: ${String(error)}`;
  }
  return undefined;
}

/**
 * Prompt that records every call and answers from queued decisions
 * ("continue" when the queue is empty).
 */
export function fakePrompt(answers: { didFail?: PromptDecision[]; offline?: PromptDecision[] } = {}) {
  const calls: string[] = [];
  const prompt: AttestationPrompt = {
    attestationDidFail(isDevelopmentCard, { onContinue, onCancel }) {
      calls.push(`didFail:${isDevelopmentCard}`);
      if ((answers.didFail?.shift() ?? "continue") === "continue") {
        onContinue();
      } else {
        onCancel();
      }
    },
    attestationCompletedOffline({ onContinue, onCancel, onRetry }) {
      calls.push("offline");
      const answer = answers.offline?.shift() ?? "continue";
      if (answer === "retry") {
        onRetry();
      } else if (answer === "cancel") {
        onCancel();
      } else {
        onContinue();
      }
    },
    attestationCompletedWithWarnings({ onContinue }) {
      calls.push("warnings");
      onContinue();
    },
  };
  return { prompt, calls };
}

export function fakeVerifier() {
  const verify = vi.fn<(cardId: string, cardPublicKey: Uint8Array, signal?: AbortSignal) => Promise<OnlineCardInfo>>();
  const verifier: OnlineVerificationService = { verify };
  return { verifier, verify };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
