/**
 * Single-slot publisher for the online verification result.
 *
 * At most one lookup is pending. A new dispatch aborts the previous one and
 * its late result is dropped; wait() only ever sees the current outcome.
 */

import { CardSdkError, toCardSdkError, type Logger } from "@cardkit/shared";

import type { OnlineCardInfo } from "./online-card-verifier.js";

export type OnlineOutcome =
  | { kind: "verified"; info: OnlineCardInfo }
  | { kind: "verificationFailed"; error: CardSdkError }
  | { kind: "unavailable"; error: CardSdkError };

export type OnlineLookup = (signal: AbortSignal) => Promise<OnlineOutcome>;

interface Waiter {
  resolve(outcome: OnlineOutcome): void;
  reject(error: CardSdkError): void;
}

export class OnlineResultSlot {
  private generation = 0;
  private controller: AbortController | null = null;
  private outcome: OnlineOutcome | null = null;
  private waiters: Waiter[] = [];
  private disposed = false;

  constructor(private readonly logger: Logger) {}

  get currentGeneration(): number {
    return this.generation;
  }

  dispatch(lookup: OnlineLookup): number {
    if (this.disposed) {
      throw new CardSdkError("invalidState", "Online result slot is disposed");
    }
    this.controller?.abort();
    const generation = ++this.generation;
    const controller = new AbortController();
    this.controller = controller;
    this.outcome = null;

    void lookup(controller.signal).then(
      (outcome) => this.publish(generation, outcome),
      (error: unknown) =>
        this.publish(generation, { kind: "unavailable", error: toCardSdkError(error, "networkError") }),
    );
    return generation;
  }

  wait(): Promise<OnlineOutcome> {
    if (this.disposed) {
      return Promise.reject(new CardSdkError("userCancelled", "Attestation was torn down"));
    }
    if (this.generation === 0) {
      return Promise.reject(new CardSdkError("invalidState", "Nothing was dispatched"));
    }
    if (this.outcome) {
      return Promise.resolve(this.outcome);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.controller?.abort();
    this.controller = null;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new CardSdkError("userCancelled", "Attestation was torn down"));
    }
  }

  private publish(generation: number, outcome: OnlineOutcome): void {
    if (this.disposed || generation !== this.generation) {
      this.logger.debug("Dropping superseded online result", { generation, kind: outcome.kind });
      return;
    }
    this.outcome = outcome;
    this.controller = null;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve(outcome);
    }
  }
}
