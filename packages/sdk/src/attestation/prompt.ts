/**
 * User-facing decisions the attestation flow may need. The host renders
 * them however it likes and calls back exactly one action.
 */
export interface AttestationPrompt {
  attestationDidFail(
    isDevelopmentCard: boolean,
    actions: { onContinue(): void; onCancel(): void },
  ): void;

  attestationCompletedOffline(actions: { onContinue(): void; onCancel(): void; onRetry(): void }): void;

  attestationCompletedWithWarnings(actions: { onContinue(): void }): void;
}

export type PromptDecision = "continue" | "cancel" | "retry";

export function askDidFail(prompt: AttestationPrompt, isDevelopmentCard: boolean): Promise<PromptDecision> {
  return new Promise((resolve) => {
    prompt.attestationDidFail(isDevelopmentCard, {
      onContinue: () => resolve("continue"),
      onCancel: () => resolve("cancel"),
    });
  });
}

export function askCompletedOffline(prompt: AttestationPrompt): Promise<PromptDecision> {
  return new Promise((resolve) => {
    prompt.attestationCompletedOffline({
      onContinue: () => resolve("continue"),
      onCancel: () => resolve("cancel"),
      onRetry: () => resolve("retry"),
    });
  });
}

export function askCompletedWithWarnings(prompt: AttestationPrompt): Promise<PromptDecision> {
  return new Promise((resolve) => {
    prompt.attestationCompletedWithWarnings({ onContinue: () => resolve("continue") });
  });
}
