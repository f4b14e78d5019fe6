/**
 * Attestation verdict model.
 */

export type AttestationStatus =
  | "notAttested"
  | "verifiedOffline"
  | "verified"
  | "warning"
  | "failed"
  | "skipped";

export type AttestationMode = "offline" | "normal" | "full";

export const ATTESTATION_MODES: readonly AttestationMode[] = ["offline", "normal", "full"];

export const ATTESTATION_STATUSES: readonly AttestationStatus[] = [
  "notAttested",
  "verifiedOffline",
  "verified",
  "warning",
  "failed",
  "skipped",
];

export interface Attestation {
  readonly cardKeyAttestation: AttestationStatus;
  readonly walletKeysAttestation: AttestationStatus;
  /** Mode the verdict was reached under. */
  readonly mode: AttestationMode;
}

export interface AttestationVerdict extends Attestation {
  readonly status: AttestationStatus;
}

export const EMPTY_ATTESTATION: Attestation = {
  cardKeyAttestation: "notAttested",
  walletKeysAttestation: "notAttested",
  mode: "offline",
};

// Most severe first
const SEVERITY: readonly AttestationStatus[] = [
  "failed",
  "skipped",
  "warning",
  "verifiedOffline",
  "verified",
  "notAttested",
];

/**
 * Overall status: the most severe of the component statuses.
 */
export function attestationStatus(attestation: Attestation): AttestationStatus {
  const components = [attestation.cardKeyAttestation, attestation.walletKeysAttestation];
  for (const status of SEVERITY) {
    if (components.includes(status)) {
      return status;
    }
  }
  return "notAttested";
}

export function toVerdict(attestation: Attestation): AttestationVerdict {
  return { ...attestation, status: attestationStatus(attestation) };
}

/**
 * offline < normal < full
 */
export function compareModes(a: AttestationMode, b: AttestationMode): number {
  return ATTESTATION_MODES.indexOf(a) - ATTESTATION_MODES.indexOf(b);
}

/**
 * Whether a verdict reached under `achieved` is good enough for a request in
 * `requested` mode.
 */
export function modeSatisfies(achieved: AttestationMode, requested: AttestationMode): boolean {
  return compareModes(achieved, requested) >= 0;
}

export function isAttestationMode(value: unknown): value is AttestationMode {
  return ATTESTATION_MODES.some((mode) => mode === value);
}

export function isAttestationStatus(value: unknown): value is AttestationStatus {
  return ATTESTATION_STATUSES.some((status) => status === value);
}
