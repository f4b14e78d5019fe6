/**
 * Card operating system version, e.g. "4.52r", "6.16d SDK", "3.05 special".
 */

export type FirmwareType = "release" | "sdk" | "special";

export interface FirmwareVersion {
  readonly major: number;
  readonly minor: number;
  readonly type: FirmwareType;
}

/** Linked card public keys in card key attestation. */
export const KEYS_IMPORT_AVAILABLE: FirmwareVersion = { major: 6, minor: 16, type: "release" };
/** Per-wallet key attestation. */
export const WALLET_ATTESTATION_AVAILABLE: FirmwareVersion = { major: 2, minor: 0, type: "release" };

export function parseFirmwareVersion(raw: string): FirmwareVersion {
  const match = /^(\d+)\.(\d+)(.*)$/.exec(raw.trim());
  if (!match) {
    throw new Error(`Invalid firmware version: ${raw}`);
  }
  const suffix = match[3].trim();
  let type: FirmwareType = "special";
  if (suffix === "r" || suffix === "") {
    type = "release";
  } else if (suffix.startsWith("d")) {
    type = "sdk";
  }
  return { major: Number(match[1]), minor: Number(match[2]), type };
}

export function compareFirmware(a: FirmwareVersion, b: FirmwareVersion): number {
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  return a.minor - b.minor;
}

export function formatFirmwareVersion(version: FirmwareVersion): string {
  const minor = String(version.minor).padStart(2, "0");
  switch (version.type) {
    case "release":
      return `${version.major}.${minor}r`;
    case "sdk":
      return `${version.major}.${minor}d SDK`;
    case "special":
      return `${version.major}.${minor} special`;
  }
}
