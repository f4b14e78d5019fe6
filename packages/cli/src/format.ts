/**
 * Human-readable rendering of TLV records, cards and verdicts.
 */

import chalk from "chalk";

import {
  TlvDecoder,
  bytesToHex,
  isCardSdkError,
  tagName,
  type Tlv,
} from "@cardkit/shared";
import {
  formatFirmwareVersion,
  type AttestationStatus,
  type AttestationVerdict,
  type Card,
  type TrustedCardEntry,
} from "@cardkit/sdk";

function tagCode(code: number): string {
  return `0x${code.toString(16).padStart(2, "0").toUpperCase()}`;
}

function renderScalar(value: unknown): string {
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return String(value);
}

/**
 * One line per record, nested records indented by two spaces:
 *
 *   0x01 cardId [8] CB79000000018201
 *   0x0C cardData [12]
 *     0x81 batchId [2] AB01
 */
export function formatTlv(records: readonly Tlv[], depth = 0): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];

  for (const record of records) {
    const name = tagName(record.tag);
    const head = `${indent}${tagCode(record.tag)} ${name ?? "unknown"} [${record.length}]`;
    if (!name) {
      lines.push(`${head} ${bytesToHex(record.value)}`);
      continue;
    }

    let value: unknown;
    try {
      value = new TlvDecoder([record]).decode(name);
    } catch (error) {
      if (!isCardSdkError(error)) {
        throw error;
      }
      lines.push(`${head} ${bytesToHex(record.value)} (${error.code})`);
      continue;
    }

    if (Array.isArray(value)) {
      lines.push(head, ...formatTlv(value, depth + 1));
    } else {
      lines.push(`${head} ${renderScalar(value)}`);
    }
  }
  return lines;
}

export function colorStatus(status: AttestationStatus): string {
  switch (status) {
    case "verified":
    case "verifiedOffline":
      return chalk.green(status);
    case "warning":
      return chalk.yellow(status);
    case "failed":
    case "skipped":
      return chalk.red(status);
    case "notAttested":
      return chalk.gray(status);
  }
}

export function formatCard(card: Card): string[] {
  const lines = [
    `Card ${card.cardId}`,
    `  firmware   ${formatFirmwareVersion(card.firmwareVersion)}`,
    `  status     ${card.status}`,
    `  public key ${bytesToHex(card.cardPublicKey)}`,
  ];
  if (card.issuerName) {
    lines.push(`  issuer     ${card.issuerName}`);
  }
  for (const wallet of card.wallets) {
    const signed = wallet.totalSignedHashes === undefined ? "" : ` signed=${wallet.totalSignedHashes}`;
    lines.push(`  wallet #${wallet.index} ${wallet.curve} ${bytesToHex(wallet.publicKey)}${signed}`);
  }
  return lines;
}

export function formatVerdict(verdict: AttestationVerdict): string {
  return [
    `attestation ${colorStatus(verdict.status)}`,
    `(card ${colorStatus(verdict.cardKeyAttestation)},`,
    `wallets ${colorStatus(verdict.walletKeysAttestation)},`,
    `mode ${verdict.mode})`,
  ].join(" ");
}

export function formatTrustedCard(entry: TrustedCardEntry): string {
  const { cardKeyAttestation, walletKeysAttestation, mode } = entry.attestation;
  return `${entry.key} card=${cardKeyAttestation} wallets=${walletKeysAttestation} mode=${mode}`;
}
