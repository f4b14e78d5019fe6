/**
 * Hex utilities
 *
 * Card identifiers, batch ids and most diagnostics are rendered as upper-case
 * hex. Used by the TLV codec, the logger and the CLI.
 */

/**
 * Remove whitespace from a hex string.
 */
export function cleanHex(input: string): string {
  return input.replace(/\s+/g, "");
}

/**
 * Validate that a string contains only hex characters and has even length.
 */
export function isValidEvenHex(hex: string): boolean {
  return /^[0-9a-fA-F]*$/.test(hex) && hex.length % 2 === 0;
}

/**
 * Parse a hex string (whitespace allowed) into bytes.
 * Throws on invalid format.
 */
export function hexToBytes(input: string): Uint8Array {
  const hex = cleanHex(input);
  if (!isValidEvenHex(hex)) {
    throw new Error("Invalid hex format (must be even-length hex)");
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    out[i / 2] = parseInt(hex.slice(i, i + 2), 16);
  }
  return out;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0"))
    .join("")
    .toUpperCase();
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
