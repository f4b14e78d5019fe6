/**
 * TLV wire format
 *
 *   tag (1 byte) | length | value
 *
 * Length is one byte for 0x00..0xFE. 0xFF is the extension marker followed by
 * a 2-byte big-endian length, so 0xFF..0xFFFF take three bytes.
 */

import { CardSdkError } from "../errors.js";
import type { Tlv } from "./tags.js";

export const MAX_SHORT_LENGTH = 0xfe;
export const EXTENDED_LENGTH_MARKER = 0xff;
export const MAX_TLV_LENGTH = 0xffff;

export function makeTlv(tag: number, value: Uint8Array): Tlv {
  if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) {
    throw new CardSdkError("encodingFailed", `Tag must be a single byte, got ${tag}`);
  }
  if (value.byteLength > MAX_TLV_LENGTH) {
    throw new CardSdkError(
      "payloadTooLarge",
      `Value of tag 0x${tag.toString(16)} is ${value.byteLength} bytes, max ${MAX_TLV_LENGTH}`,
    );
  }
  return { tag, length: value.byteLength, value };
}

function encodeLength(length: number): number[] {
  if (length <= MAX_SHORT_LENGTH) {
    return [length];
  }
  return [EXTENDED_LENGTH_MARKER, (length >> 8) & 0xff, length & 0xff];
}

/**
 * Serialize records in order.
 */
export function serializeTlv(records: readonly Tlv[]): Uint8Array {
  const chunks: number[] = [];
  for (const record of records) {
    if (record.length !== record.value.byteLength) {
      throw new CardSdkError(
        "encodingFailed",
        `Length ${record.length} does not match value size ${record.value.byteLength}`,
      );
    }
    chunks.push(record.tag, ...encodeLength(record.length));
    for (const b of record.value) {
      chunks.push(b);
    }
  }
  return Uint8Array.from(chunks);
}

/**
 * Parse a byte buffer into records. Unknown tags are kept; truncated input
 * fails with decodingMalformedTlv.
 */
export function deserializeTlv(bytes: Uint8Array): Tlv[] {
  const records: Tlv[] = [];
  let offset = 0;

  while (offset < bytes.byteLength) {
    const tag = bytes[offset];
    offset += 1;

    if (offset >= bytes.byteLength) {
      throw new CardSdkError("decodingMalformedTlv", `Missing length for tag 0x${tag.toString(16)}`);
    }

    let length = bytes[offset];
    offset += 1;

    if (length === EXTENDED_LENGTH_MARKER) {
      if (offset + 2 > bytes.byteLength) {
        throw new CardSdkError("decodingMalformedTlv", "Truncated extended length");
      }
      length = (bytes[offset] << 8) | bytes[offset + 1];
      offset += 2;
    }

    if (offset + length > bytes.byteLength) {
      throw new CardSdkError(
        "decodingMalformedTlv",
        `Tag 0x${tag.toString(16)} declares ${length} bytes, ${bytes.byteLength - offset} available`,
      );
    }

    records.push({ tag, length, value: bytes.slice(offset, offset + length) });
    offset += length;
  }

  return records;
}
