/**
 * Typed TLV value codec
 *
 * encode(tag, value) converts a typed value into a record according to the
 * tag's declared kind. TlvDecoder does the reverse over a record sequence.
 */

import { CardSdkError } from "../errors.js";
import { ELLIPTIC_CURVES, type CardStatus, type EllipticCurve } from "../types/index.js";
import { bytesToHex, hexToBytes, isValidEvenHex } from "../utils/hex.js";
import {
  CARD_STATUS_CODES,
  TLV_TAGS,
  type TlvKind,
  type Tlv,
  type TlvTag,
  type TlvValue,
  type TlvKindValue,
} from "./tags.js";
import { deserializeTlv, makeTlv, serializeTlv } from "./tlv.js";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

function encodingError(tag: TlvTag, expected: string, value: unknown): CardSdkError {
  const shown = value instanceof Uint8Array ? `${value.byteLength} bytes` : JSON.stringify(value);
  return new CardSdkError("encodingFailed", `Tag ${tag} expects ${expected}, got ${shown}`);
}

function isTlvArray(value: unknown): value is Tlv[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item: unknown) =>
        typeof item === "object" &&
        item !== null &&
        "tag" in item &&
        "value" in item &&
        item.value instanceof Uint8Array,
    )
  );
}

function isCurve(value: unknown): value is EllipticCurve {
  return ELLIPTIC_CURVES.some((curve) => curve === value);
}

function isCardStatus(value: unknown): value is CardStatus {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(CARD_STATUS_CODES, value);
}

/**
 * Minimal big-endian representation. Zero is a single 0x00 byte.
 */
export function encodeInteger(value: number): Uint8Array {
  const out: number[] = [];
  let rest = value;
  do {
    out.unshift(rest % 256);
    rest = Math.floor(rest / 256);
  } while (rest > 0);
  return Uint8Array.from(out);
}

/**
 * Reconstruct an integer from any trimmed big-endian width, up to
 * Number.MAX_SAFE_INTEGER.
 */
export function decodeInteger(bytes: Uint8Array): number | null {
  if (bytes.byteLength === 0) {
    return null;
  }
  let value = 0;
  for (const b of bytes) {
    value = value * 256 + b;
    if (!Number.isSafeInteger(value)) {
      return null;
    }
  }
  return value;
}

function encodeKind(tag: TlvTag, kind: TlvKind, value: unknown): Uint8Array {
  switch (kind) {
    case "byte":
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 0xff) {
        throw encodingError(tag, "an integer in 0..255", value);
      }
      return Uint8Array.of(value);
    case "uint16":
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 0xffff) {
        throw encodingError(tag, "an integer in 0..65535", value);
      }
      return Uint8Array.of((value >> 8) & 0xff, value & 0xff);
    case "integer":
      if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
        throw encodingError(tag, "a non-negative safe integer", value);
      }
      return encodeInteger(value);
    case "bytes":
      if (!(value instanceof Uint8Array)) {
        throw encodingError(tag, "a byte array", value);
      }
      return value;
    case "hex":
      if (typeof value !== "string" || !isValidEvenHex(value)) {
        throw encodingError(tag, "an even-length hex string", value);
      }
      return hexToBytes(value);
    case "utf8":
      if (typeof value !== "string") {
        throw encodingError(tag, "a string", value);
      }
      return utf8Encoder.encode(value);
    case "bool":
      if (typeof value !== "boolean") {
        throw encodingError(tag, "a boolean", value);
      }
      return Uint8Array.of(value ? 0x01 : 0x00);
    case "date": {
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        throw encodingError(tag, "a valid Date", value);
      }
      const year = value.getUTCFullYear();
      return Uint8Array.of((year >> 8) & 0xff, year & 0xff, value.getUTCMonth() + 1, value.getUTCDate());
    }
    case "nested":
      if (!isTlvArray(value)) {
        throw encodingError(tag, "a TLV record list", value);
      }
      return serializeTlv(value);
    case "cardStatus":
      if (!isCardStatus(value)) {
        throw encodingError(tag, "a card status", value);
      }
      return Uint8Array.of(CARD_STATUS_CODES[value]);
    case "curve":
      if (!isCurve(value)) {
        throw encodingError(tag, "an elliptic curve name", value);
      }
      return utf8Encoder.encode(value);
  }
}

/**
 * Encode a typed value into a record for `tag`.
 */
export function encode<T extends TlvTag>(tag: T, value: TlvValue<T>): Tlv {
  const definition = TLV_TAGS[tag];
  return makeTlv(definition.code, encodeKind(tag, definition.kind, value));
}

function mismatch(tag: TlvTag, detail: string): CardSdkError {
  return new CardSdkError("decodingTypeMismatch", `Tag ${tag}: ${detail}`);
}

function decodeKind<K extends TlvKind>(tag: TlvTag, kind: K, raw: Uint8Array): TlvKindValue[K];
function decodeKind(tag: TlvTag, kind: TlvKind, raw: Uint8Array): TlvKindValue[TlvKind] {
  switch (kind) {
    case "byte":
      if (raw.byteLength !== 1) {
        throw mismatch(tag, `expected 1 byte, got ${raw.byteLength}`);
      }
      return raw[0];
    case "uint16":
      if (raw.byteLength !== 2) {
        throw mismatch(tag, `expected 2 bytes, got ${raw.byteLength}`);
      }
      return (raw[0] << 8) | raw[1];
    case "integer": {
      const value = decodeInteger(raw);
      if (value === null) {
        throw mismatch(tag, `cannot read integer from ${raw.byteLength} bytes`);
      }
      return value;
    }
    case "bytes":
      return raw;
    case "hex":
      return bytesToHex(raw);
    case "utf8":
      try {
        return utf8Decoder.decode(raw);
      } catch (error) {
        throw new CardSdkError("decodingTypeMismatch", `Tag ${tag}: invalid UTF-8`, { cause: error });
      }
    case "bool":
      if (raw.byteLength === 0) {
        return true;
      }
      if (raw.byteLength !== 1) {
        throw mismatch(tag, `expected 0 or 1 byte, got ${raw.byteLength}`);
      }
      return raw[0] !== 0;
    case "date": {
      if (raw.byteLength !== 4) {
        throw mismatch(tag, `expected 4 bytes, got ${raw.byteLength}`);
      }
      const year = (raw[0] << 8) | raw[1];
      const month = raw[2];
      const day = raw[3];
      if (month < 1 || month > 12 || day < 1 || day > 31) {
        throw mismatch(tag, `invalid date ${year}-${month}-${day}`);
      }
      return new Date(Date.UTC(year, month - 1, day));
    }
    case "nested":
      try {
        return deserializeTlv(raw);
      } catch (error) {
        throw new CardSdkError("decodingTypeMismatch", `Tag ${tag}: malformed nested TLV`, { cause: error });
      }
    case "cardStatus": {
      if (raw.byteLength !== 1) {
        throw mismatch(tag, `expected 1 byte, got ${raw.byteLength}`);
      }
      const entry = Object.entries(CARD_STATUS_CODES).find(([, code]) => code === raw[0]);
      if (!entry || !isCardStatus(entry[0])) {
        throw mismatch(tag, `unknown status code 0x${raw[0].toString(16)}`);
      }
      return entry[0];
    }
    case "curve": {
      let name: string;
      try {
        name = utf8Decoder.decode(raw);
      } catch (error) {
        throw new CardSdkError("decodingTypeMismatch", `Tag ${tag}: invalid UTF-8`, { cause: error });
      }
      if (!isCurve(name)) {
        throw mismatch(tag, `unknown curve ${name}`);
      }
      return name;
    }
  }
}

/**
 * Typed reader over a record sequence.
 */
export class TlvDecoder {
  constructor(readonly records: readonly Tlv[]) {}

  static fromBytes(bytes: Uint8Array): TlvDecoder {
    return new TlvDecoder(deserializeTlv(bytes));
  }

  /**
   * First record for `tag`, converted to its declared kind.
   * Throws decodingMissingTag when absent.
   */
  decode<T extends TlvTag>(tag: T): TlvValue<T> {
    const value = this.decodeOptional(tag);
    if (value === undefined) {
      throw new CardSdkError("decodingMissingTag", `Missing required tag ${tag}`);
    }
    return value;
  }

  decodeOptional<T extends TlvTag>(tag: T): TlvValue<T> | undefined {
    const definition = TLV_TAGS[tag];
    const record = this.records.find((r) => r.tag === definition.code);
    if (!record) {
      return undefined;
    }
    return decodeKind<(typeof TLV_TAGS)[T]["kind"]>(tag, definition.kind, record.value);
  }

  /**
   * Every record for `tag` in wire order; empty when there is none.
   */
  decodeAll<T extends TlvTag>(tag: T): TlvValue<T>[] {
    const definition = TLV_TAGS[tag];
    return this.records
      .filter((r) => r.tag === definition.code)
      .map((r) => decodeKind<(typeof TLV_TAGS)[T]["kind"]>(tag, definition.kind, r.value));
  }

  has(tag: TlvTag): boolean {
    return this.records.some((r) => r.tag === TLV_TAGS[tag].code);
  }
}

export function decode<T extends TlvTag>(records: readonly Tlv[], tag: T): TlvValue<T> {
  return new TlvDecoder(records).decode(tag);
}

export function decodeOptional<T extends TlvTag>(records: readonly Tlv[], tag: T): TlvValue<T> | undefined {
  return new TlvDecoder(records).decodeOptional(tag);
}

export function decodeAll<T extends TlvTag>(records: readonly Tlv[], tag: T): TlvValue<T>[] {
  return new TlvDecoder(records).decodeAll(tag);
}
