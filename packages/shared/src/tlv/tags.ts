import type { CardStatus, EllipticCurve } from "../types/index.js";

/**
 * Value kinds a tag may declare. The kind decides how a value is encoded
 * to bytes and how the raw bytes are converted back.
 */
export type TlvKind =
  | "byte"
  | "uint16"
  | "integer"
  | "bytes"
  | "hex"
  | "utf8"
  | "bool"
  | "date"
  | "nested"
  | "cardStatus"
  | "curve";

export interface TagDefinition {
  readonly code: number;
  readonly kind: TlvKind;
  /** Repeated records are legal for this tag. */
  readonly multiple?: boolean;
}

/**
 * Wire tag registry. Codes are stable protocol constants.
 */
export const TLV_TAGS = {
  cardId: { code: 0x01, kind: "hex" },
  status: { code: 0x02, kind: "cardStatus" },
  cardPublicKey: { code: 0x03, kind: "bytes" },
  cardSignature: { code: 0x04, kind: "bytes" },
  curveId: { code: 0x05, kind: "curve" },
  settingsMask: { code: 0x0a, kind: "integer" },
  cardData: { code: 0x0c, kind: "nested" },
  pin: { code: 0x10, kind: "bytes" },
  pin2: { code: 0x11, kind: "bytes" },
  challenge: { code: 0x16, kind: "bytes" },
  salt: { code: 0x17, kind: "bytes" },
  manufacturerName: { code: 0x20, kind: "utf8" },
  interactionMode: { code: 0x23, kind: "byte" },
  legacyMode: { code: 0x29, kind: "byte" },
  issuerPublicKey: { code: 0x30, kind: "bytes" },
  issuerData: { code: 0x32, kind: "bytes" },
  issuerDataSignature: { code: 0x33, kind: "bytes" },
  issuerDataCounter: { code: 0x35, kind: "integer" },
  terminalIsLinked: { code: 0x58, kind: "bool" },
  terminalPublicKey: { code: 0x5c, kind: "bytes" },
  walletPublicKey: { code: 0x60, kind: "bytes" },
  walletSignature: { code: 0x61, kind: "bytes" },
  walletRemainingSignatures: { code: 0x62, kind: "integer" },
  walletSignedHashes: { code: 0x63, kind: "integer" },
  checkWalletCounter: { code: 0x64, kind: "integer" },
  walletIndex: { code: 0x65, kind: "integer" },
  walletsCount: { code: 0x66, kind: "uint16" },
  firmwareVersion: { code: 0x80, kind: "utf8" },
  batchId: { code: 0x81, kind: "hex" },
  manufactureDateTime: { code: 0x82, kind: "date" },
  issuerName: { code: 0x83, kind: "utf8" },
  manufacturerSignature: { code: 0x86, kind: "bytes" },
  productMask: { code: 0x8a, kind: "byte" },
  backupCardPublicKey: { code: 0xd0, kind: "bytes", multiple: true },
} as const satisfies Record<string, TagDefinition>;

export type TlvTag = keyof typeof TLV_TAGS;

type KindOf<T extends TlvTag> = (typeof TLV_TAGS)[T]["kind"];

/**
 * TypeScript value carried by each kind.
 */
export interface TlvKindValue {
  byte: number;
  uint16: number;
  integer: number;
  bytes: Uint8Array;
  hex: string;
  utf8: string;
  bool: boolean;
  date: Date;
  nested: Tlv[];
  cardStatus: CardStatus;
  curve: EllipticCurve;
}

export type TlvValue<T extends TlvTag> = TlvKindValue[KindOf<T>];

/**
 * One tag-length-value record. `length === value.byteLength` always holds;
 * `tag` is the raw wire code so unknown tags survive decoding.
 */
export interface Tlv {
  readonly tag: number;
  readonly length: number;
  readonly value: Uint8Array;
}

export function isTlvTag(name: string): name is TlvTag {
  return Object.prototype.hasOwnProperty.call(TLV_TAGS, name);
}

const TAGS_BY_CODE = new Map<number, TlvTag>();
for (const name of Object.keys(TLV_TAGS)) {
  if (isTlvTag(name)) {
    TAGS_BY_CODE.set(TLV_TAGS[name].code, name);
  }
}

export function tagDefinition(tag: TlvTag): TagDefinition {
  return TLV_TAGS[tag];
}

/**
 * Registry name for a wire code, or undefined for unknown tags.
 */
export function tagName(code: number): TlvTag | undefined {
  return TAGS_BY_CODE.get(code);
}

export const CARD_STATUS_CODES: Record<CardStatus, number> = {
  notPersonalized: 0x00,
  empty: 0x01,
  loaded: 0x02,
  purged: 0x03,
};
