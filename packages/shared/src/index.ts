/**
 * Shared protocol layer: TLV codec, APDU framing, secure channel envelope,
 * signature primitives, logging and the error taxonomy.
 */

export * from "./errors.js";
export * from "./types/index.js";
export * from "./utils/index.js";
export * from "./tlv/index.js";
export * from "./protocol/apdu.js";
export * from "./crypto/envelope.js";
export * from "./crypto/signing.js";
