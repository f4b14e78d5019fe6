import { CardSdkError } from "../errors.js";
import { encode } from "./codec.js";
import { TLV_TAGS, type Tlv, type TlvTag, type TlvValue } from "./tags.js";
import { serializeTlv } from "./tlv.js";

/** Value of the legacyMode tag sent by hosts with poor NFC quality. */
export const LEGACY_MODE_VALUE = 4;

/**
 * Ordered request builder.
 *
 * `undefined` values are skipped so optional fields can be appended
 * unconditionally. A single-valued tag appended twice fails with
 * duplicateTag; tags declared `multiple` may repeat.
 */
export class TlvBuilder {
  private readonly records: Tlv[] = [];

  constructor(options: { legacyMode?: boolean } = {}) {
    if (options.legacyMode) {
      this.append("legacyMode", LEGACY_MODE_VALUE);
    }
  }

  append<T extends TlvTag>(tag: T, value: TlvValue<T> | undefined): this {
    if (value === undefined) {
      return this;
    }
    const definition = TLV_TAGS[tag];
    const isMultiple = "multiple" in definition && definition.multiple;
    if (!isMultiple && this.records.some((r) => r.tag === definition.code)) {
      throw new CardSdkError("duplicateTag", `Tag ${tag} may only appear once`);
    }
    this.records.push(encode(tag, value));
    return this;
  }

  build(): Tlv[] {
    return [...this.records];
  }

  serialize(): Uint8Array {
    return serializeTlv(this.records);
  }
}
