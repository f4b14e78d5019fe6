/**
 * Physical link to the card (NFC reader, USB CCID, or an in-process mock).
 *
 * `transceive` takes a complete command APDU and resolves with the raw
 * response including SW1SW2. Rejections are treated as transport failures.
 */
export interface CardTransport {
  transceive(apdu: Uint8Array): Promise<Uint8Array>;
  /** Release the radio while the host waits on something else. */
  pause(): Promise<void>;
  resume(): Promise<void>;
}
