/**
 * Mock card for testing
 * An in-process CardTransport that behaves like a personalized card:
 * it checks the access code, enforces encryption, signs attestation
 * challenges with real keys and keeps issuer data.
 */

import {
  CardSdkError,
  Instruction,
  SW_SUCCESS,
  TlvBuilder,
  TlvDecoder,
  bytesEqual,
  commandData,
  decryptAesGcm,
  derivePublicKey,
  encode,
  encryptAesGcm,
  parseCommand,
  randomBytes,
  responseBytes,
  sha256,
  signMessage,
  statusResponse,
  verifySignature,
  type CardStatus,
  type CommandApdu,
  type EllipticCurve,
} from "@cardkit/shared";

import { SettingsMask } from "../card/card.js";
import { cardKeyAttestationMessage } from "../commands/attest-card-key-command.js";
import { InteractionMode } from "../commands/read-command.js";
import { issuerDataMessage } from "../commands/write-issuer-data-command.js";
import { DEFAULT_ACCESS_CODE } from "../session/environment.js";
import type { CardTransport } from "../session/transport.js";

export interface MockWallet {
  curve: EllipticCurve;
  privateKey: Uint8Array;
  signedHashes?: number;
  remainingSignatures?: number;
  /** Reported as checkWalletCounter during wallet attestation. */
  counter?: number;
}

export interface MockCardOptions {
  cardId?: string;
  firmwareVersion?: string;
  status?: CardStatus;
  settingsMask?: number;
  cardPrivateKey?: Uint8Array;
  issuerPrivateKey?: Uint8Array;
  /** null marks an empty slot. */
  wallets?: (MockWallet | null)[];
  linkedCardPublicKeys?: Uint8Array[];
  accessCode?: string;
  /** When set the card refuses clear-text requests. */
  encryptionKey?: Uint8Array;
}

/** Deterministic test key: SHA-256 of a label. */
export function testKey(label: string): Uint8Array {
  return sha256(label);
}

const SW_INVALID_PARAMS = 0x6a86;
const SW_NEED_ENCRYPTION = 0x6982;
const SW_INVALID_ACCESS_CODE = 0x6af1;
const SW_ACCESS_CODE_REQUIRED = 0x6af2;
const SW_INS_NOT_SUPPORTED = 0x6d00;
const SW_ERROR_PROCESSING = 0x6286;

class StatusWord extends Error {
  constructor(readonly sw: number) {
    super(`SW ${sw.toString(16)}`);
  }
}

export class MockCard implements CardTransport {
  readonly cardId: string;
  readonly firmwareVersion: string;
  readonly status: CardStatus;
  readonly settingsMask: number;
  readonly wallets: (MockWallet | null)[];
  readonly linkedCardPublicKeys: Uint8Array[];
  readonly encryptionKey?: Uint8Array;

  /** Every parsed request, in order. */
  readonly requests: CommandApdu[] = [];
  pauseCount = 0;
  resumeCount = 0;

  issuerData?: Uint8Array;
  issuerDataCounter?: number;

  /** Sign attestation challenges with garbage. */
  corruptCardSignature = false;
  corruptWalletSignature = false;

  private readonly cardPrivateKey: Uint8Array;
  private readonly issuerPrivateKey: Uint8Array;
  private accessCodeHash: Uint8Array;
  private queuedStatusWords: number[] = [];
  private queuedFailures: Error[] = [];
  private released = false;

  constructor(options: MockCardOptions = {}) {
    this.cardId = options.cardId ?? "CB79000000018201";
    this.firmwareVersion = options.firmwareVersion ?? "6.33r";
    this.status = options.status ?? "loaded";
    this.settingsMask = options.settingsMask ?? SettingsMask.isReusable;
    this.cardPrivateKey = options.cardPrivateKey ?? testKey("mock-card-key");
    this.issuerPrivateKey = options.issuerPrivateKey ?? testKey("mock-issuer-key");
    this.wallets = options.wallets ?? [{ curve: "secp256k1", privateKey: testKey("mock-wallet-0") }];
    this.linkedCardPublicKeys = options.linkedCardPublicKeys ?? [];
    this.encryptionKey = options.encryptionKey;
    this.accessCodeHash = sha256(options.accessCode ?? DEFAULT_ACCESS_CODE);
  }

  get cardPublicKey(): Uint8Array {
    return derivePublicKey("secp256k1", this.cardPrivateKey);
  }

  get issuerPublicKey(): Uint8Array {
    return derivePublicKey("secp256k1", this.issuerPrivateKey);
  }

  walletPublicKey(index: number): Uint8Array {
    const wallet = this.wallets[index];
    if (!wallet) {
      throw new Error(`No wallet in slot ${index}`);
    }
    return derivePublicKey(wallet.curve, wallet.privateKey);
  }

  /**
   * Issuer-side signature over data for this card.
   */
  signIssuerData(data: Uint8Array, counter?: number): Uint8Array {
    return signMessage("secp256k1", this.issuerPrivateKey, issuerDataMessage(this.cardId, data, counter));
  }

  setAccessCode(code: string): void {
    this.accessCodeHash = sha256(code);
  }

  /**
   * Answer the next request with a bare status word.
   */
  failNext(sw: number): void {
    this.queuedStatusWords.push(sw);
  }

  /**
   * Reject the next transceive as if the link dropped.
   */
  dropNext(error: Error = new Error("Tag was lost")): void {
    this.queuedFailures.push(error);
  }

  async transceive(apdu: Uint8Array): Promise<Uint8Array> {
    this.assertNotReleased();
    const failure = this.queuedFailures.shift();
    if (failure) {
      throw failure;
    }

    let request: CommandApdu;
    try {
      request = parseCommand(apdu);
    } catch {
      return responseBytes(statusResponse(SW_INVALID_PARAMS));
    }
    this.requests.push(request);

    const queued = this.queuedStatusWords.shift();
    if (queued !== undefined) {
      return responseBytes(statusResponse(queued));
    }

    try {
      return responseBytes(statusResponse(SW_SUCCESS, await this.handle(request)));
    } catch (error) {
      if (error instanceof StatusWord) {
        return responseBytes(statusResponse(error.sw));
      }
      if (error instanceof CardSdkError) {
        return responseBytes(statusResponse(SW_INVALID_PARAMS));
      }
      throw error;
    }
  }

  async pause(): Promise<void> {
    this.pauseCount++;
  }

  async resume(): Promise<void> {
    this.resumeCount++;
  }

  release(): void {
    this.released = true;
  }

  private assertNotReleased(): void {
    if (this.released) {
      throw new Error("Card session already released");
    }
  }

  private async handle(request: CommandApdu): Promise<Uint8Array> {
    const encrypted = request.p1 !== 0;
    if (this.encryptionKey && !encrypted) {
      throw new StatusWord(SW_NEED_ENCRYPTION);
    }
    if (encrypted && !this.encryptionKey) {
      throw new StatusWord(SW_INVALID_PARAMS);
    }

    let plain = commandData(request);
    if (encrypted && this.encryptionKey) {
      try {
        plain = await decryptAesGcm(plain, this.encryptionKey);
      } catch {
        throw new StatusWord(SW_ERROR_PROCESSING);
      }
    }

    const decoder = TlvDecoder.fromBytes(plain);
    const pin = decoder.decodeOptional("pin");
    if (!pin) {
      throw new StatusWord(SW_ACCESS_CODE_REQUIRED);
    }
    if (!bytesEqual(pin, this.accessCodeHash)) {
      throw new StatusWord(SW_INVALID_ACCESS_CODE);
    }

    const body = this.dispatch(request.ins, decoder).serialize();
    if (encrypted && this.encryptionKey) {
      return encryptAesGcm(body, this.encryptionKey);
    }
    return body;
  }

  private dispatch(ins: number, decoder: TlvDecoder): TlvBuilder {
    switch (ins) {
      case Instruction.read:
        return decoder.decodeOptional("interactionMode") === InteractionMode.readWallet
          ? this.readWallet(decoder.decode("walletIndex"))
          : this.readCard();
      case Instruction.attestCardKey:
        return this.attestCardKey(decoder);
      case Instruction.attestWalletKey:
        return this.attestWalletKey(decoder);
      case Instruction.writeIssuerData:
        return this.writeIssuerData(decoder);
      default:
        throw new StatusWord(SW_INS_NOT_SUPPORTED);
    }
  }

  private checkCardId(decoder: TlvDecoder): void {
    if (decoder.decode("cardId") !== this.cardId) {
      throw new StatusWord(SW_INVALID_PARAMS);
    }
  }

  private readCard(): TlvBuilder {
    return new TlvBuilder()
      .append("cardId", this.cardId)
      .append("manufacturerName", "CARDKIT")
      .append("status", this.status)
      .append("firmwareVersion", this.firmwareVersion)
      .append("cardPublicKey", this.cardPublicKey)
      .append("settingsMask", this.settingsMask)
      .append("issuerPublicKey", this.issuerPublicKey)
      .append("walletsCount", this.wallets.length)
      .append("terminalIsLinked", false)
      .append("cardData", [
        encode("batchId", "AB01"),
        encode("manufactureDateTime", new Date(Date.UTC(2024, 4, 17))),
        encode("issuerName", "Test Issuer"),
      ]);
  }

  private readWallet(index: number): TlvBuilder {
    if (index >= this.wallets.length) {
      throw new StatusWord(SW_INVALID_PARAMS);
    }
    const builder = new TlvBuilder().append("walletIndex", index);
    const wallet = this.wallets[index];
    if (!wallet) {
      return builder;
    }
    return builder
      .append("walletPublicKey", derivePublicKey(wallet.curve, wallet.privateKey))
      .append("curveId", wallet.curve)
      .append("walletSignedHashes", wallet.signedHashes)
      .append("walletRemainingSignatures", wallet.remainingSignatures);
  }

  private attestCardKey(decoder: TlvDecoder): TlvBuilder {
    this.checkCardId(decoder);
    const challenge = decoder.decode("challenge");
    const salt = randomBytes(16);
    const full = decoder.decodeOptional("interactionMode") === InteractionMode.fullAttestation;
    const linked = full ? this.linkedCardPublicKeys : [];

    const signature = this.corruptCardSignature
      ? randomBytes(64)
      : signMessage("secp256k1", this.cardPrivateKey, cardKeyAttestationMessage(challenge, salt, linked));

    const builder = new TlvBuilder()
      .append("cardId", this.cardId)
      .append("salt", salt)
      .append("cardSignature", signature);
    for (const key of linked) {
      builder.append("backupCardPublicKey", key);
    }
    return builder;
  }

  private attestWalletKey(decoder: TlvDecoder): TlvBuilder {
    this.checkCardId(decoder);
    const publicKey = decoder.decode("walletPublicKey");
    const challenge = decoder.decode("challenge");
    const wallet = this.wallets.find(
      (w) => w !== null && bytesEqual(derivePublicKey(w.curve, w.privateKey), publicKey),
    );
    if (!wallet) {
      throw new StatusWord(SW_INVALID_PARAMS);
    }

    const salt = randomBytes(16);
    const message = new Uint8Array([...challenge, ...salt]);
    const signature = this.corruptWalletSignature
      ? randomBytes(64)
      : signMessage(wallet.curve, wallet.privateKey, message);

    return new TlvBuilder()
      .append("cardId", this.cardId)
      .append("salt", salt)
      .append("walletSignature", signature)
      .append("checkWalletCounter", wallet.counter);
  }

  private writeIssuerData(decoder: TlvDecoder): TlvBuilder {
    this.checkCardId(decoder);
    const data = decoder.decode("issuerData");
    const signature = decoder.decode("issuerDataSignature");
    const counter = decoder.decodeOptional("issuerDataCounter");

    if ((this.settingsMask & SettingsMask.protectIssuerDataAgainstReplay) !== 0) {
      if (counter === undefined || counter <= (this.issuerDataCounter ?? 0)) {
        throw new StatusWord(SW_INVALID_PARAMS);
      }
    }
    const message = issuerDataMessage(this.cardId, data, counter);
    if (!verifySignature("secp256k1", this.issuerPublicKey, message, signature)) {
      throw new StatusWord(SW_INVALID_PARAMS);
    }

    this.issuerData = data;
    this.issuerDataCounter = counter;
    return new TlvBuilder().append("cardId", this.cardId);
  }
}
