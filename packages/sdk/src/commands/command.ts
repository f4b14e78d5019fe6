/**
 * Command protocol
 *
 * One invocation runs: precheck → serialize → protect → transceive →
 * status word → unprotect → decode → verify → error mapping. Recoverable
 * errors go to the session's recovery handler; when it patched the
 * environment the request is rebuilt and sent again.
 */

import {
  CardSdkError,
  ENCRYPTION_MODE_CODES,
  TlvDecoder,
  commandData,
  isSuccessResponse,
  parseResponse,
  responseError,
  toCardSdkError,
  withCommandData,
  type CommandApdu,
  type Logger,
} from "@cardkit/shared";

import type { Card } from "../card/card.js";
import { envelopeFor, type SessionEnvironment } from "../session/environment.js";

export const MAX_ATTEMPTS = 3;

export interface Command<T> {
  readonly name: string;
  /** Needs the card from a preflight read. */
  readonly requiresCard: boolean;

  /**
   * Pure check against the card snapshot before anything is sent.
   */
  precheck?(card: Card): CardSdkError | null;

  serialize(environment: SessionEnvironment): CommandApdu;

  deserialize(environment: SessionEnvironment, decoder: TlvDecoder): T;

  /**
   * Cryptographic checks of a decoded response. Throws
   * cardVerificationFailed.
   */
  verifyResponse?(environment: SessionEnvironment, result: T): void;

  /**
   * Translate a failure using card state (e.g. replay protection).
   */
  mapError?(card: Card | undefined, error: CardSdkError): CardSdkError;
}

/**
 * What a command needs from the session that runs it.
 */
export interface CommandChannel {
  readonly logger: Logger;
  environment(): SessionEnvironment;
  transceive(apdu: Uint8Array): Promise<Uint8Array>;
  /**
   * Ask the session to fix the environment for a recoverable error.
   * Resolves true when a retry makes sense.
   */
  recover(error: CardSdkError): Promise<boolean>;
}

async function sendOnce<T>(
  command: Command<T>,
  channel: CommandChannel,
  environment: SessionEnvironment,
): Promise<T> {
  const request = command.serialize(environment);
  const envelope = envelopeFor(environment);
  const data = await envelope.protect(commandData(request));
  const wire = withCommandData(request, data, ENCRYPTION_MODE_CODES[envelope.isActive ? envelope.mode : "none"]);

  channel.logger.debug("Sending command", {
    operation: command.name,
    ins: wire.ins,
    encrypted: envelope.isActive,
    length: data.byteLength,
  });

  let raw: Uint8Array;
  try {
    raw = await channel.transceive(wire.toUint8Array());
  } catch (error) {
    throw toCardSdkError(error, "transportFailed");
  }

  const response = parseResponse(raw);
  if (!isSuccessResponse(response)) {
    throw responseError(response);
  }

  const plain = await envelope.unprotect(response.data);
  const result = command.deserialize(environment, TlvDecoder.fromBytes(plain));
  command.verifyResponse?.(environment, result);
  return result;
}

/**
 * Run a command to completion over a channel.
 */
export async function executeCommand<T>(
  command: Command<T>,
  channel: CommandChannel,
  maxAttempts: number = MAX_ATTEMPTS,
): Promise<T> {
  const initial = channel.environment();
  const card = initial.card;

  if (command.requiresCard) {
    if (!card) {
      throw new CardSdkError("missingPreflightRead", `${command.name} needs a card read first`);
    }
    const failure = command.precheck?.(card);
    if (failure) {
      throw failure;
    }
  }

  for (let attempt = 1; ; attempt++) {
    // snapshot: a response is read with the environment it was sent with
    const environment = channel.environment();
    try {
      return await sendOnce(command, channel, environment);
    } catch (error) {
      let failure = toCardSdkError(error);
      if (command.mapError) {
        failure = command.mapError(environment.card, failure);
      }

      if (!failure.isRecoverable || attempt >= maxAttempts) {
        throw failure;
      }
      channel.logger.info("Recoverable card error", {
        operation: command.name,
        code: failure.code,
        attempt,
      });
      if (!(await channel.recover(failure))) {
        throw failure;
      }
    }
  }
}
