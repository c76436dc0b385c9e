/**
 * Error taxonomy for the remote reader
 *
 * Every failure carries a `code` from a closed set and a `remedy` that tells
 * the caller which kind of advice to give the user: fix the network/server
 * settings, present the card again, or give up on an unsupported card.
 */

export type FelicaErrorCode =
  | "NoCard"
  | "UnsupportedCard"
  | "RelayUnreachable"
  | "RelayError"
  | "CardRejected"
  | "AuthenticationFailed"
  | "SessionLost"
  | "MalformedFrame"
  | "RecordLengthMismatch"
  | "Timeout"
  | "CardStatus"
  | "InvalidParameter";

export type Remedy =
  | "check-network"
  | "re-present-card"
  | "unsupported-card"
  | "internal";

const REMEDIES: Record<FelicaErrorCode, Remedy> = {
  NoCard: "re-present-card",
  UnsupportedCard: "unsupported-card",
  RelayUnreachable: "check-network",
  RelayError: "check-network",
  CardRejected: "re-present-card",
  AuthenticationFailed: "re-present-card",
  SessionLost: "re-present-card",
  MalformedFrame: "re-present-card",
  RecordLengthMismatch: "internal",
  Timeout: "check-network",
  CardStatus: "re-present-card",
  InvalidParameter: "internal",
};

export function remedyFor(code: FelicaErrorCode): Remedy {
  return REMEDIES[code];
}

export class FelicaError extends Error {
  readonly remedy: Remedy;

  constructor(
    readonly code: FelicaErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FelicaError";
    this.remedy = remedyFor(code);
  }
}

export class MalformedFrameError extends FelicaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MalformedFrame", message, options);
    this.name = "MalformedFrameError";
  }
}

export class RecordLengthMismatchError extends FelicaError {
  constructor(
    readonly variant: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      "RecordLengthMismatch",
      `${variant} expects ${expected} bytes, got ${actual}`,
    );
    this.name = "RecordLengthMismatchError";
  }
}

/**
 * Failure reported by the authentication server or by the HTTP exchange with it.
 * `commandErrno` is set when the server relays a card command error number.
 */
export class RelayError extends FelicaError {
  constructor(
    message: string,
    readonly status?: number,
    readonly commandErrno?: number,
    options?: { cause?: unknown },
  ) {
    super("RelayError", message, options);
    this.name = "RelayError";
  }
}

/**
 * Non-zero status flags returned by the card for a block operation
 */
export class CardStatusError extends FelicaError {
  readonly statusCode: number;

  constructor(
    readonly statusFlag1: number,
    readonly statusFlag2: number,
  ) {
    const statusCode = (statusFlag1 << 8) | statusFlag2;
    super(
      "CardStatus",
      `Card returned status 0x${statusCode.toString(16).padStart(4, "0").toUpperCase()}`,
    );
    this.name = "CardStatusError";
    this.statusCode = statusCode;
  }
}

export type TransportErrorCode = "NoCard" | "IoError" | "Timeout";

/**
 * Raised by a CardTransport implementation.
 * `IoError` maps onto SessionLost: the card left the field mid-exchange.
 */
export class TransportError extends FelicaError {
  constructor(
    readonly transportCode: TransportErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(
      transportCode === "IoError" ? "SessionLost" : transportCode,
      message,
      options,
    );
    this.name = "TransportError";
  }
}

export function isFelicaError(error: unknown): error is FelicaError {
  return error instanceof FelicaError;
}

/**
 * Wrap anything thrown into a FelicaError, keeping FelicaErrors as they are
 */
export function toFelicaError(
  error: unknown,
  fallback: FelicaErrorCode,
): FelicaError {
  if (error instanceof FelicaError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FelicaError(fallback, message, { cause: error });
}
