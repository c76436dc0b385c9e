/**
 * Session Engine
 * Runs the mutual-authentication handshake between the card and the
 * authentication server, then relays authenticated commands.
 *
 * Handshake:
 * 1. Polling captures the card identity
 * 2. Identity goes to the server; its Authentication1 frame goes to the card
 * 3. The card's answer is checked
 * 4. Answer to the server, Authentication2 to the card, acknowledgment back
 * 5. The completion result (IDi, PMi) becomes the SessionKeys
 *
 * Each engine runs one handshake. Use `withSession` so the keys are cleared
 * on every exit path.
 */

import {
  bytesToHex,
  createLogger,
  decodePolling,
  decodeResponse,
  encodePolling,
  FelicaError,
  isValidEvenHex,
  parseHexToBytes,
  RelayError,
  toFelicaError,
  TRANSIT_SYSTEM_CODE,
  TransportError,
  type CardIdentity,
  type CardTransport,
  type Logger,
} from "@felica-remote/shared";

import type {
  AuthenticationResult,
  Relay,
  RelayCommand,
} from "./relay-client.js";
import { SessionKeys } from "./session-keys.js";
import {
  transition,
  type FailureReason,
  type SessionEvent,
  type SessionState,
} from "./session-state.js";
import { withTimeout } from "./timeout.js";

export const DEFAULT_EXCHANGE_TIMEOUT_MS = 1000;

/** Extra time the engine grants a transport before its own timer fires */
const CARD_TIMER_SLACK_MS = 250;

export interface SessionEngineOptions {
  transport: CardTransport;
  relay: Relay;
  systemCode?: number;
  /** Area codes opened at authentication */
  areas?: readonly number[];
  /** Service codes opened at authentication; reads address them by index */
  services?: readonly number[];
  /** Card timeout used when the server does not give one */
  exchangeTimeoutMs?: number;
  logger?: Logger;
  onStateChange?: (state: SessionState) => void;
}

export interface EstablishedSession {
  readonly identity: CardIdentity;
  readonly issueId: Uint8Array;
  readonly issueParameter: Uint8Array;
  /**
   * Two-pass encryption exchange: the server wraps the command, the card
   * answers, the server returns the plaintext response.
   */
  exchange(commandCode: number, payload: Uint8Array): Promise<Uint8Array>;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

export class SessionEngine {
  private state: SessionState = { status: "idle" };
  private keys: SessionKeys | null = null;
  private readonly transport: CardTransport;
  private readonly relay: Relay;
  private readonly systemCode: number;
  private readonly areas: readonly number[];
  private readonly services: readonly number[];
  private readonly exchangeTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: SessionEngineOptions) {
    this.transport = options.transport;
    this.relay = options.relay;
    this.systemCode = options.systemCode ?? TRANSIT_SYSTEM_CODE;
    this.areas = options.areas ?? [];
    this.services = options.services ?? [];
    this.exchangeTimeoutMs = options.exchangeTimeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("reader:session");
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Establish a session, run `fn`, and clear the keys however `fn` ends
   */
  async withSession<T>(fn: (session: EstablishedSession) => Promise<T>): Promise<T> {
    const session = await this.establish();
    try {
      return await fn(session);
    } finally {
      this.close();
    }
  }

  /**
   * Run the handshake. Rejects with a FelicaError whose code is the failure
   * reason; the engine is then in the `failed` state.
   */
  async establish(): Promise<EstablishedSession> {
    if (this.state.status !== "idle") {
      throw new FelicaError(
        "InvalidParameter",
        `Session engine already used (state: ${this.state.status})`,
      );
    }

    const identity = await this.readIdentity();

    const first = await this.callRelay(
      () =>
        this.relay.mutualAuthenticate({
          kind: "start",
          sessionId: null,
          identity,
          areas: this.areas,
          services: this.services,
        }),
      "RelayError",
    );
    if (first.step !== "auth1") {
      throw this.failure("RelayError", `Server answered identity with step ${first.step}`);
    }
    this.apply({ type: "challenge-relayed", sessionId: first.sessionId });

    const challengeAnswer = await this.callCard(first.command, "CardRejected");
    this.checkCardAnswer(first.command, challengeAnswer, identity, "CardRejected");
    this.apply({ type: "challenge-answered", cardResponse: challengeAnswer });

    const second = await this.callRelay(
      () =>
        this.relay.mutualAuthenticate({
          kind: "continue",
          sessionId: first.sessionId,
          cardResponse: challengeAnswer,
        }),
      "AuthenticationFailed",
    );
    if (second.step !== "auth2") {
      throw this.failure(
        "AuthenticationFailed",
        `Server answered the card challenge with step ${second.step}`,
      );
    }

    const acknowledgment = await this.callCard(second.command, "AuthenticationFailed");
    this.checkCardAnswer(second.command, acknowledgment, identity, "AuthenticationFailed");

    const completion = await this.callRelay(
      () =>
        this.relay.mutualAuthenticate({
          kind: "continue",
          sessionId: second.sessionId,
          cardResponse: acknowledgment,
        }),
      "AuthenticationFailed",
    );
    if (completion.step !== "complete") {
      throw this.failure(
        "AuthenticationFailed",
        `Server answered the acknowledgment with step ${completion.step}`,
      );
    }
    this.apply({
      type: "authentication-completed",
      sessionId: completion.sessionId,
      result: completion.result,
    });

    const keys = this.deriveKeys(completion.sessionId, completion.result);
    this.keys = keys;
    this.apply({ type: "keys-derived", keys });
    this.logger.info("Session established", { sessionId: completion.sessionId });

    return {
      identity,
      get issueId() {
        return keys.issueId;
      },
      get issueParameter() {
        return keys.issueParameter;
      },
      exchange: (commandCode, payload) => this.exchange(keys, commandCode, payload),
    };
  }

  /**
   * Clear the keys and end an established session. Safe to call in any state.
   */
  close(): void {
    if (this.keys) {
      this.keys.clear();
      this.keys = null;
    }
    if (this.state.status === "established") {
      this.apply({ type: "session-closed" });
    }
  }

  private async readIdentity(): Promise<CardIdentity> {
    let response: Uint8Array;
    try {
      response = await this.sendToCard(encodePolling(this.systemCode), this.exchangeTimeoutMs);
    } catch (error) {
      throw this.failure("NoCard", "No card answered polling", error);
    }

    let identity: CardIdentity;
    try {
      identity = decodePolling(response);
    } catch (error) {
      throw this.failure("UnsupportedCard", "Polling response is not a FeliCa identity", error);
    }
    if (identity.systemCode !== this.systemCode) {
      throw this.failure(
        "UnsupportedCard",
        `Card answered with system code 0x${identity.systemCode.toString(16).padStart(4, "0")}`,
      );
    }

    this.apply({ type: "identity-captured", identity });
    this.logger.info("Card detected", { idm: bytesToHex(identity.idm) });
    return identity;
  }

  private async exchange(
    keys: SessionKeys,
    commandCode: number,
    payload: Uint8Array,
  ): Promise<Uint8Array> {
    if (this.state.status !== "established" || this.state.keys !== keys) {
      throw new FelicaError("SessionLost", `Session is ${this.state.status}`);
    }

    const wrapped = await this.relay.encryptionExchange({
      kind: "command",
      sessionId: keys.correlator,
      commandCode,
      payload,
    });
    keys.updateCorrelator(wrapped.sessionId);
    if (wrapped.kind !== "command") {
      throw new RelayError("Server did not return a card command");
    }

    let cardResponse: Uint8Array;
    try {
      cardResponse = await this.sendToCard(wrapped.command.frame, this.timeoutFor(wrapped.command));
    } catch (error) {
      const failure = toFelicaError(error, "SessionLost");
      if (failure.code === "SessionLost" || failure.code === "NoCard") {
        this.apply({
          type: "failure",
          reason: "SessionLost",
          error: new FelicaError("SessionLost", "Card left the field", { cause: error }),
        });
      }
      throw failure;
    }

    const unwrapped = await this.relay.encryptionExchange({
      kind: "card-response",
      sessionId: keys.correlator,
      cardResponse,
    });
    keys.updateCorrelator(unwrapped.sessionId);
    if (unwrapped.kind !== "response") {
      throw new RelayError("Server did not return a plaintext response");
    }
    return unwrapped.response;
  }

  private deriveKeys(sessionId: string | null, result: AuthenticationResult): SessionKeys {
    const { issueId, issueParameter } = result;
    if (issueId === null || issueParameter === null) {
      throw this.failure("AuthenticationFailed", "Completion result lacks IDi or PMi");
    }
    if (!isValidEvenHex(issueId) || !isValidEvenHex(issueParameter)) {
      throw this.failure("AuthenticationFailed", "Completion result IDi or PMi is not hex");
    }
    try {
      return new SessionKeys(sessionId, parseHexToBytes(issueId), parseHexToBytes(issueParameter));
    } catch (error) {
      throw this.failure("AuthenticationFailed", "Completion result is unusable", error);
    }
  }

  /**
   * Check that the card answered the relayed command with its response code
   * and its own IDm
   */
  private checkCardAnswer(
    command: RelayCommand,
    answer: Uint8Array,
    identity: CardIdentity,
    reason: FailureReason,
  ): void {
    const expectedCode = command.frame.length >= 2 ? command.frame[1] + 1 : undefined;
    try {
      const { idm } = decodeResponse(answer, { expectedCode, hasIdm: true });
      if (idm === null || !sameBytes(idm, identity.idm)) {
        throw new FelicaError(reason, "Card answered with a different IDm");
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw this.failure(reason, `Card answer rejected: ${message}`, error);
    }
  }

  private async callRelay<T>(call: () => Promise<T>, refusal: FailureReason): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const failure = toFelicaError(error, "RelayError");
      const reason =
        failure.code === "Timeout" || failure.code === "RelayUnreachable"
          ? failure.code
          : refusal;
      throw this.failure(reason, failure.message, error);
    }
  }

  /**
   * Relay a server command to the card. Silence is the card refusing;
   * an I/O failure is the card leaving the field.
   */
  private async callCard(command: RelayCommand, silence: FailureReason): Promise<Uint8Array> {
    try {
      return await this.sendToCard(command.frame, this.timeoutFor(command));
    } catch (error) {
      const failure = toFelicaError(error, "SessionLost");
      if (failure.code === "SessionLost") {
        throw this.failure("SessionLost", "Card left the field during authentication", error);
      }
      throw this.failure(silence, `Card did not answer: ${failure.message}`, error);
    }
  }

  private timeoutFor(command: RelayCommand): number {
    return command.timeoutMs ?? this.exchangeTimeoutMs;
  }

  private async sendToCard(frame: Uint8Array, timeoutMs: number): Promise<Uint8Array> {
    this.logger.debug(`>> ${bytesToHex(frame)}`, { timeoutMs });
    const response = await withTimeout(
      this.transport.sendFrame(frame, timeoutMs),
      timeoutMs + CARD_TIMER_SLACK_MS,
      () => new TransportError("Timeout", `Card did not answer within ${timeoutMs} ms`),
    );
    this.logger.debug(`<< ${bytesToHex(response)}`);
    return response;
  }

  /**
   * Move to `failed` and return the error to throw
   */
  private failure(reason: FailureReason, message: string, cause?: unknown): FelicaError {
    const error = new FelicaError(reason, message, { cause });
    this.apply({ type: "failure", reason, error });
    this.logger.warn("Handshake failed", { reason, message });
    return error;
  }

  private apply(event: SessionEvent): void {
    const previous = this.state.status;
    this.state = transition(this.state, event);
    if (this.state.status !== previous) {
      this.logger.debug(`${previous} -> ${this.state.status}`);
      this.options.onStateChange?.(this.state);
    }
  }
}
