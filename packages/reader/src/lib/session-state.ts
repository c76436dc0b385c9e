/**
 * Handshake state machine
 *
 * idle -> identity-read -> challenge-sent -> server-challenge-received
 *      -> card-authenticated -> established
 *
 * Any state may move to `failed`, which is terminal. `closed` is where an
 * established session ends once its keys are cleared.
 */

import { FelicaError, type CardIdentity } from "@felica-remote/shared";

import type { AuthenticationResult } from "./relay-client.js";
import type { SessionKeys } from "./session-keys.js";

export type FailureReason =
  | "NoCard"
  | "UnsupportedCard"
  | "RelayUnreachable"
  | "RelayError"
  | "Timeout"
  | "CardRejected"
  | "AuthenticationFailed"
  | "SessionLost";

export type SessionState =
  | { status: "idle" }
  | { status: "identity-read"; identity: CardIdentity }
  | { status: "challenge-sent"; identity: CardIdentity; sessionId: string | null }
  | {
      status: "server-challenge-received";
      identity: CardIdentity;
      sessionId: string | null;
      cardResponse: Uint8Array;
    }
  | {
      status: "card-authenticated";
      identity: CardIdentity;
      sessionId: string | null;
      result: AuthenticationResult;
    }
  | { status: "established"; identity: CardIdentity; keys: SessionKeys }
  | { status: "closed"; identity: CardIdentity }
  | {
      status: "failed";
      reason: FailureReason;
      error: FelicaError;
      identity: CardIdentity | null;
    };

export type SessionStatus = SessionState["status"];

export type SessionEvent =
  | { type: "identity-captured"; identity: CardIdentity }
  | { type: "challenge-relayed"; sessionId: string | null }
  | { type: "challenge-answered"; cardResponse: Uint8Array }
  | { type: "authentication-completed"; sessionId: string | null; result: AuthenticationResult }
  | { type: "keys-derived"; keys: SessionKeys }
  | { type: "session-closed" }
  | { type: "failure"; reason: FailureReason; error: FelicaError };

export function identityOf(state: SessionState): CardIdentity | null {
  return state.status === "idle" ? null : state.identity;
}

function illegal(state: SessionState, event: SessionEvent): never {
  throw new FelicaError(
    "InvalidParameter",
    `Event ${event.type} is not valid in state ${state.status}`,
  );
}

/**
 * Pure transition function. Failed and closed states absorb every event;
 * an event that does not fit the current state is a programming error.
 */
export function transition(state: SessionState, event: SessionEvent): SessionState {
  if (state.status === "failed" || state.status === "closed") {
    return state;
  }
  if (event.type === "failure") {
    return {
      status: "failed",
      reason: event.reason,
      error: event.error,
      identity: identityOf(state),
    };
  }

  switch (state.status) {
    case "idle":
      if (event.type === "identity-captured") {
        return { status: "identity-read", identity: event.identity };
      }
      break;
    case "identity-read":
      if (event.type === "challenge-relayed") {
        return {
          status: "challenge-sent",
          identity: state.identity,
          sessionId: event.sessionId,
        };
      }
      break;
    case "challenge-sent":
      if (event.type === "challenge-answered") {
        return {
          status: "server-challenge-received",
          identity: state.identity,
          sessionId: state.sessionId,
          cardResponse: event.cardResponse,
        };
      }
      break;
    case "server-challenge-received":
      if (event.type === "authentication-completed") {
        return {
          status: "card-authenticated",
          identity: state.identity,
          sessionId: event.sessionId,
          result: event.result,
        };
      }
      break;
    case "card-authenticated":
      if (event.type === "keys-derived") {
        return { status: "established", identity: state.identity, keys: event.keys };
      }
      break;
    case "established":
      if (event.type === "session-closed") {
        return { status: "closed", identity: state.identity };
      }
      break;
  }
  return illegal(state, event);
}
