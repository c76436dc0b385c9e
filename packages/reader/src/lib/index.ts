/**
 * Reader Library - Public API
 *
 * Everything here is importable and testable without the CLI.
 */

export { RelayClient, DEFAULT_ENDPOINTS, DEFAULT_HTTP_TIMEOUT_MS } from "./relay-client.js";
export { SessionEngine, DEFAULT_EXCHANGE_TIMEOUT_MS } from "./session-engine.js";
export { SessionKeys } from "./session-keys.js";
export { transition, identityOf } from "./session-state.js";
export { CardReaderSession, DEFAULT_READ_PLAN } from "./card-reader-session.js";
export { SnapshotBuilder, recordsOfKind, isComplete } from "./snapshot.js";
export { toDocument, parseDocument, recordToDocument, DOCUMENT_VERSION } from "./snapshot-document.js";
export { JsonStationResolver } from "./station-resolver.js";
export { ConfigManager, DEFAULT_CONFIG, CONTRACT_VERSION } from "./config-manager.js";
export { createCardReader } from "./create-reader.js";

export type {
  Relay,
  RelayClientConfig,
  RelayEndpoints,
  RelayCommand,
  AuthenticationResult,
  MutualAuthenticationRequest,
  MutualAuthenticationResponse,
  EncryptionExchangeRequest,
  EncryptionExchangeResponse,
} from "./relay-client.js";
export type { SessionEngineOptions, EstablishedSession } from "./session-engine.js";
export type { SessionState, SessionEvent, SessionStatus, FailureReason } from "./session-state.js";
export type { CardReaderOptions, ReadPlanStep, ReadProgress } from "./card-reader-session.js";
export type { CardSnapshot, ReadFailure, SystemInfo } from "./snapshot.js";
export type {
  SnapshotDocument,
  DocumentRecord,
  DocumentFailure,
  DocumentError,
  DocumentObject,
  DocumentValue,
} from "./snapshot-document.js";
export type { StationResolver, StationName } from "./station-resolver.js";
export type { ReaderConfig } from "./config-manager.js";
export type { CreateReaderOptions } from "./create-reader.js";

// Re-export the card-facing types from shared
export type { CardIdentity, CardTransport } from "@felica-remote/shared";
