/**
 * Relay Client
 * Speaks JSON over HTTP to the authentication server that holds the card keys.
 *
 * Endpoints (contract version 1):
 * - POST {base}/mutual-authentication  drives Authentication1/2 on the card
 * - POST {base}/encryption-exchange    wraps and unwraps authenticated commands
 *
 * Byte strings travel as hex, system, area and service codes as JSON numbers.
 * The `session_id` handed out by the server is echoed back on each later call
 * of the same session.
 */

import { fetch, type Dispatcher, type Response } from "undici";
import {
  bytesToHex,
  createLogger,
  FelicaError,
  isValidEvenHex,
  parseHexToBytes,
  RelayError,
  type CardIdentity,
  type Logger,
} from "@felica-remote/shared";

export interface RelayEndpoints {
  mutualAuthentication: string;
  encryptionExchange: string;
}

export const DEFAULT_ENDPOINTS: RelayEndpoints = {
  mutualAuthentication: "/mutual-authentication",
  encryptionExchange: "/encryption-exchange",
};

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export interface RelayClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  endpoints?: Partial<RelayEndpoints>;
  /** undici dispatcher (proxy agent, connection pool) used for every request */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * A card command the server wants relayed, with the card timeout it asks for
 */
export interface RelayCommand {
  frame: Uint8Array;
  timeoutMs: number | null;
}

export type MutualAuthenticationRequest =
  | {
      kind: "start";
      sessionId: string | null;
      identity: CardIdentity;
      areas: readonly number[];
      services: readonly number[];
    }
  | {
      kind: "continue";
      sessionId: string | null;
      cardResponse: Uint8Array;
    };

/**
 * Completion result as sent by the server. The fields stay hex strings here;
 * the session engine decides whether they make usable keys.
 */
export interface AuthenticationResult {
  issueId: string | null;
  issueParameter: string | null;
}

export type MutualAuthenticationResponse =
  | { step: "auth1" | "auth2"; sessionId: string | null; command: RelayCommand }
  | { step: "complete"; sessionId: string | null; result: AuthenticationResult };

export type EncryptionExchangeRequest =
  | {
      kind: "command";
      sessionId: string | null;
      commandCode: number;
      payload: Uint8Array;
      timeoutMs?: number;
    }
  | {
      kind: "card-response";
      sessionId: string | null;
      cardResponse: Uint8Array;
    };

export type EncryptionExchangeResponse =
  | { kind: "command"; sessionId: string | null; command: RelayCommand }
  | { kind: "response"; sessionId: string | null; response: Uint8Array };

/**
 * The two calls the session engine makes. Tests substitute their own.
 */
export interface Relay {
  mutualAuthenticate(
    request: MutualAuthenticationRequest,
  ): Promise<MutualAuthenticationResponse>;
  encryptionExchange(
    request: EncryptionExchangeRequest,
  ): Promise<EncryptionExchangeResponse>;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

function optionalString(body: JsonObject, key: string): string | null {
  const value = body[key];
  return typeof value === "string" ? value : null;
}

/**
 * Trim trailing slashes so paths can be appended directly
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

export class RelayClient implements Relay {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly endpoints: RelayEndpoints;
  private readonly logger: Logger;

  constructor(private readonly config: RelayClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.endpoints = { ...DEFAULT_ENDPOINTS, ...config.endpoints };
    this.logger = config.logger ?? createLogger("reader:relay");
  }

  async mutualAuthenticate(
    request: MutualAuthenticationRequest,
  ): Promise<MutualAuthenticationResponse> {
    const body: JsonObject =
      request.kind === "start"
        ? {
            session_id: request.sessionId,
            idm: bytesToHex(request.identity.idm),
            pmm: bytesToHex(request.identity.pmm),
            system_code: request.identity.systemCode,
            areas: [...request.areas],
            services: [...request.services],
          }
        : {
            session_id: request.sessionId,
            card_response: bytesToHex(request.cardResponse),
          };

    const response = await this.post(this.endpoints.mutualAuthentication, body);
    const sessionId = optionalString(response, "session_id") ?? request.sessionId;
    const step = response.step;

    if (step === "auth1" || step === "auth2") {
      return { step, sessionId, command: this.readCommand(response) };
    }
    if (step === "complete") {
      const result = isRecord(response.result) ? response.result : {};
      return {
        step,
        sessionId,
        result: {
          issueId: optionalString(result, "issue_id") ?? optionalString(result, "idi"),
          issueParameter:
            optionalString(result, "issue_parameter") ?? optionalString(result, "pmi"),
        },
      };
    }
    throw new RelayError(`Unexpected authentication step: ${JSON.stringify(step)}`);
  }

  async encryptionExchange(
    request: EncryptionExchangeRequest,
  ): Promise<EncryptionExchangeResponse> {
    const body: JsonObject =
      request.kind === "command"
        ? {
            session_id: request.sessionId,
            cmd_code: request.commandCode,
            payload: bytesToHex(request.payload),
            ...(request.timeoutMs !== undefined
              ? { timeout: request.timeoutMs / 1000 }
              : {}),
          }
        : {
            session_id: request.sessionId,
            card_response: bytesToHex(request.cardResponse),
          };

    const response = await this.post(this.endpoints.encryptionExchange, body);
    const sessionId = optionalString(response, "session_id") ?? request.sessionId;

    if (request.kind === "command") {
      return { kind: "command", sessionId, command: this.readCommand(response) };
    }
    return {
      kind: "response",
      sessionId,
      response: this.readHex(response, "response"),
    };
  }

  private readCommand(body: JsonObject): RelayCommand {
    const command = body.command;
    if (!isRecord(command)) {
      throw new RelayError("Server response has no command");
    }
    const frame = this.readHex(command, "frame");
    const timeout = command.timeout;
    if (timeout === undefined || timeout === null) {
      return { frame, timeoutMs: null };
    }
    if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout <= 0) {
      throw new RelayError(`Invalid command timeout: ${JSON.stringify(timeout)}`);
    }
    return { frame, timeoutMs: Math.round(timeout * 1000) };
  }

  private readHex(body: JsonObject, key: string): Uint8Array {
    const value = body[key];
    if (typeof value !== "string" || !isValidEvenHex(value)) {
      throw new RelayError(`Server response field "${key}" is not hex`);
    }
    return parseHexToBytes(value);
  }

  /**
   * POST a JSON body and return the decoded JSON object.
   * Maps transport failures and server errors onto the error taxonomy.
   */
  private async post(path: string, body: JsonObject): Promise<JsonObject> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug("POST", { operation: path, sessionId: body.session_id });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.config.dispatcher,
      });
      text = await response.text();
    } catch (error) {
      if (isTimeoutError(error)) {
        this.logger.warn("Relay request timed out", {
          operation: path,
          timeoutMs: this.timeoutMs,
        });
        throw new FelicaError(
          "Timeout",
          `Authentication server did not answer within ${this.timeoutMs} ms (${path})`,
          { cause: error },
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn("Relay unreachable", { operation: path, reason });
      throw new FelicaError(
        "RelayUnreachable",
        `Failed to reach authentication server at ${this.baseUrl}: ${reason}`,
        { cause: error },
      );
    }

    let decoded: unknown = undefined;
    let parseError: unknown = null;
    try {
      decoded = text.length > 0 ? JSON.parse(text) : undefined;
    } catch (error) {
      parseError = error;
    }

    const reported = isRecord(decoded) ? this.readErrorBody(decoded) : null;

    if (!response.ok) {
      const detail = reported?.message ?? (text || response.statusText);
      this.logger.error("Relay request failed", undefined, {
        operation: path,
        status: response.status,
      });
      throw new RelayError(
        `${path} failed: ${response.status} - ${detail}`,
        response.status,
        reported?.code,
      );
    }
    if (reported) {
      this.logger.warn("Server reported error", {
        operation: path,
        code: reported.code,
      });
      throw new RelayError(reported.message, response.status, reported.code);
    }
    if (!isRecord(decoded)) {
      throw new RelayError(
        `${path} returned a body that is not a JSON object`,
        response.status,
        undefined,
        { cause: parseError ?? undefined },
      );
    }
    return decoded;
  }

  private readErrorBody(
    body: JsonObject,
  ): { message: string; code: number | undefined } | null {
    const error = body.error;
    if (error === undefined || error === null) {
      return null;
    }
    if (typeof error === "string") {
      return { message: error, code: undefined };
    }
    if (!isRecord(error)) {
      return { message: JSON.stringify(error), code: undefined };
    }
    return {
      message: typeof error.message === "string" ? error.message : "Server error",
      code: typeof error.code === "number" ? error.code : undefined,
    };
  }
}
