/**
 * In-process authentication server
 *
 * Implements both relay endpoints against a SimulatedCard. Plug `fetch`
 * into the mocked undici module.
 */

import { bytesToHex, encodeCommand, parseHexToBytes } from "@felica-remote/shared";

export interface SimulatedAuthServerOptions {
  sessionId?: string;
  issueId?: string | null;
  issueParameter?: string | null;
  /** Card timeout (seconds) sent with every command */
  commandTimeout?: number;
  /** Answer the final acknowledgment with an error body */
  refuseAcknowledgment?: boolean;
  /** Hand out a new session ID with the Authentication2 command */
  rotatedSessionId?: string;
}

export interface RecordedRequest {
  path: string;
  body: Record<string, unknown>;
}

type Phase = "idle" | "auth1" | "auth2" | "complete";

export const TEST_ISSUE_ID = "0123456730b1002a";
export const TEST_ISSUE_PARAMETER = "00112233445566ff";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function concat(...parts: ArrayLike<number>[]): Uint8Array {
  return Uint8Array.from(parts.flatMap((part) => Array.from(part)));
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export class SimulatedAuthServer {
  readonly requests: RecordedRequest[] = [];
  private phase: Phase = "idle";
  private idm = new Uint8Array(8);
  private sessionId: string;

  constructor(private readonly options: SimulatedAuthServerOptions = {}) {
    this.sessionId = options.sessionId ?? "sess-1";
  }

  readonly fetch = async (input: unknown, init?: { body?: unknown }): Promise<Response> => {
    const path = new URL(String(input)).pathname;
    const parsed: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : {};
    const body = isRecord(parsed) ? parsed : {};
    this.requests.push({ path, body });

    return this.handle(path, body);
  };

  private command(frame: Uint8Array): Record<string, unknown> {
    return {
      frame: bytesToHex(frame),
      ...(this.options.commandTimeout !== undefined ? { timeout: this.options.commandTimeout } : {}),
    };
  }

  private handle(path: string, body: Record<string, unknown>): Response {
    if (path.endsWith("/mutual-authentication")) {
      return this.authenticate(body);
    }
    if (path.endsWith("/encryption-exchange")) {
      return this.exchange(body);
    }
    return json(404, { error: { message: "Not found" } });
  }

  private authenticate(body: Record<string, unknown>): Response {
    if (typeof body.idm === "string") {
      this.idm = parseHexToBytes(body.idm);
      this.phase = "auth1";
      return json(200, {
        session_id: this.sessionId,
        step: "auth1",
        command: this.command(encodeCommand(0x10, concat(this.idm, new Uint8Array(16).fill(0x11)))),
      });
    }
    if (body.session_id !== this.sessionId) {
      return json(400, { error: { message: "Unknown session" } });
    }
    if (this.phase === "auth1") {
      this.phase = "auth2";
      this.sessionId = this.options.rotatedSessionId ?? this.sessionId;
      return json(200, {
        session_id: this.sessionId,
        step: "auth2",
        command: this.command(encodeCommand(0x12, concat(this.idm, new Uint8Array(16).fill(0x22)))),
      });
    }
    if (this.phase === "auth2") {
      if (this.options.refuseAcknowledgment) {
        return json(200, { error: { message: "Card acknowledgment did not verify", code: 0xa1 } });
      }
      this.phase = "complete";
      const { issueId = TEST_ISSUE_ID, issueParameter = TEST_ISSUE_PARAMETER } = this.options;
      return json(200, {
        session_id: this.sessionId,
        step: "complete",
        result: {
          ...(issueId !== null ? { issue_id: issueId } : {}),
          ...(issueParameter !== null ? { issue_parameter: issueParameter } : {}),
        },
      });
    }
    return json(409, { error: { message: `No authentication step in phase ${this.phase}` } });
  }

  private exchange(body: Record<string, unknown>): Response {
    if (this.phase !== "complete" || body.session_id !== this.sessionId) {
      return json(401, { error: { message: "Session not authenticated" } });
    }
    if (typeof body.cmd_code === "number" && typeof body.payload === "string") {
      const frame = encodeCommand(body.cmd_code, concat(this.idm, parseHexToBytes(body.payload)));
      return json(200, { session_id: this.sessionId, command: this.command(frame) });
    }
    if (typeof body.card_response === "string") {
      const response = parseHexToBytes(body.card_response);
      // drop LEN, code and IDm
      return json(200, { session_id: this.sessionId, response: bytesToHex(response.subarray(10)) });
    }
    return json(400, { error: { message: "Malformed exchange request" } });
  }
}
