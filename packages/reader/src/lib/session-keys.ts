/**
 * Key material of one established session
 *
 * The card session key itself never leaves the authentication server. What
 * the client holds is the server's session correlator plus the issue ID (IDi)
 * and issue parameter (PMi) returned on completion. `clear()` zero-fills the
 * byte arrays; any access afterwards fails with SessionLost.
 */

import { FelicaError } from "@felica-remote/shared";

export const ISSUE_ID_LENGTH = 8;
export const ISSUE_PARAMETER_LENGTH = 8;

export class SessionKeys {
  private sessionId: string | null;
  private readonly issueIdBytes: Uint8Array;
  private readonly issueParameterBytes: Uint8Array;
  private cleared = false;

  constructor(sessionId: string | null, issueId: Uint8Array, issueParameter: Uint8Array) {
    if (issueId.length !== ISSUE_ID_LENGTH) {
      throw new FelicaError(
        "AuthenticationFailed",
        `Issue ID must be ${ISSUE_ID_LENGTH} bytes, got ${issueId.length}`,
      );
    }
    if (issueParameter.length !== ISSUE_PARAMETER_LENGTH) {
      throw new FelicaError(
        "AuthenticationFailed",
        `Issue parameter must be ${ISSUE_PARAMETER_LENGTH} bytes, got ${issueParameter.length}`,
      );
    }
    this.sessionId = sessionId;
    this.issueIdBytes = issueId.slice();
    this.issueParameterBytes = issueParameter.slice();
  }

  private assertLive(): void {
    if (this.cleared) {
      throw new FelicaError("SessionLost", "Session keys have been cleared");
    }
  }

  get correlator(): string | null {
    this.assertLive();
    return this.sessionId;
  }

  /**
   * Adopt the correlator the server returned on the latest call
   */
  updateCorrelator(sessionId: string | null): void {
    this.assertLive();
    if (sessionId !== null) {
      this.sessionId = sessionId;
    }
  }

  /** Copy of the IDi */
  get issueId(): Uint8Array {
    this.assertLive();
    return this.issueIdBytes.slice();
  }

  /** Copy of the PMi */
  get issueParameter(): Uint8Array {
    this.assertLive();
    return this.issueParameterBytes.slice();
  }

  get isCleared(): boolean {
    return this.cleared;
  }

  clear(): void {
    this.issueIdBytes.fill(0);
    this.issueParameterBytes.fill(0);
    this.sessionId = null;
    this.cleared = true;
  }
}
