import { describe, it, expect } from "vitest";

import {
  FelicaError,
  RecordLengthMismatchError,
  RelayError,
  TransportError,
  isFelicaError,
  remedyFor,
  toFelicaError,
} from "../src/index.js";

describe("error taxonomy", () => {
  it("derives the remedy from the code", () => {
    expect(remedyFor("RelayUnreachable")).toBe("check-network");
    expect(remedyFor("Timeout")).toBe("check-network");
    expect(remedyFor("SessionLost")).toBe("re-present-card");
    expect(remedyFor("UnsupportedCard")).toBe("unsupported-card");
    expect(remedyFor("RecordLengthMismatch")).toBe("internal");
    expect(new FelicaError("CardRejected", "no").remedy).toBe("re-present-card");
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    const error = new FelicaError("RelayUnreachable", "unreachable", { cause });
    expect(error.cause).toBe(cause);
    expect(error.name).toBe("FelicaError");
  });

  it("maps transport I/O errors onto SessionLost", () => {
    const error = new TransportError("IoError", "card left");
    expect(error.code).toBe("SessionLost");
    expect(error.transportCode).toBe("IoError");
    expect(new TransportError("NoCard", "nothing there").code).toBe("NoCard");
    expect(new TransportError("Timeout", "slow").code).toBe("Timeout");
  });

  it("carries HTTP status and command error number on RelayError", () => {
    const error = new RelayError("denied", 403, 0xa6);
    expect(error).toMatchObject({ code: "RelayError", status: 403, commandErrno: 0xa6 });
  });

  it("describes record length mismatches", () => {
    const error = new RecordLengthMismatchError("HistoryEntry", 16, 15);
    expect(error.message).toBe("HistoryEntry expects 16 bytes, got 15");
    expect(error).toMatchObject({ expected: 16, actual: 15 });
  });

  it("wraps foreign errors and keeps FelicaErrors", () => {
    const original = new FelicaError("NoCard", "none");
    expect(toFelicaError(original, "RelayError")).toBe(original);

    const wrapped = toFelicaError(new TypeError("boom"), "RelayError");
    expect(isFelicaError(wrapped)).toBe(true);
    expect(wrapped.code).toBe("RelayError");
    expect(wrapped.message).toBe("boom");
    expect(toFelicaError("plain", "InvalidParameter").message).toBe("plain");
  });
});
