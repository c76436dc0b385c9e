import { describe, it, expect } from "vitest";

import {
  formatDate,
  formatIssueId,
  formatTime,
  readBcdClock,
  readUint16BE,
  readUint16LE,
  unpackDate,
  unpackTime,
} from "../src/index.js";

describe("packed fields", () => {
  it("reads both byte orders", () => {
    const bytes = Uint8Array.of(0xd2, 0x04);
    expect(readUint16LE(bytes, 0)).toBe(1234);
    expect(readUint16BE(bytes, 0)).toBe(0xd204);
  });

  it("unpacks 7-bit year, month and day", () => {
    expect(unpackDate(0x30b1)).toEqual({ year: 24, month: 5, day: 17 });
    expect(unpackDate(0xffff)).toEqual({ year: 127, month: 15, day: 31 });
  });

  it("unpacks times with two-second resolution", () => {
    expect(unpackTime(0x8c2a)).toEqual({ hour: 17, minute: 33, second: 20 });
  });

  it("formats without touching the host clock or locale", () => {
    expect(formatDate({ year: 4, month: 1, day: 9 })).toBe("04-01-09");
    expect(formatTime({ hour: 7, minute: 5, second: 0 })).toBe("07:05:00");
  });

  it("reads BCD clocks digit for digit", () => {
    expect(readBcdClock(Uint8Array.of(0x00, 0x23, 0x59), 1)).toBe("23:59");
  });
});

describe("issue ID", () => {
  it("renders head, packed issue date and serial", () => {
    const idi = Uint8Array.of(0x01, 0x23, 0x45, 0x67, 0x30, 0xb1, 0x00, 0x2a);
    expect(formatIssueId(idi)).toBe("0123456724051700042");
  });

  it("uses six year bits", () => {
    const idi = Uint8Array.of(0xab, 0xcd, 0xef, 0x01, 0xb0, 0xb1, 0xff, 0xff);
    expect(formatIssueId(idi)).toBe("ABCDEF0124051765535");
  });

  it("refuses fewer than eight bytes", () => {
    expect(() => formatIssueId(new Uint8Array(7))).toThrow("Issue ID must be 8 bytes, got 7");
  });
});
