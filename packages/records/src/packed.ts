/**
 * Packed field helpers
 *
 * The card stores dates as `yyyyyyym mmmddddd` (7-bit year offset, 4-bit
 * month, 5-bit day), times as `hhhhhmmm mmmsssss` with 2-second resolution,
 * and gate clocks as two BCD bytes. Every helper is pure; nothing here reads
 * the host clock, timezone or locale.
 */

export interface PackedDate {
  /** Two-digit year as stored (0-127) */
  year: number;
  month: number;
  day: number;
}

export interface PackedTime {
  hour: number;
  minute: number;
  second: number;
}

export interface StationCode {
  line: number;
  station: number;
}

export function readUint16BE(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

export function readUint16LE(bytes: Uint8Array, offset: number): number {
  return bytes[offset] | (bytes[offset + 1] << 8);
}

export function unpackDate(value: number): PackedDate {
  return {
    year: (value >> 9) & 0x7f,
    month: (value >> 5) & 0x0f,
    day: value & 0x1f,
  };
}

export function unpackTime(value: number): PackedTime {
  return {
    hour: (value >> 11) & 0x1f,
    minute: (value >> 5) & 0x3f,
    second: (value & 0x1f) * 2,
  };
}

export function readDate(bytes: Uint8Array, offset: number): PackedDate {
  return unpackDate(readUint16BE(bytes, offset));
}

export function readStation(bytes: Uint8Array, offset: number): StationCode {
  return { line: bytes[offset], station: bytes[offset + 1] };
}

function hex2(value: number): string {
  return value.toString(16).padStart(2, "0").toUpperCase();
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * `HH:MM` from two BCD bytes, digits taken as stored
 */
export function readBcdClock(bytes: Uint8Array, offset: number): string {
  return `${hex2(bytes[offset])}:${hex2(bytes[offset + 1])}`;
}

export function formatDate(date: PackedDate): string {
  return `${pad2(date.year)}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function formatTime(time: PackedTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}:${pad2(time.second)}`;
}

/**
 * Render an 8-byte issue ID (IDi) as `HHHHHHHH` + `YYMMDD` + `NNNNN`:
 * the first four bytes in hex, a packed issue date, and a serial.
 */
export function formatIssueId(idi: Uint8Array): string {
  if (idi.length < 8) {
    throw new RangeError(`Issue ID must be 8 bytes, got ${idi.length}`);
  }
  const head = Array.from(idi.subarray(0, 4), hex2).join("");
  const packed = readUint16BE(idi, 4);
  // six year bits here, unlike the seven of a record date
  const year = (packed >> 9) & 0x3f;
  const { month, day } = unpackDate(packed);
  const serial = readUint16BE(idi, 6).toString().padStart(5, "0");
  return `${head}${pad2(year)}${pad2(month)}${pad2(day)}${serial}`;
}
