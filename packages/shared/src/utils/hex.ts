/**
 * Hex utilities
 *
 * Byte strings cross the relay as hex; these helpers are the only place
 * that converts between the two.
 */

/**
 * Remove whitespace and normalize the hex string.
 */
export function cleanHex(input: string): string {
  return input.replace(/\s+/g, "");
}

/**
 * Validate that a string contains only hex characters and has even length.
 */
export function isValidEvenHex(hex: string): boolean {
  return /^[0-9a-fA-F]*$/.test(hex) && hex.length % 2 === 0;
}

/**
 * Parse a hex string (whitespace allowed) into bytes.
 * Throws on invalid format.
 */
export function parseHexToBytes(input: string): Uint8Array {
  const hex = cleanHex(input);
  if (!isValidEvenHex(hex)) {
    throw new Error("Invalid hex format (must be even-length hex)");
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    out[i / 2] = parseInt(hex.slice(i, i + 2), 16);
  }
  return out;
}

/**
 * Lower-case hex, the form the authentication server exchanges
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}

export function bytesToUpperHex(bytes: Uint8Array): string {
  return bytesToHex(bytes).toUpperCase();
}

/**
 * Parse a hex code ("0x1A" or "1A"); numbers pass through
 */
export function parseCode(value: string | number): number {
  if (typeof value === "number") {
    return value;
  }
  const trimmed = value.trim();
  const parsed = /^0x/i.test(trimmed)
    ? parseInt(trimmed.slice(2), 16)
    : parseInt(trimmed, 16);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid code: ${value}`);
  }
  return parsed;
}
