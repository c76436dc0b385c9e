/**
 * Block images used across the decoder tests
 */

import { parseHexToBytes } from "@felica-remote/shared";

export function blocks(...hex: string[]): Uint8Array {
  return parseHexToBytes(hex.join(""));
}

/** Gate exit E3/2D -> E3/31 on 24-05-17, balance 1234, transaction 291 */
export const HISTORY_RIDE = "16 01 00 02 30 B1 E3 2D E3 31 D2 04 00 01 23 00";

/** Shop purchase at 17:33:20 */
export const HISTORY_PURCHASE = "C7 46 00 00 30 B1 8C 2A 00 00 E8 03 00 00 2B 00";

export const ATTRIBUTES = "00 00 00 00 00 00 00 00 23 00 00 10 27 00 00 2A";

export const AUXILIARY_BALANCE = "E8 03 00 00 00 00 00 00 30 B1 00 00 00 00 01 00";

export const ISSUANCE_2 = [
  "16 E3 2D 00 00 F4 01 00 00 00 00 00 00 00 00 00",
  "00 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00",
  "00 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00",
];

export const ISSUANCE_1 = [
  // owner name "ﾀﾛ" in Shift_JIS, NUL padded
  "C0 DB 00 00 00 00 00 00 00 00 00 00 00 00 00 00",
  // phone 0312345678, age code 1, born 13-01-15, deposit 500
  "03 12 34 56 78 FF FF FF 01 1A 2F 00 F4 01 00 00",
  "11 12 13 14 15 16 17 18 00 00 00 00 00 00 00 00",
  // issuer 1234, equipment 16, station E3/2D, issued 24-05-17, expires 30-05-17
  "12 34 16 E3 2D 00 00 30 B1 00 00 00 00 00 3C B1",
];

export const COMMUTER_PASS = [
  "30 B1 3C B1 00 00 00 00 E3 2D E3 31 00 00 00 00",
  "00 00 00 00 00 00 00 00 00 00 00 00 00 00 00 00",
  "00 00 00 00 00 30 B1 00 00 00 00 00 00 00 00 00",
];

export const GATE_ENTRY = "20 00 E3 2D 12 34 30 B1 08 45 C8 00 00 00 E3 31";

export const SF_GATE_ENTRY = [
  "E3 2D 00 00 00 00 00 00 00 00 00 00 00 00 00 00",
  "30 B1 09 15 E3 30 01 09 20 E3 31 02 00 00 00 00",
];
