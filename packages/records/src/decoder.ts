/**
 * Record Decoder
 *
 * Pure mapping from (service code, block address, plaintext bytes) to a
 * typed record. The layout is chosen by address alone; a wrong byte count is
 * an error, never a guess. Addresses without a layout come back as
 * UnknownBlock with a copy of the bytes.
 */

import { RecordLengthMismatchError } from "@felica-remote/shared";

import { expectedLength, findLayout, LAYOUTS } from "./layouts.js";
import type { DecodedRecord, UnknownBlock } from "./types.js";

export function decode(
  serviceCode: number,
  blockAddress: number,
  bytes: Uint8Array,
): DecodedRecord {
  const layout = findLayout(serviceCode, blockAddress);
  if (!layout) {
    return unknownBlock(serviceCode, blockAddress, bytes);
  }
  const expected = expectedLength(layout);
  if (bytes.length !== expected) {
    throw new RecordLengthMismatchError(layout.kind, expected, bytes.length);
  }
  return layout.parse(bytes, blockAddress);
}

export function unknownBlock(
  serviceCode: number,
  blockAddress: number,
  bytes: Uint8Array,
): UnknownBlock {
  return {
    kind: "UnknownBlock",
    serviceCode,
    blockAddress,
    raw: bytes.slice(),
  };
}

/**
 * Number of consecutive blocks the record at this address spans
 * (1 for addresses without a layout)
 */
export function blocksPerRecord(serviceCode: number, blockAddress: number): number {
  return findLayout(serviceCode, blockAddress)?.blocksPerRecord ?? 1;
}

/**
 * A history slot never written holds 0x00 in its equipment byte. The ring
 * is filled from slot 0, so the first empty slot ends the history.
 */
export function isEmptyHistorySlot(bytes: Uint8Array): boolean {
  return bytes.length === 0 || bytes[0] === 0x00;
}

export const HISTORY_CAPACITY =
  LAYOUTS.HistoryEntry.lastBlock - LAYOUTS.HistoryEntry.firstBlock + 1;
