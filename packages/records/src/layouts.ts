/**
 * Block layouts of the transit area
 *
 * One entry per known record kind. `LayoutTable` is a mapped type over
 * `KnownRecordKind`, so a variant without a layout fails the type-check.
 */

import { BLOCK_SIZE } from "@felica-remote/shared";

import {
  readBcdClock,
  readDate,
  readStation,
  readUint16BE,
  readUint16LE,
  unpackTime,
} from "./packed.js";
import {
  PURCHASE_TRANSACTION_TYPE,
  ServiceCode,
  type KnownRecordKind,
  type RecordOfKind,
} from "./types.js";

export interface Layout<K extends KnownRecordKind> {
  kind: K;
  serviceCode: ServiceCode;
  firstBlock: number;
  lastBlock: number;
  /** Consecutive blocks that make up one record */
  blocksPerRecord: number;
  parse(bytes: Uint8Array, blockAddress: number): RecordOfKind<K>;
}

type LayoutTable = { [K in KnownRecordKind]: Layout<K> };

const shiftJis = new TextDecoder("shift_jis");

function block(bytes: Uint8Array, index: number): Uint8Array {
  return bytes.subarray(index * BLOCK_SIZE, (index + 1) * BLOCK_SIZE);
}

function phoneDigits(bytes: Uint8Array): string {
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0"))
    .join("")
    .toUpperCase();
  return hex.replace(/F+$/, "");
}

export const LAYOUTS: LayoutTable = {
  IssuanceInfo1: {
    kind: "IssuanceInfo1",
    serviceCode: ServiceCode.IssuanceInfo1,
    firstBlock: 0,
    lastBlock: 3,
    blocksPerRecord: 4,
    parse(bytes, blockAddress) {
      const owner = block(bytes, 0);
      const personal = block(bytes, 1);
      const secondary = block(bytes, 2);
      const meta = block(bytes, 3);
      return {
        kind: "IssuanceInfo1",
        serviceCode: ServiceCode.IssuanceInfo1,
        blockAddress,
        ownerName: shiftJis.decode(owner).replace(/[\s\u0000]+$/, ""),
        ownerPhone: phoneDigits(personal.subarray(0, 8)),
        ownerAgeCode: personal[8],
        ownerBirthDate: readDate(personal, 9),
        deposit: readUint16LE(personal, 12),
        secondaryIssueId: secondary.slice(0, 8),
        issuerId: readUint16BE(meta, 0),
        issuedBy: meta[2],
        issuedStation: readStation(meta, 3),
        issuedOn: readDate(meta, 7),
        expiresOn: readDate(meta, 14),
      };
    },
  },
  Attributes: {
    kind: "Attributes",
    serviceCode: ServiceCode.Attributes,
    firstBlock: 0,
    lastBlock: 0,
    blocksPerRecord: 1,
    parse(bytes, blockAddress) {
      return {
        kind: "Attributes",
        serviceCode: ServiceCode.Attributes,
        blockAddress,
        cardType: bytes[8] >> 4,
        region: bytes[8] & 0x0f,
        balance: readUint16LE(bytes, 11),
        transactionNumber: readUint16BE(bytes, 14),
      };
    },
  },
  AuxiliaryBalance: {
    kind: "AuxiliaryBalance",
    serviceCode: ServiceCode.AuxiliaryBalance,
    firstBlock: 0,
    lastBlock: 0,
    blocksPerRecord: 1,
    parse(bytes, blockAddress) {
      return {
        kind: "AuxiliaryBalance",
        serviceCode: ServiceCode.AuxiliaryBalance,
        blockAddress,
        balance: readUint16LE(bytes, 0),
        date: readDate(bytes, 8),
        transactionNumber: readUint16BE(bytes, 14),
      };
    },
  },
  IssuanceInfo2: {
    kind: "IssuanceInfo2",
    serviceCode: ServiceCode.IssuanceInfo2,
    firstBlock: 0,
    lastBlock: 2,
    blocksPerRecord: 3,
    parse(bytes, blockAddress) {
      const detail = block(bytes, 0);
      return {
        kind: "IssuanceInfo2",
        serviceCode: ServiceCode.IssuanceInfo2,
        blockAddress,
        issuedBy: detail[0],
        issuedStation: readStation(detail, 1),
        initialAmount: readUint16LE(detail, 5),
      };
    },
  },
  HistoryEntry: {
    kind: "HistoryEntry",
    serviceCode: ServiceCode.History,
    firstBlock: 0,
    lastBlock: 19,
    blocksPerRecord: 1,
    parse(bytes, blockAddress) {
      const transactionType = bytes[1] & 0x7f;
      return {
        kind: "HistoryEntry",
        serviceCode: ServiceCode.History,
        blockAddress,
        equipment: bytes[0],
        transactionType,
        payType: bytes[2],
        gateInstruction: bytes[3],
        date: readDate(bytes, 4),
        route:
          transactionType === PURCHASE_TRANSACTION_TYPE
            ? { kind: "purchase", time: unpackTime(readUint16BE(bytes, 6)) }
            : { kind: "ride", entry: readStation(bytes, 6), exit: readStation(bytes, 8) },
        balance: readUint16LE(bytes, 10),
        transactionNumber: readUint16BE(bytes, 13),
      };
    },
  },
  CommuterPassSection: {
    kind: "CommuterPassSection",
    serviceCode: ServiceCode.CommuterPass,
    firstBlock: 0,
    lastBlock: 2,
    blocksPerRecord: 3,
    parse(bytes, blockAddress) {
      const primary = block(bytes, 0);
      const supplemental = block(bytes, 2);
      return {
        kind: "CommuterPassSection",
        serviceCode: ServiceCode.CommuterPass,
        blockAddress,
        validFrom: readDate(primary, 0),
        validTo: readDate(primary, 2),
        startStation: readStation(primary, 8),
        endStation: readStation(primary, 10),
        via1Station: readStation(primary, 12),
        via2Station: readStation(primary, 14),
        issuedOn: readDate(supplemental, 5),
      };
    },
  },
  GateEntry: {
    kind: "GateEntry",
    serviceCode: ServiceCode.GateEntries,
    firstBlock: 0,
    lastBlock: 2,
    blocksPerRecord: 1,
    parse(bytes, blockAddress) {
      return {
        kind: "GateEntry",
        serviceCode: ServiceCode.GateEntries,
        blockAddress,
        inOutType: bytes[0],
        intermediateGateInstruction: bytes[1],
        station: readStation(bytes, 2),
        deviceId: readUint16BE(bytes, 4),
        date: readDate(bytes, 6),
        clock: readBcdClock(bytes, 8),
        amount: readUint16LE(bytes, 10),
        commuterPassFare: readUint16LE(bytes, 12),
        commuterPassStation: readStation(bytes, 14),
      };
    },
  },
  SfGateEntry: {
    kind: "SfGateEntry",
    serviceCode: ServiceCode.SfGateEntry,
    firstBlock: 0,
    lastBlock: 1,
    blocksPerRecord: 2,
    parse(bytes, blockAddress) {
      const first = block(bytes, 0);
      const second = block(bytes, 1);
      return {
        kind: "SfGateEntry",
        serviceCode: ServiceCode.SfGateEntry,
        blockAddress,
        entryStation: readStation(first, 0),
        intermediateDate: readDate(second, 0),
        intermediateEntryClock: readBcdClock(second, 2),
        intermediateEntryStation: readStation(second, 4),
        unknown1: second[6],
        intermediateExitClock: readBcdClock(second, 7),
        intermediateExitStation: readStation(second, 9),
        unknown2: second[11],
      };
    },
  },
};

const LAYOUT_LIST: readonly LayoutTable[KnownRecordKind][] = Object.values(LAYOUTS);

export function expectedLength(layout: { blocksPerRecord: number }): number {
  return layout.blocksPerRecord * BLOCK_SIZE;
}

/**
 * Find the layout whose record starts at (serviceCode, blockAddress)
 */
export function findLayout(
  serviceCode: number,
  blockAddress: number,
): LayoutTable[KnownRecordKind] | undefined {
  return LAYOUT_LIST.find(
    (layout) =>
      layout.serviceCode === serviceCode &&
      blockAddress >= layout.firstBlock &&
      blockAddress <= layout.lastBlock &&
      (blockAddress - layout.firstBlock) % layout.blocksPerRecord === 0,
  );
}
