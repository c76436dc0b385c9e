/**
 * Decoded record variants
 *
 * Each variant is tagged by `kind` and remembers the service code and first
 * block address it was decoded from. Station and line codes stay raw; name
 * resolution belongs to the presentation layer.
 */

import type { PackedDate, PackedTime, StationCode } from "./packed.js";

/**
 * Service codes of the transit area, in the order the authentication request
 * lists them. Authenticated reads address a service by its index here.
 */
export const ServiceCode = {
  IssuanceInfo1: 0x0048,
  Attributes: 0x0088,
  AuxiliaryBalance: 0x0810,
  IssuanceInfo2: 0x08c8,
  History: 0x090c,
  Unassigned: 0x1008,
  CommuterPass: 0x1048,
  GateEntries: 0x108c,
  SfGateEntry: 0x10c8,
} as const;

export type ServiceCode = (typeof ServiceCode)[keyof typeof ServiceCode];

export const SERVICE_CODES: readonly ServiceCode[] = Object.values(ServiceCode);

/**
 * Area node IDs opened alongside the services at authentication
 */
export const AREA_CODES: readonly number[] = [0x0000, 0x0040, 0x0800, 0x0fc0, 0x1000];

interface RecordBase {
  serviceCode: number;
  blockAddress: number;
}

export interface IssuanceInfo1 extends RecordBase {
  kind: "IssuanceInfo1";
  ownerName: string;
  /** Digits of the registered phone number, padding stripped */
  ownerPhone: string;
  ownerAgeCode: number;
  ownerBirthDate: PackedDate;
  deposit: number;
  secondaryIssueId: Uint8Array;
  issuerId: number;
  issuedBy: number;
  issuedStation: StationCode;
  issuedOn: PackedDate;
  expiresOn: PackedDate;
}

export interface IssuanceInfo2 extends RecordBase {
  kind: "IssuanceInfo2";
  issuedBy: number;
  issuedStation: StationCode;
  initialAmount: number;
}

export interface Attributes extends RecordBase {
  kind: "Attributes";
  cardType: number;
  region: number;
  balance: number;
  transactionNumber: number;
}

export interface AuxiliaryBalance extends RecordBase {
  kind: "AuxiliaryBalance";
  balance: number;
  date: PackedDate;
  transactionNumber: number;
}

export type HistoryRoute =
  | { kind: "ride"; entry: StationCode; exit: StationCode }
  | { kind: "purchase"; time: PackedTime };

export interface HistoryEntry extends RecordBase {
  kind: "HistoryEntry";
  equipment: number;
  transactionType: number;
  payType: number;
  gateInstruction: number;
  date: PackedDate;
  route: HistoryRoute;
  balance: number;
  transactionNumber: number;
}

export interface CommuterPassSection extends RecordBase {
  kind: "CommuterPassSection";
  validFrom: PackedDate;
  validTo: PackedDate;
  startStation: StationCode;
  endStation: StationCode;
  via1Station: StationCode;
  via2Station: StationCode;
  issuedOn: PackedDate;
}

export interface GateEntry extends RecordBase {
  kind: "GateEntry";
  inOutType: number;
  intermediateGateInstruction: number;
  station: StationCode;
  deviceId: number;
  date: PackedDate;
  /** `HH:MM` as stored in BCD */
  clock: string;
  amount: number;
  commuterPassFare: number;
  commuterPassStation: StationCode;
}

export interface SfGateEntry extends RecordBase {
  kind: "SfGateEntry";
  entryStation: StationCode;
  intermediateDate: PackedDate;
  intermediateEntryClock: string;
  intermediateEntryStation: StationCode;
  unknown1: number;
  intermediateExitClock: string;
  intermediateExitStation: StationCode;
  unknown2: number;
}

export interface UnknownBlock extends RecordBase {
  kind: "UnknownBlock";
  raw: Uint8Array;
}

export type KnownRecord =
  | IssuanceInfo1
  | IssuanceInfo2
  | Attributes
  | AuxiliaryBalance
  | HistoryEntry
  | CommuterPassSection
  | GateEntry
  | SfGateEntry;

export type DecodedRecord = KnownRecord | UnknownBlock;

export type KnownRecordKind = KnownRecord["kind"];

export type RecordOfKind<K extends DecodedRecord["kind"]> = Extract<
  DecodedRecord,
  { kind: K }
>;

/**
 * Transaction type of a shop purchase; its history entry holds a time
 * instead of stations
 */
export const PURCHASE_TRANSACTION_TYPE = 0x46;
