/**
 * JSON form of a CardSnapshot
 *
 * Bytes become upper-case hex, dates `YY-MM-DD`, times `HH:MM:SS`, and code
 * bytes `{ code, label }`. Station codes stay raw `{ line, station }` so a
 * renderer can resolve them later.
 */

import {
  bytesToUpperHex,
  FelicaError,
  type FelicaErrorCode,
  type Remedy,
} from "@felica-remote/shared";
import {
  describeCode,
  formatDate,
  formatIssueId,
  formatTime,
  type DecodedRecord,
  type LabelTable,
  type StationCode,
} from "@felica-remote/records";

import type { CardSnapshot } from "./snapshot.js";

export const DOCUMENT_VERSION = 1;

export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [key: string]: DocumentValue };

export type DocumentObject = { [key: string]: DocumentValue };

export interface DocumentError {
  code: string;
  message: string;
  remedy: string;
}

export interface DocumentFailure extends DocumentError {
  serviceCode: string;
  blockAddress: number;
  blockCount: number;
}

export interface DocumentRecord {
  kind: string;
  serviceCode: string;
  blockAddress: number;
  fields: DocumentObject;
}

export interface SnapshotDocument {
  version: number;
  identity: { idm: string; pmm: string; systemCode: string } | null;
  system: { issueId: string; issueIdFormatted: string; issueParameter: string } | null;
  records: DocumentRecord[];
  failures: DocumentFailure[];
  aborted: DocumentError | null;
}

function hex(value: number, digits: number): string {
  return value.toString(16).padStart(digits, "0").toUpperCase();
}

function labelled(table: LabelTable, code: number): DocumentObject {
  return { code: `0x${hex(code, 2)}`, label: describeCode(table, code) };
}

function station(code: StationCode): DocumentObject {
  return { line: code.line, station: code.station };
}

function errorEntry(error: { code: FelicaErrorCode; message: string; remedy: Remedy }): DocumentError {
  return { code: error.code, message: error.message, remedy: error.remedy };
}

export function recordFields(record: DecodedRecord): DocumentObject {
  switch (record.kind) {
    case "IssuanceInfo1":
      return {
        ownerName: record.ownerName,
        ownerPhone: record.ownerPhone,
        ownerAgeCode: record.ownerAgeCode,
        ownerBirthDate: formatDate(record.ownerBirthDate),
        deposit: record.deposit,
        secondaryIssueId: bytesToUpperHex(record.secondaryIssueId),
        issuerId: hex(record.issuerId, 4),
        issuedBy: labelled("equipment", record.issuedBy),
        issuedStation: station(record.issuedStation),
        issuedOn: formatDate(record.issuedOn),
        expiresOn: formatDate(record.expiresOn),
      };
    case "IssuanceInfo2":
      return {
        issuedBy: labelled("equipment", record.issuedBy),
        issuedStation: station(record.issuedStation),
        initialAmount: record.initialAmount,
      };
    case "Attributes":
      return {
        cardType: labelled("cardType", record.cardType),
        region: record.region,
        balance: record.balance,
        transactionNumber: record.transactionNumber,
      };
    case "AuxiliaryBalance":
      return {
        balance: record.balance,
        date: formatDate(record.date),
        transactionNumber: record.transactionNumber,
      };
    case "HistoryEntry":
      return {
        equipment: labelled("equipment", record.equipment),
        transactionType: labelled("transactionType", record.transactionType),
        payType: labelled("payType", record.payType),
        gateInstruction: labelled("gateInstruction", record.gateInstruction),
        date: formatDate(record.date),
        ...(record.route.kind === "ride"
          ? { entry: station(record.route.entry), exit: station(record.route.exit) }
          : { time: formatTime(record.route.time) }),
        balance: record.balance,
        transactionNumber: record.transactionNumber,
      };
    case "CommuterPassSection":
      return {
        validFrom: formatDate(record.validFrom),
        validTo: formatDate(record.validTo),
        startStation: station(record.startStation),
        endStation: station(record.endStation),
        via1Station: station(record.via1Station),
        via2Station: station(record.via2Station),
        issuedOn: formatDate(record.issuedOn),
      };
    case "GateEntry":
      return {
        inOutType: labelled("gateInOut", record.inOutType),
        intermediateGateInstruction: labelled(
          "intermediateGateInstruction",
          record.intermediateGateInstruction,
        ),
        station: station(record.station),
        deviceId: hex(record.deviceId, 4),
        date: formatDate(record.date),
        clock: record.clock,
        amount: record.amount,
        commuterPassFare: record.commuterPassFare,
        commuterPassStation: station(record.commuterPassStation),
      };
    case "SfGateEntry":
      return {
        entryStation: station(record.entryStation),
        intermediateDate: formatDate(record.intermediateDate),
        intermediateEntryClock: record.intermediateEntryClock,
        intermediateEntryStation: station(record.intermediateEntryStation),
        unknown1: record.unknown1,
        intermediateExitClock: record.intermediateExitClock,
        intermediateExitStation: station(record.intermediateExitStation),
        unknown2: record.unknown2,
      };
    case "UnknownBlock":
      return { raw: bytesToUpperHex(record.raw) };
  }
}

export function recordToDocument(record: DecodedRecord): DocumentRecord {
  return {
    kind: record.kind,
    serviceCode: hex(record.serviceCode, 4),
    blockAddress: record.blockAddress,
    fields: recordFields(record),
  };
}

export function toDocument(snapshot: CardSnapshot): SnapshotDocument {
  const { identity, system } = snapshot;
  return {
    version: DOCUMENT_VERSION,
    identity: identity && {
      idm: bytesToUpperHex(identity.idm),
      pmm: bytesToUpperHex(identity.pmm),
      systemCode: hex(identity.systemCode, 4),
    },
    system: system && {
      issueId: bytesToUpperHex(system.issueId),
      issueIdFormatted: formatIssueId(system.issueId),
      issueParameter: bytesToUpperHex(system.issueParameter),
    },
    records: snapshot.records.map(recordToDocument),
    failures: snapshot.failures.map((failure) => ({
      serviceCode: hex(failure.serviceCode, 4),
      blockAddress: failure.blockAddress,
      blockCount: failure.blockCount,
      ...errorEntry(failure.error),
    })),
    aborted: snapshot.aborted && errorEntry(snapshot.aborted),
  };
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDocumentValue(value: unknown): value is DocumentValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      return Array.isArray(value) ? value.every(isDocumentValue) : isDocumentObject(value);
    default:
      return false;
  }
}

function isDocumentObject(value: unknown): value is DocumentObject {
  return isRecord(value) && Object.values(value).every(isDocumentValue);
}

function invalid(path: string, expected: string): FelicaError {
  return new FelicaError("InvalidParameter", `Snapshot document: ${path} must be ${expected}`);
}

function requireString(object: JsonObject, key: string, path: string): string {
  const value = object[key];
  if (typeof value !== "string") {
    throw invalid(`${path}.${key}`, "a string");
  }
  return value;
}

function requireNumber(object: JsonObject, key: string, path: string): number {
  const value = object[key];
  if (typeof value !== "number") {
    throw invalid(`${path}.${key}`, "a number");
  }
  return value;
}

function requireArray(object: JsonObject, key: string): unknown[] {
  const value = object[key];
  if (!Array.isArray(value)) {
    throw invalid(key, "an array");
  }
  return value;
}

function parseError(value: unknown, path: string): DocumentError {
  if (!isRecord(value)) {
    throw invalid(path, "an object");
  }
  return {
    code: requireString(value, "code", path),
    message: requireString(value, "message", path),
    remedy: requireString(value, "remedy", path),
  };
}

function parseRecord(value: unknown, index: number): DocumentRecord {
  const path = `records[${index}]`;
  if (!isRecord(value)) {
    throw invalid(path, "an object");
  }
  const fields = value.fields;
  if (!isDocumentObject(fields)) {
    throw invalid(`${path}.fields`, "an object of JSON values");
  }
  return {
    kind: requireString(value, "kind", path),
    serviceCode: requireString(value, "serviceCode", path),
    blockAddress: requireNumber(value, "blockAddress", path),
    fields,
  };
}

function parseFailure(value: unknown, index: number): DocumentFailure {
  const path = `failures[${index}]`;
  if (!isRecord(value)) {
    throw invalid(path, "an object");
  }
  return {
    serviceCode: requireString(value, "serviceCode", path),
    blockAddress: requireNumber(value, "blockAddress", path),
    blockCount: requireNumber(value, "blockCount", path),
    ...parseError(value, path),
  };
}

/**
 * Parse and validate a saved snapshot document
 */
export function parseDocument(json: string): SnapshotDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new FelicaError("InvalidParameter", "Snapshot document is not valid JSON", {
      cause: error,
    });
  }
  if (!isRecord(parsed)) {
    throw invalid("document", "an object");
  }
  if (parsed.version !== DOCUMENT_VERSION) {
    throw invalid("version", String(DOCUMENT_VERSION));
  }

  const identity = parsed.identity;
  const system = parsed.system;
  if (identity !== null && !isRecord(identity)) {
    throw invalid("identity", "an object or null");
  }
  if (system !== null && !isRecord(system)) {
    throw invalid("system", "an object or null");
  }

  return {
    version: DOCUMENT_VERSION,
    identity:
      identity === null
        ? null
        : {
            idm: requireString(identity, "idm", "identity"),
            pmm: requireString(identity, "pmm", "identity"),
            systemCode: requireString(identity, "systemCode", "identity"),
          },
    system:
      system === null
        ? null
        : {
            issueId: requireString(system, "issueId", "system"),
            issueIdFormatted: requireString(system, "issueIdFormatted", "system"),
            issueParameter: requireString(system, "issueParameter", "system"),
          },
    records: requireArray(parsed, "records").map(parseRecord),
    failures: requireArray(parsed, "failures").map(parseFailure),
    aborted: parsed.aborted === null ? null : parseError(parsed.aborted, "aborted"),
  };
}
