/**
 * Human-readable labels for the code bytes found in records
 *
 * The tables live in data/code-labels.json and are loaded once.
 */

import { readFileSync } from "node:fs";

import { parseCode } from "@felica-remote/shared";

export const LABEL_TABLES = [
  "equipment",
  "transactionType",
  "payType",
  "gateInstruction",
  "cardType",
  "gateInOut",
  "intermediateGateInstruction",
] as const;

export type LabelTable = (typeof LABEL_TABLES)[number];

type LabelMaps = Record<LabelTable, ReadonlyMap<number, string>>;

const LABELS_URL = new URL("../data/code-labels.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the raw JSON and index each table by numeric code
 */
export function parseLabelTables(raw: unknown): LabelMaps {
  if (!isRecord(raw)) {
    throw new Error("Code label data must be an object");
  }
  const data = raw;
  const load = (name: LabelTable): ReadonlyMap<number, string> => {
    const table = data[name];
    if (!isRecord(table)) {
      throw new Error(`Code label table missing: ${name}`);
    }
    const map = new Map<number, string>();
    for (const [code, label] of Object.entries(table)) {
      if (typeof label !== "string") {
        throw new Error(`Label for ${name} ${code} is not a string`);
      }
      map.set(parseCode(code), label);
    }
    return map;
  };
  return {
    equipment: load("equipment"),
    transactionType: load("transactionType"),
    payType: load("payType"),
    gateInstruction: load("gateInstruction"),
    cardType: load("cardType"),
    gateInOut: load("gateInOut"),
    intermediateGateInstruction: load("intermediateGateInstruction"),
  };
}

let cached: LabelMaps | null = null;

function tables(): LabelMaps {
  if (cached === null) {
    cached = parseLabelTables(JSON.parse(readFileSync(LABELS_URL, "utf8")));
  }
  return cached;
}

export function lookupLabel(table: LabelTable, code: number): string | undefined {
  return tables()[table].get(code);
}

/**
 * Label for a code, or `Unknown <table> (0xNN)` when the table has none
 */
export function describeCode(table: LabelTable, code: number): string {
  return (
    lookupLabel(table, code) ??
    `Unknown ${table} (0x${code.toString(16).padStart(2, "0").toUpperCase()})`
  );
}
