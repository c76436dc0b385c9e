/**
 * Station name lookup for presentation
 *
 * Records keep raw line and station codes. A resolver turns them into names
 * when a snapshot is rendered; nothing else depends on it.
 */

import { readFileSync } from "node:fs";

import { FelicaError, parseCode } from "@felica-remote/shared";

export interface StationName {
  company: string;
  lineName: string;
  name: string;
}

export interface StationResolver {
  resolve(lineCode: number, stationIndex: number): StationName | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readCode(entry: Record<string, unknown>, key: string, index: number): number {
  const value = entry[key];
  if (typeof value !== "number" && typeof value !== "string") {
    throw new FelicaError("InvalidParameter", `Station entry ${index}: ${key} is missing`);
  }
  const code = typeof value === "number" || /^(0x)?[0-9a-f]{1,2}$/i.test(value.trim())
    ? parseCode(value)
    : Number.NaN;
  if (!Number.isInteger(code) || code < 0 || code > 0xff) {
    throw new FelicaError("InvalidParameter", `Station entry ${index}: ${key} out of range`);
  }
  return code;
}

function readText(entry: Record<string, unknown>, key: string, index: number): string {
  const value = entry[key];
  if (typeof value !== "string") {
    throw new FelicaError("InvalidParameter", `Station entry ${index}: ${key} must be a string`);
  }
  return value;
}

/**
 * Resolver over a JSON array of `{ line, station, company, lineName, name }`.
 * Codes may be numbers or hex strings ("0xE3", "E3").
 */
export class JsonStationResolver implements StationResolver {
  private readonly stations = new Map<number, StationName>();

  constructor(entries: unknown) {
    if (!Array.isArray(entries)) {
      throw new FelicaError("InvalidParameter", "Station table must be a JSON array");
    }
    entries.forEach((entry: unknown, index) => {
      if (!isRecord(entry)) {
        throw new FelicaError("InvalidParameter", `Station entry ${index} is not an object`);
      }
      const line = readCode(entry, "line", index);
      const station = readCode(entry, "station", index);
      this.stations.set((line << 8) | station, {
        company: readText(entry, "company", index),
        lineName: readText(entry, "lineName", index),
        name: readText(entry, "name", index),
      });
    });
  }

  static fromFile(path: string): JsonStationResolver {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FelicaError("InvalidParameter", `Failed to load stations from ${path}: ${reason}`, {
        cause: error,
      });
    }
    return new JsonStationResolver(parsed);
  }

  get size(): number {
    return this.stations.size;
  }

  resolve(lineCode: number, stationIndex: number): StationName | undefined {
    return this.stations.get((lineCode << 8) | stationIndex);
  }
}
