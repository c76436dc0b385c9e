/**
 * Text rendering of snapshot documents for the terminal
 */

import chalk from "chalk";

import type {
  DocumentError,
  DocumentRecord,
  DocumentValue,
  SnapshotDocument,
} from "../lib/snapshot-document.js";
import type { StationResolver } from "../lib/station-resolver.js";

function hex2(value: number): string {
  return value.toString(16).padStart(2, "0").toUpperCase();
}

/**
 * One-line form of a document value. Station codes are resolved when a
 * resolver knows them; labelled codes show as `label (code)`.
 */
export function formatValue(value: DocumentValue, stations?: StationResolver): string {
  if (value === null) {
    return "-";
  }
  if (Array.isArray(value)) {
    return value.map((item) => formatValue(item, stations)).join(", ");
  }
  if (typeof value !== "object") {
    return String(value);
  }
  const { line, station, code, label } = value;
  if (typeof line === "number" && typeof station === "number") {
    const name = stations?.resolve(line, station);
    return name
      ? `${name.name} (${name.lineName}, ${name.company})`
      : `line 0x${hex2(line)} station 0x${hex2(station)}`;
  }
  if (typeof code === "string" && typeof label === "string") {
    return `${label} (${code})`;
  }
  return Object.entries(value)
    .map(([key, item]) => `${key}=${formatValue(item, stations)}`)
    .join(" ");
}

export function renderRecord(record: DocumentRecord, stations?: StationResolver): string[] {
  const header = `${chalk.bold(record.kind)} ${chalk.gray(
    `service ${record.serviceCode} block ${record.blockAddress}`,
  )}`;
  return [
    header,
    ...Object.entries(record.fields).map(
      ([key, value]) => `  ${chalk.cyan(key)}: ${formatValue(value, stations)}`,
    ),
  ];
}

function renderError(error: DocumentError): string {
  return `${error.code}: ${error.message} (${error.remedy})`;
}

export function renderDocument(document: SnapshotDocument, stations?: StationResolver): string[] {
  const lines: string[] = [];
  if (document.identity) {
    lines.push(
      chalk.green(`IDm ${document.identity.idm}  PMm ${document.identity.pmm}`),
      chalk.gray(`System code ${document.identity.systemCode}`),
    );
  } else {
    lines.push(chalk.yellow("No card identity"));
  }
  if (document.system) {
    lines.push(chalk.gray(`IDi ${document.system.issueIdFormatted}`));
  }
  for (const record of document.records) {
    lines.push("", ...renderRecord(record, stations));
  }
  if (document.failures.length > 0) {
    lines.push("", chalk.yellow(`${document.failures.length} read(s) failed:`));
    for (const failure of document.failures) {
      lines.push(
        chalk.yellow(
          `  service ${failure.serviceCode} block ${failure.blockAddress}: ${renderError(failure)}`,
        ),
      );
    }
  }
  if (document.aborted) {
    lines.push("", chalk.red(`Reading stopped: ${renderError(document.aborted)}`));
  }
  return lines;
}
