import { readFileSync } from "node:fs";

import chalk from "chalk";

import { parseDocument } from "../../lib/snapshot-document.js";
import { JsonStationResolver } from "../../lib/station-resolver.js";
import { renderDocument } from "../render.js";

export type ShowCommandArgs = {
  file?: string;
  stations?: string;
};

/**
 * Render a saved snapshot document, resolving station names when a table
 * is given
 */
export async function run(argv: ShowCommandArgs): Promise<void> {
  const { file, stations } = argv;

  if (!file) {
    console.error(chalk.red("Missing required option: --file <snapshot.json>"));
    process.exitCode = 2;
    return;
  }

  try {
    const document = parseDocument(readFileSync(file, "utf8"));
    const resolver = stations ? JsonStationResolver.fromFile(stations) : undefined;
    console.info(renderDocument(document, resolver).join("\n"));
  } catch (err) {
    console.error(chalk.red(`Show failed: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  }
}
