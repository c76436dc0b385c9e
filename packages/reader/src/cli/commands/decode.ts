import chalk from "chalk";
import { isValidEvenHex, cleanHex, parseCode, parseHexToBytes } from "@felica-remote/shared";
import { decode } from "@felica-remote/records";

import { recordToDocument } from "../../lib/snapshot-document.js";
import { renderRecord } from "../render.js";

export type DecodeCommandArgs = {
  service?: string;
  block?: number;
  hex?: string;
  json?: boolean;
};

/**
 * Decode plaintext block bytes offline
 */
export async function run(argv: DecodeCommandArgs): Promise<void> {
  const { service, block, hex, json } = argv;

  if (service === undefined || block === undefined || hex === undefined) {
    console.error(chalk.red("Missing required options: --service, --block, --hex"));
    process.exitCode = 2;
    return;
  }

  const data = cleanHex(hex);
  if (!isValidEvenHex(data)) {
    console.error(chalk.red("Invalid hex format (must be even-length hex)"));
    process.exitCode = 2;
    return;
  }

  let serviceCode: number;
  try {
    serviceCode = parseCode(service);
  } catch (e) {
    console.error(chalk.red(e instanceof Error ? e.message : String(e)));
    process.exitCode = 2;
    return;
  }

  try {
    const record = recordToDocument(decode(serviceCode, block, parseHexToBytes(data)));
    if (json) {
      console.info(JSON.stringify(record, null, 2));
    } else {
      console.info(renderRecord(record).join("\n"));
    }
  } catch (err) {
    console.error(chalk.red(`Decode failed: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  }
}
