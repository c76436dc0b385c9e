#!/usr/bin/env node
/**
 * Reader CLI - Runtime Wrapper
 * Offline tools around the reader library: decode blocks, render saved
 * snapshots, inspect the configuration.
 */

import chalk from "chalk";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { run as runConfig } from "./commands/config.js";
import { run as runDecode } from "./commands/decode.js";
import { run as runShow } from "./commands/show.js";

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("felica-remote")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .command(
      "decode",
      "Decode plaintext block bytes of a transit service",
      (y) =>
        y
          .option("service", {
            type: "string",
            demandOption: true,
            desc: "Service code in hex (e.g., 090C)",
          })
          .option("block", {
            type: "number",
            demandOption: true,
            desc: "First block address of the record",
          })
          .option("hex", {
            type: "string",
            demandOption: true,
            desc: "Block bytes as hex",
          })
          .option("json", {
            type: "boolean",
            default: false,
            desc: "Print the record as JSON",
          }),
      (argv) => runDecode(argv),
    )
    .command(
      "show",
      "Render a saved snapshot document",
      (y) =>
        y
          .option("file", {
            type: "string",
            demandOption: true,
            desc: "Path to a snapshot JSON document",
          })
          .option("stations", {
            type: "string",
            desc: "Path to a station table JSON file",
          }),
      (argv) => runShow(argv),
    )
    .command(
      "config",
      "Show the effective configuration",
      (y) =>
        y
          .option("path", {
            type: "string",
            desc: "Config file (default ~/.felica-remote/config.json)",
          })
          .option("set-server", {
            type: "string",
            desc: "Save a new authentication server URL",
          }),
      (argv) => runConfig(argv),
    )
    .help()
    .alias("h", "help")
    .version("0.1.0")
    .demandCommand(1, "Please specify a command")
    .parseAsync();
}

main().catch((err) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
