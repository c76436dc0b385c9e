import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import chalk from "chalk";

import { GATE_ENTRY } from "../../records/tests/fixtures.js";
import { run as runConfig } from "../src/cli/commands/config.js";
import { run as runDecode } from "../src/cli/commands/decode.js";
import { run as runShow } from "../src/cli/commands/show.js";

describe("CLI commands", () => {
  let info: MockInstance<typeof console.info>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    chalk.level = 0;
    process.exitCode = undefined;
    info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("decodes a block to JSON", async () => {
    await runDecode({ service: "108C", block: 0, hex: GATE_ENTRY, json: true });

    expect(process.exitCode).toBeUndefined();
    const printed = JSON.parse(String(info.mock.calls[0][0]));
    expect(printed.kind).toBe("GateEntry");
    expect(printed.fields.clock).toBe("08:45");
  });

  it("exits with 2 on a missing option", async () => {
    await runDecode({ service: "108C", hex: GATE_ENTRY });

    expect(process.exitCode).toBe(2);
    expect(error).toHaveBeenCalledWith("Missing required options: --service, --block, --hex");
  });

  it("exits with 2 on odd-length hex", async () => {
    await runDecode({ service: "108C", block: 0, hex: "ABC" });
    expect(process.exitCode).toBe(2);
  });

  it("exits with 1 when the bytes do not fit the record", async () => {
    await runDecode({ service: "108C", block: 0, hex: "00".repeat(8) });

    expect(process.exitCode).toBe(1);
    expect(error).toHaveBeenCalledWith("Decode failed: GateEntry expects 16 bytes, got 8");
  });

  it("renders a saved document", async () => {
    const dir = mkdtempSync(join(tmpdir(), "felica-show-"));
    const file = join(dir, "snapshot.json");
    writeFileSync(
      file,
      JSON.stringify({
        version: 1,
        identity: null,
        system: null,
        records: [],
        failures: [],
        aborted: { code: "NoCard", message: "No card answered polling", remedy: "re-present-card" },
      }),
    );

    await runShow({ file });

    expect(info).toHaveBeenCalledWith(
      ["No card identity", "", "Reading stopped: NoCard: No card answered polling (re-present-card)"].join("\n"),
    );
  });

  it("prints the effective configuration", async () => {
    const path = join(mkdtempSync(join(tmpdir(), "felica-cli-config-")), "config.json");

    await runConfig({ path, setServer: "https://auth.test" });

    expect(info).toHaveBeenCalledWith(`Saved ${path}`);
    expect(JSON.parse(String(info.mock.calls[1][0])).authServerUrl).toBe("https://auth.test");
  });
});
