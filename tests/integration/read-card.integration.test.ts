/**
 * Integration: configuration -> reader -> relay -> simulated card -> document
 *
 * No network: undici's fetch is replaced by the in-process authentication
 * server, and the card is simulated.
 */

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, vi } from "vitest";

import { ServiceCode } from "@felica-remote/records";

import { ATTRIBUTES, blocks, HISTORY_RIDE } from "../../packages/records/tests/fixtures.js";
import { SimulatedCard } from "../helpers/simulated-card.js";
import { SimulatedAuthServer } from "../helpers/simulated-auth-server.js";

const { mockFetch } = vi.hoisted(() => ({ mockFetch: vi.fn() }));
vi.mock("undici", () => ({
  fetch: mockFetch,
}));

import {
  ConfigManager,
  createCardReader,
  parseDocument,
  recordsOfKind,
  toDocument,
} from "@felica-remote/reader";

describe("Integration: reading a card through the relay", () => {
  let server: SimulatedAuthServer;

  beforeEach(() => {
    server = new SimulatedAuthServer({ sessionId: "it-1", commandTimeout: 0.5 });
    mockFetch.mockReset();
    mockFetch.mockImplementation(server.fetch);
  });

  function loadConfig() {
    const path = join(mkdtempSync(join(tmpdir(), "felica-it-")), "config.json");
    return new ConfigManager(path, {
      AUTH_SERVER_URL: "http://relay.test/api/",
      FELICA_LOG_LEVEL: "error",
    }).load();
  }

  it("reads balance and history into a saved document", async () => {
    const history = Array.from({ length: 20 }, () => new Uint8Array(16));
    history[0] = blocks(HISTORY_RIDE);
    const card = new SimulatedCard({
      services: {
        [ServiceCode.Attributes]: [blocks(ATTRIBUTES)],
        [ServiceCode.History]: history,
      },
    });

    const snapshot = await createCardReader(loadConfig(), card, {
      plan: [
        { serviceCode: ServiceCode.Attributes, firstBlock: 0, blockCount: 1 },
        { serviceCode: ServiceCode.History, firstBlock: 0, blockCount: 20, stopAtEmptySlot: true },
      ],
    }).read();

    expect(mockFetch.mock.calls[0][0]).toBe("http://relay.test/api/mutual-authentication");
    expect(snapshot.aborted).toBeNull();
    expect(recordsOfKind(snapshot, "Attributes")[0]).toMatchObject({
      cardType: 0x02,
      region: 0x03,
      balance: 10000,
      transactionNumber: 42,
    });
    expect(recordsOfKind(snapshot, "HistoryEntry")).toHaveLength(1);

    const document = parseDocument(JSON.stringify(toDocument(snapshot)));
    expect(document.identity?.idm).toBe("012E4CD56A0B3309");
    expect(document.records.map((record) => record.kind)).toEqual(["Attributes", "HistoryEntry"]);
    expect(document.records[0].fields.cardType).toEqual({
      code: "0x02",
      label: "Suica/PiTaPa/TOICA/PASMO",
    });
  });

  it("passes the server's card timeout to the card", async () => {
    const card = new SimulatedCard({ silentOn: [0x10] });
    const spy = vi.spyOn(card, "sendFrame");

    const snapshot = await createCardReader(loadConfig(), card, { plan: [] }).read();

    expect(spy.mock.calls.map((call) => call[1])).toEqual([1000, 500]);
    expect(snapshot.aborted?.code).toBe("CardRejected");
  });

  it("reports an unreachable server in the snapshot", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));

    const snapshot = await createCardReader(loadConfig(), new SimulatedCard()).read();

    expect(snapshot.identity).not.toBeNull();
    expect(snapshot.records).toEqual([]);
    expect(snapshot.aborted?.code).toBe("RelayUnreachable");
    expect(snapshot.aborted?.remedy).toBe("check-network");
  });
});
