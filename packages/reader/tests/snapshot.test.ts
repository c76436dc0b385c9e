import { describe, it, expect } from "vitest";

import { FelicaError } from "@felica-remote/shared";
import { decode, ServiceCode } from "@felica-remote/records";

import { blocks, ATTRIBUTES, GATE_ENTRY } from "../../records/tests/fixtures.js";
import { isComplete, recordsOfKind, SnapshotBuilder } from "../src/lib/snapshot.js";

const identity = {
  idm: Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8),
  pmm: new Uint8Array(8),
  systemCode: 0x0003,
};

describe("SnapshotBuilder", () => {
  it("collects records for one card", () => {
    const snapshot = new SnapshotBuilder()
      .bindIdentity(identity)
      .addRecord(decode(ServiceCode.Attributes, 0, blocks(ATTRIBUTES)))
      .addRecord(decode(ServiceCode.GateEntries, 0, blocks(GATE_ENTRY)))
      .freeze();

    expect(snapshot.identity).toBe(identity);
    expect(snapshot.records).toHaveLength(2);
    expect(recordsOfKind(snapshot, "GateEntry")).toHaveLength(1);
    expect(recordsOfKind(snapshot, "HistoryEntry")).toEqual([]);
    expect(isComplete(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.records)).toBe(true);
  });

  it("refuses records before an identity is bound", () => {
    const builder = new SnapshotBuilder();
    expect(() => builder.addRecord(decode(ServiceCode.Attributes, 0, blocks(ATTRIBUTES)))).toThrow(
      "Records need a bound card identity",
    );
  });

  it("refuses a second card but accepts the same one again", () => {
    const builder = new SnapshotBuilder().bindIdentity(identity);
    expect(() => builder.bindIdentity({ ...identity, idm: identity.idm.slice() })).not.toThrow();
    expect(() =>
      builder.bindIdentity({ ...identity, idm: Uint8Array.of(8, 7, 6, 5, 4, 3, 2, 1) }),
    ).toThrow("Snapshot is bound to a different card");
  });

  it("keeps the first abort marker", () => {
    const first = new FelicaError("SessionLost", "Card left the field");
    const snapshot = new SnapshotBuilder()
      .abort(first)
      .abort(new FelicaError("Timeout", "late"))
      .freeze();

    expect(snapshot.aborted).toBe(first);
    expect(isComplete(snapshot)).toBe(false);
  });

  it("copies the system info it is given", () => {
    const issueId = new Uint8Array(8).fill(7);
    const snapshot = new SnapshotBuilder()
      .setSystem({ issueId, issueParameter: new Uint8Array(8) })
      .freeze();
    issueId.fill(0);

    expect(snapshot.system?.issueId).toEqual(new Uint8Array(8).fill(7));
  });

  it("cannot change once frozen", () => {
    const builder = new SnapshotBuilder();
    builder.freeze();
    expect(() => builder.abort(new FelicaError("Timeout", "late"))).toThrow(
      "Snapshot is already frozen",
    );
    expect(() => builder.freeze()).toThrow("Snapshot is already frozen");
  });
});
