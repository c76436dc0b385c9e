/**
 * Card snapshot
 *
 * Everything read from one card in one session. Records are appended through
 * a builder bound to a single CardIdentity; `freeze()` hands out the
 * immutable result and closes the builder.
 */

import { FelicaError, type CardIdentity } from "@felica-remote/shared";
import type { DecodedRecord, RecordOfKind } from "@felica-remote/records";

export interface SystemInfo {
  readonly issueId: Uint8Array;
  readonly issueParameter: Uint8Array;
}

/**
 * A read that did not produce a record; reading went on after it
 */
export interface ReadFailure {
  readonly serviceCode: number;
  readonly blockAddress: number;
  readonly blockCount: number;
  readonly error: FelicaError;
}

export interface CardSnapshot {
  readonly identity: CardIdentity | null;
  readonly system: SystemInfo | null;
  readonly records: readonly DecodedRecord[];
  readonly failures: readonly ReadFailure[];
  /** Why reading stopped early, or null when the plan ran to the end */
  readonly aborted: FelicaError | null;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

export class SnapshotBuilder {
  private identity: CardIdentity | null = null;
  private system: SystemInfo | null = null;
  private readonly records: DecodedRecord[] = [];
  private readonly failures: ReadFailure[] = [];
  private aborted: FelicaError | null = null;
  private frozen = false;

  private assertOpen(): void {
    if (this.frozen) {
      throw new FelicaError("InvalidParameter", "Snapshot is already frozen");
    }
  }

  /**
   * Bind the builder to a card. Binding again to the same IDm is a no-op;
   * a different IDm is refused.
   */
  bindIdentity(identity: CardIdentity): this {
    this.assertOpen();
    if (this.identity !== null && !sameBytes(this.identity.idm, identity.idm)) {
      throw new FelicaError("InvalidParameter", "Snapshot is bound to a different card");
    }
    this.identity = identity;
    return this;
  }

  setSystem(system: SystemInfo): this {
    this.assertOpen();
    this.system = Object.freeze({
      issueId: system.issueId.slice(),
      issueParameter: system.issueParameter.slice(),
    });
    return this;
  }

  addRecord(record: DecodedRecord): this {
    this.assertOpen();
    if (this.identity === null) {
      throw new FelicaError("InvalidParameter", "Records need a bound card identity");
    }
    this.records.push(Object.freeze(record));
    return this;
  }

  addFailure(failure: ReadFailure): this {
    this.assertOpen();
    this.failures.push(Object.freeze({ ...failure }));
    return this;
  }

  /**
   * Mark the snapshot as cut short. The first marker wins.
   */
  abort(error: FelicaError): this {
    this.assertOpen();
    this.aborted ??= error;
    return this;
  }

  get recordCount(): number {
    return this.records.length;
  }

  freeze(): CardSnapshot {
    this.assertOpen();
    this.frozen = true;
    return Object.freeze({
      identity: this.identity,
      system: this.system,
      records: Object.freeze([...this.records]),
      failures: Object.freeze([...this.failures]),
      aborted: this.aborted,
    });
  }
}

export function recordsOfKind<K extends DecodedRecord["kind"]>(
  snapshot: CardSnapshot,
  kind: K,
): RecordOfKind<K>[] {
  return snapshot.records.filter(
    (record): record is RecordOfKind<K> => record.kind === kind,
  );
}

export function isComplete(snapshot: CardSnapshot): boolean {
  return snapshot.aborted === null;
}
