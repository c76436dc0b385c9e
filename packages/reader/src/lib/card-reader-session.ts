/**
 * Card Reader Session
 * Establishes a session with the card and reads the transit area into a
 * CardSnapshot.
 *
 * A failed read of one record is kept in `snapshot.failures` and reading
 * goes on. Losing the card, losing the server, or an abort signal stops the
 * plan; the snapshot then carries what was read plus the abort marker.
 */

import {
  CommandCode,
  createLogger,
  encodeBlockList,
  decodeReadResponse,
  FelicaError,
  MAX_BLOCKS_PER_REQUEST,
  toFelicaError,
  TRANSIT_SYSTEM_CODE,
  type CardTransport,
  type Logger,
} from "@felica-remote/shared";
import {
  AREA_CODES,
  blocksPerRecord,
  decode,
  isEmptyHistorySlot,
  SERVICE_CODES,
  ServiceCode,
} from "@felica-remote/records";

import type { Relay } from "./relay-client.js";
import { SessionEngine, type EstablishedSession } from "./session-engine.js";
import { identityOf, type SessionState } from "./session-state.js";
import { SnapshotBuilder, type CardSnapshot } from "./snapshot.js";

export interface ReadPlanStep {
  serviceCode: ServiceCode;
  firstBlock: number;
  blockCount: number;
  /** Stop at the first empty slot (history ring) */
  stopAtEmptySlot?: boolean;
}

export const DEFAULT_READ_PLAN: readonly ReadPlanStep[] = [
  { serviceCode: ServiceCode.Attributes, firstBlock: 0, blockCount: 1 },
  { serviceCode: ServiceCode.IssuanceInfo1, firstBlock: 0, blockCount: 4 },
  { serviceCode: ServiceCode.IssuanceInfo2, firstBlock: 0, blockCount: 3 },
  { serviceCode: ServiceCode.AuxiliaryBalance, firstBlock: 0, blockCount: 1 },
  { serviceCode: ServiceCode.History, firstBlock: 0, blockCount: 20, stopAtEmptySlot: true },
  { serviceCode: ServiceCode.Unassigned, firstBlock: 0, blockCount: 10 },
  { serviceCode: ServiceCode.CommuterPass, firstBlock: 0, blockCount: 3 },
  { serviceCode: ServiceCode.GateEntries, firstBlock: 0, blockCount: 3 },
  { serviceCode: ServiceCode.SfGateEntry, firstBlock: 0, blockCount: 2 },
];

export interface ReadProgress {
  completedSteps: number;
  totalSteps: number;
  serviceCode: number;
  records: number;
}

export interface CardReaderOptions {
  transport: CardTransport;
  relay: Relay;
  plan?: readonly ReadPlanStep[];
  exchangeTimeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (progress: ReadProgress) => void;
  onStateChange?: (state: SessionState) => void;
  logger?: Logger;
}

/**
 * Errors after which no further read can succeed
 */
const FATAL_CODES: ReadonlySet<string> = new Set([
  "SessionLost",
  "NoCard",
  "Timeout",
  "RelayUnreachable",
]);

type StepOutcome = { stopped: false } | { stopped: true; error: FelicaError };

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function concat(parts: readonly Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export class CardReaderSession {
  private readonly plan: readonly ReadPlanStep[];
  private readonly logger: Logger;

  constructor(private readonly options: CardReaderOptions) {
    this.plan = options.plan ?? DEFAULT_READ_PLAN;
    this.logger = options.logger ?? createLogger("reader:card");
  }

  /**
   * Read the card. Never rejects for card or server trouble: the snapshot
   * says how far reading got and why it stopped.
   */
  async read(): Promise<CardSnapshot> {
    const builder = new SnapshotBuilder();
    const engine = new SessionEngine({
      transport: this.options.transport,
      relay: this.options.relay,
      systemCode: TRANSIT_SYSTEM_CODE,
      areas: AREA_CODES,
      services: SERVICE_CODES,
      exchangeTimeoutMs: this.options.exchangeTimeoutMs,
      logger: this.logger.child({ operation: "handshake" }),
      onStateChange: this.options.onStateChange,
    });

    try {
      await engine.withSession(async (session) => {
        builder.bindIdentity(session.identity);
        builder.setSystem({
          issueId: session.issueId,
          issueParameter: session.issueParameter,
        });
        await this.runPlan(session, builder);
      });
    } catch (error) {
      const identity = identityOf(engine.getState());
      if (identity !== null) {
        builder.bindIdentity(identity);
      }
      builder.abort(toFelicaError(error, "AuthenticationFailed"));
    }

    const snapshot = builder.freeze();
    this.logger.info("Card read finished", {
      records: snapshot.records.length,
      failures: snapshot.failures.length,
      aborted: snapshot.aborted?.code ?? null,
    });
    return snapshot;
  }

  private async runPlan(session: EstablishedSession, builder: SnapshotBuilder): Promise<void> {
    const { signal, onProgress } = this.options;
    for (const [index, step] of this.plan.entries()) {
      if (signal?.aborted) {
        builder.abort(
          new FelicaError("SessionLost", "Read cancelled", { cause: signal.reason }),
        );
        return;
      }
      const outcome = await this.readStep(session, step, builder);
      if (outcome.stopped) {
        this.logger.warn("Reading stopped", {
          serviceCode: step.serviceCode,
          code: outcome.error.code,
        });
        builder.abort(outcome.error);
        return;
      }
      onProgress?.({
        completedSteps: index + 1,
        totalSteps: this.plan.length,
        serviceCode: step.serviceCode,
        records: builder.recordCount,
      });
    }
  }

  private async readStep(
    session: EstablishedSession,
    step: ReadPlanStep,
    builder: SnapshotBuilder,
  ): Promise<StepOutcome> {
    const serviceIndex = SERVICE_CODES.indexOf(step.serviceCode);
    const blockNumbers = Array.from(
      { length: step.blockCount },
      (_, i) => step.firstBlock + i,
    );
    const blocks = new Map<number, Uint8Array>();
    const { signal } = this.options;

    for (const numbers of chunk(blockNumbers, MAX_BLOCKS_PER_REQUEST)) {
      if (signal?.aborted) {
        this.decodeBlocks(step, blocks, builder);
        return {
          stopped: true,
          error: new FelicaError("SessionLost", "Read cancelled", { cause: signal.reason }),
        };
      }
      try {
        const payload = encodeBlockList(
          numbers.map((blockNumber) => ({ serviceIndex, blockNumber })),
        );
        const plaintext = await session.exchange(CommandCode.AuthenticatedRead, payload);
        decodeReadResponse(plaintext, numbers.length).forEach((data, i) => {
          blocks.set(numbers[i], data);
        });
      } catch (error) {
        const failure = toFelicaError(error, "RelayError");
        if (FATAL_CODES.has(failure.code)) {
          // keep what earlier chunks of this step already returned
          this.decodeBlocks(step, blocks, builder);
          return {
            stopped: true,
            error:
              failure.code === "NoCard"
                ? new FelicaError("SessionLost", "Card left the field", { cause: failure })
                : failure,
          };
        }
        this.logger.warn("Read failed", {
          serviceCode: step.serviceCode,
          blockAddress: numbers[0],
          code: failure.code,
        });
        builder.addFailure({
          serviceCode: step.serviceCode,
          blockAddress: numbers[0],
          blockCount: numbers.length,
          error: failure,
        });
      }
    }

    this.decodeBlocks(step, blocks, builder);
    return { stopped: false };
  }

  private decodeBlocks(
    step: ReadPlanStep,
    blocks: ReadonlyMap<number, Uint8Array>,
    builder: SnapshotBuilder,
  ): void {
    const end = step.firstBlock + step.blockCount;
    let address = step.firstBlock;
    while (address < end) {
      const span = blocksPerRecord(step.serviceCode, address);
      const parts: Uint8Array[] = [];
      for (let n = address; n < address + span; n++) {
        const data = blocks.get(n);
        if (data !== undefined) {
          parts.push(data);
        }
      }
      // a record with a block missing was already reported by its read
      if (parts.length === span) {
        if (step.stopAtEmptySlot && isEmptyHistorySlot(parts[0])) {
          return;
        }
        try {
          builder.addRecord(decode(step.serviceCode, address, concat(parts)));
        } catch (error) {
          builder.addFailure({
            serviceCode: step.serviceCode,
            blockAddress: address,
            blockCount: span,
            error: toFelicaError(error, "RecordLengthMismatch"),
          });
        }
      }
      address += span;
    }
  }
}
