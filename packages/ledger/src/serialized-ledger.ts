/**
 * SerializedLedger - single-writer access to a YieldLedger.
 *
 * The driver tick, the transfer processor and API handlers all touch the
 * same ledger. Every operation runs through one p-queue with concurrency 1,
 * so each mutation observes the result of the previous one and no two
 * interleave. After every operation the ledger state is republished, so
 * reads through current() never wait on the queue.
 */

import PQueue from "p-queue";
import { GuardianError } from "@yield-guardian/types";
import type {
  Amount,
  LedgerState,
  YieldOrigin,
  YieldSource,
} from "@yield-guardian/types";
import type { SpendingMode } from "./spending-policy.js";
import type { AccrualResult, SpendCheck, SpendDecision } from "./types.js";
import type { YieldLedger } from "./yield-ledger.js";

export class LedgerClosedError extends GuardianError {
  constructor() {
    super("LEDGER_CLOSED", "Ledger is shutting down and accepts no new operations");
    this.name = "LedgerClosedError";
  }
}

export class SerializedLedger {
  private readonly queue = new PQueue({ concurrency: 1 });
  private _closed = false;
  private _state: LedgerState;

  constructor(private readonly ledger: YieldLedger) {
    this._state = ledger.snapshot();
  }

  /**
   * Run `fn` with exclusive access to the ledger.
   *
   * @throws LedgerClosedError once close() has been called
   */
  run<T>(fn: (ledger: YieldLedger) => T | Promise<T>): Promise<T> {
    if (this._closed) {
      return Promise.reject(new LedgerClosedError());
    }
    return this.queue.add(
      async () => {
        try {
          return await fn(this.ledger);
        } finally {
          this._state = this.ledger.snapshot();
        }
      },
      { throwOnTimeout: true },
    );
  }

  /** State published by the last completed operation. */
  current(): LedgerState {
    return this._state;
  }

  accrue(now?: Date): Promise<AccrualResult> {
    return this.run((l) => l.accrue(now));
  }

  authorizeAndRecord(amount: Amount): Promise<SpendDecision> {
    return this.run((l) => l.authorizeAndRecord(amount));
  }

  checkSpend(amount: Amount): Promise<SpendCheck> {
    return this.run((l) => l.checkSpend(amount));
  }

  replaceSources(origin: YieldOrigin, sources: readonly YieldSource[]): Promise<void> {
    return this.run((l) => l.replaceSources(origin, sources));
  }

  setMode(name: string): Promise<SpendingMode> {
    return this.run((l) => l.setMode(name));
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Number of operations waiting or running. */
  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  /** Resolve once every operation queued so far has settled. */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }

  /**
   * Stop accepting operations and wait for the queued ones to finish.
   */
  async close(): Promise<void> {
    this._closed = true;
    await this.queue.onIdle();
  }
}
