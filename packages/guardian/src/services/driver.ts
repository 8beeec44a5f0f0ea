/**
 * GuardianDriver - the periodic tick.
 *
 * Each tick: refresh sources (when due), accrue, snapshot (when due),
 * then poll and book transfers. A failing step is logged and the tick
 * moves on to the next one.
 */

import type { AccrualResult } from "@yield-guardian/ledger";
import type { LedgerSnapshotRecord } from "@yield-guardian/types";
import type { Logger } from "../logger.js";
import type { GuardianService, RefreshOutcome } from "./guardian-service.js";
import type { ProcessedTransfer } from "./transfer-processor.js";

export type TickStep = "refresh" | "accrue" | "snapshot" | "transfers";

export interface TickReport {
  readonly refresh?: readonly RefreshOutcome[] | undefined;
  readonly accrual?: AccrualResult | undefined;
  readonly snapshot?: LedgerSnapshotRecord | undefined;
  readonly transfers: readonly ProcessedTransfer[];
  readonly errors: readonly { readonly step: TickStep; readonly message: string }[];
}

export type TransactionListener = (processed: ProcessedTransfer) => void | Promise<void>;

export interface GuardianDriverOptions {
  readonly tickIntervalMs: number;
  readonly refreshIntervalMs: number;
  readonly snapshotIntervalMs: number;
  readonly logger: Logger;

  /** Alert hook, called once per processed transfer. Default: log */
  readonly onTransaction?: TransactionListener | undefined;

  readonly now?: (() => number) | undefined;
}

export class GuardianDriver {
  private readonly service: GuardianService;
  private readonly options: GuardianDriverOptions;
  private readonly onTransaction: TransactionListener;
  private readonly now: () => number;

  private lastRefreshAt: number | undefined;
  private lastSnapshotAt: number | undefined;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private inFlight: Promise<TickReport> | undefined;
  private _running = false;

  constructor(service: GuardianService, options: GuardianDriverOptions) {
    this.service = service;
    this.options = options;
    this.now = options.now ?? (() => Date.now());
    this.onTransaction =
      options.onTransaction ??
      ((processed) => {
        options.logger.info(
          { id: processed.record.id, status: processed.record.status },
          processed.decision?.message ?? "Transfer recorded",
        );
      });
  }

  get running(): boolean {
    return this._running;
  }

  /**
   * Run one tick. Never rejects; failures land in `errors`.
   */
  async tick(): Promise<TickReport> {
    const logger = this.options.logger;
    const errors: { step: TickStep; message: string }[] = [];
    const fail = (step: TickStep, err: unknown): void => {
      const message = err instanceof Error ? err.message : String(err);
      errors.push({ step, message });
      logger.error({ step, err }, `Tick step '${step}' failed`);
    };

    let refresh: readonly RefreshOutcome[] | undefined;
    if (this.due(this.lastRefreshAt, this.options.refreshIntervalMs)) {
      this.lastRefreshAt = this.now();
      try {
        refresh = await this.service.refreshSources();
      } catch (err) {
        fail("refresh", err);
      }
    }

    let accrual: AccrualResult | undefined;
    try {
      accrual = await this.service.accrue();
    } catch (err) {
      fail("accrue", err);
    }

    let snapshot: LedgerSnapshotRecord | undefined;
    if (this.due(this.lastSnapshotAt, this.options.snapshotIntervalMs)) {
      try {
        snapshot = await this.service.writeSnapshot();
        this.lastSnapshotAt = this.now();
      } catch (err) {
        fail("snapshot", err);
      }
    }

    let transfers: readonly ProcessedTransfer[] = [];
    try {
      transfers = await this.service.processTransfers();
    } catch (err) {
      fail("transfers", err);
    }

    for (const processed of transfers) {
      try {
        await this.onTransaction(processed);
      } catch (err) {
        logger.error({ id: processed.record.id, err }, "Transaction listener failed");
      }
    }

    return { refresh, accrual, snapshot, transfers, errors };
  }

  /**
   * Start ticking. The first tick runs immediately.
   */
  start(): void {
    if (this._running) {
      return;
    }
    this._running = true;
    this.schedule(0);
    this.options.logger.info(
      { tickIntervalMs: this.options.tickIntervalMs },
      "Driver started",
    );
  }

  /**
   * Cancel the timer, wait for the in-flight tick, then close the ledger.
   */
  async stop(): Promise<void> {
    this._running = false;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight !== undefined) {
      await this.inFlight;
    }
    await this.service.close();
    this.options.logger.info("Driver stopped");
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.runScheduledTick();
    }, delayMs);
  }

  private async runScheduledTick(): Promise<void> {
    this.inFlight = this.tick();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = undefined;
      if (this._running) {
        this.schedule(this.options.tickIntervalMs);
      }
    }
  }

  private due(last: number | undefined, intervalMs: number): boolean {
    return last === undefined || this.now() - last >= intervalMs;
  }
}
