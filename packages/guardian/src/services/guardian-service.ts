/**
 * GuardianService - composition root of the guardian.
 *
 * Owns the serialized ledger, the audit trail and the collaborators, and
 * exposes every operator operation. Network calls (feeds, detector,
 * executor) run outside the ledger queue; only their results are applied
 * inside it.
 */

import { randomUUID } from "node:crypto";
import type {
  AccrualResult,
  SerializedLedger,
  SpendCheck,
  SpendDecision,
} from "@yield-guardian/ledger";
import { LEDGER_DECIMALS, formatUsdAmount, parseAmount } from "@yield-guardian/ledger";
import type {
  ExecutionResult,
  ExecutorStatus,
  TransferDetector,
  TransferExecutor,
  YieldSourceFeed,
} from "@yield-guardian/chain-observer";
import type {
  Amount,
  LedgerSnapshotRecord,
  LedgerState,
  TransactionRecord,
  TransferDirection,
  TransferEvent,
  YieldOrigin,
  YieldSource,
} from "@yield-guardian/types";
import {
  BudgetExceededError,
  CollaboratorUnavailableError,
  ConfigurationError,
  ValidationError,
  isYieldSource,
} from "@yield-guardian/types";
import type { Logger } from "../logger.js";
import type { ResilientAuditWriter } from "./resilient-audit.js";
import { TransferProcessor, type ProcessedTransfer } from "./transfer-processor.js";
import {
  buildBudgetView,
  buildModeView,
  buildStatusView,
  buildYieldView,
  type BudgetView,
  type ModeView,
  type StatusView,
  type YieldView,
} from "./views.js";

// =============================================================================
// Types
// =============================================================================

export interface GuardianServiceOptions {
  readonly ledger: SerializedLedger;
  readonly audit: ResilientAuditWriter;
  readonly feeds: readonly YieldSourceFeed[];
  readonly detector?: TransferDetector | undefined;
  readonly executor?: TransferExecutor | undefined;
  readonly logger: Logger;
  readonly now?: (() => Date) | undefined;
}

/**
 * Per-feed outcome of a refresh.
 *
 * "kept" means the feed observed nothing and the origin's sources stay.
 */
export type RefreshOutcome =
  | { readonly origin: YieldOrigin; readonly outcome: "replaced"; readonly count: number }
  | { readonly origin: YieldOrigin; readonly outcome: "kept" }
  | { readonly origin: YieldOrigin; readonly outcome: "failed"; readonly error: string };

export interface RecordedSpend {
  readonly decision: SpendDecision;
  readonly record: TransactionRecord;

  /** False while the audit write is queued for retry */
  readonly persisted: boolean;
}

export interface ExecutedTransfer {
  readonly execution: Extract<ExecutionResult, { success: true }>;
  readonly decision: SpendDecision;
  readonly record: TransactionRecord;

  /** False when the record or snapshot write failed after the payment */
  readonly persisted: boolean;
}

export interface HistoryOptions {
  readonly limit?: number | undefined;
  readonly direction?: TransferDirection | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class GuardianService {
  private readonly ledger: SerializedLedger;
  private readonly audit: ResilientAuditWriter;
  private readonly feeds: readonly YieldSourceFeed[];
  private readonly detector: TransferDetector | undefined;
  private readonly executor: TransferExecutor | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly processor: TransferProcessor;

  constructor(options: GuardianServiceOptions) {
    this.ledger = options.ledger;
    this.audit = options.audit;
    this.feeds = options.feeds;
    this.detector = options.detector;
    this.executor = options.executor;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.processor = new TransferProcessor({
      ledger: options.ledger,
      audit: options.audit,
      logger: options.logger.child({ component: "processor" }),
      seenIds: options.audit.transactionIds(),
      now: this.now,
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  get ready(): boolean {
    return !this.ledger.closed;
  }

  get hasExecutor(): boolean {
    return this.executor !== undefined;
  }

  /** Published ledger state; never waits on the queue. */
  current(): LedgerState {
    return this.ledger.current();
  }

  /** Audit records waiting for a successful write. */
  get pendingWrites(): number {
    return this.processor.pendingWrites;
  }

  async close(): Promise<void> {
    await this.ledger.close();
  }

  // ─── Background steps ──────────────────────────────────────────────

  /**
   * Pull sources from every feed. A failing feed does not stop the others.
   */
  async refreshSources(): Promise<RefreshOutcome[]> {
    const outcomes: RefreshOutcome[] = [];

    for (const feed of this.feeds) {
      try {
        let sources: readonly YieldSource[];
        try {
          sources = await feed.fetchSources();
        } catch (err) {
          throw new CollaboratorUnavailableError(`feed:${feed.origin}`, errorMessage(err), { cause: err });
        }

        if (sources.length === 0) {
          outcomes.push({ origin: feed.origin, outcome: "kept" });
          continue;
        }
        if (!sources.every(isYieldSource)) {
          throw new ValidationError(`Feed ${feed.origin} returned a malformed yield source`);
        }

        await this.ledger.replaceSources(feed.origin, sources);
        outcomes.push({ origin: feed.origin, outcome: "replaced", count: sources.length });
      } catch (err) {
        this.logger.warn({ origin: feed.origin, err }, "Yield source refresh failed");
        outcomes.push({ origin: feed.origin, outcome: "failed", error: errorMessage(err) });
      }
    }

    return outcomes;
  }

  accrue(): Promise<AccrualResult> {
    return this.ledger.accrue(this.now());
  }

  /**
   * Poll the detector and book what it returns. Queued audit writes are
   * retried first, with or without a detector.
   *
   * @throws CollaboratorUnavailableError when the detector fails
   */
  async processTransfers(): Promise<ProcessedTransfer[]> {
    if (this.detector === undefined) {
      await this.processor.flushPending();
      return [];
    }

    let events: readonly TransferEvent[];
    try {
      events = await this.detector.pollNewTransfers();
    } catch (err) {
      throw new CollaboratorUnavailableError("transfer-detector", errorMessage(err), { cause: err });
    }

    return this.processor.process(events);
  }

  /**
   * @throws StorageWriteError after retries are exhausted
   */
  writeSnapshot(): Promise<LedgerSnapshotRecord> {
    return this.audit.writeSnapshot(this.ledger.current(), this.now());
  }

  // ─── Views ─────────────────────────────────────────────────────────

  async status(): Promise<StatusView> {
    await this.accrue();
    return buildStatusView(this.ledger.current());
  }

  async budgetDetails(): Promise<BudgetView> {
    await this.accrue();
    return buildBudgetView(this.ledger.current());
  }

  async yieldDetails(): Promise<YieldView> {
    await this.accrue();
    return buildYieldView(this.ledger.current());
  }

  history(options: HistoryOptions = {}): readonly TransactionRecord[] {
    return this.audit.listTransactions(options);
  }

  transaction(id: string): TransactionRecord | undefined {
    return this.audit.getTransaction(id);
  }

  mode(): ModeView {
    return buildModeView(this.ledger.current());
  }

  // ─── Spending ──────────────────────────────────────────────────────

  async checkSpend(amount: Amount): Promise<SpendCheck> {
    await this.accrue();
    return this.ledger.checkSpend(amount);
  }

  /**
   * Book a spend made outside the guardian.
   *
   * The reference is claimed before anything is awaited. A failed audit
   * write leaves the spend booked and queues the record.
   *
   * @throws ValidationError for an invalid amount or an already-recorded reference
   */
  async recordSpend(
    amount: Amount,
    options: { reference?: string | undefined; category?: string | undefined } = {},
  ): Promise<RecordedSpend> {
    const id = options.reference ?? `spend:${randomUUID()}`;
    if (!this.processor.claim(id)) {
      throw new ValidationError(`Transaction ${id} is already recorded`);
    }

    let decision: SpendDecision;
    try {
      await this.accrue();
      decision = await this.ledger.authorizeAndRecord(amount);
    } catch (err) {
      this.processor.release(id);
      throw err;
    }

    const now = this.now().toISOString();
    const record: TransactionRecord = {
      id,
      timestamp: now,
      amount: decision.amount,
      asset: "USD",
      direction: "out",
      category: options.category ?? "manual",
      status: decision.withinBudget ? "within_budget" : "over_budget",
      recordedAt: now,
    };
    const persisted = await this.processor.persist(record);

    return { decision, record, persisted };
  }

  /**
   * Pay `amount` out of the agent wallet, if it fits the budget.
   *
   * @throws ConfigurationError without an executor
   * @throws ValidationError for an invalid or zero amount
   * @throws BudgetExceededError when the amount exceeds the available budget
   * @throws CollaboratorUnavailableError when the executor reports failure
   */
  async transfer(amount: Amount): Promise<ExecutedTransfer> {
    const executor = this.requireExecutor();

    await this.accrue();
    const check = await this.ledger.checkSpend(amount);
    if (parseAmount(check.amount, LEDGER_DECIMALS) === 0n) {
      throw new ValidationError("Transfer amount must be greater than zero");
    }
    if (!check.withinBudget) {
      throw new BudgetExceededError(formatUsdAmount(check.amount), formatUsdAmount(check.budget));
    }

    const execution = await executor.execute(check.amount);
    if (!execution.success) {
      throw new CollaboratorUnavailableError("transfer-executor", execution.error);
    }

    this.processor.claim(execution.reference);
    const decision = await this.ledger.authorizeAndRecord(execution.amount);

    const now = this.now().toISOString();
    const record: TransactionRecord = {
      id: execution.reference,
      timestamp: now,
      amount: execution.amount,
      asset: "USDC",
      direction: "out",
      counterparty: execution.destination,
      category: "transfer",
      status: decision.withinBudget ? "within_budget" : "over_budget",
      recordedAt: now,
    };

    let persisted = await this.processor.persist(record);
    try {
      await this.writeSnapshot();
    } catch (err) {
      persisted = false;
      this.logger.error({ reference: execution.reference, err }, "Snapshot after transfer failed");
    }

    this.logger.info(
      { reference: execution.reference, amount: execution.amount },
      decision.message,
    );
    return { execution, decision, record, persisted };
  }

  /**
   * @throws UnknownModeError
   * @throws StorageWriteError when the snapshot cannot be written; the mode change stands
   */
  async setMode(name: string): Promise<ModeView> {
    const mode = await this.ledger.setMode(name);
    this.logger.info({ mode: mode.name }, "Spending mode changed");
    await this.writeSnapshot();
    return buildModeView(this.ledger.current());
  }

  /**
   * @throws ConfigurationError without an executor
   * @throws CollaboratorUnavailableError when the wallet cannot be read
   */
  async agentStatus(): Promise<ExecutorStatus> {
    const executor = this.requireExecutor();
    try {
      return await executor.status();
    } catch (err) {
      throw new CollaboratorUnavailableError("transfer-executor", errorMessage(err), { cause: err });
    }
  }

  private requireExecutor(): TransferExecutor {
    if (this.executor === undefined) {
      throw new ConfigurationError(
        "Transfer executor is not configured (set AGENT_PRIVATE_KEY and destinationAddress)",
      );
    }
    return this.executor;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
