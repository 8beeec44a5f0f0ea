/**
 * Wire the guardian from validated configuration.
 *
 * Collaborators default to the Base implementations; tests pass their
 * own through `overrides`.
 */

import { JsonlAuditStore, verifySnapshotIntegrity } from "@yield-guardian/audit-store";
import type { AuditWriter } from "@yield-guardian/audit-store";
import {
  AaveYieldFeed,
  EvmTransferDetector,
  EvmTransferExecutor,
  StaticYieldFeed,
  type TransferDetector,
  type TransferExecutor,
  type YieldSourceFeed,
} from "@yield-guardian/chain-observer";
import { SerializedLedger, YieldLedger } from "@yield-guardian/ledger";
import type { YieldSource } from "@yield-guardian/types";
import type { AppConfig, GuardianFileConfig, YieldSourceConfig } from "./config.js";
import { monitoredAddress } from "./config.js";
import type { Logger } from "./logger.js";
import { GuardianDriver, type TransactionListener } from "./services/driver.js";
import { GuardianService } from "./services/guardian-service.js";
import { ResilientAuditWriter } from "./services/resilient-audit.js";

export interface BootstrapOverrides {
  readonly audit?: AuditWriter | undefined;
  readonly feeds?: readonly YieldSourceFeed[] | undefined;
  /** null disables detection */
  readonly detector?: TransferDetector | null | undefined;
  /** null disables execution */
  readonly executor?: TransferExecutor | null | undefined;
  readonly onTransaction?: TransactionListener | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface GuardianRuntime {
  readonly service: GuardianService;
  readonly driver: GuardianDriver;
  readonly audit: AuditWriter;

  /** Whether ledger totals came from a persisted snapshot */
  readonly restored: boolean;
}

export async function bootstrap(
  config: AppConfig,
  file: GuardianFileConfig,
  logger: Logger,
  overrides: BootstrapOverrides = {},
): Promise<GuardianRuntime> {
  const now = overrides.now ?? (() => new Date());
  const audit = overrides.audit ?? openJsonlStore(config.DATA_DIR, logger);
  const address = monitoredAddress(file);

  // ─── Yield feeds ────────────────────────────────────────────────
  const staticFeeds = staticFeedsFrom(file, now);
  let feeds = overrides.feeds;
  if (feeds === undefined) {
    feeds = file.aave.enabled
      ? [
          ...staticFeeds,
          new AaveYieldFeed({
            rpcUrl: file.rpcUrl,
            walletAddress: address,
            estimatedApyPercent: file.aave.estimatedApyPercent,
            now,
          }),
        ]
      : staticFeeds;
  }

  const sources: YieldSource[] = [];
  for (const feed of staticFeeds) {
    sources.push(...(await feed.fetchSources()));
  }

  // ─── Ledger ─────────────────────────────────────────────────────
  const latest = audit.latestSnapshot();
  let ledger: YieldLedger | undefined;
  if (config.RESTORE_FROM_SNAPSHOT && latest !== undefined) {
    if (verifySnapshotIntegrity(latest)) {
      ledger = YieldLedger.fromSnapshot(latest, {
        sources,
        startedAt: now(),
        accrualThresholdMs: config.ACCRUAL_THRESHOLD_MS,
      });
      logger.info({ snapshotAt: latest.timestamp }, "Ledger restored from snapshot");
    } else {
      logger.warn(
        { snapshotAt: latest.timestamp },
        "Latest snapshot failed integrity check; starting from configuration",
      );
    }
  }
  const restored = ledger !== undefined;
  ledger ??= new YieldLedger({
    principal: file.principalUsd,
    accruedYield: file.initialYieldUsd,
    mode: file.spendingMode,
    sources,
    startedAt: now(),
    accrualThresholdMs: config.ACCRUAL_THRESHOLD_MS,
  });

  // ─── Collaborators ──────────────────────────────────────────────
  const detector =
    overrides.detector === undefined
      ? new EvmTransferDetector({
          rpcUrl: file.rpcUrl,
          walletAddress: address,
          lookbackBlocks: BigInt(file.transferLookbackBlocks),
        })
      : overrides.detector ?? undefined;

  let executor: TransferExecutor | undefined;
  if (overrides.executor !== undefined) {
    executor = overrides.executor ?? undefined;
  } else if (config.AGENT_PRIVATE_KEY !== undefined && file.destinationAddress !== undefined) {
    executor = new EvmTransferExecutor({
      rpcUrl: file.rpcUrl,
      privateKey: config.AGENT_PRIVATE_KEY,
      destinationAddress: file.destinationAddress,
    });
  } else if (config.AGENT_PRIVATE_KEY !== undefined) {
    logger.warn("AGENT_PRIVATE_KEY is set but destinationAddress is not; transfers disabled");
  }

  const service = new GuardianService({
    ledger: new SerializedLedger(ledger),
    audit: new ResilientAuditWriter({ store: audit, logger }),
    feeds,
    detector,
    executor,
    logger,
    now,
  });

  const driverLogger = logger.child({ component: "driver" });
  const driver = new GuardianDriver(service, {
    tickIntervalMs: config.TICK_INTERVAL_MS,
    refreshIntervalMs: config.REFRESH_INTERVAL_MS,
    snapshotIntervalMs: config.SNAPSHOT_INTERVAL_MS,
    logger: driverLogger,
    onTransaction: overrides.onTransaction,
    now: () => now().getTime(),
  });

  return { service, driver, audit, restored };
}

function openJsonlStore(dataDir: string, logger: Logger): JsonlAuditStore {
  const store = new JsonlAuditStore({ dataDir });
  const report = store.loadReport;
  if (report.transactionsSkipped > 0 || report.snapshotsSkipped > 0) {
    logger.warn(report, "Skipped unreadable audit lines");
  }
  return store;
}

/** One static feed per configured origin. */
function staticFeedsFrom(file: GuardianFileConfig, now: () => Date): StaticYieldFeed[] {
  const byOrigin = new Map<string, YieldSourceConfig[]>();
  for (const source of file.yieldSources) {
    byOrigin.set(source.origin, [...(byOrigin.get(source.origin) ?? []), source]);
  }

  return [...byOrigin].map(
    ([origin, entries]) =>
      new StaticYieldFeed(
        entries.map((entry) => ({
          name: entry.name,
          principal: entry.principalUsd,
          annualRatePercent: entry.annualRatePercent,
          protocolAddress: entry.protocolAddress,
        })),
        { origin, now },
      ),
  );
}
