/**
 * Tests for GuardianService.
 *
 * Verifies:
 * - Views accrue first and derive from the published state
 * - Refresh keeps an origin's sources when its feed observes nothing
 * - Detected transfers are booked once, including against concurrent API
 *   bookings and transfers paid through the guardian
 * - Failed audit writes are queued and written later
 * - transfer() checks the budget before paying and books after
 * - setMode() persists a snapshot
 */

import { describe, it, expect } from "vitest";
import {
  BudgetExceededError,
  CollaboratorUnavailableError,
  ConfigurationError,
  UnknownModeError,
  ValidationError,
} from "@yield-guardian/types";
import { verifySnapshotIntegrity } from "@yield-guardian/audit-store";
import {
  DAY_MS,
  FakeExecutor,
  FakeFeed,
  FlakyAuditStore,
  SAVINGS,
  START,
  createTestGuardian,
  transferEvent,
} from "../setup.js";

describe("GuardianService", () => {
  describe("views", () => {
    it("status accrues a day of yield and renders the summary", async () => {
      const { service, clock } = createTestGuardian();
      clock.advance(DAY_MS);

      const status = await service.status();

      expect(status.accruedYield).toBe("10.000000");
      expect(status.availableBudget).toBe("8.000000");
      expect(status.retentionPercent).toBe(80);
      expect(status.lastAccrualAt).toBe("2026-01-02T00:00:00.000Z");
      expect(status.summary).toBe(
        [
          "Yield Guardian Status",
          "Principal Protected: $36,500.00",
          "Yield Accrued: $10.00",
          "Yield Spent: $0.00",
          "Available Budget: $8.00",
          "Mode: Balanced (80%)",
          "Daily Yield: $10.00/day",
        ].join("\n"),
      );
    });

    it("budgetDetails reports net, reserved and projections", async () => {
      const { service, clock } = createTestGuardian();
      clock.advance(DAY_MS);
      await service.recordSpend("2");

      const budget = await service.budgetDetails();

      expect(budget).toEqual({
        accrued: "10.000000",
        spent: "2.000000",
        net: "8.000000",
        mode: "balanced",
        retentionPercent: 80,
        available: "6.400000",
        reserved: "1.600000",
        projections: {
          daily: "10.000000",
          weekly: "70.000000",
          monthly: "300.000000",
        },
      });
    });

    it("yieldDetails lists sources with derived yields", async () => {
      const { service } = createTestGuardian();

      const view = await service.yieldDetails();

      expect(view.totalDailyYield).toBe("10.000000");
      expect(view.sources).toHaveLength(1);
      expect(view.sources[0]?.name).toBe("Savings");
      expect(view.sources[0]?.dailyYield).toBe("10.000000");
    });

    it("does not accrue below the threshold", async () => {
      const { service, clock } = createTestGuardian();
      clock.advance(60_000);

      const status = await service.status();

      expect(status.accruedYield).toBe("0.000000");
    });
  });

  describe("refreshSources", () => {
    it("replaces, keeps or reports each origin independently", async () => {
      const aave = { ...SAVINGS, name: "Aave V3 USDC", origin: "aave_v3", principal: "73000" };
      const feeds = [
        new FakeFeed("aave_v3", () => [aave]),
        new FakeFeed("manual", () => []),
        new FakeFeed("broken", () => {
          throw new Error("rpc timeout");
        }),
      ];
      const { service } = createTestGuardian({ feeds });

      const outcomes = await service.refreshSources();

      expect(outcomes).toEqual([
        { origin: "aave_v3", outcome: "replaced", count: 1 },
        { origin: "manual", outcome: "kept" },
        { origin: "broken", outcome: "failed", error: "feed:broken: rpc timeout" },
      ]);
      // 10/day from savings, 20/day from aave
      expect(service.current().totalDailyYield).toBe("30.000000");
    });

    it("reports a feed returning an invalid source without changing the ledger", async () => {
      const bad = { ...SAVINGS, origin: "aave_v3", principal: "-5" };
      const { service } = createTestGuardian({
        feeds: [new FakeFeed("aave_v3", () => [bad])],
      });

      const [outcome] = await service.refreshSources();

      expect(outcome?.outcome).toBe("failed");
      expect(service.current().sources).toHaveLength(1);
    });

    it("rejects a malformed source from a feed", async () => {
      const { service } = createTestGuardian({
        feeds: [new FakeFeed("aave_v3", () => [{ ...SAVINGS, origin: "" }])],
      });

      const outcomes = await service.refreshSources();

      expect(outcomes).toEqual([
        { origin: "aave_v3", outcome: "failed", error: "Feed aave_v3 returned a malformed yield source" },
      ]);
      expect(service.current().sources.map((source) => source.origin)).toEqual(["manual"]);
    });
  });

  describe("processTransfers", () => {
    it("books outgoing transfers and only records the rest", async () => {
      const { service, detector, clock, store } = createTestGuardian({
        ledger: { accruedYield: "100" },
      });
      detector.push([
        transferEvent({ id: "0xa:0", amount: "30", counterparty: "0xshop" }),
        transferEvent({ id: "0xb:0", amount: "500", direction: "in" }),
        transferEvent({ id: "0xc:0", amount: "0" }),
        transferEvent({ id: "0xd:0", amount: "abc" }),
      ]);
      clock.advance(1000);

      const results = await service.processTransfers();

      expect(results.map((r) => [r.record.id, r.record.status])).toEqual([
        ["0xa:0", "within_budget"],
        ["0xb:0", "detected"],
        ["0xc:0", "detected"],
      ]);
      expect(results[0]?.decision?.message).toBe("Spent $30.00 from yield ($50.00 remaining)");
      expect(results[1]?.decision).toBeUndefined();
      expect(service.current().spentFromYield).toBe("30.000000");
      expect(store.getTransaction("0xa:0")?.recordedAt).toBe("2026-01-01T00:00:01.000Z");
      expect(store.getTransaction("0xd:0")).toBeUndefined();
    });

    it("never books the same id twice", async () => {
      const { service, detector } = createTestGuardian({ ledger: { accruedYield: "100" } });
      detector.push([transferEvent({ id: "0xa:0", amount: "10" })]);
      detector.push([transferEvent({ id: "0xa:0", amount: "10" })]);

      await service.processTransfers();
      const second = await service.processTransfers();

      expect(second).toEqual([]);
      expect(service.current().spentFromYield).toBe("10.000000");
    });

    it("skips ids already persisted by a previous run", async () => {
      const first = createTestGuardian({ ledger: { accruedYield: "100" } });
      first.detector.push([transferEvent({ id: "0xa:0", amount: "10" })]);
      await first.service.processTransfers();

      const restarted = createTestGuardian({ store: first.store, ledger: { accruedYield: "100" } });
      restarted.detector.push([transferEvent({ id: "0xa:0", amount: "10" })]);

      expect(await restarted.service.processTransfers()).toEqual([]);
      expect(restarted.service.current().spentFromYield).toBe("0.000000");
    });

    it("skips malformed detector events", async () => {
      const { service, detector } = createTestGuardian({ ledger: { accruedYield: "100" } });
      detector.push([
        transferEvent({ id: "", amount: "10" }),
        transferEvent({ id: "0xb:0", amount: "5" }),
      ]);

      const results = await service.processTransfers();

      expect(results.map((r) => r.record.id)).toEqual(["0xb:0"]);
      expect(service.current().spentFromYield).toBe("5.000000");
    });

    it("wraps detector failures", async () => {
      const { service, detector } = createTestGuardian();
      detector.push(new Error("connection refused"));

      await expect(service.processTransfers()).rejects.toThrow(CollaboratorUnavailableError);
    });

    it("keeps a booking whose audit write failed and writes it later", async () => {
      const { service, detector, store } = createTestGuardian({ ledger: { accruedYield: "100" } });
      store.failures = 2;
      detector.push([transferEvent({ id: "0xa:0", amount: "10" })]);

      const [result] = await service.processTransfers();

      expect(result?.persisted).toBe(false);
      expect(store.getTransaction("0xa:0")).toBeUndefined();
      expect(service.current().spentFromYield).toBe("10.000000");

      await service.processTransfers();

      expect(store.getTransaction("0xa:0")?.status).toBe("within_budget");
      expect(service.current().spentFromYield).toBe("10.000000");
    });

    it("survives a single transient write failure", async () => {
      const { service, detector, store } = createTestGuardian({ ledger: { accruedYield: "100" } });
      store.failures = 1;
      detector.push([transferEvent({ id: "0xa:0", amount: "10" })]);

      const [result] = await service.processTransfers();

      expect(result?.persisted).toBe(true);
    });
  });

  describe("recordSpend", () => {
    it("books the spend and writes an audit record", async () => {
      const { service, store } = createTestGuardian({ ledger: { accruedYield: "100" } });

      const { decision, record, persisted } = await service.recordSpend("90", { reference: "invoice-7" });

      expect(persisted).toBe(true);
      expect(decision.withinBudget).toBe(false);
      expect(decision.message).toBe("Over budget by $10.00! This dips into principal.");
      expect(record).toEqual({
        id: "invoice-7",
        timestamp: START.toISOString(),
        amount: "90.000000",
        asset: "USD",
        direction: "out",
        category: "manual",
        status: "over_budget",
        recordedAt: START.toISOString(),
      });
      expect(store.getTransaction("invoice-7")).toEqual(record);
    });

    it("books one of two concurrent spends with the same reference", async () => {
      const { service, store } = createTestGuardian({ ledger: { accruedYield: "100" } });

      const [first, second] = await Promise.allSettled([
        service.recordSpend("5", { reference: "invoice-9" }),
        service.recordSpend("5", { reference: "invoice-9" }),
      ]);

      expect(first.status).toBe("fulfilled");
      expect(second.status).toBe("rejected");
      expect(second.status === "rejected" ? second.reason : undefined).toBeInstanceOf(ValidationError);
      expect(service.current().spentFromYield).toBe("5.000000");
      expect(store.transactionIds().size).toBe(1);
    });

    it("books once when detection races a spend with the same id", async () => {
      const { service, detector } = createTestGuardian({ ledger: { accruedYield: "100" } });
      detector.push([transferEvent({ id: "0xa:0", amount: "5" })]);

      const [detected, recorded] = await Promise.all([
        service.processTransfers(),
        service.recordSpend("5", { reference: "0xa:0" }),
      ]);

      expect(detected).toEqual([]);
      expect(recorded.record.id).toBe("0xa:0");
      expect(service.current().spentFromYield).toBe("5.000000");
    });

    it("releases the reference when booking fails", async () => {
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" } });

      await expect(service.recordSpend("1.0000001", { reference: "invoice-3" })).rejects.toThrow(
        ValidationError,
      );
      const { record } = await service.recordSpend("1", { reference: "invoice-3" });

      expect(record.amount).toBe("1.000000");
      expect(service.current().spentFromYield).toBe("1.000000");
    });

    it("queues the record when its audit write fails", async () => {
      const { service, store } = createTestGuardian({ ledger: { accruedYield: "100" } });
      store.failures = 2;

      const result = await service.recordSpend("5", { reference: "inv-1" });

      expect(result.persisted).toBe(false);
      expect(store.getTransaction("inv-1")).toBeUndefined();
      expect(service.pendingWrites).toBe(1);

      await service.processTransfers();

      expect(store.getTransaction("inv-1")?.status).toBe("within_budget");
      expect(service.pendingWrites).toBe(0);
      expect(service.current().spentFromYield).toBe("5.000000");
    });

    it("rejects a reference that is already recorded", async () => {
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" } });
      await service.recordSpend("5", { reference: "invoice-7" });

      await expect(service.recordSpend("5", { reference: "invoice-7" })).rejects.toThrow(
        ValidationError,
      );
      expect(service.current().spentFromYield).toBe("5.000000");
    });

    it("claims the reference so detection does not book it again", async () => {
      const { service, detector } = createTestGuardian({ ledger: { accruedYield: "100" } });
      await service.recordSpend("5", { reference: "0xa:0" });
      detector.push([transferEvent({ id: "0xa:0", amount: "5" })]);

      expect(await service.processTransfers()).toEqual([]);
      expect(service.current().spentFromYield).toBe("5.000000");
    });

    it("rejects negative amounts without booking", async () => {
      const { service } = createTestGuardian();

      await expect(service.recordSpend("-1")).rejects.toThrow(ValidationError);
      expect(service.current().spentFromYield).toBe("0.000000");
    });
  });

  describe("transfer", () => {
    it("requires an executor", async () => {
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" } });

      await expect(service.transfer("5")).rejects.toThrow(ConfigurationError);
    });

    it("pays, books, records and snapshots", async () => {
      const executor = new FakeExecutor();
      const { service, store } = createTestGuardian({
        ledger: { accruedYield: "100" },
        executor,
      });

      const result = await service.transfer("25");

      expect(executor.executed).toEqual(["25.000000"]);
      expect(result.decision.message).toBe("Spent $25.00 from yield ($55.00 remaining)");
      expect(result.persisted).toBe(true);
      expect(result.record).toMatchObject({
        id: "0xtx1",
        amount: "25.000000",
        direction: "out",
        category: "transfer",
        status: "within_budget",
        counterparty: "0x3333333333333333333333333333333333333333",
      });
      const snapshot = store.latestSnapshot();
      expect(snapshot?.spentFromYield).toBe("25.000000");
      expect(snapshot !== undefined && verifySnapshotIntegrity(snapshot)).toBe(true);
    });

    it("refuses an amount above the budget without paying", async () => {
      const executor = new FakeExecutor();
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" }, executor });

      const err = await service.transfer("105").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BudgetExceededError);
      expect(err).toMatchObject({ requested: "$105.00", available: "$80.00" });
      expect(executor.executed).toEqual([]);
    });

    it("refuses a zero amount", async () => {
      const executor = new FakeExecutor();
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" }, executor });

      await expect(service.transfer("0")).rejects.toThrow("Transfer amount must be greater than zero");
      expect(executor.executed).toEqual([]);
    });

    it("does not book a failed execution", async () => {
      const executor = new FakeExecutor();
      executor.result = () => ({ success: false, error: "Insufficient USDC. Have $10.00, need $25.00" });
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" }, executor });

      await expect(service.transfer("25")).rejects.toThrow(
        "transfer-executor: Insufficient USDC. Have $10.00, need $25.00",
      );
      expect(service.current().spentFromYield).toBe("0.000000");
    });

    it("reports an unpersisted transfer instead of failing", async () => {
      const executor = new FakeExecutor();
      const store = new FlakyAuditStore();
      store.failures = 2;
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" }, executor, store });

      const result = await service.transfer("10");

      expect(result.persisted).toBe(false);
      expect(service.current().spentFromYield).toBe("10.000000");
      expect(store.getTransaction("0xtx1")).toBeUndefined();

      await service.processTransfers();

      expect(store.getTransaction("0xtx1")?.category).toBe("transfer");
    });

    it("does not book the paid transfer again when it is detected on-chain", async () => {
      const executor = new FakeExecutor();
      const { service, detector } = createTestGuardian({ ledger: { accruedYield: "100" }, executor });

      await service.transfer("10");
      detector.push([
        transferEvent({ id: "0xtx1:0", amount: "10" }),
        transferEvent({ id: "0xtx1:1", amount: "10", direction: "in" }),
      ]);
      const results = await service.processTransfers();

      expect(results.map((r) => [r.record.id, r.record.status])).toEqual([["0xtx1:1", "detected"]]);
      expect(service.current().spentFromYield).toBe("10.000000");
    });

    it("recognizes a paid transfer after a restart", async () => {
      const first = createTestGuardian({ ledger: { accruedYield: "100" }, executor: new FakeExecutor() });
      await first.service.transfer("10");

      const restarted = createTestGuardian({ store: first.store, ledger: { accruedYield: "100" } });
      restarted.detector.push([transferEvent({ id: "0xtx1:0", amount: "10" })]);

      expect(await restarted.service.processTransfers()).toEqual([]);
      expect(restarted.service.current().spentFromYield).toBe("0.000000");
    });
  });

  describe("setMode", () => {
    it("changes the mode and writes a snapshot", async () => {
      const { service, store } = createTestGuardian({ ledger: { accruedYield: "100" } });

      const view = await service.setMode("GROWTH");

      expect(view).toEqual({
        mode: "growth",
        label: "Growth",
        retentionPercent: 30,
        availableBudget: "30.000000",
        modes: ["conservative", "balanced", "growth"],
      });
      expect(store.latestSnapshot()?.mode).toBe("growth");
    });

    it("rejects unknown modes", async () => {
      const { service, store } = createTestGuardian();

      await expect(service.setMode("yolo")).rejects.toThrow(UnknownModeError);
      expect(store.latestSnapshot()).toBeUndefined();
    });
  });

  describe("checkSpend", () => {
    it("estimates days to afford a shortfall", async () => {
      const { service } = createTestGuardian({ ledger: { accruedYield: "100" } });

      const check = await service.checkSpend("105");

      expect(check.withinBudget).toBe(false);
      if (!check.withinBudget) {
        expect(check.overage).toBe("25.000000");
        expect(check.daysToAfford).toBe(2.5);
      }
    });
  });

  describe("agentStatus", () => {
    it("returns the executor wallet", async () => {
      const { service } = createTestGuardian({ executor: new FakeExecutor() });

      const status = await service.agentStatus();

      expect(status.usdcBalance).toBe("250.000000");
    });
  });

  describe("close", () => {
    it("marks the service not ready", async () => {
      const { service } = createTestGuardian();

      await service.close();

      expect(service.ready).toBe(false);
    });
  });
});
