/**
 * Tests for ledger view and mode routes.
 */

import { describe, it, expect } from "vitest";
import { DAY_MS, createTestApp, jsonRequest } from "../setup.js";

interface DataBody<T> {
  data: T;
}

describe("ledger routes", () => {
  it("GET /api/v1/status accrues before reporting", async () => {
    const { app, clock } = createTestApp();
    clock.advance(DAY_MS);

    const res = await app.request("/api/v1/status");

    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<{ accruedYield: string; availableBudget: string }>;
    expect(body.data.accruedYield).toBe("10.000000");
    expect(body.data.availableBudget).toBe("8.000000");
  });

  it("GET /api/v1/budget returns the breakdown", async () => {
    const { app } = createTestApp({ ledger: { accruedYield: "100", spentFromYield: "20" } });

    const res = await app.request("/api/v1/budget");

    const body = (await res.json()) as DataBody<{ net: string; available: string; reserved: string }>;
    expect(body.data).toMatchObject({
      net: "80.000000",
      available: "64.000000",
      reserved: "16.000000",
    });
  });

  it("GET /api/v1/yield lists sources", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/yield");

    const body = (await res.json()) as DataBody<{
      totalDailyYield: string;
      sources: { name: string; hourlyYield: string }[];
    }>;
    expect(body.data.totalDailyYield).toBe("10.000000");
    expect(body.data.sources.map((s) => [s.name, s.hourlyYield])).toEqual([
      ["Savings", "0.416666"],
    ]);
  });

  describe("mode", () => {
    it("GET returns the active mode", async () => {
      const { app } = createTestApp();

      const res = await app.request("/api/v1/mode");

      const body = (await res.json()) as DataBody<{ mode: string; retentionPercent: number }>;
      expect(body.data.mode).toBe("balanced");
      expect(body.data.retentionPercent).toBe(80);
    });

    it("PUT changes the mode and recomputes the budget", async () => {
      const { app, store } = createTestApp({ ledger: { accruedYield: "100" } });

      const res = await app.request(jsonRequest("/api/v1/mode", "PUT", { mode: "conservative" }));

      expect(res.status).toBe(200);
      const body = (await res.json()) as DataBody<{ mode: string; availableBudget: string }>;
      expect(body.data.mode).toBe("conservative");
      expect(body.data.availableBudget).toBe("50.000000");
      expect(store.latestSnapshot()?.mode).toBe("conservative");
    });

    it("PUT rejects unknown modes", async () => {
      const { app } = createTestApp();

      const res = await app.request(jsonRequest("/api/v1/mode", "PUT", { mode: "yolo" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "UNKNOWN_MODE", message: "Unknown spending mode 'yolo'" },
      });
    });

    it("PUT rejects a missing mode", async () => {
      const { app } = createTestApp();

      const res = await app.request(jsonRequest("/api/v1/mode", "PUT", {}));

      expect(res.status).toBe(400);
      const body = (await res.json()) as { error: { code: string; message: string } };
      expect(body.error.message).toBe("Request body validation failed");
    });

    it("PUT answers 503 when the snapshot cannot be written", async () => {
      const { app, store, service } = createTestApp();
      store.snapshotFailures = 2;

      const res = await app.request(jsonRequest("/api/v1/mode", "PUT", { mode: "growth" }));

      expect(res.status).toBe(503);
      expect(service.mode().mode).toBe("growth");
    });
  });
});
