/**
 * Tests for health check endpoints.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
  });
});

describe("GET /ready", () => {
  it("is ready while the ledger is open", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; lastAccrualAt: string; pendingWrites: number };
    expect(body.status).toBe("ready");
    expect(body.lastAccrualAt).toBe("2026-01-01T00:00:00.000Z");
    expect(body.pendingWrites).toBe(0);
  });

  it("reports audit records waiting for a write", async () => {
    const { app, service, store } = createTestApp({ ledger: { accruedYield: "100" } });
    store.failures = 2;
    await service.recordSpend("5", { reference: "invoice-1" });

    const res = await app.request("/ready");

    const body = (await res.json()) as { pendingWrites: number };
    expect(body.pendingWrites).toBe(1);
  });

  it("returns 503 once the ledger is closed", async () => {
    const { app, service } = createTestApp();
    await service.close();

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("not_ready");
  });
});
