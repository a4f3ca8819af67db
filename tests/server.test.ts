/**
 * Tests for the HTTP server and status API.
 */

import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { type ApiDependencies, createApiRouter } from "../src/server/api.ts";
import { type ServerDependencies, WEBHOOK_PATH, createServer } from "../src/server/index.ts";
import type { QueueStats } from "../src/services/download-queue.ts";

function queueStats(overrides: Partial<QueueStats> = {}): QueueStats {
  return {
    pending: 2,
    inFlight: 1,
    activeIdentities: 2,
    succeeded: 5,
    failed: 1,
    cancelled: 0,
    maxConcurrentDownloads: 3,
    maxQueueSize: 100,
    maxTasksPerUser: 5,
    shuttingDown: false,
    ...overrides,
  };
}

function createDeps(stats: QueueStats = queueStats(), clock = { now: 1000 }): ApiDependencies {
  return {
    queue: { getStats: () => stats },
    selections: { size: () => 4 },
    tempFiles: {
      getState: () => ({
        isRunning: true,
        activeLeases: 1,
        lastSweepAt: null,
        sweepsCompleted: 3,
        orphansRemovedTotal: 2,
        errors: [],
      }),
    },
    lookupPool: { getStats: () => ({ running: 1, waiting: 0, size: 4 }) },
    now: () => clock.now,
  };
}

describe("API Router", () => {
  describe("GET /status", () => {
    it("should return service status", async () => {
      const clock = { now: 1000 };
      const api = createApiRouter(createDeps(queueStats(), clock));
      clock.now = 6500;

      const res = await api.request("/status");

      assert.equal(res.status, 200);
      assert.deepEqual(await res.json(), {
        status: "ok",
        version: "0.1.0",
        uptime: 5,
        queue: queueStats(),
        lookups: { running: 1, waiting: 0, size: 4 },
        selections: 4,
        tempFiles: {
          isRunning: true,
          activeLeases: 1,
          lastSweepAt: null,
          sweepsCompleted: 3,
          orphansRemovedTotal: 2,
          errors: [],
        },
      });
    });

    it("should report shutdown", async () => {
      const api = createApiRouter(createDeps(queueStats({ shuttingDown: true })));

      const res = await api.request("/status");
      const body: unknown = await res.json();

      assert.ok(typeof body === "object" && body !== null && "status" in body);
      assert.equal(body.status, "shutting_down");
    });
  });
});

describe("createServer", () => {
  function create(overrides: Partial<ServerDependencies> = {}) {
    return createServer({ ...createDeps(), port: 0, logRequests: false, ...overrides });
  }

  describe("GET /health", () => {
    it("should report liveness", async () => {
      const res = await create().app.request("/health");

      assert.equal(res.status, 200);
      const body: unknown = await res.json();
      assert.ok(typeof body === "object" && body !== null && "status" in body && "timestamp" in body);
      assert.equal(body.status, "ok");
      assert.equal(typeof body.timestamp, "string");
    });
  });

  describe("API mount", () => {
    it("should serve the status API under /api", async () => {
      const res = await create().app.request("/api/status");
      assert.equal(res.status, 200);
    });

    it("should return 404 for unknown routes", async () => {
      const res = await create().app.request("/api/queue");
      assert.equal(res.status, 404);
    });
  });

  describe("webhook", () => {
    it("should hand the raw request to the webhook", async () => {
      const received: Array<{ method: string; secret: string | null; body: string }> = [];
      const server = create({
        webhook: {
          path: WEBHOOK_PATH,
          handle: async (request) => {
            received.push({
              method: request.method,
              secret: request.headers.get("X-Telegram-Bot-Api-Secret-Token"),
              body: await request.text(),
            });
            return new Response("ok", { status: 200 });
          },
        },
      });

      const res = await server.app.request(WEBHOOK_PATH, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Telegram-Bot-Api-Secret-Token": "test-secret",
        },
        body: JSON.stringify({ update_id: 1 }),
      });

      assert.equal(res.status, 200);
      assert.equal(await res.text(), "ok");
      assert.deepEqual(received, [{ method: "POST", secret: "test-secret", body: '{"update_id":1}' }]);
    });

    it("should only accept POST", async () => {
      const server = create({
        webhook: { path: WEBHOOK_PATH, handle: async () => new Response("ok") },
      });

      const res = await server.app.request(WEBHOOK_PATH);
      assert.equal(res.status, 404);
    });

    it("should not exist in polling mode", async () => {
      const res = await create().app.request(WEBHOOK_PATH, { method: "POST", body: "{}" });
      assert.equal(res.status, 404);
    });
  });

  describe("stop", () => {
    it("should resolve when the server never started", async () => {
      await create().stop();
    });
  });
});
