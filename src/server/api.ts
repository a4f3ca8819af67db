/**
 * Read-only status API.
 *
 * Endpoints:
 * - GET /api/status - Uptime, queue, lookup pool, selection store and temp file state
 */

import { type Context, Hono } from "hono";
import type { DownloadQueue, QueueStats } from "../services/download-queue.ts";
import type { SelectionStore } from "../services/selection-store.ts";
import type { TempFileManager, TempFilesState } from "../services/temp-files.ts";
import type { WorkerPool, WorkerPoolStats } from "../services/worker-pool.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * API dependencies.
 */
export interface ApiDependencies {
  queue: Pick<DownloadQueue, "getStats">;
  selections: Pick<SelectionStore, "size">;
  tempFiles: Pick<TempFileManager, "getState">;
  lookupPool: Pick<WorkerPool, "getStats">;
  now?: () => number;
}

/**
 * Service status response.
 */
export interface StatusResponse {
  status: "ok" | "shutting_down";
  version: string;
  uptime: number;
  queue: QueueStats;
  lookups: WorkerPoolStats;
  selections: number;
  tempFiles: TempFilesState;
}

export const VERSION = "0.1.0";

// ============================================================================
// API Factory
// ============================================================================

/**
 * Create the API router.
 */
export function createApiRouter(deps: ApiDependencies) {
  const now = deps.now ?? Date.now;
  const startTime = now();

  const api = new Hono();

  api.get("/status", (c: Context) => {
    const queue = deps.queue.getStats();
    const status: StatusResponse = {
      status: queue.shuttingDown ? "shutting_down" : "ok",
      version: VERSION,
      uptime: Math.floor((now() - startTime) / 1000),
      queue,
      lookups: deps.lookupPool.getStats(),
      selections: deps.selections.size(),
      tempFiles: deps.tempFiles.getState(),
    };
    return c.json(status);
  });

  return api;
}
