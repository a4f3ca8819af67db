/**
 * Download queue: accepts tasks, enforces limits, runs them through a bounded
 * worker pool and hands every terminal task to delivery exactly once.
 *
 * States: queued -> running -> succeeded | failed | cancelled.
 *
 * Design:
 * - All queue state is private to this closure; callers only see snapshots
 * - Limits are checked synchronously in enqueue, before any mutation
 * - Strict FIFO dispatch; a slot frees at the terminal transition
 * - The per-task deadline covers every retry attempt
 * - Positions come from an index rebuilt lazily after pending changes
 */

import {
  CancelledError,
  type DownloadError,
  OutputTooLargeError,
  RejectedError,
  TransientNetworkError,
  describeError,
  toDownloadError,
} from "./errors.ts";
import type { TempFileManager, TempLease } from "./temp-files.ts";
import { createWorkerPool } from "./worker-pool.ts";
import type { Artifact, FormatSpec } from "./ytdlp-types.ts";

// ============================================================================
// Types
// ============================================================================

/** Opaque chat-side user key */
export type Identity = number | string;

export type TaskState = "queued" | "running" | "succeeded" | "failed" | "cancelled";

export type CancelledBy = "user" | "system";

export type TaskResult =
  | { kind: "succeeded"; artifact: Artifact }
  | { kind: "failed"; error: DownloadError }
  | { kind: "cancelled"; by: CancelledBy };

export interface DownloadTask {
  id: string;
  identity: Identity;
  url: string;
  format: FormatSpec;
  state: TaskState;
  enqueuedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  /** 1-based attempt number, 0 before the first attempt */
  attempt: number;
  result: TaskResult | null;
}

/** A task in a terminal state, as handed to delivery */
export type TerminalTask = DownloadTask & { result: TaskResult };

export interface QueueConfig {
  maxConcurrentDownloads: number;
  maxQueueSize: number;
  maxTasksPerUser: number;
  /** Wall-clock bound for one task, all attempts included */
  taskTimeoutMs: number;
  /** Immediate retries after a transient network failure */
  maxRetryAttempts: number;
  maxOutputSizeBytes: number;
}

export type FetchFn = (
  url: string,
  format: FormatSpec,
  destDir: string,
  signal: AbortSignal,
) => Promise<Artifact>;

export interface QueueDependencies {
  fetch: FetchFn;
  tempFiles: Pick<TempFileManager, "acquire">;
  /** Called exactly once per terminal task */
  deliver: (task: TerminalTask) => Promise<unknown>;
  onTransition?: (task: DownloadTask, from: TaskState | null) => void;
  now?: () => number;
}

export type EnqueueResult =
  | { ok: true; task: DownloadTask; position: number }
  | { ok: false; error: RejectedError };

export type CancelResult =
  | { ok: true; state: TaskState }
  | { ok: false; error: "not_found" };

export interface QueuedSummary {
  taskId: string;
  position: number;
  url: string;
  formatLabel: string;
}

export interface RunningSummary {
  taskId: string;
  url: string;
  formatLabel: string;
  startedAt: number;
  attempt: number;
}

export interface IdentityStatus {
  queued: QueuedSummary[];
  running: RunningSummary[];
}

export interface QueueStats {
  pending: number;
  inFlight: number;
  activeIdentities: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  maxConcurrentDownloads: number;
  maxQueueSize: number;
  maxTasksPerUser: number;
  shuttingDown: boolean;
}

interface TaskRecord {
  task: DownloadTask;
  controller: AbortController;
  cancelledBy: CancelledBy | null;
  delivered: boolean;
}

// ============================================================================
// Download Queue Factory
// ============================================================================

/**
 * Create a download queue.
 */
export function createDownloadQueue(config: QueueConfig, deps: QueueDependencies) {
  const now = deps.now ?? Date.now;
  const pool = createWorkerPool({
    name: "download",
    size: config.maxConcurrentDownloads,
    timeoutMs: config.taskTimeoutMs,
  });

  const pending: TaskRecord[] = [];
  const inFlight = new Map<string, TaskRecord>();
  const live = new Map<string, TaskRecord>();
  const byIdentity = new Map<string, Set<TaskRecord>>();
  const work = new Set<Promise<void>>();

  let positions = new Map<string, number>();
  let positionsDirty = false;
  let seq = 0;
  let shuttingDown = false;
  const totals = { succeeded: 0, failed: 0, cancelled: 0 };

  // --------------------------------------------------------------------------
  // Internal helpers
  // --------------------------------------------------------------------------

  function identityKey(identity: Identity): string {
    return String(identity);
  }

  function snapshot(task: DownloadTask): DownloadTask {
    return { ...task };
  }

  function transition(record: TaskRecord, to: TaskState): void {
    const from = record.task.state;
    record.task.state = to;
    notify(record.task, from);
  }

  function notify(task: DownloadTask, from: TaskState | null): void {
    if (!deps.onTransition) return;
    try {
      deps.onTransition(snapshot(task), from);
    } catch (e) {
      console.error(`[queue] onTransition hook failed: ${describeError(e)}`);
    }
  }

  function positionOf(taskId: string): number {
    if (positionsDirty) {
      positions = new Map(pending.map((record, index) => [record.task.id, index + 1]));
      positionsDirty = false;
    }
    return positions.get(taskId) ?? 0;
  }

  function track(promise: Promise<void>): void {
    work.add(promise);
    promise
      .catch((e: unknown) => {
        console.error(`[queue] Unhandled task failure: ${describeError(e)}`);
      })
      .finally(() => work.delete(promise));
  }

  /**
   * Move a task to its terminal state and release its slot and user count.
   */
  function finish(record: TaskRecord, result: TaskResult): TerminalTask {
    const { task } = record;
    task.finishedAt = now();
    task.result = result;
    inFlight.delete(task.id);
    live.delete(task.id);

    const key = identityKey(task.identity);
    const owned = byIdentity.get(key);
    owned?.delete(record);
    if (owned && owned.size === 0) byIdentity.delete(key);

    totals[result.kind]++;
    transition(record, result.kind);

    if (result.kind === "failed" && result.error.type === "unknown") {
      console.error(
        "[queue] Task failed with unknown error",
        JSON.stringify({
          taskId: task.id,
          identity: task.identity,
          url: task.url,
          format: task.format.label,
          error: describeError(result.error.cause ?? result.error),
        }),
      );
    }

    return { ...task, result };
  }

  /**
   * Hand a terminal task to delivery, then release its working directory.
   */
  async function deliverOnce(record: TaskRecord, terminal: TerminalTask, lease: TempLease | null) {
    if (record.delivered) return;
    record.delivered = true;
    try {
      await deps.deliver(terminal);
    } catch (e) {
      console.error(`[queue] Delivery of task ${terminal.id} threw: ${describeError(e)}`);
    } finally {
      await lease?.release();
    }
  }

  /**
   * Promote pending tasks while slots are free.
   */
  function pump(): void {
    while (!shuttingDown && inFlight.size < config.maxConcurrentDownloads) {
      const record = pending.shift();
      if (!record) break;
      positionsDirty = true;
      start(record);
    }
  }

  function start(record: TaskRecord): void {
    record.task.startedAt = now();
    inFlight.set(record.task.id, record);
    transition(record, "running");
    track(execute(record));
  }

  /**
   * Fetch with immediate retries for transient network failures.
   */
  async function fetchWithRetry(record: TaskRecord, destDir: string, signal: AbortSignal) {
    const { task } = record;
    for (let attempt = 1; ; attempt++) {
      task.attempt = attempt;
      try {
        return await deps.fetch(task.url, task.format, destDir, signal);
      } catch (error) {
        if (signal.aborted) throw error;
        if (error instanceof TransientNetworkError && attempt <= config.maxRetryAttempts) {
          console.log(
            `[queue] Task ${task.id} attempt ${attempt} failed (${error.message}), retrying`,
          );
          continue;
        }
        throw error;
      }
    }
  }

  async function execute(record: TaskRecord): Promise<void> {
    const { task } = record;
    const context = { taskId: task.id, url: task.url, format: task.format.label };
    let lease: TempLease | null = null;
    let result: TaskResult;

    try {
      lease = await deps.tempFiles.acquire(task.id);

      if (record.cancelledBy !== null) {
        throw new CancelledError("Cancelled before start", context);
      }
      const estimated = task.format.estimatedSizeBytes;
      if (estimated !== null && estimated > config.maxOutputSizeBytes) {
        throw new OutputTooLargeError(estimated, config.maxOutputSizeBytes, context);
      }

      const dir = lease.dir;
      const artifact = await pool.run((signal) => fetchWithRetry(record, dir, signal), {
        signal: record.controller.signal,
      });

      if (artifact.fileSize > config.maxOutputSizeBytes) {
        throw new OutputTooLargeError(artifact.fileSize, config.maxOutputSizeBytes, context);
      }

      // A cancelled task's result is discarded even when the download finished
      result = record.cancelledBy !== null
        ? { kind: "cancelled", by: record.cancelledBy }
        : { kind: "succeeded", artifact };
    } catch (error) {
      if (record.cancelledBy !== null || error instanceof CancelledError) {
        result = { kind: "cancelled", by: record.cancelledBy ?? "system" };
      } else {
        result = { kind: "failed", error: toDownloadError(error, context) };
      }
    }

    const terminal = finish(record, result);
    pump();
    await deliverOnce(record, terminal, lease);
  }

  // --------------------------------------------------------------------------
  // Public operations
  // --------------------------------------------------------------------------

  /**
   * Accept a task or reject it synchronously without touching queue state.
   */
  function enqueue(identity: Identity, url: string, format: FormatSpec): EnqueueResult {
    const context = { identity, url, format: format.label };

    if (shuttingDown) {
      return {
        ok: false,
        error: new RejectedError("shutting_down", "The queue is shutting down", context),
      };
    }

    if (pending.length + inFlight.size >= config.maxQueueSize) {
      return {
        ok: false,
        error: new RejectedError("queue_full", "The download queue is full", context),
      };
    }

    const owned = byIdentity.get(identityKey(identity));
    if (owned) {
      for (const record of owned) {
        if (record.task.url === url && record.task.format.tier === format.tier) {
          return {
            ok: false,
            error: new RejectedError("duplicate", "The same download is already queued", {
              ...context,
              taskId: record.task.id,
            }),
          };
        }
      }
      if (owned.size >= config.maxTasksPerUser) {
        return {
          ok: false,
          error: new RejectedError("user_limit", "Too many active downloads for this user", context),
        };
      }
    }

    const task: DownloadTask = {
      id: String(++seq),
      identity,
      url,
      format,
      state: "queued",
      enqueuedAt: now(),
      startedAt: null,
      finishedAt: null,
      attempt: 0,
      result: null,
    };
    const record: TaskRecord = {
      task,
      controller: new AbortController(),
      cancelledBy: null,
      delivered: false,
    };

    live.set(task.id, record);
    const key = identityKey(identity);
    const set = byIdentity.get(key) ?? new Set<TaskRecord>();
    set.add(record);
    byIdentity.set(key, set);
    pending.push(record);
    positionsDirty = true;
    notify(task, null);

    pump();

    const position = task.state === "queued" ? positionOf(task.id) : 0;
    return { ok: true, task: snapshot(task), position };
  }

  /**
   * Cancel a live task. Queued tasks end at once; running tasks are aborted
   * and end when the download call returns.
   */
  function cancel(taskId: string, by: CancelledBy = "user"): CancelResult {
    const record = live.get(taskId);
    if (!record) return { ok: false, error: "not_found" };

    if (record.task.state === "queued") {
      const index = pending.indexOf(record);
      if (index !== -1) pending.splice(index, 1);
      positionsDirty = true;
      record.cancelledBy = by;
      const terminal = finish(record, { kind: "cancelled", by });
      track(deliverOnce(record, terminal, null));
      return { ok: true, state: "cancelled" };
    }

    if (record.cancelledBy === null) {
      record.cancelledBy = by;
      record.controller.abort(new CancelledError("Cancelled", { taskId, by }));
    }
    return { ok: true, state: record.task.state };
  }

  /**
   * Cancel every live task of an identity. Returns how many were cancelled.
   */
  function cancelAllFor(identity: Identity, by: CancelledBy = "user"): number {
    const owned = byIdentity.get(identityKey(identity));
    if (!owned) return 0;

    let count = 0;
    for (const record of [...owned]) {
      if (record.cancelledBy !== null) continue;
      if (cancel(record.task.id, by).ok) count++;
    }
    return count;
  }

  /**
   * Queue positions and running tasks of one identity.
   */
  function status(identity: Identity): IdentityStatus {
    const result: IdentityStatus = { queued: [], running: [] };
    const owned = byIdentity.get(identityKey(identity));
    if (!owned) return result;

    for (const { task } of owned) {
      if (task.state === "queued") {
        result.queued.push({
          taskId: task.id,
          position: positionOf(task.id),
          url: task.url,
          formatLabel: task.format.label,
        });
      } else if (task.state === "running") {
        result.running.push({
          taskId: task.id,
          url: task.url,
          formatLabel: task.format.label,
          startedAt: task.startedAt ?? task.enqueuedAt,
          attempt: task.attempt,
        });
      }
    }

    result.queued.sort((a, b) => a.position - b.position);
    return result;
  }

  /**
   * Snapshot of a live task, or null once it reached a terminal state.
   */
  function getTask(taskId: string): DownloadTask | null {
    const record = live.get(taskId);
    return record ? snapshot(record.task) : null;
  }

  function getStats(): QueueStats {
    return {
      pending: pending.length,
      inFlight: inFlight.size,
      activeIdentities: byIdentity.size,
      succeeded: totals.succeeded,
      failed: totals.failed,
      cancelled: totals.cancelled,
      maxConcurrentDownloads: config.maxConcurrentDownloads,
      maxQueueSize: config.maxQueueSize,
      maxTasksPerUser: config.maxTasksPerUser,
      shuttingDown,
    };
  }

  /**
   * Stop accepting tasks, cancel everything and wait for running tasks to end.
   * Resolves with drained=false when the drain timeout passed first.
   */
  async function shutdown(options: { drainTimeoutMs: number }): Promise<{ drained: boolean }> {
    shuttingDown = true;

    for (const record of [...pending]) {
      cancel(record.task.id, "system");
    }
    for (const record of inFlight.values()) {
      cancel(record.task.id, "system");
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), options.drainTimeoutMs);
    });
    const drained = Promise.allSettled([...work]).then(() => true);

    try {
      return { drained: await Promise.race([drained, timeout]) };
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    enqueue,
    cancel,
    cancelAllFor,
    status,
    getTask,
    getStats,
    shutdown,
  };
}

/**
 * Type for the download queue instance.
 */
export type DownloadQueue = ReturnType<typeof createDownloadQueue>;
