/**
 * Per-task status messages: one chat message per download, edited as the
 * task moves from the queue to the worker and on to delivery.
 *
 * Design:
 * - The format menu message becomes the status message once a task is queued
 * - Edits for one task are applied in order; a failed edit is logged, never thrown
 * - Queue transitions are handled a microtask later, so a task dispatched
 *   during enqueue is attached before its first update runs
 */

import * as messages from "../bot/messages.ts";
import type { ChatTransport } from "../bot/transport.ts";
import type { DownloadTask, Identity, TaskState } from "./download-queue.ts";
import { describeError } from "./errors.ts";

// ============================================================================
// Types
// ============================================================================

export type StatusStage = "queued" | "downloading" | "sending" | "sent" | "failed" | "cancelled";

export interface StatusMessagesDeps {
  transport: Pick<ChatTransport, "sendStatus" | "editText">;
}

interface TrackedMessage {
  identity: Identity;
  /** Null until attached or first posted */
  messageId: number | null;
  /** Stage the message currently shows */
  shown: StatusStage | null;
  chain: Promise<void>;
}

// ============================================================================
// Helpers (pure functions)
// ============================================================================

/**
 * Status text for a stage, or null for stages shown by the menu reply itself.
 */
export function statusTextFor(task: DownloadTask, stage: StatusStage): string | null {
  const { label } = task.format;
  switch (stage) {
    case "queued":
      return null;
    case "downloading":
      return messages.downloadStarted(label, task.url);
    case "sending":
      return messages.sendingFile(
        label,
        task.result?.kind === "succeeded" ? task.result.artifact.fileSize : null,
      );
    case "sent":
      return messages.FILE_SENT;
    case "failed":
      return messages.downloadFailedStatus(label, task.url);
    case "cancelled":
      return messages.downloadCancelledStatus(label, task.url);
  }
}

// ============================================================================
// Status Messages Factory
// ============================================================================

/**
 * Create the status message tracker.
 */
export function createStatusMessages(deps: StatusMessagesDeps) {
  const { transport } = deps;
  const tracked = new Map<string, TrackedMessage>();

  function entryFor(taskId: string, identity: Identity): TrackedMessage {
    let entry = tracked.get(taskId);
    if (!entry) {
      entry = { identity, messageId: null, shown: null, chain: Promise.resolve() };
      tracked.set(taskId, entry);
    }
    return entry;
  }

  async function apply(task: DownloadTask, entry: TrackedMessage, stage: StatusStage): Promise<void> {
    if (entry.shown === stage) return;
    const text = statusTextFor(task, stage);
    if (text === null) return;

    try {
      if (entry.messageId === null) {
        entry.messageId = await transport.sendStatus(entry.identity, text);
      } else {
        await transport.editText(entry.identity, entry.messageId, text);
      }
      entry.shown = stage;
    } catch (e) {
      console.error(`[status] Failed to show ${stage} for task ${task.id}: ${describeError(e)}`);
    }
  }

  /**
   * Use an existing message (the format menu) as the task's status message.
   */
  function attach(taskId: string, identity: Identity, messageId: number, shown: StatusStage): void {
    const entry = entryFor(taskId, identity);
    entry.messageId = messageId;
    entry.shown = shown;
  }

  /**
   * Show a stage. Resolves once this and every earlier update for the task
   * has been applied; never rejects.
   */
  function update(task: DownloadTask, stage: StatusStage): Promise<void> {
    const entry = entryFor(task.id, task.identity);
    entry.chain = entry.chain.then(() => apply(task, entry, stage));
    return entry.chain;
  }

  /**
   * Queue transition hook: announce the start of a download that waited.
   */
  function onTransition(task: DownloadTask, from: TaskState | null): void {
    if (from !== "queued" || task.state !== "running") return;
    const entry = entryFor(task.id, task.identity);
    entry.chain = entry.chain.then(() => apply(task, entry, "downloading"));
  }

  /**
   * Drop a task once its outcome was delivered.
   */
  function forget(taskId: string): void {
    tracked.delete(taskId);
  }

  function size(): number {
    return tracked.size;
  }

  return {
    attach,
    update,
    onTransition,
    forget,
    size,
  };
}

/**
 * Type for the status messages instance.
 */
export type StatusMessages = ReturnType<typeof createStatusMessages>;
