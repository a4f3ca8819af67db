/**
 * Delivery and error reporting for terminal download tasks.
 *
 * Design:
 * - deliver() never throws; every path ends in a user response or a log line
 * - Users only ever see texts derived from the error classification
 * - Operators get full diagnostics for unknown errors and repeated failures
 * - The task's status message, when tracked, follows each step
 */

import { escapeHtml, formatBytes } from "../bot/messages.ts";
import type { ChatTransport } from "../bot/transport.ts";
import type { Identity, TerminalTask } from "./download-queue.ts";
import {
  type DownloadError,
  OutputTooLargeError,
  describeError,
} from "./errors.ts";
import type { StatusMessages } from "./status-messages.ts";

// ============================================================================
// Types
// ============================================================================

export interface DeliveryConfig {
  transport: ChatTransport;
  maxOutputSizeBytes: number;
  /** Two failures for one identity inside this window page the operator */
  repeatFailureWindowMs: number;
  status?: Pick<StatusMessages, "update" | "forget">;
}

export type DeliveryOutcome =
  | "delivered"
  | "failure_reported"
  | "cancel_acknowledged"
  | "silent"
  | "delivery_failed";

export interface DeliveryReport {
  outcome: DeliveryOutcome;
  escalated: boolean;
}

export const GENERIC_FAILURE_TEXT =
  "❌ <b>Download Failed</b>\n\nSomething went wrong while sending your file. Please try again later.";

// ============================================================================
// Texts (pure functions)
// ============================================================================

/**
 * User-safe text for a failure. Never includes the raw error message.
 */
export function userMessageFor(error: DownloadError): string {
  switch (error.type) {
    case "transient_network":
      return "📡 <b>Network Problem</b>\n\nThe source could not be reached. Please try again in a few minutes.";
    case "source_unavailable":
      return "🚫 <b>Unavailable</b>\n\nThis media is unavailable. It may be private, removed or restricted.";
    case "format_unavailable":
      return "🚫 <b>Format Unavailable</b>\n\nThis format cannot be downloaded for this link. Try another one.";
    case "output_too_large": {
      const limit = error instanceof OutputTooLargeError ? ` (limit ${formatBytes(error.limitBytes)})` : "";
      return `📦 <b>File Too Large</b>\n\nThe file is too large to send${limit}. Try a lower quality or audio only.`;
    }
    case "timeout":
      return "⏱ <b>Timed Out</b>\n\nThe download took too long and was stopped. Try a lower quality or try again later.";
    case "unknown":
      return "❌ <b>Download Failed</b>\n\nSomething went wrong. The administrator has been notified.";
  }
}

/**
 * Operator notification text.
 */
export function formatOperatorReport(message: string, data: Record<string, unknown> = {}): string {
  const parts = ["⚠️ ERROR ⚠️", "", message];
  const entries = Object.entries(data).filter(([, value]) => value !== undefined);

  if (entries.length > 0) {
    parts.push("", "Additional data:");
    for (const [key, value] of entries) {
      parts.push(`- ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
    }
  }

  return parts.join("\n");
}

/**
 * Caption for a delivered file: title and chosen quality.
 */
export function buildCaption(task: TerminalTask, title: string): string {
  const icon = task.format.kind === "audio" ? "🎵" : "🎬";
  const shortTitle = title.length > 200 ? `${title.slice(0, 197)}...` : title;
  return `${icon} <b>${escapeHtml(shortTitle)}</b>\n${escapeHtml(task.format.label)}`;
}

export const CANCEL_ACK_TEXT = "🛑 <b>Download Cancelled</b>";

// ============================================================================
// Delivery Reporter Factory
// ============================================================================

/**
 * Create a delivery reporter.
 */
export function createDeliveryReporter(config: DeliveryConfig, now: () => number = Date.now) {
  const { transport, status } = config;
  // identity -> timestamps of recent failures
  const recentFailures = new Map<string, number[]>();

  /**
   * Record a failure and report whether it repeats one inside the window.
   */
  function recordFailure(identity: Identity): boolean {
    const at = now();
    const key = String(identity);
    const cutoff = at - config.repeatFailureWindowMs;

    if (recentFailures.size > 1000) {
      for (const [otherKey, stamps] of recentFailures) {
        if (stamps.every((stamp) => stamp <= cutoff)) recentFailures.delete(otherKey);
      }
    }

    const stamps = (recentFailures.get(key) ?? []).filter((stamp) => stamp > cutoff);
    const repeated = stamps.length > 0;
    stamps.push(at);
    recentFailures.set(key, stamps);
    return repeated;
  }

  async function notifyOperatorSafely(text: string): Promise<boolean> {
    try {
      await transport.notifyOperator(text);
      return true;
    } catch (e) {
      console.error(`[delivery] Operator notification failed: ${describeError(e)}`);
      return false;
    }
  }

  async function reportFailure(task: TerminalTask, error: DownloadError): Promise<DeliveryReport> {
    const repeated = recordFailure(task.identity);
    const escalate = error.type === "unknown" || repeated;

    await status?.update(task, "failed");
    await transport.sendText(task.identity, userMessageFor(error));

    let escalated = false;
    if (escalate) {
      escalated = await notifyOperatorSafely(
        formatOperatorReport(
          repeated ? "Repeated download failure" : "Download failed with an unexpected error",
          {
            classification: error.type,
            identity: task.identity,
            taskId: task.id,
            url: task.url,
            format: task.format.label,
            attempts: task.attempt,
            error: error.message,
            stack: describeError(error.cause ?? error).slice(0, 2000),
          },
        ),
      );
    }

    return { outcome: "failure_reported", escalated };
  }

  async function deliverSuccess(
    task: TerminalTask,
    filePath: string,
    fileSize: number,
    title: string,
  ): Promise<DeliveryReport> {
    if (fileSize > config.maxOutputSizeBytes) {
      return reportFailure(
        task,
        new OutputTooLargeError(fileSize, config.maxOutputSizeBytes, { taskId: task.id }),
      );
    }

    await status?.update(task, "sending");
    try {
      await transport.sendDocument(task.identity, filePath, buildCaption(task, title));
    } catch (error) {
      if (error instanceof OutputTooLargeError) return reportFailure(task, error);
      throw error;
    }
    await status?.update(task, "sent");

    console.log(`[delivery] Delivered task ${task.id} to ${task.identity} (${formatBytes(fileSize)})`);
    return { outcome: "delivered", escalated: false };
  }

  /**
   * Send the outcome of a terminal task to its user.
   */
  async function deliver(task: TerminalTask): Promise<DeliveryReport> {
    try {
      const { result } = task;
      switch (result.kind) {
        case "succeeded":
          return await deliverSuccess(
            task,
            result.artifact.filePath,
            result.artifact.fileSize,
            result.artifact.title,
          );
        case "failed":
          return await reportFailure(task, result.error);
        case "cancelled":
          if (result.by !== "user") return { outcome: "silent", escalated: false };
          await status?.update(task, "cancelled");
          await transport.sendText(task.identity, CANCEL_ACK_TEXT);
          return { outcome: "cancel_acknowledged", escalated: false };
      }
    } catch (error) {
      console.error(`[delivery] Delivery of task ${task.id} failed: ${describeError(error)}`);
      await status?.update(task, "failed");

      try {
        await transport.sendText(task.identity, GENERIC_FAILURE_TEXT);
      } catch (secondary) {
        console.error(
          `[delivery] Fallback notification for task ${task.id} failed: ${describeError(secondary)}`,
        );
      }

      const escalated = await notifyOperatorSafely(
        formatOperatorReport("Delivery failed", {
          identity: task.identity,
          taskId: task.id,
          url: task.url,
          format: task.format.label,
          error: describeError(error).slice(0, 2000),
        }),
      );
      return { outcome: "delivery_failed", escalated };
    } finally {
      status?.forget(task.id);
    }
  }

  return {
    deliver,
  };
}

/**
 * Type for the delivery reporter instance.
 */
export type DeliveryReporter = ReturnType<typeof createDeliveryReporter>;
