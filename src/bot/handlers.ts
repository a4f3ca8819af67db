/**
 * Chat handlers, independent of the transport.
 *
 * Every handler takes the sender and returns what to answer; the grammY
 * wiring in ./index.ts turns that into API calls.
 *
 * Design:
 * - Authorization is checked on every request and never cached
 * - Format lookups are awaited here; the wiring runs them off the update loop
 * - Queue rejections are answered immediately
 */

import type { Config } from "../config.ts";
import type { AuthDbClient } from "../db/auth-db.ts";
import { formatOperatorReport, userMessageFor } from "../services/delivery.ts";
import type { DownloadQueue, Identity } from "../services/download-queue.ts";
import { DownloadError, describeError } from "../services/errors.ts";
import type { FormatResolver, ResolvedMenu } from "../services/format-resolver.ts";
import type { SelectionStore } from "../services/selection-store.ts";
import type { StatusMessages } from "../services/status-messages.ts";
import * as messages from "./messages.ts";
import type { ChatTransport } from "./transport.ts";
import { extractUrl, isSupportedUrl } from "./urls.ts";

// ============================================================================
// Types
// ============================================================================

export interface Sender {
  id: number;
  username?: string | null;
}

export interface Button {
  text: string;
  data: string;
}

export interface Reply {
  text: string;
  buttons?: Button[][];
}

export interface CallbackReply {
  /** Short plain-text popup answering the button press */
  notice: string;
  /** Replaces the message that carried the menu */
  edit: Reply | null;
  /** Sent as a new message */
  send: Reply | null;
}

export interface HandlerDeps {
  config: Pick<Config, "adminUserId" | "allowedHosts" | "maxOutputSizeBytes">;
  authDb: Pick<
    AuthDbClient,
    | "isAuthorized"
    | "addUser"
    | "getUser"
    | "getAllUsers"
    | "deactivateUser"
    | "createInvite"
    | "useInvite"
    | "getInvite"
  >;
  resolver: Pick<FormatResolver, "resolve">;
  selections: Pick<SelectionStore, "create" | "get" | "setFormat" | "consume">;
  queue: Pick<DownloadQueue, "enqueue" | "cancelAllFor" | "status">;
  operator: Pick<ChatTransport, "notifyOperator">;
  statusMessages: Pick<StatusMessages, "attach">;
  /** Bot username, used in invite links */
  botUsername: () => string;
}

const CALLBACK_PATTERN = /^fmt:([a-z]+):([A-Za-z0-9_-]+)$/;
const BUTTONS_PER_ROW = 2;

// ============================================================================
// Helpers (pure functions)
// ============================================================================

/**
 * Parse `fmt:<optionId>:<token>` callback data.
 */
export function parseCallbackData(data: string): { optionId: string; token: string } | null {
  const match = CALLBACK_PATTERN.exec(data);
  if (!match || match[1] === undefined || match[2] === undefined) return null;
  return { optionId: match[1], token: match[2] };
}

export function buildCallbackData(optionId: string, token: string): string {
  return `fmt:${optionId}:${token}`;
}

function chunk<T>(items: T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    rows.push(items.slice(i, i + size));
  }
  return rows;
}

// ============================================================================
// Handlers Factory
// ============================================================================

/**
 * Create the chat handlers.
 */
export function createHandlers(deps: HandlerDeps) {
  const { config, authDb, queue, selections } = deps;

  function isAuthorized(sender: Sender): boolean {
    const result = authDb.isAuthorized(sender.id);
    if (!result.ok) {
      console.error(`[bot] Authorization check failed for ${sender.id}: ${result.error.message}`);
      return false;
    }
    return result.data;
  }

  function reportUnexpected(message: string, data: Record<string, unknown>): void {
    deps.operator.notifyOperator(formatOperatorReport(message, data)).catch((e: unknown) => {
      console.error(`[bot] Operator notification failed: ${describeError(e)}`);
    });
  }

  /**
   * /start, optionally with an invite code.
   */
  function start(sender: Sender, payload: string): Reply {
    const code = payload.trim();

    if (isAuthorized(sender)) {
      return { text: messages.WELCOME };
    }
    if (!code) {
      console.log(`[bot] Unauthorized access attempt: ${sender.id} (@${sender.username ?? "-"})`);
      return { text: messages.ACCESS_RESTRICTED };
    }

    const result = authDb.useInvite(code, sender.id, sender.username);
    if (!result.ok) {
      console.error(`[bot] Failed to redeem invite for ${sender.id}: ${result.error.message}`);
      return { text: messages.STORE_ERROR };
    }
    if (!result.data) {
      const invite = authDb.getInvite(code);
      const used = invite.ok && invite.data !== null && invite.data.usedBy !== null;
      return { text: used ? messages.INVITE_USED : messages.INVITE_INVALID };
    }

    console.log(`[bot] Invite redeemed by ${sender.id}`);
    return { text: `${messages.INVITE_ACCEPTED}\n\n${messages.WELCOME}` };
  }

  function help(sender: Sender): Reply {
    if (!isAuthorized(sender)) return { text: messages.ACCESS_RESTRICTED };
    return { text: messages.helpText(config.maxOutputSizeBytes) };
  }

  function invite(sender: Sender): Reply {
    if (!isAuthorized(sender)) return { text: messages.ACCESS_RESTRICTED };

    const result = authDb.createInvite(sender.id);
    if (!result.ok) {
      console.error(`[bot] Failed to create invite for ${sender.id}: ${result.error.message}`);
      return { text: messages.INVITE_FAILED };
    }

    console.log(`[bot] Invite created by ${sender.id}`);
    return {
      text: messages.inviteCreated(`https://t.me/${deps.botUsername()}?start=${result.data.code}`),
    };
  }

  /**
   * /adduser <id> (admin only).
   */
  function addUser(sender: Sender, args: string): Reply {
    if (sender.id !== config.adminUserId) {
      console.log(`[bot] Admin command attempt by non-admin: ${sender.id}`);
      return { text: messages.ADMIN_ONLY };
    }

    const target = args.trim();
    if (!target) return { text: messages.ADDUSER_USAGE };

    if (!/^\d+$/.test(target)) {
      return { text: messages.usernameNotSupported(target.replace(/^@/, "")) };
    }

    const userId = Number(target);
    const result = authDb.addUser(userId, { addedBy: sender.id });
    if (!result.ok) {
      console.error(`[bot] Failed to add user ${userId}: ${result.error.message}`);
      return { text: messages.STORE_ERROR };
    }

    console.log(`[bot] Admin ${sender.id} added user ${userId}`);
    return { text: result.data ? messages.userAdded(userId) : messages.userAlreadyExists(userId) };
  }

  /**
   * /users (admin only).
   */
  function listUsers(sender: Sender): Reply {
    if (sender.id !== config.adminUserId) return { text: messages.ADMIN_ONLY };

    const result = authDb.getAllUsers();
    if (!result.ok) {
      console.error(`[bot] Failed to list users: ${result.error.message}`);
      return { text: messages.STORE_ERROR };
    }
    return { text: messages.usersList(result.data) };
  }

  /**
   * /removeuser <id> (admin only).
   */
  function removeUser(sender: Sender, args: string): Reply {
    if (sender.id !== config.adminUserId) {
      console.log(`[bot] Admin command attempt by non-admin: ${sender.id}`);
      return { text: messages.ADMIN_ONLY };
    }

    const target = args.trim();
    if (!/^\d+$/.test(target)) return { text: messages.REMOVEUSER_USAGE };

    const userId = Number(target);
    if (userId === config.adminUserId) return { text: messages.CANNOT_REMOVE_ADMIN };

    const existing = authDb.getUser(userId);
    if (!existing.ok) {
      console.error(`[bot] Failed to look up user ${userId}: ${existing.error.message}`);
      return { text: messages.STORE_ERROR };
    }
    if (!existing.data) return { text: messages.userNotFound(userId) };
    if (!existing.data.isActive) return { text: messages.userAlreadyInactive(userId) };

    const result = authDb.deactivateUser(userId);
    if (!result.ok) {
      console.error(`[bot] Failed to remove user ${userId}: ${result.error.message}`);
      return { text: messages.STORE_ERROR };
    }

    console.log(`[bot] Admin ${sender.id} removed user ${userId}`);
    return { text: messages.userRemoved(userId) };
  }

  function cancel(sender: Sender, identity: Identity): Reply {
    if (!isAuthorized(sender)) return { text: messages.ACCESS_RESTRICTED };

    const count = queue.cancelAllFor(identity, "user");
    if (count === 0) return { text: messages.NO_ACTIVE_DOWNLOADS };

    console.log(`[bot] User ${sender.id} cancelled ${count} downloads`);
    return { text: messages.downloadsCancelled(count) };
  }

  function status(sender: Sender, identity: Identity): Reply {
    if (!isAuthorized(sender)) return { text: messages.ACCESS_RESTRICTED };

    const current = queue.status(identity);
    if (current.queued.length === 0 && current.running.length === 0) {
      return { text: messages.NO_ACTIVE_DOWNLOADS };
    }
    return { text: messages.statusText(current.running, current.queued) };
  }

  /**
   * A text message: validate the link, look it up and offer the format menu.
   */
  async function link(sender: Sender, identity: Identity, text: string): Promise<Reply> {
    if (!isAuthorized(sender)) return { text: messages.ACCESS_RESTRICTED };

    const url = extractUrl(text);
    if (!url) return { text: messages.SEND_A_LINK };
    if (!isSupportedUrl(url, config.allowedHosts)) return { text: messages.UNSUPPORTED_URL };

    console.log(`[bot] Received URL from ${sender.id}: ${url}`);

    let menu: ResolvedMenu;
    try {
      menu = await deps.resolver.resolve(url);
    } catch (error) {
      if (error instanceof DownloadError) {
        if (error.type === "unknown") {
          reportUnexpected("Format lookup failed with an unexpected error", {
            identity,
            url,
            error: describeError(error.cause ?? error).slice(0, 2000),
          });
        }
        console.log(`[bot] Format lookup failed for ${url}: ${error.type}: ${error.message}`);
        return { text: userMessageFor(error) };
      }
      throw error;
    }

    const token = selections.create(url, menu.options);
    const buttons = menu.options.map((option) => ({
      text: option.label,
      data: buildCallbackData(option.id, token),
    }));

    return { text: messages.chooseFormat(menu.title), buttons: chunk(buttons, BUTTONS_PER_ROW) };
  }

  /**
   * A press on a format button: look up the selection and enqueue it.
   * The menu message, when known, becomes the task's status message.
   */
  function formatSelected(
    sender: Sender,
    identity: Identity,
    data: string,
    messageId: number | null = null,
  ): CallbackReply {
    const parsed = parseCallbackData(data);
    if (!parsed) {
      return { notice: "Invalid format selection", edit: null, send: null };
    }

    if (!isAuthorized(sender)) {
      return { notice: "Access restricted", edit: null, send: { text: messages.ACCESS_RESTRICTED } };
    }

    const lookup = selections.get(parsed.token);
    if (!lookup.ok) {
      return {
        notice: "Selection expired",
        edit: { text: messages.SELECTION_EXPIRED },
        send: null,
      };
    }

    const option = lookup.entry.options.find((candidate) => candidate.id === parsed.optionId);
    if (!option) {
      return { notice: "Format not available", edit: null, send: { text: messages.FORMAT_NOT_OFFERED } };
    }

    selections.setFormat(parsed.token, option.format);
    const { url } = lookup.entry;
    const result = queue.enqueue(identity, url, option.format);

    if (!result.ok) {
      console.log(`[bot] Enqueue rejected for ${identity}: ${result.error.reason}`);
      return {
        notice: "Could not queue the download",
        edit: null,
        send: { text: messages.rejectedText(result.error.reason) },
      };
    }

    selections.consume(parsed.token);
    if (messageId !== null) {
      deps.statusMessages.attach(
        result.task.id,
        identity,
        messageId,
        result.position === 0 ? "downloading" : "queued",
      );
    }
    console.log(`[bot] Task ${result.task.id} queued for ${identity}: ${option.label} ${url}`);

    if (result.position === 0) {
      return {
        notice: `Starting download in ${option.label}...`,
        edit: { text: messages.downloadStarted(option.label, url) },
        send: null,
      };
    }
    return {
      notice: `Queued at position ${result.position}`,
      edit: { text: messages.downloadQueued(option.label, url, result.position) },
      send: null,
    };
  }

  return {
    start,
    help,
    invite,
    addUser,
    listUsers,
    removeUser,
    cancel,
    status,
    link,
    formatSelected,
  };
}

/**
 * Type for the handlers instance.
 */
export type Handlers = ReturnType<typeof createHandlers>;
