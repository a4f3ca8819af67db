/**
 * User-facing texts. All texts are Telegram HTML.
 */

import type { AuthUser } from "../db/types.ts";
import type { RejectionReason } from "../services/errors.ts";

// ============================================================================
// Helpers (pure functions)
// ============================================================================

/**
 * Escape text for Telegram HTML parse mode.
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Human readable byte size, e.g. "50 MB".
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

// ============================================================================
// Access
// ============================================================================

export const ACCESS_RESTRICTED =
  "⚠️ <b>Access Restricted</b>\n\n" +
  "You are not authorized to use this bot. Please contact the administrator " +
  "or use an invite link to get access.";

export const ADMIN_ONLY =
  "⚠️ <b>Admin Only</b>\n\nThis command is only available to the bot administrator.";

export const INVITE_ACCEPTED =
  "✅ <b>Invite Accepted</b>\n\nYou now have access to the bot. Send me a link to get started.";

export const INVITE_INVALID = "⚠️ <b>Invalid Invite</b>\n\nThis invite link is invalid.";

export const INVITE_USED = "⚠️ <b>Invalid Invite</b>\n\nThis invite link has already been used.";

// ============================================================================
// Commands
// ============================================================================

export const WELCOME =
  "👋 <b>Welcome!</b>\n\n" +
  "I can help you download videos and audio.\n\n" +
  "<b>How to use:</b>\n" +
  "1. Send me a link\n" +
  "2. Choose the format you want to download\n" +
  "3. Wait for the download to complete\n\n" +
  "Use /help to see all available commands.";

export function helpText(maxOutputSizeBytes: number): string {
  return (
    "📚 <b>Help</b>\n\n" +
    "<b>Available commands:</b>\n" +
    "/start - Start the bot and see welcome message\n" +
    "/help - Show this help message\n" +
    "/status - Show your queued and running downloads\n" +
    "/cancel - Cancel your active downloads\n" +
    "/invite - Generate an invite link\n" +
    "/adduser - Add a new user (admin only)\n" +
    "/users - List authorized users (admin only)\n" +
    "/removeuser - Revoke a user's access (admin only)\n\n" +
    "<b>How to download:</b>\n" +
    "Send a link, and I'll provide format options.\n\n" +
    "<b>Supported formats:</b>\n" +
    "• Video: SD (480p), HD (720p), Full HD (1080p), Original\n" +
    "• Audio: MP3 (320kbps)\n\n" +
    `<b>File size limit:</b> ${formatBytes(maxOutputSizeBytes)}`
  );
}

export function inviteCreated(link: string): string {
  return (
    "🔗 <b>Invite Link Generated</b>\n\n" +
    `<code>${escapeHtml(link)}</code>\n\n` +
    "This link can be used once to get access to the bot.\n" +
    "⚠️ <b>Note:</b> Anyone with this link can use the bot, " +
    "so share it only with people you trust."
  );
}

export const INVITE_FAILED =
  "❌ <b>Error</b>\n\nCould not generate invite link. Please try again later.";

export const ADDUSER_USAGE =
  "⚠️ <b>Usage Error</b>\n\n" +
  "Please provide a user ID.\n" +
  "Example: <code>/adduser 123456789</code>";

export function userAdded(userId: number): string {
  return (
    "✅ <b>User Added</b>\n\n" +
    `User with ID <code>${userId}</code> has been added to the authorized users list.`
  );
}

export function userAlreadyExists(userId: number): string {
  return (
    "ℹ️ <b>User Already Exists</b>\n\n" +
    `User with ID <code>${userId}</code> is already in the authorized users list.`
  );
}

export function usernameNotSupported(username: string): string {
  return (
    "ℹ️ <b>User Cannot Be Added Directly by Username</b>\n\n" +
    `The user <b>@${escapeHtml(username)}</b> needs to start a chat with the bot first. ` +
    "Then, they can be authorized using their user ID."
  );
}

export const REMOVEUSER_USAGE =
  "⚠️ <b>Usage Error</b>\n\n" +
  "Please provide a user ID.\n" +
  "Example: <code>/removeuser 123456789</code>";

export const CANNOT_REMOVE_ADMIN = "⚠️ <b>Not Allowed</b>\n\nThe administrator cannot be removed.";

export function userRemoved(userId: number): string {
  return `✅ <b>User Removed</b>\n\nUser with ID <code>${userId}</code> no longer has access.`;
}

export function userNotFound(userId: number): string {
  return `ℹ️ <b>Unknown User</b>\n\nUser with ID <code>${userId}</code> is not in the users list.`;
}

export function userAlreadyInactive(userId: number): string {
  return `ℹ️ <b>Already Removed</b>\n\nUser with ID <code>${userId}</code> has no access already.`;
}

export function usersList(users: AuthUser[]): string {
  const active = users.filter((user) => user.isActive).length;
  const lines = users.map((user) => {
    const name = user.username ? ` @${escapeHtml(user.username)}` : "";
    const state = user.isActive ? "" : " (removed)";
    return `• <code>${user.userId}</code>${name}${state}`;
  });
  return `👥 <b>Users</b> (${active} active)\n\n${lines.join("\n")}`;
}

export const STORE_ERROR = "❌ <b>Error</b>\n\nSomething went wrong. Please try again later.";

export const NO_ACTIVE_DOWNLOADS =
  "ℹ️ <b>No Active Downloads</b>\n\nYou don't have any downloads in the queue.";

export function downloadsCancelled(count: number): string {
  return `✅ <b>Downloads Cancelled</b>\n\nCancelled ${plural(count, "download")}.`;
}

export interface StatusLine {
  formatLabel: string;
  url: string;
  position?: number;
  attempt?: number;
}

export function statusText(running: StatusLine[], queued: StatusLine[]): string {
  const lines = ["📋 <b>Your Downloads</b>"];
  for (const item of running) {
    const retry = item.attempt !== undefined && item.attempt > 1 ? ` (attempt ${item.attempt})` : "";
    lines.push(`\n⏬ Downloading <b>${escapeHtml(item.formatLabel)}</b>${retry}\n${escapeHtml(item.url)}`);
  }
  for (const item of queued) {
    lines.push(
      `\n⏳ #${item.position ?? "?"} in queue: <b>${escapeHtml(item.formatLabel)}</b>\n${escapeHtml(item.url)}`,
    );
  }
  return lines.join("\n");
}

// ============================================================================
// Download flow
// ============================================================================

export const UNSUPPORTED_URL =
  "⚠️ <b>Unsupported URL</b>\n\nThis link is not from a supported site.";

export const SEND_A_LINK = "ℹ️ Send me a link to download.";

export function chooseFormat(title: string): string {
  return (
    "🎬 <b>Choose Download Format</b>\n\n" +
    `<b>${escapeHtml(title)}</b>\n\n` +
    "Select the format you want to download:"
  );
}

export const SELECTION_EXPIRED =
  "⌛ <b>Selection Expired</b>\n\nThis menu has expired. Please resend the link.";

export const FORMAT_NOT_OFFERED = "⚠️ This format is not available for this link.";

export function downloadStarted(formatLabel: string, url: string): string {
  return (
    "🔄 <b>Download started</b>\n\n" +
    `Format: <b>${escapeHtml(formatLabel)}</b>\n` +
    `URL: ${escapeHtml(url)}\n\n` +
    "Please wait while your file is being downloaded..."
  );
}

export function downloadQueued(formatLabel: string, url: string, position: number): string {
  return (
    "⏳ <b>Download queued</b>\n\n" +
    `Format: <b>${escapeHtml(formatLabel)}</b>\n` +
    `URL: ${escapeHtml(url)}\n\n` +
    `Position in queue: <b>${position}</b>. Use /status to check progress.`
  );
}

export function sendingFile(formatLabel: string, fileSize: number | null): string {
  const size = fileSize === null ? "" : `Size: ${formatBytes(fileSize)}\n`;
  return (
    "✅ <b>Download completed</b>\n\n" +
    `Format: <b>${escapeHtml(formatLabel)}</b>\n` +
    size +
    "\nNow sending file..."
  );
}

export const FILE_SENT = "✅ <b>Download completed</b>\n\nFile sent successfully!";

export function downloadFailedStatus(formatLabel: string, url: string): string {
  return `❌ <b>Download failed</b>\n\nFormat: <b>${escapeHtml(formatLabel)}</b>\nURL: ${escapeHtml(url)}`;
}

export function downloadCancelledStatus(formatLabel: string, url: string): string {
  return `🛑 <b>Download cancelled</b>\n\nFormat: <b>${escapeHtml(formatLabel)}</b>\nURL: ${escapeHtml(url)}`;
}

export function rejectedText(reason: RejectionReason): string {
  switch (reason) {
    case "queue_full":
      return "🚦 <b>Queue Full</b>\n\nToo many downloads are waiting. Please try again later.";
    case "user_limit":
      return "🚦 <b>Download Limit</b>\n\nPlease wait for your current download to finish, or use /cancel.";
    case "duplicate":
      return "ℹ️ <b>Already Queued</b>\n\nThis download is already in progress.";
    case "shutting_down":
      return "🔧 <b>Restarting</b>\n\nThe bot is restarting. Please try again in a minute.";
  }
}
