/**
 * grammY wiring for the chat handlers.
 */

import { Bot, type Context, InlineKeyboard } from "grammy";
import { describeError } from "../services/errors.ts";
import type { Button, Handlers, Reply, Sender } from "./handlers.ts";

export const BOT_COMMANDS = [
  { command: "start", description: "Start the bot" },
  { command: "help", description: "Show help" },
  { command: "status", description: "Show your downloads" },
  { command: "cancel", description: "Cancel your downloads" },
  { command: "invite", description: "Generate an invite link" },
  { command: "adduser", description: "Add a user (admin only)" },
  { command: "users", description: "List users (admin only)" },
  { command: "removeuser", description: "Remove a user (admin only)" },
];

// ============================================================================
// Helpers
// ============================================================================

/**
 * Build an inline keyboard from button rows.
 */
export function toKeyboard(rows: Button[][] | undefined): InlineKeyboard | undefined {
  if (!rows || rows.length === 0) return undefined;
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    if (index > 0) keyboard.row();
    for (const button of row) keyboard.text(button.text, button.data);
  });
  return keyboard;
}

function senderOf(ctx: Context): Sender | null {
  if (!ctx.from) return null;
  return { id: ctx.from.id, username: ctx.from.username ?? null };
}

async function sendReply(ctx: Context, reply: Reply): Promise<void> {
  await ctx.reply(reply.text, {
    parse_mode: "HTML",
    reply_markup: toKeyboard(reply.buttons),
    link_preview_options: { is_disabled: true },
  });
}

// ============================================================================
// Bot Factory
// ============================================================================

/**
 * Create a grammY bot that dispatches updates to the handlers.
 */
export function createBot(token: string, handlers: Handlers): Bot {
  const bot = new Bot(token);

  bot.command("start", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.start(sender, ctx.match));
  });

  bot.command("help", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.help(sender));
  });

  bot.command("invite", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.invite(sender));
  });

  bot.command("adduser", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.addUser(sender, ctx.match));
  });

  bot.command("users", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.listUsers(sender));
  });

  bot.command("removeuser", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.removeUser(sender, ctx.match));
  });

  bot.command("cancel", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.cancel(sender, ctx.chat.id));
  });

  bot.command("status", async (ctx) => {
    const sender = senderOf(ctx);
    if (sender) await sendReply(ctx, handlers.status(sender, ctx.chat.id));
  });

  bot.on("message:text", (ctx) => {
    const sender = senderOf(ctx);
    if (!sender) return;

    // Probing a link can take a while; answer later instead of holding the update loop
    handlers
      .link(sender, ctx.chat.id, ctx.message.text)
      .then((reply) => sendReply(ctx, reply))
      .catch((error: unknown) => {
        console.error(`[bot] Link handling failed for ${sender.id}: ${describeError(error)}`);
      });
  });

  bot.callbackQuery(/^fmt:/, async (ctx) => {
    const sender = senderOf(ctx);
    if (!sender) return;

    const identity = ctx.chat?.id ?? sender.id;
    const messageId = ctx.callbackQuery.message?.message_id ?? null;
    const result = handlers.formatSelected(sender, identity, ctx.callbackQuery.data, messageId);

    await ctx.answerCallbackQuery({ text: result.notice });
    if (result.edit) {
      await ctx.editMessageText(result.edit.text, {
        parse_mode: "HTML",
        reply_markup: toKeyboard(result.edit.buttons),
        link_preview_options: { is_disabled: true },
      });
    }
    if (result.send) {
      await sendReply(ctx, result.send);
    }
  });

  bot.catch((err) => {
    console.error(
      `[bot] Error while handling update ${err.ctx.update.update_id}: ${describeError(err.error)}`,
    );
  });

  return bot;
}
