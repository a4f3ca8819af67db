/**
 * Main entry point for the media grabber bot.
 *
 * Initializes and starts all services:
 * - Authorization store (SQLite)
 * - Format resolver, selection store, download queue and delivery
 * - HTTP server (health, status, optional webhook)
 * - Telegram bot (long polling or webhook)
 */

import { join } from "node:path";
import { Api, webhookCallback } from "grammy";
import { BOT_COMMANDS, createBot } from "./bot/index.ts";
import { createHandlers } from "./bot/handlers.ts";
import { createGrammyTransport } from "./bot/transport.ts";
import { type Config, loadConfigFromEnv } from "./config.ts";
import { createAuthDb, createSqliteExecutor } from "./db/auth-db.ts";
import { createServer, WEBHOOK_PATH } from "./server/index.ts";
import { createDeliveryReporter } from "./services/delivery.ts";
import { createDownloadQueue } from "./services/download-queue.ts";
import { describeError } from "./services/errors.ts";
import { createExtractor } from "./services/extractor.ts";
import { createFormatResolver } from "./services/format-resolver.ts";
import { createSelectionStore } from "./services/selection-store.ts";
import { createStatusMessages } from "./services/status-messages.ts";
import { createTempFileManager } from "./services/temp-files.ts";
import { createWorkerPool } from "./services/worker-pool.ts";

// ============================================================================
// Logger
// ============================================================================

const log = {
  info: (msg: string, data?: Record<string, unknown>) => {
    console.log(`[INFO] ${msg}`, data ? JSON.stringify(data) : "");
  },
  error: (msg: string, data?: Record<string, unknown>) => {
    console.error(`[ERROR] ${msg}`, data ? JSON.stringify(data) : "");
  },
  warn: (msg: string, data?: Record<string, unknown>) => {
    console.warn(`[WARN] ${msg}`, data ? JSON.stringify(data) : "");
  },
};

/** How long running downloads get to finish on shutdown */
const DRAIN_TIMEOUT_MS = 30_000;

// ============================================================================
// Graceful Shutdown
// ============================================================================

interface Cleanup {
  name: string;
  fn: () => void | Promise<void>;
}

const cleanupTasks: Cleanup[] = [];
let shuttingDown = false;

function registerCleanup(name: string, fn: () => void | Promise<void>): void {
  cleanupTasks.push({ name, fn });
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Received ${signal}, shutting down...`);

  for (const task of [...cleanupTasks].reverse()) {
    try {
      log.info(`Cleaning up: ${task.name}`);
      await task.fn();
    } catch (err) {
      log.error(`Error during cleanup of ${task.name}`, { error: describeError(err) });
    }
  }

  log.info("Shutdown complete");
  process.exit(0);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  log.info("Starting media grabber bot...");

  // 1. Parse configuration
  const configResult = loadConfigFromEnv();
  if (!configResult.ok) {
    log.error("Configuration error", {
      errors: configResult.errors.map((e) => `${e.field}: ${e.message}`),
    });
    process.exit(1);
  }
  const config: Config = configResult.config;
  log.info("Configuration loaded", {
    dataDir: config.dataDir,
    tempDir: config.tempDir,
    port: config.port,
    mode: config.webhookUrl ? "webhook" : "polling",
    allowedHosts: config.allowedHosts,
    maxConcurrentDownloads: config.maxConcurrentDownloads,
    maxQueueSize: config.maxQueueSize,
  });

  // 2. Initialize the authorization store
  log.info("Initializing database...");
  const authDb = createAuthDb(createSqliteExecutor(join(config.dataDir, "bot.db")));
  const initResult = authDb.init(config.adminUserId);
  if (!initResult.ok) {
    log.error("Failed to initialize database", { error: initResult.error.message });
    process.exit(1);
  }
  registerCleanup("Auth DB", () => authDb.close());
  log.info("Database initialized");

  // 3. Initialize services
  log.info("Initializing services...");

  const tempFiles = createTempFileManager({
    baseDir: config.tempDir,
    orphanMaxAgeMs: config.orphanMaxAgeHours * 60 * 60 * 1000,
    sweepIntervalMs: config.orphanSweepIntervalMinutes * 60 * 1000,
  });
  await tempFiles.init();
  const sweep = await tempFiles.start();
  registerCleanup("Temp Files", () => tempFiles.stop());
  log.info("Orphan sweep finished", {
    checked: sweep.entriesChecked,
    removed: sweep.entriesRemoved,
    errors: sweep.errors.length,
  });

  const extractor = createExtractor({
    ytdlpPath: config.ytdlpPath,
    maxOutputSizeBytes: config.maxOutputSizeBytes,
  });

  const lookupTimeoutMs = config.lookupTimeoutSeconds * 1000;
  const lookupPool = createWorkerPool({
    name: "lookup",
    size: config.maxConcurrentLookups,
    timeoutMs: lookupTimeoutMs,
  });
  const resolver = createFormatResolver({ extractor, pool: lookupPool, timeoutMs: lookupTimeoutMs });

  const selections = createSelectionStore({
    ttlMs: config.selectionTtlSeconds * 1000,
    maxEntries: config.selectionMaxEntries,
  });

  const transport = createGrammyTransport(new Api(config.telegramToken), {
    operatorChatId: config.adminUserId,
    maxOutputSizeBytes: config.maxOutputSizeBytes,
  });

  const statusMessages = createStatusMessages({ transport });

  const delivery = createDeliveryReporter({
    transport,
    status: statusMessages,
    maxOutputSizeBytes: config.maxOutputSizeBytes,
    repeatFailureWindowMs: config.repeatFailureWindowMinutes * 60 * 1000,
  });

  const queue = createDownloadQueue(
    {
      maxConcurrentDownloads: config.maxConcurrentDownloads,
      maxQueueSize: config.maxQueueSize,
      maxTasksPerUser: config.maxTasksPerUser,
      taskTimeoutMs: config.taskTimeoutSeconds * 1000,
      maxRetryAttempts: config.maxRetryAttempts,
      maxOutputSizeBytes: config.maxOutputSizeBytes,
    },
    {
      fetch: (url, format, destDir, signal) => extractor.fetch(url, format, destDir, signal),
      tempFiles,
      deliver: (task) => delivery.deliver(task),
      onTransition: (task, from) => {
        log.info("Task transition", {
          taskId: task.id,
          identity: task.identity,
          from,
          to: task.state,
          format: task.format.label,
        });
        statusMessages.onTransition(task, from);
      },
    },
  );
  registerCleanup("Download Queue", async () => {
    const { drained } = await queue.shutdown({ drainTimeoutMs: DRAIN_TIMEOUT_MS });
    if (!drained) log.warn("Running downloads did not finish before the drain timeout");
  });

  log.info("Services initialized");

  // 4. Create the bot
  const handlers = createHandlers({
    config,
    authDb,
    resolver,
    selections,
    queue,
    operator: transport,
    statusMessages,
    botUsername: () => bot.botInfo.username,
  });
  const bot = createBot(config.telegramToken, handlers);
  await bot.init();
  await bot.api.setMyCommands(BOT_COMMANDS);
  log.info("Bot initialized", { username: bot.botInfo.username });

  // 5. Create and start HTTP server
  log.info("Starting HTTP server...");
  const server = createServer({
    port: config.port,
    queue,
    selections,
    tempFiles,
    lookupPool,
    webhook: config.webhookUrl
      ? {
          path: WEBHOOK_PATH,
          handle: webhookCallback(bot, "std/http", {
            secretToken: config.webhookSecret ?? undefined,
          }),
        }
      : undefined,
  });
  server.start();
  registerCleanup("HTTP Server", () => server.stop());

  // 6. Start receiving updates
  if (config.webhookUrl) {
    await bot.api.setWebhook(config.webhookUrl, {
      secret_token: config.webhookSecret ?? undefined,
    });
    log.info("Webhook registered", { url: config.webhookUrl, path: WEBHOOK_PATH });
  } else {
    await bot.api.deleteWebhook();
    bot.start().catch((err: unknown) => {
      log.error("Long polling stopped", { error: describeError(err) });
    });
    registerCleanup("Bot", () => bot.stop());
    log.info("Long polling started");
  }

  log.info("Media grabber bot is ready!");

  // 7. Set up signal handlers
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => {
      log.error("Shutdown failed", { error: describeError(err) });
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => {
      log.error("Shutdown failed", { error: describeError(err) });
      process.exit(1);
    });
  });
}

main().catch((err: unknown) => {
  log.error("Fatal error", { error: describeError(err) });
  process.exit(1);
});
