/**
 * Configuration types and parsing for the media grabber bot.
 * All functions except `loadConfigFromEnv` are pure and easily testable.
 */

import { join } from "node:path";

export interface Config {
  // Required
  telegramToken: string;
  adminUserId: number;

  // Paths
  dataDir: string;
  tempDir: string;

  // HTTP surface
  port: number;
  webhookUrl: string | null;
  webhookSecret: string | null;

  // Extraction
  ytdlpPath: string;
  allowedHosts: string[];

  // Queue limits
  maxConcurrentDownloads: number;
  maxQueueSize: number;
  maxTasksPerUser: number;
  taskTimeoutSeconds: number;
  maxRetryAttempts: number; // immediate retries for transient network failures
  maxOutputSizeBytes: number;

  // Format probing
  lookupTimeoutSeconds: number;
  maxConcurrentLookups: number;

  // Selection store
  selectionTtlSeconds: number;
  selectionMaxEntries: number;

  // Reporting and housekeeping
  repeatFailureWindowMinutes: number;
  orphanMaxAgeHours: number;
  orphanSweepIntervalMinutes: number;
}

export interface ConfigInput {
  TELEGRAM_TOKEN?: string;
  ADMIN_USER_ID?: string;
  DATA_DIR?: string;
  TEMP_DIR?: string;
  PORT?: string;
  WEBHOOK_URL?: string;
  WEBHOOK_SECRET?: string;
  YTDLP_PATH?: string;
  ALLOWED_HOSTS?: string;
  MAX_CONCURRENT_DOWNLOADS?: string;
  MAX_QUEUE_SIZE?: string;
  MAX_TASKS_PER_USER?: string;
  TASK_TIMEOUT_SECONDS?: string;
  MAX_RETRY_ATTEMPTS?: string;
  MAX_OUTPUT_SIZE_BYTES?: string;
  LOOKUP_TIMEOUT_SECONDS?: string;
  MAX_CONCURRENT_LOOKUPS?: string;
  SELECTION_TTL_SECONDS?: string;
  SELECTION_MAX_ENTRIES?: string;
  REPEAT_FAILURE_WINDOW_MINUTES?: string;
  ORPHAN_MAX_AGE_HOURS?: string;
  ORPHAN_SWEEP_INTERVAL_MINUTES?: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigResult =
  | { ok: true; config: Config }
  | { ok: false; errors: ConfigError[] };

/** Hosts accepted when ALLOWED_HOSTS is not set. */
export const DEFAULT_ALLOWED_HOSTS = ["youtube.com", "youtu.be", "youtube-nocookie.com"];

/** Bot API upload limit for documents sent by bots. */
export const DEFAULT_MAX_OUTPUT_SIZE_BYTES = 50 * 1024 * 1024;

/**
 * Parse and validate configuration from environment variables.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseConfig(input: ConfigInput): ConfigResult {
  const errors: ConfigError[] = [];
  const collect = <T>(result: ParseResult<T>, fallback: T): T => {
    if (result.error) {
      errors.push(result.error);
      return fallback;
    }
    return result.value ?? fallback;
  };

  // Required fields
  const telegramToken = input.TELEGRAM_TOKEN?.trim() ?? "";
  if (!telegramToken) {
    errors.push(new ConfigError("TELEGRAM_TOKEN is required", "TELEGRAM_TOKEN"));
  }

  const adminUserId = input.ADMIN_USER_ID?.trim()
    ? collect(parsePositiveInt(input.ADMIN_USER_ID, "ADMIN_USER_ID", 0), 0)
    : 0;
  if (!input.ADMIN_USER_ID?.trim()) {
    errors.push(new ConfigError("ADMIN_USER_ID is required", "ADMIN_USER_ID"));
  }

  // Optional fields with validation
  const dataDir = input.DATA_DIR?.trim() || "./data";
  const tempDir = input.TEMP_DIR?.trim() || join(dataDir, "temp");

  const port = collect(parsePort(input.PORT), 8080);

  const webhookUrl = input.WEBHOOK_URL?.trim() || null;
  if (webhookUrl && !isValidUrl(webhookUrl)) {
    errors.push(
      new ConfigError(`WEBHOOK_URL must be a valid URL, got: ${webhookUrl}`, "WEBHOOK_URL"),
    );
  }

  const allowedHosts = parseHostList(input.ALLOWED_HOSTS);
  if (allowedHosts.length === 0) {
    errors.push(
      new ConfigError("ALLOWED_HOSTS must name at least one host", "ALLOWED_HOSTS"),
    );
  }

  const maxConcurrentDownloads = collect(
    parsePositiveInt(input.MAX_CONCURRENT_DOWNLOADS, "MAX_CONCURRENT_DOWNLOADS", 2),
    2,
  );
  const maxQueueSize = collect(parsePositiveInt(input.MAX_QUEUE_SIZE, "MAX_QUEUE_SIZE", 20), 20);
  const maxTasksPerUser = collect(
    parsePositiveInt(input.MAX_TASKS_PER_USER, "MAX_TASKS_PER_USER", 1),
    1,
  );
  const taskTimeoutSeconds = collect(
    parsePositiveInt(input.TASK_TIMEOUT_SECONDS, "TASK_TIMEOUT_SECONDS", 600),
    600,
  );
  const maxRetryAttempts = collect(
    parseNonNegativeInt(input.MAX_RETRY_ATTEMPTS, "MAX_RETRY_ATTEMPTS", 2),
    2,
  );
  const maxOutputSizeBytes = collect(
    parsePositiveInt(input.MAX_OUTPUT_SIZE_BYTES, "MAX_OUTPUT_SIZE_BYTES", DEFAULT_MAX_OUTPUT_SIZE_BYTES),
    DEFAULT_MAX_OUTPUT_SIZE_BYTES,
  );
  const lookupTimeoutSeconds = collect(
    parsePositiveInt(input.LOOKUP_TIMEOUT_SECONDS, "LOOKUP_TIMEOUT_SECONDS", 60),
    60,
  );
  const maxConcurrentLookups = collect(
    parsePositiveInt(input.MAX_CONCURRENT_LOOKUPS, "MAX_CONCURRENT_LOOKUPS", 2),
    2,
  );
  const selectionTtlSeconds = collect(
    parsePositiveInt(input.SELECTION_TTL_SECONDS, "SELECTION_TTL_SECONDS", 1800),
    1800,
  );
  const selectionMaxEntries = collect(
    parsePositiveInt(input.SELECTION_MAX_ENTRIES, "SELECTION_MAX_ENTRIES", 1000),
    1000,
  );
  const repeatFailureWindowMinutes = collect(
    parsePositiveInt(input.REPEAT_FAILURE_WINDOW_MINUTES, "REPEAT_FAILURE_WINDOW_MINUTES", 10),
    10,
  );
  const orphanMaxAgeHours = collect(
    parsePositiveInt(input.ORPHAN_MAX_AGE_HOURS, "ORPHAN_MAX_AGE_HOURS", 6),
    6,
  );
  const orphanSweepIntervalMinutes = collect(
    parsePositiveInt(input.ORPHAN_SWEEP_INTERVAL_MINUTES, "ORPHAN_SWEEP_INTERVAL_MINUTES", 60),
    60,
  );

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: {
      telegramToken,
      adminUserId,
      dataDir,
      tempDir,
      port,
      webhookUrl: webhookUrl ? normalizeUrl(webhookUrl) : null,
      webhookSecret: input.WEBHOOK_SECRET?.trim() || null,
      ytdlpPath: input.YTDLP_PATH?.trim() || "yt-dlp",
      allowedHosts,
      maxConcurrentDownloads,
      maxQueueSize,
      maxTasksPerUser,
      taskTimeoutSeconds,
      maxRetryAttempts,
      maxOutputSizeBytes,
      lookupTimeoutSeconds,
      maxConcurrentLookups,
      selectionTtlSeconds,
      selectionMaxEntries,
      repeatFailureWindowMinutes,
      orphanMaxAgeHours,
      orphanSweepIntervalMinutes,
    },
  };
}

/**
 * Load config from process.env (convenience wrapper).
 * This is the only impure function - it reads from environment.
 */
export function loadConfigFromEnv(): ConfigResult {
  const env = process.env;
  return parseConfig({
    TELEGRAM_TOKEN: env.TELEGRAM_TOKEN,
    ADMIN_USER_ID: env.ADMIN_USER_ID,
    DATA_DIR: env.DATA_DIR,
    TEMP_DIR: env.TEMP_DIR,
    PORT: env.PORT,
    WEBHOOK_URL: env.WEBHOOK_URL,
    WEBHOOK_SECRET: env.WEBHOOK_SECRET,
    YTDLP_PATH: env.YTDLP_PATH,
    ALLOWED_HOSTS: env.ALLOWED_HOSTS,
    MAX_CONCURRENT_DOWNLOADS: env.MAX_CONCURRENT_DOWNLOADS,
    MAX_QUEUE_SIZE: env.MAX_QUEUE_SIZE,
    MAX_TASKS_PER_USER: env.MAX_TASKS_PER_USER,
    TASK_TIMEOUT_SECONDS: env.TASK_TIMEOUT_SECONDS,
    MAX_RETRY_ATTEMPTS: env.MAX_RETRY_ATTEMPTS,
    MAX_OUTPUT_SIZE_BYTES: env.MAX_OUTPUT_SIZE_BYTES,
    LOOKUP_TIMEOUT_SECONDS: env.LOOKUP_TIMEOUT_SECONDS,
    MAX_CONCURRENT_LOOKUPS: env.MAX_CONCURRENT_LOOKUPS,
    SELECTION_TTL_SECONDS: env.SELECTION_TTL_SECONDS,
    SELECTION_MAX_ENTRIES: env.SELECTION_MAX_ENTRIES,
    REPEAT_FAILURE_WINDOW_MINUTES: env.REPEAT_FAILURE_WINDOW_MINUTES,
    ORPHAN_MAX_AGE_HOURS: env.ORPHAN_MAX_AGE_HOURS,
    ORPHAN_SWEEP_INTERVAL_MINUTES: env.ORPHAN_SWEEP_INTERVAL_MINUTES,
  });
}

// Helper functions (pure)

interface ParseResult<T> {
  value?: T;
  error?: ConfigError;
}

function parsePort(value: string | undefined): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { value: 8080 };
  }

  const num = parseStrictInt(value);
  if (num === null || num < 1 || num > 65535) {
    return {
      error: new ConfigError(
        `PORT must be a valid port number (1-65535), got: ${value}`,
        "PORT",
      ),
    };
  }

  return { value: num };
}

function parseNonNegativeInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { value: defaultValue };
  }

  const num = parseStrictInt(value);
  if (num === null || num < 0) {
    return {
      error: new ConfigError(
        `${field} must be a non-negative integer, got: ${value}`,
        field,
      ),
    };
  }

  return { value: num };
}

function parsePositiveInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { value: defaultValue };
  }

  const num = parseStrictInt(value);
  if (num === null || num < 1) {
    return {
      error: new ConfigError(
        `${field} must be a positive integer, got: ${value}`,
        field,
      ),
    };
  }

  return { value: num };
}

function parseStrictInt(value: string): number | null {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const num = parseInt(trimmed, 10);
  return Number.isSafeInteger(num) ? num : null;
}

/**
 * Parse a comma separated host list, lowercased, without empty items.
 */
export function parseHostList(value: string | undefined): string[] {
  if (!value || value.trim() === "") {
    return [...DEFAULT_ALLOWED_HOSTS];
  }
  return value
    .split(",")
    .map((host) => host.trim().toLowerCase())
    .filter((host) => host.length > 0);
}

/**
 * Validate a URL string.
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Normalize URL by removing trailing slash.
 */
export function normalizeUrl(url: string): string {
  return url.replace(/\/+$/, "");
}
