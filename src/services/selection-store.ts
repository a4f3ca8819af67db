/**
 * Ephemeral selection store: short-lived tokens for format menus.
 *
 * Design:
 * - Tokens are random, never counters
 * - Expired entries are invisible to lookups and swept on every create
 * - Size is capped; the oldest entries are evicted first
 */

import { randomBytes } from "node:crypto";
import type { FormatOption } from "./format-resolver.ts";
import type { FormatSpec } from "./ytdlp-types.ts";

// ============================================================================
// Types
// ============================================================================

export interface SelectionStoreConfig {
  ttlMs: number;
  maxEntries: number;
}

export interface SelectionEntry {
  token: string;
  url: string;
  /** Menu shown for this token */
  options: FormatOption[];
  /** Unset until the user picks a button */
  format: FormatSpec | null;
  createdAt: number;
}

export type SelectionResult =
  | { ok: true; entry: SelectionEntry }
  | { ok: false; error: "not_found" };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Generate a 12-character url-safe token (72 bits of entropy).
 */
export function generateToken(): string {
  return randomBytes(9).toString("base64url");
}

// ============================================================================
// Selection Store Factory
// ============================================================================

/**
 * Create a selection store.
 */
export function createSelectionStore(
  config: SelectionStoreConfig,
  now: () => number = Date.now,
) {
  // Map iteration order is insertion order, so the first key is the oldest
  const entries = new Map<string, SelectionEntry>();

  function isExpired(entry: SelectionEntry, at: number): boolean {
    return at - entry.createdAt >= config.ttlMs;
  }

  /**
   * Remove expired entries. Returns the number removed.
   */
  function sweep(at: number = now()): number {
    let removed = 0;
    for (const [token, entry] of entries) {
      if (!isExpired(entry, at)) break;
      entries.delete(token);
      removed++;
    }
    return removed;
  }

  /**
   * Store a menu for a URL and return its token.
   */
  function create(url: string, options: FormatOption[] = []): string {
    const at = now();
    sweep(at);

    let token = generateToken();
    while (entries.has(token)) token = generateToken();

    entries.set(token, { token, url, options, format: null, createdAt: at });

    while (entries.size > config.maxEntries) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
    }

    return token;
  }

  /**
   * Look up a live entry.
   */
  function get(token: string): SelectionResult {
    const entry = entries.get(token);
    if (!entry) return { ok: false, error: "not_found" };
    if (isExpired(entry, now())) {
      entries.delete(token);
      return { ok: false, error: "not_found" };
    }
    return { ok: true, entry };
  }

  /**
   * Record the chosen format on a live entry.
   */
  function setFormat(token: string, format: FormatSpec): SelectionResult {
    const result = get(token);
    if (!result.ok) return result;
    result.entry.format = format;
    return result;
  }

  /**
   * Remove an entry once its selection was acted on.
   */
  function consume(token: string): boolean {
    return entries.delete(token);
  }

  function size(): number {
    return entries.size;
  }

  return {
    create,
    get,
    setFormat,
    consume,
    sweep,
    size,
  };
}

/**
 * Type for the selection store instance.
 */
export type SelectionStore = ReturnType<typeof createSelectionStore>;
