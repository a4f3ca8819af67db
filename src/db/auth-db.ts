/**
 * SQLite authorization store: users and single-use invites.
 *
 * Design:
 * - Pure row mappers (testable)
 * - SQL executor interface for dependency injection
 * - Schema created on init; the admin is always an active user
 */

import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { AuthUser, DbError, DbResult, Invite } from "./types.ts";

// ============================================================================
// SQL Executor Interface
// ============================================================================

export type SqliteRow = Record<string, unknown>;

/**
 * SQLite executor interface for dependency injection.
 */
export interface SqliteExecutor {
  execute(sql: string, params?: unknown[]): { changes: number };
  queryRows(sql: string, params?: unknown[]): SqliteRow[];
  queryOne(sql: string, params?: unknown[]): SqliteRow | undefined;
  transaction<T>(fn: () => T): T;
  close(): void;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_SQL = `
-- Authorized users
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY,
  username TEXT,
  added_at TEXT NOT NULL DEFAULT (datetime('now')),
  added_by INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1
);

-- Single-use invite codes
CREATE TABLE IF NOT EXISTS invites (
  id TEXT PRIMARY KEY,
  created_by INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  used_by INTEGER,
  used_at TEXT,
  is_active INTEGER NOT NULL DEFAULT 1
);

CREATE INDEX IF NOT EXISTS idx_invites_created_by ON invites(created_by);
`;

// ============================================================================
// Row Mappers (pure functions)
// ============================================================================

function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return fallback;
}

function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : toNumber(value);
}

function toNullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * Parse SQLite datetime('now') output ("YYYY-MM-DD HH:MM:SS", UTC).
 */
export function parseSqliteDate(value: unknown): Date {
  if (typeof value !== "string") return new Date(0);
  return new Date(value.includes("T") ? value : `${value.replace(" ", "T")}Z`);
}

export function mapUserRow(row: SqliteRow): AuthUser {
  return {
    userId: toNumber(row.id),
    username: toNullableString(row.username),
    addedAt: parseSqliteDate(row.added_at),
    addedBy: toNumber(row.added_by),
    isActive: toNumber(row.is_active) === 1,
  };
}

export function mapInviteRow(row: SqliteRow): Invite {
  const usedAt = toNullableString(row.used_at);
  return {
    code: String(row.id),
    createdBy: toNumber(row.created_by),
    createdAt: parseSqliteDate(row.created_at),
    usedBy: toNullableNumber(row.used_by),
    usedAt: usedAt === null ? null : parseSqliteDate(usedAt),
    isActive: toNumber(row.is_active) === 1,
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

function errorResult<T>(
  type: DbError["type"],
  message: string,
  cause?: unknown,
): DbResult<T> {
  return { ok: false, error: { type, message, cause } };
}

function okResult<T>(data: T): DbResult<T> {
  return { ok: true, data };
}

function queryError<T>(action: string, error: unknown): DbResult<T> {
  return errorResult(
    "query_error",
    `Failed to ${action}: ${error instanceof Error ? error.message : "Unknown error"}`,
    error,
  );
}

// ============================================================================
// Auth Database Client
// ============================================================================

export interface AddUserInput {
  username?: string | null;
  /** 0 means added by the system or an invite */
  addedBy?: number;
}

/**
 * Create an authorization store client.
 */
export function createAuthDb(executor: SqliteExecutor) {
  /**
   * Initialize the schema and make sure the admin is an active user.
   */
  function init(adminUserId: number): DbResult<void> {
    try {
      executor.execute(SCHEMA_SQL);
      executor.execute(
        `INSERT INTO users (id, username, added_by, is_active) VALUES (?, 'admin', 0, 1)
         ON CONFLICT(id) DO UPDATE SET is_active = 1`,
        [adminUserId],
      );
      return okResult(undefined);
    } catch (error) {
      return queryError("initialize schema", error);
    }
  }

  /**
   * Add a user, or re-activate an existing one.
   * Returns true when the user is new.
   */
  function addUser(userId: number, input: AddUserInput = {}): DbResult<boolean> {
    try {
      return okResult(
        executor.transaction(() => {
          const existing = executor.queryOne("SELECT id FROM users WHERE id = ?", [userId]);
          if (existing) {
            executor.execute(
              "UPDATE users SET username = COALESCE(?, username), is_active = 1 WHERE id = ?",
              [input.username ?? null, userId],
            );
            return false;
          }
          executor.execute(
            "INSERT INTO users (id, username, added_by) VALUES (?, ?, ?)",
            [userId, input.username ?? null, input.addedBy ?? 0],
          );
          return true;
        }),
      );
    } catch (error) {
      return queryError(`add user ${userId}`, error);
    }
  }

  /**
   * Check if a user may use the bot.
   */
  function isAuthorized(userId: number): DbResult<boolean> {
    try {
      const row = executor.queryOne("SELECT id FROM users WHERE id = ? AND is_active = 1", [userId]);
      return okResult(row !== undefined);
    } catch (error) {
      return queryError(`check authorization of ${userId}`, error);
    }
  }

  /**
   * Get a user by id.
   */
  function getUser(userId: number): DbResult<AuthUser | null> {
    try {
      const row = executor.queryOne("SELECT * FROM users WHERE id = ?", [userId]);
      return okResult(row ? mapUserRow(row) : null);
    } catch (error) {
      return queryError(`get user ${userId}`, error);
    }
  }

  /**
   * All users, newest first.
   */
  function getAllUsers(): DbResult<AuthUser[]> {
    try {
      const rows = executor.queryRows("SELECT * FROM users ORDER BY added_at DESC, id DESC");
      return okResult(rows.map(mapUserRow));
    } catch (error) {
      return queryError("list users", error);
    }
  }

  /**
   * Revoke access. Returns false when the user does not exist.
   */
  function deactivateUser(userId: number): DbResult<boolean> {
    try {
      const { changes } = executor.execute("UPDATE users SET is_active = 0 WHERE id = ?", [userId]);
      return okResult(changes > 0);
    } catch (error) {
      return queryError(`deactivate user ${userId}`, error);
    }
  }

  /**
   * Create a single-use invite code.
   */
  function createInvite(createdBy: number): DbResult<Invite> {
    const code = randomUUID();
    try {
      executor.execute("INSERT INTO invites (id, created_by) VALUES (?, ?)", [code, createdBy]);
      const row = executor.queryOne("SELECT * FROM invites WHERE id = ?", [code]);
      if (!row) return errorResult("not_found", `Invite ${code} not found after insert`);
      return okResult(mapInviteRow(row));
    } catch (error) {
      return queryError(`create invite for ${createdBy}`, error);
    }
  }

  /**
   * Redeem an invite: marks it used and authorizes the user.
   * Returns false when the code is unknown or already used.
   */
  function useInvite(code: string, userId: number, username?: string | null): DbResult<boolean> {
    try {
      return okResult(
        executor.transaction(() => {
          const { changes } = executor.execute(
            `UPDATE invites SET used_by = ?, used_at = datetime('now'), is_active = 0
             WHERE id = ? AND is_active = 1 AND used_by IS NULL`,
            [userId, code],
          );
          if (changes === 0) return false;

          const existing = executor.queryOne("SELECT id FROM users WHERE id = ?", [userId]);
          if (existing) {
            executor.execute(
              "UPDATE users SET username = COALESCE(?, username), is_active = 1 WHERE id = ?",
              [username ?? null, userId],
            );
          } else {
            executor.execute(
              "INSERT INTO users (id, username, added_by) VALUES (?, ?, 0)",
              [userId, username ?? null],
            );
          }
          return true;
        }),
      );
    } catch (error) {
      return queryError(`use invite ${code}`, error);
    }
  }

  /**
   * Get an invite by code.
   */
  function getInvite(code: string): DbResult<Invite | null> {
    try {
      const row = executor.queryOne("SELECT * FROM invites WHERE id = ?", [code]);
      return okResult(row ? mapInviteRow(row) : null);
    } catch (error) {
      return queryError(`get invite ${code}`, error);
    }
  }

  /**
   * Close the database connection.
   */
  function close(): void {
    executor.close();
  }

  return {
    init,
    addUser,
    isAuthorized,
    getUser,
    getAllUsers,
    deactivateUser,
    createInvite,
    useInvite,
    getInvite,
    close,
  };
}

// ============================================================================
// SQLite Executor Factory
// ============================================================================

function isRow(value: unknown): value is SqliteRow {
  return typeof value === "object" && value !== null;
}

/**
 * Create a SQLite executor using better-sqlite3.
 * Pass ":memory:" for an in-memory database; for a file path the parent
 * directory is created when missing.
 */
export function createSqliteExecutor(dbPath: string): SqliteExecutor {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  return {
    execute(sql, params = []) {
      if (params.length === 0) {
        db.exec(sql);
        return { changes: 0 };
      }
      const info = db.prepare(sql).run(...params);
      return { changes: info.changes };
    },

    queryRows(sql, params = []) {
      return db.prepare(sql).all(...params).filter(isRow);
    },

    queryOne(sql, params = []) {
      const row: unknown = db.prepare(sql).get(...params);
      return isRow(row) ? row : undefined;
    },

    transaction(fn) {
      return db.transaction(fn)();
    },

    close() {
      db.close();
    },
  };
}

/**
 * Type for the auth DB client.
 */
export type AuthDbClient = ReturnType<typeof createAuthDb>;
