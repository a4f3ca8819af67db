/**
 * Database types for the authorization store.
 */

// ============================================================================
// Records
// ============================================================================

/**
 * An authorized (or deactivated) chat user.
 */
export interface AuthUser {
  userId: number;
  username: string | null;
  addedAt: Date;
  /** 0 when added by the system or through an invite */
  addedBy: number;
  isActive: boolean;
}

/**
 * A single-use invite code.
 */
export interface Invite {
  code: string;
  createdBy: number;
  createdAt: Date;
  usedBy: number | null;
  usedAt: Date | null;
  isActive: boolean;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result type for database operations.
 */
export type DbResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: DbError };

/**
 * Database error types.
 */
export type DbErrorType =
  | "connection_error"
  | "query_error"
  | "not_found"
  | "constraint_error"
  | "unknown";

export interface DbError {
  type: DbErrorType;
  message: string;
  cause?: unknown;
}
