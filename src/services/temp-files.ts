/**
 * Temporary file lifecycle for download tasks.
 *
 * Each running task gets its own working directory under the base directory.
 * The directory is removed when the task leaves delivery, whatever the outcome.
 *
 * Design:
 * - Scoped leases: acquire() creates, release() removes, release is idempotent
 * - Orphans from an unclean shutdown are swept by age, not by task identity
 * - Runs a sweep at startup, then periodically
 * - File system interface for dependency injection
 */

import { mkdir, mkdtemp, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";

// ============================================================================
// Types
// ============================================================================

export interface TempFilesConfig {
  /** Directory that holds every task directory */
  baseDir: string;
  /** Entries older than this are orphans */
  orphanMaxAgeMs: number;
  /** How often to sweep after startup */
  sweepIntervalMs: number;
}

export interface TempLease {
  taskId: string;
  dir: string;
  /** Remove the directory. Safe to call more than once. */
  release(): Promise<void>;
}

export interface SweepError {
  timestamp: Date;
  path: string;
  message: string;
}

export interface SweepResult {
  ok: boolean;
  entriesChecked: number;
  entriesRemoved: number;
  durationMs: number;
  errors: SweepError[];
}

export interface TempFilesState {
  isRunning: boolean;
  activeLeases: number;
  lastSweepAt: Date | null;
  sweepsCompleted: number;
  orphansRemovedTotal: number;
  errors: SweepError[];
}

// ============================================================================
// File System Interface
// ============================================================================

/**
 * File system interface for dependency injection.
 */
export interface TempFileSystem {
  mkdir(path: string): Promise<void>;
  mkdtemp(prefix: string): Promise<string>;
  readdir(path: string): Promise<string[]>;
  mtimeMs(path: string): Promise<number>;
  remove(path: string): Promise<void>;
}

/**
 * Default file system using node:fs/promises.
 */
export const defaultTempFileSystem: TempFileSystem = {
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  mkdtemp: (prefix) => mkdtemp(prefix),
  readdir: (path) => readdir(path),
  mtimeMs: async (path) => (await stat(path)).mtimeMs,
  remove: (path) => rm(path, { recursive: true, force: true }),
};

// ============================================================================
// Temp File Manager
// ============================================================================

/**
 * Create a temp file manager.
 */
export function createTempFileManager(
  config: TempFilesConfig,
  fs: TempFileSystem = defaultTempFileSystem,
) {
  const liveDirs = new Set<string>();
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let state: TempFilesState = {
    isRunning: false,
    activeLeases: 0,
    lastSweepAt: null,
    sweepsCompleted: 0,
    orphansRemovedTotal: 0,
    errors: [],
  };

  /**
   * Create the base directory.
   */
  async function init(): Promise<void> {
    await fs.mkdir(config.baseDir);
  }

  /**
   * Create a fresh working directory for a task.
   */
  async function acquire(taskId: string): Promise<TempLease> {
    const safeId = taskId.replace(/[^a-zA-Z0-9_-]/g, "_");
    const dir = await fs.mkdtemp(join(config.baseDir, `task-${safeId}-`));
    liveDirs.add(dir);

    let released = false;
    return {
      taskId,
      dir,
      async release() {
        if (released) return;
        released = true;
        liveDirs.delete(dir);
        try {
          await fs.remove(dir);
        } catch (e) {
          // Left for the orphan sweep
          console.error(
            `[temp-files] Failed to remove ${dir}: ${e instanceof Error ? e.message : String(e)}`,
          );
        }
      },
    };
  }

  /**
   * Remove base directory entries older than the orphan age that no live lease owns.
   */
  async function sweepOrphans(now: number = Date.now()): Promise<SweepResult> {
    const startTime = Date.now();
    const errors: SweepError[] = [];
    let entriesChecked = 0;
    let entriesRemoved = 0;

    let names: string[];
    try {
      names = await fs.readdir(config.baseDir);
    } catch (e) {
      errors.push({
        timestamp: new Date(),
        path: config.baseDir,
        message: e instanceof Error ? e.message : String(e),
      });
      names = [];
    }

    for (const name of names) {
      const path = join(config.baseDir, name);
      if (liveDirs.has(path)) continue;
      entriesChecked++;

      try {
        const mtime = await fs.mtimeMs(path);
        if (now - mtime < config.orphanMaxAgeMs) continue;
        await fs.remove(path);
        entriesRemoved++;
      } catch (e) {
        errors.push({
          timestamp: new Date(),
          path,
          message: e instanceof Error ? e.message : String(e),
        });
      }
    }

    const durationMs = Date.now() - startTime;
    state = {
      ...state,
      lastSweepAt: new Date(),
      sweepsCompleted: state.sweepsCompleted + 1,
      orphansRemovedTotal: state.orphansRemovedTotal + entriesRemoved,
      errors: [...errors, ...state.errors].slice(0, 20), // Keep last 20 errors
    };

    if (entriesRemoved > 0 || errors.length > 0) {
      console.log(
        `[temp-files] Sweep: checked ${entriesChecked}, removed ${entriesRemoved}, ${errors.length} errors in ${durationMs}ms`,
      );
    }

    return { ok: errors.length === 0, entriesChecked, entriesRemoved, durationMs, errors };
  }

  /**
   * Sweep once now, then on an interval.
   */
  async function start(): Promise<SweepResult> {
    if (state.isRunning) return sweepOrphans();

    state = { ...state, isRunning: true };
    const result = await sweepOrphans();

    intervalId = setInterval(() => {
      sweepOrphans().catch((e: unknown) => {
        console.error(`[temp-files] Sweep failed: ${e instanceof Error ? e.message : String(e)}`);
      });
    }, config.sweepIntervalMs);
    intervalId.unref();

    console.log(
      `[temp-files] Started (sweep every ${Math.round(config.sweepIntervalMs / 60000)} min)`,
    );
    return result;
  }

  /**
   * Stop periodic sweeps.
   */
  function stop(): void {
    if (!state.isRunning) return;

    if (intervalId !== null) {
      clearInterval(intervalId);
      intervalId = null;
    }

    state = { ...state, isRunning: false };
    console.log("[temp-files] Stopped");
  }

  /**
   * Get current state.
   */
  function getState(): TempFilesState {
    return { ...state, activeLeases: liveDirs.size };
  }

  return {
    init,
    acquire,
    sweepOrphans,
    start,
    stop,
    getState,
  };
}

export type TempFileManager = ReturnType<typeof createTempFileManager>;
