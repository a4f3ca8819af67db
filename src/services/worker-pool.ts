/**
 * Bounded worker pool for slow extraction calls.
 *
 * Design:
 * - FIFO slot acquisition, at most `size` jobs running at once
 * - Every job gets an AbortSignal and a wall-clock deadline
 * - A job that overruns its deadline is aborted and its slot freed at once,
 *   even if the job itself ignores the signal
 */

import { TaskTimeoutError } from "./errors.ts";

// ============================================================================
// Types
// ============================================================================

export interface WorkerPoolConfig {
  /** Name used in log lines */
  name: string;
  /** Maximum number of jobs running at once */
  size: number;
  /** Default deadline per job */
  timeoutMs: number;
}

export interface RunOptions {
  /** Caller cancellation, forwarded to the job's signal */
  signal?: AbortSignal;
  /** Overrides the pool's default deadline */
  timeoutMs?: number;
}

export type Job<T> = (signal: AbortSignal) => Promise<T>;

export interface WorkerPoolStats {
  running: number;
  waiting: number;
  size: number;
}

// ============================================================================
// Worker Pool Factory
// ============================================================================

/**
 * Create a worker pool.
 */
export function createWorkerPool(config: WorkerPoolConfig) {
  if (!Number.isInteger(config.size) || config.size < 1) {
    throw new Error(`Worker pool "${config.name}" size must be a positive integer`);
  }

  let running = 0;
  const waiting: Array<() => void> = [];

  function acquire(): Promise<void> {
    if (running < config.size) {
      running++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      waiting.push(resolve);
    });
  }

  function release(): void {
    const next = waiting.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
      return;
    }
    running--;
  }

  /**
   * Run a job in the pool. Resolves or rejects with the job's outcome, or
   * rejects with TaskTimeoutError when the deadline passes first.
   */
  async function run<T>(job: Job<T>, options: RunOptions = {}): Promise<T> {
    await acquire();

    const timeoutMs = options.timeoutMs ?? config.timeoutMs;
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);

    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let released = false;
    const releaseOnce = () => {
      if (released) return;
      released = true;
      options.signal?.removeEventListener("abort", onCallerAbort);
      release();
    };

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TaskTimeoutError(timeoutMs, { pool: config.name });
        // Reject before aborting so the deadline wins the race
        reject(error);
        controller.abort(error);
      }, timeoutMs);
    });

    let work: Promise<T>;
    try {
      work = job(controller.signal);
    } catch (error) {
      work = Promise.reject(error);
    }

    try {
      return await Promise.race([work, deadline]);
    } catch (error) {
      if (error instanceof TaskTimeoutError) {
        // The job may settle later; keep its outcome out of the caller's way
        work.catch((late: unknown) => {
          const message = late instanceof Error ? late.message : String(late);
          console.log(`[${config.name}] Job settled after timeout: ${message}`);
        });
      }
      throw error;
    } finally {
      clearTimeout(timer);
      releaseOnce();
    }
  }

  /**
   * Get current pool statistics.
   */
  function getStats(): WorkerPoolStats {
    return { running, waiting: waiting.length, size: config.size };
  }

  return {
    run,
    getStats,
  };
}

export type WorkerPool = ReturnType<typeof createWorkerPool>;
