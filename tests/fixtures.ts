/**
 * Shared test data builders.
 */

import type { FormatSpec } from "../src/services/ytdlp-types.ts";

export const HD_FORMAT: FormatSpec = {
  tier: "hd",
  kind: "video",
  height: 720,
  label: "HD (720p)",
  selector: "bestvideo[height<=720]+bestaudio/best[height<=720]",
  estimatedSizeBytes: 10_000_000,
};

export const AUDIO_FORMAT: FormatSpec = {
  tier: "audio",
  kind: "audio",
  height: null,
  label: "MP3 320kbps",
  selector: "bestaudio/best",
  estimatedSizeBytes: 4_000_000,
};

export function formatSpec(overrides: Partial<FormatSpec> = {}): FormatSpec {
  return { ...HD_FORMAT, ...overrides };
}

/** Resolves after pending I/O callbacks and microtasks have run. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Polls a condition on a short timer until it holds. */
export async function waitFor(predicate: () => boolean, label = "condition"): Promise<void> {
  for (let i = 0; i < 500; i++) {
    if (predicate()) return;
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
  throw new Error(`Timed out waiting for ${label}`);
}
