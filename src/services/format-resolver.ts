/**
 * Format resolver: reduces the encodings of a source to a small fixed menu.
 *
 * Design:
 * - Pure reduction from normalized metadata to menu options (testable)
 * - The lookup runs through the lookup worker pool, never on the caller's path
 * - Tiers are never fabricated: no matching encoding, no button
 */

import {
  ExtractionError,
  FormatUnavailableError,
  SourceUnavailableError,
  TaskTimeoutError,
  TransientNetworkError,
  toDownloadError,
} from "./errors.ts";
import type { Extractor } from "./extractor.ts";
import type { WorkerPool } from "./worker-pool.ts";
import type { FormatSpec, MediaFormat, MediaInfo, QualityTier } from "./ytdlp-types.ts";

// ============================================================================
// Types
// ============================================================================

export interface FormatOption {
  /** Stable id used in callback data */
  id: QualityTier;
  label: string;
  format: FormatSpec;
}

export interface ResolvedMenu {
  title: string;
  options: FormatOption[];
}

export interface FormatResolverDeps {
  extractor: Pick<Extractor, "listFormats">;
  pool: WorkerPool;
  timeoutMs: number;
}

interface VideoTier {
  tier: QualityTier;
  name: string;
  maxHeight: number;
}

const VIDEO_TIERS: VideoTier[] = [
  { tier: "sd", name: "SD", maxHeight: 480 },
  { tier: "hd", name: "HD", maxHeight: 720 },
  { tier: "fullhd", name: "Full HD", maxHeight: 1080 },
];

export const AUDIO_BITRATE_KBPS = 320;

// ============================================================================
// Reduction (pure functions)
// ============================================================================

function byHeightThenBitrate(a: MediaFormat, b: MediaFormat): number {
  const heightDiff = (b.height ?? 0) - (a.height ?? 0);
  if (heightDiff !== 0) return heightDiff;
  return (b.tbr ?? 0) - (a.tbr ?? 0);
}

/**
 * Select the best video encoding at or below maxHeight.
 * Pure function.
 */
export function selectVideoAtOrBelow(
  formats: MediaFormat[],
  maxHeight: number,
): MediaFormat | null {
  const candidates = formats
    .filter((f) => f.hasVideo && f.height !== null && f.height <= maxHeight)
    .sort(byHeightThenBitrate);
  return candidates[0] ?? null;
}

/**
 * Select the best audio encoding, preferring audio-only streams.
 * Pure function.
 */
export function selectBestAudio(formats: MediaFormat[]): MediaFormat | null {
  const byBitrate = (a: MediaFormat, b: MediaFormat) => (b.tbr ?? 0) - (a.tbr ?? 0);
  const audioOnly = formats.filter((f) => f.hasAudio && !f.hasVideo).sort(byBitrate);
  if (audioOnly.length > 0) return audioOnly[0] ?? null;
  return formats.filter((f) => f.hasAudio).sort(byBitrate)[0] ?? null;
}

function estimateVideoSize(video: MediaFormat, audio: MediaFormat | null): number | null {
  if (video.sizeBytes === null) return null;
  if (video.hasAudio || !audio) return video.sizeBytes;
  return video.sizeBytes + (audio.sizeBytes ?? 0);
}

/**
 * Reduce available encodings to the menu: SD/HD/Full HD tiers, Original, MP3.
 * Pure function.
 */
export function reduceFormats(info: MediaInfo): FormatOption[] {
  const options: FormatOption[] = [];
  const audio = selectBestAudio(info.formats);
  const seenHeights = new Set<number>();

  for (const { tier, name, maxHeight } of VIDEO_TIERS) {
    const video = selectVideoAtOrBelow(info.formats, maxHeight);
    if (!video || video.height === null || seenHeights.has(video.height)) continue;
    seenHeights.add(video.height);

    const label = `${name} (${video.height}p)`;
    options.push({
      id: tier,
      label,
      format: {
        tier,
        kind: "video",
        height: video.height,
        label,
        selector: `bestvideo[height<=${maxHeight}]+bestaudio/best[height<=${maxHeight}]`,
        estimatedSizeBytes: estimateVideoSize(video, audio),
      },
    });
  }

  // Original only when it is taller than every tier already offered
  const best = selectVideoAtOrBelow(info.formats, Infinity);
  if (best && best.height !== null && !seenHeights.has(best.height)) {
    const label = `Original (${best.height}p)`;
    options.push({
      id: "original",
      label,
      format: {
        tier: "original",
        kind: "video",
        height: best.height,
        label,
        selector: "bestvideo+bestaudio/best",
        estimatedSizeBytes: estimateVideoSize(best, audio),
      },
    });
  }

  if (audio) {
    const label = `MP3 ${AUDIO_BITRATE_KBPS}kbps`;
    options.push({
      id: "audio",
      label,
      format: {
        tier: "audio",
        kind: "audio",
        height: null,
        label,
        selector: "bestaudio/best",
        estimatedSizeBytes:
          info.durationSeconds === null
            ? null
            : Math.round(AUDIO_BITRATE_KBPS * 125 * info.durationSeconds),
      },
    });
  }

  return options;
}

// ============================================================================
// Resolver Factory
// ============================================================================

/**
 * Create a format resolver.
 */
export function createFormatResolver(deps: FormatResolverDeps) {
  /**
   * Look up a URL and build its format menu.
   * Throws ExtractionError when the source cannot be used.
   */
  async function resolve(url: string): Promise<ResolvedMenu> {
    let info: MediaInfo;
    try {
      info = await deps.pool.run((signal) => deps.extractor.listFormats(url, signal), {
        timeoutMs: deps.timeoutMs,
      });
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      if (error instanceof TransientNetworkError || error instanceof TaskTimeoutError) {
        throw new SourceUnavailableError(error.message, { url, transient: true });
      }
      throw toDownloadError(error, { url });
    }

    const options = reduceFormats(info);
    if (options.length === 0) {
      throw new FormatUnavailableError("No downloadable formats found", { url });
    }

    return { title: info.title, options };
  }

  return {
    resolve,
  };
}

/**
 * Type for the format resolver instance.
 */
export type FormatResolver = ReturnType<typeof createFormatResolver>;
