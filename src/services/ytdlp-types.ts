/**
 * Normalized media model built from yt-dlp metadata.
 */

// ============================================================================
// Normalized model
// ============================================================================

export interface MediaFormat {
  formatId: string;
  ext: string;
  height: number | null;
  hasVideo: boolean;
  hasAudio: boolean;
  /** Total bitrate in kbit/s */
  tbr: number | null;
  /** Exact or approximate size, or an estimate from bitrate and duration */
  sizeBytes: number | null;
}

export interface MediaInfo {
  id: string;
  title: string;
  durationSeconds: number | null;
  formats: MediaFormat[];
}

export type QualityTier = "sd" | "hd" | "fullhd" | "original" | "audio";

export type MediaKind = "video" | "audio";

/**
 * A resolved, user-selectable format.
 */
export interface FormatSpec {
  tier: QualityTier;
  kind: MediaKind;
  /** Resolved video height, null for audio */
  height: number | null;
  /** Human label such as "HD (720p)" */
  label: string;
  /** yt-dlp format selector */
  selector: string;
  estimatedSizeBytes: number | null;
}

/**
 * A file produced by a download.
 */
export interface Artifact {
  filePath: string;
  fileSize: number;
  title: string;
}
