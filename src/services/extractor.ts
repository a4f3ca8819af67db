/**
 * yt-dlp wrapper for probing available formats and downloading media.
 *
 * Design:
 * - Pure command builders and output parsers (testable)
 * - Process runner interface for dependency injection
 * - Failures are classified into the download error taxonomy
 */

import { spawn } from "node:child_process";
import { readdir, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import {
  CancelledError,
  type DownloadError,
  type ErrorContext,
  FormatUnavailableError,
  OutputTooLargeError,
  SourceUnavailableError,
  TransientNetworkError,
  UnknownError,
} from "./errors.ts";
import type { Artifact, FormatSpec, MediaFormat, MediaInfo } from "./ytdlp-types.ts";

// ============================================================================
// Types
// ============================================================================

export interface ExtractorConfig {
  /** yt-dlp binary path */
  ytdlpPath: string;
  /** Passed as --max-filesize */
  maxOutputSizeBytes: number;
}

export interface DownloadArgsOptions {
  url: string;
  format: FormatSpec;
  destDir: string;
  maxFileSizeBytes: number;
}

export interface DownloadOutput {
  title: string | null;
  expectedSizeBytes: number | null;
  filePath: string | null;
}

// ============================================================================
// Process Runner Interface
// ============================================================================

/**
 * Process runner output.
 */
export interface ProcessOutput {
  success: boolean;
  code: number;
  stdout: string;
  stderr: string;
  /** True when the process was killed because the signal aborted */
  aborted: boolean;
}

/**
 * Process runner interface for dependency injection.
 */
export interface ProcessRunner {
  run(cmd: string, args: string[], options?: { signal?: AbortSignal }): Promise<ProcessOutput>;
}

/**
 * Default process runner using child_process.spawn.
 */
export const defaultProcessRunner: ProcessRunner = {
  run(cmd, args, options = {}) {
    return new Promise<ProcessOutput>((resolve) => {
      const { signal } = options;
      let stdout = "";
      let stderr = "";
      let aborted = false;

      const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      const onAbort = () => {
        aborted = true;
        child.kill("SIGTERM");
      };
      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener("abort", onAbort, { once: true });
      }

      child.on("error", (error) => {
        signal?.removeEventListener("abort", onAbort);
        resolve({ success: false, code: -1, stdout, stderr: stderr || error.message, aborted });
      });
      child.on("close", (code) => {
        signal?.removeEventListener("abort", onAbort);
        const exitCode = code ?? -1;
        resolve({ success: exitCode === 0 && !aborted, code: exitCode, stdout, stderr, aborted });
      });
    });
  },
};

// ============================================================================
// Command Builders (pure functions)
// ============================================================================

/**
 * Build yt-dlp arguments that dump metadata as a single JSON document.
 */
export function buildLookupArgs(url: string): string[] {
  return ["-J", "--no-playlist", "--no-warnings", url];
}

/**
 * Build yt-dlp download arguments.
 * Prints the metadata JSON before the download and the final path after it.
 */
export function buildDownloadArgs(options: DownloadArgsOptions): string[] {
  const args: string[] = [
    "-f", options.format.selector,
    "--no-playlist",
    "--no-warnings",
    "--no-progress",
    "--no-simulate",
    "--socket-timeout", "30",
    "--max-filesize", String(options.maxFileSizeBytes),
    "-o", join(options.destDir, "%(title).200B.%(ext)s"),
    "--print", "before_dl:%(.{title,filesize,filesize_approx})j",
    "--print", "after_move:filepath",
  ];

  if (options.format.kind === "audio") {
    args.push("-x", "--audio-format", "mp3", "--audio-quality", "320K");
  } else {
    args.push("--merge-output-format", "mp4");
  }

  args.push(options.url);
  return args;
}

// ============================================================================
// Output Parsers (pure functions)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function parseFormat(raw: unknown, durationSeconds: number | null): MediaFormat | null {
  if (!isRecord(raw)) return null;

  const vcodec = typeof raw.vcodec === "string" ? raw.vcodec : null;
  const acodec = typeof raw.acodec === "string" ? raw.acodec : null;
  const height = numberOrNull(raw.height);
  const tbr = numberOrNull(raw.tbr);
  // Without codec info, a height is the only hint of a video track
  const hasVideo = vcodec === null ? height !== null : vcodec !== "none";
  const hasAudio = acodec !== null && acodec !== "none";

  // Storyboards and other image-only entries carry neither
  if (!hasVideo && !hasAudio) return null;

  let sizeBytes = numberOrNull(raw.filesize) ?? numberOrNull(raw.filesize_approx);
  if (sizeBytes === null && tbr !== null && durationSeconds !== null) {
    sizeBytes = Math.round(tbr * 125 * durationSeconds);
  }

  return {
    formatId: stringOr(raw.format_id, ""),
    ext: stringOr(raw.ext, ""),
    height: hasVideo ? height : null,
    hasVideo,
    hasAudio,
    tbr,
    sizeBytes,
  };
}

/**
 * Parse `yt-dlp -J` output into the normalized media model.
 */
export function parseLookupOutput(output: string): MediaInfo | null {
  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const durationSeconds = numberOrNull(data.duration);
  const rawFormats = Array.isArray(data.formats) ? data.formats : [];
  const formats: MediaFormat[] = [];
  for (const raw of rawFormats) {
    const format = parseFormat(raw, durationSeconds);
    if (format) formats.push(format);
  }

  return {
    id: stringOr(data.id, ""),
    title: stringOr(data.title, "Untitled"),
    durationSeconds,
    formats,
  };
}

/**
 * Parse the --print lines emitted by a download run.
 */
export function parseDownloadOutput(output: string): DownloadOutput {
  const result: DownloadOutput = { title: null, expectedSizeBytes: null, filePath: null };

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith("{")) {
      try {
        const data: unknown = JSON.parse(line);
        if (isRecord(data)) {
          result.title = typeof data.title === "string" ? data.title : result.title;
          result.expectedSizeBytes =
            numberOrNull(data.filesize) ?? numberOrNull(data.filesize_approx) ?? result.expectedSizeBytes;
        }
        continue;
      } catch {
        // Not JSON after all; treat it as a path line below
      }
    }

    result.filePath = line;
  }

  return result;
}

// ============================================================================
// Failure Classification (pure function)
// ============================================================================

const TOO_LARGE_PATTERNS = [
  /larger than max-filesize/i,
  /file is larger than/i,
];

const SOURCE_UNAVAILABLE_PATTERNS = [
  /video.*unavailable/i,
  /video.*private/i,
  /private video/i,
  /has been removed/i,
  /account.*terminated/i,
  /age.*restrict/i,
  /confirm your age/i,
  /members.?only/i,
  /join this channel/i,
  /not available in your country/i,
  /HTTP Error 40[34]/i,
];

const FORMAT_UNAVAILABLE_PATTERNS = [
  /unsupported url/i,
  /requested format.*not available/i,
  /no video formats found/i,
];

const TRANSIENT_PATTERNS = [
  /timed? ?out/i,
  /connection (reset|refused|aborted)/i,
  /temporary failure in name resolution/i,
  /getaddrinfo/i,
  /name or service not known/i,
  /network is unreachable/i,
  /HTTP Error (5\d\d|429)/i,
  /unable to download webpage/i,
  /incomplete ?read/i,
  /remote end closed connection/i,
];

/**
 * Pick the most informative line of yt-dlp's stderr.
 */
export function summarizeOutput(output: string): string {
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  const errorLine = [...lines].reverse().find((line) => line.startsWith("ERROR:"));
  const summary = errorLine ?? lines[lines.length - 1] ?? "yt-dlp failed without output";
  return summary.length > 500 ? `${summary.slice(0, 500)}...` : summary;
}

/**
 * Classify a failed yt-dlp run by its output.
 */
export function classifyExtractorFailure(
  output: string,
  context: ErrorContext = {},
  maxOutputSizeBytes = 0,
): DownloadError {
  const message = summarizeOutput(output);

  if (TOO_LARGE_PATTERNS.some((pattern) => pattern.test(output))) {
    return new OutputTooLargeError(null, maxOutputSizeBytes, context);
  }
  if (SOURCE_UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(message))) {
    return new SourceUnavailableError(message, context);
  }
  if (FORMAT_UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(message))) {
    return new FormatUnavailableError(message, context);
  }
  if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(message))) {
    return new TransientNetworkError(message, context);
  }
  return new UnknownError(message, { ...context, output: output.slice(-2000) });
}

// ============================================================================
// Extractor
// ============================================================================

/**
 * Find the produced file when yt-dlp did not print its path.
 * Partial downloads are ignored.
 */
async function findProducedFile(destDir: string): Promise<string | null> {
  const entries = await readdir(destDir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !name.endsWith(".part") && !name.endsWith(".ytdl"));
  const first = files.sort()[0];
  return first ? join(destDir, first) : null;
}

/**
 * Create an extractor instance.
 */
export function createExtractor(
  config: ExtractorConfig,
  runner: ProcessRunner = defaultProcessRunner,
) {
  /**
   * List the encodings available for a URL.
   */
  async function listFormats(url: string, signal?: AbortSignal): Promise<MediaInfo> {
    const result = await runner.run(config.ytdlpPath, buildLookupArgs(url), { signal });

    if (result.aborted || signal?.aborted) {
      throw new CancelledError("Format lookup cancelled", { url });
    }
    if (!result.success) {
      throw classifyExtractorFailure(result.stderr || result.stdout, { url, exitCode: result.code });
    }

    const info = parseLookupOutput(result.stdout);
    if (!info) {
      throw new UnknownError("Could not parse yt-dlp metadata", { url });
    }
    return info;
  }

  /**
   * Download one format of a URL into destDir.
   */
  async function fetch(
    url: string,
    format: FormatSpec,
    destDir: string,
    signal?: AbortSignal,
  ): Promise<Artifact> {
    const context = { url, format: format.label };
    const args = buildDownloadArgs({
      url,
      format,
      destDir,
      maxFileSizeBytes: config.maxOutputSizeBytes,
    });
    const result = await runner.run(config.ytdlpPath, args, { signal });

    if (result.aborted || signal?.aborted) {
      throw new CancelledError("Download cancelled", context);
    }
    if (!result.success) {
      throw classifyExtractorFailure(
        `${result.stdout}\n${result.stderr}`,
        { ...context, exitCode: result.code },
        config.maxOutputSizeBytes,
      );
    }

    const parsed = parseDownloadOutput(result.stdout);
    const filePath = parsed.filePath ?? (await findProducedFile(destDir));

    if (!filePath) {
      // yt-dlp exits cleanly when --max-filesize stops a download
      const tooLarge =
        TOO_LARGE_PATTERNS.some((pattern) => pattern.test(result.stderr)) ||
        (parsed.expectedSizeBytes !== null && parsed.expectedSizeBytes > config.maxOutputSizeBytes);
      if (tooLarge) {
        throw new OutputTooLargeError(parsed.expectedSizeBytes, config.maxOutputSizeBytes, context);
      }
      throw new UnknownError("yt-dlp finished without producing a file", {
        ...context,
        stderr: result.stderr.slice(-2000),
      });
    }

    const info = await stat(filePath);
    return {
      filePath,
      fileSize: info.size,
      title: parsed.title ?? basename(filePath, extname(filePath)),
    };
  }

  return {
    listFormats,
    fetch,
  };
}

/**
 * Type for the extractor instance.
 */
export type Extractor = ReturnType<typeof createExtractor>;
