import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_BATCH_DELAY_MS,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_TIMEOUT_MS,
  DEFAULT_DOWNLOAD_DIR,
  DEFAULT_LOCAL_ASR_BASE_URL,
  DEFAULT_LOCAL_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENT_DOWNLOADS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MIN_BYTES_PER_SECOND,
  DEFAULT_PORT,
  DEFAULT_RATE_LIMIT_DELAY_MS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_SPEED_CHECK_INTERVAL_MS,
  DEFAULT_STALL_THRESHOLD,
  DEFAULT_TRACKING_DIR,
  DEFAULT_TRANSCRIBE_POLL_INTERVAL_MS,
  DEFAULT_TRANSCRIPT_DIR,
  DEFAULT_WHISPER_MODEL,
  DOWNLOADED_FILE_NAME,
  DOWNLOAD_LIST_FILE_NAME,
  FILE_SIZES_FILE_NAME,
  MIN_LOCAL_TIMEOUT_MS,
} from "./constants.js";
import { ConfigError } from "./errors.js";

export interface DownloadSettings {
  chunkSize: number;
  chunkTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxConcurrentDownloads: number;
  rateLimitDelayMs: number;
  batchDelayMs: number;
  speedCheckIntervalMs: number;
  minBytesPerSecond: number;
  stallThreshold: number;
  probeSizes: boolean;
}

export interface ConnectivitySettings {
  enabled: boolean;
  required: boolean;
  host?: string;
}

export interface TranscriptionSettings {
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localAsrModel: string;
  localTimeoutMs: number;
  language?: string;
  withTimestamps: boolean;
  pollIntervalMs: number;
}

export interface AppConfig {
  downloadDir: string;
  trackingDir: string;
  transcriptDir: string;
  downloadedFile: string;
  downloadListFile: string;
  fileSizesFile: string;
  download: DownloadSettings;
  connectivity: ConnectivitySettings;
  transcription: TranscriptionSettings;
  port: number;
  logLevel: string;
}

// Unset and blank variables both fall back to the default
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .enum(["true", "false", "1", "0", "yes", "no"])
      .default(fallback ? "true" : "false")
      .transform((v) => v === "true" || v === "1" || v === "yes")
  );

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const EnvSchema = z.object({
  DOWNLOAD_DIR: text(DEFAULT_DOWNLOAD_DIR),
  TRACKING_DIR: text(DEFAULT_TRACKING_DIR),
  TRANSCRIPT_DIR: text(DEFAULT_TRANSCRIPT_DIR),

  CHUNK_SIZE: positiveInt(DEFAULT_CHUNK_SIZE),
  CHUNK_TIMEOUT_MS: positiveInt(DEFAULT_CHUNK_TIMEOUT_MS),
  MAX_RETRIES: positiveInt(DEFAULT_MAX_RETRIES),
  RETRY_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_DELAY_MS),
  MAX_CONCURRENT_DOWNLOADS: positiveInt(DEFAULT_MAX_CONCURRENT_DOWNLOADS),
  RATE_LIMIT_DELAY_MS: nonNegativeInt(DEFAULT_RATE_LIMIT_DELAY_MS),
  BATCH_DELAY_MS: nonNegativeInt(DEFAULT_BATCH_DELAY_MS),
  SPEED_CHECK_INTERVAL_MS: positiveInt(DEFAULT_SPEED_CHECK_INTERVAL_MS),
  MIN_SPEED_BYTES_PER_SECOND: nonNegativeInt(DEFAULT_MIN_BYTES_PER_SECOND),
  STALL_THRESHOLD: positiveInt(DEFAULT_STALL_THRESHOLD),
  PROBE_SIZES: flag(false),

  CONNECTIVITY_CHECK: flag(true),
  REQUIRE_CONNECTIVITY: flag(false),
  CONNECTIVITY_HOST: optionalText,

  LOCAL_ASR_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_LOCAL_ASR_BASE_URL)),
  LOCAL_ASR_MODEL: text(DEFAULT_WHISPER_MODEL),
  LOCAL_TIMEOUT_MS: positiveInt(DEFAULT_LOCAL_TIMEOUT_MS),
  TRANSCRIBE_LANGUAGE: optionalText,
  WITH_TIMESTAMPS: flag(false),
  TRANSCRIBE_POLL_INTERVAL_MS: positiveInt(DEFAULT_TRANSCRIBE_POLL_INTERVAL_MS),

  PORT: positiveInt(DEFAULT_PORT),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  ),
});

/**
 * Builds the configuration once from the environment. Components receive the
 * returned object and never read the environment themselves.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  const trackingDir = path.resolve(e.TRACKING_DIR);

  return {
    downloadDir: path.resolve(e.DOWNLOAD_DIR),
    trackingDir,
    transcriptDir: path.resolve(e.TRANSCRIPT_DIR),
    downloadedFile: path.join(trackingDir, DOWNLOADED_FILE_NAME),
    downloadListFile: path.join(trackingDir, DOWNLOAD_LIST_FILE_NAME),
    fileSizesFile: path.join(trackingDir, FILE_SIZES_FILE_NAME),
    download: {
      chunkSize: e.CHUNK_SIZE,
      chunkTimeoutMs: e.CHUNK_TIMEOUT_MS,
      maxRetries: e.MAX_RETRIES,
      retryDelayMs: e.RETRY_DELAY_MS,
      maxConcurrentDownloads: e.MAX_CONCURRENT_DOWNLOADS,
      rateLimitDelayMs: e.RATE_LIMIT_DELAY_MS,
      batchDelayMs: e.BATCH_DELAY_MS,
      speedCheckIntervalMs: e.SPEED_CHECK_INTERVAL_MS,
      minBytesPerSecond: e.MIN_SPEED_BYTES_PER_SECOND,
      stallThreshold: e.STALL_THRESHOLD,
      probeSizes: e.PROBE_SIZES,
    },
    connectivity: {
      enabled: e.CONNECTIVITY_CHECK,
      required: e.REQUIRE_CONNECTIVITY,
      host: e.CONNECTIVITY_HOST,
    },
    transcription: {
      localAsrBaseUrl: e.LOCAL_ASR_BASE_URL.replace(/\/+$/, ""),
      localAsrModel: e.LOCAL_ASR_MODEL,
      localTimeoutMs: Math.max(MIN_LOCAL_TIMEOUT_MS, e.LOCAL_TIMEOUT_MS),
      language: e.TRANSCRIBE_LANGUAGE,
      withTimestamps: e.WITH_TIMESTAMPS,
      pollIntervalMs: e.TRANSCRIBE_POLL_INTERVAL_MS,
    },
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}
