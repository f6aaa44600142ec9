/**
 * Centralized defaults
 * Every value here can be overridden through the environment (see config.ts)
 */

export const DEFAULT_DOWNLOAD_DIR = "/data/videos";
export const DEFAULT_TRACKING_DIR = "/data/tracking";
export const DEFAULT_TRANSCRIPT_DIR = "/data/transcripts";

// Tracking files live inside the tracking directory
export const DOWNLOADED_FILE_NAME = "downloaded.txt";
export const DOWNLOAD_LIST_FILE_NAME = "download_list.txt";
export const FILE_SIZES_FILE_NAME = "file_sizes.json";

// Transfer
export const DEFAULT_CHUNK_SIZE = 1024 * 1024; // 1 MiB
export const DEFAULT_CHUNK_TIMEOUT_MS = 30 * 60 * 1000; // 30 minutes per chunk
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_DELAY_MS = 5 * 60 * 1000; // doubled on every attempt
export const DEFAULT_MAX_CONCURRENT_DOWNLOADS = 2;
export const DEFAULT_RATE_LIMIT_DELAY_MS = 60 * 1000;
export const DEFAULT_BATCH_DELAY_MS = 60 * 1000;

// Speed monitoring
export const DEFAULT_SPEED_CHECK_INTERVAL_MS = 60 * 1000;
export const DEFAULT_MIN_BYTES_PER_SECOND = 1024;
export const DEFAULT_STALL_THRESHOLD = 3;

// Transcription
export const DEFAULT_WHISPER_MODEL = "distil-large-v3";
export const DEFAULT_LOCAL_ASR_BASE_URL = "http://localhost:5689";
export const DEFAULT_LOCAL_TIMEOUT_MS = 2 * 60 * 60 * 1000; // full file processing
export const MIN_LOCAL_TIMEOUT_MS = 60 * 1000;
export const DEFAULT_TRANSCRIBE_POLL_INTERVAL_MS = 60 * 1000;

export const DEFAULT_PORT = 5688;

// Node error codes that mean the connection itself failed
export const NETWORK_ERROR_CODES = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
] as const;

export type NetworkErrorCode = (typeof NETWORK_ERROR_CODES)[number];

const networkErrorCodes: ReadonlySet<string> = new Set(NETWORK_ERROR_CODES);

export function isNetworkErrorCode(code: string): code is NetworkErrorCode {
  return networkErrorCodes.has(code);
}
