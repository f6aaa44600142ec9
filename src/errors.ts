import { errors as undiciErrors } from "undici";
import { isNetworkErrorCode } from "./constants.js";

/** Invalid environment or missing input files. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A tracking file exists but cannot be parsed, so it must not be rewritten. */
export class TrackingFileError extends Error {
  constructor(
    public readonly file: string,
    detail: string
  ) {
    super(`Tracking file ${file} is unreadable: ${detail}`);
    this.name = "TrackingFileError";
  }
}

/** Server answered with a non-2xx status. Terminal for the attempt, never retried. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string
  ) {
    super(`HTTP ${status}${describeStatus(status)}`);
    this.name = "HttpStatusError";
  }
}

/** Timeout-class failure. Retried with backoff like a network error. */
export class DownloadTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DownloadTimeoutError";
  }
}

export class ChunkTimeoutError extends DownloadTimeoutError {
  constructor(public readonly timeoutMs: number) {
    super(`No data received for ${timeoutMs}ms`);
    this.name = "ChunkTimeoutError";
  }
}

export class StallError extends DownloadTimeoutError {
  constructor(
    public readonly bytesWritten: number,
    public readonly expectedSize: number
  ) {
    super(`Download stalled multiple times: got ${bytesWritten} bytes, expected ${expectedSize}`);
    this.name = "StallError";
  }
}

export class IncompleteDownloadError extends DownloadTimeoutError {
  constructor(
    public readonly bytesOnDisk: number,
    public readonly expectedSize: number
  ) {
    super(`Stream ended early: ${bytesOnDisk} bytes on disk, expected ${expectedSize}`);
    this.name = "IncompleteDownloadError";
  }
}

export class TranscriptionError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "TranscriptionError";
  }
}

export function describeStatus(status: number): string {
  switch (status) {
    case 404:
      return " - File not found";
    case 403:
      return " - Access forbidden";
    case 401:
      return " - Authentication required";
    default:
      return "";
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Transient failures: timeouts, stalls and connection-level errors.
 * HTTP statuses and local failures (disk, permissions) are not retryable.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof HttpStatusError) return false;
  if (err instanceof DownloadTimeoutError) return true;
  if (err instanceof undiciErrors.UndiciError) return true;

  const code = errorCode(err);
  if (code && isNetworkErrorCode(code)) return true;

  // fetch-style wrappers keep the socket error as the cause
  if (err instanceof Error && err.cause !== undefined && err.cause !== err) {
    return isRetryableError(err.cause);
  }
  return false;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
