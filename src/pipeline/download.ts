import fs, { type FileHandle } from "node:fs/promises";
import { request, type Dispatcher } from "undici";
import type { DownloadSettings } from "../config.js";
import {
  ChunkTimeoutError,
  HttpStatusError,
  IncompleteDownloadError,
  StallError,
  TrackingFileError,
  errorMessage,
  isRetryableError,
} from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { LedgerStore } from "../store/ledgerStore.js";
import type { DownloadResult, WorkItem } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { parseContentLength, type SizeProber } from "./sizeProber.js";
import { StallMonitor, type MonitorEvent } from "./stallMonitor.js";

export interface FileDownloader {
  run(item: WorkItem): Promise<DownloadResult>;
}

export interface DownloadWorkerOptions {
  settings: DownloadSettings;
  ledger: LedgerStore;
  dispatcher?: Dispatcher;
  prober?: SizeProber;
  clock?: Clock;
  logger?: Logger;
}

/** Wait before retrying after failed attempt `attempt` (0-based). */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new ChunkTimeoutError(timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * Yields the body in pieces of at most `chunkSize` bytes. Every read from the
 * source must settle within `timeoutMs`, otherwise a ChunkTimeoutError is thrown.
 */
export async function* readChunks(
  source: AsyncIterable<Uint8Array>,
  chunkSize: number,
  timeoutMs: number
): AsyncGenerator<Uint8Array> {
  const iterator = source[Symbol.asyncIterator]();
  while (true) {
    const next = await withTimeout(iterator.next(), timeoutMs);
    if (next.done) return;
    const data = next.value;
    for (let offset = 0; offset < data.length; offset += chunkSize) {
      yield data.subarray(offset, offset + chunkSize);
    }
  }
}

function formatSpeed(bytesPerSecond: number): string {
  return `${(bytesPerSecond / 1024).toFixed(2)} KB/s`;
}

/**
 * Streams one file to the download directory with retry, exponential backoff
 * and stall detection. The filename is written to the ledger only after the
 * whole payload is on disk.
 */
export class DownloadWorker implements FileDownloader {
  private readonly settings: DownloadSettings;
  private readonly ledger: LedgerStore;
  private readonly dispatcher?: Dispatcher;
  private readonly prober?: SizeProber;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(opts: DownloadWorkerOptions) {
    this.settings = opts.settings;
    this.ledger = opts.ledger;
    this.dispatcher = opts.dispatcher;
    this.prober = opts.prober;
    this.clock = opts.clock ?? systemClock;
    this.log = (opts.logger ?? silentLogger).child({ module: "download" });
  }

  async download(url: string, filename: string): Promise<boolean> {
    const result = await this.run({ url, filename });
    return result.ok;
  }

  async run(item: WorkItem): Promise<DownloadResult> {
    const { filename } = item;
    const { maxRetries, retryDelayMs, rateLimitDelayMs } = this.settings;
    const base = { url: item.url, filename };
    let lastError: string | undefined;

    this.log.info({ filename }, `Starting download of ${filename}`);

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      if (attempt === 0) {
        this.log.info({ filename }, `Waiting ${rateLimitDelayMs}ms before starting download...`);
        await this.clock.sleep(rateLimitDelayMs);
      }

      try {
        const bytes = await this.attempt(item);
        this.log.info({ filename, bytes, attempt }, `Successfully downloaded ${filename}`);
        return { ...base, ok: true, outcome: "completed", attempts: attempt + 1, bytes };
      } catch (err) {
        if (err instanceof HttpStatusError) {
          this.log.error({ filename, status: err.status }, `Failed to download ${filename}: ${err.message}`);
          return {
            ...base,
            ok: false,
            outcome: "http_status",
            attempts: attempt + 1,
            status: err.status,
            error: err.message,
          };
        }

        if (!isRetryableError(err)) {
          this.log.error({ filename, err }, `Unexpected error downloading ${filename}: ${errorMessage(err)}`);
          return { ...base, ok: false, outcome: "unexpected", attempts: attempt + 1, error: errorMessage(err) };
        }

        lastError = errorMessage(err);
        this.log.error({ filename, attempt }, `Network error downloading ${filename}: ${lastError}`);

        if (attempt < maxRetries - 1) {
          const waitMs = backoffDelay(retryDelayMs, attempt);
          this.log.info({ filename, attempt, waitMs }, `Retrying download of ${filename} in ${waitMs}ms...`);
          await this.clock.sleep(waitMs);
        }
      }
    }

    this.log.error({ filename, attempts: maxRetries }, `Giving up on ${filename} after ${maxRetries} attempts`);
    return { ...base, ok: false, outcome: "retries_exhausted", attempts: maxRetries, error: lastError };
  }

  private async resolveExpectedSize(item: WorkItem): Promise<number | undefined> {
    const recorded = await this.ledger.expectedSize(item.filename);
    if (recorded !== undefined || !this.settings.probeSizes || !this.prober) return recorded;

    const probed = await this.prober.probe(item.url);
    if (probed !== undefined) {
      try {
        await this.ledger.recordExpectedSize(item.filename, probed);
      } catch (err) {
        if (!(err instanceof TrackingFileError)) throw err;
        this.log.warn({ filename: item.filename }, `Probed size not recorded: ${err.message}`);
      }
    }
    return probed;
  }

  /** One end-to-end transfer from byte 0. Returns the number of bytes on disk. */
  private async attempt(item: WorkItem): Promise<number> {
    const { filename } = item;
    const { chunkSize, chunkTimeoutMs } = this.settings;

    const expectedSize = await this.resolveExpectedSize(item);

    const { statusCode, headers, body } = await request(item.url, {
      method: "GET",
      dispatcher: this.dispatcher,
      highWaterMark: chunkSize,
      headersTimeout: chunkTimeoutMs,
      // idle time between chunks is bounded by readChunks
      bodyTimeout: 0,
    });

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new HttpStatusError(statusCode, item.url);
    }

    const contentLength = parseContentLength(headers["content-length"]);
    const monitor = new StallMonitor(
      {
        speedCheckIntervalMs: this.settings.speedCheckIntervalMs,
        minBytesPerSecond: this.settings.minBytesPerSecond,
        stallThreshold: this.settings.stallThreshold,
        progressTimeoutMs: chunkTimeoutMs,
      },
      { expectedSize, totalSize: contentLength ?? expectedSize },
      this.clock.now()
    );

    const outputPath = this.ledger.filePath(filename);
    let handle: FileHandle;
    try {
      await fs.mkdir(this.ledger.downloadDir, { recursive: true });
      handle = await fs.open(outputPath, "w");
    } catch (err) {
      body.destroy();
      throw err;
    }

    try {
      for await (const piece of readChunks(body, chunkSize, chunkTimeoutMs)) {
        await handle.write(piece);
        const events = monitor.onChunk(piece.length, this.clock.now());
        this.report(filename, events);
      }
    } catch (err) {
      monitor.fail();
      body.destroy();
      throw err;
    } finally {
      await handle.close();
    }

    const bytesOnDisk = (await fs.stat(outputPath)).size;
    const required = expectedSize ?? contentLength;
    if (required !== undefined && bytesOnDisk !== required) {
      monitor.fail();
      throw new IncompleteDownloadError(bytesOnDisk, required);
    }

    monitor.complete();
    await this.ledger.markCompleted(filename);
    return bytesOnDisk;
  }

  private report(filename: string, events: MonitorEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case "speed":
          this.log.info({ filename }, `Download speed for ${filename}: ${formatSpeed(event.bytesPerSecond)}`);
          break;
        case "slow":
          this.log.warn(
            { filename, stallCount: event.stallCount },
            `Download speed too slow for ${filename}: ${formatSpeed(event.bytesPerSecond)} (stall count: ${event.stallCount})`
          );
          break;
        case "progress":
          this.log.info(
            { filename, percent: event.percent },
            `Download progress for ${filename}: ${event.percent}% (elapsed: ${Math.floor(event.elapsedMs / 1000)}s)`
          );
          break;
        case "no_progress":
          this.log.error(
            { filename, stallCount: event.stallCount },
            `No progress for ${filename} in ${Math.floor(event.idleMs / 1000)}s (stall count: ${event.stallCount})`
          );
          break;
        case "stall_confirmed":
          this.log.error(
            { filename, bytes: event.bytesWritten, expectedSize: event.expectedSize },
            `Download stalled multiple times for ${filename}: got ${event.bytesWritten} bytes, expected ${event.expectedSize}`
          );
          throw new StallError(event.bytesWritten, event.expectedSize);
      }
    }
  }
}
