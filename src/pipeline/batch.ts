import fs from "node:fs/promises";
import pLimit from "p-limit";
import { Agent, type Dispatcher } from "undici";
import type { AppConfig, DownloadSettings } from "../config.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { LedgerStore } from "../store/ledgerStore.js";
import type { BatchSummary, DownloadResult, WorkItem } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { checkConnectivity, hostFromUrl } from "../utils/network.js";
import { DownloadWorker, type FileDownloader } from "./download.js";
import { HeadSizeProber } from "./sizeProber.js";
import { duplicateEntries, filenameFromEntry, isUrl, readWorkList, selectPending } from "./worklist.js";

export interface BatchSchedulerOptions {
  settings: DownloadSettings;
  ledger: LedgerStore;
  /** Shared pool; when omitted the scheduler opens one per batch and closes it afterwards. */
  dispatcher?: Dispatcher;
  createDownloader?: (dispatcher: Dispatcher) => FileDownloader;
  clock?: Clock;
  logger?: Logger;
}

export function toGroups<T>(items: T[], size: number): T[][] {
  const groups: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    groups.push(items.slice(i, i + size));
  }
  return groups;
}

export class BatchScheduler {
  private readonly settings: DownloadSettings;
  private readonly ledger: LedgerStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly log: Logger;

  constructor(private readonly opts: BatchSchedulerOptions) {
    this.settings = opts.settings;
    this.ledger = opts.ledger;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? silentLogger;
    this.log = this.logger.child({ module: "batch" });
  }

  /**
   * Downloads every URL of the work list not yet in the ledger, in groups of
   * `concurrencyLimit`, pausing between groups. Per-item failures are counted,
   * never thrown.
   */
  async runBatch(
    workList: string[],
    concurrencyLimit: number = this.settings.maxConcurrentDownloads,
    maxItems?: number
  ): Promise<BatchSummary> {
    const limit = Math.max(1, Math.floor(concurrencyLimit));
    const completed = await this.ledger.listCompleted();
    this.log.info(`Found ${completed.size} already downloaded files`);

    const urls = workList.filter(isUrl);
    for (const url of duplicateEntries(workList)) {
      this.log.warn({ url, filename: filenameFromEntry(url) }, `Skipping ${url}: its filename is already listed`);
    }
    const pending = selectPending(workList, completed, maxItems);
    const summary: BatchSummary = {
      requested: urls.length,
      skipped: urls.filter((url) => completed.has(filenameFromEntry(url))).length,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      results: [],
    };

    if (pending.length === 0) {
      this.log.info("No new videos to download");
      return summary;
    }
    this.log.info(
      { limited: maxItems !== undefined },
      `Downloading ${pending.length} videos${maxItems !== undefined ? " (limited)" : ""}`
    );

    const ownsDispatcher = this.opts.dispatcher === undefined;
    const dispatcher =
      this.opts.dispatcher ??
      new Agent({
        connections: limit,
        headersTimeout: this.settings.chunkTimeoutMs,
        bodyTimeout: 0,
      });
    const downloader = this.opts.createDownloader
      ? this.opts.createDownloader(dispatcher)
      : this.defaultDownloader(dispatcher);
    const budget = pLimit(limit);

    try {
      const groups = toGroups(pending, limit);
      for (let i = 0; i < groups.length; i++) {
        const results = await Promise.all(
          groups[i].map((item) => budget(() => this.runItem(downloader, item)))
        );
        summary.results.push(...results);

        if (i < groups.length - 1) {
          this.log.info(`Waiting ${this.settings.batchDelayMs}ms before starting next batch...`);
          await this.clock.sleep(this.settings.batchDelayMs);
        }
      }
    } finally {
      if (ownsDispatcher) await dispatcher.close();
    }

    summary.attempted = summary.results.length;
    summary.succeeded = summary.results.filter((r) => r.ok).length;
    summary.failed = summary.attempted - summary.succeeded;
    this.logSummary(summary);
    return summary;
  }

  private defaultDownloader(dispatcher: Dispatcher): FileDownloader {
    return new DownloadWorker({
      settings: this.settings,
      ledger: this.ledger,
      dispatcher,
      prober: new HeadSizeProber(dispatcher, this.logger),
      clock: this.clock,
      logger: this.logger,
    });
  }

  private async runItem(downloader: FileDownloader, item: WorkItem): Promise<DownloadResult> {
    try {
      return await downloader.run(item);
    } catch (err) {
      this.log.error({ filename: item.filename, err }, `Unexpected error downloading ${item.filename}`);
      return {
        url: item.url,
        filename: item.filename,
        ok: false,
        outcome: "unexpected",
        attempts: 1,
        error: errorMessage(err),
      };
    }
  }

  private logSummary(summary: BatchSummary): void {
    this.log.info(
      { succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped },
      `Download batch complete. Successful: ${summary.succeeded}, Failed: ${summary.failed}`
    );
    for (const r of summary.results.filter((result) => !result.ok)) {
      this.log.warn({ filename: r.filename, outcome: r.outcome }, `  ${r.url} - ${r.error ?? r.outcome}`);
    }
  }
}

export interface RunDownloadsOptions {
  limit?: number;
  logger?: Logger;
  clock?: Clock;
  dispatcher?: Dispatcher;
  checkConnectivity?: (host: string) => Promise<boolean>;
}

/**
 * Full download run as started from the command line: read the work list,
 * run the connectivity pre-flight, then one batch.
 */
export async function runDownloads(cfg: AppConfig, opts: RunDownloadsOptions = {}): Promise<BatchSummary> {
  const logger = opts.logger ?? silentLogger;
  const log = logger.child({ module: "batch" });

  const workList = await readWorkList(cfg.downloadListFile);
  await fs.mkdir(cfg.downloadDir, { recursive: true });

  const ledger = LedgerStore.fromConfig(cfg, logger);
  const scheduler = new BatchScheduler({
    settings: cfg.download,
    ledger,
    dispatcher: opts.dispatcher,
    clock: opts.clock,
    logger,
  });

  let connectivityOk: boolean | undefined;
  if (cfg.connectivity.enabled) {
    const host = cfg.connectivity.host ?? hostFromUrl(workList.find(isUrl));
    if (host) {
      const check = opts.checkConnectivity ?? ((h: string) => checkConnectivity(h, { logger }));
      connectivityOk = await check(host);
      if (!connectivityOk && cfg.connectivity.required) {
        log.error({ host }, "Connectivity check failed, not starting the batch");
        return {
          requested: workList.filter(isUrl).length,
          skipped: 0,
          attempted: 0,
          succeeded: 0,
          failed: 0,
          connectivityOk,
          results: [],
        };
      }
      if (!connectivityOk) {
        log.warn({ host }, "Connectivity check failed, continuing anyway");
      }
    }
  }

  const summary = await scheduler.runBatch(workList, cfg.download.maxConcurrentDownloads, opts.limit);
  return { ...summary, connectivityOk };
}
