import { request, type Dispatcher } from "undici";
import type { AppConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { LedgerStore } from "../store/ledgerStore.js";
import { readWorkList, selectPending } from "./worklist.js";

export interface SizeProber {
  probe(url: string): Promise<number | undefined>;
}

export function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function parseContentLength(value: string | string[] | undefined): number | undefined {
  const raw = headerValue(value);
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  const size = Number.parseInt(raw, 10);
  return Number.isSafeInteger(size) && size > 0 ? size : undefined;
}

/**
 * HEAD-based size oracle. Missing sizes only weaken stall detection, so every
 * failure is reported as `undefined` instead of an error.
 */
export class HeadSizeProber implements SizeProber {
  private readonly log: Logger;

  constructor(
    private readonly dispatcher?: Dispatcher,
    logger: Logger = silentLogger
  ) {
    this.log = logger.child({ module: "size-prober" });
  }

  async probe(url: string): Promise<number | undefined> {
    try {
      const { statusCode, headers, body } = await request(url, {
        method: "HEAD",
        dispatcher: this.dispatcher,
      });
      await body.dump();

      if (statusCode !== 200) {
        this.log.warn({ url, status: statusCode }, `HEAD request failed for ${url}: HTTP ${statusCode}`);
        return undefined;
      }
      const size = parseContentLength(headers["content-length"]);
      if (size === undefined) {
        this.log.warn({ url }, `Could not determine file size for ${url}`);
      }
      return size;
    } catch (err) {
      this.log.error({ url, error: errorMessage(err) }, `Error getting file size for ${url}`);
      return undefined;
    }
  }
}

export interface ProbeSummary {
  probed: number;
  recorded: number;
  unknown: number;
  alreadyKnown: number;
}

/**
 * Probes every pending URL without a recorded size, one request at a time,
 * and stores the sizes it learns in the sizes document.
 */
export async function recordPendingSizes(
  cfg: AppConfig,
  opts: { limit?: number; dispatcher?: Dispatcher; logger?: Logger } = {}
): Promise<ProbeSummary> {
  const logger = opts.logger ?? silentLogger;
  const ledger = LedgerStore.fromConfig(cfg, logger);
  const prober = new HeadSizeProber(opts.dispatcher, logger);

  const workList = await readWorkList(cfg.downloadListFile);
  const pending = selectPending(workList, await ledger.listCompleted(), opts.limit);
  const known = await ledger.readSizes();

  const summary: ProbeSummary = { probed: 0, recorded: 0, unknown: 0, alreadyKnown: 0 };
  for (const item of pending) {
    if (known[item.filename] !== undefined) {
      summary.alreadyKnown++;
      continue;
    }
    summary.probed++;
    const size = await prober.probe(item.url);
    if (size === undefined) {
      summary.unknown++;
      continue;
    }
    await ledger.recordExpectedSize(item.filename, size);
    summary.recorded++;
  }
  return summary;
}
