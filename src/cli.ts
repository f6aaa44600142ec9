#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { runDownloads } from "./pipeline/batch.js";
import { recordPendingSizes } from "./pipeline/sizeProber.js";
import { LocalAsrTranscriber } from "./pipeline/transcribe_local.js";
import { TranscriptionService } from "./pipeline/transcribeService.js";
import { isUrl, readWorkList } from "./pipeline/worklist.js";
import { startServer } from "./server.js";
import { LedgerStore } from "./store/ledgerStore.js";
import { checkConnectivity, hostFromUrl } from "./utils/network.js";

const USAGE = `Usage: media-fetch <command> [options]

Commands:
  download [--limit N]       Download pending videos from the work list
  probe-sizes [--limit N]    Record expected sizes of pending videos (HEAD requests)
  check-network [--host H]   Run the DNS and ping pre-flight check
  transcribe [--once]        Transcribe downloaded videos (polls unless --once)
  serve                      Start the status HTTP server
`;

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const limit = Number.parseInt(raw, 10);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new Error(`--limit must be a non-negative integer, got "${raw}"`);
  }
  return limit;
}

async function download(cfg: AppConfig, log: Logger, limit: number | undefined): Promise<number> {
  const summary = await runDownloads(cfg, { limit, logger: log });
  log.info(
    { attempted: summary.attempted, succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped },
    "Download run finished"
  );
  return 0;
}

async function probeSizes(cfg: AppConfig, log: Logger, limit: number | undefined): Promise<number> {
  const summary = await recordPendingSizes(cfg, { limit, logger: log });
  log.info(summary, `Recorded ${summary.recorded} sizes (${summary.unknown} unknown, ${summary.alreadyKnown} already known)`);
  return 0;
}

async function checkNetwork(cfg: AppConfig, log: Logger, hostArg: string | undefined): Promise<number> {
  let host = hostArg ?? cfg.connectivity.host;
  if (!host) {
    const workList = await readWorkList(cfg.downloadListFile);
    host = hostFromUrl(workList.find(isUrl));
  }
  if (!host) {
    log.error("No host to check: pass --host or set CONNECTIVITY_HOST");
    return 1;
  }
  return (await checkConnectivity(host, { logger: log })) ? 0 : 1;
}

async function transcribe(cfg: AppConfig, log: Logger, once: boolean): Promise<number> {
  const transcriber = new LocalAsrTranscriber(cfg.transcription);
  if (!(await transcriber.healthCheck())) {
    log.warn(`Local ASR service health check failed at ${cfg.transcription.localAsrBaseUrl}`);
  }
  const service = new TranscriptionService({
    ledger: LedgerStore.fromConfig(cfg, log),
    transcriber,
    transcriptDir: cfg.transcriptDir,
    settings: cfg.transcription,
    logger: log,
  });

  if (once) {
    await service.runOnce();
    return 0;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());
  await service.watch(controller.signal);
  return 0;
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      limit: { type: "string" },
      host: { type: "string" },
      once: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const command = positionals[0];
  if (values.help || !command) {
    process.stdout.write(USAGE);
    return values.help ? 0 : 1;
  }

  const cfg = loadConfig();
  const log = createLogger(cfg.logLevel);

  switch (command) {
    case "download":
      return download(cfg, log, parseLimit(values.limit));
    case "probe-sizes":
      return probeSizes(cfg, log, parseLimit(values.limit));
    case "check-network":
      return checkNetwork(cfg, log, values.host);
    case "transcribe":
      return transcribe(cfg, log, values.once ?? false);
    case "serve":
      await startServer(cfg, log);
      return 0;
    default:
      process.stderr.write(`Unknown command "${command}"\n\n${USAGE}`);
      return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
);
