import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { TranscriptionSettings } from "../config.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { LedgerStore } from "../store/ledgerStore.js";
import type { TranscriptionRunSummary } from "../types.js";
import { isMissingFile } from "../utils/files.js";
import { formatTranscript, type Transcriber } from "./transcribe_local.js";

export interface TranscriptionServiceOptions {
  ledger: LedgerStore;
  transcriber: Transcriber;
  transcriptDir: string;
  settings: Pick<TranscriptionSettings, "withTimestamps" | "pollIntervalMs">;
  logger?: Logger;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

/**
 * Consumer side of the ledger: transcribes every downloaded video that has no
 * transcript yet and writes `<name>.txt` into the transcript directory.
 */
export class TranscriptionService {
  private readonly log: Logger;

  constructor(private readonly opts: TranscriptionServiceOptions) {
    this.log = (opts.logger ?? silentLogger).child({ module: "transcribe" });
  }

  transcriptPath(filename: string): string {
    const base = path.parse(filename).name;
    return path.join(this.opts.transcriptDir, `${base}.txt`);
  }

  async runOnce(): Promise<TranscriptionRunSummary> {
    const summary: TranscriptionRunSummary = { successful: 0, failed: 0, skipped: 0 };
    await fs.mkdir(this.opts.transcriptDir, { recursive: true });

    const downloaded = await this.opts.ledger.listCompleted();
    this.log.info(`Found ${downloaded.size} downloaded files to process`);

    for (const filename of downloaded) {
      const videoPath = this.opts.ledger.filePath(filename);
      if (!(await exists(videoPath))) {
        this.log.warn({ filename }, `Video file ${filename} not found, skipping`);
        summary.skipped++;
        continue;
      }

      const transcriptPath = this.transcriptPath(filename);
      if (await exists(transcriptPath)) {
        this.log.debug({ filename }, `Transcript for ${filename} already exists, skipping transcription`);
        summary.skipped++;
        continue;
      }

      if (await this.processVideo(filename, videoPath, transcriptPath)) {
        summary.successful++;
      } else {
        summary.failed++;
      }
    }

    this.log.info(
      summary,
      `Transcription batch complete. Successful: ${summary.successful}, Failed: ${summary.failed}`
    );
    return summary;
  }

  /** Repeats `runOnce` every poll interval until the signal aborts. */
  async watch(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.runOnce();
      try {
        await delay(this.opts.settings.pollIntervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }
    this.log.info("Transcription service stopped");
  }

  private async processVideo(filename: string, videoPath: string, transcriptPath: string): Promise<boolean> {
    try {
      this.log.info({ filename, withTimestamps: this.opts.settings.withTimestamps }, `Starting transcription of ${filename}`);
      const transcript = await this.opts.transcriber.transcribe(videoPath);
      const body = formatTranscript(transcript, this.opts.settings.withTimestamps);

      // only complete transcripts ever exist under the final name
      const tmpPath = `${transcriptPath}.partial`;
      await fs.writeFile(tmpPath, body, "utf-8");
      await fs.rename(tmpPath, transcriptPath);

      this.log.info({ filename }, `Successfully transcribed ${filename}`);
      return true;
    } catch (err) {
      this.log.error({ filename }, `Error transcribing ${filename}: ${errorMessage(err)}`);
      return false;
    }
  }
}
