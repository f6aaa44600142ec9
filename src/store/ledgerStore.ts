import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { TrackingFileError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isMissingFile } from "../utils/files.js";

const SizesDocumentSchema = z.record(z.string(), z.unknown());
const SizeSchema = z.number().int().positive();

export type FileSizes = Record<string, number>;

export interface LedgerPaths {
  downloadDir: string;
  downloadedFile: string;
  fileSizesFile: string;
}

/**
 * Durable record of completed downloads (`downloaded.txt`, append-only) and of
 * expected byte sizes (`file_sizes.json`).
 *
 * Writes are chained on a single promise so concurrent workers never
 * interleave appends or lose a size update.
 */
export class LedgerStore {
  private writeChain: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly paths: LedgerPaths,
    logger: Logger = silentLogger
  ) {
    this.log = logger.child({ module: "ledger" });
  }

  static fromConfig(cfg: AppConfig, logger?: Logger): LedgerStore {
    return new LedgerStore(
      {
        downloadDir: cfg.downloadDir,
        downloadedFile: cfg.downloadedFile,
        fileSizesFile: cfg.fileSizesFile,
      },
      logger
    );
  }

  get downloadDir(): string {
    return this.paths.downloadDir;
  }

  filePath(filename: string): string {
    return path.join(this.paths.downloadDir, filename);
  }

  async listCompleted(): Promise<Set<string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.paths.downloadedFile, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return new Set();
      throw err;
    }
    const names = raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return new Set(names);
  }

  /** Appends the filename. Repeated calls leave duplicate lines, which readers collapse. */
  markCompleted(filename: string): Promise<void> {
    return this.enqueue(async () => {
      await fs.mkdir(path.dirname(this.paths.downloadedFile), { recursive: true });
      await fs.appendFile(this.paths.downloadedFile, `\n${filename}`, "utf-8");
      this.log.debug({ filename }, "Marked as downloaded");
    });
  }

  async expectedSize(filename: string): Promise<number | undefined> {
    const sizes = await this.readSizes();
    return sizes[filename];
  }

  /** Valid entries of the sizes document. Invalid entries are logged and left out. */
  async readSizes(): Promise<FileSizes> {
    let document: Record<string, unknown>;
    try {
      document = await this.loadSizesDocument();
    } catch (err) {
      if (!(err instanceof TrackingFileError)) throw err;
      this.log.warn({ file: err.file }, `${err.message}, ignoring it`);
      return {};
    }

    const sizes: FileSizes = {};
    for (const [filename, value] of Object.entries(document)) {
      const parsed = SizeSchema.safeParse(value);
      if (parsed.success) {
        sizes[filename] = parsed.data;
      } else {
        this.log.warn({ filename, value }, `Ignoring invalid recorded size for ${filename}`);
      }
    }
    return sizes;
  }

  /** Sets one entry and writes every other entry back as it was. */
  recordExpectedSize(filename: string, bytes: number): Promise<void> {
    return this.enqueue(async () => {
      const document = await this.loadSizesDocument();
      if (document[filename] === bytes) return;
      document[filename] = bytes;
      await fs.mkdir(path.dirname(this.paths.fileSizesFile), { recursive: true });
      await fs.writeFile(this.paths.fileSizesFile, JSON.stringify(document, null, 2), "utf-8");
      this.log.debug({ filename, bytes }, "Recorded expected size");
    });
  }

  private async loadSizesDocument(): Promise<Record<string, unknown>> {
    const file = this.paths.fileSizesFile;
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new TrackingFileError(file, `not valid JSON (${errorMessage(err)})`);
    }
    const parsed = SizesDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new TrackingFileError(file, "expected a JSON object of filename to size");
    }
    return parsed.data;
  }

  async onDiskSize(filename: string): Promise<number | undefined> {
    try {
      const stat = await fs.stat(this.filePath(filename));
      return stat.size;
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task);
    // a failed write must not block the writes queued behind it
    this.writeChain = run.catch((err: unknown) => {
      this.log.error({ err }, "Ledger write failed");
    });
    return run;
  }
}
