import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, type AppConfig } from "../config.js";
import type { Clock } from "../utils/clock.js";

/**
 * Deterministic clock. `now()` returns the current time and then moves it
 * forward by `step`; `sleep()` records the delay and advances time by it.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(
    private current = 0,
    private readonly step = 0
  ) {}

  now(): number {
    const t = this.current;
    this.current += this.step;
    return t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export interface Workspace {
  root: string;
  cfg: AppConfig;
  cleanup(): Promise<void>;
}

export async function makeWorkspace(env: Record<string, string> = {}): Promise<Workspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "media-fetch-"));
  const cfg = loadConfig({
    DOWNLOAD_DIR: path.join(root, "videos"),
    TRACKING_DIR: path.join(root, "tracking"),
    TRANSCRIPT_DIR: path.join(root, "transcripts"),
    RATE_LIMIT_DELAY_MS: "500",
    RETRY_DELAY_MS: "1000",
    BATCH_DELAY_MS: "1000",
    CONNECTIVITY_CHECK: "false",
    ...env,
  });
  await fs.mkdir(cfg.trackingDir, { recursive: true });
  return {
    root,
    cfg,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}
