export type AttemptPhase =
  | "starting"
  | "streaming"
  | "stalled_warning"
  | "stalled_confirmed"
  | "completed"
  | "failed";

export interface StallPolicy {
  speedCheckIntervalMs: number;
  minBytesPerSecond: number;
  stallThreshold: number;
  /** Longest time without a new whole percent before it counts as a stall signal. */
  progressTimeoutMs: number;
}

export interface AttemptSizes {
  /** Recorded size for the file; the only baseline that can confirm a stall. */
  expectedSize?: number;
  /** Size used for percentages (response content-length, else expected size). */
  totalSize?: number;
}

export type MonitorEvent =
  | { type: "speed"; bytesPerSecond: number }
  | { type: "slow"; bytesPerSecond: number; stallCount: number }
  | { type: "progress"; percent: number; elapsedMs: number }
  | { type: "no_progress"; idleMs: number; stallCount: number }
  | { type: "stall_confirmed"; bytesWritten: number; expectedSize: number; stallCount: number };

/**
 * Per-attempt transfer state. Fed with chunk arrivals and timestamps, it
 * tracks throughput and percentage progress and decides when a slow transfer
 * becomes a confirmed stall. Pure: no timers, no I/O.
 */
export class StallMonitor {
  private currentPhase: AttemptPhase = "starting";
  private bytes = 0;
  private stalls = 0;
  private lastSpeedCheckAt: number;
  private lastSpeedCheckBytes = 0;
  private lastPercent = 0;
  private lastProgressAt: number;

  constructor(
    private readonly policy: StallPolicy,
    private readonly sizes: AttemptSizes,
    private readonly startedAt: number
  ) {
    this.lastSpeedCheckAt = startedAt;
    this.lastProgressAt = startedAt;
  }

  get phase(): AttemptPhase {
    return this.currentPhase;
  }

  get stallCount(): number {
    return this.stalls;
  }

  get bytesWritten(): number {
    return this.bytes;
  }

  get isTerminal(): boolean {
    return (
      this.currentPhase === "stalled_confirmed" ||
      this.currentPhase === "completed" ||
      this.currentPhase === "failed"
    );
  }

  onChunk(chunkBytes: number, now: number): MonitorEvent[] {
    if (this.isTerminal) return [];
    this.bytes += chunkBytes;
    if (this.currentPhase === "starting") this.currentPhase = "streaming";

    const events: MonitorEvent[] = [];
    this.sampleThroughput(now, events);
    if (!this.isTerminal) this.trackProgress(now, events);
    return events;
  }

  complete(): void {
    if (!this.isTerminal) this.currentPhase = "completed";
  }

  fail(): void {
    if (!this.isTerminal) this.currentPhase = "failed";
  }

  private sampleThroughput(now: number, events: MonitorEvent[]): void {
    const elapsedMs = now - this.lastSpeedCheckAt;
    if (elapsedMs < this.policy.speedCheckIntervalMs) return;

    const bytesPerSecond = (this.bytes - this.lastSpeedCheckBytes) / (elapsedMs / 1000);
    events.push({ type: "speed", bytesPerSecond });

    if (bytesPerSecond < this.policy.minBytesPerSecond) {
      this.stalls += 1;
      this.currentPhase = "stalled_warning";
      events.push({ type: "slow", bytesPerSecond, stallCount: this.stalls });
      this.confirmStall(events);
    } else {
      this.stalls = 0;
      this.currentPhase = "streaming";
    }

    this.lastSpeedCheckAt = now;
    this.lastSpeedCheckBytes = this.bytes;
  }

  // Catches stalls that fall between throughput samples
  private trackProgress(now: number, events: MonitorEvent[]): void {
    const { totalSize, expectedSize } = this.sizes;
    if (!totalSize || totalSize <= 0) return;

    const percent = (this.bytes / totalSize) * 100;
    if (Math.floor(percent) > Math.floor(this.lastPercent)) {
      this.lastPercent = percent;
      this.lastProgressAt = now;
      events.push({ type: "progress", percent: Math.floor(percent), elapsedMs: now - this.startedAt });
      return;
    }

    const idleMs = now - this.lastProgressAt;
    if (idleMs > this.policy.progressTimeoutMs && expectedSize !== undefined && this.bytes < expectedSize) {
      // every chunk past the window counts until a new percent is reached
      this.stalls += 1;
      this.currentPhase = "stalled_warning";
      events.push({ type: "no_progress", idleMs, stallCount: this.stalls });
      this.confirmStall(events);
    }
  }

  private confirmStall(events: MonitorEvent[]): void {
    const { expectedSize } = this.sizes;
    if (this.stalls < this.policy.stallThreshold) return;
    // unknown size: slow transfers are only reported
    if (expectedSize === undefined || this.bytes >= expectedSize) return;

    this.currentPhase = "stalled_confirmed";
    events.push({
      type: "stall_confirmed",
      bytesWritten: this.bytes,
      expectedSize,
      stallCount: this.stalls,
    });
  }
}
