import fs from "node:fs/promises";
import { Readable } from "node:stream";
import { Dispatcher, MockAgent, errors } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ChunkTimeoutError } from "../errors.js";
import { LedgerStore } from "../store/ledgerStore.js";
import { FakeClock, makeWorkspace, type Workspace } from "../testing/helpers.js";
import { DownloadWorker, backoffDelay, readChunks } from "./download.js";
import { HeadSizeProber } from "./sizeProber.js";

const ORIGIN = "https://media.example.com";
const ITEM = { url: `${ORIGIN}/videos/a.mp4`, filename: "a.mp4" };

/** Answers every request with headers and a first chunk, then never sends more. */
class SilentBodyDispatcher extends Dispatcher {
  requests = 0;

  dispatch(_options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    this.requests++;
    handler.onConnect?.(() => {});
    handler.onHeaders?.(200, [], () => {}, "OK");
    handler.onData?.(Buffer.from("partial"));
    return true;
  }
}

function socketError() {
  return new errors.SocketError("other side closed");
}

describe("backoffDelay", () => {
  it("doubles the base delay on every attempt", () => {
    expect([0, 1, 2, 3, 4].map((k) => backoffDelay(300_000, k))).toEqual([
      300_000, 600_000, 1_200_000, 2_400_000, 4_800_000,
    ]);
  });
});

describe("readChunks", () => {
  it("splits large reads into chunk-sized pieces", async () => {
    const sizes: number[] = [];
    for await (const piece of readChunks(Readable.from([Buffer.alloc(25), Buffer.alloc(3)]), 10, 1000)) {
      sizes.push(piece.length);
    }
    expect(sizes).toEqual([10, 10, 5, 3]);
  });

  it("fails when the source stays silent past the timeout", async () => {
    const silent = new Readable({ read() {} });
    const received: number[] = [];
    const consume = async () => {
      for await (const piece of readChunks(silent, 10, 20)) {
        received.push(piece.length);
      }
    };
    await expect(consume()).rejects.toBeInstanceOf(ChunkTimeoutError);
    expect(received).toEqual([]);
    silent.destroy();
  });
});

describe("DownloadWorker", () => {
  let ws: Workspace;
  let agent: MockAgent;
  let clock: FakeClock;

  async function setUp(env: Record<string, string> = {}) {
    ws = await makeWorkspace(env);
    const ledger = LedgerStore.fromConfig(ws.cfg);
    const worker = new DownloadWorker({
      settings: ws.cfg.download,
      ledger,
      dispatcher: agent,
      prober: new HeadSizeProber(agent),
      clock,
    });
    return { ledger, worker };
  }

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    clock = new FakeClock();
  });

  afterEach(async () => {
    await agent.close();
    await ws.cleanup();
  });

  it("streams the body to disk and records the file as completed", async () => {
    const { ledger, worker } = await setUp({ CHUNK_SIZE: "1000" });
    const payload = Buffer.alloc(2500, 7);
    agent.get(ORIGIN).intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, payload);

    const result = await worker.run(ITEM);

    expect(result).toEqual({ ...ITEM, ok: true, outcome: "completed", attempts: 1, bytes: 2500 });
    expect(await fs.readFile(ledger.filePath("a.mp4"))).toEqual(payload);
    expect(await fs.readFile(ws.cfg.downloadedFile, "utf-8")).toBe("\na.mp4");
    expect(clock.sleeps).toEqual([500]);
  });

  it("accepts a transfer that matches the recorded size", async () => {
    const { ledger, worker } = await setUp();
    await ledger.recordExpectedSize("a.mp4", 11);
    agent.get(ORIGIN).intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, "hello world");

    expect(await worker.download(ITEM.url, ITEM.filename)).toBe(true);
    expect(await ledger.onDiskSize("a.mp4")).toBe(11);
  });

  it("gives up on HTTP statuses without retrying", async () => {
    const { ledger, worker } = await setUp();
    agent.get(ORIGIN).intercept({ path: "/videos/a.mp4", method: "GET" }).reply(404, "not here");

    const result = await worker.run(ITEM);

    expect(result).toEqual({
      ...ITEM,
      ok: false,
      outcome: "http_status",
      attempts: 1,
      status: 404,
      error: "HTTP 404 - File not found",
    });
    expect(clock.sleeps).toEqual([500]);
    expect(await ledger.listCompleted()).toEqual(new Set());
  });

  it("retries network errors with exponential backoff", async () => {
    const { worker } = await setUp();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/videos/a.mp4", method: "GET" }).replyWithError(socketError());
    pool.intercept({ path: "/videos/a.mp4", method: "GET" }).replyWithError(socketError());
    pool.intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, "hello world");

    const result = await worker.run(ITEM);

    expect(result).toMatchObject({ ok: true, outcome: "completed", attempts: 3, bytes: 11 });
    expect(clock.sleeps).toEqual([500, 1000, 2000]);
  });

  it("stops after the configured number of attempts", async () => {
    const { ledger, worker } = await setUp({ MAX_RETRIES: "3" });
    agent
      .get(ORIGIN)
      .intercept({ path: "/videos/a.mp4", method: "GET" })
      .replyWithError(socketError())
      .times(3);

    const result = await worker.run(ITEM);

    expect(result).toEqual({
      ...ITEM,
      ok: false,
      outcome: "retries_exhausted",
      attempts: 3,
      error: "other side closed",
    });
    expect(clock.sleeps).toEqual([500, 1000, 2000]);
    expect(agent.pendingInterceptors()).toEqual([]);
    expect(await ledger.listCompleted()).toEqual(new Set());
  });

  it("aborts a transfer that stalls below the expected size", async () => {
    clock = new FakeClock(0, 60_000);
    const { ledger, worker } = await setUp({ CHUNK_SIZE: "10", MAX_RETRIES: "1" });
    await ledger.recordExpectedSize("a.mp4", 100);
    agent.get(ORIGIN).intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, Buffer.alloc(100));

    const result = await worker.run(ITEM);

    expect(result).toMatchObject({
      ok: false,
      outcome: "retries_exhausted",
      attempts: 1,
      error: "Download stalled multiple times: got 30 bytes, expected 100",
    });
    expect(await ledger.listCompleted()).toEqual(new Set());
  });

  it("lets a slow transfer of unknown size finish", async () => {
    clock = new FakeClock(0, 60_000);
    const { ledger, worker } = await setUp({ CHUNK_SIZE: "10", MAX_RETRIES: "1" });
    agent.get(ORIGIN).intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, Buffer.alloc(100));

    const result = await worker.run(ITEM);

    expect(result).toMatchObject({ ok: true, outcome: "completed", bytes: 100 });
    expect(await ledger.listCompleted()).toEqual(new Set(["a.mp4"]));
  });

  it("retries a transfer that ends short of the recorded size", async () => {
    const { ledger, worker } = await setUp({ MAX_RETRIES: "2" });
    await ledger.recordExpectedSize("a.mp4", 50);
    agent
      .get(ORIGIN)
      .intercept({ path: "/videos/a.mp4", method: "GET" })
      .reply(200, "hello world")
      .times(2);

    const result = await worker.run(ITEM);

    expect(result).toMatchObject({
      ok: false,
      outcome: "retries_exhausted",
      attempts: 2,
      error: "Stream ended early: 11 bytes on disk, expected 50",
    });
    expect(clock.sleeps).toEqual([500, 1000]);
    expect(await ledger.listCompleted()).toEqual(new Set());
  });

  it("retries when the body goes silent past the chunk timeout", async () => {
    ws = await makeWorkspace({ CHUNK_TIMEOUT_MS: "50", MAX_RETRIES: "2" });
    const dispatcher = new SilentBodyDispatcher();
    const ledger = LedgerStore.fromConfig(ws.cfg);
    const worker = new DownloadWorker({ settings: ws.cfg.download, ledger, dispatcher, clock });

    const result = await worker.run(ITEM);

    expect(result).toEqual({
      ...ITEM,
      ok: false,
      outcome: "retries_exhausted",
      attempts: 2,
      error: "No data received for 50ms",
    });
    expect(dispatcher.requests).toBe(2);
    expect(clock.sleeps).toEqual([500, 1000]);
    expect(await ledger.listCompleted()).toEqual(new Set());
  });

  it("reports local failures as unexpected without retrying", async () => {
    const { worker } = await setUp();
    // a regular file where the download directory should be
    await fs.writeFile(ws.cfg.downloadDir, "");
    agent.get(ORIGIN).intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, "hello world");

    const result = await worker.run(ITEM);

    expect(result).toMatchObject({ ok: false, outcome: "unexpected", attempts: 1 });
    expect(clock.sleeps).toEqual([500]);
  });

  it("probes and records the size when enabled", async () => {
    const { ledger, worker } = await setUp({ PROBE_SIZES: "true" });
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/videos/a.mp4", method: "HEAD" }).reply(200, "", {
      headers: { "content-length": "11" },
    });
    pool.intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, "hello world");

    expect((await worker.run(ITEM)).ok).toBe(true);
    expect(await ledger.expectedSize("a.mp4")).toBe(11);
  });

  it("downloads even when a probed size cannot be recorded", async () => {
    const { ledger, worker } = await setUp({ PROBE_SIZES: "true" });
    await fs.writeFile(ws.cfg.fileSizesFile, "{ not json");
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/videos/a.mp4", method: "HEAD" }).reply(200, "", {
      headers: { "content-length": "11" },
    });
    pool.intercept({ path: "/videos/a.mp4", method: "GET" }).reply(200, "hello world");

    expect(await worker.run(ITEM)).toMatchObject({ ok: true, bytes: 11 });
    expect(await fs.readFile(ws.cfg.fileSizesFile, "utf-8")).toBe("{ not json");
    expect(await ledger.listCompleted()).toEqual(new Set(["a.mp4"]));
  });
});
