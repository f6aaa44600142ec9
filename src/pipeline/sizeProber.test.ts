import fs from "node:fs/promises";
import { MockAgent, errors } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LedgerStore } from "../store/ledgerStore.js";
import { makeWorkspace, type Workspace } from "../testing/helpers.js";
import { HeadSizeProber, parseContentLength, recordPendingSizes } from "./sizeProber.js";

const ORIGIN = "https://media.example.com";

describe("parseContentLength", () => {
  it("accepts positive integers only", () => {
    expect(parseContentLength("1048576")).toBe(1048576);
    expect(parseContentLength(["12", "13"])).toBe(12);
    expect(parseContentLength("0")).toBeUndefined();
    expect(parseContentLength("-1")).toBeUndefined();
    expect(parseContentLength("12abc")).toBeUndefined();
    expect(parseContentLength(undefined)).toBeUndefined();
  });
});

describe("HeadSizeProber", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("returns the content-length of a 200 response", async () => {
    agent.get(ORIGIN).intercept({ path: "/a.mp4", method: "HEAD" }).reply(200, "", {
      headers: { "content-length": "5000" },
    });
    expect(await new HeadSizeProber(agent).probe(`${ORIGIN}/a.mp4`)).toBe(5000);
  });

  it("returns undefined for other statuses", async () => {
    agent.get(ORIGIN).intercept({ path: "/a.mp4", method: "HEAD" }).reply(404, "");
    expect(await new HeadSizeProber(agent).probe(`${ORIGIN}/a.mp4`)).toBeUndefined();
  });

  it("returns undefined when the length is zero or absent", async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/a.mp4", method: "HEAD" }).reply(200, "", { headers: { "content-length": "0" } });
    pool.intercept({ path: "/b.mp4", method: "HEAD" }).reply(200, "");

    const prober = new HeadSizeProber(agent);
    expect(await prober.probe(`${ORIGIN}/a.mp4`)).toBeUndefined();
    expect(await prober.probe(`${ORIGIN}/b.mp4`)).toBeUndefined();
  });

  it("returns undefined on network errors", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/a.mp4", method: "HEAD" })
      .replyWithError(new errors.SocketError("other side closed"));
    expect(await new HeadSizeProber(agent).probe(`${ORIGIN}/a.mp4`)).toBeUndefined();
  });
});

describe("recordPendingSizes", () => {
  let ws: Workspace;
  let agent: MockAgent;

  beforeEach(async () => {
    ws = await makeWorkspace();
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    await ws.cleanup();
  });

  it("records sizes for pending items that have none", async () => {
    await fs.writeFile(
      ws.cfg.downloadListFile,
      [`${ORIGIN}/done.mp4`, `${ORIGIN}/known.mp4`, `${ORIGIN}/new.mp4`, `${ORIGIN}/gone.mp4`].join("\n")
    );
    const ledger = LedgerStore.fromConfig(ws.cfg);
    await ledger.markCompleted("done.mp4");
    await ledger.recordExpectedSize("known.mp4", 10);

    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/new.mp4", method: "HEAD" }).reply(200, "", { headers: { "content-length": "777" } });
    pool.intercept({ path: "/gone.mp4", method: "HEAD" }).reply(404, "");

    const summary = await recordPendingSizes(ws.cfg, { dispatcher: agent });

    expect(summary).toEqual({ probed: 2, recorded: 1, unknown: 1, alreadyKnown: 1 });
    expect(await ledger.readSizes()).toEqual({ "known.mp4": 10, "new.mp4": 777 });
  });
});
