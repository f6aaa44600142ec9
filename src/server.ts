import Fastify from "fastify";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { readWorkList, selectPending } from "./pipeline/worklist.js";
import { LedgerStore } from "./store/ledgerStore.js";

const FilenameParams = z.object({
  filename: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, "filename must not contain path separators")
    .refine((name) => name !== "." && name !== "..", "filename must not be a relative path"),
});

export function buildServer(cfg: AppConfig, logger: Logger = silentLogger) {
  const ledger = LedgerStore.fromConfig(cfg, logger);
  const app = Fastify({ loggerInstance: logger });

  app.get("/healthz", async () => ({ ok: true }));

  app.get("/v1/status", async () => {
    const completed = await ledger.listCompleted();
    const sizes = await ledger.readSizes();

    let pending: number | null = null;
    try {
      const workList = await readWorkList(cfg.downloadListFile);
      pending = selectPending(workList, completed).length;
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      app.log.warn(err.message);
    }

    return {
      completed: completed.size,
      pending,
      knownSizes: Object.keys(sizes).length,
    };
  });

  app.get("/v1/downloads/:filename", async (req, reply) => {
    const parsed = FilenameParams.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { filename } = parsed.data;

    const [completed, expectedSize, onDiskBytes] = await Promise.all([
      ledger.listCompleted(),
      ledger.expectedSize(filename),
      ledger.onDiskSize(filename),
    ]);

    return reply.code(200).send({
      filename,
      completed: completed.has(filename),
      expectedSize: expectedSize ?? null,
      onDiskBytes: onDiskBytes ?? null,
      complete: expectedSize !== undefined && onDiskBytes === expectedSize,
    });
  });

  return app;
}

export async function startServer(cfg: AppConfig, logger: Logger): Promise<void> {
  const app = buildServer(cfg, logger);

  const shutdown = () => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "Error while closing the server");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: cfg.port, host: "0.0.0.0" });
  app.log.info(`listening on :${cfg.port}`);
}
