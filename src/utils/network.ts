import { lookup } from "node:dns/promises";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { runCommand } from "./process.js";

export interface ConnectivityProbes {
  resolve(host: string): Promise<string>;
  ping(host: string): Promise<string>;
}

export const systemProbes: ConnectivityProbes = {
  resolve: async (host) => (await lookup(host)).address,
  ping: async (host) => (await runCommand("ping", ["-c", "4", host], { timeoutMs: 30_000 })).stdout,
};

/** Host of the first URL entry, used when no connectivity host is configured. */
export function hostFromUrl(url: string | undefined): string | undefined {
  if (!url) return undefined;
  try {
    return new URL(url).hostname || undefined;
  } catch {
    return undefined;
  }
}

/**
 * Pre-flight DNS lookup plus a four-packet ping. Never throws: any failure is
 * logged and reported as `false`.
 */
export async function checkConnectivity(
  host: string,
  opts: { probes?: ConnectivityProbes; logger?: Logger } = {}
): Promise<boolean> {
  const probes = opts.probes ?? systemProbes;
  const log = (opts.logger ?? silentLogger).child({ module: "network" });

  try {
    log.info({ host }, "Checking DNS resolution...");
    const address = await probes.resolve(host);
    log.info({ host, address }, "DNS resolution working");
  } catch (err) {
    log.error({ host }, `DNS resolution failed: ${errorMessage(err)}`);
    return false;
  }

  try {
    log.info({ host }, `Checking network connectivity to ${host}...`);
    const output = await probes.ping(host);
    log.info({ host }, "Network connectivity working");
    log.debug({ host, output }, "Ping results");
  } catch (err) {
    log.error({ host }, `Network connectivity failed: ${errorMessage(err)}`);
    return false;
  }

  return true;
}
