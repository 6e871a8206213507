/**
 * Start-up configuration: environment variables and the optional scrape
 * config file.
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { ScrapeArgumentsBody } from "./routes/scrape.schemas.js";

export const DEFAULT_INSTANCE_ID = "prometheus.scrape.default";

export interface ServerConfig {
  port: number;
  host: string;
  /** Identifier of the supervised scrape instance */
  instanceId: string;
  /** JSON file holding the initial scrape arguments */
  scrapeConfigFile?: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT || "3000", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be a valid port number, got "${env.PORT}"`);
  }

  return {
    port,
    host: env.HOST || "0.0.0.0",
    instanceId: env.SCRAPE_INSTANCE_ID || DEFAULT_INSTANCE_ID,
    scrapeConfigFile: env.SCRAPE_CONFIG_FILE || undefined,
  };
}

/**
 * Read and validate a scrape config file. Defaults from the schema are
 * filled in; the first validation error is reported with its path.
 */
export async function loadScrapeArgumentsFile(path: string): Promise<ScrapeArgumentsBody> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`could not read scrape config file ${path}: ${reason}`, { cause: err });
  }

  const value = Value.Default(ScrapeArgumentsBody, raw);
  if (!Value.Check(ScrapeArgumentsBody, value)) {
    const first = Value.Errors(ScrapeArgumentsBody, value).First();
    const detail = first ? `${first.path || "/"}: ${first.message}` : "does not match the schema";
    throw new Error(`invalid scrape config file ${path}: ${detail}`);
  }
  return value;
}
