/**
 * Request headers for scrapes, including auth from the HTTP client config.
 */

import { readFile } from "node:fs/promises";
import type { HttpClientConfig } from "@scrape-supervisor/shared";

export const USER_AGENT = "scrape-supervisor/0.1.0";

export const ACCEPT_HEADER =
  "text/plain;version=0.0.4;q=0.9,*/*;q=0.1";

/** Read a secret from a file, trimming the trailing newline editors add */
async function readSecret(path: string): Promise<string> {
  const content = await readFile(path, "utf8");
  return content.trim();
}

/**
 * Resolve the Authorization header for a config, reading file-backed
 * secrets on every call so rotated credentials are picked up.
 */
export async function authorizationHeader(
  cfg: HttpClientConfig,
): Promise<string | undefined> {
  if (cfg.basicAuth) {
    const password = cfg.basicAuth.passwordFile
      ? await readSecret(cfg.basicAuth.passwordFile)
      : cfg.basicAuth.password ?? "";
    const encoded = Buffer.from(`${cfg.basicAuth.username}:${password}`).toString("base64");
    return `Basic ${encoded}`;
  }

  if (cfg.authorization) {
    const credentials = cfg.authorization.credentialsFile
      ? await readSecret(cfg.authorization.credentialsFile)
      : cfg.authorization.credentials;
    return credentials ? `${cfg.authorization.type} ${credentials}` : undefined;
  }

  if (cfg.bearerTokenFile) {
    return `Bearer ${await readSecret(cfg.bearerTokenFile)}`;
  }
  if (cfg.bearerToken) {
    return `Bearer ${cfg.bearerToken}`;
  }

  return undefined;
}

/** Build the headers sent with every scrape request */
export async function scrapeHeaders(
  cfg: HttpClientConfig,
  timeoutMs: number,
): Promise<Record<string, string>> {
  const headers: Record<string, string> = {
    Accept: ACCEPT_HEADER,
    "User-Agent": USER_AGENT,
    "X-Prometheus-Scrape-Timeout-Seconds": String(timeoutMs / 1000),
  };
  const auth = await authorizationHeader(cfg);
  if (auth) headers.Authorization = auth;
  return headers;
}
