/**
 * Validation of scrape job configs, applied by the scrape manager before a
 * config takes effect.
 */

import type { HttpClientConfig, ScrapeJobConfig } from "@scrape-supervisor/shared";

const SCHEMES = new Set(["http", "https"]);

/** Longest delay Node's timers accept; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

const LIMIT_FIELDS = [
  "bodySizeLimit",
  "sampleLimit",
  "targetLimit",
  "labelLimit",
  "labelNameLengthLimit",
  "labelValueLengthLimit",
] as const;

/**
 * Check the auth settings of an HTTP client config. Only one way of
 * authenticating may be configured, and each secret comes either inline or
 * from a file, never both.
 */
export function validateHttpClientConfig(cfg: HttpClientConfig): void {
  const hasBearer = Boolean(cfg.bearerToken) || Boolean(cfg.bearerTokenFile);
  const authMethods = [cfg.basicAuth !== undefined, cfg.authorization !== undefined, hasBearer];
  if (authMethods.filter(Boolean).length > 1) {
    throw new Error(
      "at most one of basicAuth, authorization & bearerToken/bearerTokenFile must be configured",
    );
  }

  if (cfg.bearerToken && cfg.bearerTokenFile) {
    throw new Error("at most one of bearerToken & bearerTokenFile must be configured");
  }

  if (cfg.basicAuth) {
    if (!cfg.basicAuth.username) {
      throw new Error("basicAuth requires a username");
    }
    if (cfg.basicAuth.password && cfg.basicAuth.passwordFile) {
      throw new Error("at most one of basicAuth password & passwordFile must be configured");
    }
  }

  if (cfg.authorization) {
    if (cfg.authorization.type.toLowerCase() === "basic") {
      throw new Error("authorization type cannot be set to \"basic\", use \"basicAuth\" instead");
    }
    if (cfg.authorization.credentials && cfg.authorization.credentialsFile) {
      throw new Error(
        "at most one of authorization credentials & credentialsFile must be configured",
      );
    }
  }
}

/** Throws an Error describing the first problem found in a job config */
export function validateScrapeJobConfig(cfg: ScrapeJobConfig): void {
  if (!cfg.jobName) {
    throw new Error("job_name is empty");
  }
  if (!SCHEMES.has(cfg.scheme)) {
    throw new Error(`unknown scheme "${cfg.scheme}" for job "${cfg.jobName}"`);
  }
  if (!cfg.metricsPath.startsWith("/")) {
    throw new Error(`metrics path "${cfg.metricsPath}" must start with "/"`);
  }
  if (!(cfg.scrapeIntervalMs > 0)) {
    throw new Error(`scrape interval must be positive, got ${cfg.scrapeIntervalMs}ms`);
  }
  if (!(cfg.scrapeTimeoutMs > 0)) {
    throw new Error(`scrape timeout must be positive, got ${cfg.scrapeTimeoutMs}ms`);
  }
  if (cfg.scrapeIntervalMs > MAX_TIMER_MS) {
    throw new Error(
      `scrape interval must be at most ${MAX_TIMER_MS}ms, got ${cfg.scrapeIntervalMs}ms`,
    );
  }
  if (cfg.scrapeTimeoutMs > MAX_TIMER_MS) {
    throw new Error(
      `scrape timeout must be at most ${MAX_TIMER_MS}ms, got ${cfg.scrapeTimeoutMs}ms`,
    );
  }
  for (const field of LIMIT_FIELDS) {
    const value = cfg[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${field} must be a non-negative integer, got ${value}`);
    }
  }
  validateHttpClientConfig(cfg.httpClientConfig);
}
