/**
 * Configuration Builder: maps supervisor arguments onto the engine's
 * declarative scrape job config.
 *
 * The mapping is structural only. Correctness is decided by the engine's
 * own validator; its verdict is surfaced verbatim inside a
 * ScrapeConfigError so callers can tell which stage failed.
 */

import type { ScrapeArguments, ScrapeJobConfig } from "@scrape-supervisor/shared";
import { validateScrapeJobConfig } from "../engine/validate.js";
import { ScrapeConfigError } from "./errors.js";

export function buildScrapeJobConfig(
  instanceId: string,
  args: ScrapeArguments,
): ScrapeJobConfig {
  const params: Record<string, string[]> = {};
  for (const [key, values] of Object.entries(args.params)) {
    params[key] = [...values];
  }

  const http = args.httpClientConfig;
  const config: ScrapeJobConfig = {
    jobName: args.jobName || instanceId,
    honorLabels: args.honorLabels,
    honorTimestamps: args.honorTimestamps,
    params,
    scrapeIntervalMs: args.scrapeIntervalMs,
    scrapeTimeoutMs: args.scrapeTimeoutMs,
    metricsPath: args.metricsPath,
    scheme: args.scheme,
    bodySizeLimit: args.bodySizeLimit,
    sampleLimit: args.sampleLimit,
    targetLimit: args.targetLimit,
    labelLimit: args.labelLimit,
    labelNameLengthLimit: args.labelNameLengthLimit,
    labelValueLengthLimit: args.labelValueLengthLimit,
    httpClientConfig: {
      basicAuth: http.basicAuth && { ...http.basicAuth },
      authorization: http.authorization && { ...http.authorization },
      bearerToken: http.bearerToken,
      bearerTokenFile: http.bearerTokenFile,
      followRedirects: http.followRedirects,
    },
    extraMetrics: args.extraMetrics,
  };

  try {
    validateScrapeJobConfig(config);
  } catch (err) {
    throw new ScrapeConfigError("build", err);
  }
  return config;
}
