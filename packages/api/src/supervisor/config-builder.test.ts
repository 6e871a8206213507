import { describe, it, expect } from "vitest";
import { buildScrapeJobConfig } from "./config-builder.js";
import { withDefaults } from "./arguments.js";
import { ScrapeConfigError } from "./errors.js";

function buildError(fn: () => unknown): ScrapeConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ScrapeConfigError) return err;
    throw err;
  }
  throw new Error("expected a ScrapeConfigError");
}

describe("buildScrapeJobConfig", () => {
  it("maps default arguments and names the job after the instance", () => {
    const config = buildScrapeJobConfig("scrape.a", withDefaults({}));

    expect(config).toEqual({
      jobName: "scrape.a",
      honorLabels: false,
      honorTimestamps: true,
      params: {},
      scrapeIntervalMs: 60_000,
      scrapeTimeoutMs: 10_000,
      metricsPath: "/metrics",
      scheme: "http",
      bodySizeLimit: 0,
      sampleLimit: 0,
      targetLimit: 0,
      labelLimit: 0,
      labelNameLengthLimit: 0,
      labelValueLengthLimit: 0,
      httpClientConfig: {
        basicAuth: undefined,
        authorization: undefined,
        bearerToken: undefined,
        bearerTokenFile: undefined,
        followRedirects: true,
      },
      extraMetrics: false,
    });
  });

  it("uses an explicit job name", () => {
    const config = buildScrapeJobConfig("scrape.a", withDefaults({ jobName: "node" }));
    expect(config.jobName).toBe("node");
  });

  it("copies params so the arguments stay untouched", () => {
    const args = withDefaults({ params: { module: ["http_2xx"] } });
    const config = buildScrapeJobConfig("scrape.a", args);

    config.params.module.push("tcp");

    expect(args.params).toEqual({ module: ["http_2xx"] });
  });

  it("accepts a timeout longer than the interval", () => {
    const config = buildScrapeJobConfig(
      "scrape.a",
      withDefaults({ scrapeIntervalMs: 5_000, scrapeTimeoutMs: 20_000 }),
    );
    expect(config.scrapeTimeoutMs).toBe(20_000);
  });

  it("rejects an unknown scheme at the build stage", () => {
    const err = buildError(() =>
      buildScrapeJobConfig("scrape.a", withDefaults({ scheme: "ftp" })),
    );

    expect(err.stage).toBe("build");
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe('invalid scrape_config: unknown scheme "ftp" for job "scrape.a"');
  });

  it("rejects mutually exclusive credentials", () => {
    const err = buildError(() =>
      buildScrapeJobConfig(
        "scrape.a",
        withDefaults({
          httpClientConfig: {
            basicAuth: { username: "user", password: "test-secret" },
            bearerToken: "test-token",
          },
        }),
      ),
    );

    expect(err.message).toBe(
      "invalid scrape_config: at most one of basicAuth, authorization & bearerToken/bearerTokenFile must be configured",
    );
  });
});
