import type { HttpClientConfig, ScrapeArguments } from "@scrape-supervisor/shared";

export const DEFAULT_HTTP_CLIENT_CONFIG: HttpClientConfig = {
  followRedirects: true,
};

/** Default settings for a scrape job */
export const DEFAULT_ARGUMENTS: ScrapeArguments = {
  targets: [],
  forwardTo: [],
  jobName: "",
  honorLabels: false,
  honorTimestamps: true,
  params: {},
  scrapeIntervalMs: 60_000, // 1 minute
  scrapeTimeoutMs: 10_000,
  metricsPath: "/metrics",
  scheme: "http",
  bodySizeLimit: 0,
  sampleLimit: 0,
  targetLimit: 0,
  labelLimit: 0,
  labelNameLengthLimit: 0,
  labelValueLengthLimit: 0,
  httpClientConfig: DEFAULT_HTTP_CLIENT_CONFIG,
  extraMetrics: false,
};

/** Fill every field the caller left out with its default */
export function withDefaults(
  args: Partial<Omit<ScrapeArguments, "httpClientConfig">> & {
    httpClientConfig?: Partial<HttpClientConfig>;
  },
): ScrapeArguments {
  const { httpClientConfig, ...rest } = args;
  return {
    ...DEFAULT_ARGUMENTS,
    ...rest,
    httpClientConfig: { ...DEFAULT_HTTP_CLIENT_CONFIG, ...httpClientConfig },
  };
}
