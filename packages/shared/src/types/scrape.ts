/**
 * Types for scrape arguments, target groups and target status.
 *
 * These describe the shapes accepted by the supervisor's update path and
 * returned by the status endpoints.
 */

// ---------------------------------------------------------------------------
// Labels & targets
// ---------------------------------------------------------------------------

/** Label name → label value */
export type LabelSet = Record<string, string>;

/** A discovery target: the labels describing one scrape endpoint */
export type Target = LabelSet;

/** A collection of targets sharing a common source tag */
export interface TargetGroup {
  /** Stable identifier of where the group came from */
  source: string;
  /** Labels shared by every target in the group */
  labels: LabelSet;
  targets: LabelSet[];
}

/** Target groups keyed by target set name */
export type TargetSets = Record<string, TargetGroup[]>;

// ---------------------------------------------------------------------------
// Samples & receivers
// ---------------------------------------------------------------------------

/** A single scraped (or synthesised) sample */
export interface Sample {
  /** Sample labels, including the metric name under `__name__` */
  labels: LabelSet;
  value: number;
  /** Unix time in milliseconds */
  timestampMs: number;
}

/** A destination for scraped samples */
export interface Receiver {
  append(samples: Sample[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export interface BasicAuth {
  username: string;
  password?: string;
  passwordFile?: string;
}

export interface Authorization {
  /** Credential type sent in the Authorization header (default "Bearer") */
  type: string;
  credentials?: string;
  credentialsFile?: string;
}

/** Settings for the HTTP client used to scrape targets */
export interface HttpClientConfig {
  basicAuth?: BasicAuth;
  authorization?: Authorization;
  bearerToken?: string;
  bearerTokenFile?: string;
  followRedirects: boolean;
}

/** Everything the supervisor needs to configure one scrape job */
export interface ScrapeArguments {
  targets: Target[];
  forwardTo: Receiver[];

  /** The job name to override the job label with (empty = instance ID) */
  jobName: string;
  /** Keep scraped labels when they clash with target labels */
  honorLabels: boolean;
  /** Keep timestamps exposed by the target */
  honorTimestamps: boolean;
  /** Query parameters added to every scrape request */
  params: Record<string, string[]>;
  scrapeIntervalMs: number;
  scrapeTimeoutMs: number;
  metricsPath: string;
  scheme: string;
  /** Uncompressed body size limit in bytes (0 = no limit) */
  bodySizeLimit: number;
  sampleLimit: number;
  targetLimit: number;
  labelLimit: number;
  labelNameLengthLimit: number;
  labelValueLengthLimit: number;

  httpClientConfig: HttpClientConfig;

  /** Emit the extra scrape_* report series */
  extraMetrics: boolean;
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export type TargetHealth = "unknown" | "up" | "down";

/** Status of the latest scrape for a target */
export interface TargetStatus {
  jobName: string;
  url: string;
  health: TargetHealth;
  labels: LabelSet;
  /** Empty when the last scrape succeeded */
  lastError: string;
  /** ISO 8601 timestamp, null until the first scrape completes */
  lastScrape: string | null;
  lastScrapeDurationMs: number;
}

export interface ScraperStatus {
  targets: TargetStatus[];
}
