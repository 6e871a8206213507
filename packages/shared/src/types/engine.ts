/**
 * Collection engine interface: the public contract between the scrape
 * supervisor and whatever performs the actual scraping.
 *
 * IMPORTANT: This interface must remain independent of the web framework.
 * The supervisor drives an engine only through these calls; an engine never
 * calls back into the supervisor.
 */

import type {
  LabelSet,
  HttpClientConfig,
  Receiver,
  TargetHealth,
  TargetSets,
} from "./scrape.js";

/** Declarative settings for one scrape job */
export interface ScrapeJobConfig {
  jobName: string;
  honorLabels: boolean;
  honorTimestamps: boolean;
  params: Record<string, string[]>;
  scrapeIntervalMs: number;
  scrapeTimeoutMs: number;
  metricsPath: string;
  scheme: string;
  bodySizeLimit: number;
  sampleLimit: number;
  targetLimit: number;
  labelLimit: number;
  labelNameLengthLimit: number;
  labelValueLengthLimit: number;
  httpClientConfig: HttpClientConfig;
  extraMetrics: boolean;
}

/** Job configs keyed by the target set name they apply to */
export interface ScrapeManagerConfig {
  jobs: Record<string, ScrapeJobConfig>;
}

/** Live view of a target the engine is scraping */
export interface ActiveTarget {
  url(): string;
  labels(): LabelSet;
  health(): TargetHealth;
  lastError(): Error | null;
  lastScrape(): Date | null;
  lastScrapeDurationMs(): number;
}

/** The engine's public interface */
export interface CollectionEngine {
  /** Replace the job configuration. Rejects without side effects when invalid. */
  applyConfig(config: ScrapeManagerConfig): Promise<void>;

  /**
   * Consume target sets until the stream ends or `stop()` is called.
   * Rejects if the engine fails in the background.
   */
  run(targetSets: AsyncIterable<TargetSets>): Promise<void>;

  /** Currently active targets keyed by job name */
  targetsActive(): Map<string, ReadonlyArray<ActiveTarget | null | undefined>>;

  /** Halt all background scraping */
  stop(): void;
}

/** Something that routes samples to a replaceable set of receivers */
export interface Fanout extends Receiver {
  setReceivers(receivers: Receiver[]): void;
}
