/**
 * Shared fakes for supervisor, engine and route tests.
 */

import { pino } from "pino";
import type {
  ActiveTarget,
  CollectionEngine,
  LabelSet,
  Receiver,
  Sample,
  ScrapeJobConfig,
  ScrapeManagerConfig,
  TargetHealth,
  TargetSets,
} from "@scrape-supervisor/shared";

/** Poll until a condition is met */
export async function waitFor(fn: () => void, timeout = 1000): Promise<void> {
  const start = Date.now();
  while (true) {
    try {
      fn();
      return;
    } catch {
      if (Date.now() - start > timeout) throw new Error("waitFor timed out");
      await new Promise((r) => setTimeout(r, 10));
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export const silentLogger = pino({ level: "silent" });

export interface LogLine {
  level: number;
  msg: string;
  err?: { message: string };
  [key: string]: unknown;
}

/** A debug-level pino logger that records every line it writes */
export function createCapturingLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

/** A job config with defaults, for engine tests */
export function jobConfig(overrides?: Partial<ScrapeJobConfig>): ScrapeJobConfig {
  return {
    jobName: "job",
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
    httpClientConfig: { followRedirects: true },
    extraMetrics: false,
    ...overrides,
  };
}

/** Receiver that keeps every appended batch */
export class RecordingReceiver implements Receiver {
  batches: Sample[][] = [];

  async append(samples: Sample[]): Promise<void> {
    this.batches.push(samples);
  }
}

/** Fixed-state target for status tests */
export function fakeTarget(fields: {
  url: string;
  labels?: LabelSet;
  health?: TargetHealth;
  lastError?: Error | null;
  lastScrape?: Date | null;
  lastScrapeDurationMs?: number;
}): ActiveTarget {
  return {
    url: () => fields.url,
    labels: () => fields.labels ?? {},
    health: () => fields.health ?? "unknown",
    lastError: () => fields.lastError ?? null,
    lastScrape: () => fields.lastScrape ?? null,
    lastScrapeDurationMs: () => fields.lastScrapeDurationMs ?? 0,
  };
}

/** A fetch that never answers until its request is aborted */
export const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason));
  });

/**
 * In-process collection engine that records what the supervisor hands it.
 */
export class FakeEngine implements CollectionEngine {
  applied: ScrapeManagerConfig[] = [];
  received: TargetSets[] = [];
  stopCalls = 0;
  active = new Map<string, Array<ActiveTarget | null | undefined>>();

  /** Error thrown by applyConfig */
  rejectConfig: Error | null = null;
  /** Awaited by applyConfig before it records the config */
  applyHook: ((config: ScrapeManagerConfig) => Promise<void>) | null = null;
  /** Error run() rejects with immediately */
  failWith: Error | null = null;
  /** When false, run() never reads from its stream */
  consume = true;

  private resolveStopped: () => void = () => {};
  private stopped = new Promise<void>((resolve) => {
    this.resolveStopped = resolve;
  });

  async applyConfig(config: ScrapeManagerConfig): Promise<void> {
    if (this.applyHook) await this.applyHook(config);
    if (this.rejectConfig) throw this.rejectConfig;
    this.applied.push(config);
  }

  async run(targetSets: AsyncIterable<TargetSets>): Promise<void> {
    if (this.failWith) throw this.failWith;
    if (!this.consume) {
      await this.stopped;
      return;
    }
    for await (const sets of targetSets) {
      this.received.push(sets);
    }
  }

  targetsActive(): Map<string, Array<ActiveTarget | null | undefined>> {
    return this.active;
  }

  stop(): void {
    this.stopCalls++;
    this.resolveStopped();
  }
}
