/**
 * Scrape loop: periodically fetches one target, enforces the job's limits,
 * and appends the resulting samples plus the per-scrape report series.
 */

import { pino } from "pino";
import type { LabelSet, Receiver, Sample, ScrapeJobConfig } from "@scrape-supervisor/shared";
import { parseSamples, type ParsedSample } from "./exposition.js";
import { scrapeHeaders } from "./http-client.js";
import type { ScrapeTarget } from "./scrape-target.js";
import type { Logger } from "../logger.js";

export interface ScrapeLoopOptions {
  target: ScrapeTarget;
  config: ScrapeJobConfig;
  appendable: Receiver;
  logger?: Logger;
  /** Override fetch (for testing) */
  fetch?: typeof fetch;
  /** Returns an error while the owning pool is over its target limit */
  poolError?: () => Error | null;
}

/** Deterministic start offset within the interval, spreads targets out */
export function scrapeOffset(key: string, intervalMs: number): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % intervalMs;
}

export class ScrapeLoop {
  readonly target: ScrapeTarget;
  private config: ScrapeJobConfig;
  private appendable: Receiver;
  private logger: Logger;
  private fetchFn: typeof fetch;
  private poolError: () => Error | null;

  private startTimer: ReturnType<typeof setTimeout> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inflight: AbortController | null = null;
  private scraping = false;
  private stopped = false;

  constructor(options: ScrapeLoopOptions) {
    this.target = options.target;
    this.config = options.config;
    this.appendable = options.appendable;
    this.logger = options.logger ?? pino();
    this.fetchFn = options.fetch ?? fetch;
    this.poolError = options.poolError ?? (() => null);
  }

  /** Start scraping after the target's offset, then every interval */
  start(): void {
    if (this.startTimer || this.timer || this.stopped) return;
    const offset = scrapeOffset(this.target.key, this.config.scrapeIntervalMs);
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.timer = setInterval(() => this.tick(), this.config.scrapeIntervalMs);
      this.tick();
    }, offset);
  }

  /** Stop the loop and abort a scrape in flight */
  stop(): void {
    this.stopped = true;
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.inflight?.abort(new Error("scrape loop stopped"));
  }

  get isRunning(): boolean {
    return !this.stopped && (this.startTimer !== null || this.timer !== null);
  }

  /** Run a single scrape and record its outcome on the target */
  async scrapeOnce(): Promise<void> {
    this.scraping = true;
    try {
      await this.scrapeAndReport();
    } finally {
      this.scraping = false;
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async scrapeAndReport(): Promise<void> {
    const start = new Date();
    let samplesScraped = 0;
    let bodyBytes = 0;
    let err: Error | null = null;

    try {
      const limitErr = this.poolError();
      if (limitErr) throw limitErr;

      const body = await this.fetchBody();
      bodyBytes = body.byteLength;
      const parsed = parseSamples(new TextDecoder().decode(body));
      samplesScraped = parsed.length;

      const samples = this.processSamples(parsed, start.getTime());
      if (samples.length > 0) await this.appendable.append(samples);
    } catch (e) {
      err = e instanceof Error ? e : new Error(String(e));
    }

    const durationMs = Date.now() - start.getTime();
    if (this.stopped) return;
    this.target.report(start, durationMs, err);

    try {
      await this.appendable.append(
        this.reportSamples(start.getTime(), durationMs, samplesScraped, bodyBytes, err),
      );
    } catch (appendErr) {
      this.logger.warn({ err: appendErr, target: this.target.url() }, "failed to append report samples");
    }
  }

  private tick(): void {
    // Skip this interval if the previous scrape is still running
    if (this.scraping || this.stopped) return;
    this.scrapeOnce().catch((err: unknown) => {
      this.logger.error({ err, target: this.target.url() }, "scrape failed unexpectedly");
    });
  }

  private async fetchBody(): Promise<Uint8Array> {
    const cfg = this.config;
    const controller = new AbortController();
    this.inflight = controller;
    const timeout = setTimeout(
      () => controller.abort(new Error(`scrape timed out after ${cfg.scrapeTimeoutMs}ms`)),
      cfg.scrapeTimeoutMs,
    );

    try {
      const res = await this.fetchFn(this.target.url(), {
        headers: await scrapeHeaders(cfg.httpClientConfig, cfg.scrapeTimeoutMs),
        redirect: cfg.httpClientConfig.followRedirects ? "follow" : "manual",
        signal: controller.signal,
      });
      if (res.status < 200 || res.status >= 300) {
        throw new Error(`server returned HTTP status ${res.status} ${res.statusText}`.trimEnd());
      }

      const declared = Number(res.headers.get("content-length") ?? NaN);
      if (cfg.bodySizeLimit > 0 && declared > cfg.bodySizeLimit) {
        throw new Error("body size limit exceeded");
      }
      return await readBody(res, cfg.bodySizeLimit);
    } finally {
      clearTimeout(timeout);
      this.inflight = null;
    }
  }

  /** Attach target labels, apply timestamps and enforce limits */
  private processSamples(parsed: ParsedSample[], scrapeTimeMs: number): Sample[] {
    const cfg = this.config;
    if (cfg.sampleLimit > 0 && parsed.length > cfg.sampleLimit) {
      throw new Error("sample limit exceeded");
    }

    const targetLabels = this.target.labels();
    return parsed.map((sample) => {
      const labels = mergeLabels(sample.labels, targetLabels, cfg.honorLabels);
      this.checkLabelLimits(labels);
      return {
        labels,
        value: sample.value,
        timestampMs:
          cfg.honorTimestamps && sample.timestampMs !== undefined
            ? sample.timestampMs
            : scrapeTimeMs,
      };
    });
  }

  private checkLabelLimits(labels: LabelSet): void {
    const cfg = this.config;
    const metric = labels.__name__;
    const names = Object.keys(labels);

    if (cfg.labelLimit > 0 && names.length > cfg.labelLimit) {
      throw new Error(
        `label_limit exceeded (metric: ${metric}, number of labels: ${names.length}, limit: ${cfg.labelLimit})`,
      );
    }
    // Lengths are in bytes
    for (const name of names) {
      const nameLength = Buffer.byteLength(name);
      if (cfg.labelNameLengthLimit > 0 && nameLength > cfg.labelNameLengthLimit) {
        throw new Error(
          `label_name_length_limit exceeded (metric: ${metric}, label name: ${name}, length: ${nameLength}, limit: ${cfg.labelNameLengthLimit})`,
        );
      }
      const value = labels[name];
      const valueLength = Buffer.byteLength(value);
      if (cfg.labelValueLengthLimit > 0 && valueLength > cfg.labelValueLengthLimit) {
        throw new Error(
          `label_value_length_limit exceeded (metric: ${metric}, label name: ${name}, value: ${value}, length: ${valueLength}, limit: ${cfg.labelValueLengthLimit})`,
        );
      }
    }
  }

  private reportSamples(
    timestampMs: number,
    durationMs: number,
    samplesScraped: number,
    bodyBytes: number,
    err: Error | null,
  ): Sample[] {
    const cfg = this.config;
    const targetLabels = this.target.labels();
    const series: Array<[string, number]> = [
      ["up", err ? 0 : 1],
      ["scrape_duration_seconds", durationMs / 1000],
      ["scrape_samples_scraped", samplesScraped],
    ];
    if (cfg.extraMetrics) {
      series.push(
        ["scrape_timeout_seconds", cfg.scrapeTimeoutMs / 1000],
        ["scrape_sample_limit", cfg.sampleLimit],
        ["scrape_body_size_bytes", bodyBytes],
      );
    }
    return series.map(([name, value]) => ({
      labels: { ...targetLabels, __name__: name },
      value,
      timestampMs,
    }));
  }
}

/**
 * Read a response body, giving up as soon as it grows past `limit` bytes.
 * A limit of 0 reads the whole body.
 */
async function readBody(res: Response, limit: number): Promise<Uint8Array> {
  if (limit <= 0 || !res.body) return new Uint8Array(await res.arrayBuffer());

  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > limit) {
      await reader.cancel();
      throw new Error("body size limit exceeded");
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks, total);
}

/**
 * Combine scraped labels with target labels. On a clash the scraped value
 * wins with `honorLabels`; otherwise it is kept as `exported_<name>`.
 */
export function mergeLabels(
  scraped: LabelSet,
  target: LabelSet,
  honorLabels: boolean,
): LabelSet {
  const labels: LabelSet = { ...scraped };
  for (const [name, value] of Object.entries(target)) {
    if (name in labels) {
      if (honorLabels) continue;
      labels[`exported_${name}`] = labels[name];
    }
    labels[name] = value;
  }
  return labels;
}
