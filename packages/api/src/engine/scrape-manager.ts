/**
 * Scrape Manager: the default collection engine.
 *
 * Holds one scrape pool per configured target set, feeds each pool the
 * target groups it receives, and exposes the live target registry.
 *
 * IMPORTANT: This module must remain independent of the web framework and
 * of the supervisor. It is driven only through the CollectionEngine
 * interface.
 */

import { pino } from "pino";
import type {
  CollectionEngine,
  Receiver,
  ScrapeJobConfig,
  ScrapeManagerConfig,
  TargetSets,
} from "@scrape-supervisor/shared";
import { ScrapePool } from "./scrape-pool.js";
import type { ScrapeTarget } from "./scrape-target.js";
import { validateScrapeJobConfig } from "./validate.js";
import type { Logger } from "../logger.js";

export interface ScrapeManagerOptions {
  /** Where scraped samples go */
  appendable: Receiver;
  logger?: Logger;
  /** Override fetch (for testing) */
  fetch?: typeof fetch;
}

function sameConfig(a: ScrapeJobConfig, b: ScrapeJobConfig): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export class ScrapeManager implements CollectionEngine {
  private appendable: Receiver;
  private logger: Logger;
  private fetchFn?: typeof fetch;

  private jobs: Record<string, ScrapeJobConfig> = {};
  /** Pools keyed by target set name */
  private pools = new Map<string, ScrapePool>();
  /** Last target groups received per target set name */
  private targetSets: TargetSets = {};
  private stopController = new AbortController();

  constructor(options: ScrapeManagerOptions) {
    this.appendable = options.appendable;
    this.logger = options.logger ?? pino();
    this.fetchFn = options.fetch;
  }

  get isStopped(): boolean {
    return this.stopController.signal.aborted;
  }

  async applyConfig(config: ScrapeManagerConfig): Promise<void> {
    // Validate everything before touching any pool
    for (const job of Object.values(config.jobs)) {
      validateScrapeJobConfig(job);
    }

    for (const [name, pool] of this.pools) {
      if (!(name in config.jobs)) {
        pool.stop();
        this.pools.delete(name);
      }
    }

    this.jobs = { ...config.jobs };
    for (const [name, job] of Object.entries(this.jobs)) {
      const pool = this.pools.get(name);
      if (pool) {
        if (!sameConfig(pool.jobConfig, job)) pool.reload(job);
      } else if (name in this.targetSets) {
        this.startPool(name, job);
      }
    }
  }

  async run(targetSets: AsyncIterable<TargetSets>): Promise<void> {
    const signal = this.stopController.signal;
    const iterator = targetSets[Symbol.asyncIterator]();
    const stopped = new Promise<IteratorResult<TargetSets>>((resolve) => {
      signal.addEventListener("abort", () => resolve({ done: true, value: undefined }), {
        once: true,
      });
    });

    while (!signal.aborted) {
      const next = await Promise.race([iterator.next(), stopped]);
      if (next.done) return;
      this.updateTargets(next.value);
    }
  }

  targetsActive(): Map<string, ScrapeTarget[]> {
    const active = new Map<string, ScrapeTarget[]>();
    for (const pool of this.pools.values()) {
      const existing = active.get(pool.jobName) ?? [];
      active.set(pool.jobName, [...existing, ...pool.activeTargets()]);
    }
    return active;
  }

  stop(): void {
    if (this.isStopped) return;
    this.stopController.abort();
    for (const pool of this.pools.values()) pool.stop();
    this.pools.clear();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private updateTargets(sets: TargetSets): void {
    for (const [name, groups] of Object.entries(sets)) {
      this.targetSets[name] = groups;

      const pool = this.pools.get(name);
      if (pool) {
        pool.sync(groups);
        continue;
      }
      const job = this.jobs[name];
      if (job) {
        this.startPool(name, job);
      } else {
        this.logger.debug({ set: name }, "no scrape config for target set yet");
      }
    }
  }

  private startPool(name: string, job: ScrapeJobConfig): void {
    if (this.isStopped) return;
    const pool = new ScrapePool({
      config: job,
      appendable: this.appendable,
      logger: this.logger,
      fetch: this.fetchFn,
    });
    this.pools.set(name, pool);
    pool.sync(this.targetSets[name] ?? []);
  }
}
