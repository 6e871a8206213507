/**
 * Scrape pool: the scrape loops of one job, kept in step with the job's
 * latest target groups and config.
 */

import type { Receiver, ScrapeJobConfig, TargetGroup } from "@scrape-supervisor/shared";
import { ScrapeLoop } from "./scrape-loop.js";
import { resolveGroups, type ScrapeTarget } from "./scrape-target.js";
import type { Logger } from "../logger.js";

export interface ScrapePoolOptions {
  config: ScrapeJobConfig;
  appendable: Receiver;
  logger: Logger;
  fetch?: typeof fetch;
}

export class ScrapePool {
  private config: ScrapeJobConfig;
  private appendable: Receiver;
  private logger: Logger;
  private fetchFn?: typeof fetch;

  /** Active loops keyed by target identity */
  private loops = new Map<string, ScrapeLoop>();
  private groups: readonly TargetGroup[] = [];
  private limitError: Error | null = null;

  constructor(options: ScrapePoolOptions) {
    this.config = options.config;
    this.appendable = options.appendable;
    this.logger = options.logger;
    this.fetchFn = options.fetch;
  }

  get jobName(): string {
    return this.config.jobName;
  }

  get jobConfig(): ScrapeJobConfig {
    return this.config;
  }

  /** Replace the pool's targets with the given groups */
  sync(groups: readonly TargetGroup[]): void {
    this.groups = groups;
    const { targets, dropped } = resolveGroups(groups, this.config);
    if (dropped > 0) {
      this.logger.warn({ job: this.jobName, dropped }, "dropped targets without a valid address");
    }

    const wanted = new Map(targets.map((t) => [t.key, t]));
    for (const [key, loop] of this.loops) {
      if (!wanted.has(key)) {
        loop.stop();
        this.loops.delete(key);
      }
    }
    for (const [key, target] of wanted) {
      if (this.loops.has(key)) continue;
      const loop = this.createLoop(target);
      this.loops.set(key, loop);
      loop.start();
    }

    this.checkTargetLimit();
  }

  /**
   * Apply a new config. Loops restart with the new settings; targets that
   * resolve identically keep their last scrape state.
   */
  reload(config: ScrapeJobConfig): void {
    this.config = config;
    const previous = this.loops;
    this.loops = new Map();

    for (const loop of previous.values()) loop.stop();
    const { targets } = resolveGroups(this.groups, config);
    const kept = new Map<string, ScrapeTarget>();
    for (const [key, loop] of previous) kept.set(key, loop.target);
    for (const target of targets) {
      const loop = this.createLoop(kept.get(target.key) ?? target);
      this.loops.set(target.key, loop);
      loop.start();
    }
    this.checkTargetLimit();
  }

  /** Targets currently being scraped */
  activeTargets(): ScrapeTarget[] {
    return [...this.loops.values()].map((l) => l.target);
  }

  stop(): void {
    for (const loop of this.loops.values()) loop.stop();
    this.loops.clear();
  }

  private checkTargetLimit(): void {
    const limit = this.config.targetLimit;
    this.limitError =
      limit > 0 && this.loops.size > limit
        ? new Error(`target_limit exceeded (number of targets: ${this.loops.size}, limit: ${limit})`)
        : null;
  }

  private createLoop(target: ScrapeTarget): ScrapeLoop {
    return new ScrapeLoop({
      target,
      config: this.config,
      appendable: this.appendable,
      logger: this.logger,
      fetch: this.fetchFn,
      poolError: () => this.limitError,
    });
  }
}
