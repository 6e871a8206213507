/**
 * Scrape Supervisor: keeps a collection engine reconfigured as its
 * arguments change.
 *
 * Updates are applied in call order and only flag work for the run loop;
 * the run loop wakes on that flag, translates the latest target list and
 * hands it to the engine. Bursts of updates between two wake-ups collapse
 * into a single hand-off of the final state.
 *
 * IMPORTANT: Like the engine, this module is independent of the web
 * framework. It receives its collaborators via the options object.
 */

import { pino } from "pino";
import type {
  CollectionEngine,
  Fanout,
  HttpClientConfig,
  ScrapeArguments,
  ScraperStatus,
  TargetSets,
  TargetStatus,
} from "@scrape-supervisor/shared";
import { ScrapeManager } from "../engine/scrape-manager.js";
import { FanoutAppendable } from "../forwarding/fanout.js";
import { buildScrapeJobConfig } from "./config-builder.js";
import { ScrapeConfigError } from "./errors.js";
import { ReloadSignal } from "./reload-signal.js";
import { collectTargetStatus } from "./status-reporter.js";
import { TargetSetChannel } from "./target-set-channel.js";
import { translateTargets } from "./target-translator.js";
import type { Logger } from "../logger.js";

/** Deep, frozen copy of the arguments; shares nothing with the caller */
function snapshotArguments(args: ScrapeArguments): Readonly<ScrapeArguments> {
  const targets = args.targets.map((t) => Object.freeze({ ...t }));
  Object.freeze(targets);

  const params: Record<string, string[]> = {};
  for (const [key, values] of Object.entries(args.params)) {
    const copy = [...values];
    Object.freeze(copy);
    params[key] = copy;
  }
  Object.freeze(params);

  const http = args.httpClientConfig;
  const httpClientConfig: HttpClientConfig = {
    ...http,
    basicAuth: http.basicAuth && Object.freeze({ ...http.basicAuth }),
    authorization: http.authorization && Object.freeze({ ...http.authorization }),
  };
  Object.freeze(httpClientConfig);

  const forwardTo = [...args.forwardTo];
  Object.freeze(forwardTo);

  return Object.freeze({ ...args, targets, params, httpClientConfig, forwardTo });
}

export type SupervisorState = "initializing" | "running" | "stopped";

export interface ScrapeSupervisorOptions {
  /** Stable identifier of this instance; names the target set and default job */
  id: string;
  logger?: Logger;
  /** Override the collection engine (for testing) */
  engine?: CollectionEngine;
  /** Override the forwarding fan-out (for testing) */
  fanout?: Fanout;
}

export class ScrapeSupervisor {
  readonly id: string;
  private logger: Logger;
  private engine: CollectionEngine;
  private fanout: Fanout;
  private reloadTargets = new ReloadSignal();

  private currentState: SupervisorState = "initializing";
  private current: Readonly<ScrapeArguments> | null = null;
  /** Tail of the update queue; each update runs after the previous settles */
  private updateTail: Promise<void> = Promise.resolve();
  private running = false;

  private constructor(options: ScrapeSupervisorOptions) {
    this.id = options.id;
    this.logger = options.logger ?? pino();
    this.fanout = options.fanout ?? new FanoutAppendable([], { logger: this.logger });
    this.engine =
      options.engine ?? new ScrapeManager({ appendable: this.fanout, logger: this.logger });
  }

  /**
   * Create a supervisor and apply its initial arguments, so it is consistent
   * with them before anything else can observe it.
   */
  static async create(
    options: ScrapeSupervisorOptions,
    args: ScrapeArguments,
  ): Promise<ScrapeSupervisor> {
    const supervisor = new ScrapeSupervisor(options);
    await supervisor.update(args);
    supervisor.currentState = "running";
    return supervisor;
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  /** The arguments of the most recently completed update */
  get arguments(): Readonly<ScrapeArguments> {
    if (!this.current) throw new Error("scrape supervisor has no arguments yet");
    return this.current;
  }

  /**
   * Replace the arguments. Rejects with a ScrapeConfigError when the config
   * cannot be built or the engine refuses it; nothing changes in that case.
   */
  update(args: ScrapeArguments): Promise<void> {
    const next = this.updateTail.then(() => this.applyUpdate(args));
    // Keep the queue moving past a rejected update
    this.updateTail = next.catch(() => undefined);
    return next;
  }

  /**
   * Run until `signal` aborts. The engine is stopped before this resolves,
   * whichever way the loop exits.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.running || this.currentState === "stopped") {
      throw new Error("scrape supervisor is already running or stopped");
    }
    this.running = true;

    const targetSets = new TargetSetChannel<TargetSets>();
    const engineDone = this.engine.run(targetSets).then(
      () => {
        this.logger.info("scrape manager stopped");
      },
      (err: unknown) => {
        this.logger.info("scrape manager stopped");
        this.logger.error({ err }, "scrape manager failed");
      },
    );

    try {
      while (await this.reloadTargets.wait(signal)) {
        const targets = this.arguments.targets;
        const promTargets = translateTargets(this.id, targets);

        if (await targetSets.send(promTargets, signal)) {
          this.logger.debug("passed new targets to scrape manager");
        }
      }
    } finally {
      this.engine.stop();
      targetSets.close();
      this.currentState = "stopped";
      this.running = false;
    }

    await engineDone;
  }

  /** Live status of every target the engine is scraping */
  status(): TargetStatus[] {
    return collectTargetStatus(this.engine.targetsActive());
  }

  debugInfo(): ScraperStatus {
    return { targets: this.status() };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async applyUpdate(args: ScrapeArguments): Promise<void> {
    const jobConfig = buildScrapeJobConfig(this.id, args);

    try {
      await this.engine.applyConfig({ jobs: { [this.id]: jobConfig } });
    } catch (err) {
      throw new ScrapeConfigError("apply", err);
    }

    this.fanout.setReceivers(args.forwardTo);
    this.current = snapshotArguments(args);
    this.logger.debug("scrape config was updated");

    this.reloadTargets.raise();
  }
}
