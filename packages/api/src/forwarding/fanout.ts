/**
 * Forwarding fan-out: delivers every appended batch of samples to the
 * current set of receivers.
 */

import { pino } from "pino";
import type { Fanout, Receiver, Sample } from "@scrape-supervisor/shared";
import type { Logger } from "../logger.js";

export interface FanoutAppendableOptions {
  logger?: Logger;
}

export class FanoutAppendable implements Fanout {
  private receivers: readonly Receiver[];
  private logger: Logger;

  constructor(receivers: Receiver[] = [], options?: FanoutAppendableOptions) {
    this.receivers = [...receivers];
    this.logger = options?.logger ?? pino();
  }

  /** Replace the active receivers. Appends already in flight keep the old set. */
  setReceivers(receivers: Receiver[]): void {
    this.receivers = [...receivers];
  }

  get size(): number {
    return this.receivers.length;
  }

  async append(samples: Sample[]): Promise<void> {
    const receivers = this.receivers;
    if (receivers.length === 0 || samples.length === 0) return;

    const results = await Promise.allSettled(receivers.map((r) => r.append(samples)));
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn({ err: result.reason }, "receiver failed to append samples");
      }
    }
  }
}
