/** Stage of the update sequence that rejected a configuration */
export type ConfigStage = "build" | "apply";

const STAGE_PREFIX: Record<ConfigStage, string> = {
  build: "invalid scrape_config",
  apply: "error applying scrape configs",
};

/**
 * Raised when scrape arguments cannot be turned into a job config, or the
 * engine refuses the resulting config. Carries an HTTP status so the
 * server's error handler can answer with a 400.
 */
export class ScrapeConfigError extends Error {
  readonly stage: ConfigStage;
  readonly statusCode = 400;

  constructor(stage: ConfigStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${STAGE_PREFIX[stage]}: ${reason}`, { cause });
    this.name = "ScrapeConfigError";
    this.stage = stage;
  }
}
