import type { BaseLogger } from "pino";

/**
 * The logging calls the scrape core makes. Satisfied by a pino logger and
 * by Fastify's request and instance loggers.
 */
export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;
