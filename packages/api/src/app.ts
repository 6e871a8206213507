import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";

import { ScrapeSupervisor } from "./supervisor/scrape-supervisor.js";
import { ScrapeConfigError } from "./supervisor/errors.js";
import { MemoryReceiver } from "./forwarding/memory-receiver.js";
import { DEFAULT_INSTANCE_ID } from "./config.js";
import { healthRoutes } from "./routes/health.js";
import { scrapeRoutes, sampleRoutes } from "./routes/scrape.js";
import { toScrapeArguments, type ScrapeArgumentsBody } from "./routes/scrape.schemas.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Override the supervisor instance (for testing) */
  supervisor?: ScrapeSupervisor;
  /** Override the in-memory sample destination (for testing) */
  sampleBuffer?: MemoryReceiver;
  /** Identifier of the supervised scrape instance */
  instanceId?: string;
  /** Initial scrape arguments (default: no targets) */
  scrapeArguments?: ScrapeArgumentsBody;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    supervisor: customSupervisor,
    sampleBuffer: customBuffer,
    instanceId,
    scrapeArguments,
    ...fastifyOpts
  } = opts ?? {};

  const logLevel = process.env.LOG_LEVEL || "info";
  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isDev
            ? {
                level: logLevel,
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                level: logLevel,
                // Production: structured JSON logging with redaction
                redact: [
                  "req.headers.authorization",
                  "req.body.httpClientConfig.basicAuth.password",
                  "req.body.httpClientConfig.authorization.credentials",
                  "req.body.httpClientConfig.bearerToken",
                ],
              },
          // Generate unique request IDs for tracing
          genReqId: (req) => {
            const header = req.headers["x-request-id"];
            return typeof header === "string" && header ? header : randomUUID();
          },
        },
  );

  // Sample buffer + Supervisor (decorated so routes can access them)
  const sampleBuffer = customBuffer ?? new MemoryReceiver();
  const supervisor =
    customSupervisor ??
    (await ScrapeSupervisor.create(
      {
        id: instanceId ?? DEFAULT_INSTANCE_ID,
        logger: app.log.child({ component: "prometheus.scrape" }),
      },
      toScrapeArguments(scrapeArguments ?? { targets: [] }, [sampleBuffer]),
    ));
  app.decorate("supervisor", supervisor);
  app.decorate("sampleBuffer", sampleBuffer);

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "body",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    // Rejected scrape configuration: report which stage refused it
    if (error instanceof ScrapeConfigError) {
      request.log.warn({ err: error }, "scrape arguments rejected");
      reply.status(error.statusCode).send({ error: error.message, stage: error.stage });
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.message,
      });
      return;
    }

    // Unexpected errors: log full details, return generic message
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/api/health" });
  await app.register(scrapeRoutes, { prefix: "/api/scrape" });
  await app.register(sampleRoutes, { prefix: "/api/samples" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------
  const shutdown = new AbortController();
  let runLoop: Promise<void> | null = null;

  // Start the supervisor's run loop when the server is ready
  app.addHook("onReady", async () => {
    runLoop = supervisor.run(shutdown.signal).catch((err: unknown) => {
      app.log.error({ err }, "scrape supervisor exited");
    });
  });

  // Stop the run loop (and with it all scraping) on close
  app.addHook("onClose", async () => {
    shutdown.abort();
    await runLoop;
  });

  return app;
}
