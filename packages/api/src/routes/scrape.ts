/**
 * Scrape API routes: target status and argument updates.
 */

import type { FastifyPluginAsync } from "fastify";
import { ScrapeArgumentsBody, SamplesQuery, toScrapeArguments } from "./scrape.schemas.js";

export const scrapeRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/scrape/targets
  // -------------------------------------------------------------------------
  app.get("/targets", async (_request, reply) => {
    return reply.send(app.supervisor.debugInfo());
  });

  // -------------------------------------------------------------------------
  // GET /api/scrape/arguments
  // -------------------------------------------------------------------------
  app.get("/arguments", async (_request, reply) => {
    const { forwardTo, ...args } = app.supervisor.arguments;
    return reply.send({ ...args, receivers: forwardTo.length });
  });

  // -------------------------------------------------------------------------
  // PUT /api/scrape/arguments
  // -------------------------------------------------------------------------
  app.put<{ Body: ScrapeArgumentsBody }>(
    "/arguments",
    { schema: { body: ScrapeArgumentsBody } },
    async (request, reply) => {
      // Rejections surface as ScrapeConfigError through the error handler
      await app.supervisor.update(toScrapeArguments(request.body, [app.sampleBuffer]));
      return reply.status(204).send();
    },
  );
};

// ---------------------------------------------------------------------------
// Sample routes: registered separately under /api/samples
// ---------------------------------------------------------------------------

export const sampleRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/samples?limit=100
  // -------------------------------------------------------------------------
  app.get<{ Querystring: SamplesQuery }>(
    "/",
    { schema: { querystring: SamplesQuery } },
    async (request, reply) => {
      const limit = request.query.limit ?? 100;
      return reply.send({ samples: app.sampleBuffer.latest(limit) });
    },
  );
};
