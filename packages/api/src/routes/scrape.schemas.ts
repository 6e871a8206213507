/**
 * Typebox schemas for the scrape routes and the scrape config file.
 *
 * These produce both runtime JSON Schema validators (used by Fastify and
 * the config loader) and static TypeScript types via `Static<>`.
 */

import { Type, type Static } from "@sinclair/typebox";
import type { Receiver, ScrapeArguments } from "@scrape-supervisor/shared";
import { withDefaults } from "../supervisor/arguments.js";
import { MAX_TIMER_MS } from "../engine/validate.js";

// ---------------------------------------------------------------------------
// Reusable fragments
// ---------------------------------------------------------------------------

const LabelNamePattern = "^[a-zA-Z_][a-zA-Z0-9_]*$";

const LabelSet = Type.Record(Type.String({ pattern: LabelNamePattern }), Type.String());

const DurationMs = (defaultMs: number) =>
  Type.Integer({ minimum: 1, maximum: MAX_TIMER_MS, default: defaultMs });

const Limit = Type.Optional(Type.Integer({ minimum: 0, default: 0 }));

const HttpClientConfigBody = Type.Object(
  {
    basicAuth: Type.Optional(
      Type.Object({
        username: Type.String({ minLength: 1 }),
        password: Type.Optional(Type.String()),
        passwordFile: Type.Optional(Type.String({ minLength: 1 })),
      }),
    ),
    authorization: Type.Optional(
      Type.Object({
        type: Type.Optional(Type.String({ minLength: 1, default: "Bearer" })),
        credentials: Type.Optional(Type.String()),
        credentialsFile: Type.Optional(Type.String({ minLength: 1 })),
      }),
    ),
    bearerToken: Type.Optional(Type.String()),
    bearerTokenFile: Type.Optional(Type.String({ minLength: 1 })),
    followRedirects: Type.Optional(Type.Boolean({ default: true })),
  },
  { additionalProperties: false },
);

// ---------------------------------------------------------------------------
// PUT /api/scrape/arguments: also the shape of SCRAPE_CONFIG_FILE
// ---------------------------------------------------------------------------

export const ScrapeArgumentsBody = Type.Object(
  {
    targets: Type.Array(LabelSet),
    jobName: Type.Optional(Type.String({ default: "" })),
    honorLabels: Type.Optional(Type.Boolean({ default: false })),
    honorTimestamps: Type.Optional(Type.Boolean({ default: true })),
    params: Type.Optional(Type.Record(Type.String(), Type.Array(Type.String()), { default: {} })),
    scrapeIntervalMs: Type.Optional(DurationMs(60_000)),
    scrapeTimeoutMs: Type.Optional(DurationMs(10_000)),
    metricsPath: Type.Optional(Type.String({ default: "/metrics" })),
    scheme: Type.Optional(Type.String({ default: "http" })),
    bodySizeLimit: Limit,
    sampleLimit: Limit,
    targetLimit: Limit,
    labelLimit: Limit,
    labelNameLengthLimit: Limit,
    labelValueLengthLimit: Limit,
    httpClientConfig: Type.Optional(HttpClientConfigBody),
    extraMetrics: Type.Optional(Type.Boolean({ default: false })),
  },
  { additionalProperties: false },
);

export type ScrapeArgumentsBody = Static<typeof ScrapeArgumentsBody>;

/** Turn a validated body into full scrape arguments */
export function toScrapeArguments(
  body: ScrapeArgumentsBody,
  forwardTo: Receiver[],
): ScrapeArguments {
  const { httpClientConfig, ...rest } = body;
  const authorization = httpClientConfig?.authorization;
  return withDefaults({
    ...rest,
    forwardTo,
    httpClientConfig: httpClientConfig && {
      ...httpClientConfig,
      authorization: authorization && {
        ...authorization,
        type: authorization.type ?? "Bearer",
      },
    },
  });
}

// ---------------------------------------------------------------------------
// GET /api/samples
// ---------------------------------------------------------------------------

export const SamplesQuery = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 10_000, default: 100 })),
});

export type SamplesQuery = Static<typeof SamplesQuery>;
