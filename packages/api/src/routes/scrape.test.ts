import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { ScrapeSupervisor } from "../supervisor/scrape-supervisor.js";
import { withDefaults } from "../supervisor/arguments.js";
import { MemoryReceiver } from "../forwarding/memory-receiver.js";
import { FakeEngine, fakeTarget, silentLogger } from "../test/helpers.js";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

const ID = "prometheus.scrape.test";

let app: FastifyInstance;
let engine: FakeEngine;
let supervisor: ScrapeSupervisor;
let sampleBuffer: MemoryReceiver;
let closed: boolean;

beforeEach(async () => {
  engine = new FakeEngine();
  sampleBuffer = new MemoryReceiver();
  supervisor = await ScrapeSupervisor.create(
    { id: ID, logger: silentLogger, engine },
    withDefaults({ targets: [{ __address__: "10.0.0.1:9100" }], forwardTo: [sampleBuffer] }),
  );
  app = await buildApp({ logger: false, supervisor, sampleBuffer });
  await app.ready();
  closed = false;
});

afterEach(async () => {
  if (!closed) await app.close();
});

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("GET /api/health", () => {
  it("reports a running supervisor", async () => {
    engine.active.set(ID, [fakeTarget({ url: "http://10.0.0.1:9100/metrics" })]);

    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", state: "running", targets: 1 });
  });
});

// ---------------------------------------------------------------------------
// Targets & arguments
// ---------------------------------------------------------------------------

describe("GET /api/scrape/targets", () => {
  it("returns the status of every target", async () => {
    engine.active.set(ID, [
      fakeTarget({
        url: "http://10.0.0.1:9100/metrics",
        labels: { instance: "10.0.0.1:9100", job: ID },
        health: "down",
        lastError: new Error("connection refused"),
        lastScrape: new Date("2026-05-01T12:00:00.000Z"),
        lastScrapeDurationMs: 3,
      }),
    ]);

    const res = await app.inject({ method: "GET", url: "/api/scrape/targets" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      targets: [
        {
          jobName: ID,
          url: "http://10.0.0.1:9100/metrics",
          health: "down",
          labels: { instance: "10.0.0.1:9100", job: ID },
          lastError: "connection refused",
          lastScrape: "2026-05-01T12:00:00.000Z",
          lastScrapeDurationMs: 3,
        },
      ],
    });
  });
});

describe("GET /api/scrape/arguments", () => {
  it("returns the current arguments with a receiver count", async () => {
    const res = await app.inject({ method: "GET", url: "/api/scrape/arguments" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      targets: [{ __address__: "10.0.0.1:9100" }],
      scrapeIntervalMs: 60_000,
      metricsPath: "/metrics",
      receivers: 1,
    });
    expect(body).not.toHaveProperty("forwardTo");
  });
});

describe("PUT /api/scrape/arguments", () => {
  it("applies new arguments with defaults filled in", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/api/scrape/arguments",
      payload: {
        targets: [{ __address__: "10.0.0.2:9100" }, { __address__: "10.0.0.3:9100" }],
        jobName: "node",
        httpClientConfig: { authorization: { credentials: "test-token" } },
      },
    });

    expect(res.statusCode).toBe(204);
    expect(supervisor.arguments.targets).toEqual([
      { __address__: "10.0.0.2:9100" },
      { __address__: "10.0.0.3:9100" },
    ]);
    expect(supervisor.arguments.forwardTo).toEqual([sampleBuffer]);
    const job = engine.applied[engine.applied.length - 1].jobs[ID];
    expect(job.jobName).toBe("node");
    expect(job.scrapeIntervalMs).toBe(60_000);
    expect(job.httpClientConfig.authorization).toEqual({
      type: "Bearer",
      credentials: "test-token",
    });
  });

  it("rejects a body without targets", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/api/scrape/arguments",
      payload: { jobName: "node" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Validation failed");
  });

  it("rejects an interval longer than a timer can hold", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/api/scrape/arguments",
      payload: { targets: [], scrapeIntervalMs: 2 ** 32 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Validation failed");
    expect(supervisor.arguments.scrapeIntervalMs).toBe(60_000);
  });

  it("reports a config that cannot be built", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/api/scrape/arguments",
      payload: { targets: [], scheme: "ftp" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: `invalid scrape_config: unknown scheme "ftp" for job "${ID}"`,
      stage: "build",
    });
    expect(supervisor.arguments.targets).toEqual([{ __address__: "10.0.0.1:9100" }]);
  });

  it("reports a config the engine refuses", async () => {
    engine.rejectConfig = new Error("pool is shutting down");

    const res = await app.inject({
      method: "PUT",
      url: "/api/scrape/arguments",
      payload: { targets: [] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "error applying scrape configs: pool is shutting down",
      stage: "apply",
    });
  });
});

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

describe("GET /api/samples", () => {
  it("returns the newest samples", async () => {
    await sampleBuffer.append([
      { labels: { __name__: "up" }, value: 1, timestampMs: 1000 },
      { labels: { __name__: "up" }, value: 0, timestampMs: 2000 },
    ]);

    const res = await app.inject({ method: "GET", url: "/api/samples?limit=1" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      samples: [{ labels: { __name__: "up" }, value: 0, timestampMs: 2000 }],
    });
  });

  it("rejects a limit out of range", async () => {
    const res = await app.inject({ method: "GET", url: "/api/samples?limit=0" });

    expect(res.statusCode).toBe(400);
  });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe("lifecycle", () => {
  it("stops the supervisor when the server closes", async () => {
    await app.close();
    closed = true;

    expect(supervisor.state).toBe("stopped");
    expect(engine.stopCalls).toBe(1);
  });
});

describe("buildApp without a supervisor", () => {
  it("creates one from the initial arguments with the server's logger", async () => {
    const own = await buildApp({
      logger: false,
      instanceId: "prometheus.scrape.local",
      scrapeArguments: { targets: [], jobName: "local" },
    });
    await own.ready();

    const res = await own.inject({ method: "GET", url: "/api/scrape/arguments" });

    expect(own.supervisor.id).toBe("prometheus.scrape.local");
    expect(own.supervisor.state).toBe("running");
    expect(res.json()).toMatchObject({ targets: [], jobName: "local", receivers: 1 });

    await own.close();
    expect(own.supervisor.state).toBe("stopped");
  });
});
