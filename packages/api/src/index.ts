import { buildApp } from "./app.js";
import { loadScrapeArgumentsFile, loadServerConfig } from "./config.js";

const config = loadServerConfig();
const scrapeArguments = config.scrapeConfigFile
  ? await loadScrapeArgumentsFile(config.scrapeConfigFile)
  : undefined;

const app = await buildApp({ instanceId: config.instanceId, scrapeArguments });

// Graceful shutdown: stops the run loop and all scraping before exiting
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}

// Start
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`Scrape supervisor listening on ${config.host}:${config.port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
