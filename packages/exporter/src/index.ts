import "dotenv/config";

import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import type { ExporterConfig } from "@org-stats-exporter/shared";

function readConfig(): ExporterConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const config = readConfig();

const app = await buildApp({ config });

app.log.info(
  {
    version: config.build.version,
    revision: config.build.revision,
    buildDate: config.build.buildDate,
    nodeVersion: process.version,
    organizations: config.organizations,
  },
  "starting org-stats-exporter",
);

// Start
try {
  await app.listen({ port: config.listenPort, host: config.listenHost });
  app.log.info(`Exporter listening on ${config.listenHost}:${config.listenPort}${config.metricsPath}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
