import type { FastifyBaseLogger } from "fastify";
import { loadConfig, type Env } from "./config.js";
import { buildApp } from "./app.js";
import { formatDuration } from "./lib/duration.js";

/** The scrape port is fixed; collectors are configured against it */
export const METRICS_PORT = 9153;
export const METRICS_HOST = "0.0.0.0";

/**
 * Load configuration, build the app and start listening.
 *
 * Configuration errors are thrown before the app is built, so no exporter
 * loop is started and no listener is opened.
 */
export async function main(env: Env, logger: FastifyBaseLogger) {
  const config = loadConfig(env);
  logger.level = config.logLevel;

  logger.info(
    {
      address: config.orchestratorAddress,
      secondaryAddress: config.orchestratorAddressSecondary,
      fetchIntervals: Object.fromEntries(
        Object.entries(config.fetchIntervals).map(([name, ms]) => [name, formatDuration(ms)]),
      ),
      updateInterval: formatDuration(config.updateIntervalMs),
    },
    "starting Livepeer exporter",
  );

  const app = await buildApp({ config, loggerInstance: logger });
  await app.listen({ port: METRICS_PORT, host: METRICS_HOST });
  return app;
}
