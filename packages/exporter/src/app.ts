import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import { Registry, collectDefaultMetrics } from "prom-client";

import type { ExporterConfig } from "./config.js";
import { createExporters, type AnySubExporter } from "./exporters/index.js";
import { metricsRoutes } from "./routes/metrics.js";
import { createLogger } from "./logger.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions extends FastifyServerOptions {
  config: ExporterConfig;
  /** Override the metrics registry (for testing) */
  registry?: Registry;
  /** Override the sub-exporters (for testing) */
  exporters?: AnySubExporter[];
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 *
 * This is the single place the metrics registry is created; every
 * sub-exporter registers its gauges on it.
 */
export async function buildApp(opts: BuildAppOptions) {
  const {
    config,
    registry: customRegistry,
    exporters: customExporters,
    ...fastifyOpts
  } = opts;

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : { loggerInstance: createLogger(config.logLevel) },
  );

  // Registry + sub-exporters (decorated so routes and hooks can access them)
  let registry = customRegistry;
  if (!registry) {
    registry = new Registry();
    collectDefaultMetrics({ register: registry });
  }
  const exporters = customExporters ?? createExporters(config, registry, app.log);
  app.decorate("registry", registry);
  app.decorate("exporters", exporters);

  // ---------------------------------------------------------------------------
  // Global error handler — log and normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes);

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start the fetch/update loops when the server is ready
  app.addHook("onReady", async () => {
    for (const exporter of exporters) {
      exporter.start();
    }
    app.log.info({ exporters: exporters.map((e) => e.name) }, "sub-exporters started");
  });

  // Stop them on close
  app.addHook("onClose", async () => {
    for (const exporter of exporters) {
      exporter.stop();
    }
  });

  return app;
}
