/**
 * Prometheus scrape route — renders the process-wide registry.
 *
 * Stateless with respect to the exporters: it only reads gauge values the
 * update loops have already written.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  app.get("/metrics", async (_request, reply) => {
    const body = await app.registry.metrics();
    return reply.status(200).type(app.registry.contentType).send(body);
  });
};
