/**
 * Exporters Module
 *
 * One sub-exporter per upstream endpoint, all built on SubExporter.
 * `createExporters` wires them from the loaded configuration; it is the
 * only place that knows which exporters exist.
 */

import type { FastifyBaseLogger } from "fastify";
import type { Registry } from "prom-client";
import type { ExporterConfig } from "../config.js";
import type { ISubExporter } from "@livepeer-exporter/shared";
import { OrchInfoExporter } from "./orch-info-exporter.js";
import { OrchScoreExporter } from "./orch-score-exporter.js";
import { OrchDelegatorsExporter } from "./orch-delegators-exporter.js";
import { OrchTestStreamsExporter } from "./orch-test-streams-exporter.js";
import { OrchTicketsExporter } from "./orch-tickets-exporter.js";

export { SubExporter } from "./sub-exporter.js";
export type { SubExporterOptions } from "./sub-exporter.js";
export { OrchInfoExporter, OrchScoreExporter, OrchDelegatorsExporter, OrchTestStreamsExporter, OrchTicketsExporter };
export { DEFAULT_ENDPOINTS, expandEndpoint } from "./endpoints.js";
export type { EndpointName, EndpointTemplates } from "./endpoints.js";

/** Any sub-exporter, whatever its snapshot type */
export type AnySubExporter = ISubExporter<unknown>;

export function createExporters(
  config: ExporterConfig,
  registry: Registry,
  logger: FastifyBaseLogger,
): AnySubExporter[] {
  const base = (name: keyof ExporterConfig["fetchIntervals"]) => ({
    address: config.orchestratorAddress,
    fetchIntervalMs: config.fetchIntervals[name],
    updateIntervalMs: config.updateIntervalMs,
    registry,
    logger,
  });

  return [
    new OrchInfoExporter({
      ...base("info"),
      secondaryAddress: config.orchestratorAddressSecondary,
      orchestratorEndpoint: config.endpoints.orchestrator,
      delegatorEndpoint: config.endpoints.delegator,
    }),
    new OrchScoreExporter({ ...base("score"), endpoint: config.endpoints.score }),
    new OrchDelegatorsExporter({ ...base("delegators"), endpoint: config.endpoints.orchestrator }),
    new OrchTestStreamsExporter({ ...base("testStreams"), endpoint: config.endpoints.testStreams }),
    new OrchTicketsExporter({ ...base("tickets"), endpoint: config.endpoints.tickets }),
  ];
}
