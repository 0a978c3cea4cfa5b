/**
 * Orchestrator test streams exporter — results of the most recent test
 * stream per region.
 *
 * The upstream API is slow, so this exporter usually runs on its own,
 * longer fetch interval (LIVEPEER_EXPORTER_FETCH_TEST_STREAMS_INTERVAL).
 */

import type { OrchTestStreamsSnapshot, TestStreamResult } from "@livepeer-exporter/shared";
import type { Gauge } from "prom-client";
import { SubExporter, type SubExporterOptions } from "./sub-exporter.js";
import { DEFAULT_ENDPOINTS, expandEndpoint } from "./endpoints.js";
import { TestStreamsResponse, type TestStreamRun } from "./orch-test-streams-exporter.schemas.js";

export interface OrchTestStreamsExporterOptions extends SubExporterOptions {
  /** Test streams endpoint template */
  endpoint?: string;
}

type RegionGauge = Gauge<"region">;

export class OrchTestStreamsExporter extends SubExporter<OrchTestStreamsSnapshot> {
  private url: string;
  private successRate: RegionGauge;
  private roundTripTime: RegionGauge;
  private segmentsSent: RegionGauge;
  private segmentsReceived: RegionGauge;
  private errors: RegionGauge;
  private timestamp: RegionGauge;

  constructor(options: OrchTestStreamsExporterOptions) {
    super("testStreams", options);
    this.url = expandEndpoint(options.endpoint ?? DEFAULT_ENDPOINTS.testStreams, options.address);

    const labels = ["region"] as const;
    this.successRate = this.createGauge(
      "livepeer_orch_test_stream_success_rate",
      "Success rate of the latest test stream per region (0-1)",
      labels,
    );
    this.roundTripTime = this.createGauge(
      "livepeer_orch_test_stream_round_trip_time_seconds",
      "Round trip time of the latest test stream per region",
      labels,
    );
    this.segmentsSent = this.createGauge(
      "livepeer_orch_test_stream_segments_sent",
      "Segments sent in the latest test stream per region",
      labels,
    );
    this.segmentsReceived = this.createGauge(
      "livepeer_orch_test_stream_segments_received",
      "Segments received in the latest test stream per region",
      labels,
    );
    this.errors = this.createGauge(
      "livepeer_orch_test_stream_errors",
      "Errors reported by the latest test stream per region",
      labels,
    );
    this.timestamp = this.createGauge(
      "livepeer_orch_test_stream_timestamp_seconds",
      "Unix time of the latest test stream per region",
      labels,
    );
  }

  protected async fetchSnapshot(): Promise<OrchTestStreamsSnapshot> {
    const body = await this.getJson(this.url, TestStreamsResponse);

    const results: TestStreamResult[] = [];
    for (const region of Object.keys(body).sort()) {
      const latest = latestRun(body[region]);
      if (!latest) continue;
      results.push({
        region,
        timestamp: latest.timestamp,
        successRate: latest.success_rate,
        roundTripTime: latest.round_trip_time,
        segmentsSent: latest.segments_sent,
        segmentsReceived: latest.segments_received,
        errorCount: latest.errors?.length ?? 0,
      });
    }

    return { results, fetchedAt: new Date().toISOString() };
  }

  protected publish(snapshot: OrchTestStreamsSnapshot): void {
    const gauges = [
      this.successRate,
      this.roundTripTime,
      this.segmentsSent,
      this.segmentsReceived,
      this.errors,
      this.timestamp,
    ];
    for (const g of gauges) g.reset();

    for (const r of snapshot.results) {
      const labels = { region: r.region };
      this.successRate.set(labels, r.successRate);
      this.roundTripTime.set(labels, r.roundTripTime);
      this.segmentsSent.set(labels, r.segmentsSent);
      this.segmentsReceived.set(labels, r.segmentsReceived);
      this.errors.set(labels, r.errorCount);
      this.timestamp.set(labels, r.timestamp);
    }
  }
}

/** Run with the highest timestamp, or undefined for an empty list */
function latestRun(runs: TestStreamRun[]): TestStreamRun | undefined {
  let latest: TestStreamRun | undefined;
  for (const run of runs) {
    if (!latest || run.timestamp > latest.timestamp) latest = run;
  }
  return latest;
}
