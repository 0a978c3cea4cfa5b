import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Registry } from "prom-client";
import { OrchTestStreamsExporter } from "./orch-test-streams-exporter.js";
import { createTestLogger, json, samplesOf, stubUpstream, type Route } from "../test/helpers.js";

const ADDRESS = "0xorch";
const STREAMS_URL = `http://upstream.test/raw_stats?orchestrator=${ADDRESS}`;

function run(timestamp: number, successRate: number, extra: Record<string, unknown> = {}) {
  return {
    timestamp,
    success_rate: successRate,
    round_trip_time: 2.5,
    segments_sent: 30,
    segments_received: Math.round(30 * successRate),
    ...extra,
  };
}

let registry: Registry;
let routes: Record<string, Route>;
let exporter: OrchTestStreamsExporter;

beforeEach(() => {
  registry = new Registry();
  routes = {
    [STREAMS_URL]: json({
      NYC: [run(1_700_000_000, 0.5), run(1_700_000_600, 1, { errors: [] })],
      FRA: [run(1_700_000_300, 0.9, { errors: [{ error: "timeout" }, { error: "timeout" }] })],
      SIN: [],
    }),
  };
  stubUpstream(routes);
  exporter = new OrchTestStreamsExporter({
    address: ADDRESS,
    fetchIntervalMs: 900_000,
    updateIntervalMs: 30_000,
    registry,
    logger: createTestLogger().logger,
    endpoint: "http://upstream.test/raw_stats?orchestrator={address}",
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("OrchTestStreamsExporter", () => {
  it("keeps the newest run per region and skips regions without runs", async () => {
    expect(await exporter.fetch()).toBe(true);

    expect(exporter.snapshot?.results).toEqual([
      {
        region: "FRA",
        timestamp: 1_700_000_300,
        successRate: 0.9,
        roundTripTime: 2.5,
        segmentsSent: 30,
        segmentsReceived: 27,
        errorCount: 2,
      },
      {
        region: "NYC",
        timestamp: 1_700_000_600,
        successRate: 1,
        roundTripTime: 2.5,
        segmentsSent: 30,
        segmentsReceived: 30,
        errorCount: 0,
      },
    ]);
  });

  it("publishes per-region gauges", async () => {
    await exporter.fetch();
    exporter.update();

    expect(await samplesOf(registry, "livepeer_orch_test_stream_success_rate")).toEqual([
      'livepeer_orch_test_stream_success_rate{region="FRA"} 0.9',
      'livepeer_orch_test_stream_success_rate{region="NYC"} 1',
    ]);
    expect(await samplesOf(registry, "livepeer_orch_test_stream_errors")).toEqual([
      'livepeer_orch_test_stream_errors{region="FRA"} 2',
      'livepeer_orch_test_stream_errors{region="NYC"} 0',
    ]);
    expect(await samplesOf(registry, "livepeer_orch_test_stream_timestamp_seconds")).toEqual([
      'livepeer_orch_test_stream_timestamp_seconds{region="FRA"} 1700000300',
      'livepeer_orch_test_stream_timestamp_seconds{region="NYC"} 1700000600',
    ]);
  });

  it("drops regions that no longer report", async () => {
    await exporter.fetch();
    exporter.update();

    routes[STREAMS_URL] = json({ NYC: [run(1_700_001_200, 0.8)] });
    await exporter.fetch();
    exporter.update();

    expect(await samplesOf(registry, "livepeer_orch_test_stream_segments_received")).toEqual([
      'livepeer_orch_test_stream_segments_received{region="NYC"} 24',
    ]);
    expect(await samplesOf(registry, "livepeer_orch_test_stream_round_trip_time_seconds")).toEqual([
      'livepeer_orch_test_stream_round_trip_time_seconds{region="NYC"} 2.5',
    ]);
  });

  it("keeps the previous results on a malformed payload", async () => {
    await exporter.fetch();
    exporter.update();

    routes[STREAMS_URL] = json({ NYC: [{ timestamp: "yesterday" }] });
    expect(await exporter.fetch()).toBe(false);
    exporter.update();

    expect(await samplesOf(registry, "livepeer_orch_test_stream_success_rate")).toHaveLength(2);
  });
});
