import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Registry } from "prom-client";
import { OrchTicketsExporter } from "./orch-tickets-exporter.js";
import { createTestLogger, json, samplesOf, stubUpstream, type Route } from "../test/helpers.js";

const ADDRESS = "0xorch";
const TICKETS_URL = `http://upstream.test/tickets/${ADDRESS}`;

let registry: Registry;
let routes: Record<string, Route>;
let exporter: OrchTicketsExporter;

beforeEach(() => {
  registry = new Registry();
  routes = {
    [TICKETS_URL]: json([
      { transactionHash: "0xaaa", blockTime: "1700000000", faceValue: "0.25" },
      { transactionHash: "0xbbb", blockTime: 1_700_000_500, faceValue: 0.5 },
    ]),
  };
  stubUpstream(routes);
  exporter = new OrchTicketsExporter({
    address: ADDRESS,
    fetchIntervalMs: 60_000,
    updateIntervalMs: 30_000,
    registry,
    logger: createTestLogger().logger,
    endpoint: "http://upstream.test/tickets/{address}",
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("OrchTicketsExporter", () => {
  it("publishes winning tickets and their total", async () => {
    expect(await exporter.fetch()).toBe(true);
    exporter.update();

    expect(await samplesOf(registry, "livepeer_orch_winning_ticket_count")).toEqual([
      "livepeer_orch_winning_ticket_count 2",
    ]);
    expect(await samplesOf(registry, "livepeer_orch_winning_tickets_face_value_total")).toEqual([
      "livepeer_orch_winning_tickets_face_value_total 0.75",
    ]);
    expect(await samplesOf(registry, "livepeer_orch_winning_ticket_face_value")).toEqual([
      'livepeer_orch_winning_ticket_face_value{transaction_hash="0xaaa"} 0.25',
      'livepeer_orch_winning_ticket_face_value{transaction_hash="0xbbb"} 0.5',
    ]);
    expect(await samplesOf(registry, "livepeer_orch_winning_ticket_block_time_seconds")).toEqual([
      'livepeer_orch_winning_ticket_block_time_seconds{transaction_hash="0xaaa"} 1700000000',
      'livepeer_orch_winning_ticket_block_time_seconds{transaction_hash="0xbbb"} 1700000500',
    ]);
  });

  it("sums tickets redeemed in the same transaction", async () => {
    routes[TICKETS_URL] = json([
      { transactionHash: "0xccc", blockTime: 1_700_000_000, faceValue: 0.25 },
      { transactionHash: "0xccc", blockTime: 1_700_000_000, faceValue: 0.5 },
    ]);
    await exporter.fetch();
    exporter.update();
    // Updating again must not double the values
    exporter.update();

    expect(await samplesOf(registry, "livepeer_orch_winning_ticket_face_value")).toEqual([
      'livepeer_orch_winning_ticket_face_value{transaction_hash="0xccc"} 0.75',
    ]);
  });

  it("replaces the ticket set on every update", async () => {
    await exporter.fetch();
    exporter.update();

    routes[TICKETS_URL] = json([]);
    await exporter.fetch();
    exporter.update();

    expect(await samplesOf(registry, "livepeer_orch_winning_ticket_count")).toEqual([
      "livepeer_orch_winning_ticket_count 0",
    ]);
    expect(await samplesOf(registry, "livepeer_orch_winning_ticket_face_value")).toEqual([]);
    expect(await samplesOf(registry, "livepeer_orch_winning_tickets_face_value_total")).toEqual([
      "livepeer_orch_winning_tickets_face_value_total 0",
    ]);
  });
});
