/**
 * Orchestrator tickets exporter: winning tickets redeemed by the
 * orchestrator, one series per redeeming transaction.
 */

import type { OrchTicketsSnapshot, WinningTicket } from "@livepeer-exporter/shared";
import type { Gauge } from "prom-client";
import { SubExporter, type SubExporterOptions } from "./sub-exporter.js";
import { DEFAULT_ENDPOINTS, expandEndpoint } from "./endpoints.js";
import { toNumber } from "./common.schemas.js";
import { TicketsResponse } from "./orch-tickets-exporter.schemas.js";

export interface OrchTicketsExporterOptions extends SubExporterOptions {
  /** Tickets endpoint template */
  endpoint?: string;
}

export class OrchTicketsExporter extends SubExporter<OrchTicketsSnapshot> {
  private url: string;
  private count: Gauge;
  private totalFaceValue: Gauge;
  private faceValue: Gauge<"transaction_hash">;
  private blockTime: Gauge<"transaction_hash">;

  constructor(options: OrchTicketsExporterOptions) {
    super("tickets", options);
    this.url = expandEndpoint(options.endpoint ?? DEFAULT_ENDPOINTS.tickets, options.address);

    this.count = this.createGauge("livepeer_orch_winning_ticket_count", "Number of winning tickets redeemed");
    this.totalFaceValue = this.createGauge(
      "livepeer_orch_winning_tickets_face_value_total",
      "Sum of the face value of redeemed winning tickets in ETH",
    );
    this.faceValue = this.createGauge(
      "livepeer_orch_winning_ticket_face_value",
      "Face value of a redeemed winning ticket in ETH",
      ["transaction_hash"],
    );
    this.blockTime = this.createGauge(
      "livepeer_orch_winning_ticket_block_time_seconds",
      "Unix time of the block a winning ticket was redeemed in",
      ["transaction_hash"],
    );
  }

  protected async fetchSnapshot(): Promise<OrchTicketsSnapshot> {
    const body = await this.getJson(this.url, TicketsResponse);

    const tickets: WinningTicket[] = body.map((t) => ({
      transactionHash: t.transactionHash,
      blockTime: toNumber(t.blockTime),
      faceValue: toNumber(t.faceValue),
    }));
    const totalFaceValue = tickets.reduce((sum, t) => sum + t.faceValue, 0);

    return { tickets, totalFaceValue, fetchedAt: new Date().toISOString() };
  }

  protected publish(snapshot: OrchTicketsSnapshot): void {
    this.count.set(snapshot.tickets.length);
    this.totalFaceValue.set(snapshot.totalFaceValue);

    this.faceValue.reset();
    this.blockTime.reset();
    for (const t of snapshot.tickets) {
      // A transaction can redeem several tickets; sum them under one series
      this.faceValue.inc({ transaction_hash: t.transactionHash }, t.faceValue);
      this.blockTime.set({ transaction_hash: t.transactionHash }, t.blockTime);
    }
  }
}
