/**
 * Orchestrator score exporter — price and per-region performance scores.
 */

import type { OrchScoreSnapshot, RegionScore } from "@livepeer-exporter/shared";
import type { Gauge } from "prom-client";
import { SubExporter, type SubExporterOptions } from "./sub-exporter.js";
import { DEFAULT_ENDPOINTS, expandEndpoint } from "./endpoints.js";
import { toNumber } from "./common.schemas.js";
import { ScoreResponse } from "./orch-score-exporter.schemas.js";

export interface OrchScoreExporterOptions extends SubExporterOptions {
  /** Score endpoint template */
  endpoint?: string;
}

export class OrchScoreExporter extends SubExporter<OrchScoreSnapshot> {
  private url: string;
  private pricePerPixel: Gauge;
  private score: Gauge<"region">;
  private successRate: Gauge<"region">;
  private roundTripScore: Gauge<"region">;

  constructor(options: OrchScoreExporterOptions) {
    super("score", options);
    this.url = expandEndpoint(options.endpoint ?? DEFAULT_ENDPOINTS.score, options.address);

    this.pricePerPixel = this.createGauge("livepeer_orch_price_per_pixel", "Price per pixel in wei");
    this.score = this.createGauge("livepeer_orch_score", "Orchestrator score per region (0-1)", ["region"]);
    this.successRate = this.createGauge(
      "livepeer_orch_success_rate",
      "Test stream success rate per region (0-1)",
      ["region"],
    );
    this.roundTripScore = this.createGauge(
      "livepeer_orch_round_trip_score",
      "Round trip score per region (0-1)",
      ["region"],
    );
  }

  protected async fetchSnapshot(): Promise<OrchScoreSnapshot> {
    const body = await this.getJson(this.url, ScoreResponse);

    const regionNames = new Set([
      ...Object.keys(body.scores),
      ...Object.keys(body.successRates),
      ...Object.keys(body.roundTripScores),
    ]);
    const regions: RegionScore[] = [...regionNames].sort().map((region) => ({
      region,
      score: body.scores[region] ?? null,
      successRate: body.successRates[region] ?? null,
      roundTripScore: body.roundTripScores[region] ?? null,
    }));

    return {
      pricePerPixel: toNumber(body.pricePerPixel),
      regions,
      fetchedAt: new Date().toISOString(),
    };
  }

  protected publish(snapshot: OrchScoreSnapshot): void {
    this.pricePerPixel.set(snapshot.pricePerPixel);

    // Regions come and go upstream; rebuild the label sets from scratch
    this.score.reset();
    this.successRate.reset();
    this.roundTripScore.reset();
    for (const r of snapshot.regions) {
      const labels = { region: r.region };
      if (r.score !== null) this.score.set(labels, r.score);
      if (r.successRate !== null) this.successRate.set(labels, r.successRate);
      if (r.roundTripScore !== null) this.roundTripScore.set(labels, r.roundTripScore);
    }
  }
}
