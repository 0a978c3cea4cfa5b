/**
 * Orchestrator delegators exporter: one bonded-amount and start-round
 * series per delegator, plus the delegator count.
 *
 * Reads the `delegators` list of the orchestrator endpoint. Delegators that
 * unbond disappear from the next scrape.
 */

import type { DelegatorInfo, OrchDelegatorsSnapshot } from "@livepeer-exporter/shared";
import type { Gauge } from "prom-client";
import { SubExporter, type SubExporterOptions } from "./sub-exporter.js";
import { DEFAULT_ENDPOINTS, expandEndpoint } from "./endpoints.js";
import { toNumber } from "./common.schemas.js";
import { OrchestratorResponse } from "./orch-info-exporter.schemas.js";

export interface OrchDelegatorsExporterOptions extends SubExporterOptions {
  /** Orchestrator endpoint template */
  endpoint?: string;
}

export class OrchDelegatorsExporter extends SubExporter<OrchDelegatorsSnapshot> {
  private url: string;
  private count: Gauge;
  private bondedAmount: Gauge<"delegator">;
  private startRound: Gauge<"delegator">;

  constructor(options: OrchDelegatorsExporterOptions) {
    super("delegators", options);
    this.url = expandEndpoint(options.endpoint ?? DEFAULT_ENDPOINTS.orchestrator, options.address);

    this.count = this.createGauge("livepeer_orch_delegator_count", "Number of delegators bonded to the orchestrator");
    this.bondedAmount = this.createGauge(
      "livepeer_orch_delegator_bonded_amount",
      "LPT bonded to the orchestrator per delegator",
      ["delegator"],
    );
    this.startRound = this.createGauge(
      "livepeer_orch_delegator_start_round",
      "Round the delegator's bond became active",
      ["delegator"],
    );
  }

  protected async fetchSnapshot(): Promise<OrchDelegatorsSnapshot> {
    const body = await this.getJson(this.url, OrchestratorResponse);

    const delegators: DelegatorInfo[] = body.delegators.map((d) => ({
      address: d.id,
      bondedAmount: toNumber(d.bondedAmount),
      startRound: toNumber(d.startRound),
    }));

    return { delegators, fetchedAt: new Date().toISOString() };
  }

  protected publish(snapshot: OrchDelegatorsSnapshot): void {
    this.count.set(snapshot.delegators.length);

    this.bondedAmount.reset();
    this.startRound.reset();
    for (const d of snapshot.delegators) {
      this.bondedAmount.set({ delegator: d.address }, d.bondedAmount);
      this.startRound.set({ delegator: d.address }, d.startRound);
    }
  }
}
