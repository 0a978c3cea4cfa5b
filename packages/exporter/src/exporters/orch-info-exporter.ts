/**
 * Orchestrator info exporter — account-level gauges (stake, cuts, rounds,
 * volume) for the orchestrator.
 *
 * When a secondary address is configured, its bonded stake is fetched in the
 * same tick and added to `livepeer_orch_stake`. Either request failing fails
 * the whole fetch, so a partial stake is never published.
 */

import type { OrchInfoSnapshot } from "@livepeer-exporter/shared";
import type { Gauge } from "prom-client";
import { SubExporter, type SubExporterOptions } from "./sub-exporter.js";
import { DEFAULT_ENDPOINTS, expandEndpoint } from "./endpoints.js";
import { toNumber } from "./common.schemas.js";
import { DelegatorResponse, OrchestratorResponse } from "./orch-info-exporter.schemas.js";

const PPM_TO_PERCENT = 10_000;

export interface OrchInfoExporterOptions extends SubExporterOptions {
  /** Address whose bonded stake is added to the orchestrator's stake */
  secondaryAddress?: string | null;
  /** Orchestrator endpoint template */
  orchestratorEndpoint?: string;
  /** Delegator endpoint template, used for the secondary address */
  delegatorEndpoint?: string;
}

export class OrchInfoExporter extends SubExporter<OrchInfoSnapshot> {
  readonly secondaryAddress: string | null;
  private orchestratorUrl: string;
  private secondaryUrl: string | null;

  private info: Gauge<"address" | "service_uri">;
  private active: Gauge;
  private activationRound: Gauge;
  private lastRewardRound: Gauge;
  private rewardCut: Gauge;
  private feeCut: Gauge;
  private bondedAmount: Gauge;
  private stake: Gauge;
  private totalStake: Gauge;
  private delegatedStake: Gauge;
  private totalVolume: Gauge;
  private thirtyDayVolume: Gauge;
  private ninetyDayVolume: Gauge;

  constructor(options: OrchInfoExporterOptions) {
    super("info", options);
    this.secondaryAddress = options.secondaryAddress || null;
    this.orchestratorUrl = expandEndpoint(
      options.orchestratorEndpoint ?? DEFAULT_ENDPOINTS.orchestrator,
      options.address,
    );
    this.secondaryUrl = this.secondaryAddress
      ? expandEndpoint(options.delegatorEndpoint ?? DEFAULT_ENDPOINTS.delegator, this.secondaryAddress)
      : null;

    this.info = this.createGauge("livepeer_orch_info", "Orchestrator information, always 1", [
      "address",
      "service_uri",
    ]);
    this.active = this.createGauge("livepeer_orch_active", "Whether the orchestrator is active (1) or not (0)");
    this.activationRound = this.createGauge("livepeer_orch_activation_round", "Round the orchestrator was activated in");
    this.lastRewardRound = this.createGauge("livepeer_orch_last_reward_round", "Last round the orchestrator called reward");
    this.rewardCut = this.createGauge("livepeer_orch_reward_cut", "Percentage of rewards kept by the orchestrator");
    this.feeCut = this.createGauge("livepeer_orch_fee_cut", "Percentage of fees kept by the orchestrator");
    this.bondedAmount = this.createGauge("livepeer_orch_bonded_amount", "LPT self-bonded by the orchestrator");
    this.stake = this.createGauge(
      "livepeer_orch_stake",
      "LPT bonded by the orchestrator, plus the secondary address if configured",
    );
    this.totalStake = this.createGauge("livepeer_orch_total_stake", "Total LPT bonded to the orchestrator");
    this.delegatedStake = this.createGauge(
      "livepeer_orch_delegated_stake",
      "LPT bonded to the orchestrator by delegators (total stake minus own stake)",
    );
    this.totalVolume = this.createGauge("livepeer_orch_total_volume_eth", "Total fee volume in ETH");
    this.thirtyDayVolume = this.createGauge("livepeer_orch_thirty_day_volume_eth", "Fee volume in ETH over the last 30 days");
    this.ninetyDayVolume = this.createGauge("livepeer_orch_ninety_day_volume_eth", "Fee volume in ETH over the last 90 days");
  }

  protected async fetchSnapshot(): Promise<OrchInfoSnapshot> {
    const [orch, secondary] = await Promise.all([
      this.getJson(this.orchestratorUrl, OrchestratorResponse),
      this.secondaryUrl ? this.getJson(this.secondaryUrl, DelegatorResponse) : Promise.resolve(null),
    ]);

    const bondedAmount = toNumber(orch.delegator.bondedAmount);
    const stake = bondedAmount + (secondary ? toNumber(secondary.bondedAmount) : 0);
    const totalStake = toNumber(orch.totalStake);

    return {
      address: this.address,
      serviceURI: orch.serviceURI ?? null,
      active: orch.active,
      activationRound: toNumber(orch.activationRound),
      lastRewardRound: toNumber(orch.lastRewardRound.id),
      rewardCut: toNumber(orch.rewardCut) / PPM_TO_PERCENT,
      feeCut: 100 - toNumber(orch.feeShare) / PPM_TO_PERCENT,
      bondedAmount,
      stake,
      totalStake,
      delegatedStake: totalStake - stake,
      totalVolumeETH: toNumber(orch.totalVolumeETH),
      thirtyDayVolumeETH: toNumber(orch.thirtyDayVolumeETH),
      ninetyDayVolumeETH: toNumber(orch.ninetyDayVolumeETH),
      fetchedAt: new Date().toISOString(),
    };
  }

  protected publish(snapshot: OrchInfoSnapshot): void {
    // Service URI can change between fetches; drop the old label set
    this.info.reset();
    this.info.set({ address: snapshot.address, service_uri: snapshot.serviceURI ?? "" }, 1);

    this.active.set(snapshot.active ? 1 : 0);
    this.activationRound.set(snapshot.activationRound);
    this.lastRewardRound.set(snapshot.lastRewardRound);
    this.rewardCut.set(snapshot.rewardCut);
    this.feeCut.set(snapshot.feeCut);
    this.bondedAmount.set(snapshot.bondedAmount);
    this.stake.set(snapshot.stake);
    this.totalStake.set(snapshot.totalStake);
    this.delegatedStake.set(snapshot.delegatedStake);
    this.totalVolume.set(snapshot.totalVolumeETH);
    this.thirtyDayVolume.set(snapshot.thirtyDayVolumeETH);
    this.ninetyDayVolume.set(snapshot.ninetyDayVolumeETH);
  }
}
