/**
 * Typebox schemas for the orchestrator and delegator account endpoints.
 * Only the fields the exporters read are declared; extra fields are allowed.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount } from "./common.schemas.js";

export const DelegatorEntry = Type.Object({
  id: Type.String(),
  bondedAmount: Amount,
  startRound: Amount,
});

export type DelegatorEntry = Static<typeof DelegatorEntry>;

export const OrchestratorResponse = Type.Object({
  id: Type.String(),
  active: Type.Boolean(),
  activationRound: Amount,
  lastRewardRound: Type.Object({ id: Amount }),
  /** Parts per million of fees passed on to delegators */
  feeShare: Amount,
  /** Parts per million of rewards kept by the orchestrator */
  rewardCut: Amount,
  totalStake: Amount,
  totalVolumeETH: Amount,
  thirtyDayVolumeETH: Amount,
  ninetyDayVolumeETH: Amount,
  serviceURI: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  /** The orchestrator's own delegator record (self-bond) */
  delegator: Type.Object({ bondedAmount: Amount }),
  delegators: Type.Array(DelegatorEntry),
});

export type OrchestratorResponse = Static<typeof OrchestratorResponse>;

export const DelegatorResponse = Type.Object({
  id: Type.String(),
  bondedAmount: Amount,
});

export type DelegatorResponse = Static<typeof DelegatorResponse>;
