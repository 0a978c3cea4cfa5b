/**
 * Snapshot types published by the sub-exporters.
 *
 * Each snapshot is the decoded, derived form of one upstream fetch. They are
 * replaced wholesale on every successful fetch and never mutated afterwards.
 */

// ---------------------------------------------------------------------------
// Orchestrator info
// ---------------------------------------------------------------------------

export interface OrchInfoSnapshot {
  /** Orchestrator (primary) address */
  address: string;
  serviceURI: string | null;
  active: boolean;
  activationRound: number;
  lastRewardRound: number;
  /** Share of rewards kept by the orchestrator, 0–100 */
  rewardCut: number;
  /** Share of fees kept by the orchestrator, 0–100 */
  feeCut: number;
  /** LPT self-bonded by the primary address */
  bondedAmount: number;
  /** LPT bonded by the primary address plus the secondary address, if any */
  stake: number;
  /** All LPT delegated to the orchestrator */
  totalStake: number;
  /** totalStake minus stake */
  delegatedStake: number;
  totalVolumeETH: number;
  thirtyDayVolumeETH: number;
  ninetyDayVolumeETH: number;
  /** ISO 8601 timestamp */
  fetchedAt: string;
}

// ---------------------------------------------------------------------------
// Score
// ---------------------------------------------------------------------------

export interface RegionScore {
  region: string;
  score: number | null;
  successRate: number | null;
  roundTripScore: number | null;
}

export interface OrchScoreSnapshot {
  pricePerPixel: number;
  regions: readonly RegionScore[];
  fetchedAt: string;
}

// ---------------------------------------------------------------------------
// Delegators
// ---------------------------------------------------------------------------

export interface DelegatorInfo {
  address: string;
  bondedAmount: number;
  startRound: number;
}

export interface OrchDelegatorsSnapshot {
  delegators: readonly DelegatorInfo[];
  fetchedAt: string;
}

// ---------------------------------------------------------------------------
// Test streams
// ---------------------------------------------------------------------------

/** Newest test-stream result for one region */
export interface TestStreamResult {
  region: string;
  /** Unix time (seconds) the test ran */
  timestamp: number;
  successRate: number;
  /** Seconds */
  roundTripTime: number;
  segmentsSent: number;
  segmentsReceived: number;
  errorCount: number;
}

export interface OrchTestStreamsSnapshot {
  results: readonly TestStreamResult[];
  fetchedAt: string;
}

// ---------------------------------------------------------------------------
// Tickets
// ---------------------------------------------------------------------------

export interface WinningTicket {
  transactionHash: string;
  /** Unix time (seconds) of the redeeming block */
  blockTime: number;
  /** ETH */
  faceValue: number;
}

export interface OrchTicketsSnapshot {
  tickets: readonly WinningTicket[];
  /** Sum of faceValue across tickets */
  totalFaceValue: number;
  fetchedAt: string;
}
