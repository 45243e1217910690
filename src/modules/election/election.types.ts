// ── Entity model ───────────────────────────────────────────────────────────────

export interface CandidateMetadata {
  /** Commission rate, 0–100. */
  commissionRate?: number;
  /** On-chain status as reported by the source (e.g. "active", "waiting"). */
  onChainStatus?: string;
}

export interface Candidate {
  accountId: string;
  /** Self-stake. */
  stake: bigint;
  metadata?: CandidateMetadata;
}

export type NominatorMetadata = Record<string, unknown>;

export interface Nominator {
  accountId: string;
  stake: bigint;
  /** Approved candidate ids in submission order. Duplicates are ignored. */
  targets: string[];
  metadata?: NominatorMetadata;
}

export interface DatasetMetadata {
  blockNumber?: number;
  chain?: string;
}

export interface ElectionDataset {
  candidates: Candidate[];
  nominators: Nominator[];
  metadata?: DatasetMetadata;
}

// ── Algorithms ─────────────────────────────────────────────────────────────────

export const ALGORITHM_KINDS = [
  "sequential-phragmen",
  "parallel-phragmen",
  "multi-phase",
] as const;

export type AlgorithmKind = (typeof ALGORITHM_KINDS)[number];

// ── Overrides ──────────────────────────────────────────────────────────────────

export type EdgeAction = "add" | "remove" | "replace";

export interface EdgeModification {
  action: EdgeAction;
  nominatorId: string;
  candidateId: string;
  /** Carried through serialization; no effect on the election. */
  weight?: bigint;
}

export interface OverrideSet {
  candidateStakes: Map<string, bigint>;
  nominatorStakes: Map<string, bigint>;
  edgeModifications: EdgeModification[];
  /** Replaces the configured active-set size for one execution. */
  activeSetSize?: number;
}

// ── Configuration ──────────────────────────────────────────────────────────────

/** Unvalidated configuration as a caller hands it over. */
export interface RawElectionConfig {
  algorithm: string;
  activeSetSize: number;
  overrides?: OverrideSet;
  blockNumber?: number;
}

export interface ElectionConfiguration {
  readonly algorithm: AlgorithmKind;
  readonly activeSetSize: number;
  readonly overrides?: OverrideSet;
  readonly blockNumber?: number;
}

export interface BalancingConfig {
  /** 0 disables equalization. */
  iterations: number;
  tolerance: bigint;
}

export const DEFAULT_BALANCING: Readonly<BalancingConfig> = Object.freeze({
  iterations: 10,
  tolerance: 0n,
});

// ── Result ─────────────────────────────────────────────────────────────────────

export interface SelectedValidator {
  accountId: string;
  totalBackingStake: bigint;
  /** Distinct nominators backing this validator; self-stake is not counted. */
  nominatorCount: number;
  /** 1-based election order. */
  rank: number;
}

export interface StakeAllocation {
  nominatorId: string;
  validatorId: string;
  amount: bigint;
  /** Share of the nominator's stake in [0, 1]. Reporting only. */
  proportion: number;
}

export interface ExecutionMetadata {
  blockNumber?: number;
  /** ISO-8601 timestamp. */
  executionTimestamp?: string;
  dataSource?: string;
}

export interface ElectionResult {
  readonly selectedValidators: readonly SelectedValidator[];
  readonly stakeDistribution: readonly StakeAllocation[];
  readonly totalStake: bigint;
  readonly algorithmUsed: AlgorithmKind;
  readonly executionMetadata: ExecutionMetadata;
}

// ── External collaborators ─────────────────────────────────────────────────────

/** Implemented by RPC, file and synthetic loaders outside this package. */
export interface ElectionDataProvider {
  load(): Promise<ElectionDataset>;
}

/** Post-hoc report over an already computed result. Must not re-run the election. */
export interface ElectionDiagnosticsGenerator<TReport> {
  explain(result: ElectionResult, dataset: ElectionDataset): TReport;
}
