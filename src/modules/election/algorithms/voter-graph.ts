import { ElectionValidationError } from "../election.errors";
import { BalancingConfig, ElectionDataset } from "../election.types";

export interface CandidateNode {
  readonly accountId: string;
  /** Ingestion position. Lower wins every tie. */
  readonly position: number;
  /** Σ budget of every voter approving this candidate. Fixed for the election. */
  readonly approvalStake: bigint;
  /** Σ edge weights currently assigned to this candidate. */
  backedStake: bigint;
  elected: boolean;
  /** 0-based round of election, -1 while unelected. */
  round: number;
  /** Round scratch: last computed score, null for the no-backing sentinel. */
  score: bigint | null;
  /** Round scratch: PhragMMS denominator accumulator. */
  scoreAccumulator: bigint;
}

export interface VoterEdge {
  readonly candidate: CandidateNode;
  weight: bigint;
  /** Phragmén edge load, in SCALE units. */
  load: bigint;
}

export interface VoterNode {
  readonly accountId: string;
  readonly budget: bigint;
  /** Candidate self-stake entered as a vote for itself. */
  readonly selfVote: boolean;
  readonly edges: VoterEdge[];
  /** Phragmén voter load, in SCALE units. */
  load: bigint;
}

export interface VoterGraph {
  /** In ingestion order. */
  readonly candidates: CandidateNode[];
  /** Self-votes first (candidate order), then nominators (ingestion order). */
  readonly voters: VoterNode[];
}

export interface AlgorithmOutcome {
  /** In election order. */
  winners: CandidateNode[];
  voters: VoterNode[];
  /** Equalization iterations actually run, summed over all invocations. */
  balancingIterations: number;
}

export interface AlgorithmOptions {
  toElect: number;
  balancing: BalancingConfig;
}

export type ElectionAlgorithm = (
  dataset: ElectionDataset,
  options: AlgorithmOptions,
) => AlgorithmOutcome;

/**
 * Builds the bipartite voter/candidate graph both algorithms run on.
 *
 * Every candidate contributes a self-vote carrying its self-stake. Nominators
 * without targets produce no voter. Duplicate targets collapse to the first
 * occurrence.
 */
export function buildVoterGraph(dataset: ElectionDataset): VoterGraph {
  const approvals = new Map<string, bigint>();
  const targetLists: Array<{ accountId: string; stake: bigint; targets: string[] }> = [];

  for (const candidate of dataset.candidates) {
    approvals.set(candidate.accountId, candidate.stake);
  }

  for (const nominator of dataset.nominators) {
    const targets = [...new Set(nominator.targets)];
    if (targets.length === 0) continue;
    for (const target of targets) {
      const approval = approvals.get(target);
      if (approval === undefined) {
        throw new ElectionValidationError(
          `Nominator '${nominator.accountId}' votes for non-existent candidate '${target}'`,
          "nominators.targets",
        );
      }
      approvals.set(target, approval + nominator.stake);
    }
    targetLists.push({ accountId: nominator.accountId, stake: nominator.stake, targets });
  }

  const candidates: CandidateNode[] = dataset.candidates.map((c, position) => ({
    accountId: c.accountId,
    position,
    approvalStake: approvals.get(c.accountId) ?? 0n,
    backedStake: 0n,
    elected: false,
    round: -1,
    score: null,
    scoreAccumulator: 0n,
  }));
  const byId = new Map(candidates.map((c) => [c.accountId, c]));

  const voters: VoterNode[] = dataset.candidates.map((c, position) => ({
    accountId: c.accountId,
    budget: c.stake,
    selfVote: true,
    edges: [{ candidate: candidates[position], weight: 0n, load: 0n }],
    load: 0n,
  }));

  for (const entry of targetLists) {
    const edges: VoterEdge[] = [];
    for (const target of entry.targets) {
      const candidate = byId.get(target);
      if (candidate) edges.push({ candidate, weight: 0n, load: 0n });
    }
    voters.push({
      accountId: entry.accountId,
      budget: entry.stake,
      selfVote: false,
      edges,
      load: 0n,
    });
  }

  return { candidates, voters };
}

export function electedEdges(voter: VoterNode): VoterEdge[] {
  return voter.edges.filter((e) => e.candidate.elected);
}

/**
 * Returns a description of the first voter whose assignment breaks
 * conservation, or null when every voter is consistent:
 *   - no negative weight
 *   - nothing assigned to an unelected candidate
 *   - a voter with an elected target assigns exactly its budget
 */
export function findAssignmentViolation(voters: VoterNode[]): string | null {
  for (const voter of voters) {
    let assigned = 0n;
    let backsWinner = false;
    for (const edge of voter.edges) {
      if (edge.weight < 0n) {
        return `voter ${voter.accountId} has negative weight ${edge.weight} on ${edge.candidate.accountId}`;
      }
      if (!edge.candidate.elected) {
        if (edge.weight !== 0n) {
          return `voter ${voter.accountId} assigns ${edge.weight} to unelected ${edge.candidate.accountId}`;
        }
        continue;
      }
      backsWinner = true;
      assigned += edge.weight;
    }
    if (backsWinner && assigned !== voter.budget) {
      return `voter ${voter.accountId} assigns ${assigned} of budget ${voter.budget}`;
    }
  }
  return null;
}

/** Recomputes every candidate's backing from the current edge weights. */
export function recomputeBacking(graph: VoterGraph): void {
  for (const candidate of graph.candidates) candidate.backedStake = 0n;
  for (const voter of graph.voters) {
    for (const edge of voter.edges) edge.candidate.backedStake += edge.weight;
  }
}
