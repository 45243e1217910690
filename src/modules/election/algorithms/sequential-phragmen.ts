import { ElectionAlgorithmError } from "../election.errors";
import { AlgorithmKind } from "../election.types";
import { balance } from "./balancing";
import { SCALE, saturatingSub } from "./fixed-point";
import {
  AlgorithmOptions,
  AlgorithmOutcome,
  buildVoterGraph,
  CandidateNode,
  electedEdges,
  ElectionAlgorithm,
  findAssignmentViolation,
  recomputeBacking,
  VoterGraph,
} from "./voter-graph";

/**
 * Sequential Phragmén.
 *
 * One winner per round. A candidate's score is the load its backers would
 * carry if it were elected now:
 *
 *   score_c = (1 + Σ stake_v · load_v) / Σ stake_v      over voters v approving c
 *
 * computed as a floor division in SCALE units. The lowest score wins the round;
 * ties go to the earlier candidate. A candidate with no approving stake has no
 * score (sentinel) and is only taken once no scored candidate is left.
 *
 * Returns the winners in election order. Loads, edge loads and `elected` flags
 * are left on the graph for {@link assignByLoad}.
 */
export function electByLoad(
  graph: VoterGraph,
  toElect: number,
  algorithm: AlgorithmKind,
): CandidateNode[] {
  const winners: CandidateNode[] = [];

  for (let round = 0; round < toElect; round++) {
    for (const candidate of graph.candidates) {
      if (candidate.elected) continue;
      candidate.scoreAccumulator = SCALE;
    }
    for (const voter of graph.voters) {
      if (voter.budget === 0n || voter.load === 0n) continue;
      const contribution = voter.budget * voter.load;
      for (const edge of voter.edges) {
        if (!edge.candidate.elected) edge.candidate.scoreAccumulator += contribution;
      }
    }

    let winner: CandidateNode | null = null;
    let fallback: CandidateNode | null = null;
    let best = 0n;
    for (const candidate of graph.candidates) {
      if (candidate.elected) continue;
      if (candidate.approvalStake === 0n) {
        candidate.score = null;
        if (!fallback) fallback = candidate;
        continue;
      }
      const score = candidate.scoreAccumulator / candidate.approvalStake;
      candidate.score = score;
      if (winner === null || score < best) {
        winner = candidate;
        best = score;
      }
    }

    const elected = winner ?? fallback;
    if (!elected) {
      throw new ElectionAlgorithmError(
        `No electable candidate left in round ${round + 1} of ${toElect}`,
        algorithm,
      );
    }

    elected.elected = true;
    elected.round = round;
    winners.push(elected);

    const score = elected.score;
    if (score === null) continue;
    for (const voter of graph.voters) {
      for (const edge of voter.edges) {
        if (edge.candidate !== elected) continue;
        edge.load = saturatingSub(score, voter.load);
        voter.load = score;
      }
    }
  }

  return winners;
}

/**
 * Turns Phragmén loads into stake: each voter splits its budget across its
 * elected edges in proportion edge.load / voter.load. The floor-division
 * remainder goes to the edge with the largest load (earliest on ties). A voter
 * whose load is zero puts its whole budget on its first elected edge.
 */
export function assignByLoad(graph: VoterGraph): void {
  for (const voter of graph.voters) {
    const edges = electedEdges(voter);
    if (edges.length === 0) continue;

    if (voter.load === 0n) {
      edges[0].weight = voter.budget;
      continue;
    }

    let assigned = 0n;
    let heaviest = edges[0];
    for (const edge of edges) {
      edge.weight = (voter.budget * edge.load) / voter.load;
      assigned += edge.weight;
      if (edge.load > heaviest.load) heaviest = edge;
    }
    heaviest.weight += voter.budget - assigned;
  }
  recomputeBacking(graph);
}

/**
 * Full Sequential Phragmén run: elect, convert loads to stake, equalize.
 * `algorithm` is the kind reported in errors, since multi-phase reuses this.
 */
export function runPhragmen(
  graph: VoterGraph,
  options: AlgorithmOptions,
  algorithm: AlgorithmKind,
): AlgorithmOutcome {
  const winners = electByLoad(graph, options.toElect, algorithm);
  assignByLoad(graph);
  const balancingIterations = balance(graph.voters, options.balancing);

  const violation = findAssignmentViolation(graph.voters);
  if (violation) {
    throw new ElectionAlgorithmError(`Stake assignment invariant violated: ${violation}`, algorithm);
  }

  return { winners, voters: graph.voters, balancingIterations };
}

export const sequentialPhragmen: ElectionAlgorithm = (dataset, options) =>
  runPhragmen(buildVoterGraph(dataset), options, "sequential-phragmen");
