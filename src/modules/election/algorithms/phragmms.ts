import { ElectionAlgorithmError } from "../election.errors";
import { balance } from "./balancing";
import { SCALE } from "./fixed-point";
import {
  AlgorithmOutcome,
  AlgorithmOptions,
  buildVoterGraph,
  CandidateNode,
  ElectionAlgorithm,
  findAssignmentViolation,
  VoterGraph,
} from "./voter-graph";

const ALGORITHM = "parallel-phragmen";

/**
 * PhragMMS round scoring. For every unelected candidate c:
 *
 *   score_c = A_c / (1 + Σ_{v approving c} Σ_{elected e of v} weight_e / backed_e)
 *
 * i.e. the support c could reach if each backer gave up the share of its stake
 * sitting on already-elected winners. Computed in SCALE units with floor
 * division. The highest score wins; ties go to the earlier candidate.
 * Candidates without approving stake are sentinels, taken in ingestion order
 * once nothing else is left.
 */
export function selectMaxScore(graph: VoterGraph): CandidateNode | null {
  for (const candidate of graph.candidates) {
    if (!candidate.elected) candidate.scoreAccumulator = 0n;
  }

  for (const voter of graph.voters) {
    let contribution = 0n;
    for (const edge of voter.edges) {
      const backed = edge.candidate.backedStake;
      if (edge.candidate.elected && backed > 0n) {
        contribution += (edge.weight * SCALE) / backed;
      }
    }
    if (contribution === 0n) continue;
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
    const score = (candidate.approvalStake * SCALE) / (SCALE + candidate.scoreAccumulator);
    candidate.score = score;
    if (winner === null || score > best) {
      winner = candidate;
      best = score;
    }
  }
  return winner ?? fallback;
}

/**
 * Gives the new winner its support. Each approving voter moves its unassigned
 * budget onto the winner and, from every other winner backed above the
 * winner's score, takes back the part of its weight above that cutoff.
 */
export function applyElected(graph: VoterGraph, elected: CandidateNode): void {
  const cutoff = elected.score ?? 0n;
  let electedBacked = 0n;

  for (const voter of graph.voters) {
    const target = voter.edges.find((e) => e.candidate === elected);
    if (!target) continue;

    let used = 0n;
    for (const edge of voter.edges) used += edge.weight;
    let weight = voter.budget > used ? voter.budget - used : 0n;

    for (const edge of voter.edges) {
      if (edge === target || edge.weight === 0n) continue;
      const other = edge.candidate;
      if (other.backedStake <= cutoff) continue;
      const take = (edge.weight * (other.backedStake - cutoff)) / other.backedStake;
      edge.weight -= take;
      other.backedStake -= take;
      weight += take;
    }

    target.weight = weight;
    electedBacked += weight;
  }

  elected.backedStake = electedBacked;
}

export function runPhragmms(graph: VoterGraph, options: AlgorithmOptions): AlgorithmOutcome {
  const winners: CandidateNode[] = [];
  let balancingIterations = 0;

  for (let round = 0; round < options.toElect; round++) {
    const elected = selectMaxScore(graph);
    if (!elected) {
      throw new ElectionAlgorithmError(
        `No electable candidate left in round ${round + 1} of ${options.toElect}`,
        ALGORITHM,
      );
    }

    elected.elected = true;
    elected.round = round;
    applyElected(graph, elected);
    winners.push(elected);

    balancingIterations += balance(graph.voters, options.balancing);
  }

  const violation = findAssignmentViolation(graph.voters);
  if (violation) {
    throw new ElectionAlgorithmError(`Stake assignment invariant violated: ${violation}`, ALGORITHM);
  }

  return { winners, voters: graph.voters, balancingIterations };
}

export const phragmms: ElectionAlgorithm = (dataset, options) =>
  runPhragmms(buildVoterGraph(dataset), options);
