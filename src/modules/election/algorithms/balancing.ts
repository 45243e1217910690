import { BalancingConfig } from "../election.types";
import { saturatingSub } from "./fixed-point";
import { electedEdges, VoterEdge, VoterNode } from "./voter-graph";

/**
 * Equalization. Moves a voter's stake from its more-backed winners to its
 * less-backed ones so that, among the winners it approves, backing is as level
 * as its budget allows. The winner set never changes.
 *
 * Returns the voter's spread before rebalancing:
 *   max backing among edges it funds − min backing among its elected edges
 *   + budget it has not assigned yet
 *
 * The levelling share is an integer division; its remainder goes to the
 * lowest-backed edge so the voter's weights always sum to its budget.
 */
export function balanceVoter(voter: VoterNode, tolerance: bigint): bigint {
  const edges = electedEdges(voter);
  if (edges.length <= 1) return 0n;

  let stakeUsed = 0n;
  let minBacked: bigint | null = null;
  let maxFunded: bigint | null = null;
  for (const edge of edges) {
    const backed = edge.candidate.backedStake;
    stakeUsed += edge.weight;
    if (minBacked === null || backed < minBacked) minBacked = backed;
    if (edge.weight > 0n && (maxFunded === null || backed > maxFunded)) maxFunded = backed;
  }

  let difference: bigint;
  if (maxFunded !== null && minBacked !== null) {
    difference = saturatingSub(maxFunded, minBacked) + saturatingSub(voter.budget, stakeUsed);
    if (difference < tolerance) return difference;
  } else {
    difference = voter.budget;
  }

  for (const edge of edges) {
    edge.candidate.backedStake -= edge.weight;
    edge.weight = 0n;
  }

  const sorted = [...edges].sort(byBackingThenPosition);

  let cumulative = 0n;
  let lastIndex = sorted.length - 1;
  for (let i = 0; i < sorted.length; i++) {
    const backed = sorted[i].candidate.backedStake;
    if (backed * BigInt(i) - cumulative > voter.budget) {
      lastIndex = i - 1;
      break;
    }
    cumulative += backed;
  }

  const level = sorted[lastIndex].candidate.backedStake;
  const ways = BigInt(lastIndex + 1);
  const excess = voter.budget + cumulative - level * ways;
  const share = excess / ways;
  const remainder = excess % ways;

  for (let i = 0; i <= lastIndex; i++) {
    const edge = sorted[i];
    edge.weight = share + level - edge.candidate.backedStake + (i === 0 ? remainder : 0n);
    edge.candidate.backedStake += edge.weight;
  }

  return difference;
}

/**
 * Runs {@link balanceVoter} over every voter until the largest spread is within
 * tolerance or the iteration cap is hit. Returns the iterations run.
 */
export function balance(voters: VoterNode[], config: BalancingConfig): number {
  if (config.iterations <= 0) return 0;

  for (let iteration = 0; iteration < config.iterations; iteration++) {
    let maxDifference = 0n;
    for (const voter of voters) {
      const difference = balanceVoter(voter, config.tolerance);
      if (difference > maxDifference) maxDifference = difference;
    }
    if (maxDifference <= config.tolerance) return iteration + 1;
  }
  return config.iterations;
}

function byBackingThenPosition(a: VoterEdge, b: VoterEdge): number {
  const diff = a.candidate.backedStake - b.candidate.backedStake;
  if (diff !== 0n) return diff < 0n ? -1 : 1;
  return a.candidate.position - b.candidate.position;
}
