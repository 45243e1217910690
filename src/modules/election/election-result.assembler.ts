import { AlgorithmOutcome, proportionOf, sumBigInt } from "./algorithms";
import { ElectionAlgorithmError } from "./election.errors";
import {
  AlgorithmKind,
  ElectionResult,
  ExecutionMetadata,
  SelectedValidator,
  StakeAllocation,
} from "./election.types";

export interface AssemblyContext {
  algorithm: AlgorithmKind;
  executionMetadata: ExecutionMetadata;
}

/**
 * Converts the algorithm's graph into the public result shape.
 *
 * Allocations follow voter order (self-stake first, then nominators) and each
 * voter's target order; zero-weight edges are left out. `totalStake` is the sum
 * of budgets of voters backing at least one winner, independent of the
 * allocations checked by {@link validateResult}.
 */
export function assembleResult(outcome: AlgorithmOutcome, ctx: AssemblyContext): ElectionResult {
  const stakeDistribution: StakeAllocation[] = [];
  const backing = new Map<string, bigint>();
  const backers = new Map<string, Set<string>>();
  let totalStake = 0n;

  for (const voter of outcome.voters) {
    let backsWinner = false;
    for (const edge of voter.edges) {
      if (!edge.candidate.elected) continue;
      backsWinner = true;
      if (edge.weight === 0n) continue;

      const validatorId = edge.candidate.accountId;
      stakeDistribution.push({
        nominatorId: voter.accountId,
        validatorId,
        amount: edge.weight,
        proportion: proportionOf(edge.weight, voter.budget),
      });
      backing.set(validatorId, (backing.get(validatorId) ?? 0n) + edge.weight);

      if (!voter.selfVote) {
        const set = backers.get(validatorId) ?? new Set<string>();
        set.add(voter.accountId);
        backers.set(validatorId, set);
      }
    }
    if (backsWinner) totalStake += voter.budget;
  }

  const selectedValidators: SelectedValidator[] = outcome.winners.map((winner, index) => ({
    accountId: winner.accountId,
    totalBackingStake: backing.get(winner.accountId) ?? 0n,
    nominatorCount: backers.get(winner.accountId)?.size ?? 0,
    rank: index + 1,
  }));

  return {
    selectedValidators,
    stakeDistribution,
    totalStake,
    algorithmUsed: ctx.algorithm,
    executionMetadata: ctx.executionMetadata,
  };
}

/**
 * Final gate before a result leaves the engine. Any failure here is an
 * arithmetic or selection bug, reported against the algorithm that ran:
 *   - exactly `activeSetSize` validators
 *   - Σ allocation amounts == totalStake
 *   - Σ validator backing == totalStake
 */
export function validateResult(result: ElectionResult, activeSetSize: number): void {
  if (result.selectedValidators.length !== activeSetSize) {
    throw new ElectionAlgorithmError(
      `Result has ${result.selectedValidators.length} validators but expected ${activeSetSize}`,
      result.algorithmUsed,
    );
  }

  const allocated = sumBigInt(result.stakeDistribution.map((a) => a.amount));
  if (allocated !== result.totalStake) {
    throw new ElectionAlgorithmError(
      `Stake distribution total ${allocated} doesn't match total stake ${result.totalStake}`,
      result.algorithmUsed,
    );
  }

  const backed = sumBigInt(result.selectedValidators.map((v) => v.totalBackingStake));
  if (backed !== result.totalStake) {
    throw new ElectionAlgorithmError(
      `Validator backing total ${backed} doesn't match total stake ${result.totalStake}`,
      result.algorithmUsed,
    );
  }
}

export function freezeResult(result: ElectionResult): ElectionResult {
  return Object.freeze({
    selectedValidators: Object.freeze(result.selectedValidators.map((v) => Object.freeze({ ...v }))),
    stakeDistribution: Object.freeze(result.stakeDistribution.map((a) => Object.freeze({ ...a }))),
    totalStake: result.totalStake,
    algorithmUsed: result.algorithmUsed,
    executionMetadata: Object.freeze({ ...result.executionMetadata }),
  });
}
