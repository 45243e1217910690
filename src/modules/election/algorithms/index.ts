import { AlgorithmKind } from "../election.types";
import { phragmms } from "./phragmms";
import { runPhragmen, sequentialPhragmen } from "./sequential-phragmen";
import { buildVoterGraph, ElectionAlgorithm } from "./voter-graph";

/**
 * Multi-phase elections mine their solution with Sequential Phragmén plus
 * equalization; offline that is the same computation, reported under its own
 * kind.
 */
export const multiPhase: ElectionAlgorithm = (dataset, options) =>
  runPhragmen(buildVoterGraph(dataset), options, "multi-phase");

export const ELECTION_ALGORITHMS: Readonly<Record<AlgorithmKind, ElectionAlgorithm>> =
  Object.freeze({
    "sequential-phragmen": sequentialPhragmen,
    "parallel-phragmen": phragmms,
    "multi-phase": multiPhase,
  });

export * from "./voter-graph";
export { balance, balanceVoter } from "./balancing";
export { SCALE, PERBILL, proportionOf, sumBigInt } from "./fixed-point";
