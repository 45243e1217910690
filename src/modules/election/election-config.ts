import { ElectionValidationError, InsufficientCandidatesError } from "./election.errors";
import {
  ALGORITHM_KINDS,
  AlgorithmKind,
  EdgeAction,
  ElectionConfiguration,
  OverrideSet,
  RawElectionConfig,
} from "./election.types";

const ALGORITHM_ALIASES = new Map<string, AlgorithmKind>([
  ["sequential-phragmen", "sequential-phragmen"],
  ["sequential", "sequential-phragmen"],
  ["seq-phragmen", "sequential-phragmen"],
  ["parallel-phragmen", "parallel-phragmen"],
  ["parallel", "parallel-phragmen"],
  ["phragmms", "parallel-phragmen"],
  ["multi-phase", "multi-phase"],
  ["multiphase", "multi-phase"],
]);

const EDGE_ACTIONS: readonly EdgeAction[] = ["add", "remove", "replace"];

export function parseAlgorithm(name: string): AlgorithmKind {
  const kind = ALGORITHM_ALIASES.get(name.trim().toLowerCase());
  if (!kind) {
    throw new ElectionValidationError(
      `Invalid algorithm: Unknown algorithm type: ${name}. Expected one of ${ALGORITHM_KINDS.join(", ")}`,
      "algorithm",
    );
  }
  return kind;
}

/**
 * Validate-then-freeze. Nothing that fails here ever reaches algorithm dispatch.
 * The candidate-count check needs the dataset and lives in
 * {@link assertActiveSetWithinCandidates}.
 */
export function buildElectionConfig(raw: RawElectionConfig): ElectionConfiguration {
  const algorithm = parseAlgorithm(raw.algorithm);
  assertActiveSetSize(raw.activeSetSize, "active_set_size");

  if (raw.blockNumber !== undefined) {
    if (!Number.isSafeInteger(raw.blockNumber) || raw.blockNumber < 0) {
      throw new ElectionValidationError(
        `Block number must be a non-negative integer, got ${raw.blockNumber}`,
        "block_number",
      );
    }
  }

  if (raw.overrides) {
    validateOverrideSet(raw.overrides);
  }

  return Object.freeze({
    algorithm,
    activeSetSize: raw.activeSetSize,
    ...(raw.overrides ? { overrides: raw.overrides } : {}),
    ...(raw.blockNumber !== undefined ? { blockNumber: raw.blockNumber } : {}),
  });
}

/** The size that actually runs: an override wins over the configured value. */
export function effectiveActiveSetSize(config: ElectionConfiguration): number {
  return config.overrides?.activeSetSize ?? config.activeSetSize;
}

export function assertActiveSetWithinCandidates(requested: number, available: number): void {
  if (requested > available) {
    throw new InsufficientCandidatesError(requested, available);
  }
}

export function assertActiveSetSize(size: number, field: string): void {
  if (!Number.isSafeInteger(size)) {
    throw new ElectionValidationError(`Active set size must be an integer, got ${size}`, field);
  }
  if (size <= 0) {
    throw new ElectionValidationError("Active set size must be positive", field);
  }
}

function validateOverrideSet(overrides: OverrideSet): void {
  for (const [accountId, stake] of overrides.candidateStakes) {
    if (stake < 0n) {
      throw new ElectionValidationError(
        `Candidate stake override for '${accountId}' must be non-negative, got ${stake}`,
        "overrides.candidate_stakes",
      );
    }
  }
  for (const [accountId, stake] of overrides.nominatorStakes) {
    if (stake < 0n) {
      throw new ElectionValidationError(
        `Nominator stake override for '${accountId}' must be non-negative, got ${stake}`,
        "overrides.nominator_stakes",
      );
    }
  }
  overrides.edgeModifications.forEach((edge, index) => {
    if (!EDGE_ACTIONS.includes(edge.action)) {
      throw new ElectionValidationError(
        `Edge modification #${index} has unknown action '${edge.action}'`,
        "overrides.voting_edges",
      );
    }
    if (!edge.nominatorId || !edge.candidateId) {
      throw new ElectionValidationError(
        `Edge modification #${index} must name both a nominator and a candidate`,
        "overrides.voting_edges",
      );
    }
  });
  if (overrides.activeSetSize !== undefined) {
    assertActiveSetSize(overrides.activeSetSize, "overrides.active_set_size");
  }
}
