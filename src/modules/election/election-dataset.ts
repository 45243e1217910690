import { ElectionValidationError } from "./election.errors";
import { Candidate, ElectionDataset, Nominator } from "./election.types";

/** Number of candidate ids listed in a dangling-target message before truncating. */
const AVAILABLE_CANDIDATES_PREVIEW = 5;

export function createDataset(): ElectionDataset {
  return { candidates: [], nominators: [] };
}

export function addCandidate(dataset: ElectionDataset, candidate: Candidate): void {
  if (dataset.candidates.some((c) => c.accountId === candidate.accountId)) {
    throw new ElectionValidationError(
      `Duplicate candidate account ID: ${candidate.accountId}`,
      "candidates",
    );
  }
  dataset.candidates.push(candidate);
}

export function addNominator(dataset: ElectionDataset, nominator: Nominator): void {
  if (dataset.nominators.some((n) => n.accountId === nominator.accountId)) {
    throw new ElectionValidationError(
      `Duplicate nominator account ID: ${nominator.accountId}`,
      "nominators",
    );
  }
  dataset.nominators.push(nominator);
}

/** Appends `candidateId` unless already approved. */
export function addTarget(nominator: Nominator, candidateId: string): void {
  if (!nominator.targets.includes(candidateId)) {
    nominator.targets.push(candidateId);
  }
}

/** Drops every occurrence of `candidateId`. */
export function removeTarget(nominator: Nominator, candidateId: string): void {
  nominator.targets = nominator.targets.filter((id) => id !== candidateId);
}

/**
 * Copies every collection of the dataset. Stakes are immutable bigints, so the
 * copy shares nothing mutable with the source.
 */
export function cloneDataset(dataset: ElectionDataset): ElectionDataset {
  return {
    candidates: dataset.candidates.map((c) => ({
      ...c,
      ...(c.metadata ? { metadata: { ...c.metadata } } : {}),
    })),
    nominators: dataset.nominators.map((n) => ({
      ...n,
      targets: [...n.targets],
      ...(n.metadata ? { metadata: { ...n.metadata } } : {}),
    })),
    ...(dataset.metadata ? { metadata: { ...dataset.metadata } } : {}),
  };
}

/**
 * Structural invariants that must hold before any election runs:
 *   - at least one candidate
 *   - candidate ids unique, nominator ids unique (checked separately)
 *   - every nominator target names an existing candidate
 *
 * Zero nominators is valid.
 */
export function validateDataset(dataset: ElectionDataset): void {
  if (dataset.candidates.length === 0) {
    throw new ElectionValidationError(
      "Election data must contain at least one validator candidate, but found 0. Please add at least one candidate.",
      "candidates",
    );
  }

  const candidateIds = new Set<string>();
  for (const candidate of dataset.candidates) {
    if (candidateIds.has(candidate.accountId)) {
      throw new ElectionValidationError(
        `Duplicate candidate account ID: ${candidate.accountId}`,
        "candidates",
      );
    }
    if (candidate.stake < 0n) {
      throw new ElectionValidationError(
        `Candidate '${candidate.accountId}' has negative stake ${candidate.stake}`,
        "candidates.stake",
      );
    }
    candidateIds.add(candidate.accountId);
  }

  const nominatorIds = new Set<string>();
  for (const nominator of dataset.nominators) {
    if (nominatorIds.has(nominator.accountId)) {
      throw new ElectionValidationError(
        `Duplicate nominator account ID: ${nominator.accountId}`,
        "nominators",
      );
    }
    if (nominator.stake < 0n) {
      throw new ElectionValidationError(
        `Nominator '${nominator.accountId}' has negative stake ${nominator.stake}`,
        "nominators.stake",
      );
    }
    nominatorIds.add(nominator.accountId);
  }

  for (const nominator of dataset.nominators) {
    for (const target of nominator.targets) {
      if (!candidateIds.has(target)) {
        throw new ElectionValidationError(
          `Nominator '${nominator.accountId}' votes for non-existent candidate '${target}'. ` +
            `Available candidates: ${describeAvailable(dataset.candidates)}`,
          "nominators.targets",
        );
      }
    }
  }
}

function describeAvailable(candidates: Candidate[]): string {
  const preview = candidates
    .slice(0, AVAILABLE_CANDIDATES_PREVIEW)
    .map((c) => c.accountId)
    .join(", ");
  const rest = candidates.length - AVAILABLE_CANDIDATES_PREVIEW;
  return rest > 0 ? `${preview} (and ${rest} more)` : preview;
}
