import { addTarget, cloneDataset, removeTarget } from "./election-dataset";
import { ElectionValidationError } from "./election.errors";
import { EdgeModification, ElectionDataset, OverrideSet } from "./election.types";

export type StakeOverrideKind = "candidate" | "nominator";

const STAKE_PATTERN = /^\d+$/;

export function createOverrideSet(): OverrideSet {
  return {
    candidateStakes: new Map(),
    nominatorStakes: new Map(),
    edgeModifications: [],
  };
}

/**
 * Parses an `account_id=stake` directive as entered on a command line or in a
 * request form.
 */
export function parseStakeDirective(
  directive: string,
  kind: StakeOverrideKind,
): { accountId: string; stake: bigint } {
  const field = `override_${kind}_stake`;
  const parts = directive.split("=");
  if (parts.length !== 2) {
    throw new ElectionValidationError(
      `Invalid ${kind} stake override format: '${directive}'. Expected format: account_id=stake`,
      field,
    );
  }

  const accountId = parts[0].trim();
  const stakeText = parts[1].trim();
  if (accountId.length === 0) {
    throw new ElectionValidationError(
      `Invalid ${kind} stake override format: '${directive}'. Account id is empty`,
      field,
    );
  }
  if (!STAKE_PATTERN.test(stakeText)) {
    throw new ElectionValidationError(
      `Invalid stake value '${stakeText}' in ${kind} override: expected a non-negative integer`,
      field,
    );
  }
  return { accountId, stake: BigInt(stakeText) };
}

export class ElectionOverridesBuilder {
  private readonly overrides = createOverrideSet();

  candidateStake(accountId: string, stake: bigint): this {
    this.overrides.candidateStakes.set(accountId, stake);
    return this;
  }

  nominatorStake(accountId: string, stake: bigint): this {
    this.overrides.nominatorStakes.set(accountId, stake);
    return this;
  }

  addEdge(nominatorId: string, candidateId: string): this {
    this.overrides.edgeModifications.push({ action: "add", nominatorId, candidateId });
    return this;
  }

  removeEdge(nominatorId: string, candidateId: string): this {
    this.overrides.edgeModifications.push({ action: "remove", nominatorId, candidateId });
    return this;
  }

  replaceEdge(nominatorId: string, candidateId: string, weight?: bigint): this {
    const edge: EdgeModification = { action: "replace", nominatorId, candidateId };
    if (weight !== undefined) edge.weight = weight;
    this.overrides.edgeModifications.push(edge);
    return this;
  }

  activeSetSize(size: number): this {
    this.overrides.activeSetSize = size;
    return this;
  }

  /** Feeds repeated `account_id=stake` directives, later ones winning. */
  directives(params: { candidateStakes?: string[]; nominatorStakes?: string[] }): this {
    for (const directive of params.candidateStakes ?? []) {
      const { accountId, stake } = parseStakeDirective(directive, "candidate");
      this.candidateStake(accountId, stake);
    }
    for (const directive of params.nominatorStakes ?? []) {
      const { accountId, stake } = parseStakeDirective(directive, "nominator");
      this.nominatorStake(accountId, stake);
    }
    return this;
  }

  build(): OverrideSet {
    return {
      candidateStakes: new Map(this.overrides.candidateStakes),
      nominatorStakes: new Map(this.overrides.nominatorStakes),
      edgeModifications: this.overrides.edgeModifications.map((e) => ({ ...e })),
      ...(this.overrides.activeSetSize !== undefined
        ? { activeSetSize: this.overrides.activeSetSize }
        : {}),
    };
  }
}

export function hasOverrides(overrides: OverrideSet | undefined): overrides is OverrideSet {
  return (
    overrides !== undefined &&
    (overrides.candidateStakes.size > 0 ||
      overrides.nominatorStakes.size > 0 ||
      overrides.edgeModifications.length > 0 ||
      overrides.activeSetSize !== undefined)
  );
}

/**
 * Returns an overridden copy of `dataset`; the input is left untouched.
 *
 * Overrides are best-effort: ids that the dataset does not contain are skipped,
 * since snapshots routinely exclude some entities. `replace` is remove-then-add
 * of the same target, so the target moves to the end of the nominator's list.
 */
export function applyOverrides(
  overrides: OverrideSet | undefined,
  dataset: ElectionDataset,
): ElectionDataset {
  const working = cloneDataset(dataset);
  if (!overrides) return working;

  for (const [accountId, stake] of overrides.candidateStakes) {
    const candidate = working.candidates.find((c) => c.accountId === accountId);
    if (candidate) candidate.stake = stake;
  }

  for (const [accountId, stake] of overrides.nominatorStakes) {
    const nominator = working.nominators.find((n) => n.accountId === accountId);
    if (nominator) nominator.stake = stake;
  }

  for (const edge of overrides.edgeModifications) {
    const nominator = working.nominators.find((n) => n.accountId === edge.nominatorId);
    if (!nominator) continue;

    switch (edge.action) {
      case "add":
        addTarget(nominator, edge.candidateId);
        break;
      case "remove":
        removeTarget(nominator, edge.candidateId);
        break;
      case "replace":
        removeTarget(nominator, edge.candidateId);
        addTarget(nominator, edge.candidateId);
        break;
    }
  }

  return working;
}
