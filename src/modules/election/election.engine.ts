import { ELECTION_ALGORITHMS } from "./algorithms";
import {
  assertActiveSetSize,
  assertActiveSetWithinCandidates,
  effectiveActiveSetSize,
} from "./election-config";
import { validateDataset } from "./election-dataset";
import { applyOverrides } from "./election-overrides";
import { assembleResult, freezeResult, validateResult } from "./election-result.assembler";
import {
  BalancingConfig,
  DEFAULT_BALANCING,
  ElectionConfiguration,
  ElectionDataset,
  ElectionResult,
  ExecutionMetadata,
} from "./election.types";

export interface ElectionEngineOptions {
  balancing?: BalancingConfig;
  /** Source of the execution timestamp. */
  clock?: () => Date;
}

export interface ExecuteOptions {
  /** Label for where the dataset came from (e.g. "rpc", "json-file"). */
  dataSource?: string;
}

/**
 * Election orchestrator:
 *
 *   validate dataset → check active-set size → copy + apply overrides
 *   → re-validate copy → dispatch → assemble → validate result → freeze
 *
 * Synchronous and side-effect free; the caller's dataset is never mutated.
 */
export class ElectionEngine {
  private readonly balancing: BalancingConfig;
  private readonly clock: () => Date;

  constructor(options: ElectionEngineOptions = {}) {
    this.balancing = options.balancing ?? DEFAULT_BALANCING;
    this.clock = options.clock ?? (() => new Date());
  }

  execute(
    dataset: ElectionDataset,
    config: ElectionConfiguration,
    options: ExecuteOptions = {},
  ): ElectionResult {
    validateDataset(dataset);

    // Configurations are plain objects; one that skipped buildElectionConfig lands here too.
    const activeSetSize = effectiveActiveSetSize(config);
    assertActiveSetSize(activeSetSize, "active_set_size");
    assertActiveSetWithinCandidates(activeSetSize, dataset.candidates.length);

    // An "add" override can introduce a target the dataset does not contain.
    const working = applyOverrides(config.overrides, dataset);
    validateDataset(working);

    const algorithm = ELECTION_ALGORITHMS[config.algorithm];
    const outcome = algorithm(working, { toElect: activeSetSize, balancing: this.balancing });

    const result = assembleResult(outcome, {
      algorithm: config.algorithm,
      executionMetadata: this.executionMetadata(dataset, config, options),
    });
    validateResult(result, activeSetSize);

    return freezeResult(result);
  }

  private executionMetadata(
    dataset: ElectionDataset,
    config: ElectionConfiguration,
    options: ExecuteOptions,
  ): ExecutionMetadata {
    const blockNumber = config.blockNumber ?? dataset.metadata?.blockNumber;
    return {
      ...(blockNumber !== undefined ? { blockNumber } : {}),
      executionTimestamp: this.clock().toISOString(),
      ...(options.dataSource !== undefined ? { dataSource: options.dataSource } : {}),
    };
  }
}
