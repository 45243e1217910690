import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { buildElectionConfig } from "./election-config";
import { hasOverrides } from "./election-overrides";
import { ElectionEngine, ExecuteOptions } from "./election.engine";
import { isElectionError } from "./election.errors";
import {
  ElectionConfiguration,
  ElectionDataset,
  ElectionResult,
  RawElectionConfig,
} from "./election.types";

@Injectable()
export class ElectionService {
  private readonly logger = new Logger(ElectionService.name);
  private readonly engine: ElectionEngine;
  private readonly defaultDataSource?: string;

  constructor(config: ConfigService) {
    // Values may arrive as strings when read back from process.env.
    this.engine = new ElectionEngine({
      balancing: {
        iterations: Number(config.get<number | string>("ELECTION_BALANCE_ITERATIONS", 10)),
        tolerance: BigInt(config.get<string>("ELECTION_BALANCE_TOLERANCE", "0")),
      },
    });
    this.defaultDataSource = config.get<string>("ELECTION_DATA_SOURCE");
  }

  /** Builds the configuration from raw input, then runs the election. */
  run(
    dataset: ElectionDataset,
    raw: RawElectionConfig,
    options: ExecuteOptions = {},
  ): ElectionResult {
    return this.execute(dataset, buildElectionConfig(raw), options);
  }

  execute(
    dataset: ElectionDataset,
    config: ElectionConfiguration,
    options: ExecuteOptions = {},
  ): ElectionResult {
    const dataSource = options.dataSource ?? this.defaultDataSource;
    const startedAt = Date.now();

    try {
      const result = this.engine.execute(
        dataset,
        config,
        dataSource !== undefined ? { dataSource } : {},
      );
      this.logger.log(
        `[election_completed] algorithm=${result.algorithmUsed} ` +
          `winners=${result.selectedValidators.length} totalStake=${result.totalStake} ` +
          `overrides=${hasOverrides(config.overrides)} durationMs=${Date.now() - startedAt}`,
      );
      return result;
    } catch (err) {
      if (isElectionError(err)) {
        this.logger.warn(
          `[election_failed] algorithm=${config.algorithm} kind=${err.kind} reason=${err.message}`,
        );
      } else {
        this.logger.error(
          `[election_failed] algorithm=${config.algorithm} unexpected error`,
          err instanceof Error ? err.stack : String(err),
        );
      }
      throw err;
    }
  }
}
