import { ClassConstructor, plainToInstance } from "class-transformer";
import { validateSync, ValidationError } from "class-validator";
import { ElectionConfigDto, OverrideSetDto } from "./dto/election-config.dto";
import { ElectionDatasetDto } from "./dto/election-dataset.dto";
import { ElectionResultDto } from "./dto/election-result.dto";
import { InvalidElectionDataError } from "./election.errors";
import {
  Candidate,
  EdgeModification,
  ElectionConfiguration,
  ElectionDataset,
  ElectionResult,
  Nominator,
  OverrideSet,
  RawElectionConfig,
} from "./election.types";

// ── Wire format ────────────────────────────────────────────────────────────────
//
// Rules:
//   1. Field names are snake_case.
//   2. Stake amounts are decimal strings (no scientific notation).
//   3. Optional fields are omitted when absent, never null.
//   4. Collections keep their in-memory order.

export interface WireCandidate {
  account_id: string;
  stake: string;
  metadata?: { commission_rate?: number; on_chain_status?: string };
}

export interface WireNominator {
  account_id: string;
  stake: string;
  targets: string[];
  metadata?: Record<string, unknown>;
}

export interface WireDataset {
  candidates: WireCandidate[];
  nominators: WireNominator[];
  metadata?: { block_number?: number; chain?: string };
}

export interface WireEdgeModification {
  action: EdgeModification["action"];
  nominator_id: string;
  candidate_id: string;
  weight?: string;
}

export interface WireOverrideSet {
  candidate_stakes?: Record<string, string>;
  nominator_stakes?: Record<string, string>;
  voting_edges?: WireEdgeModification[];
  active_set_size?: number;
}

export interface WireConfig {
  algorithm: string;
  active_set_size: number;
  overrides?: WireOverrideSet;
  block_number?: number;
}

export interface WireResult {
  selected_validators: Array<{
    account_id: string;
    total_backing_stake: string;
    nominator_count: number;
    rank: number;
  }>;
  stake_distribution: Array<{
    nominator_id: string;
    validator_id: string;
    amount: string;
    proportion: number;
  }>;
  total_stake: string;
  algorithm_used: ElectionResult["algorithmUsed"];
  execution_metadata: { block_number?: number; execution_timestamp?: string; data_source?: string };
}

const STAKE_PATTERN = /^\d+$/;

// ── Dataset ────────────────────────────────────────────────────────────────────

export function encodeDataset(dataset: ElectionDataset): WireDataset {
  const meta = dataset.metadata;
  const metadata = meta
    ? {
        ...(meta.blockNumber !== undefined ? { block_number: meta.blockNumber } : {}),
        ...(meta.chain !== undefined ? { chain: meta.chain } : {}),
      }
    : undefined;
  return {
    candidates: dataset.candidates.map((c) => ({
      account_id: c.accountId,
      stake: c.stake.toString(),
      ...(c.metadata
        ? {
            metadata: {
              ...(c.metadata.commissionRate !== undefined
                ? { commission_rate: c.metadata.commissionRate }
                : {}),
              ...(c.metadata.onChainStatus !== undefined
                ? { on_chain_status: c.metadata.onChainStatus }
                : {}),
            },
          }
        : {}),
    })),
    nominators: dataset.nominators.map((n) => ({
      account_id: n.accountId,
      stake: n.stake.toString(),
      targets: [...n.targets],
      ...(n.metadata ? { metadata: { ...n.metadata } } : {}),
    })),
    ...(metadata ? { metadata } : {}),
  };
}

/**
 * Structural decode only; logical invariants (duplicates, dangling targets)
 * are checked by validateDataset when the election runs.
 */
export function decodeDataset(plain: unknown): ElectionDataset {
  const dto = decodeWith(ElectionDatasetDto, plain, "election data");

  const candidates: Candidate[] = dto.candidates.map((c) => {
    const candidate: Candidate = { accountId: c.account_id, stake: BigInt(c.stake) };
    if (c.metadata) {
      const { commission_rate, on_chain_status } = c.metadata;
      candidate.metadata = {
        ...(commission_rate !== undefined ? { commissionRate: commission_rate } : {}),
        ...(on_chain_status !== undefined ? { onChainStatus: on_chain_status } : {}),
      };
    }
    return candidate;
  });

  const nominators: Nominator[] = dto.nominators.map((n) => {
    const nominator: Nominator = {
      accountId: n.account_id,
      stake: BigInt(n.stake),
      targets: [...n.targets],
    };
    if (n.metadata) nominator.metadata = { ...n.metadata };
    return nominator;
  });

  const dataset: ElectionDataset = { candidates, nominators };
  if (dto.metadata) {
    const { block_number, chain } = dto.metadata;
    dataset.metadata = {
      ...(block_number !== undefined ? { blockNumber: block_number } : {}),
      ...(chain !== undefined ? { chain } : {}),
    };
  }
  return dataset;
}

// ── Configuration ──────────────────────────────────────────────────────────────

export function encodeConfig(config: ElectionConfiguration): WireConfig {
  return {
    algorithm: config.algorithm,
    active_set_size: config.activeSetSize,
    ...(config.overrides ? { overrides: encodeOverrides(config.overrides) } : {}),
    ...(config.blockNumber !== undefined ? { block_number: config.blockNumber } : {}),
  };
}

/**
 * Returns the raw configuration; pass it through buildElectionConfig to get
 * a validated one.
 */
export function decodeConfig(plain: unknown): RawElectionConfig {
  const dto = decodeWith(ElectionConfigDto, plain, "election configuration");
  const raw: RawElectionConfig = {
    algorithm: dto.algorithm,
    activeSetSize: dto.active_set_size,
  };
  if (dto.overrides) raw.overrides = decodeOverrides(dto.overrides);
  if (dto.block_number !== undefined) raw.blockNumber = dto.block_number;
  return raw;
}

function encodeOverrides(overrides: OverrideSet): WireOverrideSet {
  const wire: WireOverrideSet = {};
  if (overrides.candidateStakes.size > 0) {
    wire.candidate_stakes = stakesToRecord(overrides.candidateStakes);
  }
  if (overrides.nominatorStakes.size > 0) {
    wire.nominator_stakes = stakesToRecord(overrides.nominatorStakes);
  }
  if (overrides.edgeModifications.length > 0) {
    wire.voting_edges = overrides.edgeModifications.map((e) => ({
      action: e.action,
      nominator_id: e.nominatorId,
      candidate_id: e.candidateId,
      ...(e.weight !== undefined ? { weight: e.weight.toString() } : {}),
    }));
  }
  if (overrides.activeSetSize !== undefined) wire.active_set_size = overrides.activeSetSize;
  return wire;
}

function decodeOverrides(dto: OverrideSetDto): OverrideSet {
  const overrides: OverrideSet = {
    candidateStakes: recordToStakes(dto.candidate_stakes, "overrides.candidate_stakes"),
    nominatorStakes: recordToStakes(dto.nominator_stakes, "overrides.nominator_stakes"),
    edgeModifications: (dto.voting_edges ?? []).map((e) => {
      const edge: EdgeModification = {
        action: e.action,
        nominatorId: e.nominator_id,
        candidateId: e.candidate_id,
      };
      if (e.weight !== undefined) edge.weight = BigInt(e.weight);
      return edge;
    }),
  };
  if (dto.active_set_size !== undefined) overrides.activeSetSize = dto.active_set_size;
  return overrides;
}

function stakesToRecord(stakes: Map<string, bigint>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [accountId, stake] of stakes) record[accountId] = stake.toString();
  return record;
}

function recordToStakes(
  record: Record<string, unknown> | undefined,
  field: string,
): Map<string, bigint> {
  const stakes = new Map<string, bigint>();
  for (const [accountId, value] of Object.entries(record ?? {})) {
    const text = typeof value === "number" && Number.isSafeInteger(value) ? String(value) : value;
    if (typeof text !== "string" || !STAKE_PATTERN.test(text)) {
      throw new InvalidElectionDataError(
        `${field}.${accountId} must be a non-negative integer, got ${JSON.stringify(value)}`,
      );
    }
    stakes.set(accountId, BigInt(text));
  }
  return stakes;
}

// ── Result ─────────────────────────────────────────────────────────────────────

export function encodeResult(result: ElectionResult): WireResult {
  const meta = result.executionMetadata;
  return {
    selected_validators: result.selectedValidators.map((v) => ({
      account_id: v.accountId,
      total_backing_stake: v.totalBackingStake.toString(),
      nominator_count: v.nominatorCount,
      rank: v.rank,
    })),
    stake_distribution: result.stakeDistribution.map((a) => ({
      nominator_id: a.nominatorId,
      validator_id: a.validatorId,
      amount: a.amount.toString(),
      proportion: a.proportion,
    })),
    total_stake: result.totalStake.toString(),
    algorithm_used: result.algorithmUsed,
    execution_metadata: {
      ...(meta.blockNumber !== undefined ? { block_number: meta.blockNumber } : {}),
      ...(meta.executionTimestamp !== undefined
        ? { execution_timestamp: meta.executionTimestamp }
        : {}),
      ...(meta.dataSource !== undefined ? { data_source: meta.dataSource } : {}),
    },
  };
}

export function decodeResult(plain: unknown): ElectionResult {
  const dto = decodeWith(ElectionResultDto, plain, "election result");
  const meta = dto.execution_metadata;
  return {
    selectedValidators: dto.selected_validators.map((v) => ({
      accountId: v.account_id,
      totalBackingStake: BigInt(v.total_backing_stake),
      nominatorCount: v.nominator_count,
      rank: v.rank,
    })),
    stakeDistribution: dto.stake_distribution.map((a) => ({
      nominatorId: a.nominator_id,
      validatorId: a.validator_id,
      amount: BigInt(a.amount),
      proportion: a.proportion,
    })),
    totalStake: BigInt(dto.total_stake),
    algorithmUsed: dto.algorithm_used,
    executionMetadata: {
      ...(meta.block_number !== undefined ? { blockNumber: meta.block_number } : {}),
      ...(meta.execution_timestamp !== undefined
        ? { executionTimestamp: meta.execution_timestamp }
        : {}),
      ...(meta.data_source !== undefined ? { dataSource: meta.data_source } : {}),
    },
  };
}

// ── Text ───────────────────────────────────────────────────────────────────────

export function serializeDataset(dataset: ElectionDataset): string {
  return JSON.stringify(encodeDataset(dataset), null, 2);
}

export function parseDataset(text: string): ElectionDataset {
  return decodeDataset(parseJson(text, "election data"));
}

export function serializeConfig(config: ElectionConfiguration): string {
  return JSON.stringify(encodeConfig(config), null, 2);
}

export function parseConfig(text: string): RawElectionConfig {
  return decodeConfig(parseJson(text, "election configuration"));
}

export function serializeResult(result: ElectionResult): string {
  return JSON.stringify(encodeResult(result), null, 2);
}

export function parseResult(text: string): ElectionResult {
  return decodeResult(parseJson(text, "election result"));
}

// ── Helpers ────────────────────────────────────────────────────────────────────

function parseJson(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidElectionDataError(`${label} is not valid JSON: ${reason}`);
  }
}

function decodeWith<T extends object>(cls: ClassConstructor<T>, plain: unknown, label: string): T {
  if (typeof plain !== "object" || plain === null || Array.isArray(plain)) {
    throw new InvalidElectionDataError(`${label} must be a JSON object`);
  }
  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    throw new InvalidElectionDataError(`${label}: ${describeErrors(errors).join("; ")}`);
  }
  return instance;
}

function describeErrors(errors: ValidationError[], prefix = ""): string[] {
  const out: string[] = [];
  for (const error of errors) {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      out.push(`${path}: ${message}`);
    }
    out.push(...describeErrors(error.children ?? [], path));
  }
  return out;
}
