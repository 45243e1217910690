import "reflect-metadata";
import { Type } from "class-transformer";
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from "class-validator";
import { EdgeAction } from "../election.types";
import { IsStakeAmount } from "./stake-amount.decorator";

export class EdgeModificationDto {
  @IsIn(["add", "remove", "replace"])
  action!: EdgeAction;

  @IsString()
  @IsNotEmpty()
  nominator_id!: string;

  @IsString()
  @IsNotEmpty()
  candidate_id!: string;

  @IsOptional()
  @IsStakeAmount()
  weight?: string;
}

export class OverrideSetDto {
  /** account_id → stake; values are checked when mapped to the domain. */
  @IsOptional()
  @IsObject()
  candidate_stakes?: Record<string, unknown>;

  @IsOptional()
  @IsObject()
  nominator_stakes?: Record<string, unknown>;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EdgeModificationDto)
  voting_edges?: EdgeModificationDto[];

  @IsOptional()
  @IsInt()
  active_set_size?: number;
}

/**
 * Structural shape only. Semantic checks (known algorithm, positive size) are
 * left to buildElectionConfig so both entry points report the same errors.
 */
export class ElectionConfigDto {
  @IsString()
  algorithm!: string;

  @IsInt()
  active_set_size!: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => OverrideSetDto)
  overrides?: OverrideSetDto;

  @IsOptional()
  @IsInt()
  @Min(0)
  block_number?: number;
}
