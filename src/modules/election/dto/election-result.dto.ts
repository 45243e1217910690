import "reflect-metadata";
import { Type } from "class-transformer";
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from "class-validator";
import { ALGORITHM_KINDS, AlgorithmKind } from "../election.types";
import { IsStakeAmount } from "./stake-amount.decorator";

export class SelectedValidatorDto {
  @IsString()
  @IsNotEmpty()
  account_id!: string;

  @IsStakeAmount()
  total_backing_stake!: string;

  @IsInt()
  @Min(0)
  nominator_count!: number;

  @IsInt()
  @Min(1)
  rank!: number;
}

export class StakeAllocationDto {
  @IsString()
  @IsNotEmpty()
  nominator_id!: string;

  @IsString()
  @IsNotEmpty()
  validator_id!: string;

  @IsStakeAmount()
  amount!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  proportion!: number;
}

export class ExecutionMetadataDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  block_number?: number;

  @IsOptional()
  @IsString()
  execution_timestamp?: string;

  @IsOptional()
  @IsString()
  data_source?: string;
}

export class ElectionResultDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SelectedValidatorDto)
  selected_validators!: SelectedValidatorDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StakeAllocationDto)
  stake_distribution!: StakeAllocationDto[];

  @IsStakeAmount()
  total_stake!: string;

  @IsIn([...ALGORITHM_KINDS])
  algorithm_used!: AlgorithmKind;

  @IsObject()
  @ValidateNested()
  @Type(() => ExecutionMetadataDto)
  execution_metadata!: ExecutionMetadataDto;
}
