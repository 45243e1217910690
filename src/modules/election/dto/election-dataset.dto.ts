import "reflect-metadata";
import { Type } from "class-transformer";
import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from "class-validator";
import { IsStakeAmount } from "./stake-amount.decorator";

export class CandidateMetadataDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  commission_rate?: number;

  @IsOptional()
  @IsString()
  on_chain_status?: string;
}

export class CandidateDto {
  @IsString()
  @IsNotEmpty()
  account_id!: string;

  @IsStakeAmount()
  stake!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => CandidateMetadataDto)
  metadata?: CandidateMetadataDto;
}

export class NominatorDto {
  @IsString()
  @IsNotEmpty()
  account_id!: string;

  @IsStakeAmount()
  stake!: string;

  @IsArray()
  @IsString({ each: true })
  targets!: string[];

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class DatasetMetadataDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  block_number?: number;

  @IsOptional()
  @IsString()
  chain?: string;
}

export class ElectionDatasetDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CandidateDto)
  candidates!: CandidateDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => NominatorDto)
  nominators!: NominatorDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => DatasetMetadataDto)
  metadata?: DatasetMetadataDto;
}
