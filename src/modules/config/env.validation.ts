import "reflect-metadata";
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
} from "class-validator";
import { Transform } from "class-transformer";

export enum Environment {
  Development = "development",
  Staging = "staging",
  Production = "production",
  Test = "test",
}

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  /**
   * Equalization passes after selection. 0 disables equalization; the winner
   * set is unaffected either way, only the stake attribution.
   */
  @Transform(({ value }) => (typeof value === "string" ? Number(value) : value))
  @IsInt()
  @Min(0)
  @Max(1000)
  ELECTION_BALANCE_ITERATIONS: number = 10;

  /** Equalization stops once no voter's spread exceeds this (planck units). */
  @IsString()
  @Matches(/^\d+$/, { message: "ELECTION_BALANCE_TOLERANCE must be a non-negative integer" })
  ELECTION_BALANCE_TOLERANCE: string = "0";

  /** Copied into every result's execution metadata, e.g. "rpc" or "json-file". */
  @IsOptional()
  @IsString()
  @MinLength(1)
  ELECTION_DATA_SOURCE?: string;
}
