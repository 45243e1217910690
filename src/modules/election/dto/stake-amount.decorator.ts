import { applyDecorators } from "@nestjs/common";
import { Transform } from "class-transformer";
import { IsString, Matches } from "class-validator";

/**
 * Stake amounts travel as decimal strings so they survive JSON unchanged.
 * Safe-integer JSON numbers are accepted on input and normalised to strings.
 */
export function IsStakeAmount() {
  return applyDecorators(
    Transform(({ value }) =>
      typeof value === "number" && Number.isSafeInteger(value) && value >= 0 ? String(value) : value,
    ),
    IsString(),
    Matches(/^\d+$/, { message: "$property must be a non-negative integer" }),
  );
}
