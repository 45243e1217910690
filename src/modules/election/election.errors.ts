import { HttpException, HttpStatus } from "@nestjs/common";
import { AlgorithmKind } from "./election.types";

export type ElectionErrorKind =
  | "VALIDATION"
  | "INSUFFICIENT_CANDIDATES"
  | "ALGORITHM"
  | "INVALID_DATA";

/**
 * Base for every error the election core throws.
 *
 * Extends HttpException so a request layer can surface these without a
 * translation table; the response body always carries `kind` and `message`.
 */
export abstract class ElectionError extends HttpException {
  abstract readonly kind: ElectionErrorKind;
}

/** Malformed or inconsistent input. `field` names the offending input where known. */
export class ElectionValidationError extends ElectionError {
  readonly kind = "VALIDATION" as const;

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(
      { kind: "VALIDATION", message, ...(field !== undefined ? { field } : {}) },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/** Requested active set is larger than the candidate pool. Never clamped. */
export class InsufficientCandidatesError extends ElectionError {
  readonly kind = "INSUFFICIENT_CANDIDATES" as const;

  constructor(
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      {
        kind: "INSUFFICIENT_CANDIDATES",
        message: `Insufficient candidates: requested ${requested}, available ${available}`,
        requested,
        available,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/** The selection algorithm failed or broke one of its own invariants. */
export class ElectionAlgorithmError extends ElectionError {
  readonly kind = "ALGORITHM" as const;

  constructor(
    message: string,
    readonly algorithm: AlgorithmKind,
  ) {
    super(
      { kind: "ALGORITHM", message: `${message} (algorithm: ${algorithm})`, algorithm },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}

/** Persisted or serialized structure that does not match the expected shape. */
export class InvalidElectionDataError extends ElectionError {
  readonly kind = "INVALID_DATA" as const;

  constructor(message: string) {
    super({ kind: "INVALID_DATA", message: `Invalid data: ${message}` }, HttpStatus.BAD_REQUEST);
  }
}

export function isElectionError(value: unknown): value is ElectionError {
  return value instanceof ElectionError;
}
