import {
  ElectionAlgorithmError,
  ElectionValidationError,
  InsufficientCandidatesError,
  InvalidElectionDataError,
  isElectionError,
} from "./election.errors";

describe("election errors", () => {
  it("maps each kind to its HTTP status", () => {
    expect(new ElectionValidationError("bad", "algorithm").getStatus()).toBe(400);
    expect(new InsufficientCandidatesError(3, 2).getStatus()).toBe(422);
    expect(new ElectionAlgorithmError("boom", "multi-phase").getStatus()).toBe(500);
    expect(new InvalidElectionDataError("truncated").getStatus()).toBe(400);
  });

  it("exposes kind, message and field in the response body", () => {
    const err = new ElectionValidationError("Active set size must be positive", "active_set_size");
    expect(err.getResponse()).toEqual({
      kind: "VALIDATION",
      message: "Active set size must be positive",
      field: "active_set_size",
    });
  });

  it("omits the field when none is given", () => {
    expect(new ElectionValidationError("bad").getResponse()).toEqual({
      kind: "VALIDATION",
      message: "bad",
    });
  });

  it("names the algorithm in algorithm errors", () => {
    const err = new ElectionAlgorithmError("No electable candidate left in round 2 of 2", "parallel-phragmen");
    expect(err.message).toBe(
      "No electable candidate left in round 2 of 2 (algorithm: parallel-phragmen)",
    );
    expect(err.kind).toBe("ALGORITHM");
  });

  it("prefixes invalid data messages", () => {
    expect(new InvalidElectionDataError("truncated").message).toBe("Invalid data: truncated");
  });

  it("narrows unknown values", () => {
    expect(isElectionError(new InsufficientCandidatesError(1, 0))).toBe(true);
    expect(isElectionError(new Error("plain"))).toBe(false);
    expect(isElectionError("VALIDATION")).toBe(false);
  });
});
