import { candidate, dataset, nominator } from "../../../test/fixtures/election.fixtures";
import {
  applyOverrides,
  createOverrideSet,
  ElectionOverridesBuilder,
  hasOverrides,
  parseStakeDirective,
} from "./election-overrides";
import { ElectionValidationError } from "./election.errors";

function base() {
  return dataset(
    [candidate("v1", 100n), candidate("v2", 200n), candidate("v3", 300n)],
    [nominator("n1", 50n, ["v1", "v2"]), nominator("n2", 70n, ["v3"])],
  );
}

describe("parseStakeDirective", () => {
  it("parses account_id=stake", () => {
    expect(parseStakeDirective(" v1 = 1500 ", "candidate")).toEqual({
      accountId: "v1",
      stake: 1500n,
    });
  });

  it("accepts stakes beyond the safe-integer range", () => {
    expect(parseStakeDirective("n1=123456789012345678901234567890", "nominator").stake).toBe(
      123456789012345678901234567890n,
    );
  });

  it.each(["v1", "v1=2=3", "=5"])("rejects the malformed directive %p", (directive) => {
    try {
      parseStakeDirective(directive, "candidate");
      throw new Error("expected a validation error");
    } catch (err) {
      expect(err).toBeInstanceOf(ElectionValidationError);
      if (err instanceof ElectionValidationError) {
        expect(err.field).toBe("override_candidate_stake");
      }
    }
  });

  it("rejects a non-numeric stake", () => {
    expect(() => parseStakeDirective("n1=-4", "nominator")).toThrow(
      "Invalid stake value '-4' in nominator override: expected a non-negative integer",
    );
  });
});

describe("ElectionOverridesBuilder", () => {
  it("collects directives, later ones winning", () => {
    const overrides = new ElectionOverridesBuilder()
      .directives({ candidateStakes: ["v1=10", "v1=20"], nominatorStakes: ["n1=5"] })
      .build();

    expect([...overrides.candidateStakes]).toEqual([["v1", 20n]]);
    expect([...overrides.nominatorStakes]).toEqual([["n1", 5n]]);
  });

  it("records edge modifications in order", () => {
    const overrides = new ElectionOverridesBuilder()
      .addEdge("n1", "v3")
      .removeEdge("n1", "v1")
      .replaceEdge("n2", "v3", 40n)
      .build();

    expect(overrides.edgeModifications).toEqual([
      { action: "add", nominatorId: "n1", candidateId: "v3" },
      { action: "remove", nominatorId: "n1", candidateId: "v1" },
      { action: "replace", nominatorId: "n2", candidateId: "v3", weight: 40n },
    ]);
  });

  it("returns independent sets from each build", () => {
    const builder = new ElectionOverridesBuilder().candidateStake("v1", 1n);
    const first = builder.build();
    builder.candidateStake("v2", 2n);
    expect(first.candidateStakes.size).toBe(1);
  });
});

describe("hasOverrides", () => {
  it("is false for undefined and empty sets", () => {
    expect(hasOverrides(undefined)).toBe(false);
    expect(hasOverrides(createOverrideSet())).toBe(false);
  });

  it("is true once anything is set", () => {
    expect(hasOverrides(new ElectionOverridesBuilder().activeSetSize(2).build())).toBe(true);
  });
});

describe("applyOverrides", () => {
  it("returns an equal copy when there are no overrides", () => {
    const source = base();
    const working = applyOverrides(undefined, source);
    expect(working).toEqual(source);
    expect(working).not.toBe(source);
  });

  it("applies stake overrides to the copy only", () => {
    const source = base();
    const overrides = new ElectionOverridesBuilder()
      .candidateStake("v1", 999n)
      .nominatorStake("n2", 1n)
      .build();

    const working = applyOverrides(overrides, source);

    expect(working.candidates[0].stake).toBe(999n);
    expect(working.nominators[1].stake).toBe(1n);
    expect(source.candidates[0].stake).toBe(100n);
    expect(source.nominators[1].stake).toBe(70n);
  });

  it("skips ids the dataset does not contain", () => {
    const overrides = new ElectionOverridesBuilder()
      .candidateStake("missing", 5n)
      .addEdge("nobody", "v1")
      .build();
    expect(applyOverrides(overrides, base())).toEqual(base());
  });

  it("applies edge modifications in order", () => {
    const overrides = new ElectionOverridesBuilder()
      .addEdge("n1", "v3")
      .addEdge("n1", "v3")
      .removeEdge("n1", "v1")
      .build();
    expect(applyOverrides(overrides, base()).nominators[0].targets).toEqual(["v2", "v3"]);
  });

  it("moves a replaced target to the end of the list", () => {
    const overrides = new ElectionOverridesBuilder().replaceEdge("n1", "v1", 10n).build();
    expect(applyOverrides(overrides, base()).nominators[0].targets).toEqual(["v2", "v1"]);
  });
});
