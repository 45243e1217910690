import { candidate, dataset, nominator } from "../../../../test/fixtures/election.fixtures";
import { ElectionValidationError } from "../election.errors";
import { buildVoterGraph, findAssignmentViolation, recomputeBacking } from "./voter-graph";

describe("buildVoterGraph", () => {
  const graph = () =>
    buildVoterGraph(
      dataset(
        [candidate("v1", 100n), candidate("v2", 0n)],
        [
          nominator("n1", 10n, ["v2", "v1", "v2"]),
          nominator("idle", 50n, []),
          nominator("n2", 5n, ["v1"]),
        ],
      ),
    );

  it("sums self-stake and nominator stake into approval", () => {
    expect(graph().candidates.map((c) => [c.accountId, c.approvalStake])).toEqual([
      ["v1", 115n],
      ["v2", 10n],
    ]);
  });

  it("puts self-votes first and skips nominators without targets", () => {
    expect(graph().voters.map((v) => [v.accountId, v.selfVote])).toEqual([
      ["v1", true],
      ["v2", true],
      ["n1", false],
      ["n2", false],
    ]);
  });

  it("collapses duplicate targets to their first occurrence", () => {
    const n1 = graph().voters[2];
    expect(n1.edges.map((e) => e.candidate.accountId)).toEqual(["v2", "v1"]);
  });

  it("rejects an unknown target", () => {
    expect(() =>
      buildVoterGraph(dataset([candidate("v1", 1n)], [nominator("n1", 1n, ["v9"])])),
    ).toThrow(ElectionValidationError);
  });
});

describe("findAssignmentViolation", () => {
  const setup = () => {
    const g = buildVoterGraph(
      dataset([candidate("v1", 0n), candidate("v2", 0n)], [nominator("n1", 10n, ["v1", "v2"])]),
    );
    g.candidates[0].elected = true;
    return g;
  };

  it("accepts a voter assigning its whole budget to winners", () => {
    const g = setup();
    g.voters[2].edges[0].weight = 10n;
    expect(findAssignmentViolation(g.voters)).toBeNull();
  });

  it("reports a partly assigned budget", () => {
    const g = setup();
    g.voters[2].edges[0].weight = 9n;
    expect(findAssignmentViolation(g.voters)).toBe("voter n1 assigns 9 of budget 10");
  });

  it("reports stake on an unelected candidate", () => {
    const g = setup();
    g.voters[2].edges[0].weight = 8n;
    g.voters[2].edges[1].weight = 2n;
    expect(findAssignmentViolation(g.voters)).toBe("voter n1 assigns 2 to unelected v2");
  });

  it("reports negative weights", () => {
    const g = setup();
    g.voters[2].edges[0].weight = -1n;
    expect(findAssignmentViolation(g.voters)).toBe("voter n1 has negative weight -1 on v1");
  });
});

describe("recomputeBacking", () => {
  it("sums edge weights per candidate", () => {
    const g = buildVoterGraph(
      dataset([candidate("v1", 4n)], [nominator("n1", 6n, ["v1"])]),
    );
    g.voters[0].edges[0].weight = 4n;
    g.voters[1].edges[0].weight = 6n;
    recomputeBacking(g);
    expect(g.candidates[0].backedStake).toBe(10n);
  });
});
