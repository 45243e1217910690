import {
  candidate,
  dataset,
  nominator,
  sharedNominatorDataset,
} from "../../../../test/fixtures/election.fixtures";
import { balance, balanceVoter } from "./balancing";
import { buildVoterGraph, recomputeBacking, VoterGraph, VoterNode } from "./voter-graph";

/** Marks every candidate elected and seeds edge weights by "voter->candidate". */
function seed(graph: VoterGraph, weights: Record<string, bigint>): void {
  for (const c of graph.candidates) c.elected = true;
  for (const voter of graph.voters) {
    for (const edge of voter.edges) {
      edge.weight = weights[`${voter.accountId}->${edge.candidate.accountId}`] ?? 0n;
    }
  }
  recomputeBacking(graph);
}

function voter(graph: VoterGraph, id: string): VoterNode {
  const found = graph.voters.find((v) => v.accountId === id && !v.selfVote);
  if (!found) throw new Error(`no voter ${id}`);
  return found;
}

describe("balanceVoter", () => {
  const shared = () => {
    const graph = buildVoterGraph(sharedNominatorDataset());
    seed(graph, {
      "n1->alice": 3n,
      "n1->bob": 7n,
      "n2->alice": 20n,
      "n3->bob": 30n,
    });
    return graph;
  };

  it("levels the voter's winners and reports the spread it started from", () => {
    const graph = shared();
    const difference = balanceVoter(voter(graph, "n1"), 0n);

    expect(difference).toBe(14n);
    expect(voter(graph, "n1").edges.map((e) => e.weight)).toEqual([10n, 0n]);
    expect(graph.candidates.map((c) => c.backedStake)).toEqual([30n, 30n]);
  });

  it("leaves the voter alone when the spread is under tolerance", () => {
    const graph = shared();
    expect(balanceVoter(voter(graph, "n1"), 20n)).toBe(14n);
    expect(voter(graph, "n1").edges.map((e) => e.weight)).toEqual([3n, 7n]);
  });

  it("gives the indivisible remainder to the lowest-backed edge", () => {
    const graph = buildVoterGraph(
      dataset([candidate("x", 0n), candidate("y", 0n)], [nominator("n1", 5n, ["x", "y"])]),
    );
    seed(graph, { "n1->x": 5n });

    expect(balanceVoter(voter(graph, "n1"), 0n)).toBe(5n);
    expect(voter(graph, "n1").edges.map((e) => e.weight)).toEqual([3n, 2n]);
  });

  it("skips voters with a single elected edge", () => {
    const graph = shared();
    expect(balanceVoter(voter(graph, "n2"), 0n)).toBe(0n);
    expect(voter(graph, "n2").edges[0].weight).toBe(20n);
  });
});

describe("balance", () => {
  const shared = () => {
    const graph = buildVoterGraph(sharedNominatorDataset());
    seed(graph, {
      "n1->alice": 3n,
      "n1->bob": 7n,
      "n2->alice": 20n,
      "n3->bob": 30n,
    });
    return graph;
  };

  it("stops once every spread is within tolerance", () => {
    const graph = shared();
    expect(balance(graph.voters, { iterations: 10, tolerance: 0n })).toBe(2);
  });

  it("stops at the iteration cap without failing", () => {
    const graph = shared();
    expect(balance(graph.voters, { iterations: 1, tolerance: 0n })).toBe(1);
    expect(graph.candidates.map((c) => c.backedStake)).toEqual([30n, 30n]);
  });

  it("does nothing when disabled", () => {
    const graph = shared();
    expect(balance(graph.voters, { iterations: 0, tolerance: 0n })).toBe(0);
    expect(graph.candidates.map((c) => c.backedStake)).toEqual([23n, 37n]);
  });

  it("conserves every voter's budget", () => {
    const graph = shared();
    balance(graph.voters, { iterations: 10, tolerance: 0n });
    for (const v of graph.voters) {
      const assigned = v.edges.reduce((sum, e) => sum + e.weight, 0n);
      expect(assigned).toBe(v.budget);
    }
  });
});
