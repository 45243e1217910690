import {
  Candidate,
  DatasetMetadata,
  ElectionDataset,
  Nominator,
} from "../../src/modules/election/election.types";

// ─── Builders ───

export function candidate(accountId: string, stake: bigint, commissionRate?: number): Candidate {
  return {
    accountId,
    stake,
    ...(commissionRate !== undefined ? { metadata: { commissionRate } } : {}),
  };
}

export function nominator(accountId: string, stake: bigint, targets: string[]): Nominator {
  return { accountId, stake, targets };
}

export function dataset(
  candidates: Candidate[],
  nominators: Nominator[] = [],
  metadata?: DatasetMetadata,
): ElectionDataset {
  return { candidates, nominators, ...(metadata ? { metadata } : {}) };
}

// ─── Canned datasets ───

/** One candidate (1e9 self-stake) backed by one nominator (5e8). */
export function singleValidatorDataset(): ElectionDataset {
  return dataset(
    [candidate("validator-1", 1_000_000_000n)],
    [nominator("nominator-1", 500_000_000n, ["validator-1"])],
  );
}

/**
 * Two zero-self-stake candidates sharing one nominator:
 *   alice ← n1 (10), n2 (20)
 *   bob   ← n1 (10), n3 (30)
 */
export function sharedNominatorDataset(): ElectionDataset {
  return dataset(
    [candidate("alice", 0n), candidate("bob", 0n)],
    [
      nominator("n1", 10n, ["alice", "bob"]),
      nominator("n2", 20n, ["alice"]),
      nominator("n3", 30n, ["bob"]),
    ],
  );
}

/** Self-stake only: low (100), high (300), mid (200). */
export function selfStakeOnlyDataset(): ElectionDataset {
  return dataset([
    candidate("low", 100n),
    candidate("high", 300n),
    candidate("mid", 200n),
  ]);
}
