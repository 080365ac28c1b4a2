export interface Ballot {
  voteId: string;
  candidateId: string;
}

export function buildBallot(sequence: number, nowMs: number, candidateCount: number): Ballot {
  return {
    voteId: `VOTE_${sequence}_${Math.floor(nowMs / 1000)}`,
    candidateId: `CAND_${(sequence % candidateCount) + 1}`,
  };
}
