import type { Ballot } from '../domain/workload/ballot.js';

export interface VoteTarget {
  readonly name: string;
  /** Resolves `true` when the platform accepted the ballot. */
  submit(ballot: Ballot): Promise<boolean>;
}
