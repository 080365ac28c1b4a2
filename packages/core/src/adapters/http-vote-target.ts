import type { Ballot } from '../domain/workload/ballot.js';
import type { VoteTarget } from '../ports/vote-target.js';
import { TargetError, describeError } from '../shared/errors.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './http-query-target.js';

export class HttpVoteTarget implements VoteTarget {
  readonly name = 'http-vote';

  constructor(
    private readonly url: string,
    private readonly timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {}

  async submit(ballot: Ballot): Promise<boolean> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(ballot),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TargetError(`vote endpoint unreachable: ${describeError(err)}`, this.url);
    }
    await response.arrayBuffer().catch(() => undefined);
    return response.ok;
  }
}
