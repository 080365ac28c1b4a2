import type { QueryTarget } from '../ports/query-target.js';
import { TargetError, describeError } from '../shared/errors.js';

export interface Endpoint {
  name: string;
  url: string;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

/**
 * Reads every endpoint in turn; one iteration succeeds only when each
 * endpoint answers 200 within the timeout.
 */
export class HttpQueryTarget implements QueryTarget {
  readonly name: string;

  constructor(
    private readonly endpoints: readonly Endpoint[],
    private readonly timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {
    this.name = endpoints.map((e) => e.name).join('+');
  }

  async query(): Promise<void> {
    for (const endpoint of this.endpoints) {
      let response: Response;
      try {
        response = await fetch(endpoint.url, {
          method: 'GET',
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        throw new TargetError(`${endpoint.name} unreachable: ${describeError(err)}`, endpoint.url);
      }
      // Only the status matters; drain the body so the connection is reusable.
      await response.arrayBuffer().catch(() => undefined);
      if (response.status !== 200) {
        throw new TargetError(`${endpoint.name} answered HTTP ${response.status}`, endpoint.url, response.status);
      }
    }
  }
}
