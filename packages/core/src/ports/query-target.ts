/**
 * Read side of the platform under test. `query` resolves when the read
 * succeeded and rejects otherwise.
 */
export interface QueryTarget {
  readonly name: string;
  query(): Promise<void>;
}
