export interface Clock {
  /** Milliseconds since the epoch (or since the clock's origin for virtual clocks). */
  now(): number;
  sleep(ms: number): Promise<void>;
}
