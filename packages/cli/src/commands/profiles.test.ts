import { describe, it, expect } from 'vitest';
import { FAST_PROFILE, STANDARD_PROFILE } from '@ballotbench/core';
import { describeProfile } from './profiles.js';

describe('describeProfile', () => {
  it('should summarise the fast profile', () => {
    expect(describeProfile(FAST_PROFILE)).toEqual([
      'fast: Short smoke run, 5-7 minutes end to end',
      '  cooldown 10s, sampling every 2s, vote failure 2%, p95 via index-approx',
      '  simulated latency: query 10-50ms, vote 20-80ms',
      '   1. 5 queries, 50 votes/min, 1 min',
      '   2. 10 queries, 100 votes/min, 1 min',
      '   3. 20 queries, 200 votes/min, 2 min',
    ]);
  });

  it('should collapse fixed latencies to one value', () => {
    expect(describeProfile(STANDARD_PROFILE)[2]).toBe('  simulated latency: query 10-50ms, vote 50ms');
  });
});
