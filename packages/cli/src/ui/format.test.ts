import { describe, it, expect } from 'vitest';
import { formatElapsed, formatLatency } from './format.js';

describe('formatElapsed', () => {
  it('should show seconds under a minute', () => {
    expect(formatElapsed(42_400)).toBe('42s');
  });

  it('should pad seconds once minutes appear', () => {
    expect(formatElapsed(65_000)).toBe('1m 05s');
  });
});

describe('formatLatency', () => {
  it('should switch to seconds above one second', () => {
    expect(formatLatency(31.25)).toBe('31.3ms');
    expect(formatLatency(1500)).toBe('1.50s');
  });
});
