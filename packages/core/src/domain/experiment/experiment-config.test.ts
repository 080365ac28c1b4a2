import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../shared/errors.js';
import {
  createExperimentConfig,
  durationSeconds,
  formatExperimentConfig,
  parseExperimentConfig,
  validateExperimentConfig,
  voteIntervalSeconds,
} from './experiment-config.js';

describe('experiment config', () => {
  it('should parse a queries,votes,minutes triple', () => {
    expect(parseExperimentConfig('5, 50, 1')).toEqual({
      concurrentQueries: 5,
      votesPerMinute: 50,
      durationMinutes: 1,
    });
  });

  it('should reject malformed triples', () => {
    expect(() => parseExperimentConfig('5,50')).toThrow(ConfigError);
    expect(() => parseExperimentConfig('5,fifty,1')).toThrow(ConfigError);
    expect(() => parseExperimentConfig('5,-1,1')).toThrow(ConfigError);
  });

  it('should reject non-positive or fractional fields', () => {
    expect(() => createExperimentConfig(5, 0, 1)).toThrow('votesPerMinute must be a positive integer, got 0');
    expect(() => validateExperimentConfig({ concurrentQueries: 1.5, votesPerMinute: 1, durationMinutes: 1 }))
      .toThrow(ConfigError);
    expect(() => validateExperimentConfig({ concurrentQueries: 1, votesPerMinute: 1, durationMinutes: -2 }))
      .toThrow('durationMinutes must be a positive integer, got -2');
  });

  it('should derive duration and vote interval', () => {
    const config = createExperimentConfig(5, 50, 2);
    expect(durationSeconds(config)).toBe(120);
    expect(voteIntervalSeconds(config)).toBe(1.2);
    expect(formatExperimentConfig(config)).toBe('5 queries, 50 votes/min, 2 min');
  });
});
