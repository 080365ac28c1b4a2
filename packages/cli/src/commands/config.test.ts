import { describe, it, expect } from 'vitest';
import { ConfigError } from '@ballotbench/core';
import { prefsForKey } from './config.js';

describe('prefsForKey', () => {
  it('should map keys onto preference fields', () => {
    expect(prefsForKey('profile', 'standard')).toEqual({ profile: 'standard' });
    expect(prefsForKey('vote-mode', 'http')).toEqual({ voteMode: 'http' });
    expect(prefsForKey('timeout', '2500')).toEqual({ requestTimeoutMs: 2500 });
  });

  it('should split query URL lists', () => {
    expect(prefsForKey('query-urls', 'a=http://h/1, http://h/2')).toEqual({
      queryUrls: ['a=http://h/1', 'http://h/2'],
    });
  });

  it('should reject unknown keys and non-integer seeds', () => {
    expect(() => prefsForKey('api-key', 'x')).toThrow(ConfigError);
    expect(() => prefsForKey('seed', 'abc')).toThrow('seed must be an integer, got "abc"');
  });
});
