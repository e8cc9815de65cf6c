import { describe, it, expect } from 'vitest';
import { name, parseJobs } from './index';

describe('cli package', () => {
  it('exports name', () => {
    expect(name).toBe('@cyforge/cli');
  });
});

describe('parseJobs', () => {
  it('accepts positive integers', () => {
    expect(parseJobs('4')).toBe(4);
    expect(parseJobs(undefined)).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseJobs('0')).toThrow('--jobs must be a positive integer, got "0"');
    expect(() => parseJobs('two')).toThrow('--jobs must be a positive integer, got "two"');
  });
});
