import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parsePort, parsePositiveInt } from '../../../src/cli/options.js';

describe('parsePositiveInt', () => {
  it.each([
    ['1', 1],
    ['20', 20],
    [' 7 ', 7],
  ])('parses %j', (raw, expected) => {
    expect(parsePositiveInt(raw)).toBe(expected);
  });

  it.each(['abc', '', '0', '-3', '2.5', '1e3', '12abc'])('rejects %j', (raw) => {
    expect(() => parsePositiveInt(raw)).toThrow(InvalidArgumentError);
  });
});

describe('parsePort', () => {
  it('accepts the valid range', () => {
    expect(parsePort('3777')).toBe(3777);
    expect(parsePort('65535')).toBe(65535);
  });

  it('rejects ports above 65535', () => {
    expect(() => parsePort('65536')).toThrow('Must be between 1 and 65535.');
  });

  it('rejects non-numeric ports', () => {
    expect(() => parsePort('http')).toThrow('Must be a positive integer.');
  });
});
