import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseFlag, parsePositiveInt } from './options';

describe('parsePositiveInt', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('7')).toBe(7);
  });

  it.each(['0', '-1', '2.5', 'ten'])('rejects %s', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseFlag', () => {
  it('reads true, 1 and yes as true', () => {
    expect(['true', 'TRUE', '1', 'yes'].map(parseFlag)).toEqual([true, true, true, true]);
    expect(['false', '0', 'no', ''].map(parseFlag)).toEqual([false, false, false, false]);
  });
});
