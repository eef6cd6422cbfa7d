import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { collectLinkPairs, parseCount, parseDecimal, parseInteger } from '@/utils/cli-args';

describe('parseInteger', () => {
  it('should parse base-10 integers', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger('010')).toBe(10);
    expect(parseInteger(' -3 ')).toBe(-3);
  });

  it('should reject anything else', () => {
    expect(() => parseInteger('abc')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('3.5')).toThrow('Expected an integer, got "3.5".');
    expect(() => parseInteger('12abc')).toThrow(InvalidArgumentError);
  });
});

describe('parseCount', () => {
  it('should reject a run count that is not a positive integer', () => {
    expect(parseCount('5')).toBe(5);
    expect(() => parseCount('abc')).toThrow(InvalidArgumentError);
    expect(() => parseCount('0')).toThrow('Expected at least 1, got 0.');
  });
});

describe('parseDecimal', () => {
  it('should parse decimal numbers', () => {
    expect(parseDecimal('0.25')).toBe(0.25);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('600')).toBe(600);
  });

  it('should reject non-numeric rates', () => {
    expect(() => parseDecimal('high')).toThrow('Expected a number, got "high".');
    expect(() => parseDecimal('')).toThrow(InvalidArgumentError);
  });
});

describe('collectLinkPairs', () => {
  it('should accumulate repeated pairs', () => {
    expect(collectLinkPairs('b:c', [['a', 'b']])).toEqual([
      ['a', 'b'],
      ['b', 'c'],
    ]);
  });

  it('should reject malformed pairs', () => {
    expect(() => collectLinkPairs('a', [])).toThrow('Expected "nodeA:nodeB", got "a".');
    expect(() => collectLinkPairs('a:b:c', [])).toThrow(InvalidArgumentError);
  });
});
