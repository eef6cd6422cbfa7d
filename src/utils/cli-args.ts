/**
 * Commander argument parsers. Each rejects malformed input with an
 * InvalidArgumentError so commander reports it and exits.
 */

import { InvalidArgumentError } from 'commander';

const INTEGER = /^-?\d+$/;
const DECIMAL = /^-?(\d+(\.\d*)?|\.\d+)$/;

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseCount(value: string): number {
  const count = parseInteger(value);
  if (count < 1) {
    throw new InvalidArgumentError(`Expected at least 1, got ${count}.`);
  }
  return count;
}

export function parseDecimal(value: string): number {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return Number.parseFloat(trimmed);
}

export function collectLinkPairs(
  value: string,
  previous: Array<[string, string]>
): Array<[string, string]> {
  const [a, b, ...rest] = value.split(':');
  if (a === undefined || b === undefined || a === '' || b === '' || rest.length > 0) {
    throw new InvalidArgumentError(`Expected "nodeA:nodeB", got "${value}".`);
  }
  return [...previous, [a, b]];
}
