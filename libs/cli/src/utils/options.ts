import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
