import { InvalidArgumentError } from 'commander';

/** commander argParser for options that must be a positive integer. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parsePort(value: string): number {
  const port = parsePositiveInt(value);
  if (port > 65535) {
    throw new InvalidArgumentError('Must be between 1 and 65535.');
  }
  return port;
}
