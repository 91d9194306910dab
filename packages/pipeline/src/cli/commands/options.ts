import { InvalidArgumentError } from 'commander';
import { parseTimestamp } from '../../core/utils/dates.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseAsOf(value: string): string {
  const parsed = parseTimestamp(value);
  if (parsed === null) {
    throw new InvalidArgumentError('Expected an ISO 8601 timestamp.');
  }
  return parsed.toISOString();
}
