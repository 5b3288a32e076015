import { InvalidArgumentError } from 'commander';
import { SEARCH_MODES, type SearchMode } from '@/lib/core/types';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

export function parseScore(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

export function parseSearchMode(value: string): SearchMode {
  const mode = SEARCH_MODES.find((m) => m === value.trim().toLowerCase());
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of: ${SEARCH_MODES.join(', ')}.`);
  }
  return mode;
}

/** Comma-separated list, blanks dropped */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
