import { InvalidArgumentError } from 'commander';
import { cleanSubredditName } from './client/reddit.js';
import { SORT_ORDERS, TIME_FILTERS } from './types.js';
import type { OutputFormat, SortOrder, TimeFilter } from './types.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'compact', 'joined', 'summary'];

function pick<T extends string>(input: string, valid: readonly T[], label: string): T {
  const value = valid.find(v => v === input.trim().toLowerCase());
  if (!value) {
    throw new InvalidArgumentError(`Invalid ${label} "${input}". Choose from: ${valid.join(', ')}`);
  }
  return value;
}

/**
 * Split a comma-separated subreddit list, dropping "r/" prefixes,
 * blanks and case-insensitive duplicates. Order is kept.
 */
export function parseSources(input: string): string[] {
  const seen = new Set<string>();
  const sources: string[] = [];

  for (const raw of input.split(',')) {
    const name = cleanSubredditName(raw);
    if (!name || seen.has(name.toLowerCase())) continue;
    seen.add(name.toLowerCase());
    sources.push(name);
  }

  if (sources.length === 0) {
    throw new InvalidArgumentError('At least one source is required');
  }
  return sources;
}

export function parseSortOrder(input: string): SortOrder {
  return pick(input, SORT_ORDERS, 'sort order');
}

export function parseTimeFilter(input: string): TimeFilter {
  return pick(input, TIME_FILTERS, 'time filter');
}

export function parseFormat(input: string): OutputFormat {
  return pick(input, OUTPUT_FORMATS, 'format');
}

export function parseLimit(input: string): number {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${input}"`);
  }
  return value;
}
