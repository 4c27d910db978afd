import { Scraper } from './scraper.js';
import type { ScraperOptions } from './scraper.js';
import type { ScraperConfigInput } from './config.js';
import type { MultiScrapeResult, ScrapeOptions } from './types.js';

// Re-export types and utilities
export { Scraper, DEFAULT_SCRAPE_OPTIONS, toPostRow, toCommentRow } from './scraper.js';
export type { ScraperOptions } from './scraper.js';
export { RedditClient, cleanSubredditName } from './client/reddit.js';
export type { RedditApi, RedditClientOptions, RedditPostData, RedditCommentData, SearchParams } from './client/reddit.js';
export { ScraperError, ApiError, RateLimitError, ValidationError } from './errors.js';
export { parseConfig, loadConfigFromEnv, DEFAULT_USER_AGENT } from './config.js';
export type { ScraperConfig, ScraperConfigInput } from './config.js';
export { flattenHistory, joinComments, buildNetwork } from './tables.js';
export { formatOutput } from './formatters/output.js';
export { DEFAULT_SOURCES } from './sources.js';
export { SORT_ORDERS, TIME_FILTERS } from './types.js';
export type {
  SortOrder,
  TimeFilter,
  OutputFormat,
  OnSourceError,
  ScrapeOptions,
  PostRow,
  CommentRow,
  ScrapeResult,
  SourceSummary,
  MultiScrapeResult,
  JoinedRow,
  Network,
  NetworkNode,
  NetworkEdge,
  ScrapeHistory,
} from './types.js';

/**
 * One-shot search across several subreddits with a throwaway Scraper.
 * This is the primary entry point for programmatic usage.
 */
export async function collect(
  config: ScraperConfigInput,
  sources: string[],
  search: string,
  options: ScrapeOptions = {},
  scraperOptions: ScraperOptions = {},
): Promise<MultiScrapeResult> {
  const scraper = new Scraper(config, scraperOptions);
  return scraper.multiScrape(sources, search, options);
}
