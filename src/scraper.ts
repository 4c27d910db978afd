import { RedditClient, cleanSubredditName } from './client/reddit.js';
import type { RedditApi, RedditCommentData, RedditPostData } from './client/reddit.js';
import { parseConfig } from './config.js';
import type { ScraperConfigInput } from './config.js';
import { ScraperError, ValidationError, errorMessage } from './errors.js';
import { buildNetwork, flattenHistory, joinComments } from './tables.js';
import { logger as rootLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';
import {
  SORT_ORDERS,
  TIME_FILTERS,
} from './types.js';
import type {
  CommentRow,
  JoinedRow,
  MultiScrapeResult,
  Network,
  OnSourceError,
  PostRow,
  ScrapeHistory,
  ScrapeOptions,
  ScrapeResult,
  SourceSummary,
} from './types.js';

const UNKNOWN_AUTHOR = 'unknown_author';

export const DEFAULT_SCRAPE_OPTIONS: Required<ScrapeOptions> = {
  postLimit: 50,
  sort: 'top',
  timeFilter: 'all',
  getComments: true,
  commentLimit: 10,
};

export interface ScraperOptions {
  /** Defaults to a RedditClient built from the config. */
  client?: RedditApi;
  /** What multiScrape does when one source fails. Defaults to 'fail-fast'. */
  onSourceError?: OnSourceError;
  logger?: Logger;
}

export function toPostRow(source: string, query: string, post: RedditPostData): PostRow {
  return {
    source,
    query,
    postId: post.id,
    title: post.title,
    body: post.selftext,
    author: post.author || UNKNOWN_AUTHOR,
    authorFlair: post.author_flair_text ?? null,
    score: post.score,
    upvoteRatio: post.upvote_ratio,
    numComments: post.num_comments,
    createdAt: new Date(post.created_utc * 1000),
    url: `https://www.reddit.com${post.permalink}`,
  };
}

export function toCommentRow(source: string, postId: string, comment: RedditCommentData): CommentRow {
  return {
    source,
    postId,
    commentId: comment.id,
    body: comment.body,
    author: comment.author || UNKNOWN_AUTHOR,
    score: comment.score,
    createdAt: new Date(comment.created_utc * 1000),
  };
}

function resolveOptions(options: ScrapeOptions): Required<ScrapeOptions> {
  const resolved: Required<ScrapeOptions> = {
    postLimit: options.postLimit ?? DEFAULT_SCRAPE_OPTIONS.postLimit,
    sort: options.sort ?? DEFAULT_SCRAPE_OPTIONS.sort,
    timeFilter: options.timeFilter ?? DEFAULT_SCRAPE_OPTIONS.timeFilter,
    getComments: options.getComments ?? DEFAULT_SCRAPE_OPTIONS.getComments,
    commentLimit: options.commentLimit ?? DEFAULT_SCRAPE_OPTIONS.commentLimit,
  };

  if (!Number.isInteger(resolved.postLimit) || resolved.postLimit < 1) {
    throw new ValidationError(`postLimit must be a positive integer, got ${resolved.postLimit}`);
  }
  if (!SORT_ORDERS.includes(resolved.sort)) {
    throw new ValidationError(`sort must be one of ${SORT_ORDERS.join(', ')}`);
  }
  if (!TIME_FILTERS.includes(resolved.timeFilter)) {
    throw new ValidationError(`timeFilter must be one of ${TIME_FILTERS.join(', ')}`);
  }
  if (typeof resolved.getComments !== 'boolean') {
    throw new ValidationError('getComments must be a boolean');
  }
  if (!Number.isInteger(resolved.commentLimit) || resolved.commentLimit < 0) {
    throw new ValidationError(`commentLimit must be a non-negative integer, got ${resolved.commentLimit}`);
  }

  return resolved;
}

/**
 * Searches subreddits for a phrase and collects matching posts and,
 * optionally, their top-level comments as flat rows.
 *
 * Rows are labelled with the source exactly as the caller passed it; the
 * "r/" prefix is only dropped for the API call. Every successful scrape is
 * also copied into `scrapedData` so the accumulated history can be reshaped
 * with `tables()`, `joined()` and `network()`.
 */
export class Scraper {
  readonly scrapedData: ScrapeHistory = new Map();
  private readonly client: RedditApi;
  private readonly onSourceError: OnSourceError;
  private readonly log: Logger;

  constructor(config: ScraperConfigInput, options: ScraperOptions = {}) {
    const parsed = parseConfig(config);
    this.client = options.client ?? new RedditClient(parsed);
    this.onSourceError = options.onSourceError ?? 'fail-fast';
    this.log = options.logger ?? rootLogger;
  }

  async scrape(source: string, search: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    const subreddit = cleanSubredditName(source);
    if (!subreddit) {
      throw new ValidationError('source must be a non-empty subreddit name');
    }
    if (!search.trim()) {
      throw new ValidationError('search must be a non-empty string');
    }
    const opts = resolveOptions(options);
    const log = this.log.child({ source: subreddit });

    log.debug({ search, sort: opts.sort, timeFilter: opts.timeFilter, postLimit: opts.postLimit }, 'searching');

    const found = await this.client.searchPosts(subreddit, search, {
      sort: opts.sort,
      timeFilter: opts.timeFilter,
      limit: opts.postLimit,
    });

    const posts = found.slice(0, opts.postLimit).map(post => toPostRow(source, search, post));
    const comments: CommentRow[] = [];

    if (opts.getComments) {
      for (const post of posts) {
        const fetched = await this.client.fetchComments(post.postId, opts.commentLimit);
        for (const comment of fetched.slice(0, opts.commentLimit)) {
          comments.push(toCommentRow(source, post.postId, comment));
        }
      }
    }

    const result: ScrapeResult = { source, query: search, posts, comments };
    this.remember(result);

    log.info({ posts: posts.length, comments: comments.length }, 'scraped');
    return result;
  }

  async multiScrape(sources: string[], search: string, options: ScrapeOptions = {}): Promise<MultiScrapeResult> {
    if (sources.length === 0) {
      throw new ValidationError('Cannot scrape: no source was specified');
    }

    const combined: MultiScrapeResult = { query: search, posts: [], comments: [], sources: [] };

    for (const source of sources) {
      let result: ScrapeResult;
      try {
        result = await this.scrape(source, search, options);
      } catch (error) {
        if (this.onSourceError === 'fail-fast' || error instanceof ValidationError) {
          throw error;
        }
        const message = errorMessage(error);
        this.log.warn({ source, err: error }, 'source failed, continuing');
        combined.sources.push({
          name: source,
          postCount: 0,
          commentCount: 0,
          error: message,
        });
        continue;
      }

      combined.posts.push(...result.posts);
      combined.comments.push(...result.comments);
      combined.sources.push(summarize(result));
    }

    return combined;
  }

  /** All scraped posts and comments, in the order they were scraped. */
  tables(): { posts: PostRow[]; comments: CommentRow[] } {
    if (this.scrapedData.size === 0) {
      throw new ScraperError('No data has been scraped');
    }
    return flattenHistory(this.scrapedData);
  }

  joined(): JoinedRow[] {
    const { posts, comments } = this.tables();
    return joinComments(posts, comments);
  }

  network(): Network {
    return buildNetwork(this.joined());
  }

  private remember(result: ScrapeResult): void {
    let byQuery = this.scrapedData.get(result.source);
    if (!byQuery) {
      byQuery = new Map();
      this.scrapedData.set(result.source, byQuery);
    }
    byQuery.set(result.query, { ...result, posts: [...result.posts], comments: [...result.comments] });
  }
}

export function summarize(result: ScrapeResult): SourceSummary {
  return {
    name: result.source,
    postCount: result.posts.length,
    commentCount: result.comments.length,
  };
}
