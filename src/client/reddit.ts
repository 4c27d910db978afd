import type { ScraperConfig } from '../config.js';
import { ApiError, RateLimitError, ScraperError, errorMessage } from '../errors.js';
import type { SortOrder, TimeFilter } from '../types.js';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const API_BASE = 'https://oauth.reddit.com';

// Reddit never returns more than 100 items per listing page
const MAX_PAGE_SIZE = 100;

// Refresh the bearer token a minute before Reddit expires it
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const DEFAULT_TIMEOUT_MS = 10_000;

export interface RedditPostData {
  id: string;
  name: string;
  subreddit: string;
  title: string;
  selftext: string;
  author: string;
  author_flair_text: string | null;
  score: number;
  upvote_ratio: number;
  num_comments: number;
  created_utc: number;
  permalink: string;
}

export interface RedditCommentData {
  id: string;
  name: string;
  link_id: string;
  parent_id: string;
  body: string;
  author: string;
  score: number;
  created_utc: number;
}

interface RedditThing<K extends string, T> {
  kind: K;
  data: T;
}

interface RedditListing<C> {
  kind: 'Listing';
  data: {
    after: string | null;
    children: C[];
  };
}

type PostChild = RedditThing<'t3', RedditPostData>;
type CommentChild =
  | RedditThing<'t1', RedditCommentData>
  | RedditThing<'more', { count: number; children: string[] }>;

interface TokenResponse {
  access_token?: string;
  expires_in?: number;
  error?: string;
}

export interface SearchParams {
  sort: SortOrder;
  timeFilter: TimeFilter;
  limit: number;
}

/**
 * The two calls the scraper needs from Reddit.
 */
export interface RedditApi {
  searchPosts(subreddit: string, query: string, params: SearchParams): Promise<RedditPostData[]>;
  fetchComments(postId: string, limit: number): Promise<RedditCommentData[]>;
}

export interface RedditClientOptions {
  timeoutMs?: number;
}

/**
 * Strip an "r/" prefix and surrounding whitespace from a subreddit name.
 */
export function cleanSubredditName(subreddit: string): string {
  return subreddit.trim().replace(/^\/?r\//i, '');
}

/**
 * Application-only OAuth client for the Reddit API.
 * Nothing is retried: failures surface as ApiError or RateLimitError.
 */
export class RedditClient implements RedditApi {
  private readonly timeoutMs: number;
  private token: { value: string; expiresAt: number } | null = null;
  private quota: { remaining: number; resetAt: number } | null = null;

  constructor(
    private readonly config: ScraperConfig,
    options: RedditClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async searchPosts(subreddit: string, query: string, params: SearchParams): Promise<RedditPostData[]> {
    const name = cleanSubredditName(subreddit);
    const posts: RedditPostData[] = [];
    let after: string | null = null;

    while (posts.length < params.limit) {
      const search = new URLSearchParams({
        q: query,
        restrict_sr: '1',
        sort: params.sort,
        t: params.timeFilter,
        limit: String(Math.min(params.limit - posts.length, MAX_PAGE_SIZE)),
        raw_json: '1',
      });
      if (after) search.set('after', after);

      const listing = await this.get<RedditListing<PostChild>>(
        `/r/${encodeURIComponent(name)}/search?${search}`,
        name,
      );
      const children = listing.data?.children ?? [];

      for (const child of children) {
        if (child.kind === 't3') posts.push(child.data);
      }

      after = listing.data?.after ?? null;
      if (!after || children.length === 0) break;
    }

    return posts.slice(0, params.limit);
  }

  async fetchComments(postId: string, limit: number): Promise<RedditCommentData[]> {
    if (limit <= 0) return [];

    const id = postId.replace(/^t3_/, '');
    const search = new URLSearchParams({
      sort: 'top',
      depth: '1',
      limit: String(limit),
      raw_json: '1',
    });

    // The comments endpoint answers with [post listing, comment listing]
    const body = await this.get<[RedditListing<PostChild>, RedditListing<CommentChild>]>(
      `/comments/${encodeURIComponent(id)}?${search}`,
    );
    if (!Array.isArray(body)) {
      throw new ApiError(`Reddit API returned an unexpected comments response for ${id}`, { status: 200 });
    }
    const [, comments] = body;

    const topLevel: RedditCommentData[] = [];
    for (const child of comments?.data?.children ?? []) {
      if (child.kind === 't1') topLevel.push(child.data);
    }
    return topLevel.slice(0, limit);
  }

  private async get<T>(path: string, source?: string): Promise<T> {
    this.checkQuota();
    const accessToken = await this.getAccessToken();

    return this.request(`${API_BASE}${path}`, {
      headers: {
        'Accept': 'application/json',
        'Authorization': `Bearer ${accessToken}`,
        'User-Agent': this.config.userAgent,
      },
      // Reddit redirects unknown subreddits to its subreddit search page
      redirect: 'manual',
    }, async response => {
      this.updateQuota(response.headers);

      if (response.status === 429) {
        throw this.rateLimitError(response.headers);
      }
      if (response.status >= 300 && response.status < 400) {
        throw new ApiError(`r/${source ?? path} does not exist`, { status: response.status, source });
      }
      if (response.status === 404) {
        throw new ApiError(source ? `r/${source} was not found` : `Reddit API: not found (${path})`, {
          status: 404,
          source,
        });
      }
      if (response.status === 403) {
        throw new ApiError(`r/${source ?? path} is private, quarantined or banned`, { status: 403, source });
      }
      if (!response.ok) {
        throw new ApiError(`Reddit API: ${response.status}`, { status: response.status, source });
      }

      return await response.json() as T;
    }, source);
  }

  private async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const credentials = Buffer
      .from(`${this.config.clientId}:${this.config.clientSecret}`)
      .toString('base64');

    const data = await this.request(TOKEN_URL, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': this.config.userAgent,
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    }, async response => {
      if (response.status === 429) {
        throw this.rateLimitError(response.headers);
      }
      if (!response.ok) {
        throw new ApiError(`Reddit auth failed: ${response.status}`, { status: response.status });
      }
      return await response.json() as TokenResponse;
    });

    if (!data.access_token) {
      throw new ApiError(`Reddit auth failed: ${data.error ?? 'no access token returned'}`);
    }

    const lifetimeMs = (data.expires_in ?? 3600) * 1000;
    this.token = {
      value: data.access_token,
      expiresAt: Date.now() + lifetimeMs - TOKEN_EXPIRY_MARGIN_MS,
    };
    return data.access_token;
  }

  /**
   * Send a request and read its response under one timeout, so a body that
   * stalls after the headers still aborts.
   */
  private async request<T>(
    url: string,
    init: RequestInit,
    read: (response: Response) => Promise<T>,
    source?: string,
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let status: number | undefined;

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      status = response.status;
      return await read(response);
    } catch (error) {
      if (error instanceof ScraperError) throw error;
      if (controller.signal.aborted) {
        throw new ApiError(`Reddit API request failed: timed out after ${this.timeoutMs}ms`, { status, source });
      }
      if (status !== undefined) {
        throw new ApiError(`Reddit API returned an unreadable response: ${errorMessage(error)}`, { status, source });
      }
      throw new ApiError(`Reddit API request failed: ${errorMessage(error)}`, { source });
    } finally {
      clearTimeout(timeout);
    }
  }

  private checkQuota(): void {
    if (!this.quota) return;
    const { remaining, resetAt } = this.quota;
    if (remaining < 1 && Date.now() < resetAt) {
      const reset = new Date(resetAt);
      throw new RateLimitError(`Reddit API quota exhausted until ${reset.toISOString()}`, reset);
    }
  }

  private updateQuota(headers: Headers): void {
    const remaining = Number.parseFloat(headers.get('x-ratelimit-remaining') ?? '');
    const resetSeconds = Number.parseInt(headers.get('x-ratelimit-reset') ?? '', 10);
    if (Number.isNaN(remaining) || Number.isNaN(resetSeconds)) return;

    this.quota = {
      remaining,
      resetAt: Date.now() + resetSeconds * 1000,
    };
  }

  private rateLimitError(headers: Headers): RateLimitError {
    const retryAfter = Number.parseInt(headers.get('retry-after') ?? '', 10);
    if (!Number.isNaN(retryAfter)) {
      this.quota = { remaining: 0, resetAt: Date.now() + retryAfter * 1000 };
    } else if (this.quota) {
      this.quota = { ...this.quota, remaining: 0 };
    }

    const resetAt = this.quota ? new Date(this.quota.resetAt) : undefined;
    const until = resetAt ? ` until ${resetAt.toISOString()}` : '';
    return new RateLimitError(`Reddit API rate limit exceeded${until}`, resetAt);
  }
}
