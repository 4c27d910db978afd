import { vi } from 'vitest';
import type { RedditApi, RedditCommentData, RedditPostData, SearchParams } from '../src/client/reddit.js';
import type { CommentRow, PostRow } from '../src/types.js';

export const TEST_CONFIG = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  userAgent: 'test-agent/1.0',
};

export function makeRedditPost(overrides: Partial<RedditPostData> = {}): RedditPostData {
  const id = overrides.id ?? 'p1';
  return {
    id,
    name: `t3_${id}`,
    subreddit: overrides.subreddit ?? 'PremierLeague',
    title: overrides.title ?? 'VAR decision at the weekend',
    selftext: overrides.selftext ?? 'Was it the right call?',
    author: overrides.author ?? 'alice',
    author_flair_text: overrides.author_flair_text ?? null,
    score: overrides.score ?? 120,
    upvote_ratio: overrides.upvote_ratio ?? 0.93,
    num_comments: overrides.num_comments ?? 42,
    created_utc: overrides.created_utc ?? 1750000000,
    permalink: overrides.permalink ?? `/r/PremierLeague/comments/${id}/var_decision/`,
  };
}

export function makeRedditComment(overrides: Partial<RedditCommentData> = {}): RedditCommentData {
  const id = overrides.id ?? 'c1';
  return {
    id,
    name: `t1_${id}`,
    link_id: overrides.link_id ?? 't3_p1',
    parent_id: overrides.parent_id ?? 't3_p1',
    body: overrides.body ?? 'Clear penalty',
    author: overrides.author ?? 'bob',
    score: overrides.score ?? 15,
    created_utc: overrides.created_utc ?? 1750000600,
  };
}

export function makePostRow(overrides: Partial<PostRow> = {}): PostRow {
  return {
    source: overrides.source ?? 'PremierLeague',
    query: overrides.query ?? 'VAR',
    postId: overrides.postId ?? 'p1',
    title: overrides.title ?? 'VAR decision at the weekend',
    body: overrides.body ?? '',
    author: overrides.author ?? 'alice',
    authorFlair: overrides.authorFlair ?? null,
    score: overrides.score ?? 120,
    upvoteRatio: overrides.upvoteRatio ?? 0.93,
    numComments: overrides.numComments ?? 42,
    createdAt: overrides.createdAt ?? new Date('2025-06-15T12:00:00Z'),
    url: overrides.url ?? 'https://www.reddit.com/r/PremierLeague/comments/p1/var_decision/',
  };
}

export function makeCommentRow(overrides: Partial<CommentRow> = {}): CommentRow {
  return {
    source: overrides.source ?? 'PremierLeague',
    postId: overrides.postId ?? 'p1',
    commentId: overrides.commentId ?? 'c1',
    body: overrides.body ?? 'Clear penalty',
    author: overrides.author ?? 'bob',
    score: overrides.score ?? 15,
    createdAt: overrides.createdAt ?? new Date('2025-06-15T12:10:00Z'),
  };
}

export function listing<T>(kind: string, items: T[], after: string | null = null) {
  return {
    kind: 'Listing',
    data: {
      after,
      children: items.map(data => ({ kind, data })),
    },
  };
}

export function jsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

/**
 * In-memory RedditApi: posts per subreddit and comments per post id.
 * Unknown subreddits reject with whatever `missing` builds.
 */
export class FakeRedditApi implements RedditApi {
  readonly searchPosts = vi.fn(async (subreddit: string, _query: string, params: SearchParams) => {
    const failure = this.failures.get(subreddit);
    if (failure) throw failure;
    const posts = this.posts.get(subreddit);
    if (!posts) throw this.missing(subreddit);
    return posts.slice(0, params.limit);
  });

  readonly fetchComments = vi.fn(async (postId: string, limit: number) => {
    return (this.comments.get(postId) ?? []).slice(0, limit);
  });

  private readonly failures = new Map<string, Error>();

  constructor(
    private readonly posts: Map<string, RedditPostData[]>,
    private readonly comments: Map<string, RedditCommentData[]> = new Map(),
    private readonly missing: (subreddit: string) => Error = s => new Error(`unknown subreddit ${s}`),
  ) {}

  failWith(subreddit: string, error: Error): void {
    this.failures.set(subreddit, error);
  }
}
