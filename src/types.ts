export type SortOrder = 'relevance' | 'hot' | 'top' | 'new' | 'comments';
export type TimeFilter = 'all' | 'day' | 'hour' | 'month' | 'week' | 'year';
export type OutputFormat = 'json' | 'compact' | 'joined' | 'summary';
export type OnSourceError = 'fail-fast' | 'continue';

export const SORT_ORDERS: readonly SortOrder[] = ['relevance', 'hot', 'top', 'new', 'comments'];
export const TIME_FILTERS: readonly TimeFilter[] = ['all', 'day', 'hour', 'month', 'week', 'year'];

export interface ScrapeOptions {
  postLimit?: number;
  sort?: SortOrder;
  timeFilter?: TimeFilter;
  getComments?: boolean;
  commentLimit?: number;
}

export interface PostRow {
  source: string;
  query: string;
  postId: string;
  title: string;
  body: string;
  author: string;
  authorFlair: string | null;
  score: number;
  upvoteRatio: number;
  numComments: number;
  createdAt: Date;
  url: string;
}

export interface CommentRow {
  source: string;
  postId: string;
  commentId: string;
  body: string;
  author: string;
  score: number;
  createdAt: Date;
}

export interface ScrapeResult {
  source: string;
  query: string;
  posts: PostRow[];
  comments: CommentRow[];
}

export interface SourceSummary {
  name: string;
  postCount: number;
  commentCount: number;
  error?: string;
}

export interface MultiScrapeResult {
  query: string;
  posts: PostRow[];
  comments: CommentRow[];
  sources: SourceSummary[];
}

/** A comment row widened with the fields of the post it replies to. */
export interface JoinedRow extends Omit<PostRow, 'author' | 'score' | 'createdAt'> {
  postAuthor: string;
  postScore: number;
  postCreatedAt: Date;
  commentId: string;
  commentBody: string;
  commentAuthor: string;
  commentScore: number;
  commentCreatedAt: Date;
}

export interface NetworkNode {
  id: string;
}

export interface NetworkEdge {
  source: string;
  target: string;
  postId: string;
  commentId: string;
  score: number;
}

export interface Network {
  nodes: NetworkNode[];
  edges: NetworkEdge[];
}

/** Scrape history keyed by source, then by search query. */
export type ScrapeHistory = Map<string, Map<string, ScrapeResult>>;
