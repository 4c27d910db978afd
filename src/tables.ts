import type {
  CommentRow,
  JoinedRow,
  Network,
  NetworkEdge,
  PostRow,
  ScrapeHistory,
} from './types.js';

export function flattenHistory(history: ScrapeHistory): { posts: PostRow[]; comments: CommentRow[] } {
  const posts: PostRow[] = [];
  const comments: CommentRow[] = [];

  for (const byQuery of history.values()) {
    for (const result of byQuery.values()) {
      posts.push(...result.posts);
      comments.push(...result.comments);
    }
  }

  return { posts, comments };
}

/**
 * One row per comment, carrying the fields of the post it belongs to.
 * Comments whose post is not in `posts` are dropped.
 */
export function joinComments(posts: PostRow[], comments: CommentRow[]): JoinedRow[] {
  // Keyed by source as well: the same post can match several queries or sources
  const postsByKey = new Map<string, PostRow>();
  for (const post of posts) {
    postsByKey.set(`${post.source}:${post.postId}`, post);
  }

  const rows: JoinedRow[] = [];
  for (const comment of comments) {
    const post = postsByKey.get(`${comment.source}:${comment.postId}`);
    if (!post) continue;

    rows.push({
      source: post.source,
      query: post.query,
      postId: post.postId,
      title: post.title,
      body: post.body,
      authorFlair: post.authorFlair,
      upvoteRatio: post.upvoteRatio,
      numComments: post.numComments,
      url: post.url,
      postAuthor: post.author,
      postScore: post.score,
      postCreatedAt: post.createdAt,
      commentId: comment.commentId,
      commentBody: comment.body,
      commentAuthor: comment.author,
      commentScore: comment.score,
      commentCreatedAt: comment.createdAt,
    });
  }

  return rows;
}

/**
 * Reshape joined rows into a reply network: every author is a node and every
 * comment is an edge from its author to the author of the post.
 */
export function buildNetwork(rows: JoinedRow[]): Network {
  const seen = new Set<string>();
  const nodes: Network['nodes'] = [];
  const addNode = (id: string) => {
    if (seen.has(id)) return;
    seen.add(id);
    nodes.push({ id });
  };

  for (const row of rows) addNode(row.postAuthor);
  for (const row of rows) addNode(row.commentAuthor);

  const edges: NetworkEdge[] = rows.map(row => ({
    source: row.commentAuthor,
    target: row.postAuthor,
    postId: row.postId,
    commentId: row.commentId,
    score: row.commentScore,
  }));

  return { nodes, edges };
}
