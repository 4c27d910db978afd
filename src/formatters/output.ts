import { cleanSubredditName } from '../client/reddit.js';
import { joinComments } from '../tables.js';
import type { MultiScrapeResult, OutputFormat, PostRow } from '../types.js';

const TOP_POSTS = 10;
const TITLE_PREVIEW = 200;

export function formatOutput(result: MultiScrapeResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify({ posts: result.posts, comments: result.comments }, null, 2);
    case 'compact':
      return formatCompact(result);
    case 'joined':
      return JSON.stringify(joinComments(result.posts, result.comments), null, 2);
    case 'summary':
      return formatSummary(result);
  }
}

function formatCompact(result: MultiScrapeResult): string {
  return JSON.stringify({
    meta: {
      query: result.query,
      sources: result.sources,
      totalPosts: result.posts.length,
      totalComments: result.comments.length,
      fetchedAt: new Date().toISOString(),
    },
    posts: result.posts,
    comments: result.comments,
  });
}

function formatSummary(result: MultiScrapeResult): string {
  const lines: string[] = [
    `📊 Subreddit Scrape Summary`,
    `━━━━━━━━━━━━━━━━━━━━━━━━━━━━`,
    `Query: "${result.query}"`,
    `Total: ${result.posts.length} posts · ${result.comments.length} comments\n`,
  ];

  for (const source of result.sources) {
    if (source.error) {
      lines.push(`⚠️  r/${cleanSubredditName(source.name)}: failed (${source.error})`);
    } else {
      lines.push(`r/${cleanSubredditName(source.name)}: ${source.postCount} posts · ${source.commentCount} comments`);
    }
  }

  if (result.posts.length === 0) {
    lines.push('\nNo posts found matching your criteria.');
    return lines.join('\n');
  }

  const commentCounts = new Map<string, number>();
  for (const comment of result.comments) {
    const key = `${comment.source}:${comment.postId}`;
    commentCounts.set(key, (commentCounts.get(key) || 0) + 1);
  }

  lines.push(`\n🔥 Top Posts by Score:`);
  lines.push(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`);

  const top = sortByScore(result.posts).slice(0, TOP_POSTS);
  for (let i = 0; i < top.length; i++) {
    const post = top[i];
    const title = post.title.length > TITLE_PREVIEW
      ? post.title.slice(0, TITLE_PREVIEW) + '...'
      : post.title;
    const collected = commentCounts.get(`${post.source}:${post.postId}`) || 0;

    lines.push(`${i + 1}. r/${cleanSubredditName(post.source)} · u/${post.author} · ⬆️ ${post.score}`);
    lines.push(`   "${title.replace(/\n/g, ' ')}"`);
    lines.push(`   💬 ${collected} comments collected · ${post.createdAt.toISOString().slice(0, 10)}`);
    lines.push('');
  }

  return lines.join('\n');
}

function sortByScore(posts: PostRow[]): PostRow[] {
  return [...posts].sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    return b.createdAt.getTime() - a.createdAt.getTime();
  });
}
