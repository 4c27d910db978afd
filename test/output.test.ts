import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatOutput } from '../src/formatters/output.js';
import type { MultiScrapeResult } from '../src/types.js';
import { makeCommentRow, makePostRow } from './helpers.js';

function makeResult(): MultiScrapeResult {
  return {
    query: 'VAR',
    posts: [
      makePostRow({ postId: 'p1', author: 'alice', score: 120 }),
      makePostRow({
        postId: 'p2',
        author: 'carol',
        score: 300,
        title: 'Another VAR row',
        createdAt: new Date('2025-06-14T09:00:00Z'),
      }),
    ],
    comments: [
      makeCommentRow({ postId: 'p1', commentId: 'c1' }),
      makeCommentRow({ postId: 'p1', commentId: 'c2', author: 'dave' }),
    ],
    sources: [
      { name: 'PremierLeague', postCount: 2, commentCount: 2 },
      { name: 'soccer', postCount: 0, commentCount: 0, error: 'r/soccer was not found' },
    ],
  };
}

describe('formatOutput', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('json', () => {
    it('outputs posts and comments with ISO dates', () => {
      const parsed = JSON.parse(formatOutput(makeResult(), 'json'));

      expect(parsed.posts).toHaveLength(2);
      expect(parsed.comments).toHaveLength(2);
      expect(parsed.posts[0].createdAt).toBe('2025-06-15T12:00:00.000Z');
      expect(parsed.comments[1].author).toBe('dave');
    });
  });

  describe('compact', () => {
    it('outputs a single line with meta', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-06-15T13:00:00Z'));

      const output = formatOutput(makeResult(), 'compact');
      const parsed = JSON.parse(output);

      expect(output).not.toContain('\n');
      expect(parsed.meta).toEqual({
        query: 'VAR',
        sources: [
          { name: 'PremierLeague', postCount: 2, commentCount: 2 },
          { name: 'soccer', postCount: 0, commentCount: 0, error: 'r/soccer was not found' },
        ],
        totalPosts: 2,
        totalComments: 2,
        fetchedAt: '2025-06-15T13:00:00.000Z',
      });
    });
  });

  describe('joined', () => {
    it('outputs one row per comment', () => {
      const rows = JSON.parse(formatOutput(makeResult(), 'joined'));

      expect(rows).toHaveLength(2);
      expect(rows[0].postAuthor).toBe('alice');
      expect(rows[1].commentAuthor).toBe('dave');
    });
  });

  describe('summary', () => {
    it('shows totals and per-source counts', () => {
      const lines = formatOutput(makeResult(), 'summary').split('\n');

      expect(lines[0]).toBe('📊 Subreddit Scrape Summary');
      expect(lines[2]).toBe('Query: "VAR"');
      expect(lines[3]).toBe('Total: 2 posts · 2 comments');
      expect(lines[5]).toBe('r/PremierLeague: 2 posts · 2 comments');
      expect(lines[6]).toBe('⚠️  r/soccer: failed (r/soccer was not found)');
    });

    it('does not repeat an r/ prefix the caller passed in the source name', () => {
      const result = makeResult();
      result.sources[0] = { name: 'r/PremierLeague', postCount: 2, commentCount: 2 };

      const lines = formatOutput(result, 'summary').split('\n');

      expect(lines[5]).toBe('r/PremierLeague: 2 posts · 2 comments');
    });

    it('lists posts by score with collected comment counts', () => {
      const lines = formatOutput(makeResult(), 'summary').split('\n');

      expect(lines.slice(11)).toEqual([
        '1. r/PremierLeague · u/carol · ⬆️ 300',
        '   "Another VAR row"',
        '   💬 0 comments collected · 2025-06-14',
        '',
        '2. r/PremierLeague · u/alice · ⬆️ 120',
        '   "VAR decision at the weekend"',
        '   💬 2 comments collected · 2025-06-15',
        '',
      ]);
    });

    it('says so when nothing was found', () => {
      const output = formatOutput({ query: 'VAR', posts: [], comments: [], sources: [] }, 'summary');

      expect(output.endsWith('\nNo posts found matching your criteria.')).toBe(true);
    });

    it('truncates long titles', () => {
      const result = makeResult();
      result.posts = [makePostRow({ title: 'x'.repeat(250) })];

      const output = formatOutput(result, 'summary');

      expect(output).toContain(`   "${'x'.repeat(200)}..."`);
    });
  });
});
