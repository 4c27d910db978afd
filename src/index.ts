#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { loadConfigFromEnv } from './config.js';
import { errorMessage } from './errors.js';
import { formatOutput } from './formatters/output.js';
import {
  parseFormat,
  parseLimit,
  parseSortOrder,
  parseSources,
  parseTimeFilter,
} from './pipeline.js';
import { Scraper } from './scraper.js';
import { DEFAULT_SOURCES } from './sources.js';
import type { OutputFormat, SortOrder, TimeFilter } from './types.js';

interface ScrapeCommandOptions {
  sources: string[];
  sort: SortOrder;
  time: TimeFilter;
  limit: number;
  comments: boolean;
  commentLimit: number;
  format: OutputFormat;
  continueOnError: boolean;
}

const program = new Command();

program
  .name('subreddit-scraper')
  .description('Collect Reddit posts and comments matching a phrase across subreddits')
  .version('1.0.0');

program
  .command('scrape <search>')
  .description('Search subreddits for a phrase and collect matching posts and their top comments')
  .option('-s, --sources <sources>', 'Comma-separated list of subreddits', parseSources, DEFAULT_SOURCES)
  .option('-o, --sort <sort>', 'Sort order: relevance, hot, top, new, comments', parseSortOrder, 'top')
  .option('-t, --time <time>', 'Time filter: all, day, hour, month, week, year', parseTimeFilter, 'all')
  .option('-l, --limit <limit>', 'Maximum posts per subreddit', parseLimit, 50)
  .option('--no-comments', 'Skip fetching comments')
  .option('-c, --comment-limit <limit>', 'Maximum top-level comments per post', parseLimit, 10)
  .option('-f, --format <format>', 'Output format: json, compact, joined, summary', parseFormat, 'summary')
  .option('--continue-on-error', 'Keep going when a subreddit fails instead of stopping', false)
  .action(async (search: string, options: ScrapeCommandOptions) => {
    try {
      const scraper = new Scraper(loadConfigFromEnv(), {
        onSourceError: options.continueOnError ? 'continue' : 'fail-fast',
      });

      const targets = options.sources.map(s => `r/${s}`).join(', ');
      console.error(`\n🔍 Searching ${targets} for "${search}" (${options.sort}, ${options.time})...\n`);

      const result = await scraper.multiScrape(options.sources, search, {
        postLimit: options.limit,
        sort: options.sort,
        timeFilter: options.time,
        getComments: options.comments,
        commentLimit: options.commentLimit,
      });

      for (const source of result.sources) {
        if (source.error) {
          console.error(`⚠️  r/${source.name}: ${source.error}`);
        }
      }

      if (result.posts.length === 0) {
        console.error('No posts found. Try a different search phrase or subreddits.\n');
      }

      console.log(formatOutput(result, options.format));
    } catch (error) {
      console.error(`❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command('sources')
  .description('List the subreddits searched by default')
  .action(() => {
    for (const source of DEFAULT_SOURCES) {
      console.log(`r/${source}`);
    }
  });

await program.parseAsync();
