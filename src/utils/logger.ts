import pino from 'pino';

export type { Logger } from 'pino';

const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

// stdout carries scrape results, so logs go to stderr
export const logger = pino(
  {
    name: 'subreddit-scraper',
    level: process.env.LOG_LEVEL || defaultLevel,
  },
  pino.destination({ dest: 2, sync: true }),
);
