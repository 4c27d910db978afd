export class ScraperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The Reddit API could not be reached, answered with an error status,
 * or the requested subreddit does not exist.
 */
export class ApiError extends ScraperError {
  readonly status?: number;
  readonly source?: string;

  constructor(message: string, options: { status?: number; source?: string } = {}) {
    super(message);
    this.status = options.status;
    this.source = options.source;
  }
}

/** The request quota is exhausted. Never retried here. */
export class RateLimitError extends ScraperError {
  readonly resetAt?: Date;

  constructor(message: string, resetAt?: Date) {
    super(message);
    this.resetAt = resetAt;
  }
}

export class ValidationError extends ScraperError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
