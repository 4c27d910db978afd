import { z } from 'zod';
import { ValidationError } from './errors.js';

export const DEFAULT_USER_AGENT = 'Default Agent';

const configSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type ScraperConfig = z.infer<typeof configSchema>;
export type ScraperConfigInput = z.input<typeof configSchema>;

export function parseConfig(input: ScraperConfigInput): ScraperConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message).join(', ');
    throw new ValidationError(`Invalid scraper config: ${issues}`);
  }
  return parsed.data;
}

/**
 * Build a config from REDDIT_CLIENT_ID, REDDIT_CLIENT_SECRET and REDDIT_USER_AGENT.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  return parseConfig({
    clientId: env.REDDIT_CLIENT_ID ?? '',
    clientSecret: env.REDDIT_CLIENT_SECRET ?? '',
    userAgent: env.REDDIT_USER_AGENT || undefined,
  });
}
