import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({ path: '.env.local' });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

const urlList = z
  .string()
  .optional()
  .transform((value) =>
    value
      ? value
          .split(',')
          .map((url) => url.trim())
          .filter((url) => url.length > 0)
      : []
  )
  .pipe(z.array(z.string().url()));

export const crawlerEnvSchema = z.object({
  CRAWLER_MODE: z.enum(['feed', 'urls', 'listing']).optional(),
  CRAWLER_START_URLS: urlList,
  CRAWLER_OUTPUT: z.string().min(1).optional(),
  CRAWLER_MAX_ITEMS: positiveInt.optional(),
  CRAWLER_HEADLESS: booleanFlag.default('true'),
  CRAWLER_NAV_TIMEOUT_MS: positiveInt.optional(),
  CRAWLER_ITEM_TIMEOUT_MS: positiveInt.optional(),
  CRAWLER_MAX_ATTEMPTS: positiveInt.optional(),
  CRAWLER_RETRY_DELAY_MS: z.coerce.number().int().min(0).optional(),
  CRAWLER_TEST_MODE: booleanFlag.default('false'),
  CRAWLER_TEST_MAX_ITEMS: positiveInt.default(3),
});

export type CrawlerEnv = z.infer<typeof crawlerEnvSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid crawler configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Read `CRAWLER_*` variables. Throws ConfigError listing every invalid
 * variable.
 */
export function loadCrawlerEnv(
  env: Record<string, string | undefined> = process.env
): CrawlerEnv {
  const parsed = crawlerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
