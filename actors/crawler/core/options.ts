import path from 'node:path';
import { ConfigError, type CrawlerEnv } from '../../../shared/config';
import { defaultOutputPath } from '../crawlerUtils';
import {
  type CrawlMode,
  type CrawlOptions,
  DEFAULT_MAX_ITEMS,
  DEFAULT_RETRY_POLICY,
  DEFAULT_SCROLL_OPTIONS,
  DEFAULT_SESSION_OPTIONS,
  type SessionOptions,
  type SiteDefinition,
  type TestModeConfig,
} from './types';

/** Values given on the command line; they win over the environment */
export interface CrawlOverrides {
  mode?: CrawlMode;
  startUrls?: string[];
  output?: string;
  maxItems?: number;
  headless?: boolean;
  testMode?: boolean;
}

export interface ResolvedCrawlConfig {
  crawl: CrawlOptions;
  session: SessionOptions;
  outputPath: string;
  testMode: TestModeConfig;
}

export function getTestModeConfig(
  env: CrawlerEnv,
  overrides: CrawlOverrides = {}
): TestModeConfig {
  const enabled = overrides.testMode ?? env.CRAWLER_TEST_MODE;
  return {
    enabled,
    maxItems: enabled ? env.CRAWLER_TEST_MAX_ITEMS : Number.POSITIVE_INFINITY,
  };
}

function resolveStartUrls(
  site: SiteDefinition,
  mode: CrawlMode,
  candidates: string[]
): string[] {
  if (candidates.length > 0) {
    return candidates;
  }
  if (mode === 'feed') {
    return [site.config.startUrl];
  }
  throw new ConfigError([`mode '${mode}' needs at least one start URL`]);
}

export function resolveCrawlConfig(
  site: SiteDefinition,
  env: CrawlerEnv,
  overrides: CrawlOverrides = {},
  now = new Date()
): ResolvedCrawlConfig {
  const testMode = getTestModeConfig(env, overrides);
  const mode = overrides.mode ?? env.CRAWLER_MODE ?? site.defaultMode;

  const cliUrls = overrides.startUrls ?? [];
  const startUrls = resolveStartUrls(
    site,
    mode,
    cliUrls.length > 0 ? cliUrls : env.CRAWLER_START_URLS
  );

  const requestedMax =
    overrides.maxItems ?? env.CRAWLER_MAX_ITEMS ?? DEFAULT_MAX_ITEMS;
  const maxItems = Math.min(requestedMax, testMode.maxItems);

  const baseSession = { ...DEFAULT_SESSION_OPTIONS, ...site.session };
  const session: SessionOptions = {
    ...baseSession,
    headless: overrides.headless ?? env.CRAWLER_HEADLESS,
    navigationTimeoutMs:
      env.CRAWLER_NAV_TIMEOUT_MS ?? baseSession.navigationTimeoutMs,
    itemTimeoutMs: env.CRAWLER_ITEM_TIMEOUT_MS ?? baseSession.itemTimeoutMs,
  };

  const output =
    overrides.output ??
    env.CRAWLER_OUTPUT ??
    defaultOutputPath(site.config.site, now);

  return {
    crawl: {
      mode,
      startUrls,
      maxItems,
      retry: {
        ...DEFAULT_RETRY_POLICY,
        maxAttempts: env.CRAWLER_MAX_ATTEMPTS ?? DEFAULT_RETRY_POLICY.maxAttempts,
        delayMs: env.CRAWLER_RETRY_DELAY_MS ?? DEFAULT_RETRY_POLICY.delayMs,
      },
      scroll: DEFAULT_SCROLL_OPTIONS,
    },
    session,
    outputPath: path.resolve(output),
    testMode,
  };
}
