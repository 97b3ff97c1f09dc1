export { CrawlRunner, type CrawlRunnerDeps } from './CrawlRunner';
export * from './errors';
export {
  type CrawlOverrides,
  getTestModeConfig,
  type ResolvedCrawlConfig,
  resolveCrawlConfig,
} from './options';
export * from './result';
export { retryDelay, type RetryOptions, withRetry } from './retry';
export {
  defineSite,
  getRegisteredSites,
  getSite,
  hasSite,
  registerSite,
} from './SiteRegistry';
export * from './types';
