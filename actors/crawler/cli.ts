#!/usr/bin/env tsx
/**
 * Crawler CLI - Crawl short-form video metadata into a CSV file
 *
 * Usage:
 *   npm run crawl -- [site] [urls...] [options]
 *
 * Options:
 *   --mode=feed|urls|listing     Discovery strategy (urls when URLs are given)
 *   --output=PATH                CSV file to write
 *   --max-items=N                Stop after N items
 *   --headful                    Show the browser window
 *   --test                       Enable test mode (few items)
 *   --list                       List available sites
 *   --help                       Show this help message
 *
 * Examples:
 *   npm run crawl
 *   npm run crawl -- youtube-shorts --max-items=50
 *   npm run crawl -- https://www.youtube.com/shorts/abc123
 *   npm run crawl -- --mode=listing https://www.youtube.com/@channel/shorts
 */

import { ConfigError, loadCrawlerEnv } from '../../shared/config';
import { logger } from '../../shared/logger';

// Import sites to register them
import './crawlers';

import { type CliArgs, parseArgs, resolveTarget } from './cliArgs';
import {
  type CrawlOverrides,
  getRegisteredSites,
  getSite,
  hasSite,
  isRunError,
  resolveCrawlConfig,
} from './core';
import { createCrawlRunner, logCrawlSummary } from './crawl';

const DEFAULT_SITE = 'youtube-shorts';

// ================================================
// HELP TEXT
// ================================================

function printHelp(): void {
  logger.info(`
Crawler CLI - Crawl short-form video metadata into a CSV file

Usage:
  npm run crawl -- [site] [urls...] [options]

Options:
  --mode=feed|urls|listing     Discovery strategy (urls when URLs are given)
  --output=PATH                CSV file to write
  --max-items=N                Stop after N items
  --headful                    Show the browser window
  --test                       Enable test mode (few items)
  --list                       List available sites
  --help                       Show this help message

Examples:
  npm run crawl
  npm run crawl -- youtube-shorts --max-items=50
  npm run crawl -- https://www.youtube.com/shorts/abc123
  npm run crawl -- --mode=listing https://www.youtube.com/@channel/shorts
`);
}

// ================================================
// COMMANDS
// ================================================

function listSites(): void {
  const sites = getRegisteredSites();

  if (sites.length === 0) {
    logger.info('No sites registered.');
    return;
  }

  logger.info('Available sites:');
  for (const key of sites) {
    const site = getSite(key);
    logger.info(`  - ${key}${site ? ` (${site.config.name})` : ''}`);
  }
}

function toOverrides(args: CliArgs, urls: string[]): CrawlOverrides {
  return {
    mode: args.mode ?? (urls.length > 0 ? 'urls' : undefined),
    startUrls: urls,
    output: args.output,
    maxItems: args.maxItems,
    headless: args.headful ? false : undefined,
    testMode: args.test ? true : undefined,
  };
}

async function crawl(args: CliArgs): Promise<number> {
  const target = resolveTarget(args.positionals, hasSite, DEFAULT_SITE);
  const site = getSite(target.site);
  if (!site) {
    logger.error(`Site '${target.site}' not found`);
    logger.info(`Available sites: ${getRegisteredSites().join(', ')}`);
    return 1;
  }

  const invalidUrls = target.urls.filter((url) => !URL.canParse(url));
  if (invalidUrls.length > 0) {
    logger.error(`Not a site or URL: ${invalidUrls.join(', ')}`);
    return 1;
  }

  const config = resolveCrawlConfig(
    site,
    loadCrawlerEnv(),
    toOverrides(args, target.urls)
  );
  if (config.testMode.enabled) {
    logger.info(`🧪 Test mode: limiting items to ${config.crawl.maxItems}`);
  }

  const runner = createCrawlRunner(site, config);

  let interrupts = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    interrupts++;
    if (interrupts > 1) {
      logger.warn(`Received ${signal} again, exiting immediately`);
      process.exit(130);
    }
    logger.info(`🛑 Received ${signal}, shutting down gracefully...`);
    runner.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await runner.run();
    logCrawlSummary(summary, config.outputPath);
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

// ================================================
// MAIN
// ================================================

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.errors.length > 0) {
    for (const message of args.errors) {
      logger.error(message);
    }
    printHelp();
    return 1;
  }

  if (args.list) {
    listSites();
    return 0;
  }

  return crawl(args);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else if (isRunError(error)) {
      logger.fatal(`💥 Crawl aborted [${error.kind}]:`, error);
    } else {
      logger.fatal('CLI error:', error);
    }
    process.exitCode = 1;
  });
