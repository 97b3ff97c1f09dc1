import { logger } from '../../shared/logger';
import { CrawlRunner, type CrawlSummary } from './core/CrawlRunner';
import type { ResolvedCrawlConfig } from './core/options';
import type { SiteDefinition } from './core/types';
import { formatDuration } from './crawlerUtils';
import { BrowserSession } from './session/BrowserSession';
import { CsvRecordWriter } from './writers/CsvRecordWriter';

/**
 * Wire a runner to a real browser and a CSV sink
 */
export function createCrawlRunner(
  site: SiteDefinition,
  config: ResolvedCrawlConfig
): CrawlRunner {
  return new CrawlRunner({
    site,
    options: config.crawl,
    openSession: () => BrowserSession.open(config.session, site.documentHeaders),
    writer: new CsvRecordWriter(config.outputPath),
  });
}

export function logCrawlSummary(
  summary: CrawlSummary,
  outputPath: string
): void {
  logger.info('='.repeat(50));
  logger.info('📊 CRAWL SUMMARY');
  logger.info(`👀 Visited: ${summary.visited} items`);
  logger.info(`✅ Written: ${summary.written} records`);
  logger.info(`⏭️  Skipped: ${summary.skipped} items`);
  for (const failure of summary.failures) {
    logger.info(`   #${failure.order} [${failure.kind}] ${failure.url}`);
  }
  logger.info(`⏱️  Total time: ${formatDuration(summary.durationMs)}`);
  if (summary.stopped) {
    logger.info('🛑 Stopped before all items were visited');
  }
  if (summary.written > 0) {
    logger.info(`💾 Saved to ${outputPath}`);
  } else {
    logger.warn('No records extracted');
  }
}
