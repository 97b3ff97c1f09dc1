import { logger } from '../../../shared/logger';
import { extractFields } from '../extractors';
import { normalizeFields } from '../normalizers/FieldNormalizer';
import { withBrowserSession } from '../session/BrowserSession';
import type { FeedSession } from '../session/FeedSession';
import { createStrategy } from '../strategies';
import type { DiscoveryStrategy, ItemTarget } from '../strategies/types';
import type { RecordWriter } from '../writers/RecordWriter';
import { failureKind, type FailureKind, isCrawlError, isRunError } from './errors';
import { unwrap } from './result';
import { withRetry } from './retry';
import type {
  CrawlOptions,
  PageSnapshot,
  SiteDefinition,
  VideoMetadataRecord,
} from './types';

// ================================================
// RUN TYPES
// ================================================

export type ItemStage = 'Pending' | 'Loaded' | 'Extracted' | 'Normalized' | 'Written';

export interface ItemFailure {
  order: number;
  url: string;
  kind: FailureKind;
  /** Last stage the item reached before failing */
  stage: ItemStage;
  message: string;
  attempts: number;
}

export type ItemOutcome =
  | { state: 'Written'; record: VideoMetadataRecord; attempts: number }
  | { state: 'Failed'; failure: ItemFailure };

export interface CrawlSummary {
  visited: number;
  written: number;
  skipped: number;
  failures: ItemFailure[];
  durationMs: number;
  /** True when stop() ended the run before discovery was exhausted */
  stopped: boolean;
}

export interface CrawlRunnerDeps {
  site: SiteDefinition;
  options: CrawlOptions;
  /** Called once per run; the runner closes what it returns */
  openSession: () => Promise<FeedSession>;
  writer: RecordWriter;
  /** Defaults to the strategy of `options.mode` */
  strategy?: DiscoveryStrategy;
  sleep?: (ms: number) => Promise<void>;
}

// ================================================
// RUNNER
// ================================================

/**
 * Drives one crawl: discovers items, loads, extracts, normalizes and
 * writes each in turn. Item failures are retried per the retry policy,
 * then skipped. WriteError and SessionStartupError end the run.
 */
export class CrawlRunner {
  private readonly strategy: DiscoveryStrategy;
  private stopRequested = false;

  constructor(private readonly deps: CrawlRunnerDeps) {
    this.strategy =
      deps.strategy ??
      createStrategy(
        deps.options.mode,
        { site: deps.site, options: deps.options },
        deps.sleep
      );
  }

  /**
   * Finish the current item, then end the run
   */
  stop(): void {
    if (!this.stopRequested) {
      logger.info('🛑 Stop requested, finishing current item...');
    }
    this.stopRequested = true;
  }

  async run(): Promise<CrawlSummary> {
    const { site, options, writer } = this.deps;
    const startedAt = Date.now();
    const summary: Omit<CrawlSummary, 'durationMs'> = {
      visited: 0,
      written: 0,
      skipped: 0,
      failures: [],
      stopped: false,
    };

    logger.info(`🚀 Starting ${site.config.name} crawler`, {
      mode: this.strategy.mode,
      startUrls: options.startUrls,
      maxItems: options.maxItems,
      output: writer.location,
    });

    try {
      await withBrowserSession(this.deps.openSession, async (session) => {
        for await (const target of this.strategy.items(session)) {
          if (this.stopRequested) {
            summary.stopped = true;
            break;
          }

          summary.visited++;
          const outcome = await this.processItem(session, target);
          if (outcome.state === 'Written') {
            summary.written++;
          } else {
            summary.skipped++;
            summary.failures.push(outcome.failure);
          }

          if (this.stopRequested) {
            summary.stopped = true;
            break;
          }
        }
      });
    } finally {
      await writer.close();
    }

    const result = { ...summary, durationMs: Date.now() - startedAt };
    logger.info(`✅ ${site.config.name} crawler completed`, {
      visited: result.visited,
      written: result.written,
      skipped: result.skipped,
    });
    return result;
  }

  // ================================================
  // PER-ITEM PIPELINE
  // ================================================

  private async takeSnapshot(session: FeedSession): Promise<PageSnapshot> {
    const url = session.currentUrl();
    const renderedHtml = await session.content();
    const documentHtml = await session.fetchDocument(url);
    return { url, renderedHtml, documentHtml };
  }

  /**
   * Pending → Loaded → Extracted → Normalized → Written, or Failed
   */
  private async processItem(
    session: FeedSession,
    target: ItemTarget
  ): Promise<ItemOutcome> {
    const { site, options, writer } = this.deps;
    const { retry } = options;
    const progress: { stage: ItemStage; attempts: number } = {
      stage: 'Pending',
      attempts: 0,
    };

    let record: VideoMetadataRecord;
    try {
      record = await withRetry(
        async (attempt) => {
          progress.attempts = attempt;
          progress.stage = 'Pending';
          await (attempt === 1 ? target.load() : target.reload());
          progress.stage = 'Loaded';

          const snapshot = await this.takeSnapshot(session);
          const fields = unwrap(
            extractFields(snapshot, site.fields, {
              scope: site.selectors.activeItem,
            })
          );
          progress.stage = 'Extracted';

          const normalized = unwrap(normalizeFields(fields));
          progress.stage = 'Normalized';
          return normalized;
        },
        {
          maxAttempts: retry.maxAttempts,
          delayMs: retry.delayMs,
          shouldRetry: (error) =>
            isCrawlError(error) && retry.retryOn.includes(error.kind),
          onRetry: (error, attempt, delayMs) =>
            logger.warn(
              `🔁 Item #${target.order} failed on attempt ${attempt}, retrying in ${delayMs}ms:`,
              error
            ),
          sleep: this.deps.sleep,
        }
      );
    } catch (error) {
      if (isRunError(error)) {
        throw error;
      }

      const failure: ItemFailure = {
        order: target.order,
        url: target.url ?? session.currentUrl(),
        kind: failureKind(error),
        stage: progress.stage,
        message: error instanceof Error ? error.message : String(error),
        attempts: progress.attempts,
      };
      logger.warn(`⏭️ Skipped item #${failure.order} [${failure.kind}] ${failure.url}`, {
        stage: failure.stage,
        attempts: failure.attempts,
        reason: failure.message,
      });
      return { state: 'Failed', failure };
    }

    await writer.write(record);
    logger.info(`✅ Extracted #${target.order}: ${record.title}`, {
      url: record.currentURL,
      userName: record.userName,
      viewCount: record.viewCount,
    });
    logger.debug('Record written', { ...record });
    return { state: 'Written', record, attempts: progress.attempts };
  }
}
