import type { CrawlMode, CrawlOptions, SiteDefinition } from '../core/types';
import type { FeedSession } from '../session/FeedSession';

/** One item to crawl, as handed out by a strategy */
export interface ItemTarget {
  /** 1-based position in the crawl */
  order: number;
  /** Known up front for seed and listing items; feed items learn it on load */
  url?: string;
  /** First attempt */
  load(): Promise<void>;
  /** Every later attempt */
  reload(): Promise<void>;
}

export interface DiscoveryStrategy {
  readonly mode: CrawlMode;
  items(session: FeedSession): AsyncGenerator<ItemTarget, void, undefined>;
}

export interface StrategyContext {
  site: SiteDefinition;
  options: CrawlOptions;
}
