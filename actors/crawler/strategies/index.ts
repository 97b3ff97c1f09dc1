import type { CrawlMode } from '../core/types';
import { FeedStrategy } from './FeedStrategy';
import { ListingStrategy } from './ListingStrategy';
import { SeedUrlStrategy } from './SeedUrlStrategy';
import type { DiscoveryStrategy, StrategyContext } from './types';

export function createStrategy(
  mode: CrawlMode,
  context: StrategyContext,
  sleep?: (ms: number) => Promise<void>
): DiscoveryStrategy {
  switch (mode) {
    case 'feed':
      return new FeedStrategy(context);
    case 'urls':
      return new SeedUrlStrategy(context);
    case 'listing':
      return new ListingStrategy(context, sleep);
  }
}

export { FeedStrategy } from './FeedStrategy';
export { ListingStrategy } from './ListingStrategy';
export { SeedUrlStrategy, urlTarget } from './SeedUrlStrategy';
export type { DiscoveryStrategy, ItemTarget, StrategyContext } from './types';
