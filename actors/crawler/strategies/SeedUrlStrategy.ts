import { logger } from '../../../shared/logger';
import type { FeedSession } from '../session/FeedSession';
import type { DiscoveryStrategy, ItemTarget, StrategyContext } from './types';

export function urlTarget(
  session: FeedSession,
  order: number,
  url: string,
  readySelector: string
): ItemTarget {
  const load = () => session.navigate(url, readySelector);
  return { order, url, load, reload: load };
}

/**
 * SeedUrlStrategy - every start URL is one item
 */
export class SeedUrlStrategy implements DiscoveryStrategy {
  readonly mode = 'urls';

  constructor(private readonly context: StrategyContext) {}

  async *items(session: FeedSession): AsyncGenerator<ItemTarget, void, undefined> {
    const { site, options } = this.context;
    const urls = options.startUrls.slice(0, options.maxItems);

    if (urls.length < options.startUrls.length) {
      logger.info(
        `Limiting ${options.startUrls.length} seed URLs to ${urls.length}`
      );
    }

    for (const [index, url] of urls.entries()) {
      yield urlTarget(session, index + 1, url, site.selectors.itemReady);
    }
  }
}
