import { logger } from '../../../shared/logger';
import type { FeedSession } from '../session/FeedSession';
import type { DiscoveryStrategy, ItemTarget, StrategyContext } from './types';

/**
 * FeedStrategy - opens a reel and presses "next" item by item until the
 * feed runs out or `maxItems` is reached. Several start URLs are crawled
 * one after another and share the item budget.
 */
export class FeedStrategy implements DiscoveryStrategy {
  readonly mode = 'feed';

  constructor(private readonly context: StrategyContext) {}

  async *items(session: FeedSession): AsyncGenerator<ItemTarget, void, undefined> {
    const { site, options } = this.context;
    const { itemReady, nextButton } = site.selectors;
    const reload = () => session.reload(itemReady);
    let order = 0;

    for (const startUrl of options.startUrls) {
      if (order >= options.maxItems) {
        return;
      }

      logger.info(`Opening feed ${startUrl}`);
      order++;
      // A failed first goto may leave the tab off the feed, so retry by URL
      const open = () => session.navigate(startUrl, itemReady);
      yield { order, url: startUrl, load: open, reload: open };

      while (order < options.maxItems) {
        const moved = await session.advance(nextButton);
        if (!moved) {
          logger.info(`Feed ${startUrl} ended after item #${order}`);
          break;
        }

        order++;
        yield { order, load: () => session.waitForItem(itemReady), reload };
      }
    }
  }
}
