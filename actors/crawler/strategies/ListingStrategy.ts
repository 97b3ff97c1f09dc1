import { logger } from '../../../shared/logger';
import { isItemError } from '../core/errors';
import { withRetry } from '../core/retry';
import { extractItemLinks } from '../extractors';
import type { FeedSession } from '../session/FeedSession';
import { urlTarget } from './SeedUrlStrategy';
import type { DiscoveryStrategy, ItemTarget, StrategyContext } from './types';

/**
 * ListingStrategy - scrolls listing pages (a channel's shorts tab, a search
 * result) to collect item links, then visits each link.
 */
export class ListingStrategy implements DiscoveryStrategy {
  readonly mode = 'listing';

  constructor(
    private readonly context: StrategyContext,
    private readonly sleep?: (ms: number) => Promise<void>
  ) {}

  async *items(session: FeedSession): AsyncGenerator<ItemTarget, void, undefined> {
    const { site, options } = this.context;
    const links: string[] = [];

    for (const listingUrl of options.startUrls) {
      if (links.length >= options.maxItems) {
        break;
      }
      for (const link of await this.collectLinks(session, listingUrl)) {
        if (!links.includes(link)) {
          links.push(link);
        }
      }
    }

    const selected = links.slice(0, options.maxItems);
    logger.info(`Collected ${links.length} item links, crawling ${selected.length}`);

    for (const [index, url] of selected.entries()) {
      yield urlTarget(session, index + 1, url, site.selectors.itemReady);
    }
  }

  private async readLinks(session: FeedSession): Promise<string[]> {
    return extractItemLinks(
      await session.content(),
      session.currentUrl(),
      this.context.site.selectors.listingLink
    );
  }

  /**
   * Load one listing and scroll it until enough links are visible or
   * scrolling stops revealing new ones.
   */
  private async collectLinks(
    session: FeedSession,
    listingUrl: string
  ): Promise<string[]> {
    const { site, options } = this.context;
    const { listingReady, listingLink } = site.selectors;

    try {
      await withRetry(() => session.navigate(listingUrl, listingReady), {
        maxAttempts: options.retry.maxAttempts,
        delayMs: options.retry.delayMs,
        shouldRetry: isItemError,
        sleep: this.sleep,
      });
    } catch (error) {
      if (!isItemError(error)) {
        throw error;
      }
      logger.error(`Listing ${listingUrl} could not be loaded:`, error);
      return [];
    }

    let links: string[];
    try {
      links = await this.readLinks(session);
    } catch (error) {
      logger.error(`Listing ${listingUrl} could not be read:`, error);
      return [];
    }

    for (
      let round = 1;
      round <= options.scroll.maxRounds && links.length < options.maxItems;
      round++
    ) {
      let revealed: string[];
      try {
        await session.scroll({
          timeoutSecs: options.scroll.timeoutSecs,
          waitForSecs: options.scroll.waitForSecs,
          stopWhen: async () =>
            (await session.countNodes(listingLink)) >= options.maxItems,
        });
        revealed = await this.readLinks(session);
      } catch (error) {
        logger.warn(`Scrolling ${listingUrl} failed, keeping ${links.length} links:`, error);
        break;
      }

      logger.debug(`Scroll round ${round}: ${revealed.length} links`);
      if (revealed.length <= links.length) {
        break;
      }
      links = revealed;
    }

    return links;
  }
}
