import { launchPlaywright, playwrightUtils } from 'crawlee';
import {
  type Browser,
  type BrowserContext,
  chromium,
  errors,
  type Page,
} from 'playwright';
import { logger } from '../../../shared/logger';
import {
  type CrawlError,
  isRunError,
  LoadTimeoutError,
  PageLoadError,
  SessionStartupError,
} from '../core/errors';
import type { SessionOptions } from '../core/types';
import type { FeedSession, ScrollRequest } from './FeedSession';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Playwright-backed session: one Chromium instance, one context, one page.
 */
export class BrowserSession implements FeedSession {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: SessionOptions,
    private readonly documentHeaders: Record<string, string>
  ) {}

  /**
   * Launch the browser. Any failure is reported as SessionStartupError.
   */
  static async open(
    options: SessionOptions,
    documentHeaders: Record<string, string> = {}
  ): Promise<BrowserSession> {
    let browser: Browser | null = null;

    try {
      logger.info('Launching browser', {
        headless: options.headless,
        args: options.args,
      });
      browser = await launchPlaywright({
        launcher: chromium,
        launchOptions: {
          headless: options.headless,
          args: options.args,
        },
      });

      const context = await browser.newContext({
        viewport: options.viewport,
        userAgent: options.userAgent,
        locale: options.locale,
      });
      context.setDefaultNavigationTimeout(options.navigationTimeoutMs);

      const page = await context.newPage();
      return new BrowserSession(
        browser,
        context,
        page,
        options,
        documentHeaders
      );
    } catch (error) {
      if (browser) {
        await browser
          .close()
          .catch((closeError: unknown) =>
            logger.warn('Failed to close browser after startup error:', closeError)
          );
      }
      throw new SessionStartupError({ cause: error });
    }
  }

  // ================================================
  // NAVIGATION
  // ================================================

  async navigate(url: string, readySelector: string): Promise<void> {
    logger.debug(`Navigating to ${url}`);
    try {
      await this.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.navigationTimeoutMs,
      });
    } catch (error) {
      throw this.toLoadError(url, error, this.options.navigationTimeoutMs);
    }
    await this.waitForItem(readySelector);
  }

  async reload(readySelector: string): Promise<void> {
    const url = this.page.url();
    logger.debug(`Reloading ${url}`);
    try {
      await this.page.reload({
        waitUntil: 'domcontentloaded',
        timeout: this.options.navigationTimeoutMs,
      });
    } catch (error) {
      throw this.toLoadError(url, error, this.options.navigationTimeoutMs);
    }
    await this.waitForItem(readySelector);
  }

  async waitForItem(readySelector: string): Promise<void> {
    try {
      await this.page.waitForSelector(readySelector, {
        state: 'attached',
        timeout: this.options.itemTimeoutMs,
      });
    } catch (error) {
      throw this.toLoadError(this.page.url(), error, this.options.itemTimeoutMs);
    }
  }

  async advance(nextSelector: string): Promise<boolean> {
    const previousUrl = this.page.url();
    const button = this.page.locator(nextSelector).first();

    const isVisible = await button.isVisible().catch(() => false);
    const isEnabled = isVisible && (await button.isEnabled().catch(() => false));
    if (!isEnabled) {
      logger.info('Next item button is not available');
      return false;
    }

    try {
      await button.click({ timeout: this.options.itemTimeoutMs });
      await this.page.waitForURL((url) => url.toString() !== previousUrl, {
        timeout: this.options.itemTimeoutMs,
        waitUntil: 'commit',
      });
      return true;
    } catch (error) {
      logger.warn(`Could not move past ${previousUrl}:`, error);
      return false;
    }
  }

  async scroll(request: ScrollRequest): Promise<void> {
    await playwrightUtils.infiniteScroll(this.page, {
      timeoutSecs: request.timeoutSecs,
      waitForSecs: request.waitForSecs,
      stopScrollCallback: request.stopWhen,
    });
  }

  // ================================================
  // CONTENT
  // ================================================

  countNodes(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async fetchDocument(url: string): Promise<string> {
    const timeout = this.options.navigationTimeoutMs;
    try {
      const response = await this.context.request.get(url, {
        headers: this.documentHeaders,
        timeout,
      });
      if (!response.ok()) {
        throw new PageLoadError(url, `HTTP ${response.status()}`);
      }
      return await response.text();
    } catch (error) {
      throw this.toLoadError(url, error, timeout);
    }
  }

  // ================================================
  // TEARDOWN
  // ================================================

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.context.close();
    await this.browser.close();
    logger.info('Browser closed');
  }

  private toLoadError(url: string, error: unknown, timeoutMs: number): CrawlError {
    if (error instanceof LoadTimeoutError || error instanceof PageLoadError) {
      return error;
    }
    if (error instanceof errors.TimeoutError) {
      return new LoadTimeoutError(url, timeoutMs, { cause: error });
    }
    return new PageLoadError(url, describeError(error), { cause: error });
  }
}

/**
 * Open a session, hand it to `fn` and close it on every exit path.
 */
export async function withBrowserSession<T>(
  open: () => Promise<FeedSession>,
  fn: (session: FeedSession) => Promise<T>
): Promise<T> {
  let session: FeedSession;
  try {
    session = await open();
  } catch (error) {
    throw isRunError(error) ? error : new SessionStartupError({ cause: error });
  }

  try {
    return await fn(session);
  } finally {
    await session
      .close()
      .catch((error: unknown) =>
        logger.warn('Failed to close browser session:', error)
      );
  }
}
