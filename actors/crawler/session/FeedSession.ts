export interface ScrollRequest {
  timeoutSecs: number;
  /** Seconds without new content before scrolling gives up */
  waitForSecs: number;
  /** Checked while scrolling; resolving true stops early */
  stopWhen?: () => Promise<boolean>;
}

/**
 * One browser tab driven through a site. Loading methods reject with
 * LoadTimeoutError when the ready node does not show up in time and with
 * PageLoadError when navigation itself fails.
 */
export interface FeedSession {
  navigate(url: string, readySelector: string): Promise<void>;
  reload(readySelector: string): Promise<void>;
  /** Wait for the item the page is currently on */
  waitForItem(readySelector: string): Promise<void>;
  /**
   * Move the feed to its next item. Resolves false when there is no next
   * item to move to.
   */
  advance(nextSelector: string): Promise<boolean>;
  /** Reveal more entries of a listing; a no-op once nothing more loads */
  scroll(request: ScrollRequest): Promise<void>;
  /** Number of nodes on the current page matching `selector` */
  countNodes(selector: string): Promise<number>;
  /** Rendered markup of the current page */
  content(): Promise<string>;
  currentUrl(): string;
  /** Markup served for `url`, fetched outside the page */
  fetchDocument(url: string): Promise<string>;
  close(): Promise<void>;
}
