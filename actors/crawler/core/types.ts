import type { CrawlErrorKind } from './errors';

// ================================================
// RECORD TYPES
// ================================================

/** Output columns, in sink order */
export const RECORD_FIELDS = [
  'currentURL',
  'thumbnailURL',
  'userName',
  'likeCount',
  'commentCount',
  'title',
  'description',
  'publishedAt',
  'viewCount',
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

/** Raw, trimmed strings as found on the page */
export type FieldMap = Record<RecordField, string>;

export interface VideoMetadataRecord {
  readonly currentURL: string;
  readonly thumbnailURL: string;
  /** Author handle including the leading `@` */
  readonly userName: string;
  /** Display text such as `42만`, kept verbatim */
  readonly likeCount: string;
  readonly commentCount: string;
  readonly title: string;
  readonly description: string;
  /** ISO 8601 with explicit offset */
  readonly publishedAt: string;
  readonly viewCount: number;
}

// ================================================
// PAGE SNAPSHOT
// ================================================

export interface PageSnapshot {
  /** Location shown by the browser */
  url: string;
  /** Markup after client-side rendering */
  renderedHtml: string;
  /** Markup served for `url` before any script ran */
  documentHtml: string;
}

// ================================================
// FIELD RULES
// ================================================

export type FieldSource = 'location' | 'rendered' | 'document';

export interface FieldRule {
  source: FieldSource;
  /** Tried in order, first non-empty match wins */
  selectors?: readonly string[];
  /** Read this attribute instead of the text content */
  attribute?: string;
  required: boolean;
}

export type FieldRules = Record<RecordField, FieldRule>;

// ================================================
// SITE CONFIGURATION
// ================================================

export type CrawlMode = 'feed' | 'urls' | 'listing';

export const CRAWL_MODES: readonly CrawlMode[] = ['feed', 'urls', 'listing'];

export interface SiteConfig {
  /** Registry key (e.g., 'youtube-shorts') */
  site: string;
  /** Human readable name */
  name: string;
  baseUrl: string;
  /** Entry point of the feed mode */
  startUrl: string;
}

export interface SiteSelectors {
  /** Container of the item currently on screen; scopes rendered lookups */
  activeItem?: string;
  /** Node whose presence means the item is ready to extract */
  itemReady: string;
  /** Button that moves the feed to the next item */
  nextButton: string;
  /** Node whose presence means a listing page is ready */
  listingReady: string;
  /** Item links on a listing page */
  listingLink: string;
}

export interface SiteDefinition {
  config: SiteConfig;
  selectors: SiteSelectors;
  fields: FieldRules;
  defaultMode: CrawlMode;
  /** Headers sent when fetching an item's static document */
  documentHeaders?: Record<string, string>;
  /** Session overrides (optional, uses defaults if not provided) */
  session?: Partial<SessionOptions>;
}

// ================================================
// CRAWL OPTIONS
// ================================================

export interface SessionOptions {
  headless: boolean;
  args: string[];
  viewport: { width: number; height: number };
  userAgent: string;
  locale: string;
  /** Timeout of a single `goto`/`reload` */
  navigationTimeoutMs: number;
  /** Bounded wait for the key content node */
  itemTimeoutMs: number;
}

export interface RetryPolicy {
  /** Total attempts per item, including the first */
  maxAttempts: number;
  delayMs: number;
  retryOn: readonly CrawlErrorKind[];
}

export interface ScrollOptions {
  timeoutSecs: number;
  waitForSecs: number;
  maxRounds: number;
}

export interface CrawlOptions {
  mode: CrawlMode;
  startUrls: string[];
  maxItems: number;
  retry: RetryPolicy;
  scroll: ScrollOptions;
}

// ================================================
// TEST MODE CONFIGURATION
// ================================================

export interface TestModeConfig {
  enabled: boolean;
  maxItems: number;
}

// ================================================
// DEFAULTS
// ================================================

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  headless: true,
  args: ['--no-sandbox', '--disable-dev-shm-usage', '--window-size=860,540'],
  viewport: { width: 860, height: 540 },
  userAgent: DESKTOP_USER_AGENT,
  locale: 'ko-KR',
  navigationTimeoutMs: 30_000,
  itemTimeoutMs: 10_000,
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  delayMs: 1000,
  retryOn: ['LoadTimeout', 'LoadFailed', 'MissingField'],
};

export const DEFAULT_SCROLL_OPTIONS: ScrollOptions = {
  timeoutSecs: 30,
  waitForSecs: 3,
  maxRounds: 5,
};

export const DEFAULT_MAX_ITEMS = 10_000;
