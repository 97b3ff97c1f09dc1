import { DESKTOP_USER_AGENT, defineSite, type SiteDefinition } from '../../core';

// ================================================
// SITE CONFIGURATION
// ================================================

export const YOUTUBE_SHORTS_CONFIG = {
  site: 'youtube-shorts',
  name: 'YouTube Shorts',
  baseUrl: 'https://www.youtube.com',
  startUrl: 'https://www.youtube.com/shorts',
} as const;

// ================================================
// SELECTORS
// ================================================

const ACTIVE_REEL = 'ytd-reel-video-renderer[is-active]';

export const YOUTUBE_SHORTS_SELECTORS = {
  activeItem: ACTIVE_REEL,
  itemReady: `${ACTIVE_REEL} yt-reel-metapanel-view-model`,
  nextButton:
    '#navigation-button-down > ytd-button-renderer > yt-button-shape > button',
  listingReady: 'ytd-rich-grid-renderer, ytd-reel-shelf-renderer',
  listingLink: 'a[href*="/shorts/"]',
  fields: {
    // Rendered overlay of the active reel
    userName: [
      'yt-reel-channel-bar-view-model span a.yt-core-attributed-string__link',
      'yt-reel-channel-bar-view-model a',
    ],
    likeCount: [
      '#like-button > yt-button-shape > label > div > span',
      '#like-button .yt-spec-button-shape-with-label__label span',
    ],
    commentCount: [
      '#comments-button > ytd-button-renderer > yt-button-shape > label > div > span',
      '#comments-button .yt-spec-button-shape-with-label__label span',
    ],
    // Static watch document
    thumbnailURL: ['meta[property="og:image"]'],
    title: ['meta[property="og:title"]', 'meta[name="title"]'],
    description: ['meta[property="og:description"]', 'meta[name="description"]'],
    publishedAt: [
      'meta[itemprop="datePublished"]',
      'meta[itemprop="uploadDate"]',
    ],
    viewCount: [
      'meta[itemprop="interactionCount"]',
      'meta[itemprop="userInteractionCount"]',
    ],
  },
} as const;

const { fields } = YOUTUBE_SHORTS_SELECTORS;

// ================================================
// SITE DEFINITION
// ================================================

export const youtubeShortsDefinition: SiteDefinition = defineSite({
  config: YOUTUBE_SHORTS_CONFIG,
  selectors: {
    activeItem: YOUTUBE_SHORTS_SELECTORS.activeItem,
    itemReady: YOUTUBE_SHORTS_SELECTORS.itemReady,
    nextButton: YOUTUBE_SHORTS_SELECTORS.nextButton,
    listingReady: YOUTUBE_SHORTS_SELECTORS.listingReady,
    listingLink: YOUTUBE_SHORTS_SELECTORS.listingLink,
  },
  fields: {
    currentURL: { source: 'location', required: true },
    thumbnailURL: {
      source: 'document',
      selectors: fields.thumbnailURL,
      attribute: 'content',
      required: true,
    },
    userName: { source: 'rendered', selectors: fields.userName, required: true },
    likeCount: {
      source: 'rendered',
      selectors: fields.likeCount,
      required: true,
    },
    commentCount: {
      source: 'rendered',
      selectors: fields.commentCount,
      required: true,
    },
    title: {
      source: 'document',
      selectors: fields.title,
      attribute: 'content',
      required: true,
    },
    description: {
      source: 'document',
      selectors: fields.description,
      attribute: 'content',
      required: false,
    },
    publishedAt: {
      source: 'document',
      selectors: fields.publishedAt,
      attribute: 'content',
      required: true,
    },
    viewCount: {
      source: 'document',
      selectors: fields.viewCount,
      attribute: 'content',
      required: true,
    },
  },
  defaultMode: 'feed',
  documentHeaders: {
    'User-Agent': DESKTOP_USER_AGENT,
    'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
  },
});
