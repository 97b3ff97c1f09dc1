/**
 * Markup builders shaped like a YouTube Shorts page
 */

const escapeHtml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');

export interface ReelMarkup {
  userName?: string;
  likeCount?: string;
  commentCount?: string;
  active?: boolean;
}

export function reelHtml(reel: ReelMarkup): string {
  const channel =
    reel.userName === undefined
      ? ''
      : `<yt-reel-channel-bar-view-model><span><a class="yt-core-attributed-string__link" href="/${escapeHtml(reel.userName)}">${escapeHtml(reel.userName)}</a></span></yt-reel-channel-bar-view-model>`;
  const like =
    reel.likeCount === undefined
      ? ''
      : `<div id="like-button"><yt-button-shape><label><div><span>${escapeHtml(reel.likeCount)}</span></div></label></yt-button-shape></div>`;
  const comments =
    reel.commentCount === undefined
      ? ''
      : `<div id="comments-button"><ytd-button-renderer><yt-button-shape><label><div><span>${escapeHtml(reel.commentCount)}</span></div></label></yt-button-shape></ytd-button-renderer></div>`;

  return `<ytd-reel-video-renderer${reel.active ? ' is-active' : ''}><div><ytd-reel-player-overlay-renderer><yt-reel-metapanel-view-model>${channel}</yt-reel-metapanel-view-model>${like}${comments}</ytd-reel-player-overlay-renderer></div></ytd-reel-video-renderer>`;
}

export function renderedPage(...reels: ReelMarkup[]): string {
  return `<!DOCTYPE html><html><head><title>Shorts</title></head><body><ytd-app><ytd-shorts>${reels.map(reelHtml).join('')}</ytd-shorts></ytd-app></body></html>`;
}

export interface WatchMarkup {
  title?: string;
  description?: string;
  thumbnailURL?: string;
  publishedAt?: string;
  viewCount?: string;
}

export function watchDocument(watch: WatchMarkup): string {
  const meta = (attr: string, key: string, value: string | undefined) =>
    value === undefined
      ? ''
      : `<meta ${attr}="${key}" content="${escapeHtml(value)}">`;

  return [
    '<!DOCTYPE html><html><head>',
    meta('property', 'og:title', watch.title),
    meta('property', 'og:description', watch.description),
    meta('property', 'og:image', watch.thumbnailURL),
    '</head><body><div itemscope itemtype="http://schema.org/VideoObject">',
    meta('itemprop', 'datePublished', watch.publishedAt),
    meta('itemprop', 'interactionCount', watch.viewCount),
    '</div></body></html>',
  ].join('');
}

export function listingPage(hrefs: string[]): string {
  const items = hrefs
    .map(
      (href) =>
        `<ytd-rich-item-renderer><a id="thumbnail" href="${escapeHtml(href)}"><img></a><a id="video-title" href="${escapeHtml(href)}">title</a></ytd-rich-item-renderer>`
    )
    .join('');
  return `<!DOCTYPE html><html><body><ytd-rich-grid-renderer>${items}</ytd-rich-grid-renderer></body></html>`;
}

/** A complete, valid item */
export interface FakeItem {
  rendered: string;
  document: string;
}

export function shortItem(
  id: string,
  overrides: { reel?: ReelMarkup; watch?: WatchMarkup } = {}
): FakeItem {
  return {
    rendered: renderedPage({
      active: true,
      userName: `@creator_${id}`,
      likeCount: '42만',
      commentCount: '103만',
      ...overrides.reel,
    }),
    document: watchDocument({
      title: `Short ${id}`,
      description: `About ${id}`,
      thumbnailURL: `https://i.ytimg.com/vi/${id}/oar2.jpg?sqp=test`,
      publishedAt: '2024-11-02T08:15:00-07:00',
      viewCount: '1234567',
      ...overrides.watch,
    }),
  };
}
