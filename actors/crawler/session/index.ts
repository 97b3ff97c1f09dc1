export { BrowserSession, withBrowserSession } from './BrowserSession';
export type { FeedSession, ScrollRequest } from './FeedSession';
