import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../../../shared/logger';
import { youtubeShortsDefinition } from '../crawlers/youtube-shorts/config';
import { FakeSession, type FakePage } from '../test/FakeSession';
import { listingPage, shortItem } from '../test/fixtures';
import { MemoryWriter } from '../test/MemoryWriter';
import { CrawlRunner } from './CrawlRunner';
import {
  LoadTimeoutError,
  PageLoadError,
  SessionStartupError,
  WriteError,
} from './errors';
import {
  type CrawlOptions,
  DEFAULT_RETRY_POLICY,
  DEFAULT_SCROLL_OPTIONS,
} from './types';

const shortUrl = (id: string) => `https://www.youtube.com/shorts/${id}`;

function pagesFor(
  ...items: Array<[string, FakePage]>
): Record<string, FakePage> {
  return Object.fromEntries(items.map(([id, page]) => [shortUrl(id), page]));
}

function crawlOptions(overrides: Partial<CrawlOptions> = {}): CrawlOptions {
  return {
    mode: 'urls',
    startUrls: [],
    maxItems: 100,
    retry: DEFAULT_RETRY_POLICY,
    scroll: DEFAULT_SCROLL_OPTIONS,
    ...overrides,
  };
}

function setup(
  session: FakeSession,
  options: CrawlOptions,
  writer = new MemoryWriter()
) {
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const runner = new CrawlRunner({
    site: youtubeShortsDefinition,
    options,
    openSession: async () => session,
    writer,
    sleep,
  });
  return { runner, writer, sleep };
}

describe('CrawlRunner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write exactly one record per successful item', async () => {
    const session = new FakeSession(
      pagesFor(['a', shortItem('a')], ['b', shortItem('b')])
    );
    const { runner, writer } = setup(
      session,
      crawlOptions({ startUrls: [shortUrl('a'), shortUrl('b')] })
    );

    const summary = await runner.run();

    expect(writer.records).toEqual([
      {
        currentURL: 'https://www.youtube.com/shorts/a',
        thumbnailURL: 'https://i.ytimg.com/vi/a/oar2.jpg?sqp=test',
        userName: '@creator_a',
        likeCount: '42만',
        commentCount: '103만',
        title: 'Short a',
        description: 'About a',
        publishedAt: '2024-11-02T08:15:00-07:00',
        viewCount: 1234567,
      },
      expect.objectContaining({ currentURL: shortUrl('b'), title: 'Short b' }),
    ]);
    expect(summary).toMatchObject({
      visited: 2,
      written: 2,
      skipped: 0,
      failures: [],
      stopped: false,
    });
  });

  it('should keep abbreviated like and comment counts verbatim', async () => {
    const session = new FakeSession(
      pagesFor(['a', shortItem('a', { reel: { likeCount: '42만', commentCount: '103万' } })])
    );
    const { runner, writer } = setup(session, crawlOptions({ startUrls: [shortUrl('a')] }));

    await runner.run();

    expect(writer.records[0].likeCount).toBe('42만');
    expect(writer.records[0].commentCount).toBe('103万');
  });

  it('should write one record when the first attempt times out and the retry succeeds', async () => {
    const session = new FakeSession(pagesFor(['a', shortItem('a')])).failNextLoad(
      shortUrl('a'),
      new LoadTimeoutError(shortUrl('a'), 10_000)
    );
    const { runner, writer, sleep } = setup(
      session,
      crawlOptions({ startUrls: [shortUrl('a')] })
    );

    const summary = await runner.run();

    expect(writer.records).toHaveLength(1);
    expect(summary.written).toBe(1);
    expect(summary.skipped).toBe(0);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(session.calls).toEqual([
      `navigate ${shortUrl('a')}`,
      `navigate ${shortUrl('a')}`,
      'close',
    ]);
  });

  it('should skip an item without a title after one retry and log the skip once', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const session = new FakeSession(
      pagesFor(['a', shortItem('a', { watch: { title: undefined } })])
    );
    const { runner, writer } = setup(session, crawlOptions({ startUrls: [shortUrl('a')] }));

    const summary = await runner.run();

    expect(writer.records).toEqual([]);
    expect(summary.failures).toEqual([
      {
        order: 1,
        url: shortUrl('a'),
        kind: 'MissingField',
        stage: 'Loaded',
        message: "Required field 'title' not found on page",
        attempts: 2,
      },
    ]);
    expect(
      warn.mock.calls.filter(([message]) => message.startsWith('⏭️ Skipped'))
    ).toHaveLength(1);
  });

  it('should skip a non-numeric view count without retrying', async () => {
    const session = new FakeSession(
      pagesFor(
        ['a', shortItem('a', { watch: { viewCount: '1.2M' } })],
        ['b', shortItem('b')]
      )
    );
    const { runner, writer } = setup(
      session,
      crawlOptions({ startUrls: [shortUrl('a'), shortUrl('b')] })
    );

    const summary = await runner.run();

    expect(writer.records.map((record) => record.currentURL)).toEqual([shortUrl('b')]);
    expect(summary.failures).toEqual([
      expect.objectContaining({
        order: 1,
        kind: 'InvalidNumber',
        stage: 'Extracted',
        attempts: 1,
      }),
    ]);
    expect(session.calls.filter((call) => call === `navigate ${shortUrl('a')}`)).toHaveLength(1);
  });

  it('should skip a timestamp without an offset', async () => {
    const session = new FakeSession(
      pagesFor(['a', shortItem('a', { watch: { publishedAt: '2024-11-02T08:15:00' } })])
    );
    const { runner, writer } = setup(session, crawlOptions({ startUrls: [shortUrl('a')] }));

    const summary = await runner.run();

    expect(writer.records).toEqual([]);
    expect(summary.failures[0].kind).toBe('InvalidTimestamp');
  });

  it('should report unclassified failures as unexpected without retrying', async () => {
    const session = new FakeSession(pagesFor(['a', shortItem('a')])).failNextLoad(
      shortUrl('a'),
      new Error('renderer crashed')
    );
    const { runner } = setup(session, crawlOptions({ startUrls: [shortUrl('a')] }));

    const summary = await runner.run();

    expect(summary.failures).toEqual([
      {
        order: 1,
        url: shortUrl('a'),
        kind: 'Unexpected',
        stage: 'Pending',
        message: 'renderer crashed',
        attempts: 1,
      },
    ]);
  });

  it('should abort the run when the sink becomes unwritable', async () => {
    const session = new FakeSession(
      pagesFor(['a', shortItem('a')], ['b', shortItem('b')], ['c', shortItem('c')])
    );
    const writer = new MemoryWriter({ failOnWrite: 2 });
    const { runner } = setup(
      session,
      crawlOptions({ startUrls: [shortUrl('a'), shortUrl('b'), shortUrl('c')] }),
      writer
    );

    await expect(runner.run()).rejects.toBeInstanceOf(WriteError);

    expect(writer.records.map((record) => record.currentURL)).toEqual([shortUrl('a')]);
    expect(session.calls).not.toContain(`navigate ${shortUrl('c')}`);
    expect(session.closed).toBe(true);
    expect(writer.closed).toBe(true);
  });

  it('should fail with SessionStartupError when the browser cannot start', async () => {
    const writer = new MemoryWriter();
    const runner = new CrawlRunner({
      site: youtubeShortsDefinition,
      options: crawlOptions({ startUrls: [shortUrl('a')] }),
      openSession: () => Promise.reject(new Error('executable not found')),
      writer,
    });

    const run = runner.run();

    await expect(run).rejects.toBeInstanceOf(SessionStartupError);
    await expect(run).rejects.toThrow(
      'Browser session could not be started: executable not found'
    );
    expect(writer.records).toEqual([]);
    expect(writer.closed).toBe(true);
  });

  it('should walk the feed and reload the current item on retry', async () => {
    const feed = [shortUrl('a'), shortUrl('b'), shortUrl('c')];
    const session = new FakeSession(
      pagesFor(['a', shortItem('a')], ['b', shortItem('b')], ['c', shortItem('c')]),
      feed
    ).failNextLoad(shortUrl('b'), new LoadTimeoutError(shortUrl('b'), 10_000));
    const { runner, writer } = setup(
      session,
      crawlOptions({ mode: 'feed', startUrls: [shortUrl('a')] })
    );

    const summary = await runner.run();

    expect(writer.records.map((record) => record.title)).toEqual([
      'Short a',
      'Short b',
      'Short c',
    ]);
    expect(summary).toMatchObject({ visited: 3, written: 3, skipped: 0 });
    expect(session.calls).toEqual([
      `navigate ${shortUrl('a')}`,
      'advance',
      `wait ${shortUrl('b')}`,
      `reload ${shortUrl('b')}`,
      'advance',
      `wait ${shortUrl('c')}`,
      'advance',
      'close',
    ]);
  });

  it('should write the first feed item when its first navigation fails', async () => {
    const session = new FakeSession(
      pagesFor(['a', shortItem('a')], ['b', shortItem('b')]),
      [shortUrl('a'), shortUrl('b')]
    ).failNextLoad(shortUrl('a'), new PageLoadError(shortUrl('a'), 'net::ERR_TIMED_OUT'));
    const { runner, writer } = setup(
      session,
      crawlOptions({ mode: 'feed', startUrls: [shortUrl('a')] })
    );

    const summary = await runner.run();

    expect(writer.records.map((record) => record.title)).toEqual(['Short a', 'Short b']);
    expect(summary).toMatchObject({ written: 2, skipped: 0 });
    expect(session.calls.slice(0, 2)).toEqual([
      `navigate ${shortUrl('a')}`,
      `navigate ${shortUrl('a')}`,
    ]);
  });

  it('should keep crawling when a listing page cannot be read', async () => {
    const channel = 'https://www.youtube.com/@channel/shorts';
    const search = 'https://www.youtube.com/results?search_query=cats';
    const session = new FakeSession({
      [channel]: { rendered: listingPage(['/shorts/a']), document: '' },
      [search]: { rendered: listingPage(['/shorts/b']), document: '' },
      [shortUrl('b')]: shortItem('b'),
    }).failContent(channel, new Error('Target page, context or browser has been closed'));
    const { runner, writer } = setup(
      session,
      crawlOptions({ mode: 'listing', startUrls: [channel, search] })
    );

    const summary = await runner.run();

    expect(writer.records.map((record) => record.currentURL)).toEqual([shortUrl('b')]);
    expect(summary).toMatchObject({ visited: 1, written: 1, skipped: 0 });
  });

  it('should finish the current item and stop when asked', async () => {
    const session = new FakeSession(
      pagesFor(['a', shortItem('a')], ['b', shortItem('b')])
    );
    let runner: CrawlRunner | null = null;
    const writer = new MemoryWriter({ onWrite: () => runner?.stop() });
    runner = setup(
      session,
      crawlOptions({ startUrls: [shortUrl('a'), shortUrl('b')] }),
      writer
    ).runner;

    const summary = await runner.run();

    expect(summary).toMatchObject({ visited: 1, written: 1, stopped: true });
    expect(session.calls).not.toContain(`navigate ${shortUrl('b')}`);
  });
});
