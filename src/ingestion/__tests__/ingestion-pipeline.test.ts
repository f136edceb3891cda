/**
 * Ingestion cycle tests against the in-memory store with a stubbed fetcher
 */

import type { FeedFetcher, FetchFeedResult } from '../../adapters/rss';
import { MemoryStore } from '../../storage/memory-store';
import type { IngestionStore } from '../../storage/types';
import { FetchError, StorageError } from '../../types/errors';
import type { Feed, NewArticle, RawFeedDocument } from '../../types/feed';
import { runIngestionCycle, type IngestionOptions } from '../ingestion-pipeline';
import { createDocument } from '../../__tests__/setup';

const CYCLE_INSTANT = new Date('2025-02-01T09:00:00.000Z');

const OPTIONS: IngestionOptions = {
  fetchTimeoutMs: 1000,
  insertConcurrency: 2,
  abortCycleOnFetchError: false,
  userAgent: 'test-agent'
};

const SAMPLE_DOCUMENT = createDocument([
  { title: 'Dated entry', link: 'https://x/a', pubDate: '2024-03-01T12:00:00Z', content: 'A' },
  { title: 'Undated entry', link: 'https://x/b', content: 'B' }
]);

function stubFetcher(
  documents: Record<string, RawFeedDocument | FetchError>
): jest.Mock<Promise<FetchFeedResult>, Parameters<FeedFetcher>> {
  return jest.fn<Promise<FetchFeedResult>, Parameters<FeedFetcher>>(async url => {
    const entry = documents[url];
    if (entry === undefined) {
      return { success: false, error: new FetchError('network', url, 'connect ECONNREFUSED') };
    }
    return entry instanceof FetchError ? { success: false, error: entry } : { success: true, document: entry };
  });
}

async function subscribe(store: MemoryStore, url: string, title = url): Promise<Feed> {
  return store.subscribeFeed({ url, title });
}

describe('runIngestionCycle', () => {
  let store: MemoryStore;
  let nextId: number;

  beforeEach(() => {
    nextId = 0;
    store = new MemoryStore(() => `id-${++nextId}`);
  });

  it('ingests a feed end to end and adds nothing on a second run', async () => {
    const feed = await subscribe(store, 'https://x/feed.xml');
    const fetchFeed = stubFetcher({ 'https://x/feed.xml': SAMPLE_DOCUMENT });
    const deps = { store, options: OPTIONS, fetchFeed, now: () => CYCLE_INSTANT };

    const first = await runIngestionCycle(deps);

    expect(first.inserted).toBe(2);
    expect(first.existing).toBe(0);
    const articles = await store.listArticles({ feedId: feed.id });
    const byUrl = new Map(articles.map(article => [article.url, article]));
    expect([...byUrl.keys()].sort()).toEqual(['https://x/a', 'https://x/b']);
    expect(byUrl.get('https://x/a')?.published.toISOString()).toBe('2024-03-01T12:00:00.000Z');
    expect(byUrl.get('https://x/b')?.published.toISOString()).toBe('2025-02-01T09:00:00.000Z');
    expect(articles.every(article => article.read === false && article.feedId === feed.id)).toBe(true);

    const second = await runIngestionCycle(deps);

    expect(second.inserted).toBe(0);
    expect(second.existing).toBe(2);
    expect(await store.listArticles()).toHaveLength(2);
  });

  it('passes timeout and user agent to the fetcher', async () => {
    await subscribe(store, 'https://x/feed.xml');
    const fetchFeed = stubFetcher({ 'https://x/feed.xml': createDocument([]) });

    await runIngestionCycle({ store, options: OPTIONS, fetchFeed });

    expect(fetchFeed).toHaveBeenCalledWith('https://x/feed.xml', { timeoutMs: 1000, userAgent: 'test-agent' });
  });

  it('only polls active feeds', async () => {
    await subscribe(store, 'https://x/active.xml');
    const paused = await subscribe(store, 'https://x/paused.xml');
    await store.setFeedActive(paused.id, false);
    const fetchFeed = stubFetcher({ 'https://x/active.xml': createDocument([]) });

    const report = await runIngestionCycle({ store, options: OPTIONS, fetchFeed });

    expect(report.feedsListed).toBe(1);
    expect(fetchFeed.mock.calls.map(([url]) => url)).toEqual(['https://x/active.xml']);
  });

  it('keeps ingesting later feeds when an earlier one is unreachable', async () => {
    await subscribe(store, 'https://a/feed.xml');
    const feedB = await subscribe(store, 'https://b/feed.xml');
    const fetchFeed = stubFetcher({
      'https://b/feed.xml': createDocument([{ title: 'From B', link: 'https://b/1' }])
    });

    const report = await runIngestionCycle({ store, options: OPTIONS, fetchFeed, now: () => CYCLE_INSTANT });

    expect(report.aborted).toBe(false);
    expect(report.outcomes.map(outcome => [outcome.feedUrl, outcome.status])).toEqual([
      ['https://a/feed.xml', 'fetch_failed'],
      ['https://b/feed.xml', 'ingested']
    ]);
    expect(report.outcomes[0].error).toBe('connect ECONNREFUSED');
    const articles = await store.listArticles({ feedId: feedB.id });
    expect(articles.map(article => article.url)).toEqual(['https://b/1']);
  });

  it('skips the rest of the cycle after a fetch failure in fail-fast mode', async () => {
    await subscribe(store, 'https://a/feed.xml');
    await subscribe(store, 'https://b/feed.xml');
    const fetchFeed = stubFetcher({
      'https://a/feed.xml': new FetchError('parse_failure', 'https://a/feed.xml', 'Not a valid RSS document'),
      'https://b/feed.xml': createDocument([{ link: 'https://b/1' }])
    });

    const report = await runIngestionCycle({
      store,
      options: { ...OPTIONS, abortCycleOnFetchError: true },
      fetchFeed
    });

    expect(report.aborted).toBe(true);
    expect(report.outcomes.map(outcome => outcome.status)).toEqual(['fetch_failed', 'skipped']);
    expect(fetchFeed).toHaveBeenCalledTimes(1);
    expect(await store.listArticles()).toEqual([]);
  });

  it('turns an unexpected fetcher exception into a failed outcome', async () => {
    await subscribe(store, 'https://a/feed.xml');
    const fetchFeed: FeedFetcher = jest.fn(async () => {
      throw new Error('boom');
    });

    const report = await runIngestionCycle({ store, options: OPTIONS, fetchFeed });

    expect(report.outcomes).toHaveLength(1);
    expect(report.outcomes[0].status).toBe('fetch_failed');
    expect(report.outcomes[0].error).toBe('boom');
  });

  it('skips the cycle when listing feeds fails', async () => {
    const failingStore: IngestionStore = {
      listActiveFeeds: jest.fn(async () => {
        throw new StorageError('list_failure', 'connection refused');
      }),
      insertArticleIfAbsent: jest.fn(async () => true)
    };
    const fetchFeed = stubFetcher({});

    const report = await runIngestionCycle({ store: failingStore, options: OPTIONS, fetchFeed });

    expect(report.listError).toBe('connection refused');
    expect(report.feedsListed).toBe(0);
    expect(report.outcomes).toEqual([]);
    expect(fetchFeed).not.toHaveBeenCalled();
  });

  it('counts a failed write and keeps inserting the remaining articles', async () => {
    const feed: Feed = { id: 'feed-1', url: 'https://x/feed.xml', title: 'X', description: null, active: true };
    const inserted: string[] = [];
    const flakyStore: IngestionStore = {
      listActiveFeeds: async () => [feed],
      insertArticleIfAbsent: jest.fn(async (article: NewArticle) => {
        if (article.url === 'https://x/2') {
          throw new StorageError('write_failure', 'value too long for type character varying(2000)');
        }
        inserted.push(article.url);
        return true;
      })
    };
    const fetchFeed = stubFetcher({
      'https://x/feed.xml': createDocument([{ link: 'https://x/1' }, { link: 'https://x/2' }, { link: 'https://x/3' }])
    });

    const report = await runIngestionCycle({ store: flakyStore, options: OPTIONS, fetchFeed });

    expect(report.outcomes[0]).toEqual(
      expect.objectContaining({ status: 'ingested', articlesSeen: 3, inserted: 2, existing: 0, failed: 1 })
    );
    expect(inserted.sort()).toEqual(['https://x/1', 'https://x/3']);
  });

  it('keeps at most insertConcurrency inserts in flight per feed', async () => {
    const feed: Feed = { id: 'feed-1', url: 'https://x/feed.xml', title: 'X', description: null, active: true };
    let inFlight = 0;
    let maxInFlight = 0;
    const slowStore: IngestionStore = {
      listActiveFeeds: async () => [feed],
      insertArticleIfAbsent: jest.fn(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise(resolve => setImmediate(resolve));
        inFlight--;
        return true;
      })
    };
    const links = Array.from({ length: 10 }, (_, index) => ({ link: `https://x/${index}` }));
    const fetchFeed = stubFetcher({ 'https://x/feed.xml': createDocument(links) });

    const report = await runIngestionCycle({ store: slowStore, options: OPTIONS, fetchFeed });

    expect(report.inserted).toBe(10);
    expect(slowStore.insertArticleIfAbsent).toHaveBeenCalledTimes(10);
    expect(maxInFlight).toBe(OPTIONS.insertConcurrency);
  });

  it('stores a repeated link only once within one document', async () => {
    await subscribe(store, 'https://x/feed.xml');
    const fetchFeed = stubFetcher({
      'https://x/feed.xml': createDocument([
        { title: 'Original', link: 'https://x/same' },
        { title: 'Repeat', link: 'https://x/same' }
      ])
    });

    const report = await runIngestionCycle({ store, options: { ...OPTIONS, insertConcurrency: 1 }, fetchFeed });

    expect(report.inserted).toBe(1);
    expect(report.existing).toBe(1);
    const articles = await store.listArticles();
    expect(articles.map(article => article.title)).toEqual(['Original']);
  });
});
