/**
 * One ingestion cycle:
 * 1. Lists active feeds from the store
 * 2. Fetches and parses each feed, in listing order
 * 3. Normalizes entries into article records
 * 4. Inserts each article unless its URL is already stored
 *
 * Failures are caught and logged where they happen. A cycle always resolves
 * with a report; nothing here throws to the caller.
 */

import pLimit from 'p-limit';
import { fetchFeedDocument, type FeedFetcher } from '../adapters/rss';
import type { EnvironmentConfig } from '../config/environment';
import type { IngestionStore } from '../storage/types';
import { errorMessage } from '../types/errors';
import type { Feed, NewArticle } from '../types/feed';
import { logger } from '../utils/logger';
import { normalizeFeedDocument } from './normalize';

export type FeedOutcomeStatus = 'ingested' | 'fetch_failed' | 'skipped';

export interface FeedOutcome {
  feedId: string;
  feedUrl: string;
  status: FeedOutcomeStatus;
  articlesSeen: number;
  inserted: number;
  existing: number;
  failed: number;
  durationMs: number;
  error?: string;
}

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  feedsListed: number;
  listError?: string;
  // True when a fetch error ended the cycle early
  aborted: boolean;
  outcomes: FeedOutcome[];
  articlesSeen: number;
  inserted: number;
  existing: number;
  failed: number;
}

export type IngestionOptions = Pick<
  EnvironmentConfig['ingestion'],
  'fetchTimeoutMs' | 'insertConcurrency' | 'abortCycleOnFetchError' | 'userAgent'
>;

export interface IngestionDependencies {
  store: IngestionStore;
  options: IngestionOptions;
  fetchFeed?: FeedFetcher;
  now?: () => Date;
}

type InsertResult = 'inserted' | 'existing' | 'failed';

function emptyOutcome(feed: Feed, status: FeedOutcomeStatus): FeedOutcome {
  return {
    feedId: feed.id,
    feedUrl: feed.url,
    status,
    articlesSeen: 0,
    inserted: 0,
    existing: 0,
    failed: 0,
    durationMs: 0
  };
}

async function insertArticle(store: IngestionStore, article: NewArticle): Promise<InsertResult> {
  try {
    return (await store.insertArticleIfAbsent(article)) ? 'inserted' : 'existing';
  } catch (error) {
    logger.error(`Insert unsuccessful for article ${article.url || '(no link)'}`, error, { feedId: article.feedId });
    return 'failed';
  }
}

/**
 * Fetch, normalize and persist a single feed
 */
export async function ingestFeed(feed: Feed, deps: IngestionDependencies): Promise<FeedOutcome> {
  const startTime = Date.now();
  const fetchFeed = deps.fetchFeed ?? fetchFeedDocument;
  const outcome = emptyOutcome(feed, 'ingested');

  const fetched = await fetchFeed(feed.url, {
    timeoutMs: deps.options.fetchTimeoutMs,
    userAgent: deps.options.userAgent
  });

  if (!fetched.success) {
    logger.error(`Failed to fetch feed ${feed.url} (${fetched.error.kind})`, fetched.error, { feedId: feed.id });
    return {
      ...outcome,
      status: 'fetch_failed',
      error: fetched.error.message,
      durationMs: Date.now() - startTime
    };
  }

  const articles = normalizeFeedDocument(feed, fetched.document, { now: deps.now });
  outcome.articlesSeen = articles.length;

  const limit = pLimit(deps.options.insertConcurrency);
  const results = await Promise.all(articles.map(article => limit(() => insertArticle(deps.store, article))));

  for (const result of results) {
    outcome[result]++;
  }
  outcome.durationMs = Date.now() - startTime;

  logger.info(
    `Ingested feed ${feed.url}: ${outcome.inserted} new, ${outcome.existing} existing, ${outcome.failed} failed`
  );
  return outcome;
}

function summarize(report: Omit<CycleReport, 'articlesSeen' | 'inserted' | 'existing' | 'failed'>): CycleReport {
  const totals = report.outcomes.reduce(
    (acc, outcome) => ({
      articlesSeen: acc.articlesSeen + outcome.articlesSeen,
      inserted: acc.inserted + outcome.inserted,
      existing: acc.existing + outcome.existing,
      failed: acc.failed + outcome.failed
    }),
    { articlesSeen: 0, inserted: 0, existing: 0, failed: 0 }
  );
  return { ...report, ...totals };
}

/**
 * Run one full pass over all active feeds
 */
export async function runIngestionCycle(deps: IngestionDependencies): Promise<CycleReport> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const outcomes: FeedOutcome[] = [];

  logger.info('Starting ingestion cycle');

  let feeds: Feed[];
  try {
    feeds = await deps.store.listActiveFeeds();
  } catch (error) {
    logger.error('Failed to list active feeds, skipping cycle', error);
    return summarize({
      startedAt,
      finishedAt: now(),
      feedsListed: 0,
      listError: errorMessage(error),
      aborted: false,
      outcomes
    });
  }

  logger.info(`Found ${feeds.length} active feeds`);

  let aborted = false;
  for (const feed of feeds) {
    if (aborted) {
      outcomes.push(emptyOutcome(feed, 'skipped'));
      continue;
    }

    let outcome: FeedOutcome;
    try {
      outcome = await ingestFeed(feed, deps);
    } catch (error) {
      // Fetchers report failures as results; this covers a misbehaving one
      logger.error(`Unexpected error ingesting feed ${feed.url}`, error);
      outcome = { ...emptyOutcome(feed, 'fetch_failed'), error: errorMessage(error) };
    }
    outcomes.push(outcome);

    if (outcome.status === 'fetch_failed' && deps.options.abortCycleOnFetchError) {
      logger.warn(`Aborting cycle after fetch failure on ${feed.url}`);
      aborted = true;
    }
  }

  const report = summarize({
    startedAt,
    finishedAt: now(),
    feedsListed: feeds.length,
    aborted,
    outcomes
  });

  logger.info('Ingestion cycle completed', {
    feeds: report.feedsListed,
    inserted: report.inserted,
    existing: report.existing,
    failed: report.failed,
    fetchFailures: outcomes.filter(outcome => outcome.status === 'fetch_failed').length,
    aborted
  });

  return report;
}
