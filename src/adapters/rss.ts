// RSS fetcher: one GET per call, parsed with rss-parser.
// Retrying is left to the worker's cadence.
import Parser from 'rss-parser';
import { DEFAULT_USER_AGENT } from '../config/environment';
import { FetchError, errorMessage } from '../types/errors';
import type { FeedEntryExtras, RawFeedDocument } from '../types/feed';

export interface FetchFeedOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export type FetchFeedResult =
  | { success: true; document: RawFeedDocument }
  | { success: false; error: FetchError };

export type FeedFetcher = (feedUrl: string, options?: FetchFeedOptions) => Promise<FetchFeedResult>;

const DEFAULT_TIMEOUT_MS = 10000;

const parser = new Parser<Record<string, unknown>, FeedEntryExtras>();

function failure(error: FetchError): FetchFeedResult {
  return { success: false, error };
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export const fetchFeedDocument: FeedFetcher = async (feedUrl, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let url: URL;
  try {
    url = new URL(feedUrl);
  } catch (error) {
    return failure(new FetchError('invalid_source', feedUrl, `Invalid feed URL: "${feedUrl}"`, { cause: error }));
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return failure(new FetchError('invalid_source', feedUrl, `Unsupported protocol "${url.protocol}" for feed URL`));
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let body: string;
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'application/rss+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5'
      }
    });

    if (!response.ok) {
      return failure(new FetchError('network', feedUrl, `HTTP error! status: ${response.status}`));
    }

    body = await response.text();
  } catch (error) {
    const message = isTimeout(error) ? `Request timeout after ${timeoutMs}ms` : errorMessage(error);
    return failure(new FetchError('network', feedUrl, message, { cause: error }));
  } finally {
    clearTimeout(timeout);
  }

  try {
    const document = await parser.parseString(body);
    return { success: true, document };
  } catch (error) {
    return failure(
      new FetchError('parse_failure', feedUrl, `Not a valid RSS document: ${errorMessage(error)}`, { cause: error })
    );
  }
};
