/**
 * Converts a parsed RSS document into article records for one feed.
 *
 * Entries never fail normalization: missing fields become empty strings and a
 * missing or unreadable `pubDate` falls back to an instant fixed once per document.
 */

import { isValid, parse, parseISO } from 'date-fns';
import type { Feed, FeedEntry, NewArticle, RawFeedDocument } from '../types/feed';

export interface NormalizeOptions {
  /** Clock used for the fallback publication timestamp. Called once per document. */
  now?: () => Date;
}

// RFC 822 zone names allowed in RSS pubDate, as offsets
const ZONE_OFFSETS: Record<string, string> = {
  GMT: '+0000',
  UT: '+0000',
  UTC: '+0000',
  Z: '+0000',
  EST: '-0500',
  EDT: '-0400',
  CST: '-0600',
  CDT: '-0500',
  MST: '-0700',
  MDT: '-0600',
  PST: '-0800',
  PDT: '-0700'
};

const RFC822_PATTERN =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([A-Za-z]{1,5}|[+-]\d{4}))?$/;

const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

function parseRfc822(value: string): Date | null {
  const match = RFC822_PATTERN.exec(value);
  if (!match) return null;

  const [, day, month, rawYear, hours, minutes, seconds = '00', zone = 'GMT'] = match;
  const offset = /^[+-]/.test(zone) ? zone : ZONE_OFFSETS[zone.toUpperCase()];
  if (!offset) return null;

  // Two-digit years follow the RFC 2822 reading of obsolete dates
  const year = rawYear.length === 2 ? String((Number(rawYear) < 50 ? 2000 : 1900) + Number(rawYear)) : rawYear;
  const normalizedMonth = month.charAt(0).toUpperCase() + month.slice(1).toLowerCase();

  const date = parse(
    `${day} ${normalizedMonth} ${year} ${hours.padStart(2, '0')}:${minutes}:${seconds} ${offset}`,
    'd MMM yyyy HH:mm:ss xx',
    new Date(0)
  );
  return isValid(date) ? date : null;
}

function parseIso8601(value: string): Date | null {
  const match = ISO_PATTERN.exec(value);
  if (!match) return null;

  // A date-time without an offset is read as UTC, not server-local time
  const date = parseISO(match[1] ? value : `${value}Z`);
  return isValid(date) ? date : null;
}

/**
 * Parse an RSS publication date. Accepts RFC 822 dates (the RSS format) and
 * ISO 8601 date-times; returns null for anything else.
 */
export function parsePublicationDate(value: string | null | undefined): Date | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  return parseRfc822(trimmed) ?? parseIso8601(trimmed);
}

function entryContent(entry: FeedEntry): string {
  return entry['content:encoded'] || entry.content || '';
}

export function normalizeEntry(feed: Feed, entry: FeedEntry, fallbackPublished: Date): NewArticle {
  return {
    feedId: feed.id,
    url: entry.link ?? '',
    title: entry.title ?? '',
    content: entryContent(entry),
    published: parsePublicationDate(entry.pubDate) ?? fallbackPublished,
    read: false
  };
}

export function normalizeFeedDocument(
  feed: Feed,
  document: RawFeedDocument,
  options: NormalizeOptions = {}
): NewArticle[] {
  const fallbackPublished = (options.now ?? (() => new Date()))();
  return document.items.map(entry => normalizeEntry(feed, entry, new Date(fallbackPublished.getTime())));
}
