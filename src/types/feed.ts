import type Parser from 'rss-parser';

// A subscribed source. Only `active` feeds are polled by the worker.
export interface Feed {
  id: string;
  url: string;           // Unique across feeds
  title: string;
  description: string | null;
  active: boolean;
}

export interface NewFeed {
  url: string;
  title: string;
  description?: string | null;
}

// Article as produced by the normalizer, before the store assigns an id
export interface NewArticle {
  feedId: string;
  url: string;           // Permalink; unique across all articles
  title: string;
  content: string;
  published: Date;       // UTC instant
  read: boolean;
}

export interface Article extends NewArticle {
  id: string;
}

export interface ArticleQuery {
  feedId?: string;
  unreadOnly?: boolean;
  limit?: number;
  offset?: number;
}

// Fields rss-parser keeps on each RSS item beyond its typed defaults
export interface FeedEntryExtras {
  'content:encoded'?: string;
}

export type FeedEntry = Parser.Item & FeedEntryExtras;

export type RawFeedDocument = Parser.Output<FeedEntryExtras>;
