/**
 * Supabase-backed store for feeds and articles
 * Article uniqueness is the `article.url` unique constraint (see supabase/schema.sql)
 */

import { createClient, type PostgrestError, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EnvironmentConfig } from '../config/environment';
import { StorageError } from '../types/errors';
import type { Article, ArticleQuery, Feed, NewArticle, NewFeed } from '../types/feed';
import { logger } from '../utils/logger';
import { DEFAULT_ARTICLE_LIMIT, type Store } from './types';

// Postgres SQLSTATE for unique_violation
const UNIQUE_VIOLATION = '23505';

const FEED_COLUMNS = 'id, url, title, description, active';
const ARTICLE_COLUMNS = 'id, feed_id, url, title, content, read, published';

const feedRowSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  active: z.boolean().nullable().transform(active => active ?? true)
});

const articleRowSchema = z.object({
  id: z.string(),
  feed_id: z.string(),
  url: z.string(),
  title: z.string(),
  content: z.string(),
  read: z.boolean().nullable().transform(read => read ?? false),
  published: z.string().transform((value, ctx) => {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp "${value}"` });
      return z.NEVER;
    }
    return date;
  })
});

const idRowsSchema = z.array(z.object({ id: z.string() }));

type FeedRow = z.infer<typeof feedRowSchema>;
type ArticleRow = z.infer<typeof articleRowSchema>;

export interface StoreTables {
  feedsTable: string;
  articlesTable: string;
}

function toFeed(row: FeedRow): Feed {
  return { ...row };
}

function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    feedId: row.feed_id,
    url: row.url,
    title: row.title,
    content: row.content,
    published: row.published,
    read: row.read
  };
}

function formatError(error: PostgrestError): string {
  return error.code ? `${error.message} (code ${error.code})` : error.message;
}

export class SupabaseStore implements Store {
  constructor(
    private readonly client: SupabaseClient,
    private readonly tables: StoreTables
  ) {}

  async listActiveFeeds(): Promise<Feed[]> {
    const { data, error } = await this.client
      .from(this.tables.feedsTable)
      .select(FEED_COLUMNS)
      .eq('active', true)
      .order('url', { ascending: true });

    if (error) {
      throw new StorageError('list_failure', `Failed to list active feeds: ${formatError(error)}`, { cause: error });
    }
    return this.parseFeeds(data);
  }

  async insertArticleIfAbsent(article: NewArticle): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.tables.articlesTable)
      .upsert(
        {
          feed_id: article.feedId,
          url: article.url,
          title: article.title,
          content: article.content,
          read: article.read,
          published: article.published.toISOString()
        },
        { onConflict: 'url', ignoreDuplicates: true }
      )
      .select('id');

    if (error) {
      // A concurrent writer can still win the race on some setups
      if (error.code === UNIQUE_VIOLATION) {
        return false;
      }
      throw new StorageError('write_failure', `Failed to insert article ${article.url}: ${formatError(error)}`, {
        cause: error
      });
    }

    // ON CONFLICT DO NOTHING returns no row when the URL already existed
    return this.countIds(data) > 0;
  }

  async subscribeFeed(feed: NewFeed): Promise<Feed> {
    const { data, error } = await this.client
      .from(this.tables.feedsTable)
      .insert({ url: feed.url, title: feed.title, description: feed.description ?? null, active: true })
      .select(FEED_COLUMNS)
      .single();

    if (error) {
      const kind = error.code === UNIQUE_VIOLATION ? 'conflict' : 'write_failure';
      throw new StorageError(kind, `Failed to subscribe to ${feed.url}: ${formatError(error)}`, { cause: error });
    }
    const parsed = feedRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError('write_failure', `Unexpected feed row returned for ${feed.url}`, { cause: parsed.error });
    }
    return toFeed(parsed.data);
  }

  async listFeeds(): Promise<Feed[]> {
    const { data, error } = await this.client
      .from(this.tables.feedsTable)
      .select(FEED_COLUMNS)
      .order('url', { ascending: true });

    if (error) {
      throw new StorageError('list_failure', `Failed to list feeds: ${formatError(error)}`, { cause: error });
    }
    return this.parseFeeds(data);
  }

  async unsubscribeFeed(id: string): Promise<boolean> {
    const { data, error } = await this.client.from(this.tables.feedsTable).delete().eq('id', id).select('id');

    if (error) {
      throw new StorageError('write_failure', `Failed to unsubscribe feed ${id}: ${formatError(error)}`, { cause: error });
    }
    return this.countIds(data) > 0;
  }

  async setFeedActive(id: string, active: boolean): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.tables.feedsTable)
      .update({ active })
      .eq('id', id)
      .select('id');

    if (error) {
      throw new StorageError('write_failure', `Failed to update feed ${id}: ${formatError(error)}`, { cause: error });
    }
    return this.countIds(data) > 0;
  }

  async listArticles(query: ArticleQuery = {}): Promise<Article[]> {
    const offset = query.offset ?? 0;
    const limit = query.limit ?? DEFAULT_ARTICLE_LIMIT;

    let request = this.client.from(this.tables.articlesTable).select(ARTICLE_COLUMNS);
    if (query.feedId !== undefined) {
      request = request.eq('feed_id', query.feedId);
    }
    if (query.unreadOnly) {
      request = request.eq('read', false);
    }

    const { data, error } = await request
      .order('published', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw new StorageError('list_failure', `Failed to list articles: ${formatError(error)}`, { cause: error });
    }
    const parsed = z.array(articleRowSchema).safeParse(data ?? []);
    if (!parsed.success) {
      throw new StorageError('list_failure', 'Unexpected article rows returned', { cause: parsed.error });
    }
    return parsed.data.map(toArticle);
  }

  async getArticle(id: string): Promise<Article | null> {
    const { data, error } = await this.client
      .from(this.tables.articlesTable)
      .select(ARTICLE_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new StorageError('list_failure', `Failed to load article ${id}: ${formatError(error)}`, { cause: error });
    }
    if (data === null) {
      return null;
    }
    const parsed = articleRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError('list_failure', `Unexpected article row for ${id}`, { cause: parsed.error });
    }
    return toArticle(parsed.data);
  }

  async markArticleRead(id: string): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.tables.articlesTable)
      .update({ read: true })
      .eq('id', id)
      .select('id');

    if (error) {
      throw new StorageError('write_failure', `Failed to mark article ${id} as read: ${formatError(error)}`, {
        cause: error
      });
    }
    return this.countIds(data) > 0;
  }

  private parseFeeds(rows: unknown): Feed[] {
    const feeds: Feed[] = [];
    for (const row of Array.isArray(rows) ? rows : []) {
      const parsed = feedRowSchema.safeParse(row);
      if (parsed.success) {
        feeds.push(toFeed(parsed.data));
      } else {
        logger.warn('Skipping malformed feed row', { row, issues: parsed.error.issues });
      }
    }
    return feeds;
  }

  private countIds(rows: unknown): number {
    const parsed = idRowsSchema.safeParse(rows ?? []);
    return parsed.success ? parsed.data.length : 0;
  }
}

export function createSupabaseStore(config: EnvironmentConfig): SupabaseStore {
  const client = createClient(config.supabase.url, config.supabase.key, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
  return new SupabaseStore(client, {
    feedsTable: config.ingestion.feedsTable,
    articlesTable: config.ingestion.articlesTable
  });
}
