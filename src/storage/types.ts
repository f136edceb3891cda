import type { Article, ArticleQuery, Feed, NewArticle, NewFeed } from '../types/feed';

/**
 * What the ingestion worker needs from storage. Both calls must be safe to
 * use concurrently with other writers; uniqueness of article URLs is enforced
 * by the store itself.
 */
export interface IngestionStore {
  /** @throws StorageError with kind `list_failure` */
  listActiveFeeds(): Promise<Feed[]>;
  /**
   * Insert unless an article with the same URL exists.
   * Resolves `false` when one does; a unique violation is not an error.
   * @throws StorageError with kind `write_failure`
   */
  insertArticleIfAbsent(article: NewArticle): Promise<boolean>;
}

export interface FeedStore {
  /** @throws StorageError with kind `conflict` when the URL is already subscribed */
  subscribeFeed(feed: NewFeed): Promise<Feed>;
  listFeeds(): Promise<Feed[]>;
  /** Deletes the feed and its articles. Resolves `false` for an unknown id. */
  unsubscribeFeed(id: string): Promise<boolean>;
  setFeedActive(id: string, active: boolean): Promise<boolean>;
}

export interface ArticleStore {
  /** Newest first. */
  listArticles(query?: ArticleQuery): Promise<Article[]>;
  getArticle(id: string): Promise<Article | null>;
  markArticleRead(id: string): Promise<boolean>;
}

export type Store = IngestionStore & FeedStore & ArticleStore;

export const DEFAULT_ARTICLE_LIMIT = 50;
