import { randomUUID } from 'crypto';
import { StorageError } from '../types/errors';
import type { Article, ArticleQuery, Feed, NewArticle, NewFeed } from '../types/feed';
import { DEFAULT_ARTICLE_LIMIT, type Store } from './types';

/**
 * In-process store for tests and dry runs.
 *
 * Every method reads and mutates the maps without awaiting in between, so each
 * call runs to completion inside one event-loop turn and is atomic with respect
 * to every other call. Article URL uniqueness is the `articlesByUrl` key.
 */
export class MemoryStore implements Store {
  private readonly feeds = new Map<string, Feed>();
  private readonly articles = new Map<string, Article>();
  private readonly articlesByUrl = new Map<string, string>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  async listActiveFeeds(): Promise<Feed[]> {
    return this.sortedFeeds().filter(feed => feed.active);
  }

  async insertArticleIfAbsent(article: NewArticle): Promise<boolean> {
    if (this.articlesByUrl.has(article.url)) {
      return false;
    }
    if (!this.feeds.has(article.feedId)) {
      throw new StorageError('write_failure', `Feed ${article.feedId} does not exist`);
    }
    const id = this.generateId();
    this.articles.set(id, { ...article, published: new Date(article.published.getTime()), id });
    this.articlesByUrl.set(article.url, id);
    return true;
  }

  async subscribeFeed(feed: NewFeed): Promise<Feed> {
    if ([...this.feeds.values()].some(existing => existing.url === feed.url)) {
      throw new StorageError('conflict', `Already subscribed to ${feed.url}`);
    }
    const created: Feed = {
      id: this.generateId(),
      url: feed.url,
      title: feed.title,
      description: feed.description ?? null,
      active: true
    };
    this.feeds.set(created.id, created);
    return { ...created };
  }

  async listFeeds(): Promise<Feed[]> {
    return this.sortedFeeds();
  }

  async unsubscribeFeed(id: string): Promise<boolean> {
    if (!this.feeds.delete(id)) {
      return false;
    }
    for (const article of [...this.articles.values()]) {
      if (article.feedId === id) {
        this.articles.delete(article.id);
        this.articlesByUrl.delete(article.url);
      }
    }
    return true;
  }

  async setFeedActive(id: string, active: boolean): Promise<boolean> {
    const feed = this.feeds.get(id);
    if (!feed) return false;
    feed.active = active;
    return true;
  }

  async listArticles(query: ArticleQuery = {}): Promise<Article[]> {
    const offset = query.offset ?? 0;
    const limit = query.limit ?? DEFAULT_ARTICLE_LIMIT;
    return [...this.articles.values()]
      .filter(article => query.feedId === undefined || article.feedId === query.feedId)
      .filter(article => !query.unreadOnly || !article.read)
      .sort((a, b) => b.published.getTime() - a.published.getTime())
      .slice(offset, offset + limit)
      .map(article => this.copyArticle(article));
  }

  async getArticle(id: string): Promise<Article | null> {
    const article = this.articles.get(id);
    return article ? this.copyArticle(article) : null;
  }

  async markArticleRead(id: string): Promise<boolean> {
    const article = this.articles.get(id);
    if (!article) return false;
    article.read = true;
    return true;
  }

  // Same order as the database listing: by URL
  private sortedFeeds(): Feed[] {
    return [...this.feeds.values()]
      .sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0))
      .map(feed => ({ ...feed }));
  }

  private copyArticle(article: Article): Article {
    return { ...article, published: new Date(article.published.getTime()) };
  }
}
