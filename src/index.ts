export { fetchFeedDocument } from './adapters/rss';
export type { FeedFetcher, FetchFeedOptions, FetchFeedResult } from './adapters/rss';
export { loadEnvironmentConfig } from './config/environment';
export type { EnvironmentConfig, LogLevel } from './config/environment';
export { ingestFeed, runIngestionCycle } from './ingestion/ingestion-pipeline';
export type { CycleReport, FeedOutcome, FeedOutcomeStatus, IngestionDependencies } from './ingestion/ingestion-pipeline';
export { normalizeEntry, normalizeFeedDocument, parsePublicationDate } from './ingestion/normalize';
export { findProjectRoot, loadEnvFiles, printReport, runIngestion } from './ingestion/runner';
export type { RunnerOptions } from './ingestion/runner';
export { sleep, startIngestionWorker } from './ingestion/scheduler';
export type { IngestionWorker, WorkerOptions } from './ingestion/scheduler';
export { MemoryStore } from './storage/memory-store';
export { SupabaseStore, createSupabaseStore } from './storage/supabase-store';
export type { ArticleStore, FeedStore, IngestionStore, Store } from './storage/types';
export { FetchError, StorageError } from './types/errors';
export type { FetchErrorKind, StorageErrorKind } from './types/errors';
export type { Article, ArticleQuery, Feed, NewArticle, NewFeed, RawFeedDocument } from './types/feed';
export { logger } from './utils/logger';
