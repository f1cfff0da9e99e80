export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export * from './format.js';
export * from './ids.js';
export type {
  CatalogClient,
  CommentOptions,
  ListChannelVideosOptions,
  SearchOptions,
  TrendingOptions,
} from './catalog.js';
export {
  fetchAll,
  partitionResults,
  type FetchFailure,
  type FetchResult,
  type Partitioned,
} from './batch.js';
export {
  YouTubeClient,
  DEFAULT_YOUTUBE_API_BASE,
  type YouTubeClientOptions,
} from './youtube/client.js';
