import type {
  ChannelDetails,
  CommentInfo,
  CommentOrder,
  PlaylistInfo,
  SearchOrder,
  SearchResult,
  TranscriptInfo,
  TrendingVideo,
  VideoDetails,
} from './types.js';

/** Read access to the video platform's public catalog.
 * Lookups of a single entity throw NotFoundError when the id does not resolve. */
export interface CatalogClient {
  getVideo(videoId: string): Promise<VideoDetails>;
  getVideosBatch(videoIds: string[]): Promise<VideoDetails[]>;
  getChannel(channelId: string): Promise<ChannelDetails>;
  /** Map a channel @handle to its channel id */
  resolveChannelHandle(handle: string): Promise<string>;
  /** Video ids uploaded by a channel, newest first */
  listChannelVideos(channelId: string, options: ListChannelVideosOptions): Promise<string[]>;
  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
  getVideoComments(videoId: string, options: CommentOptions): Promise<CommentInfo[]>;
  getTrendingVideos(options: TrendingOptions): Promise<TrendingVideo[]>;
  getPlaylist(playlistId: string, maxResults: number): Promise<PlaylistInfo>;
  /** Timed captions in the requested language; TranscriptDisabledError when captions are off */
  getTranscript(videoId: string, language: string): Promise<TranscriptInfo>;
}

export interface ListChannelVideosOptions {
  publishedAfter?: Date;
  maxResults: number;
}

export interface SearchOptions {
  maxResults: number;
  order: SearchOrder;
}

export interface CommentOptions {
  maxResults: number;
  order: CommentOrder;
}

export interface TrendingOptions {
  regionCode: string;
  /** "0" means every category */
  categoryId: string;
  maxResults: number;
}
