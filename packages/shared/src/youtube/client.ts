import { createLogger, type Logger } from '../logger.js';
import { NotFoundError, YouTubeApiError } from '../errors.js';
import { parseDuration } from '../format.js';
import { fetchTranscript } from './transcript.js';
import type {
  CatalogClient,
  CommentOptions,
  ListChannelVideosOptions,
  SearchOptions,
  TrendingOptions,
} from '../catalog.js';
import type {
  ChannelDetails,
  CommentInfo,
  PlaylistInfo,
  SearchResult,
  TranscriptInfo,
  TrendingVideo,
  VideoDetails,
} from '../types.js';

export const DEFAULT_YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';

// videos.list and channels.list accept up to 50 comma-separated ids
const MAX_IDS_PER_REQUEST = 50;

export interface YouTubeClientOptions {
  apiKey: string;
  baseUrl?: string;
  logger?: Logger;
}

/** CatalogClient over the YouTube Data API v3. One HTTP request per call, no caching, no retries. */
export class YouTubeClient implements CatalogClient {
  private apiKey: string;
  private baseUrl: string;
  private logger: Logger;

  constructor(options: YouTubeClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_YOUTUBE_API_BASE).replace(/\/+$/, '');
    this.logger = options.logger ?? createLogger('youtube-client');
  }

  private async fetchApi<T>(endpoint: string, params: Record<string, string>): Promise<T> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    url.searchParams.set('key', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    this.logger.debug({ endpoint }, 'API request');

    const response = await fetch(url.toString());

    if (!response.ok) {
      const body = await response.text();
      this.logger.error({ status: response.status, body, endpoint }, 'YouTube API error');
      throw new YouTubeApiError(`YouTube API error ${response.status}: ${body}`, response.status);
    }

    return (await response.json()) as T;
  }

  async getVideo(videoId: string): Promise<VideoDetails> {
    const data = await this.fetchApi<YouTubeVideoListResponse>('videos', {
      part: 'snippet,statistics,contentDetails',
      id: videoId,
    });

    const item = data.items?.[0];
    if (!item) {
      throw new NotFoundError(`Video not found: ${videoId}`);
    }
    return toVideoDetails(item);
  }

  async getVideosBatch(videoIds: string[]): Promise<VideoDetails[]> {
    const results: VideoDetails[] = [];

    for (let i = 0; i < videoIds.length; i += MAX_IDS_PER_REQUEST) {
      const batch = videoIds.slice(i, i + MAX_IDS_PER_REQUEST);
      const data = await this.fetchApi<YouTubeVideoListResponse>('videos', {
        part: 'snippet,statistics,contentDetails',
        id: batch.join(','),
      });

      for (const item of data.items || []) {
        results.push(toVideoDetails(item));
      }
    }

    return results;
  }

  async getChannel(channelId: string): Promise<ChannelDetails> {
    const data = await this.fetchApi<YouTubeChannelListResponse>('channels', {
      part: 'snippet,statistics',
      id: channelId,
    });

    const item = data.items?.[0];
    if (!item) {
      throw new NotFoundError(`Channel not found: ${channelId}`);
    }

    return {
      channelId: item.id,
      name: item.snippet.title,
      description: item.snippet.description,
      customUrl: item.snippet.customUrl || '',
      publishedAt: item.snippet.publishedAt,
      country: item.snippet.country || 'Unknown',
      subscriberCount: parseInt(item.statistics.subscriberCount || '0', 10),
      viewCount: parseInt(item.statistics.viewCount || '0', 10),
      videoCount: parseInt(item.statistics.videoCount || '0', 10),
      thumbnailUrl: item.snippet.thumbnails?.high?.url || '',
    };
  }

  async resolveChannelHandle(handle: string): Promise<string> {
    const normalized = handle.startsWith('@') ? handle : `@${handle}`;
    const data = await this.fetchApi<YouTubeChannelListResponse>('channels', {
      part: 'id',
      forHandle: normalized,
    });

    const item = data.items?.[0];
    if (!item) {
      throw new NotFoundError(`Channel not found: ${normalized}`);
    }
    return item.id;
  }

  async listChannelVideos(channelId: string, options: ListChannelVideosOptions): Promise<string[]> {
    const params: Record<string, string> = {
      part: 'snippet',
      channelId,
      type: 'video',
      order: 'date',
      maxResults: String(options.maxResults),
    };
    if (options.publishedAfter) {
      params.publishedAfter = options.publishedAfter.toISOString();
    }

    const data = await this.fetchApi<YouTubeSearchResponse>('search', params);

    return (data.items || [])
      .map((item) => item.id.videoId)
      .filter((id): id is string => !!id);
  }

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    const data = await this.fetchApi<YouTubeSearchResponse>('search', {
      part: 'snippet',
      q: query,
      type: 'video',
      maxResults: String(options.maxResults),
      order: options.order,
    });

    const results: SearchResult[] = [];
    for (const item of data.items || []) {
      if (!item.id.videoId) continue;
      results.push({
        videoId: item.id.videoId,
        title: item.snippet.title,
        description: item.snippet.description,
        channelId: item.snippet.channelId,
        channelName: item.snippet.channelTitle,
        publishedAt: item.snippet.publishedAt,
        thumbnailUrl: item.snippet.thumbnails?.high?.url || '',
      });
    }
    return results;
  }

  async getVideoComments(videoId: string, options: CommentOptions): Promise<CommentInfo[]> {
    const data = await this.fetchApi<YouTubeCommentThreadsResponse>('commentThreads', {
      part: 'snippet',
      videoId,
      maxResults: String(options.maxResults),
      order: options.order,
      textFormat: 'plainText',
    });

    return (data.items || []).map((item) => {
      const comment = item.snippet.topLevelComment.snippet;
      return {
        author: comment.authorDisplayName,
        text: comment.textDisplay,
        likeCount: comment.likeCount,
        publishedAt: comment.publishedAt,
        replyCount: item.snippet.totalReplyCount,
      };
    });
  }

  async getTrendingVideos(options: TrendingOptions): Promise<TrendingVideo[]> {
    const params: Record<string, string> = {
      part: 'snippet,statistics',
      chart: 'mostPopular',
      regionCode: options.regionCode,
      maxResults: String(options.maxResults),
    };
    if (options.categoryId !== '0') {
      params.videoCategoryId = options.categoryId;
    }

    const data = await this.fetchApi<YouTubeVideoListResponse>('videos', params);

    return (data.items || []).map((item) => ({
      videoId: item.id,
      title: item.snippet.title,
      description: item.snippet.description,
      channelId: item.snippet.channelId,
      channelName: item.snippet.channelTitle,
      publishedAt: item.snippet.publishedAt,
      thumbnailUrl: item.snippet.thumbnails?.high?.url || '',
      viewCount: parseInt(item.statistics?.viewCount || '0', 10),
      likeCount: parseInt(item.statistics?.likeCount || '0', 10),
    }));
  }

  async getPlaylist(playlistId: string, maxResults: number): Promise<PlaylistInfo> {
    const playlistData = await this.fetchApi<YouTubePlaylistListResponse>('playlists', {
      part: 'snippet,contentDetails',
      id: playlistId,
    });

    const playlist = playlistData.items?.[0];
    if (!playlist) {
      throw new NotFoundError(`Playlist not found: ${playlistId}`);
    }

    const itemsData = await this.fetchApi<YouTubePlaylistItemsResponse>('playlistItems', {
      part: 'snippet',
      playlistId,
      maxResults: String(maxResults),
    });

    return {
      playlistId,
      title: playlist.snippet.title,
      description: playlist.snippet.description,
      channelId: playlist.snippet.channelId,
      channelName: playlist.snippet.channelTitle,
      itemCount: playlist.contentDetails.itemCount,
      items: (itemsData.items || []).map((item) => ({
        videoId: item.snippet.resourceId.videoId,
        title: item.snippet.title,
        description: item.snippet.description,
        channelName: item.snippet.channelTitle,
        publishedAt: item.snippet.publishedAt,
        position: item.snippet.position,
        thumbnailUrl: item.snippet.thumbnails?.high?.url || '',
      })),
    };
  }

  async getTranscript(videoId: string, language: string): Promise<TranscriptInfo> {
    this.logger.debug({ videoId, language }, 'Transcript request');
    return fetchTranscript(videoId, language);
  }
}

function toVideoDetails(item: YouTubeVideoItem): VideoDetails {
  const durationIso = item.contentDetails?.duration || 'PT0S';
  return {
    videoId: item.id,
    channelId: item.snippet.channelId,
    channelName: item.snippet.channelTitle,
    title: item.snippet.title,
    description: item.snippet.description,
    publishedAt: item.snippet.publishedAt,
    durationIso,
    duration: parseDuration(durationIso),
    viewCount: parseInt(item.statistics?.viewCount || '0', 10),
    likeCount: parseInt(item.statistics?.likeCount || '0', 10),
    commentCount: parseInt(item.statistics?.commentCount || '0', 10),
    tags: item.snippet.tags || [],
    categoryId: item.snippet.categoryId || '',
    thumbnailUrl: item.snippet.thumbnails?.high?.url || '',
  };
}

// ─── YouTube API Response Types (internal) ───

interface Thumbnails {
  high?: { url: string };
}

interface YouTubeChannelListResponse {
  items?: {
    id: string;
    snippet: {
      title: string;
      description: string;
      country?: string;
      customUrl?: string;
      publishedAt: string;
      thumbnails?: Thumbnails;
    };
    statistics: {
      subscriberCount?: string;
      videoCount?: string;
      viewCount?: string;
    };
  }[];
}

interface YouTubeVideoItem {
  id: string;
  snippet: {
    channelId: string;
    channelTitle: string;
    title: string;
    description: string;
    publishedAt: string;
    tags?: string[];
    categoryId?: string;
    thumbnails?: Thumbnails;
  };
  statistics?: {
    viewCount?: string;
    likeCount?: string;
    commentCount?: string;
  };
  contentDetails?: {
    duration: string;
  };
}

interface YouTubeVideoListResponse {
  items?: YouTubeVideoItem[];
}

interface YouTubeSearchResponse {
  items?: {
    id: { videoId?: string; channelId?: string };
    snippet: {
      channelId: string;
      channelTitle: string;
      title: string;
      description: string;
      publishedAt: string;
      thumbnails?: Thumbnails;
    };
  }[];
}

interface YouTubeCommentThreadsResponse {
  items?: {
    snippet: {
      totalReplyCount: number;
      topLevelComment: {
        snippet: {
          authorDisplayName: string;
          textDisplay: string;
          likeCount: number;
          publishedAt: string;
        };
      };
    };
  }[];
}

interface YouTubePlaylistListResponse {
  items?: {
    snippet: {
      title: string;
      description: string;
      channelId: string;
      channelTitle: string;
    };
    contentDetails: {
      itemCount: number;
    };
  }[];
}

interface YouTubePlaylistItemsResponse {
  items?: {
    snippet: {
      title: string;
      description: string;
      channelTitle: string;
      publishedAt: string;
      position: number;
      resourceId: { videoId: string };
      thumbnails?: Thumbnails;
    };
  }[];
}
