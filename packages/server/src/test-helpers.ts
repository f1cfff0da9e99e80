import pino from 'pino';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  NotFoundError,
  TranscriptDisabledError,
  YouTubeApiError,
  type CatalogClient,
  type ChannelDetails,
  type CommentInfo,
  type CommentOptions,
  type ListChannelVideosOptions,
  type PlaylistInfo,
  type SearchOptions,
  type SearchResult,
  type TranscriptInfo,
  type TrendingOptions,
  type TrendingVideo,
  type VideoDetails,
} from '@tubepulse/shared';
import { createToolContext, type ToolContext } from './context.js';

/** In-memory catalog for tool tests */
export class FakeCatalog implements CatalogClient {
  readonly videos = new Map<string, VideoDetails>();
  readonly channels = new Map<string, ChannelDetails>();
  readonly handles = new Map<string, string>();
  readonly comments = new Map<string, CommentInfo[]>();
  readonly playlists = new Map<string, PlaylistInfo>();
  readonly transcripts = new Map<string, TranscriptInfo>();
  readonly captionsOff = new Set<string>();
  /** ids whose lookup fails as an upstream error */
  readonly failing = new Set<string>();
  searchResults: SearchResult[] = [];
  trending: TrendingVideo[] = [];
  readonly calls: { method: string; args: unknown[] }[] = [];

  addVideo(video: VideoDetails): this {
    this.videos.set(video.videoId, video);
    return this;
  }

  addChannel(channel: ChannelDetails): this {
    this.channels.set(channel.channelId, channel);
    return this;
  }

  private guard(id: string): void {
    if (this.failing.has(id)) {
      throw new YouTubeApiError(`YouTube API error 500: backend failure for ${id}`, 500);
    }
  }

  async getVideo(videoId: string): Promise<VideoDetails> {
    this.calls.push({ method: 'getVideo', args: [videoId] });
    this.guard(videoId);
    const video = this.videos.get(videoId);
    if (!video) throw new NotFoundError(`Video not found: ${videoId}`);
    return video;
  }

  async getVideosBatch(videoIds: string[]): Promise<VideoDetails[]> {
    this.calls.push({ method: 'getVideosBatch', args: [videoIds] });
    return videoIds.flatMap((id) => {
      const video = this.videos.get(id);
      return video ? [video] : [];
    });
  }

  async getChannel(channelId: string): Promise<ChannelDetails> {
    this.calls.push({ method: 'getChannel', args: [channelId] });
    this.guard(channelId);
    const channel = this.channels.get(channelId);
    if (!channel) throw new NotFoundError(`Channel not found: ${channelId}`);
    return channel;
  }

  async resolveChannelHandle(handle: string): Promise<string> {
    this.calls.push({ method: 'resolveChannelHandle', args: [handle] });
    const id = this.handles.get(handle);
    if (!id) throw new NotFoundError(`Channel not found: @${handle}`);
    return id;
  }

  async listChannelVideos(channelId: string, options: ListChannelVideosOptions): Promise<string[]> {
    this.calls.push({ method: 'listChannelVideos', args: [channelId, options] });
    const after = options.publishedAfter?.getTime() ?? 0;
    return [...this.videos.values()]
      .filter((v) => v.channelId === channelId && Date.parse(v.publishedAt) >= after)
      .sort((a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt))
      .slice(0, options.maxResults)
      .map((v) => v.videoId);
  }

  async search(query: string, options: SearchOptions): Promise<SearchResult[]> {
    this.calls.push({ method: 'search', args: [query, options] });
    return this.searchResults.slice(0, options.maxResults);
  }

  async getVideoComments(videoId: string, options: CommentOptions): Promise<CommentInfo[]> {
    this.calls.push({ method: 'getVideoComments', args: [videoId, options] });
    return (this.comments.get(videoId) ?? []).slice(0, options.maxResults);
  }

  async getTrendingVideos(options: TrendingOptions): Promise<TrendingVideo[]> {
    this.calls.push({ method: 'getTrendingVideos', args: [options] });
    return this.trending.slice(0, options.maxResults);
  }

  async getPlaylist(playlistId: string, maxResults: number): Promise<PlaylistInfo> {
    this.calls.push({ method: 'getPlaylist', args: [playlistId, maxResults] });
    const playlist = this.playlists.get(playlistId);
    if (!playlist) throw new NotFoundError(`Playlist not found: ${playlistId}`);
    return { ...playlist, items: playlist.items.slice(0, maxResults) };
  }

  async getTranscript(videoId: string, language: string): Promise<TranscriptInfo> {
    this.calls.push({ method: 'getTranscript', args: [videoId, language] });
    if (this.captionsOff.has(videoId)) {
      throw new TranscriptDisabledError(`Transcripts are disabled for this video: ${videoId}`);
    }
    const transcript = this.transcripts.get(videoId);
    if (!transcript || transcript.language !== language) {
      throw new NotFoundError(`No transcript found for language '${language}' in video: ${videoId}`);
    }
    return transcript;
  }
}

export const TEST_NOW = new Date('2026-04-15T00:00:00Z');

export function makeContext(catalog: CatalogClient): ToolContext {
  return createToolContext(catalog, pino({ level: 'silent' }), () => TEST_NOW);
}

export function makeVideo(overrides: Partial<VideoDetails> = {}): VideoDetails {
  return {
    videoId: 'vid1',
    channelId: 'UC_1',
    channelName: 'Test Channel',
    title: 'Test Video',
    description: '',
    publishedAt: '2026-04-05T00:00:00Z',
    durationIso: 'PT4M13S',
    duration: 253,
    viewCount: 1000,
    likeCount: 60,
    commentCount: 5,
    tags: [],
    categoryId: '22',
    thumbnailUrl: '',
    ...overrides,
  };
}

export function makeChannel(overrides: Partial<ChannelDetails> = {}): ChannelDetails {
  return {
    channelId: 'UC_1',
    name: 'Test Channel',
    description: '',
    customUrl: '@testchannel',
    publishedAt: '2020-01-01T00:00:00Z',
    country: 'US',
    subscriberCount: 1000,
    viewCount: 100000,
    videoCount: 100,
    thumbnailUrl: '',
    ...overrides,
  };
}

/** Text of the first content block */
export function textOf(result: CallToolResult): string {
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    throw new Error('expected a text result');
  }
  return first.text;
}

export function jsonOf(result: CallToolResult): unknown {
  return JSON.parse(textOf(result));
}
