import { z } from 'zod';
import {
  COMMENT_ORDERS,
  SEARCH_ORDERS,
  extractVideoId,
  formatDuration,
  formatNumber,
  formatTimestamp,
} from '@tubepulse/shared';
import { videoUrl } from '@tubepulse/reports';
import { defineTool, type ToolDefinition } from './define.js';
import { getChannel, getVideo, resolveChannelId } from './fetch.js';

const videoIdArg = z.string().min(1).describe('YouTube video ID or URL');
const channelIdArg = z.string().min(1).describe('YouTube channel ID, channel URL or @handle');

export const getVideoInfo = defineTool({
  name: 'get_video_info',
  description: 'Get detailed information about a YouTube video: title, channel, duration, statistics and tags',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const video = await getVideo(ctx, video_id);
    return {
      videoId: video.videoId,
      title: video.title,
      description: video.description,
      channel: { name: video.channelName, id: video.channelId },
      publishedAt: video.publishedAt,
      duration: formatDuration(video.duration),
      durationRaw: video.durationIso,
      statistics: {
        views: video.viewCount,
        viewsFormatted: formatNumber(video.viewCount),
        likes: video.likeCount,
        likesFormatted: formatNumber(video.likeCount),
        comments: video.commentCount,
        commentsFormatted: formatNumber(video.commentCount),
      },
      tags: video.tags,
      categoryId: video.categoryId,
      thumbnail: video.thumbnailUrl,
      url: videoUrl(video.videoId),
    };
  },
});

export const getVideoTranscript = defineTool({
  name: 'get_video_transcript',
  description: 'Get the transcript/captions of a YouTube video as timestamped text',
  input: {
    video_id: videoIdArg,
    language: z.string().min(2).default('en').describe("Language code such as 'en', 'es' or 'fr'"),
  },
  handler: async ({ video_id, language }, ctx) => {
    const videoId = extractVideoId(video_id);
    const transcript = await ctx.catalog.getTranscript(videoId, language);
    return {
      videoId,
      language: transcript.language,
      segmentCount: transcript.segments.length,
      transcript: transcript.segments.map((s) => ({
        timestamp: formatTimestamp(s.start),
        timestampSeconds: s.start,
        duration: s.duration,
        text: s.text,
      })),
      fullText: transcript.segments.map((s) => s.text).join(' '),
    };
  },
});

export const getVideoComments = defineTool({
  name: 'get_video_comments',
  description: 'Get top-level comments on a YouTube video',
  input: {
    video_id: videoIdArg,
    max_results: z.number().int().min(1).max(100).default(20).describe('Comments to return (1-100)'),
    order: z.enum(COMMENT_ORDERS).default('relevance').describe('Sort by time or relevance'),
  },
  handler: async ({ video_id, max_results, order }, ctx) => {
    const videoId = extractVideoId(video_id);
    const comments = await ctx.catalog.getVideoComments(videoId, { maxResults: max_results, order });
    return { videoId, totalComments: comments.length, comments };
  },
});

export const searchVideos = defineTool({
  name: 'search_videos',
  description: 'Search YouTube for videos matching a query',
  input: {
    query: z.string().min(1).describe('Search query'),
    max_results: z.number().int().min(1).max(50).default(10).describe('Results to return (1-50)'),
    order: z.enum(SEARCH_ORDERS).default('relevance').describe('Result ordering'),
  },
  handler: async ({ query, max_results, order }, ctx) => {
    const results = await ctx.catalog.search(query, { maxResults: max_results, order });
    return {
      query,
      totalResults: results.length,
      videos: results.map((r) => ({ ...r, url: videoUrl(r.videoId) })),
    };
  },
});

export const getChannelInfo = defineTool({
  name: 'get_channel_info',
  description: 'Get information and statistics for a YouTube channel',
  input: { channel_id: channelIdArg },
  handler: async ({ channel_id }, ctx) => {
    const channel = await getChannel(ctx, channel_id);
    return {
      channelId: channel.channelId,
      title: channel.name,
      description: channel.description,
      customUrl: channel.customUrl,
      publishedAt: channel.publishedAt,
      statistics: {
        subscribers: channel.subscriberCount,
        subscribersFormatted: formatNumber(channel.subscriberCount),
        totalViews: channel.viewCount,
        totalViewsFormatted: formatNumber(channel.viewCount),
        videoCount: channel.videoCount,
      },
      thumbnail: channel.thumbnailUrl,
      country: channel.country,
      url: `https://www.youtube.com/channel/${channel.channelId}`,
    };
  },
});

export const getChannelVideos = defineTool({
  name: 'get_channel_videos',
  description: 'List the most recent uploads of a YouTube channel with their statistics',
  input: {
    channel_id: channelIdArg,
    max_results: z.number().int().min(1).max(50).default(10).describe('Videos to return (1-50)'),
  },
  handler: async ({ channel_id, max_results }, ctx) => {
    const channelId = await resolveChannelId(ctx, channel_id);
    const ids = await ctx.catalog.listChannelVideos(channelId, { maxResults: max_results });
    const videos = await ctx.catalog.getVideosBatch(ids);
    return {
      channelId,
      totalVideos: videos.length,
      videos: videos.map((v) => ({
        videoId: v.videoId,
        title: v.title,
        publishedAt: v.publishedAt,
        duration: formatDuration(v.duration),
        views: v.viewCount,
        viewsFormatted: formatNumber(v.viewCount),
        likes: v.likeCount,
        url: videoUrl(v.videoId),
      })),
    };
  },
});

export const getTrendingVideos = defineTool({
  name: 'get_trending_videos',
  description: 'Get the most popular videos for a region, optionally within one category',
  input: {
    region_code: z.string().length(2).default('US').describe('ISO 3166-1 alpha-2 region code'),
    category_id: z.string().default('0').describe('Video category ID, "0" for all categories'),
    max_results: z.number().int().min(1).max(50).default(10).describe('Videos to return (1-50)'),
  },
  handler: async ({ region_code, category_id, max_results }, ctx) => {
    const videos = await ctx.catalog.getTrendingVideos({
      regionCode: region_code.toUpperCase(),
      categoryId: category_id,
      maxResults: max_results,
    });
    return {
      region: region_code.toUpperCase(),
      category: category_id,
      totalVideos: videos.length,
      videos: videos.map((v) => ({
        ...v,
        viewsFormatted: formatNumber(v.viewCount),
        url: videoUrl(v.videoId),
      })),
    };
  },
});

export const getPlaylistInfo = defineTool({
  name: 'get_playlist_info',
  description: 'Get a playlist and the videos it contains',
  input: {
    playlist_id: z.string().min(1).describe('YouTube playlist ID'),
    max_results: z.number().int().min(1).max(50).default(20).describe('Items to return (1-50)'),
  },
  handler: async ({ playlist_id, max_results }, ctx) => {
    const playlist = await ctx.catalog.getPlaylist(playlist_id, max_results);
    return {
      playlistId: playlist.playlistId,
      title: playlist.title,
      description: playlist.description,
      channel: playlist.channelName,
      channelId: playlist.channelId,
      totalVideos: playlist.itemCount,
      videosRetrieved: playlist.items.length,
      videos: playlist.items.map((item) => ({ ...item, url: videoUrl(item.videoId) })),
    };
  },
});

export const catalogTools: ToolDefinition[] = [
  getVideoInfo,
  getVideoTranscript,
  getVideoComments,
  searchVideos,
  getChannelInfo,
  getChannelVideos,
  getTrendingVideos,
  getPlaylistInfo,
];
