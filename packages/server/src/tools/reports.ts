import { z } from 'zod';
import { buildChannelReport, buildVideoReport } from '@tubepulse/reports';
import { defineTool, type ToolDefinition } from './define.js';
import { getChannel, getVideo } from './fetch.js';

const MS_PER_DAY = 86_400_000;
const REPORT_MAX_VIDEOS = 50;

export const generateChannelReport = defineTool({
  name: 'generate_channel_report',
  description: 'Performance report for a channel over a recent period: totals, engagement, top videos and analysis',
  input: {
    channel_id: z.string().min(1).describe('YouTube channel ID, channel URL or @handle'),
    period_days: z.number().int().min(1).max(365).default(7).describe('Days to cover (1-365)'),
    include_videos: z.boolean().default(false).describe('Include a row for every video in the period'),
  },
  handler: async ({ channel_id, period_days, include_videos }, ctx) => {
    const now = ctx.now();
    const channel = await getChannel(ctx, channel_id);
    const ids = await ctx.catalog.listChannelVideos(channel.channelId, {
      publishedAfter: new Date(now.getTime() - period_days * MS_PER_DAY),
      maxResults: REPORT_MAX_VIDEOS,
    });
    const videos = await ctx.catalog.getVideosBatch(ids);

    ctx.logger.info({ channelId: channel.channelId, videos: videos.length, periodDays: period_days }, 'Channel report generated');
    return buildChannelReport(channel, videos, { periodDays: period_days, includeVideos: include_videos, now });
  },
});

export const generateVideoReport = defineTool({
  name: 'generate_video_report',
  description: 'Performance report for a single video: metrics, grade and quality analysis',
  input: {
    video_id: z.string().min(1).describe('YouTube video ID or URL'),
  },
  handler: async ({ video_id }, ctx) => {
    const video = await getVideo(ctx, video_id);
    return buildVideoReport(video, ctx.now());
  },
});

export const reportTools: ToolDefinition[] = [generateChannelReport, generateVideoReport];
