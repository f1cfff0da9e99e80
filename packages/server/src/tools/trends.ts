import { z } from 'zod';
import {
  VIRAL_VIEWS_PER_HOUR,
  compareStages,
  computeGrowthRate,
  detectViralMoments,
  forecastViews,
  snapshotFromVideo,
  synthesizeSeries,
} from '@tubepulse/analyzer';
import { InsufficientDataError, round, type Availability, type SnapshotSeries } from '@tubepulse/shared';
import type { ToolContext } from '../context.js';
import { defineTool, type ToolDefinition } from './define.js';
import { getVideo } from './fetch.js';

// No counters are stored between calls, so every trend runs on a series
// estimated from the current counters (see synthesizeSeries).
const HISTORY_NOTE = 'History is estimated from current counters (30% at -14 days, 60% at -7 days)';

const videoIdArg = z.string().min(1).describe('YouTube video ID or URL');

async function seriesFor(ctx: ToolContext, input: string) {
  const video = await getVideo(ctx, input);
  const series: SnapshotSeries = synthesizeSeries(snapshotFromVideo(video, ctx.now()));
  return { video, series };
}

function unwrap<T>(result: Availability<T>): T {
  if (!result.available) throw new InsufficientDataError(result.reason);
  return result.value;
}

export const getVideoGrowthRate = defineTool({
  name: 'get_video_growth_rate',
  description: 'Growth of views and likes over the tracked history of a video',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const { video, series } = await seriesFor(ctx, video_id);
    const growth = unwrap(computeGrowthRate(series));

    return {
      videoId: video.videoId,
      title: video.title,
      from: growth.from,
      to: growth.to,
      days: growth.days,
      viewGrowthPct: round(growth.viewGrowthPct),
      viewGrowthPerDay: round(growth.viewGrowthPerDay),
      viewsPerDay: round(growth.viewsPerDay),
      likeGrowthPct: round(growth.likeGrowthPct),
      likeGrowthPerDay: round(growth.likeGrowthPerDay),
      likesPerDay: round(growth.likesPerDay),
      note: HISTORY_NOTE,
    };
  },
});

export const detectViralMomentsTool = defineTool({
  name: 'detect_viral_moments',
  description: 'Find the intervals where a video gained views faster than a views-per-hour threshold',
  input: {
    video_id: videoIdArg,
    threshold: z
      .number()
      .positive()
      .default(VIRAL_VIEWS_PER_HOUR)
      .describe('Views per hour above which an interval counts as viral'),
  },
  handler: async ({ video_id, threshold }, ctx) => {
    const { video, series } = await seriesFor(ctx, video_id);
    const moments = unwrap(detectViralMoments(series, threshold));

    return {
      videoId: video.videoId,
      title: video.title,
      threshold,
      viralMoments: moments.map((m) => ({ ...m, viewsPerHour: round(m.viewsPerHour) })),
      isViral: moments.length > 0,
      note: HISTORY_NOTE,
    };
  },
});

export const forecastVideoViews = defineTool({
  name: 'forecast_video_views',
  description: 'Project the view count of a video for the coming days from its average daily gain',
  input: {
    video_id: videoIdArg,
    days_ahead: z.number().int().min(1).max(30).default(7).describe('Days to forecast (1-30)'),
  },
  handler: async ({ video_id, days_ahead }, ctx) => {
    const { video, series } = await seriesFor(ctx, video_id);
    const forecast = unwrap(forecastViews(series, days_ahead));

    return {
      videoId: video.videoId,
      title: video.title,
      currentViews: forecast.currentViews,
      viewsPerDay: round(forecast.viewsPerDay),
      basedOnDays: forecast.basedOnDays,
      forecast: forecast.points,
      note: HISTORY_NOTE,
    };
  },
});

export const compareVideoStages = defineTool({
  name: 'compare_video_stages',
  description: 'Compare the earliest and latest tracked counters of a video',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const { video, series } = await seriesFor(ctx, video_id);
    const stages = unwrap(compareStages(series));

    return {
      videoId: video.videoId,
      title: video.title,
      ...stages,
      viewGrowthPct: round(stages.viewGrowthPct),
      note: HISTORY_NOTE,
    };
  },
});

export const trendTools: ToolDefinition[] = [
  getVideoGrowthRate,
  detectViralMomentsTool,
  forecastVideoViews,
  compareVideoStages,
];
