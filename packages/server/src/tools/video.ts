import { z } from 'zod';
import {
  assessQuality,
  describeEngagement,
  gradeEngagement,
  rankBy,
  scoreSnapshot,
  summarizeRating,
} from '@tubepulse/analyzer';
import { InsufficientDataError, formatNumber, round, type VideoDetails } from '@tubepulse/shared';
import { videoUrl } from '@tubepulse/reports';
import { defineTool, type ToolDefinition } from './define.js';
import { fetchVideos, getVideo } from './fetch.js';

const MS_PER_DAY = 86_400_000;

const videoIdArg = z.string().min(1).describe('YouTube video ID or URL');

function engagementOf(video: VideoDetails) {
  return scoreSnapshot({ views: video.viewCount, likes: video.likeCount, comments: video.commentCount });
}

function daysSincePublish(video: VideoDetails, now: Date): number {
  const published = Date.parse(video.publishedAt);
  if (Number.isNaN(published)) return 0;
  return Math.max(0, Math.floor((now.getTime() - published) / MS_PER_DAY));
}

export const getVideoAnalytics = defineTool({
  name: 'get_video_analytics',
  description: 'Get view, like and comment counts for a video along with its engagement rates and daily view velocity',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const video = await getVideo(ctx, video_id);
    const metrics = engagementOf(video);
    const days = daysSincePublish(video, ctx.now());

    return {
      videoId: video.videoId,
      title: video.title,
      channel: video.channelName,
      publishedAt: video.publishedAt,
      daysSincePublish: days,
      views: video.viewCount,
      viewsFormatted: formatNumber(video.viewCount),
      likes: video.likeCount,
      comments: video.commentCount,
      viewsPerDay: round(video.viewCount / Math.max(days, 1)),
      likeRate: round(metrics.likeRate),
      commentRate: round(metrics.commentRate),
      engagementScore: round(metrics.engagementScore),
    };
  },
});

export const analyzeVideoEngagement = defineTool({
  name: 'analyze_video_engagement',
  description: 'Rate the like and comment engagement of a video and explain what it means',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const video = await getVideo(ctx, video_id);
    const metrics = engagementOf(video);
    const rating = gradeEngagement(metrics);

    return {
      videoId: video.videoId,
      title: video.title,
      likeRate: round(metrics.likeRate),
      commentRate: round(metrics.commentRate),
      engagementScore: round(metrics.engagementScore),
      likeRating: rating.likeRating,
      commentRating: rating.commentRating,
      interpretation: describeEngagement(metrics.engagementScore),
    };
  },
});

export const getVideoPerformanceScore = defineTool({
  name: 'get_video_performance_score',
  description: 'Score a video 0-100 on engagement and give it a letter grade',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const video = await getVideo(ctx, video_id);
    const metrics = engagementOf(video);
    const rating = gradeEngagement(metrics);

    return {
      videoId: video.videoId,
      title: video.title,
      performanceScore: round(rating.score, 1),
      grade: rating.grade,
      likeRating: rating.likeRating,
      commentRating: rating.commentRating,
      summary: summarizeRating(rating),
      metrics: {
        views: video.viewCount,
        likeRate: round(metrics.likeRate),
        commentRate: round(metrics.commentRate),
        engagementScore: round(metrics.engagementScore),
      },
    };
  },
});

export const compareVideos = defineTool({
  name: 'compare_videos',
  description: 'Compare 2-10 videos side by side and rank them by views and engagement',
  input: {
    video_ids: z.array(videoIdArg).min(2).max(10).describe('2-10 YouTube video IDs or URLs'),
  },
  handler: async ({ video_ids }, ctx) => {
    const { resolved, skipped } = await fetchVideos(ctx, video_ids);
    if (resolved.length < 2) {
      throw new InsufficientDataError(
        `At least 2 videos are needed for a comparison; ${resolved.length} could be retrieved`,
      );
    }

    const scored = resolved.map((video) => {
      const metrics = engagementOf(video);
      const rating = gradeEngagement(metrics);
      return {
        metrics,
        row: {
          videoId: video.videoId,
          title: video.title,
          channel: video.channelName,
          views: video.viewCount,
          viewsFormatted: formatNumber(video.viewCount),
          likes: video.likeCount,
          comments: video.commentCount,
          likeRate: round(metrics.likeRate),
          commentRate: round(metrics.commentRate),
          engagementScore: round(metrics.engagementScore),
          grade: rating.grade,
          url: videoUrl(video.videoId),
        },
      };
    });

    // rank on unrounded scores; rounded ones tie too easily
    const byViews = rankBy(scored, (v) => v.row.views);
    const byEngagement = rankBy(scored, (v) => v.metrics.engagementScore);

    return {
      totalCompared: scored.length,
      videos: scored.map((v) => v.row),
      rankings: {
        byViews: byViews.map((r) => ({ rank: r.rank, videoId: r.entity.row.videoId, views: r.entity.row.views })),
        byEngagement: byEngagement.map((r) => ({
          rank: r.rank,
          videoId: r.entity.row.videoId,
          engagementScore: r.entity.row.engagementScore,
        })),
      },
      summary: {
        mostViewed: byViews[0].entity.row.videoId,
        mostEngaging: byEngagement[0].entity.row.videoId,
      },
      skipped,
    };
  },
});

export const analyzeVideoPotential = defineTool({
  name: 'analyze_video_potential',
  description: 'Assess the quality signals and weak spots of a video and its overall potential',
  input: { video_id: videoIdArg },
  handler: async ({ video_id }, ctx) => {
    const video = await getVideo(ctx, video_id);
    const metrics = engagementOf(video);
    const rating = gradeEngagement(metrics);
    const days = daysSincePublish(video, ctx.now());
    const quality = assessQuality({
      likeRate: metrics.likeRate,
      commentRate: metrics.commentRate,
      views: video.viewCount,
    });

    return {
      videoId: video.videoId,
      title: video.title,
      performanceScore: round(rating.score, 1),
      grade: rating.grade,
      viewsPerDay: round(video.viewCount / Math.max(days, 1)),
      ...quality,
    };
  },
});

export const videoTools: ToolDefinition[] = [
  getVideoAnalytics,
  analyzeVideoEngagement,
  getVideoPerformanceScore,
  compareVideos,
  analyzeVideoPotential,
];
