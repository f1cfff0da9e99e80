import {
  assessQuality,
  computeEngagementStats,
  gradeEngagement,
  rankBy,
  scoreSnapshot,
  summarizeRating,
} from '@tubepulse/analyzer';
import { formatDuration, formatNumber, round } from '@tubepulse/shared';
import type {
  ChannelDetails,
  CommentRating,
  EngagementMetrics,
  Grade,
  LikeRating,
  QualityAssessment,
  VideoDetails,
} from '@tubepulse/shared';

/** Channel and video performance reports assembled from live counters.
 * Rates are percentages rounded to two decimals; counts carry a formatted twin. */

const TOP_N = 3;

export interface PerformanceSection {
  score: number;
  grade: Grade;
  likeRating: LikeRating;
  commentRating: CommentRating;
  summary: string;
}

export interface VideoRow {
  videoId: string;
  title: string;
  publishedAt: string;
  views: number;
  viewsFormatted: string;
  likes: number;
  likesFormatted: string;
  comments: number;
  likeRate: number;
  commentRate: number;
  engagementScore: number;
  performanceScore: number;
  grade: Grade;
  likeRating: LikeRating;
  commentRating: CommentRating;
  url: string;
}

export interface ChannelReport {
  generatedAt: string;
  periodDays: number;
  channel: {
    channelId: string;
    title: string;
    subscribers: number;
    subscribersFormatted: string;
    totalViews: number;
    totalViewsFormatted: string;
    totalVideos: number;
    country: string;
  };
  periodSummary: {
    videosPublished: number;
    totalViews: number;
    totalViewsFormatted: string;
    totalLikes: number;
    totalLikesFormatted: string;
    totalComments: number;
    avgViews: number;
    avgViewsFormatted: string;
    medianViews: number;
    avgLikes: number;
    avgComments: number;
    avgViewsPerDay: number;
    avgLikeRate: number;
  };
  engagement: { likeRate: number; commentRate: number; engagementScore: number };
  performance: PerformanceSection;
  topPerformers: { byViews: VideoRow[]; byLikeRate: VideoRow[] };
  analysis: QualityAssessment;
  videos?: VideoRow[];
}

export interface VideoReport {
  generatedAt: string;
  video: {
    videoId: string;
    title: string;
    channel: string;
    channelId: string;
    publishedAt: string;
    duration: string;
    url: string;
  };
  metrics: {
    views: number;
    viewsFormatted: string;
    likes: number;
    likesFormatted: string;
    comments: number;
    commentsFormatted: string;
    likeRate: number;
    commentRate: number;
    engagementScore: number;
  };
  performance: PerformanceSection;
  analysis: QualityAssessment;
}

export interface ChannelReportOptions {
  periodDays: number;
  includeVideos?: boolean;
  now?: Date;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/** Raw metrics stay beside the rounded row so rankings never see rounding ties */
interface ScoredVideo {
  metrics: EngagementMetrics;
  row: VideoRow;
}

function scoreVideo(video: VideoDetails): ScoredVideo {
  const metrics = scoreSnapshot({ views: video.viewCount, likes: video.likeCount, comments: video.commentCount });
  const rating = gradeEngagement(metrics);

  return {
    metrics,
    row: {
      videoId: video.videoId,
      title: video.title,
      publishedAt: video.publishedAt,
      views: video.viewCount,
      viewsFormatted: formatNumber(video.viewCount),
      likes: video.likeCount,
      likesFormatted: formatNumber(video.likeCount),
      comments: video.commentCount,
      likeRate: round(metrics.likeRate),
      commentRate: round(metrics.commentRate),
      engagementScore: round(metrics.engagementScore),
      performanceScore: round(rating.score, 1),
      grade: rating.grade,
      likeRating: rating.likeRating,
      commentRating: rating.commentRating,
      url: videoUrl(video.videoId),
    },
  };
}

function performanceSection(metrics: EngagementMetrics): PerformanceSection {
  const rating = gradeEngagement(metrics);
  return { ...rating, score: round(rating.score, 1), summary: summarizeRating(rating) };
}

export function buildChannelReport(
  channel: ChannelDetails,
  videosInWindow: VideoDetails[],
  opts: ChannelReportOptions,
): ChannelReport {
  const now = opts.now ?? new Date();
  const stats = computeEngagementStats(videosInWindow, now);
  const aggregate = stats.aggregate;
  const scored = videosInWindow.map(scoreVideo);

  const report: ChannelReport = {
    generatedAt: now.toISOString(),
    periodDays: opts.periodDays,
    channel: {
      channelId: channel.channelId,
      title: channel.name,
      subscribers: channel.subscriberCount,
      subscribersFormatted: formatNumber(channel.subscriberCount),
      totalViews: channel.viewCount,
      totalViewsFormatted: formatNumber(channel.viewCount),
      totalVideos: channel.videoCount,
      country: channel.country,
    },
    periodSummary: {
      videosPublished: stats.totalVideos,
      totalViews: stats.totalViews,
      totalViewsFormatted: formatNumber(stats.totalViews),
      totalLikes: stats.totalLikes,
      totalLikesFormatted: formatNumber(stats.totalLikes),
      totalComments: stats.totalComments,
      avgViews: Math.round(stats.avgViews),
      avgViewsFormatted: formatNumber(Math.round(stats.avgViews)),
      medianViews: Math.round(stats.medianViews),
      avgLikes: round(stats.avgLikes),
      avgComments: round(stats.avgComments),
      avgViewsPerDay: round(stats.viewsPerDay),
      avgLikeRate: round(aggregate.likeRate),
    },
    engagement: {
      likeRate: round(aggregate.likeRate),
      commentRate: round(aggregate.commentRate),
      engagementScore: round(aggregate.engagementScore),
    },
    performance: performanceSection(aggregate),
    topPerformers: {
      byViews: rankBy(scored, (v) => v.row.views)
        .slice(0, TOP_N)
        .map((r) => r.entity.row),
      byLikeRate: rankBy(scored, (v) => v.metrics.likeRate)
        .slice(0, TOP_N)
        .map((r) => r.entity.row),
    },
    // reach is judged on the average upload, not the window total
    analysis: assessQuality({
      likeRate: aggregate.likeRate,
      commentRate: aggregate.commentRate,
      views: stats.avgViews,
    }),
  };

  if (opts.includeVideos) {
    report.videos = scored.map((v) => v.row);
  }

  return report;
}

export function buildVideoReport(video: VideoDetails, now: Date = new Date()): VideoReport {
  const metrics = scoreSnapshot({
    views: video.viewCount,
    likes: video.likeCount,
    comments: video.commentCount,
  });

  return {
    generatedAt: now.toISOString(),
    video: {
      videoId: video.videoId,
      title: video.title,
      channel: video.channelName,
      channelId: video.channelId,
      publishedAt: video.publishedAt,
      duration: formatDuration(video.duration),
      url: videoUrl(video.videoId),
    },
    metrics: {
      views: video.viewCount,
      viewsFormatted: formatNumber(video.viewCount),
      likes: video.likeCount,
      likesFormatted: formatNumber(video.likeCount),
      comments: video.commentCount,
      commentsFormatted: formatNumber(video.commentCount),
      likeRate: round(metrics.likeRate),
      commentRate: round(metrics.commentRate),
      engagementScore: round(metrics.engagementScore),
    },
    performance: performanceSection(metrics),
    analysis: assessQuality({
      likeRate: metrics.likeRate,
      commentRate: metrics.commentRate,
      views: video.viewCount,
    }),
  };
}
