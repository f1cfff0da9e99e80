import type { EngagementMetrics, MetricSnapshot, VideoDetails } from '@tubepulse/shared';

/** Engagement scoring for single snapshots and aggregate stats for video sets */

const LIKE_WEIGHT = 0.7;
const COMMENT_WEIGHT = 0.3;
// comment rate is scaled 10x before weighting
const COMMENT_SCALE = 10;

export type Counters = Pick<MetricSnapshot, 'views' | 'likes' | 'comments'>;

export function scoreSnapshot(snapshot: Counters): EngagementMetrics {
  if (snapshot.views <= 0) {
    return { likeRate: 0, commentRate: 0, engagementScore: 0 };
  }

  const likeRate = (snapshot.likes / snapshot.views) * 100;
  const commentRate = (snapshot.comments / snapshot.views) * 100;

  return {
    likeRate,
    commentRate,
    engagementScore: likeRate * LIKE_WEIGHT + commentRate * COMMENT_WEIGHT * COMMENT_SCALE,
  };
}

export function snapshotFromVideo(video: VideoDetails, at: Date = new Date()): MetricSnapshot {
  return {
    entityId: video.videoId,
    timestamp: at,
    views: video.viewCount,
    likes: video.likeCount,
    comments: video.commentCount,
  };
}

const MS_PER_DAY = 86_400_000;

export interface EngagementStats {
  totalVideos: number;
  totalViews: number;
  totalLikes: number;
  totalComments: number;
  avgViews: number;
  avgLikes: number;
  avgComments: number;
  medianViews: number;
  /** Mean of each upload's lifetime views per day */
  viewsPerDay: number;
  /** Scored on the summed counters of the whole set */
  aggregate: EngagementMetrics;
}

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const upper = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[upper] : (sorted[upper - 1] + sorted[upper]) / 2;
}

// Uploads younger than a day count their views as one day's worth
function dailyViews(videos: VideoDetails[], now: Date): number[] {
  return videos.flatMap((video) => {
    const published = Date.parse(video.publishedAt);
    if (Number.isNaN(published)) return [];
    const ageDays = (now.getTime() - published) / MS_PER_DAY;
    return [video.viewCount / Math.max(ageDays, 1)];
  });
}

export function computeEngagementStats(videos: VideoDetails[], now: Date = new Date()): EngagementStats {
  const count = videos.length;
  const totalViews = sum(videos.map((v) => v.viewCount));
  const totalLikes = sum(videos.map((v) => v.likeCount));
  const totalComments = sum(videos.map((v) => v.commentCount));
  const daily = dailyViews(videos, now);
  const mean = (total: number, n: number) => (n > 0 ? total / n : 0);

  return {
    totalVideos: count,
    totalViews,
    totalLikes,
    totalComments,
    avgViews: mean(totalViews, count),
    avgLikes: mean(totalLikes, count),
    avgComments: mean(totalComments, count),
    medianViews: median(videos.map((v) => v.viewCount)),
    viewsPerDay: mean(sum(daily), daily.length),
    aggregate: scoreSnapshot({ views: totalViews, likes: totalLikes, comments: totalComments }),
  };
}
