import type { ChannelDetails, EngagementMetrics, VideoDetails } from '@tubepulse/shared';
import { scoreSnapshot } from './engagement.js';

export type PostingFrequency = 'Daily' | 'Several times a week' | 'Weekly' | 'Monthly' | 'Inactive';

export function postingFrequency(videosPerMonth: number): PostingFrequency {
  if (videosPerMonth > 30) return 'Daily';
  if (videosPerMonth >= 8) return 'Several times a week';
  if (videosPerMonth >= 4) return 'Weekly';
  if (videosPerMonth >= 1) return 'Monthly';
  return 'Inactive';
}

export interface ContentStrategy {
  channelId: string;
  channelName: string;
  windowDays: number;
  videosInWindow: number;
  estimatedVideosPerMonth: number;
  postingFrequency: PostingFrequency;
  avgViewsPerVideo: number;
  avgDurationSeconds: number;
  engagement: EngagementMetrics;
  topVideo: { videoId: string; title: string; viewCount: number } | null;
  commonTags: string[];
}

export interface ContentStrategyOptions {
  windowDays?: number;
  tagLimit?: number;
}

/** Upload cadence and recent performance from the uploads inside one window */
export function analyzeContentStrategy(
  channel: ChannelDetails,
  recentVideos: VideoDetails[],
  opts: ContentStrategyOptions = {},
): ContentStrategy {
  const windowDays = opts.windowDays ?? 30;
  const tagLimit = opts.tagLimit ?? 10;
  const count = recentVideos.length;

  const estimatedVideosPerMonth = Math.round((count * 30) / Math.max(windowDays, 1));

  const totals = recentVideos.reduce(
    (acc, v) => ({
      views: acc.views + v.viewCount,
      likes: acc.likes + v.likeCount,
      comments: acc.comments + v.commentCount,
      duration: acc.duration + v.duration,
    }),
    { views: 0, likes: 0, comments: 0, duration: 0 },
  );

  let topVideo: ContentStrategy['topVideo'] = null;
  for (const v of recentVideos) {
    if (!topVideo || v.viewCount > topVideo.viewCount) {
      topVideo = { videoId: v.videoId, title: v.title, viewCount: v.viewCount };
    }
  }

  const tagCounts = new Map<string, number>();
  for (const v of recentVideos) {
    for (const tag of v.tags) {
      const key = tag.toLowerCase();
      tagCounts.set(key, (tagCounts.get(key) ?? 0) + 1);
    }
  }
  const commonTags = [...tagCounts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, tagLimit)
    .map(([tag]) => tag);

  return {
    channelId: channel.channelId,
    channelName: channel.name,
    windowDays,
    videosInWindow: count,
    estimatedVideosPerMonth,
    postingFrequency: postingFrequency(estimatedVideosPerMonth),
    avgViewsPerVideo: count > 0 ? totals.views / count : 0,
    avgDurationSeconds: count > 0 ? totals.duration / count : 0,
    engagement: scoreSnapshot(totals),
    topVideo,
    commonTags,
  };
}
