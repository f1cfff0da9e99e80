// ─── YouTube Catalog Types ───

export interface VideoDetails {
  videoId: string;
  channelId: string;
  channelName: string;
  title: string;
  description: string;
  publishedAt: string;
  durationIso: string; // raw ISO 8601, e.g. PT4M13S
  duration: number; // seconds
  viewCount: number;
  likeCount: number;
  commentCount: number;
  tags: string[];
  categoryId: string;
  thumbnailUrl: string;
}

export interface ChannelDetails {
  channelId: string;
  name: string;
  description: string;
  customUrl: string;
  publishedAt: string;
  country: string;
  subscriberCount: number;
  viewCount: number;
  videoCount: number;
  thumbnailUrl: string;
}

export interface SearchResult {
  videoId: string;
  title: string;
  description: string;
  channelId: string;
  channelName: string;
  publishedAt: string;
  thumbnailUrl: string;
}

export interface CommentInfo {
  author: string;
  text: string;
  likeCount: number;
  publishedAt: string;
  replyCount: number;
}

export interface TrendingVideo extends SearchResult {
  viewCount: number;
  likeCount: number;
}

export interface TranscriptSegment {
  /** seconds from the start of the video */
  start: number;
  duration: number;
  text: string;
}

export interface TranscriptInfo {
  videoId: string;
  language: string;
  segments: TranscriptSegment[];
}

export interface PlaylistItem {
  videoId: string;
  title: string;
  description: string;
  channelName: string;
  publishedAt: string;
  position: number;
  thumbnailUrl: string;
}

export interface PlaylistInfo {
  playlistId: string;
  title: string;
  description: string;
  channelId: string;
  channelName: string;
  itemCount: number;
  items: PlaylistItem[];
}

export const SEARCH_ORDERS = ['date', 'rating', 'relevance', 'title', 'viewCount'] as const;
export type SearchOrder = (typeof SEARCH_ORDERS)[number];

export const COMMENT_ORDERS = ['time', 'relevance'] as const;
export type CommentOrder = (typeof COMMENT_ORDERS)[number];

// ─── Metric Snapshots ───

/** One point-in-time reading of an entity's public counters. */
export interface MetricSnapshot {
  readonly entityId: string;
  readonly timestamp: Date;
  readonly views: number;
  readonly likes: number;
  readonly comments: number;
}

/** Ordered earliest first; never empty when produced by the analyzer. */
export type SnapshotSeries = readonly MetricSnapshot[];

// ─── Engagement & Grading ───

export interface EngagementMetrics {
  likeRate: number; // percent
  commentRate: number; // percent
  engagementScore: number;
}

export const GRADES = ['A', 'B', 'C', 'D', 'F'] as const;
export type Grade = (typeof GRADES)[number];

export const LIKE_RATINGS = ['Excellent', 'Good', 'Average', 'Below Average'] as const;
export type LikeRating = (typeof LIKE_RATINGS)[number];

export const COMMENT_RATINGS = [
  'High Engagement',
  'Moderate Engagement',
  'Low Engagement',
] as const;
export type CommentRating = (typeof COMMENT_RATINGS)[number];

export interface PerformanceRating {
  score: number; // 0-100
  grade: Grade;
  likeRating: LikeRating;
  commentRating: CommentRating;
}

export type OverallAssessment = 'Strong' | 'Average' | 'Needs Improvement';

export interface QualityAssessment {
  qualitySignals: string[];
  areasForImprovement: string[];
  overallAssessment: OverallAssessment;
}

// ─── Multi-Entity Comparison ───

export interface EntityMetrics {
  id: string;
  title: string;
  country: string;
  subscribers: number;
  totalViews: number;
  videoCount: number;
  avgViewsPerVideo: number;
  engagementScore: number;
  viewToSubRatio: number;
  isTarget: boolean;
}

/** Result of an operation that needs at least two data points. */
export type Availability<T> =
  | { available: true; value: T }
  | { available: false; reason: string };
