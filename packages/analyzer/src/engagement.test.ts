import { describe, it, expect } from 'vitest';
import { scoreSnapshot, snapshotFromVideo, computeEngagementStats } from './engagement.js';
import type { VideoDetails } from '@tubepulse/shared';

function makeVideo(overrides: Partial<VideoDetails> = {}): VideoDetails {
  return {
    videoId: 'test-' + Math.random().toString(36).slice(2, 8),
    channelId: 'UC_test',
    channelName: 'Test Channel',
    title: 'Test Video',
    description: '',
    publishedAt: '2026-01-01T00:00:00Z',
    durationIso: 'PT3M',
    duration: 180,
    viewCount: 500000,
    likeCount: 10000,
    commentCount: 1000,
    tags: [],
    categoryId: '22',
    thumbnailUrl: '',
    ...overrides,
  };
}

describe('scoreSnapshot', () => {
  it('computes like rate, comment rate and the weighted score', () => {
    const metrics = scoreSnapshot({ views: 1000, likes: 60, comments: 5 });

    expect(metrics.likeRate).toBeCloseTo(6, 10);
    expect(metrics.commentRate).toBeCloseTo(0.5, 10);
    expect(metrics.engagementScore).toBeCloseTo(5.7, 10);
  });

  it('returns zeros when there are no views', () => {
    expect(scoreSnapshot({ views: 0, likes: 3, comments: 2 })).toEqual({
      likeRate: 0,
      commentRate: 0,
      engagementScore: 0,
    });
  });

  it('weights comments ten times before the 30% share', () => {
    const metrics = scoreSnapshot({ views: 100, likes: 0, comments: 1 });
    expect(metrics.commentRate).toBe(1);
    expect(metrics.engagementScore).toBeCloseTo(3, 10);
  });
});

describe('snapshotFromVideo', () => {
  it('copies the public counters', () => {
    const at = new Date('2026-02-01T00:00:00Z');
    const snap = snapshotFromVideo(
      makeVideo({ videoId: 'v1', viewCount: 10, likeCount: 2, commentCount: 1 }),
      at,
    );
    expect(snap).toEqual({ entityId: 'v1', timestamp: at, views: 10, likes: 2, comments: 1 });
  });
});

describe('computeEngagementStats', () => {
  it('computes totals, averages and median', () => {
    const videos = [
      makeVideo({ viewCount: 1000000, likeCount: 50000, commentCount: 5000 }),
      makeVideo({ viewCount: 500000, likeCount: 25000, commentCount: 2500 }),
      makeVideo({ viewCount: 250000, likeCount: 12500, commentCount: 1250 }),
    ];
    const stats = computeEngagementStats(videos);

    expect(stats.totalVideos).toBe(3);
    expect(stats.totalViews).toBe(1750000);
    expect(stats.totalLikes).toBe(87500);
    expect(stats.totalComments).toBe(8750);
    expect(stats.avgViews).toBeCloseTo(583333, -1);
    expect(stats.medianViews).toBe(500000);
    expect(stats.aggregate.likeRate).toBeCloseTo(5, 10);
    expect(stats.aggregate.commentRate).toBeCloseTo(0.5, 10);
  });

  it('averages the middle pair for an even count', () => {
    const stats = computeEngagementStats([
      makeVideo({ viewCount: 100 }),
      makeVideo({ viewCount: 300 }),
    ]);
    expect(stats.medianViews).toBe(200);
  });

  it('measures views per day since publish', () => {
    const now = new Date('2026-01-11T00:00:00Z');
    const stats = computeEngagementStats([makeVideo({ viewCount: 1000 })], now);
    expect(stats.viewsPerDay).toBeCloseTo(100, 10);
  });

  it('skips uploads without a usable publish date in views per day', () => {
    const now = new Date('2026-01-11T00:00:00Z');
    const stats = computeEngagementStats(
      [makeVideo({ viewCount: 1000 }), makeVideo({ viewCount: 9999, publishedAt: '' })],
      now,
    );
    expect(stats.viewsPerDay).toBeCloseTo(100, 10);
  });

  it('counts a same-day upload as one day', () => {
    const now = new Date('2026-01-01T06:00:00Z');
    const stats = computeEngagementStats([makeVideo({ viewCount: 700 })], now);
    expect(stats.viewsPerDay).toBe(700);
  });

  it('handles an empty set', () => {
    const stats = computeEngagementStats([]);
    expect(stats.totalVideos).toBe(0);
    expect(stats.avgViews).toBe(0);
    expect(stats.medianViews).toBe(0);
    expect(stats.viewsPerDay).toBe(0);
    expect(stats.aggregate.engagementScore).toBe(0);
  });
});
