import { ComparisonError } from '@tubepulse/shared';
import type { ChannelDetails, EntityMetrics } from '@tubepulse/shared';

export interface Ranked<T> {
  rank: number;
  entity: T;
}

/** Descending by score, 1-based ranks. Ties keep their input order. */
export function rankBy<T>(items: readonly T[], score: (item: T) => number): Ranked<T>[] {
  return [...items]
    .sort((a, b) => score(b) - score(a))
    .map((entity, i) => ({ rank: i + 1, entity }));
}

export function buildChannelMetrics(channel: ChannelDetails, isTarget = false): EntityMetrics {
  const avgViewsPerVideo = channel.viewCount / Math.max(channel.videoCount, 1);
  return {
    id: channel.channelId,
    title: channel.name,
    country: channel.country,
    subscribers: channel.subscriberCount,
    totalViews: channel.viewCount,
    videoCount: channel.videoCount,
    avgViewsPerVideo,
    engagementScore: (avgViewsPerVideo / Math.max(channel.subscriberCount, 1)) * 100,
    viewToSubRatio: channel.viewCount / Math.max(channel.subscriberCount, 1),
    isTarget,
  };
}

function findTarget(entities: readonly EntityMetrics[], targetId: string): EntityMetrics {
  const target = entities.find((e) => e.id === targetId);
  if (!target) {
    throw new ComparisonError(`Target ${targetId} is not part of the comparison set`);
  }
  return target;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

// ─── Summary ───

export interface MetricLeader {
  id: string;
  title: string;
  value: number;
}

export interface ComparisonSummary {
  mostSubscribers: MetricLeader;
  mostViews: MetricLeader;
  highestAvgViewsPerVideo: MetricLeader;
  highestEngagement: MetricLeader;
}

export function summarizeComparison(entities: readonly EntityMetrics[]): ComparisonSummary {
  if (entities.length === 0) {
    throw new ComparisonError('Cannot summarize an empty comparison set');
  }

  const leader = (pick: (e: EntityMetrics) => number): MetricLeader => {
    const top = rankBy(entities, pick)[0].entity;
    return { id: top.id, title: top.title, value: pick(top) };
  };

  return {
    mostSubscribers: leader((e) => e.subscribers),
    mostViews: leader((e) => e.totalViews),
    highestAvgViewsPerVideo: leader((e) => e.avgViewsPerVideo),
    highestEngagement: leader((e) => e.engagementScore),
  };
}

// ─── Benchmark ───

export interface Benchmark {
  target: EntityMetrics;
  totalEntities: number;
  rankBySubscribers: number;
  rankByEngagement: number;
  rankByAvgViews: number;
  competitors: EntityMetrics[];
}

export function benchmarkTarget(entities: readonly EntityMetrics[], targetId: string): Benchmark {
  const target = findTarget(entities, targetId);
  const rankOf = (pick: (e: EntityMetrics) => number): number => {
    const ranked = rankBy(entities, pick).find((r) => r.entity.id === targetId);
    return ranked ? ranked.rank : entities.length;
  };

  return {
    target,
    totalEntities: entities.length,
    rankBySubscribers: rankOf((e) => e.subscribers),
    rankByEngagement: rankOf((e) => e.engagementScore),
    rankByAvgViews: rankOf((e) => e.avgViewsPerVideo),
    competitors: entities.filter((e) => e.id !== targetId),
  };
}

// ─── Competitive advantages ───

export interface CompetitivePosition {
  target: EntityMetrics;
  averages: { subscribers: number; avgViewsPerVideo: number; viewToSubRatio: number };
  advantages: string[];
  weaknesses: string[];
}

const POSITION_RULES = [
  {
    pick: (e: EntityMetrics) => e.subscribers,
    advantage: 'Above average subscriber count',
    weakness: 'Below average subscriber count',
  },
  {
    pick: (e: EntityMetrics) => e.avgViewsPerVideo,
    advantage: 'Above average views per video',
    weakness: 'Below average views per video',
  },
  {
    pick: (e: EntityMetrics) => e.viewToSubRatio,
    advantage: 'Strong views relative to subscriber base',
    weakness: 'Weak views relative to subscriber base',
  },
] as const;

/** Each rule compares the target with the mean of the whole set, target included */
export function findCompetitiveAdvantages(
  entities: readonly EntityMetrics[],
  targetId: string,
): CompetitivePosition {
  const target = findTarget(entities, targetId);
  const advantages: string[] = [];
  const weaknesses: string[] = [];

  for (const rule of POSITION_RULES) {
    const avg = mean(entities.map(rule.pick));
    if (rule.pick(target) > avg) advantages.push(rule.advantage);
    else weaknesses.push(rule.weakness);
  }

  return {
    target,
    averages: {
      subscribers: mean(entities.map((e) => e.subscribers)),
      avgViewsPerVideo: mean(entities.map((e) => e.avgViewsPerVideo)),
      viewToSubRatio: mean(entities.map((e) => e.viewToSubRatio)),
    },
    advantages,
    weaknesses,
  };
}

// ─── Market share ───

export interface MarketShareEntry {
  id: string;
  title: string;
  subscriberSharePct: number;
  viewSharePct: number;
}

export interface MarketShare {
  totalSubscribers: number;
  totalViews: number;
  shares: MarketShareEntry[];
  leader: MarketShareEntry;
}

/** Shares keep the input order; the leader has the largest subscriber share */
export function computeMarketShare(entities: readonly EntityMetrics[]): MarketShare {
  if (entities.length === 0) {
    throw new ComparisonError('Cannot compute market share of an empty set');
  }

  const totalSubscribers = entities.reduce((s, e) => s + e.subscribers, 0);
  const totalViews = entities.reduce((s, e) => s + e.totalViews, 0);

  const shares = entities.map((e) => ({
    id: e.id,
    title: e.title,
    subscriberSharePct: (e.subscribers / Math.max(totalSubscribers, 1)) * 100,
    viewSharePct: (e.totalViews / Math.max(totalViews, 1)) * 100,
  }));

  return {
    totalSubscribers,
    totalViews,
    shares,
    leader: rankBy(shares, (s) => s.subscriberSharePct)[0].entity,
  };
}
