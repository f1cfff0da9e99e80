import { z } from 'zod';
import {
  analyzeContentStrategy,
  benchmarkTarget,
  buildChannelMetrics,
  computeMarketShare,
  findCompetitiveAdvantages,
  rankBy,
  summarizeComparison,
  type MarketShareEntry,
} from '@tubepulse/analyzer';
import {
  InsufficientDataError,
  formatNumber,
  round,
  type EntityMetrics,
} from '@tubepulse/shared';
import type { ToolContext } from '../context.js';
import { defineTool, type ToolDefinition } from './define.js';
import { fetchChannels, getChannel } from './fetch.js';

const MS_PER_DAY = 86_400_000;
const STRATEGY_WINDOW_DAYS = 30;
const STRATEGY_MAX_VIDEOS = 50;

const channelIdArg = z.string().min(1).describe('YouTube channel ID, channel URL or @handle');

function present(m: EntityMetrics) {
  return {
    channelId: m.id,
    title: m.title,
    country: m.country,
    subscribers: m.subscribers,
    subscribersFormatted: formatNumber(m.subscribers),
    totalViews: m.totalViews,
    totalViewsFormatted: formatNumber(m.totalViews),
    videoCount: m.videoCount,
    avgViewsPerVideo: round(m.avgViewsPerVideo),
    engagementScore: round(m.engagementScore),
    viewToSubRatio: round(m.viewToSubRatio),
    isTarget: m.isTarget,
  };
}

/** Target plus competitors; the target must resolve, competitors may be skipped */
async function targetWithCompetitors(ctx: ToolContext, targetInput: string, competitorInputs: string[]) {
  const target = await getChannel(ctx, targetInput);
  const { resolved, skipped } = await fetchChannels(ctx, competitorInputs);
  const competitors = resolved.filter((c) => c.channelId !== target.channelId);
  if (competitors.length === 0) {
    throw new InsufficientDataError('None of the comparison channels could be retrieved');
  }

  const entities = [
    buildChannelMetrics(target, true),
    ...competitors.map((c) => buildChannelMetrics(c)),
  ];
  return { target, entities, skipped };
}

export const compareChannels = defineTool({
  name: 'compare_channels',
  description: 'Compare 2-5 YouTube channels on subscribers, views and per-video performance',
  input: {
    channel_ids: z.array(channelIdArg).min(2).max(5).describe('2-5 channel IDs, URLs or @handles'),
  },
  handler: async ({ channel_ids }, ctx) => {
    const { resolved, skipped } = await fetchChannels(ctx, channel_ids);
    if (resolved.length < 2) {
      throw new InsufficientDataError(
        `At least 2 channels are needed for a comparison; ${resolved.length} could be retrieved`,
      );
    }

    const entities = resolved.map((c) => buildChannelMetrics(c));
    const summary = summarizeComparison(entities);

    return {
      totalCompared: entities.length,
      channels: entities.map(present),
      rankings: {
        bySubscribers: rankBy(entities, (e) => e.subscribers).map((r) => ({ rank: r.rank, channelId: r.entity.id })),
        byTotalViews: rankBy(entities, (e) => e.totalViews).map((r) => ({ rank: r.rank, channelId: r.entity.id })),
        byEngagement: rankBy(entities, (e) => e.engagementScore).map((r) => ({ rank: r.rank, channelId: r.entity.id })),
      },
      summary: {
        mostSubscribers: summary.mostSubscribers,
        mostViews: summary.mostViews,
        highestAvgViewsPerVideo: { ...summary.highestAvgViewsPerVideo, value: round(summary.highestAvgViewsPerVideo.value) },
        highestEngagement: { ...summary.highestEngagement, value: round(summary.highestEngagement.value) },
      },
      skipped,
    };
  },
});

export const analyzeContentStrategyTool = defineTool({
  name: 'analyze_content_strategy',
  description: 'Estimate upload frequency and recent performance of a channel from its last 30 days of uploads',
  input: { channel_id: channelIdArg },
  handler: async ({ channel_id }, ctx) => {
    const channel = await getChannel(ctx, channel_id);
    const since = new Date(ctx.now().getTime() - STRATEGY_WINDOW_DAYS * MS_PER_DAY);
    const ids = await ctx.catalog.listChannelVideos(channel.channelId, {
      publishedAfter: since,
      maxResults: STRATEGY_MAX_VIDEOS,
    });
    const videos = await ctx.catalog.getVideosBatch(ids);
    const strategy = analyzeContentStrategy(channel, videos, { windowDays: STRATEGY_WINDOW_DAYS });

    return {
      ...strategy,
      avgViewsPerVideo: round(strategy.avgViewsPerVideo),
      avgDurationSeconds: Math.round(strategy.avgDurationSeconds),
      engagement: {
        likeRate: round(strategy.engagement.likeRate),
        commentRate: round(strategy.engagement.commentRate),
        engagementScore: round(strategy.engagement.engagementScore),
      },
    };
  },
});

export const benchmarkPerformance = defineTool({
  name: 'benchmark_performance',
  description: 'Rank a channel against 1-4 competitors by subscribers, engagement and views per video',
  input: {
    target_channel_id: channelIdArg.describe('Channel to benchmark'),
    competitor_channel_ids: z.array(channelIdArg).min(1).max(4).describe('1-4 competitor channels'),
  },
  handler: async ({ target_channel_id, competitor_channel_ids }, ctx) => {
    const { target, entities, skipped } = await targetWithCompetitors(ctx, target_channel_id, competitor_channel_ids);
    const bench = benchmarkTarget(entities, target.channelId);

    return {
      target: present(bench.target),
      totalChannels: bench.totalEntities,
      rankBySubscribers: bench.rankBySubscribers,
      rankByEngagement: bench.rankByEngagement,
      rankByAvgViews: bench.rankByAvgViews,
      competitors: bench.competitors.map(present),
      skipped,
    };
  },
});

export const identifyCompetitiveAdvantages = defineTool({
  name: 'identify_competitive_advantages',
  description: 'List where a channel is above or below the average of a comparison group',
  input: {
    channel_id: channelIdArg.describe('Channel to analyze'),
    comparison_channel_ids: z.array(channelIdArg).min(1).max(4).describe('1-4 channels to compare against'),
  },
  handler: async ({ channel_id, comparison_channel_ids }, ctx) => {
    const { target, entities, skipped } = await targetWithCompetitors(ctx, channel_id, comparison_channel_ids);
    const position = findCompetitiveAdvantages(entities, target.channelId);

    return {
      channel: present(position.target),
      groupAverages: {
        subscribers: round(position.averages.subscribers),
        avgViewsPerVideo: round(position.averages.avgViewsPerVideo),
        viewToSubRatio: round(position.averages.viewToSubRatio),
      },
      advantages: position.advantages,
      weaknesses: position.weaknesses,
      comparedWith: entities.filter((e) => !e.isTarget).map((e) => e.id),
      skipped,
    };
  },
});

export const trackMarketShare = defineTool({
  name: 'track_market_share',
  description: 'Share of subscribers and views held by each of 2-5 channels',
  input: {
    channel_ids: z.array(channelIdArg).min(2).max(5).describe('2-5 channel IDs, URLs or @handles'),
  },
  handler: async ({ channel_ids }, ctx) => {
    const { resolved, skipped } = await fetchChannels(ctx, channel_ids);
    if (resolved.length === 0) {
      throw new InsufficientDataError('None of the channels could be retrieved');
    }

    const market = computeMarketShare(resolved.map((c) => buildChannelMetrics(c)));
    const share = (s: MarketShareEntry) => ({
      channelId: s.id,
      title: s.title,
      subscriberSharePct: round(s.subscriberSharePct),
      viewSharePct: round(s.viewSharePct),
    });

    return {
      totalSubscribers: market.totalSubscribers,
      totalSubscribersFormatted: formatNumber(market.totalSubscribers),
      totalViews: market.totalViews,
      totalViewsFormatted: formatNumber(market.totalViews),
      shares: market.shares.map(share),
      leader: share(market.leader),
      skipped,
    };
  },
});

export const channelTools: ToolDefinition[] = [
  compareChannels,
  analyzeContentStrategyTool,
  benchmarkPerformance,
  identifyCompetitiveAdvantages,
  trackMarketShare,
];
