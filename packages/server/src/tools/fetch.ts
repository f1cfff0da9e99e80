import {
  extractVideoId,
  fetchAll,
  parseChannelRef,
  partitionResults,
  type ChannelDetails,
  type Partitioned,
  type VideoDetails,
} from '@tubepulse/shared';
import type { ToolContext } from '../context.js';

/** Channel id for a bare id, a channel URL, an @handle or a handle URL */
export async function resolveChannelId(ctx: ToolContext, input: string): Promise<string> {
  const ref = parseChannelRef(input);
  if (ref.kind === 'id') return ref.channelId;
  return ctx.catalog.resolveChannelHandle(ref.handle);
}

export async function getChannel(ctx: ToolContext, input: string): Promise<ChannelDetails> {
  return ctx.catalog.getChannel(await resolveChannelId(ctx, input));
}

export async function getVideo(ctx: ToolContext, input: string): Promise<VideoDetails> {
  return ctx.catalog.getVideo(extractVideoId(input));
}

function logSkipped<T>(ctx: ToolContext, entity: string, batch: Partitioned<T>): Partitioned<T> {
  for (const s of batch.skipped) {
    ctx.logger.warn({ id: s.id, reason: s.reason }, `Skipping unresolved ${entity}`);
  }
  return batch;
}

export async function fetchChannels(ctx: ToolContext, inputs: string[]): Promise<Partitioned<ChannelDetails>> {
  const results = await fetchAll(unique(inputs), (input) => getChannel(ctx, input));
  const batch = logSkipped(ctx, 'channel', partitionResults(results));
  // an id and a handle may name the same channel
  const seen = new Set<string>();
  return {
    resolved: batch.resolved.filter((c) => !seen.has(c.channelId) && seen.add(c.channelId)),
    skipped: batch.skipped,
  };
}

export async function fetchVideos(ctx: ToolContext, inputs: string[]): Promise<Partitioned<VideoDetails>> {
  const results = await fetchAll(unique(inputs.map(extractVideoId)), (id) => ctx.catalog.getVideo(id));
  return logSkipped(ctx, 'video', partitionResults(results));
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}
