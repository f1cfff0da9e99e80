import type { MetricSnapshot, SnapshotSeries } from '@tubepulse/shared';

/** Stand-in history built from one live snapshot: 30% of today's counters two weeks
 * ago, 60% one week ago, 100% now. Nothing is stored between calls. */

const MS_PER_DAY = 86_400_000;

export const SYNTHETIC_STAGES = [
  { offsetDays: -14, fraction: 0.3 },
  { offsetDays: -7, fraction: 0.6 },
  { offsetDays: 0, fraction: 1.0 },
] as const;

export function synthesizeSeries(current: MetricSnapshot): SnapshotSeries {
  const now = current.timestamp.getTime();

  return SYNTHETIC_STAGES.map(({ offsetDays, fraction }) => ({
    entityId: current.entityId,
    timestamp: new Date(now + offsetDays * MS_PER_DAY),
    views: Math.floor(current.views * fraction),
    likes: Math.floor(current.likes * fraction),
    comments: Math.floor(current.comments * fraction),
  }));
}
