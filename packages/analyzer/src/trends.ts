import type { Availability, MetricSnapshot, SnapshotSeries } from '@tubepulse/shared';

const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;

export const VIRAL_VIEWS_PER_HOUR = 10_000;

function endpoints(
  series: SnapshotSeries,
): Availability<{ first: MetricSnapshot; last: MetricSnapshot }> {
  if (series.length < 2) {
    return { available: false, reason: 'Insufficient historical data: at least 2 snapshots are required' };
  }
  return { available: true, value: { first: series[0], last: series[series.length - 1] } };
}

/** Whole days between two snapshots, never less than 1 */
function elapsedDays(first: MetricSnapshot, last: MetricSnapshot): number {
  return Math.max(1, Math.floor((last.timestamp.getTime() - first.timestamp.getTime()) / MS_PER_DAY));
}

function growthPct(from: number, to: number): number {
  const base = Math.max(from, 1);
  return ((to - base) / base) * 100;
}

// ─── Growth ───

export interface GrowthRate {
  from: Date;
  to: Date;
  days: number;
  viewGrowthPct: number;
  viewGrowthPerDay: number;
  viewsPerDay: number;
  likeGrowthPct: number;
  likeGrowthPerDay: number;
  likesPerDay: number;
}

export function computeGrowthRate(series: SnapshotSeries): Availability<GrowthRate> {
  const ends = endpoints(series);
  if (!ends.available) return ends;

  const { first, last } = ends.value;
  const days = elapsedDays(first, last);
  const viewGrowthPct = growthPct(first.views, last.views);
  const likeGrowthPct = growthPct(first.likes, last.likes);

  return {
    available: true,
    value: {
      from: first.timestamp,
      to: last.timestamp,
      days,
      viewGrowthPct,
      viewGrowthPerDay: viewGrowthPct / days,
      viewsPerDay: (last.views - first.views) / days,
      likeGrowthPct,
      likeGrowthPerDay: likeGrowthPct / days,
      likesPerDay: (last.likes - first.likes) / days,
    },
  };
}

// ─── Viral moments ───

export interface ViralMoment {
  timestamp: Date;
  viewsPerHour: number;
  totalViews: number;
}

/**
 * Flags every consecutive pair whose view velocity is strictly above `threshold`
 * views per hour. Pairs with no positive elapsed time are skipped.
 */
export function detectViralMoments(
  series: SnapshotSeries,
  threshold: number = VIRAL_VIEWS_PER_HOUR,
): Availability<ViralMoment[]> {
  const ends = endpoints(series);
  if (!ends.available) return ends;

  const moments: ViralMoment[] = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1];
    const curr = series[i];
    const hours = (curr.timestamp.getTime() - prev.timestamp.getTime()) / MS_PER_HOUR;
    if (hours <= 0) continue;

    const viewsPerHour = (curr.views - prev.views) / hours;
    if (viewsPerHour > threshold) {
      moments.push({ timestamp: curr.timestamp, viewsPerHour, totalViews: curr.views });
    }
  }

  return { available: true, value: moments };
}

// ─── Forecast ───

export interface ForecastPoint {
  day: number;
  date: Date;
  predictedViews: number;
}

export interface ViewForecast {
  currentViews: number;
  viewsPerDay: number;
  basedOnDays: number;
  points: ForecastPoint[];
}

/** Straight-line projection of the average daily view gain across the series */
export function forecastViews(series: SnapshotSeries, daysAhead: number): Availability<ViewForecast> {
  if (!Number.isInteger(daysAhead) || daysAhead < 1) {
    throw new RangeError(`daysAhead must be a positive integer, got ${daysAhead}`);
  }

  const ends = endpoints(series);
  if (!ends.available) return ends;

  const { first, last } = ends.value;
  const days = elapsedDays(first, last);
  const viewsPerDay = (last.views - first.views) / days;

  const points: ForecastPoint[] = [];
  for (let day = 1; day <= daysAhead; day++) {
    points.push({
      day,
      date: new Date(last.timestamp.getTime() + day * MS_PER_DAY),
      predictedViews: Math.round(last.views + viewsPerDay * day),
    });
  }

  return {
    available: true,
    value: { currentViews: last.views, viewsPerDay, basedOnDays: days, points },
  };
}

// ─── Stage comparison ───

export interface StageComparison {
  from: Date;
  to: Date;
  spanLabel: string;
  viewsDelta: number;
  likesDelta: number;
  commentsDelta: number;
  viewGrowthPct: number;
}

export function formatSpan(ms: number): string {
  const days = Math.floor(ms / MS_PER_DAY);
  if (days >= 1) return days === 1 ? '1 day' : `${days} days`;
  const hours = Math.floor(ms / MS_PER_HOUR);
  return hours === 1 ? '1 hour' : `${hours} hours`;
}

/** Earliest against latest snapshot */
export function compareStages(series: SnapshotSeries): Availability<StageComparison> {
  const ends = endpoints(series);
  if (!ends.available) return ends;

  const { first, last } = ends.value;
  return {
    available: true,
    value: {
      from: first.timestamp,
      to: last.timestamp,
      spanLabel: formatSpan(last.timestamp.getTime() - first.timestamp.getTime()),
      viewsDelta: last.views - first.views,
      likesDelta: last.likes - first.likes,
      commentsDelta: last.comments - first.comments,
      viewGrowthPct: growthPct(first.views, last.views),
    },
  };
}
