import { describe, it, expect, beforeEach } from 'vitest';
import {
  compareVideoStages,
  detectViralMomentsTool,
  forecastVideoViews,
  getVideoGrowthRate,
} from './trends.js';
import { FakeCatalog, jsonOf, makeContext, makeVideo, textOf } from '../test-helpers.js';

// Current counters 1000/60/5 give an estimated history of
// 300/18/1 on Apr 1, 600/36/3 on Apr 8 and 1000/60/5 on Apr 15.
describe('trend tools', () => {
  let catalog: FakeCatalog;

  beforeEach(() => {
    catalog = new FakeCatalog().addVideo(makeVideo({ videoId: 'abc' }));
  });

  it('get_video_growth_rate measures growth over two weeks', async () => {
    const result = await getVideoGrowthRate.run({ video_id: 'abc' }, makeContext(catalog));

    expect(jsonOf(result)).toMatchObject({
      videoId: 'abc',
      from: '2026-04-01T00:00:00.000Z',
      to: '2026-04-15T00:00:00.000Z',
      days: 14,
      viewGrowthPct: 233.33,
      viewGrowthPerDay: 16.67,
      viewsPerDay: 50,
      likeGrowthPct: 233.33,
      likesPerDay: 3,
    });
  });

  describe('detect_viral_moments', () => {
    it('finds nothing under the default threshold', async () => {
      const result = await detectViralMomentsTool.run({ video_id: 'abc' }, makeContext(catalog));

      expect(jsonOf(result)).toMatchObject({ threshold: 10_000, viralMoments: [], isViral: false });
    });

    it('flags both intervals with a low threshold', async () => {
      const result = await detectViralMomentsTool.run({ video_id: 'abc', threshold: 1 }, makeContext(catalog));

      expect(jsonOf(result)).toMatchObject({
        isViral: true,
        viralMoments: [
          { timestamp: '2026-04-08T00:00:00.000Z', viewsPerHour: 1.79, totalViews: 600 },
          { timestamp: '2026-04-15T00:00:00.000Z', viewsPerHour: 2.38, totalViews: 1000 },
        ],
      });
    });

    it('rejects a non-positive threshold', async () => {
      const result = await detectViralMomentsTool.run({ video_id: 'abc', threshold: 0 }, makeContext(catalog));
      expect(textOf(result)).toMatch(/^Error: Invalid arguments: threshold: /);
    });
  });

  describe('forecast_video_views', () => {
    it('projects the daily gain forward', async () => {
      const result = await forecastVideoViews.run({ video_id: 'abc', days_ahead: 2 }, makeContext(catalog));

      expect(jsonOf(result)).toMatchObject({
        currentViews: 1000,
        viewsPerDay: 50,
        basedOnDays: 14,
        forecast: [
          { day: 1, date: '2026-04-16T00:00:00.000Z', predictedViews: 1050 },
          { day: 2, date: '2026-04-17T00:00:00.000Z', predictedViews: 1100 },
        ],
      });
    });

    it('defaults to a week', async () => {
      const result = await forecastVideoViews.run({ video_id: 'abc' }, makeContext(catalog));
      const body = jsonOf(result);
      expect(body).toHaveProperty('forecast');
      expect(body).toMatchObject({ forecast: expect.arrayContaining([expect.objectContaining({ day: 7, predictedViews: 1350 })]) });
    });

    it('caps the horizon at 30 days', async () => {
      const result = await forecastVideoViews.run({ video_id: 'abc', days_ahead: 31 }, makeContext(catalog));
      expect(textOf(result)).toMatch(/^Error: Invalid arguments: days_ahead: /);
    });
  });

  it('compare_video_stages reports deltas between first and last', async () => {
    const result = await compareVideoStages.run({ video_id: 'abc' }, makeContext(catalog));

    expect(jsonOf(result)).toMatchObject({
      spanLabel: '14 days',
      viewsDelta: 700,
      likesDelta: 42,
      commentsDelta: 4,
      viewGrowthPct: 233.33,
    });
  });

  it('passes catalog errors through as error results', async () => {
    const result = await compareVideoStages.run({ video_id: 'nope' }, makeContext(catalog));
    expect(textOf(result)).toBe('Error: Video not found: nope');
  });
});
