import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GRADING_POLICY,
  describeEngagement,
  gradeEngagement,
  gradeForScore,
  performanceScore,
  rateComments,
  rateLikes,
  summarizeRating,
  type GradingPolicy,
} from './grading.js';
import { scoreSnapshot } from './engagement.js';

describe('gradeForScore', () => {
  it.each([
    [80, 'A'],
    [79.99, 'B'],
    [60, 'B'],
    [40, 'C'],
    [20, 'D'],
    [19.99, 'F'],
    [0, 'F'],
  ])('score %d → %s', (score, grade) => {
    expect(gradeForScore(score)).toBe(grade);
  });
});

describe('performanceScore', () => {
  it('scales by ten and clamps to 0..100', () => {
    expect(performanceScore(2.5)).toBe(25);
    expect(performanceScore(12)).toBe(100);
    expect(performanceScore(-1)).toBe(0);
  });
});

describe('rateLikes / rateComments', () => {
  it('applies inclusive like-rate thresholds', () => {
    expect(rateLikes(5)).toBe('Excellent');
    expect(rateLikes(3)).toBe('Good');
    expect(rateLikes(1)).toBe('Average');
    expect(rateLikes(0.99)).toBe('Below Average');
  });

  it('applies inclusive comment-rate thresholds', () => {
    expect(rateComments(0.5)).toBe('High Engagement');
    expect(rateComments(0.1)).toBe('Moderate Engagement');
    expect(rateComments(0.09)).toBe('Low Engagement');
  });
});

describe('gradeEngagement', () => {
  it('grades a 1000/60/5 snapshot', () => {
    const rating = gradeEngagement(scoreSnapshot({ views: 1000, likes: 60, comments: 5 }));

    expect(rating.score).toBeCloseTo(57, 8);
    expect(rating.grade).toBe('C');
    expect(rating.likeRating).toBe('Excellent');
    expect(rating.commentRating).toBe('High Engagement');
  });

  it('grades a video without views as F', () => {
    expect(gradeEngagement(scoreSnapshot({ views: 0, likes: 0, comments: 0 }))).toEqual({
      score: 0,
      grade: 'F',
      likeRating: 'Below Average',
      commentRating: 'Low Engagement',
    });
  });

  it('honours a custom policy', () => {
    const lenient: GradingPolicy = {
      ...DEFAULT_GRADING_POLICY,
      grades: { A: 50, B: 40, C: 30, D: 10 },
    };
    const rating = gradeEngagement({ likeRate: 6, commentRate: 0.5, engagementScore: 5.7 }, lenient);
    expect(rating.grade).toBe('A');
  });
});

describe('summarizeRating', () => {
  it('renders grade label, rounded score and both ratings', () => {
    expect(
      summarizeRating({
        score: 57.4,
        grade: 'C',
        likeRating: 'Excellent',
        commentRating: 'High Engagement',
      }),
    ).toBe('Solid performance (57/100): Excellent like rate, High Engagement in comments');
  });
});

describe('describeEngagement', () => {
  it('picks a sentence by score band', () => {
    expect(describeEngagement(0.5)).toBe('Low engagement - most viewers watch without interacting');
    expect(describeEngagement(3)).toBe('Above-average engagement - the audience responds well');
  });
});
