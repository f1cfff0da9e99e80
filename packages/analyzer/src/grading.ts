import type {
  CommentRating,
  EngagementMetrics,
  Grade,
  LikeRating,
  PerformanceRating,
} from '@tubepulse/shared';

/** Maps engagement onto a 0-100 score, a letter grade and qualitative ratings.
 * Every threshold is inclusive (>=). */

export interface GradingPolicy {
  /** engagementScore is multiplied by this, then clamped to 0..100 */
  scoreMultiplier: number;
  grades: { A: number; B: number; C: number; D: number };
  likeRate: { excellent: number; good: number; average: number };
  commentRate: { high: number; moderate: number };
}

export const DEFAULT_GRADING_POLICY: GradingPolicy = {
  scoreMultiplier: 10,
  grades: { A: 80, B: 60, C: 40, D: 20 },
  likeRate: { excellent: 5, good: 3, average: 1 },
  commentRate: { high: 0.5, moderate: 0.1 },
};

export function performanceScore(
  engagementScore: number,
  policy: GradingPolicy = DEFAULT_GRADING_POLICY,
): number {
  return Math.max(0, Math.min(engagementScore * policy.scoreMultiplier, 100));
}

export function gradeForScore(score: number, policy: GradingPolicy = DEFAULT_GRADING_POLICY): Grade {
  if (score >= policy.grades.A) return 'A';
  if (score >= policy.grades.B) return 'B';
  if (score >= policy.grades.C) return 'C';
  if (score >= policy.grades.D) return 'D';
  return 'F';
}

export function rateLikes(likeRate: number, policy: GradingPolicy = DEFAULT_GRADING_POLICY): LikeRating {
  if (likeRate >= policy.likeRate.excellent) return 'Excellent';
  if (likeRate >= policy.likeRate.good) return 'Good';
  if (likeRate >= policy.likeRate.average) return 'Average';
  return 'Below Average';
}

export function rateComments(
  commentRate: number,
  policy: GradingPolicy = DEFAULT_GRADING_POLICY,
): CommentRating {
  if (commentRate >= policy.commentRate.high) return 'High Engagement';
  if (commentRate >= policy.commentRate.moderate) return 'Moderate Engagement';
  return 'Low Engagement';
}

export function gradeEngagement(
  metrics: EngagementMetrics,
  policy: GradingPolicy = DEFAULT_GRADING_POLICY,
): PerformanceRating {
  const score = performanceScore(metrics.engagementScore, policy);
  return {
    score,
    grade: gradeForScore(score, policy),
    likeRating: rateLikes(metrics.likeRate, policy),
    commentRating: rateComments(metrics.commentRate, policy),
  };
}

const GRADE_LABELS: Record<Grade, string> = {
  A: 'Outstanding',
  B: 'Strong',
  C: 'Solid',
  D: 'Weak',
  F: 'Poor',
};

/** One-line summary, e.g. "Solid performance (57/100): Excellent like rate, High Engagement in comments" */
export function summarizeRating(rating: PerformanceRating): string {
  return (
    `${GRADE_LABELS[rating.grade]} performance (${Math.round(rating.score)}/100): ` +
    `${rating.likeRating} like rate, ${rating.commentRating} in comments`
  );
}

/** Plain-language reading of an engagement score */
export function describeEngagement(engagementScore: number): string {
  if (engagementScore >= 5) return 'Exceptional engagement - viewers actively like and discuss this video';
  if (engagementScore >= 3) return 'Above-average engagement - the audience responds well';
  if (engagementScore >= 1) return 'Typical engagement for the platform';
  return 'Low engagement - most viewers watch without interacting';
}
