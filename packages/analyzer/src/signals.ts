import type { OverallAssessment, QualityAssessment } from '@tubepulse/shared';

export interface QualityInput {
  likeRate: number;
  commentRate: number;
  views: number;
}

interface QualityRule {
  signal: { when: (input: QualityInput) => boolean; text: string };
  concern: { when: (input: QualityInput) => boolean; text: string };
}

const RULES: QualityRule[] = [
  {
    signal: { when: (i) => i.likeRate >= 5, text: 'Excellent like rate' },
    concern: { when: (i) => i.likeRate < 1, text: 'Low like rate' },
  },
  {
    signal: { when: (i) => i.commentRate >= 0.5, text: 'Strong comment activity' },
    concern: { when: (i) => i.commentRate < 0.1, text: 'Low comment activity' },
  },
  {
    signal: { when: (i) => i.views > 1_000_000, text: 'Viral reach (1M+ views)' },
    concern: { when: (i) => i.views < 1_000, text: 'Limited reach (under 1K views)' },
  },
];

export function assessQuality(input: QualityInput): QualityAssessment {
  const qualitySignals: string[] = [];
  const areasForImprovement: string[] = [];

  for (const rule of RULES) {
    if (rule.signal.when(input)) qualitySignals.push(rule.signal.text);
    if (rule.concern.when(input)) areasForImprovement.push(rule.concern.text);
  }

  let overallAssessment: OverallAssessment = 'Average';
  if (qualitySignals.length > areasForImprovement.length) overallAssessment = 'Strong';
  else if (areasForImprovement.length > qualitySignals.length) overallAssessment = 'Needs Improvement';

  return { qualitySignals, areasForImprovement, overallAssessment };
}
