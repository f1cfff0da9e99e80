export {
  scoreSnapshot,
  snapshotFromVideo,
  computeEngagementStats,
  type Counters,
  type EngagementStats,
} from './engagement.js';
export {
  DEFAULT_GRADING_POLICY,
  performanceScore,
  gradeForScore,
  rateLikes,
  rateComments,
  gradeEngagement,
  summarizeRating,
  describeEngagement,
  type GradingPolicy,
} from './grading.js';
export { SYNTHETIC_STAGES, synthesizeSeries } from './history.js';
export {
  VIRAL_VIEWS_PER_HOUR,
  computeGrowthRate,
  detectViralMoments,
  forecastViews,
  compareStages,
  formatSpan,
  type GrowthRate,
  type ViralMoment,
  type ForecastPoint,
  type ViewForecast,
  type StageComparison,
} from './trends.js';
export {
  rankBy,
  buildChannelMetrics,
  summarizeComparison,
  benchmarkTarget,
  findCompetitiveAdvantages,
  computeMarketShare,
  type Ranked,
  type MetricLeader,
  type ComparisonSummary,
  type Benchmark,
  type CompetitivePosition,
  type MarketShare,
  type MarketShareEntry,
} from './comparison.js';
export { assessQuality, type QualityInput } from './signals.js';
export {
  postingFrequency,
  analyzeContentStrategy,
  type PostingFrequency,
  type ContentStrategy,
  type ContentStrategyOptions,
} from './strategy.js';
