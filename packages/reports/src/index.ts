export {
  buildChannelReport,
  buildVideoReport,
  videoUrl,
  type ChannelReport,
  type ChannelReportOptions,
  type PerformanceSection,
  type VideoReport,
  type VideoRow,
} from './reporter.js';
