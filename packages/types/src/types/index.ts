export type {
  UncoveredReason,
  CoverageSource,
  SpendCoverage,
  EarnUsage,
  ReportTotals,
  DayWindow,
  DailyReport,
} from './report.js';
