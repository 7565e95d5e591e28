export {
  allocateCoverage,
  compareTransactions,
  type EarnSlice,
  type AllocationOptions,
  type AllocationResult,
} from './allocate.js';
export {
  CoverageEngine,
  computeTotals,
  hashTransactionSet,
  type CoverageEngineDeps,
  type CoverageRequestOptions,
} from './report.js';
export { MarkdownReportRenderer, type ReportRenderer } from './render.js';
export { InMemoryReportCache, reportCacheKey, type ReportCache, type ReportCacheKey } from './cache.js';
