/**
 * Statistics module
 */

export {
  TOP_CATEGORY_LIMIT,
  distribution,
  topCategories,
  summarize,
  formatSummary,
  type AnalysisSummary,
  type DistributionEntry,
} from './summary.js';
