/**
 * Result store module
 */

export {
  DEFAULT_RESULTS_PATH,
  loadResults,
  saveResults,
  selectNewRecords,
  readAnalysisRecords,
  type LoadedStore,
  type StoreStatus,
  type SaveResultsOptions,
  type SaveResultsSummary,
} from './results.js';
