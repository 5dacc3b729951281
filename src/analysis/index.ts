/**
 * Profile analysis module
 * @module analysis
 */

export { analyzeProfile } from './analyzer.js'
export {
  computeProfileStats,
  resolveAnalysisOptions,
  percentage,
} from './profile-stats.js'
export { formatAnalysisMarkdown, renderNoDataNotice } from './markdown-formatter.js'
export { DEFAULT_ANALYSIS_OPTIONS } from './types.js'
export type {
  AnalysisOptions,
  ProfileStats,
  ComboPerformance,
  ProfileAnalysis,
} from './types.js'
