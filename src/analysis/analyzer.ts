/**
 * Natural-language analysis of a performance profile
 * @module analysis/analyzer
 */

import type { PerformanceProfile } from '../profile/performance-profile.js'
import type { MeasurementRecord } from '../types/record.js'
import { formatAnalysisMarkdown } from './markdown-formatter.js'
import { computeProfileStats } from './profile-stats.js'
import type { AnalysisOptions } from './types.js'

/**
 * Generates the Markdown analysis of a profile: dataset overview, per-combo
 * win rate, solved rate, robustness, geometric-mean ratio and overhead, and the
 * leaders.
 *
 * A pure function of the profile; it never re-reads raw records.
 */
export function analyzeProfile<R extends MeasurementRecord>(
  profile: PerformanceProfile<R>,
  options: Partial<AnalysisOptions> = {}
): string {
  return formatAnalysisMarkdown(computeProfileStats(profile, options))
}
