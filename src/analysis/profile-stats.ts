/**
 * Structured statistics derived from a performance profile
 * @module analysis/profile-stats
 */

import { logGeometricMean } from '../aggregation/aggregators.js'
import type { PerformanceProfile } from '../profile/performance-profile.js'
import type { MeasurementRecord } from '../types/record.js'
import { requireGreaterThan, requireIntegerInRange } from '../utils/errors.js'
import { DEFAULT_ANALYSIS_OPTIONS } from './types.js'
import type {
  AnalysisOptions,
  ComboPerformance,
  ProfileAnalysis,
  ProfileStats,
} from './types.js'

/**
 * Percentage of `count` over `total`, rounded to `digits` decimal places.
 */
export function percentage(count: number, total: number, digits: number): number {
  if (total === 0) return 0
  const factor = 10 ** digits
  return Math.round(((100 * count) / total) * factor) / factor
}

/**
 * Merges analysis options over the defaults and validates them.
 *
 * @throws {InvalidParameterError} On a bound ≤ 1 or digits outside 0..4
 */
export function resolveAnalysisOptions(
  options: Partial<AnalysisOptions> = {}
): AnalysisOptions {
  const resolved = { ...DEFAULT_ANALYSIS_OPTIONS, ...options }
  requireGreaterThan(resolved.robustnessBound, 1, 'robustnessBound')
  requireIntegerInRange(resolved.percentDigits, 0, 4, 'percentDigits')
  return resolved
}

function leaders(
  performances: ComboPerformance[],
  metric: (p: ComboPerformance) => number
): ComboPerformance[] {
  if (performances.length === 0) return []
  const top = Math.max(...performances.map(metric))
  return performances.filter((p) => metric(p) === top)
}

/**
 * Computes the statistics behind the textual analysis.
 * Reads only the profile, so the numbers always agree with its curves.
 *
 * @example
 * ```typescript
 * const analysis = computeProfileStats(profile, { robustnessBound: 4 })
 * analysis.mostEfficient.map((p) => p.combo.label) // ['(JuMP, ipopt)']
 * ```
 */
export function computeProfileStats<R extends MeasurementRecord>(
  profile: PerformanceProfile<R>,
  options: Partial<AnalysisOptions> = {}
): ProfileAnalysis {
  const resolved = resolveAnalysisOptions(options)
  const digits = resolved.percentDigits
  const total = profile.totalInstances

  const problems = new Set<string>()
  for (const instance of [...profile.instances, ...profile.censoredInstances]) {
    problems.add(JSON.stringify(instance.identity[0]))
  }

  const totalPairCount = total * profile.combos.length
  const comparablePairCount = profile.comparablePairCount

  const stats: ProfileStats = {
    benchmarkId: profile.benchmarkId,
    problemCount: problems.size,
    instanceCount: total,
    attemptedInstanceCount: profile.attemptedInstanceCount,
    censoredInstances: profile.censoredInstances,
    comboCount: profile.combos.length,
    comparablePairCount,
    totalPairCount,
    comparablePairRate: percentage(comparablePairCount, totalPairCount, digits),
    groupKeys: profile.config.groupKeys,
    comboKeys: profile.config.comboKeys,
    criterionName: profile.config.criterion.name,
  }

  const performances = profile.combos.map((combo): ComboPerformance => {
    const ratios = profile.ratiosFor(combo)
    const wins = profile.winCount(combo)
    const withinBound = Math.round(
      profile.fractionWithin(combo, resolved.robustnessBound) * total
    )
    const geometricMeanRatio = ratios.length > 0 ? logGeometricMean(ratios) : undefined
    return {
      combo,
      wins,
      efficiency: percentage(wins, total, digits),
      solved: ratios.length,
      solvedRate: percentage(ratios.length, total, digits),
      withinBound,
      robustness: percentage(withinBound, total, digits),
      geometricMeanRatio,
      overheadPercent:
        geometricMeanRatio === undefined
          ? undefined
          : percentage(geometricMeanRatio - 1, 1, digits),
    }
  })

  return {
    stats,
    options: resolved,
    performances,
    mostRobust: leaders(performances, (p) => p.robustness),
    mostEfficient: leaders(performances, (p) => p.efficiency),
  }
}
