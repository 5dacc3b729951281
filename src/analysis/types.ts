/**
 * Analysis result types
 * @module analysis/types
 */

import type { ComboInfo, InstanceInfo } from '../profile/identity.js'

/**
 * Options controlling the analysis
 */
export interface AnalysisOptions {
  /** A combo is robust on an instance when its ratio is ≤ this bound */
  robustnessBound: number
  /** Decimal places kept in percentages */
  percentDigits: number
}

export const DEFAULT_ANALYSIS_OPTIONS: Readonly<AnalysisOptions> = Object.freeze({
  robustnessBound: 10,
  percentDigits: 1,
})

/**
 * Dataset-level statistics of a profile
 */
export interface ProfileStats {
  benchmarkId?: string
  /** Distinct values of the first group key */
  problemCount: number
  /** Instances with at least one comparable run; the denominator of every rate */
  instanceCount: number
  attemptedInstanceCount: number
  censoredInstances: readonly InstanceInfo[]
  comboCount: number
  /** Instance × combo pairs with a ratio */
  comparablePairCount: number
  /** instanceCount × comboCount */
  totalPairCount: number
  comparablePairRate: number
  groupKeys: readonly string[]
  comboKeys: readonly string[]
  criterionName: string
}

/**
 * Metrics of a single combo
 */
export interface ComboPerformance {
  combo: ComboInfo
  /** Instances with ratio exactly 1 */
  wins: number
  /** wins as a percentage of instanceCount */
  efficiency: number
  /** Instances with a comparable value */
  solved: number
  solvedRate: number
  /** Instances with ratio ≤ robustnessBound */
  withinBound: number
  /** withinBound as a percentage of instanceCount */
  robustness: number
  /** Geometric mean of the combo's ratios; undefined when it solved nothing */
  geometricMeanRatio?: number
  /** (geometricMeanRatio - 1) as a percentage; undefined when it solved nothing */
  overheadPercent?: number
}

/**
 * Complete analysis of a profile
 */
export interface ProfileAnalysis {
  stats: ProfileStats
  options: AnalysisOptions
  performances: ComboPerformance[]
  /** Combo(s) with the highest robustness */
  mostRobust: ComboPerformance[]
  /** Combo(s) with the highest efficiency */
  mostEfficient: ComboPerformance[]
}
