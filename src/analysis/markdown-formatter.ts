/**
 * Markdown rendering of profile analyses
 * @module analysis/markdown-formatter
 */

import type { NoData } from '../profile/no-data.js'
import type { ComboPerformance, ProfileAnalysis } from './types.js'

function code(text: string): string {
  return `\`${text}\``
}

function formatPercent(value: number, digits: number): string {
  return `${value.toFixed(digits)}%`
}

function formatComboLine(
  perf: ComboPerformance,
  instanceCount: number,
  bound: number,
  digits: number
): string {
  const ratio =
    perf.geometricMeanRatio === undefined || perf.overheadPercent === undefined
      ? 'n/a'
      : `${perf.geometricMeanRatio.toFixed(2)} ` +
        `(+${formatPercent(perf.overheadPercent, digits)} overhead)`
  return (
    `- ${code(perf.combo.label)}: ` +
    `best on ${perf.wins}/${instanceCount} (${formatPercent(perf.efficiency, digits)}), ` +
    `solved ${perf.solved}/${instanceCount} (${formatPercent(perf.solvedRate, digits)}), ` +
    `within ${bound}x on ${formatPercent(perf.robustness, digits)}, ` +
    `geometric-mean ratio ${ratio}`
  )
}

/**
 * Formats a profile analysis as Markdown.
 *
 * @example
 * ```typescript
 * const text = formatAnalysisMarkdown(computeProfileStats(profile))
 * ```
 */
export function formatAnalysisMarkdown(analysis: ProfileAnalysis): string {
  const { stats, options, performances } = analysis
  const digits = options.percentDigits
  const bound = options.robustnessBound
  const lines: string[] = []

  lines.push(
    stats.benchmarkId
      ? `### Performance profile analysis: ${code(stats.benchmarkId)}`
      : '### Performance profile analysis'
  )
  lines.push('')
  lines.push('**Dataset overview:**')
  lines.push(`- **Problems**: ${stats.problemCount}`)
  lines.push(
    `- **Instances**: ${stats.instanceCount} compared (${stats.attemptedInstanceCount} attempted)`
  )
  lines.push(`- **Combos**: ${stats.comboCount}`)
  lines.push(`- **Criterion**: ${stats.criterionName}`)
  lines.push(`- **Instance definition**: (${stats.groupKeys.join(', ')})`)
  lines.push(`- **Combo definition**: (${stats.comboKeys.join(', ')})`)
  lines.push(
    `- **Comparable runs**: ${stats.comparablePairCount}/${stats.totalPairCount} ` +
      `(${formatPercent(stats.comparablePairRate, digits)})`
  )
  if (stats.censoredInstances.length === 0) {
    lines.push('- **Censored instances**: none')
  } else {
    lines.push('- **Censored instances** (no comparable run):')
    for (const instance of stats.censoredInstances) {
      lines.push(`  - ${code(instance.label)}`)
    }
  }

  lines.push('')
  lines.push('**Per combo:**')
  for (const perf of performances) {
    lines.push(formatComboLine(perf, stats.instanceCount, bound, digits))
  }

  lines.push('')
  const [robust] = analysis.mostRobust
  if (analysis.mostRobust.length === 1) {
    lines.push(
      `**Most robust**: ${code(robust.combo.label)} is within ${bound}x of the best on ` +
        `${formatPercent(robust.robustness, digits)} of instances.`
    )
  } else if (analysis.mostRobust.length > 1) {
    lines.push(
      `**Most robust**: ${analysis.mostRobust.length} combos tied at ` +
        `${formatPercent(robust.robustness, digits)}.`
    )
  }
  const [efficient] = analysis.mostEfficient
  if (analysis.mostEfficient.length === 1) {
    lines.push(
      `**Most efficient**: ${code(efficient.combo.label)} is the best on ` +
        `${formatPercent(efficient.efficiency, digits)} of instances.`
    )
  } else if (analysis.mostEfficient.length > 1) {
    lines.push(
      `**Most efficient**: ${analysis.mostEfficient.length} combos tied at ` +
        `${formatPercent(efficient.efficiency, digits)}.`
    )
  }

  return lines.join('\n') + '\n'
}

/**
 * Neutral placeholder shown instead of an analysis when a build yields no data.
 */
export function renderNoDataNotice(result: NoData): string {
  const message =
    result.reason === 'empty-input' || result.reason === 'no-well-formed-records'
      ? 'No benchmark data available for analysis'
      : 'No successful runs found to analyze'
  const target = result.benchmarkId ? ` for ${code(result.benchmarkId)}` : ''
  return `> **Note**: ${message}${target}.\n`
}
