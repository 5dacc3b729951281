/**
 * Registry-driven profile and analysis entry points
 * @module registry/profile-service
 */

import { analyzeProfile } from '../analysis/analyzer.js'
import { renderNoDataNotice } from '../analysis/markdown-formatter.js'
import type { AnalysisOptions } from '../analysis/types.js'
import type { NoData } from '../profile/no-data.js'
import { isNoData } from '../profile/no-data.js'
import type { PerformanceProfile } from '../profile/performance-profile.js'
import { buildProfile } from '../profile/profile-builder.js'
import type { BuildProfileOptions } from '../profile/profile-builder.js'
import type { ComboIdentity, MeasurementRecord } from '../types/record.js'
import { InvalidParameterError } from '../utils/errors.js'
import type { ProfileRegistry } from './profile-registry.js'

/**
 * Parses combo specifications such as `'JuMP:ipopt'` into combo identities.
 *
 * @param specs - One string per combo, values joined by `separator`
 * @param parts - Expected number of values per combo
 * @throws {InvalidParameterError} If a spec does not split into `parts` non-empty values
 *
 * @example
 * ```typescript
 * parseComboSpecs(['JuMP:ipopt', 'ADNLP:madnlp'])
 * // [['JuMP', 'ipopt'], ['ADNLP', 'madnlp']]
 * ```
 */
export function parseComboSpecs(
  specs: readonly string[],
  separator = ':',
  parts = 2
): ComboIdentity[] {
  return specs.map((spec) => {
    const values = spec.split(separator).map((value) => value.trim())
    if (values.length !== parts || values.some((value) => value === '')) {
      throw new InvalidParameterError(
        'combo',
        spec,
        `expected ${parts} non-empty values separated by '${separator}'`
      )
    }
    return values
  })
}

/**
 * Builds a profile with the configuration registered under `name`.
 *
 * @throws {NotFoundError} If no configuration is registered under `name`
 */
export function profileFromRegistry(
  registry: ProfileRegistry,
  name: string,
  records: readonly MeasurementRecord[],
  options: BuildProfileOptions = {}
): PerformanceProfile | NoData {
  return buildProfile<MeasurementRecord>(records, registry.get(name), options)
}

/**
 * Options for {@link analyzeFromRegistry}
 */
export interface RegistryAnalysisOptions extends BuildProfileOptions {
  analysis?: Partial<AnalysisOptions>
}

/**
 * Builds and analyzes a profile with a registered configuration.
 * Returns a neutral notice instead of an analysis when there is no usable data.
 *
 * @throws {NotFoundError} If no configuration is registered under `name`
 *
 * @example
 * ```typescript
 * const text = analyzeFromRegistry(registry, 'default_cpu', runs, {
 *   benchmarkId: 'core-ubuntu-latest',
 *   allowedCombos: parseComboSpecs(['JuMP:ipopt', 'ADNLP:ipopt']),
 * })
 * ```
 */
export function analyzeFromRegistry(
  registry: ProfileRegistry,
  name: string,
  records: readonly MeasurementRecord[],
  options: RegistryAnalysisOptions = {}
): string {
  const { analysis, ...buildOptions } = options
  const result = profileFromRegistry(registry, name, records, buildOptions)
  if (isNoData(result)) {
    return renderNoDataNotice(result)
  }
  return analyzeProfile(result, analysis)
}
