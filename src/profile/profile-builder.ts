/**
 * Builds performance profiles from raw measurement records
 * @module profile/profile-builder
 */

import type { ProfileConfig } from '../types/config.js'
import type { ComboIdentity, FieldValue, MeasurementRecord } from '../types/record.js'
import { isMissing } from '../types/record.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'
import type { ComboInfo, InstanceInfo } from './identity.js'
import { createKeySchema, describeIdentity, identityKey } from './identity.js'
import { noData } from './no-data.js'
import type { NoData, NoDataReason } from './no-data.js'
import { PerformanceProfile } from './performance-profile.js'
import type { InstanceOutcome } from './performance-profile.js'

/**
 * Options for {@link buildProfile}
 */
export interface BuildProfileOptions {
  /** Restrict the profile to these combos; omit to keep every combo */
  allowedCombos?: readonly ComboIdentity[]
  /** Benchmark identifier carried by the profile and NoData results */
  benchmarkId?: string
  /** Receives the build counts at debug and NoData outcomes at info; silent by default */
  logger?: Logger
}

/** Criterion values per combo key, for one instance */
type InstancePartition = Map<string, number[]>

/**
 * A value can take part in ratios only if it is finite and strictly positive.
 */
function isComparable(value: number): boolean {
  return Number.isFinite(value) && value > 0
}

function pick(data: Record<string, FieldValue>, keys: readonly string[]): FieldValue[] {
  return keys.map((key) => data[key])
}

/**
 * Builds a Dolan–Moré performance profile.
 *
 * Records missing a group or combo key are dropped. Included records are
 * partitioned by instance and combo, their criterion values aggregated, and
 * each comparable value divided by the best value on its instance. Instances
 * where no combo has a comparable value are censored: they contribute no
 * point and are not counted in the denominator.
 *
 * Pure and deterministic: identical inputs give identical profiles.
 *
 * @param records - Raw measurement records, never mutated
 * @param config - Profile configuration
 * @param options - Combo restriction, benchmark id and logger
 * @returns The profile, or NoData when nothing usable remains
 *
 * @example
 * ```typescript
 * const result = buildProfile(runs, registry.get('default_cpu'), {
 *   benchmarkId: 'core-ubuntu-latest',
 * })
 * if (isNoData(result)) {
 *   return renderNoDataNotice(result)
 * }
 * result.fractionWithin(['JuMP', 'ipopt'], 2)
 * ```
 */
export function buildProfile<R extends MeasurementRecord>(
  records: readonly R[],
  config: ProfileConfig<R>,
  options: BuildProfileOptions = {}
): PerformanceProfile<R> | NoData {
  const { benchmarkId, allowedCombos } = options
  const logger = createPrefixedLogger(
    'profile-builder',
    options.logger ?? createSilentLogger()
  )

  const empty = (reason: NoDataReason): NoData => {
    logger.info('No usable data for performance profile', {
      benchmarkId,
      reason,
      records: records.length,
    })
    return noData(reason, benchmarkId)
  }

  if (records.length === 0) {
    return empty('empty-input')
  }

  const keySchema = createKeySchema([...config.groupKeys, ...config.comboKeys])
  const allowed = allowedCombos
    ? new Set(allowedCombos.map((combo) => identityKey(combo)))
    : undefined

  const attempted = new Map<string, InstanceInfo>()
  const combos = new Map<string, ComboInfo>()
  const partitions = new Map<string, InstancePartition>()
  let wellFormed = 0
  let included = 0

  for (const record of records) {
    const parsed = keySchema.safeParse(record)
    if (!parsed.success) {
      continue
    }
    wellFormed++

    const comboIdentity = pick(parsed.data, config.comboKeys)
    const comboKey = identityKey(comboIdentity)
    if (allowed && !allowed.has(comboKey)) {
      continue
    }

    const instanceIdentity = pick(parsed.data, config.groupKeys)
    const instanceKey = identityKey(instanceIdentity)
    if (!attempted.has(instanceKey)) {
      attempted.set(instanceKey, describeIdentity(instanceIdentity))
    }
    if (!combos.has(comboKey)) {
      combos.set(comboKey, describeIdentity(comboIdentity))
    }

    if (!config.filter(record) || !config.include(record)) {
      continue
    }
    included++

    let partition = partitions.get(instanceKey)
    if (!partition) {
      partition = new Map()
      partitions.set(instanceKey, partition)
    }
    let values = partition.get(comboKey)
    if (!values) {
      values = []
      partition.set(comboKey, values)
    }

    const value = config.criterion.extract(record)
    if (!isMissing(value) && isComparable(value)) {
      values.push(value)
    }
  }

  if (wellFormed === 0) {
    return empty('no-well-formed-records')
  }
  if (attempted.size === 0) {
    return empty('no-allowed-combos')
  }
  if (included === 0) {
    return empty('no-included-records')
  }

  const comboOrder = Array.from(combos.values())
  const outcomes: InstanceOutcome[] = []
  const censored: InstanceInfo[] = []
  const ratiosByCombo = new Map<string, number[]>()

  for (const [instanceKey, instance] of attempted) {
    const partition = partitions.get(instanceKey)
    const aggregated = new Map<string, number>()
    for (const combo of comboOrder) {
      const values = partition?.get(combo.key)
      if (!values || values.length === 0) {
        continue
      }
      const value = config.aggregate(values)
      if (isComparable(value)) {
        aggregated.set(combo.key, value)
      }
    }

    if (aggregated.size === 0) {
      censored.push(instance)
      continue
    }

    const [first, ...rest] = Array.from(aggregated.values())
    let best = first
    for (const value of rest) {
      best = config.criterion.better(value, best) ? value : best
    }

    const ratios = new Map<string, number>()
    const winners: ComboInfo[] = []
    for (const combo of comboOrder) {
      const value = aggregated.get(combo.key)
      if (value === undefined) {
        continue
      }
      // ≥ 1 whichever end of the scale the criterion prefers
      const ratio = Math.max(value / best, best / value)
      ratios.set(combo.key, ratio)
      if (ratio === 1) {
        winners.push(combo)
      }

      let comboRatios = ratiosByCombo.get(combo.key)
      if (!comboRatios) {
        comboRatios = []
        ratiosByCombo.set(combo.key, comboRatios)
      }
      comboRatios.push(ratio)
    }

    outcomes.push(
      Object.freeze({
        instance,
        best,
        winners: Object.freeze(winners),
        ratios,
      })
    )
  }

  if (outcomes.length === 0) {
    return empty('no-comparable-values')
  }

  logger.debug('Built performance profile', {
    benchmarkId,
    records: records.length,
    wellFormed,
    included,
    instances: outcomes.length,
    censored: censored.length,
    combos: comboOrder.length,
  })

  return new PerformanceProfile<R>({
    benchmarkId,
    config,
    combos: comboOrder,
    outcomes,
    ratiosByCombo,
    censoredInstances: censored,
    attemptedInstanceCount: attempted.size,
  })
}
