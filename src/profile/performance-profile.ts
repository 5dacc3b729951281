/**
 * Computed performance profile and its query surface
 * @module profile/performance-profile
 */

import type { ProfileConfig } from '../types/config.js'
import type { ComboIdentity, InstanceIdentity, MeasurementRecord } from '../types/record.js'
import { InvalidParameterError } from '../utils/errors.js'
import type { ComboInfo, InstanceInfo } from './identity.js'
import { identityKey } from './identity.js'

/**
 * A combo given by identity or by its descriptor.
 */
export type ComboRef = ComboIdentity | ComboInfo

/**
 * An instance given by identity or by its descriptor.
 */
export type InstanceRef = InstanceIdentity | InstanceInfo

/**
 * Outcome of one considered instance.
 */
export interface InstanceOutcome {
  readonly instance: InstanceInfo
  /** Best aggregated value under the criterion */
  readonly best: number
  /** Combos with ratio exactly 1, in profile combo order */
  readonly winners: readonly ComboInfo[]
  /** Ratio per combo key, only for combos with a comparable value */
  readonly ratios: ReadonlyMap<string, number>
}

/**
 * One point of the step function ρ(τ) = count(ratio ≤ τ) / instances.
 */
export interface CurvePoint {
  readonly ratio: number
  readonly fraction: number
}

export interface RatioBounds {
  readonly min: number
  readonly max: number
}

/**
 * Everything the builder hands to the profile.
 * @internal
 */
export interface PerformanceProfileData<R extends MeasurementRecord> {
  benchmarkId?: string
  config: ProfileConfig<R>
  combos: readonly ComboInfo[]
  outcomes: readonly InstanceOutcome[]
  ratiosByCombo: ReadonlyMap<string, readonly number[]>
  censoredInstances: readonly InstanceInfo[]
  attemptedInstanceCount: number
}

function refKey(ref: ComboRef | InstanceRef): string {
  return isIdentity(ref) ? identityKey(ref) : ref.key
}

function isIdentity(ref: ComboRef | InstanceRef): ref is ComboIdentity {
  return Array.isArray(ref)
}

/**
 * Read-only Dolan–Moré performance profile.
 *
 * Ratios are ≥ 1 and each considered instance has at least one combo at ratio 1.
 * Fractions use the number of considered instances as denominator, including
 * instances on which the queried combo was censored.
 *
 * @typeParam R - The record type the profile was built from
 */
export class PerformanceProfile<R extends MeasurementRecord = MeasurementRecord> {
  readonly kind = 'profile' as const
  readonly benchmarkId?: string
  readonly config: ProfileConfig<R>
  /** Combos seen in the data, in first-seen order; may include combos with no ratio */
  readonly combos: readonly ComboInfo[]
  /** Instances where at least one combo had a comparable value */
  readonly instances: readonly InstanceInfo[]
  /** Attempted instances on which no combo had a comparable value */
  readonly censoredInstances: readonly InstanceInfo[]
  readonly attemptedInstanceCount: number
  readonly ratioBounds: RatioBounds

  private readonly outcomes: ReadonlyMap<string, InstanceOutcome>
  private readonly ratiosByCombo: ReadonlyMap<string, readonly number[]>
  private readonly comboByKey: ReadonlyMap<string, ComboInfo>

  constructor(data: PerformanceProfileData<R>) {
    this.benchmarkId = data.benchmarkId
    this.config = data.config
    this.combos = Object.freeze([...data.combos])
    this.instances = Object.freeze(data.outcomes.map((o) => o.instance))
    this.censoredInstances = Object.freeze([...data.censoredInstances])
    this.attemptedInstanceCount = data.attemptedInstanceCount
    this.outcomes = new Map(data.outcomes.map((o) => [o.instance.key, o]))
    this.comboByKey = new Map(data.combos.map((c) => [c.key, c]))

    const ratios = new Map<string, readonly number[]>()
    let min = Infinity
    let max = 1
    for (const combo of data.combos) {
      const sorted = [...(data.ratiosByCombo.get(combo.key) ?? [])].sort((a, b) => a - b)
      ratios.set(combo.key, Object.freeze(sorted))
      if (sorted.length > 0) {
        min = Math.min(min, sorted[0])
        max = Math.max(max, sorted[sorted.length - 1])
      }
    }
    this.ratiosByCombo = ratios
    this.ratioBounds = Object.freeze({ min: Number.isFinite(min) ? min : 1, max })
  }

  /** Number of considered instances, the denominator of every fraction */
  get totalInstances(): number {
    return this.instances.length
  }

  /** Number of instance × combo pairs with a ratio */
  get comparablePairCount(): number {
    let count = 0
    for (const ratios of this.ratiosByCombo.values()) {
      count += ratios.length
    }
    return count
  }

  /**
   * Look up a combo descriptor.
   *
   * @throws {InvalidParameterError} If the combo is not part of this profile
   */
  combo(ref: ComboRef): ComboInfo {
    const key = refKey(ref)
    const combo = this.comboByKey.get(key)
    if (!combo) {
      throw new InvalidParameterError('combo', ref, 'is not part of this profile')
    }
    return combo
  }

  hasCombo(ref: ComboRef): boolean {
    return this.comboByKey.has(refKey(ref))
  }

  /**
   * Sorted ascending ratios of a combo, one per instance where it was comparable.
   */
  ratiosFor(ref: ComboRef): readonly number[] {
    return this.ratiosByCombo.get(this.combo(ref).key) ?? []
  }

  /**
   * Per-instance outcome, or undefined when the instance was not considered.
   */
  outcomeOf(ref: InstanceRef): InstanceOutcome | undefined {
    return this.outcomes.get(refKey(ref))
  }

  /**
   * Ratio of a combo on an instance; undefined when the pair was censored.
   */
  ratioOf(instance: InstanceRef, combo: ComboRef): number | undefined {
    return this.outcomeOf(instance)?.ratios.get(this.combo(combo).key)
  }

  winnersOf(ref: InstanceRef): readonly ComboInfo[] {
    return this.outcomeOf(ref)?.winners ?? []
  }

  bestValueOf(ref: InstanceRef): number | undefined {
    return this.outcomeOf(ref)?.best
  }

  /** Instances on which the combo had a comparable value */
  solvedCount(ref: ComboRef): number {
    return this.ratiosFor(ref).length
  }

  /** Instances on which the combo tied for best */
  winCount(ref: ComboRef): number {
    return this.ratiosFor(ref).filter((ratio) => ratio === 1).length
  }

  /**
   * Fraction of considered instances where the combo's ratio is ≤ tau.
   *
   * @throws {InvalidParameterError} If tau is NaN
   */
  fractionWithin(ref: ComboRef, tau: number): number {
    if (typeof tau !== 'number' || Number.isNaN(tau)) {
      throw new InvalidParameterError('tau', tau, 'must be a number')
    }
    const ratios = this.ratiosFor(ref)
    if (this.totalInstances === 0) {
      return 0
    }
    return countAtMost(ratios, tau) / this.totalInstances
  }

  /**
   * Step-function points of the combo's curve: one point per ratio, with the
   * fraction of instances at or below that ratio.
   */
  curve(ref: ComboRef): CurvePoint[] {
    const ratios = this.ratiosFor(ref)
    return ratios.map((ratio) => ({
      ratio,
      fraction: countAtMost(ratios, ratio) / this.totalInstances,
    }))
  }
}

// ratios are sorted ascending
function countAtMost(ratios: readonly number[], tau: number): number {
  let lo = 0
  let hi = ratios.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (ratios[mid] <= tau) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }
  return lo
}
