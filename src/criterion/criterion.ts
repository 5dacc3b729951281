/**
 * Criterion construction: metric extraction plus ordering rule
 * @module criterion/criterion
 */

import type { Comparator, Criterion } from '../types/config.js'
import type { MeasurementRecord, MetricValue } from '../types/record.js'
import { MISSING } from '../types/record.js'
import {
  InvalidParameterError,
  requireFunction,
  requireNonEmptyString,
} from '../utils/errors.js'

/**
 * Which end of the scale wins.
 */
export type CriterionDirection = 'lower' | 'higher'

export const CRITERION_DIRECTIONS: readonly CriterionDirection[] = ['lower', 'higher']

/**
 * Smaller values are better (times, iteration counts, memory).
 */
export const lowerIsBetter: Comparator = (a, b) => a <= b

/**
 * Larger values are better (throughput, solved fraction).
 */
export const higherIsBetter: Comparator = (a, b) => a >= b

/**
 * Returns the comparator for a direction.
 */
export function comparatorFor(direction: CriterionDirection): Comparator {
  return direction === 'lower' ? lowerIsBetter : higherIsBetter
}

/**
 * Creates an immutable criterion from an extraction function and a comparator.
 *
 * @param name - Human-readable name shown in analyses
 * @param extract - Pure function returning the metric or MISSING
 * @param better - True when the first value is at least as good as the second
 *
 * @example
 * ```typescript
 * const objective = defineCriterion<BenchmarkRun>(
 *   'Objective',
 *   (run) => run.objective ?? MISSING,
 *   lowerIsBetter
 * )
 * ```
 */
export function defineCriterion<R extends MeasurementRecord = MeasurementRecord>(
  name: string,
  extract: (record: R) => MetricValue,
  better: Comparator = lowerIsBetter
): Criterion<R> {
  requireNonEmptyString(name, 'name')
  requireFunction(extract, 'extract')
  requireFunction(better, 'better')

  return Object.freeze({
    name,
    extract: (record: R) => extract(record),
    better: (a: number, b: number) => better(a, b),
  })
}

/**
 * Splits a dotted field path into its segments.
 */
export function parseFieldPath(path: string | readonly string[]): readonly string[] {
  const segments = typeof path === 'string' ? path.split('.') : [...path]
  if (segments.length === 0 || segments.some((s) => s.trim() === '')) {
    throw new InvalidParameterError(
      'path',
      path,
      'must contain at least one non-empty segment'
    )
  }
  return segments
}

/**
 * Reads a nested numeric field from a record.
 * Returns MISSING when a segment is absent or null, or the leaf is not a finite number.
 */
export function readNumericField(
  record: MeasurementRecord,
  segments: readonly string[]
): MetricValue {
  let current: unknown = record
  for (const segment of segments) {
    if (typeof current !== 'object' || current === null) {
      return MISSING
    }
    current = Reflect.get(current, segment)
  }
  if (typeof current !== 'number' || !Number.isFinite(current)) {
    return MISSING
  }
  return current
}

/**
 * Options for {@link fieldCriterion}
 */
export interface FieldCriterionOptions {
  /** Human-readable name */
  name: string
  /** Dotted path (`'benchmark.time'`) or segments (`['benchmark', 'time']`) */
  path: string | readonly string[]
  /** Defaults to `'lower'` */
  direction?: CriterionDirection
}

/**
 * Creates a criterion that reads a numeric field, the form used by profile definitions.
 *
 * @example
 * ```typescript
 * const cpuTime = fieldCriterion({ name: 'CPU time', path: 'benchmark.time' })
 * cpuTime.extract({ benchmark: { time: 1.5 } }) // 1.5
 * cpuTime.extract({ benchmark: null }) // MISSING
 * ```
 */
export function fieldCriterion(options: FieldCriterionOptions): Criterion {
  const segments = parseFieldPath(options.path)
  const direction = options.direction ?? 'lower'
  if (!CRITERION_DIRECTIONS.includes(direction)) {
    throw new InvalidParameterError(
      'direction',
      direction,
      `must be one of: ${CRITERION_DIRECTIONS.join(', ')}`
    )
  }

  return defineCriterion(
    options.name,
    (record) => readNumericField(record, segments),
    comparatorFor(direction)
  )
}
