/**
 * Aggregators for repeated runs: mean, median, min, max, geometricMean
 * @module aggregation/aggregators
 */

import { max, mean, median, min } from 'simple-statistics'
import type { Aggregator } from '../types/config.js'
import { InvalidParameterError } from '../utils/errors.js'

/**
 * Built-in aggregator names.
 *
 * - `mean` - Arithmetic mean of the runs
 * - `median` - Median of the runs
 * - `min` - Best case for lower-is-better metrics
 * - `max` - Worst case for lower-is-better metrics
 * - `geometricMean` - Geometric mean, for strictly positive metrics
 */
export type AggregatorName = 'mean' | 'median' | 'min' | 'max' | 'geometricMean'

export const AGGREGATOR_NAMES: readonly AggregatorName[] = [
  'mean',
  'median',
  'min',
  'max',
  'geometricMean',
]

/**
 * Geometric mean computed as exp(mean(log x)).
 * Stays finite for any number of finite positive values.
 */
export function logGeometricMean(values: readonly number[]): number {
  return Math.exp(mean(values.map((value) => Math.log(value))))
}

// simple-statistics takes mutable arrays; hand it a copy
const AGGREGATORS: Readonly<Record<AggregatorName, Aggregator>> = Object.freeze({
  mean: (values) => mean([...values]),
  median: (values) => median([...values]),
  min: (values) => min([...values]),
  max: (values) => max([...values]),
  geometricMean: logGeometricMean,
})

/**
 * Check if a name is a built-in aggregator
 */
export function isAggregatorName(name: string): name is AggregatorName {
  return AGGREGATOR_NAMES.some((candidate) => candidate === name)
}

/**
 * Retrieve a built-in aggregator by name
 *
 * @throws {InvalidParameterError} If the aggregator is not known
 *
 * @example
 * ```typescript
 * const aggregate = getAggregator('median')
 * aggregate([3, 1, 2]) // 2
 * ```
 */
export function getAggregator(name: string): Aggregator {
  if (!isAggregatorName(name)) {
    throw new InvalidParameterError(
      'aggregator',
      name,
      `must be one of: ${AGGREGATOR_NAMES.join(', ')}`
    )
  }
  return AGGREGATORS[name]
}

/**
 * Arithmetic mean, the default aggregator.
 */
export const meanAggregator: Aggregator = AGGREGATORS.mean
