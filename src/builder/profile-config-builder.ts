/**
 * Fluent builder for profile configurations
 * @module builder/profile-config-builder
 */

import { getAggregator, meanAggregator } from '../aggregation/aggregators.js'
import type { AggregatorName } from '../aggregation/aggregators.js'
import { createProfileConfig, successfulRunWith } from '../config/profile-config.js'
import type {
  Aggregator,
  Criterion,
  ProfileConfig,
  RecordPredicate,
} from '../types/config.js'
import type { MeasurementRecord } from '../types/record.js'
import { BuilderSequenceError } from '../utils/errors.js'

/**
 * Fluent builder for a {@link ProfileConfig}.
 *
 * When no inclusion predicate is given, records must have `success === true`
 * and a present criterion value. The aggregator defaults to the mean.
 *
 * @typeParam R - The record type the profile is built from
 *
 * @example
 * ```typescript
 * const config = new ProfileConfigBuilder<BenchmarkRun>()
 *   .groupBy('problem', 'grid_size')
 *   .compareBy('model', 'solver')
 *   .criterion(fieldCriterion({ name: 'CPU time', path: 'benchmark.time' }))
 *   .aggregate('median')
 *   .build()
 * ```
 */
export class ProfileConfigBuilder<R extends MeasurementRecord = MeasurementRecord> {
  private groupKeys: string[] = []
  private comboKeys: string[] = []
  private selectedCriterion?: Criterion<R>
  private inclusion?: RecordPredicate<R>
  private rowFilter?: RecordPredicate<R>
  private aggregator: Aggregator = meanAggregator

  /**
   * Set the fields that identify an instance.
   */
  groupBy(...keys: string[]): this {
    this.groupKeys = keys
    return this
  }

  /**
   * Set the fields that identify a compared configuration.
   */
  compareBy(...keys: string[]): this {
    this.comboKeys = keys
    return this
  }

  criterion(criterion: Criterion<R>): this {
    this.selectedCriterion = criterion
    return this
  }

  /**
   * Set the inclusion predicate, replacing the success-based default.
   */
  include(predicate: RecordPredicate<R>): this {
    this.inclusion = predicate
    return this
  }

  /**
   * Add a row filter. Repeated calls combine with AND.
   */
  filter(predicate: RecordPredicate<R>): this {
    const previous = this.rowFilter
    this.rowFilter = previous
      ? (record) => previous(record) && predicate(record)
      : predicate
    return this
  }

  /**
   * Set the aggregator for repeated runs, by built-in name or as a function.
   */
  aggregate(aggregator: AggregatorName | Aggregator): this {
    this.aggregator =
      typeof aggregator === 'string' ? getAggregator(aggregator) : aggregator
    return this
  }

  /**
   * Build the immutable configuration.
   *
   * @throws {BuilderSequenceError} If keys or the criterion were never set
   * @throws {ConfigurationError} If the keys are malformed
   */
  build(): ProfileConfig<R> {
    if (this.groupKeys.length === 0) {
      throw new BuilderSequenceError('build', 'groupBy() must be called before build()')
    }
    if (this.comboKeys.length === 0) {
      throw new BuilderSequenceError('build', 'compareBy() must be called before build()')
    }
    const criterion = this.selectedCriterion
    if (!criterion) {
      throw new BuilderSequenceError('build', 'criterion() must be called before build()')
    }

    return createProfileConfig<R>({
      groupKeys: this.groupKeys,
      comboKeys: this.comboKeys,
      criterion,
      include: this.inclusion ?? successfulRunWith(criterion),
      filter: this.rowFilter,
      aggregate: this.aggregator,
    })
  }
}
