/**
 * Criterion and profile configuration types
 * @module types/config
 */

import type { MeasurementRecord, MetricValue } from './record.js'

/**
 * Ordering rule over criterion values.
 * Returns true when `a` is at least as good as `b`.
 */
export type Comparator = (a: number, b: number) => boolean

/**
 * Combines the values of repeated runs of one instance and combo into a single value.
 * Always called with at least one value.
 */
export type Aggregator = (values: readonly number[]) => number

/**
 * Decides whether a record takes part in a profile.
 */
export type RecordPredicate<R extends MeasurementRecord = MeasurementRecord> = (
  record: R
) => boolean

/**
 * Metric extraction and comparison rule applied to one record.
 *
 * @typeParam R - The record type the criterion reads
 */
export interface Criterion<R extends MeasurementRecord = MeasurementRecord> {
  /** Human-readable name, e.g. "CPU time" */
  readonly name: string
  /** Pure extraction of the metric, {@link MISSING} when absent */
  extract(record: R): MetricValue
  /** True when `a` is at least as good as `b` */
  better(a: number, b: number): boolean
}

/**
 * Declarative description of a performance profile.
 *
 * @typeParam R - The record type the profile is built from
 */
export interface ProfileConfig<R extends MeasurementRecord = MeasurementRecord> {
  /** Fields identifying an instance, e.g. `['problem', 'grid_size']` */
  readonly groupKeys: readonly string[]
  /** Fields identifying a compared configuration, e.g. `['model', 'solver']` */
  readonly comboKeys: readonly string[]
  readonly criterion: Criterion<R>
  /** Inclusion predicate: successful runs with a present criterion value */
  include(record: R): boolean
  /** Additional row filter applied together with `include` */
  filter(record: R): boolean
  /** Reducer for repeated runs of one instance and combo */
  aggregate(values: readonly number[]): number
}

/**
 * Options accepted by `createProfileConfig`.
 */
export interface ProfileConfigOptions<R extends MeasurementRecord = MeasurementRecord> {
  groupKeys: readonly string[]
  comboKeys: readonly string[]
  criterion: Criterion<R>
  include: RecordPredicate<R>
  filter?: RecordPredicate<R>
  aggregate: Aggregator
}
