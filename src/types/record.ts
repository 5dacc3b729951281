/**
 * Measurement record types
 * @module types/record
 */

/**
 * Scalar value a group or combo key may hold.
 */
export type FieldValue = string | number | boolean

/**
 * One benchmark observation. Records are read-only; the engine never mutates them.
 */
export type MeasurementRecord = { readonly [field: string]: unknown }

/**
 * Record shape produced by the benchmark runner.
 *
 * @example
 * ```typescript
 * const run: BenchmarkRun = {
 *   problem: 'beam',
 *   grid_size: 200,
 *   model: 'JuMP',
 *   solver: 'ipopt',
 *   success: true,
 *   benchmark: { time: 0.42 },
 *   iterations: 31,
 * }
 * ```
 */
export type BenchmarkRun = {
  readonly problem: string
  readonly grid_size: number
  readonly model: string
  readonly solver: string
  readonly success: boolean
  readonly benchmark?: {
    readonly time?: number
    readonly allocs?: number
    readonly memory?: number
    readonly [field: string]: unknown
  } | null
  readonly iterations?: number | null
  readonly objective?: number | null
  readonly status?: string
  readonly [field: string]: unknown
}

/**
 * Sentinel returned by criterion extraction when a record has no usable value.
 */
export const MISSING: unique symbol = Symbol('MISSING')

export type Missing = typeof MISSING

/**
 * Result of extracting a criterion value: a number, or {@link MISSING}.
 */
export type MetricValue = number | Missing

export function isMissing(value: MetricValue): value is Missing {
  return value === MISSING
}

/**
 * Values of the group keys of a record, in key order.
 */
export type InstanceIdentity = readonly FieldValue[]

/**
 * Values of the combo keys of a record, in key order.
 */
export type ComboIdentity = readonly FieldValue[]
