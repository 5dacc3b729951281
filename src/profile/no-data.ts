/**
 * The "no usable data" build outcome
 * @module profile/no-data
 */

/**
 * Why a build produced no profile.
 *
 * - `empty-input` - No records were given
 * - `no-well-formed-records` - Every record lacked a group or combo key
 * - `no-allowed-combos` - The combo restriction excluded every record
 * - `no-included-records` - The inclusion predicate or row filter rejected every record
 * - `no-comparable-values` - Records were included but none had a usable criterion value
 */
export type NoDataReason =
  | 'empty-input'
  | 'no-well-formed-records'
  | 'no-allowed-combos'
  | 'no-included-records'
  | 'no-comparable-values'

/**
 * Result of a build with no usable data. A normal outcome, not an error:
 * callers branch on it and render a neutral placeholder.
 */
export interface NoData {
  readonly kind: 'no-data'
  readonly reason: NoDataReason
  readonly benchmarkId?: string
}

export function noData(reason: NoDataReason, benchmarkId?: string): NoData {
  const result: NoData = { kind: 'no-data', reason, benchmarkId }
  return Object.freeze(result)
}

export function isNoData<P extends { readonly kind: 'profile' }>(
  result: P | NoData
): result is NoData {
  return result.kind === 'no-data'
}
