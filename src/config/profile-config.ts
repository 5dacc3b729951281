/**
 * Profile configuration construction and structural validation
 * @module config/profile-config
 */

import type {
  Criterion,
  ProfileConfig,
  ProfileConfigOptions,
  RecordPredicate,
} from '../types/config.js'
import type { MeasurementRecord } from '../types/record.js'
import { isMissing } from '../types/record.js'
import { ConfigurationError, requireFunction } from '../utils/errors.js'

const acceptAll: RecordPredicate = () => true

function validateKeys(keys: readonly string[], field: string): void {
  if (keys.length === 0) {
    throw new ConfigurationError(`${field} must not be empty`, field)
  }
  const seen = new Set<string>()
  for (const key of keys) {
    if (typeof key !== 'string' || key.trim() === '') {
      throw new ConfigurationError(`${field} must contain non-empty strings`, field, {
        key,
      })
    }
    if (seen.has(key)) {
      throw new ConfigurationError(`${field} contains duplicate key '${key}'`, field, {
        key,
      })
    }
    seen.add(key)
  }
}

/**
 * Validates that group keys and combo keys are non-empty, unique and disjoint.
 *
 * @throws {ConfigurationError} When the key sets are malformed
 */
export function validateProfileKeys(
  groupKeys: readonly string[],
  comboKeys: readonly string[]
): void {
  validateKeys(groupKeys, 'groupKeys')
  validateKeys(comboKeys, 'comboKeys')

  const shared = groupKeys.filter((key) => comboKeys.includes(key))
  if (shared.length > 0) {
    throw new ConfigurationError(
      `groupKeys and comboKeys must be disjoint; shared: ${shared.join(', ')}`,
      'comboKeys',
      { shared }
    )
  }
}

/**
 * Creates an immutable profile configuration.
 *
 * @throws {ConfigurationError} When the key sets are malformed
 *
 * @example
 * ```typescript
 * const config = createProfileConfig<BenchmarkRun>({
 *   groupKeys: ['problem', 'grid_size'],
 *   comboKeys: ['model', 'solver'],
 *   criterion: cpuTime,
 *   include: successfulRunWith(cpuTime),
 *   aggregate: meanAggregator,
 * })
 * ```
 */
export function createProfileConfig<R extends MeasurementRecord = MeasurementRecord>(
  options: ProfileConfigOptions<R>
): ProfileConfig<R> {
  validateProfileKeys(options.groupKeys, options.comboKeys)
  requireFunction(options.include, 'include')
  requireFunction(options.aggregate, 'aggregate')
  const filter = options.filter ?? acceptAll
  requireFunction(filter, 'filter')

  return Object.freeze({
    groupKeys: Object.freeze([...options.groupKeys]),
    comboKeys: Object.freeze([...options.comboKeys]),
    criterion: options.criterion,
    include: options.include,
    filter,
    aggregate: options.aggregate,
  })
}

/**
 * Inclusion predicate requiring a successful run with a present criterion value.
 *
 * @param criterion - The criterion whose value must be present
 * @param successField - Name of the boolean success flag
 */
export function successfulRunWith<R extends MeasurementRecord>(
  criterion: Criterion<R>,
  successField = 'success'
): RecordPredicate<R> {
  return (record) =>
    record[successField] === true && !isMissing(criterion.extract(record))
}
