/**
 * Criterion module
 * @module criterion
 */

export {
  CRITERION_DIRECTIONS,
  lowerIsBetter,
  higherIsBetter,
  comparatorFor,
  defineCriterion,
  parseFieldPath,
  readNumericField,
  fieldCriterion,
} from './criterion.js'
export type { CriterionDirection, FieldCriterionOptions } from './criterion.js'
