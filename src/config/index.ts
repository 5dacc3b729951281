/**
 * Profile configuration module
 * @module config
 */

export {
  createProfileConfig,
  validateProfileKeys,
  successfulRunWith,
} from './profile-config.js'
export {
  CriterionDefinitionSchema,
  ProfileDefinitionSchema,
  ProfileDefinitionFileSchema,
  parseProfileDefinition,
  parseProfileDefinitionFile,
  configFromDefinition,
  loadDefaultProfileDefinitions,
} from './definition.js'
export type {
  CriterionDefinition,
  ProfileDefinition,
  ProfileDefinitionInput,
} from './definition.js'
