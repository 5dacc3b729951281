/**
 * Profile registry module
 * @module registry
 */

export { ProfileRegistry } from './profile-registry.js'
export {
  DEFAULT_CPU_PROFILE,
  DEFAULT_ITERATIONS_PROFILE,
  getDefaultProfileConfigs,
  bootstrapDefaultProfiles,
  createDefaultRegistry,
} from './default-profiles.js'
export {
  parseComboSpecs,
  profileFromRegistry,
  analyzeFromRegistry,
} from './profile-service.js'
export type { RegistryAnalysisOptions } from './profile-service.js'
