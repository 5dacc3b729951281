/**
 * Default profiles and registry bootstrap
 * @module registry/default-profiles
 */

import {
  configFromDefinition,
  loadDefaultProfileDefinitions,
} from '../config/definition.js'
import type { ProfileConfig } from '../types/config.js'
import { DuplicateNameError } from '../utils/errors.js'
import { ProfileRegistry } from './profile-registry.js'

/** Wall-clock time profile, `benchmark.time`, lower is better */
export const DEFAULT_CPU_PROFILE = 'default_cpu'

/** Iteration count profile, `iterations`, fewer is better */
export const DEFAULT_ITERATIONS_PROFILE = 'default_iter'

let defaultConfigs: ReadonlyMap<string, ProfileConfig> | undefined

/**
 * The library's default configurations, built once from
 * `profiles/default-profiles.json` and shared afterwards.
 */
export function getDefaultProfileConfigs(): ReadonlyMap<string, ProfileConfig> {
  if (!defaultConfigs) {
    const configs = new Map<string, ProfileConfig>()
    for (const definition of loadDefaultProfileDefinitions()) {
      configs.set(definition.name, configFromDefinition(definition))
    }
    defaultConfigs = configs
  }
  return defaultConfigs
}

/**
 * Registers the default profiles.
 *
 * Running it again on the same registry is a no-op for names that already hold
 * the default configuration.
 *
 * @returns Names registered by this call
 * @throws {DuplicateNameError} If a default name holds a different configuration
 */
export function bootstrapDefaultProfiles(registry: ProfileRegistry): string[] {
  const registered: string[] = []
  for (const [name, config] of getDefaultProfileConfigs()) {
    if (registry.has(name)) {
      if (registry.get(name) !== config) {
        throw new DuplicateNameError(name, {
          reason: 'name is taken by a non-default configuration',
        })
      }
      continue
    }
    registry.register(name, config)
    registered.push(name)
  }
  return registered
}

/**
 * Creates a registry holding the default profiles.
 */
export function createDefaultRegistry(): ProfileRegistry {
  const registry = new ProfileRegistry()
  bootstrapDefaultProfiles(registry)
  return registry
}
