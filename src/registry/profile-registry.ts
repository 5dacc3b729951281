/**
 * Named store of profile configurations
 * @module registry/profile-registry
 */

import type { ProfileConfig } from '../types/config.js'
import {
  DuplicateNameError,
  NotFoundError,
  requireNonEmptyString,
} from '../utils/errors.js'

/**
 * Registry of profile configurations, looked up by name.
 *
 * Registration is a startup step with a single writer; lookups may happen from
 * any number of readers afterwards. Entries are never overwritten or removed.
 *
 * @example
 * ```typescript
 * const registry = new ProfileRegistry()
 * registry.register('objective', objectiveConfig)
 * const config = registry.get('objective')
 * ```
 */
export class ProfileRegistry {
  private readonly configs = new Map<string, ProfileConfig>()

  /**
   * Register a configuration under a name.
   *
   * @throws {DuplicateNameError} If the name is already registered
   * @throws {InvalidParameterError} If the name is empty
   */
  register(name: string, config: ProfileConfig): void {
    requireNonEmptyString(name, 'name')
    if (this.configs.has(name)) {
      throw new DuplicateNameError(name)
    }
    this.configs.set(name, config)
  }

  /**
   * Retrieve a configuration by name.
   *
   * @throws {NotFoundError} If nothing is registered under the name
   */
  get(name: string): ProfileConfig {
    const config = this.configs.get(name)
    if (!config) {
      throw new NotFoundError(name, this.list())
    }
    return config
  }

  has(name: string): boolean {
    return this.configs.has(name)
  }

  /**
   * Registered names, in registration order.
   */
  list(): string[] {
    return Array.from(this.configs.keys())
  }

  get size(): number {
    return this.configs.size
  }
}
