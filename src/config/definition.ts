/**
 * Profile definitions: configuration as data
 * @module config/definition
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { AGGREGATOR_NAMES, getAggregator } from '../aggregation/aggregators.js'
import { fieldCriterion } from '../criterion/criterion.js'
import type { ProfileConfig } from '../types/config.js'
import { ConfigurationError } from '../utils/errors.js'
import { createProfileConfig, successfulRunWith } from './profile-config.js'

const nonEmpty = z.string().trim().min(1)

export const CriterionDefinitionSchema = z.object({
  name: nonEmpty,
  field: nonEmpty,
  direction: z.enum(['lower', 'higher']).default('lower'),
})

export const ProfileDefinitionSchema = z.object({
  name: nonEmpty,
  description: z.string().optional(),
  groupKeys: z.array(nonEmpty).min(1),
  comboKeys: z.array(nonEmpty).min(1),
  criterion: CriterionDefinitionSchema,
  aggregator: z
    .string()
    .refine((name) => AGGREGATOR_NAMES.some((candidate) => candidate === name), {
      message: `aggregator must be one of: ${AGGREGATOR_NAMES.join(', ')}`,
    })
    .default('mean'),
  successField: nonEmpty.default('success'),
})

export const ProfileDefinitionFileSchema = z.object({
  profiles: z.array(ProfileDefinitionSchema),
})

export type CriterionDefinition = z.infer<typeof CriterionDefinitionSchema>
export type ProfileDefinition = z.infer<typeof ProfileDefinitionSchema>
export type ProfileDefinitionInput = z.input<typeof ProfileDefinitionSchema>

/**
 * Validates raw profile definition data.
 *
 * @throws {ConfigurationError} Listing every schema violation
 */
export function parseProfileDefinition(input: unknown): ProfileDefinition {
  const result = ProfileDefinitionSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid profile definition: ${formatIssues(result.error)}`,
      undefined,
      { issues: result.error.issues }
    )
  }
  return result.data
}

/**
 * Builds a profile configuration from a definition.
 * The inclusion predicate requires `successField === true` and a present criterion value.
 *
 * @example
 * ```typescript
 * const config = configFromDefinition({
 *   name: 'objective',
 *   groupKeys: ['problem', 'grid_size'],
 *   comboKeys: ['model', 'solver'],
 *   criterion: { name: 'Objective', field: 'objective' },
 * })
 * ```
 */
export function configFromDefinition(input: ProfileDefinitionInput): ProfileConfig {
  const definition = parseProfileDefinition(input)
  const criterion = fieldCriterion({
    name: definition.criterion.name,
    path: definition.criterion.field,
    direction: definition.criterion.direction,
  })

  return createProfileConfig({
    groupKeys: definition.groupKeys,
    comboKeys: definition.comboKeys,
    criterion,
    include: successfulRunWith(criterion, definition.successField),
    aggregate: getAggregator(definition.aggregator),
  })
}

/**
 * Validates a definition file (`{ profiles: [...] }`).
 *
 * @throws {ConfigurationError} On schema violations or duplicate profile names
 */
export function parseProfileDefinitionFile(input: unknown): ProfileDefinition[] {
  const result = ProfileDefinitionFileSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid profile definition file: ${formatIssues(result.error)}`,
      undefined,
      { issues: result.error.issues }
    )
  }

  const names = new Set<string>()
  for (const definition of result.data.profiles) {
    if (names.has(definition.name)) {
      throw new ConfigurationError(
        `Profile definition '${definition.name}' appears more than once`,
        'profiles',
        { name: definition.name }
      )
    }
    names.add(definition.name)
  }
  return result.data.profiles
}

const DEFAULT_DEFINITIONS_URL = new URL(
  '../../profiles/default-profiles.json',
  import.meta.url
)

/**
 * Loads the default profile definitions shipped with the library.
 */
export function loadDefaultProfileDefinitions(): ProfileDefinition[] {
  const raw = readFileSync(fileURLToPath(DEFAULT_DEFINITIONS_URL), 'utf-8')
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new ConfigurationError(
      `Default profile definitions are not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    )
  }
  return parseProfileDefinitionFile(data)
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}
