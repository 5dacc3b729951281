/**
 * Instance and combo identities
 * @module profile/identity
 */

import { z } from 'zod'
import type { FieldValue } from '../types/record.js'

/**
 * An identity together with its lookup key and display label.
 */
export interface IdentityInfo {
  /** Stable lookup key; distinguishes `1` from `'1'` */
  readonly key: string
  /** Field values in key order */
  readonly identity: readonly FieldValue[]
  /** Display label, e.g. `(JuMP, ipopt)` */
  readonly label: string
}

export type ComboInfo = IdentityInfo
export type InstanceInfo = IdentityInfo

export const FieldValueSchema = z.union([z.string(), z.number().finite(), z.boolean()])

/**
 * Schema accepting records that expose every key as a scalar value.
 * Parsing keeps only the listed keys.
 */
export function createKeySchema(keys: readonly string[]) {
  const shape: Record<string, typeof FieldValueSchema> = {}
  for (const key of keys) {
    shape[key] = FieldValueSchema
  }
  return z.object(shape)
}

export function identityKey(identity: readonly FieldValue[]): string {
  return JSON.stringify(identity)
}

export function identityLabel(identity: readonly FieldValue[]): string {
  return `(${identity.map(String).join(', ')})`
}

export function describeIdentity(identity: readonly FieldValue[]): IdentityInfo {
  const values = Object.freeze([...identity])
  return Object.freeze({
    key: identityKey(values),
    identity: values,
    label: identityLabel(values),
  })
}
