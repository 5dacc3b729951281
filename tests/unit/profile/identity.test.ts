import { describe, it, expect } from 'vitest'
import { describeIdentity, identityKey, identityLabel } from '../../../src/index.js'
import { createKeySchema } from '../../../src/profile/identity.js'

describe('identity', () => {
  it('keys identities by value and type', () => {
    expect(identityKey(['beam', 100])).toBe('["beam",100]')
    expect(identityKey(['beam', '100'])).not.toBe(identityKey(['beam', 100]))
  })

  it('labels identities as tuples', () => {
    expect(identityLabel(['JuMP', 'ipopt'])).toBe('(JuMP, ipopt)')
    expect(identityLabel(['beam', 100, true])).toBe('(beam, 100, true)')
  })

  it('describes an identity with a frozen copy of its values', () => {
    const values = ['beam', 100]
    const info = describeIdentity(values)
    values.push('changed')

    expect(info).toEqual({
      key: '["beam",100]',
      identity: ['beam', 100],
      label: '(beam, 100)',
    })
    expect(Object.isFrozen(info.identity)).toBe(true)
  })

  describe('createKeySchema', () => {
    const schema = createKeySchema(['problem', 'grid_size'])

    it('keeps only the listed keys', () => {
      const result = schema.safeParse({ problem: 'beam', grid_size: 100, solver: 'ipopt' })

      expect(result.success && result.data).toEqual({ problem: 'beam', grid_size: 100 })
    })

    it('rejects missing, null and non-scalar key values', () => {
      expect(schema.safeParse({ problem: 'beam' }).success).toBe(false)
      expect(schema.safeParse({ problem: 'beam', grid_size: null }).success).toBe(false)
      expect(schema.safeParse({ problem: ['beam'], grid_size: 100 }).success).toBe(false)
      expect(schema.safeParse({ problem: 'beam', grid_size: Infinity }).success).toBe(false)
    })
  })
})
