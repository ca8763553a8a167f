import { describe, it, expect } from 'vitest'
import { isUniqueViolation } from '../drizzle-pairing-store.js'

describe('isUniqueViolation', () => {
  it('matches the postgres unique violation code', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true)
    expect(isUniqueViolation({ code: '23503' })).toBe(false)
  })

  it('follows wrapped causes', () => {
    const wrapped = new Error('query failed', { cause: { code: '23505', constraint: 'participants_session_username' } })

    expect(isUniqueViolation(wrapped)).toBe(true)
  })

  it('ignores non-objects', () => {
    expect(isUniqueViolation(null)).toBe(false)
    expect(isUniqueViolation('23505')).toBe(false)
  })
})
