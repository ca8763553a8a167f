import { describe, it, expect } from 'vitest'
import { generateId } from '../id.js'

describe('generateId', () => {
  it('prefixes the table tag to a 27-char KSUID', () => {
    expect(generateId('session')).toMatch(/^session_[0-9A-Za-z]{27}$/)
    expect(generateId('rating')).toMatch(/^rating_[0-9A-Za-z]{27}$/)
  })

  it('does not repeat across calls', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId('participant')))
    expect(ids.size).toBe(50)
  })
})
