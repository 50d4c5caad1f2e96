import { extractBearerToken } from '@utils/bearer-token.js'
import { describe, expect, it } from 'vitest'

describe('bearer-token', () => {
  it('should return the token of a bearer header', () => {
    expect(extractBearerToken('Bearer test-token')).toBe('test-token')
  })

  it('should accept any casing of the scheme', () => {
    expect(extractBearerToken('bearer test-token')).toBe('test-token')
  })

  it('should return null for missing or malformed headers', () => {
    expect(extractBearerToken(undefined)).toBeNull()
    expect(extractBearerToken('')).toBeNull()
    expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull()
    expect(extractBearerToken('Bearer')).toBeNull()
    expect(extractBearerToken('Bearer two tokens')).toBeNull()
  })
})
