/**
 * Tests for the conflict agents' output schemas.
 */

import { describe, it, expect } from 'vitest'
import { ResolutionResultSchema, VerificationResultSchema } from '../schemas.js'

describe('ResolutionResultSchema', () => {
  it('accepts the documented words', () => {
    expect(ResolutionResultSchema.parse({ result: 'resolved', notes: 'kept both' })).toEqual({
      result: 'resolved',
      notes: 'kept both',
    })
  })

  it('normalises aliases and case', () => {
    expect(ResolutionResultSchema.parse({ result: 'Failure' }).result).toBe('failed')
    expect(ResolutionResultSchema.parse({ result: 'SUCCESS' }).result).toBe('resolved')
  })

  it('rejects unknown results', () => {
    expect(ResolutionResultSchema.safeParse({ result: 'maybe' }).success).toBe(false)
  })
})

describe('VerificationResultSchema', () => {
  it('normalises verdict aliases', () => {
    expect(VerificationResultSchema.parse({ verdict: 'Passed' }).verdict).toBe('pass')
    expect(VerificationResultSchema.parse({ verdict: 'rejected' }).verdict).toBe('fail')
  })

  it('flattens issues that YAML parsed as mappings', () => {
    const parsed = VerificationResultSchema.parse({
      verdict: 'fail',
      issues: [{ 'Line 4': 'duplicate import' }, 'markers remain'],
    })
    expect(parsed.issues).toEqual(['Line 4: duplicate import', 'markers remain'])
  })
})
