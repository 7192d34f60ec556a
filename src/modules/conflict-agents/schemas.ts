/**
 * Zod schemas for the conflict agents' YAML output contracts.
 */

import { z } from 'zod'

/**
 * Agents sometimes answer `failure` or `passed` instead of the documented
 * word, or capitalise it.
 */
function normalizeWord(aliases: Record<string, string>) {
  return (val: unknown): unknown => {
    if (typeof val !== 'string') return val
    const lowered = val.trim().toLowerCase()
    return aliases[lowered] ?? lowered
  }
}

/**
 * Coerce a YAML value to a plain string. `- Line 4: duplicate import` parses
 * as the mapping `{ 'Line 4': 'duplicate import' }`; this flattens it back.
 */
const coerceToString = z.preprocess((val) => {
  if (typeof val === 'string') return val
  if (val !== null && typeof val === 'object') {
    return Object.entries(val)
      .map(([k, v]) => `${k}: ${String(v)}`)
      .join(', ')
  }
  return String(val)
}, z.string())

// ---------------------------------------------------------------------------
// ResolutionResultSchema
// ---------------------------------------------------------------------------

export const ResolutionResultSchema = z.object({
  result: z.preprocess(
    normalizeWord({ failure: 'failed', success: 'resolved', ok: 'resolved' }),
    z.enum(['resolved', 'failed']),
  ),
  notes: z.string().optional(),
  error: z.string().optional(),
})

export type ResolutionSchemaOutput = z.infer<typeof ResolutionResultSchema>

// ---------------------------------------------------------------------------
// VerificationResultSchema
// ---------------------------------------------------------------------------

export const VerificationResultSchema = z.object({
  verdict: z.preprocess(
    normalizeWord({ passed: 'pass', approved: 'pass', failed: 'fail', rejected: 'fail' }),
    z.enum(['pass', 'fail']),
  ),
  issues: z.array(coerceToString).nullish(),
})

export type VerificationSchemaOutput = z.infer<typeof VerificationResultSchema>
