/**
 * Zod schemas for run history rows.
 *
 * Rows come back from better-sqlite3 as unknown; every query parses them
 * through these before handing them out.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const RunStatusEnum = z.enum(['running', 'completed', 'failed'])
export type RunStatusValue = z.infer<typeof RunStatusEnum>

export const RunModeEnum = z.enum(['start', 'resume'])
export type RunMode = z.infer<typeof RunModeEnum>

export const LogStageEnum = z.enum([
  'initializing',
  'continuing',
  'detecting_conflicts',
  'resolving_conflicts',
  'verifying_resolution',
  'rolling_back',
  'completed',
  'failed',
])

/** TEXT column holding a JSON array of strings */
const JsonStringArray = z.string().transform((raw, ctx) => {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` })
    return z.NEVER
  }
  const result = z.array(z.string()).safeParse(parsed)
  if (!result.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON array of strings' })
    return z.NEVER
  }
  return result.data
})

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

export const RunRowSchema = z.object({
  id: z.string(),
  source_branch: z.string(),
  target_branch: z.string(),
  mode: RunModeEnum,
  snapshot_revision: z.string().nullable(),
  snapshot_branch: z.string().nullable(),
  max_attempts: z.number().int().nullable(),
  status: RunStatusEnum,
  error: z.string().nullable(),
  attempts: z.number().int(),
  rolled_back: z.number().int().transform((value) => value !== 0),
  created_at: z.string(),
  updated_at: z.string(),
})
export type RunRecord = z.infer<typeof RunRowSchema>

export const RunLogRowSchema = z.object({
  run_id: z.string(),
  seq: z.number().int(),
  timestamp: z.string(),
  stage: LogStageEnum,
  details: z.string(),
  progress_percent: z.number().int(),
  files: JsonStringArray,
  errors: JsonStringArray,
})
export type RunLogRecord = z.infer<typeof RunLogRowSchema>
