/**
 * Zod validation schemas for the rebase-pilot configuration.
 *
 * Sections:
 *  - rebase: attempt ceiling and run history location
 *  - agents: which CLI agent resolves and which verifies, with timeouts
 *  - prompts: how much file content each prompt carries
 */

import { z } from 'zod'

export const CURRENT_CONFIG_FORMAT_VERSION = '1'
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const AgentIdSchema = z.enum(['claude-code', 'codex'])

export const RebaseSettingsSchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10),
    /** Run history database, relative to the project root unless absolute */
    history_db: z.string().min(1),
  })
  .strict()

export type RebaseSettings = z.infer<typeof RebaseSettingsSchema>

export const AgentRoleSchema = z
  .object({
    agent: AgentIdSchema,
    model: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export type AgentRoleConfig = z.infer<typeof AgentRoleSchema>

export const AgentsSettingsSchema = z
  .object({
    max_concurrency: z.number().int().min(1).max(8),
    resolution: AgentRoleSchema,
    verification: AgentRoleSchema,
  })
  .strict()

export type AgentsSettings = z.infer<typeof AgentsSettingsSchema>

export const PromptSettingsSchema = z
  .object({
    resolution_char_limit: z.number().int().positive(),
    verification_char_limit: z.number().int().positive(),
  })
  .strict()

export type PromptSettings = z.infer<typeof PromptSettingsSchema>

// ---------------------------------------------------------------------------
// Full document
// ---------------------------------------------------------------------------

export const RebasePilotConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    log_level: LogLevelSchema,
    rebase: RebaseSettingsSchema,
    agents: AgentsSettingsSchema,
    prompts: PromptSettingsSchema,
  })
  .strict()

export type RebasePilotConfig = z.infer<typeof RebasePilotConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer before merging)
// ---------------------------------------------------------------------------

export const PartialRebasePilotConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    log_level: LogLevelSchema.optional(),
    rebase: RebaseSettingsSchema.partial().optional(),
    agents: z
      .object({
        max_concurrency: AgentsSettingsSchema.shape.max_concurrency.optional(),
        resolution: AgentRoleSchema.partial().optional(),
        verification: AgentRoleSchema.partial().optional(),
      })
      .strict()
      .optional(),
    prompts: PromptSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialRebasePilotConfig = z.infer<typeof PartialRebasePilotConfigSchema>
