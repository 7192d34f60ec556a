/**
 * Built-in default values for the rebase-pilot configuration.
 *
 * These are the lowest-priority layer; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { RebasePilotConfig } from './config-schema.js'

export const DEFAULT_CONFIG: RebasePilotConfig = {
  config_format_version: '1',
  log_level: 'warn',
  rebase: {
    max_attempts: 3,
    history_db: '.rebase-pilot/runs.db',
  },
  agents: {
    max_concurrency: 1,
    resolution: {
      agent: 'claude-code',
      timeout_ms: 600_000,
    },
    verification: {
      agent: 'claude-code',
      timeout_ms: 300_000,
    },
  },
  prompts: {
    resolution_char_limit: 4000,
    verification_char_limit: 8000,
  },
}
