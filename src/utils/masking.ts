/**
 * Credential masking for log output and agent diagnostics.
 *
 * Agent CLIs occasionally echo their environment or request headers on
 * failure; their stderr is scrubbed before it reaches logs or run errors.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/** Patterns that identify provider API keys */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Google / Gemini: AIza...
  /AIza[A-Za-z0-9_-]{35,}/g,
]

/**
 * Pino redaction paths for credential fields.
 * Passed to the `pino({ redact })` option by createLogger().
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'env.ANTHROPIC_API_KEY',
  'env.OPENAI_API_KEY',
]

// ---------------------------------------------------------------------------
// maskSecrets
// ---------------------------------------------------------------------------

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * Best effort only: unknown key formats pass through unchanged.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
