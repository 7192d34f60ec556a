/**
 * Prompt rendering for the conflict agents.
 *
 * Templates live in the top-level prompts/ directory and use {{placeholder}}
 * markers. File content is cut to a character limit before it is injected so a
 * large file cannot blow the agent's context.
 */

import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('conflict-agents:prompt-assembler')

// src/modules/conflict-agents and dist/modules/conflict-agents both sit three
// levels below the package root
const PROMPTS_DIR = fileURLToPath(new URL('../../../prompts/', import.meta.url))

export type PromptName = 'resolve-conflict' | 'verify-resolution'

export const TRUNCATION_NOTICE = '\n[... truncated ...]'

const templateCache = new Map<string, string>()

/**
 * Read a bundled prompt template. Templates are cached per directory and name.
 *
 * @param promptsDir - Override for tests; defaults to the bundled prompts/ directory
 */
export async function loadPromptTemplate(name: PromptName, promptsDir: string = PROMPTS_DIR): Promise<string> {
  const key = `${promptsDir}:${name}`
  const cached = templateCache.get(key)
  if (cached !== undefined) return cached

  const template = await readFile(`${promptsDir.replace(/\/$/, '')}/${name}.md`, 'utf-8')
  templateCache.set(key, template)
  return template
}

/**
 * Cut `content` to at most `limit` characters, marking the cut.
 */
export function truncateContent(content: string, limit: number): string {
  if (content.length <= limit) return content
  logger.debug({ length: content.length, limit }, 'Truncating file content for prompt')
  return content.slice(0, limit) + TRUNCATION_NOTICE
}

/**
 * Replace {{placeholder}} patterns in template with values from `values`.
 * Missing placeholders are replaced with an empty string.
 */
export function renderPrompt(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{(\w[\w_-]*)\}\}/g, (_match, key: string) => {
    const value = values[key]
    return value === undefined ? '' : String(value)
  })
}
